/**
 * Shannon entropy scoring used as the statistical fallback for secrets that
 * no pattern rule knows about.
 */

export interface EntropyConfig {
  enabled: boolean;
  /** Minimum score, in bits per symbol. */
  threshold: number;
  /** Tokens shorter than this are never scored. */
  minLength: number;
}

export interface Span {
  start: number;
  end: number;
}

export interface Token extends Span {
  value: string;
}

export const ENTROPY_RULE = 'entropy';
export const ENTROPY_REPLACEMENT = '[REDACTED_SECRET]';

/**
 * Entropy in bits per symbol over the token's code points:
 * -Σ p(c)·log2 p(c), with p(c) = count(c) / length.
 */
export function score(token: string): number {
  const symbols = Array.from(token);
  if (symbols.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const symbol of symbols) {
    counts.set(symbol, (counts.get(symbol) ?? 0) + 1);
  }

  const length = symbols.length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export function isSecret(token: string, config: Pick<EntropyConfig, 'threshold' | 'minLength'>): boolean {
  if (Array.from(token).length < config.minLength) return false;
  return score(token) >= config.threshold;
}

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

/**
 * Split a line into maximal alphanumeric runs. Runs that touch a protected
 * span (text inserted by an earlier replacement) are dropped.
 */
export function tokenize(line: string, protectedSpans: readonly Span[] = []): Token[] {
  const tokens: Token[] = [];
  TOKEN_RE.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = TOKEN_RE.exec(line)) !== null) {
    const start = m.index;
    const end = start + m[0].length;
    if (overlapsAny(start, end, protectedSpans)) continue;
    tokens.push({ value: m[0], start, end });
  }
  TOKEN_RE.lastIndex = 0;
  return tokens;
}

const MARKER_RE = /\[[A-Z][A-Z0-9_]*\]/g;

/** Spans of bracketed upper-case markers such as `[REDACTED_EMAIL]` already in the line. */
export function markerSpans(line: string): Span[] {
  const spans: Span[] = [];
  for (const m of line.matchAll(MARKER_RE)) {
    const start = m.index ?? 0;
    spans.push({ start, end: start + m[0].length });
  }
  return spans;
}

function overlapsAny(start: number, end: number, spans: readonly Span[]): boolean {
  for (const span of spans) {
    if (start < span.end && span.start < end) return true;
  }
  return false;
}
