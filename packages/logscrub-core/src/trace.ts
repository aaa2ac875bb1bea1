import { canonicalize, sha256, toHex } from './canonical.js';
import type { InputNote, JsonValue, RedactionReason, RedactionTrace, SanitizedResult } from './types.js';

export type TraceFormat = 'json' | 'jsonl' | 'csv';

export const TRACE_FORMATS: readonly TraceFormat[] = ['json', 'jsonl', 'csv'];

export interface TraceSummary {
  total: number;
  sources: number;
  byRule: Record<string, number>;
  byReason: Partial<Record<RedactionReason, number>>;
}

export interface TraceVerification {
  valid: boolean;
  digest: string;
  count: number;
}

/** Hash the chain starts from. */
export const GENESIS_DIGEST = '0'.repeat(64);

const CSV_HEADERS = ['source', 'line', 'path', 'sequence', 'rule', 'reason', 'original', 'redacted', 'score'];
const REASONS = new Set<string>(['pattern_match', 'entropy', 'key_path']);
const NOTE_CODES = new Set<string>(['invalid_utf8', 'malformed_document']);

/**
 * Collects traces from any number of producers. Entries are kept in
 * (source, line, sequence) order no matter what order they arrive in, so two
 * runs over the same input export byte-identical logs.
 */
export class TraceAggregator {
  private traces: RedactionTrace[] = [];
  private sorted = true;

  add(traces: readonly RedactionTrace[]): void {
    for (const trace of traces) {
      this.traces.push({ ...trace });
    }
    if (traces.length > 0) this.sorted = false;
  }

  addResults(results: readonly SanitizedResult[]): void {
    for (const result of results) this.add(result.traces);
  }

  get size(): number {
    return this.traces.length;
  }

  entries(): RedactionTrace[] {
    if (!this.sorted) {
      this.traces.sort(compareTraces);
      this.sorted = true;
    }
    return this.traces.map((t) => ({ ...t }));
  }

  export(format: TraceFormat): string {
    const entries = this.entries();
    switch (format) {
      case 'json':
        return JSON.stringify(entries, null, 2);
      case 'jsonl':
        return entries.map((e) => JSON.stringify(e)).join('\n');
      case 'csv': {
        const rows = entries.map((e) => [
          e.source,
          String(e.line),
          e.path ?? '',
          String(e.sequence),
          e.rule,
          e.reason,
          e.original,
          e.redacted,
          e.score === undefined ? '' : String(e.score),
        ]);
        return [CSV_HEADERS.join(','), ...rows.map((r) => r.map(csvField).join(','))].join('\n');
      }
    }
  }

  /** SHA-256 hash chain over the canonical JSON of every entry, in order. */
  digest(): string {
    return digestTraces(this.entries());
  }

  summary(): TraceSummary {
    const byRule: Record<string, number> = {};
    const byReason: Partial<Record<RedactionReason, number>> = {};
    const sources = new Set<string>();
    for (const t of this.traces) {
      byRule[t.rule] = (byRule[t.rule] ?? 0) + 1;
      byReason[t.reason] = (byReason[t.reason] ?? 0) + 1;
      sources.add(t.source);
    }
    return { total: this.traces.length, sources: sources.size, byRule, byReason };
  }

  clear(): void {
    this.traces = [];
    this.sorted = true;
  }
}

export function compareTraces(a: RedactionTrace, b: RedactionTrace): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return a.line - b.line || a.sequence - b.sequence;
}

export function digestTraces(entries: readonly RedactionTrace[]): string {
  let digest = GENESIS_DIGEST;
  for (const entry of entries) {
    digest = toHex(sha256(`${digest}\n${canonicalize(traceToJson(entry))}`));
  }
  return digest;
}

/**
 * Recompute the digest of an exported trace log (`json` or `jsonl`) and
 * compare it with the one recorded when the log was written.
 */
export function verifyTraceLog(content: string, expectedDigest: string): TraceVerification {
  const entries = parseTraceLog(content);
  const digest = digestTraces(entries);
  return { valid: digest === expectedDigest.trim().toLowerCase(), digest, count: entries.length };
}

/** Parse a `json` or `jsonl` export back into traces. */
export function parseTraceLog(content: string): RedactionTrace[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const raw: unknown[] = [];
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) throw new Error('Trace log must be a JSON array');
    raw.push(...parsed);
  } else {
    trimmed.split('\n').forEach((line, i) => {
      if (line.trim() === '') return;
      try {
        raw.push(JSON.parse(line));
      } catch (err) {
        throw new Error(`Trace log line ${i + 1} is not valid JSON`, { cause: err });
      }
    });
  }

  return raw.map((value, i) => {
    const trace = parseRedactionTrace(value);
    if (!trace) throw new Error(`Trace log entry ${i + 1} is not a redaction trace`);
    return trace;
  });
}

/** Validate one decoded trace object; `null` when any field is missing or mistyped. */
export function parseRedactionTrace(value: unknown): RedactionTrace | null {
  if (!isRecord(value)) return null;
  const { source, line, path, sequence, original, redacted, rule, reason, score } = value;
  if (
    typeof source !== 'string' ||
    typeof line !== 'number' ||
    typeof sequence !== 'number' ||
    typeof original !== 'string' ||
    typeof redacted !== 'string' ||
    typeof rule !== 'string' ||
    typeof reason !== 'string' ||
    !isReason(reason) ||
    (path !== undefined && typeof path !== 'string') ||
    (score !== undefined && typeof score !== 'number')
  ) {
    return null;
  }
  return {
    source,
    line,
    ...(typeof path === 'string' ? { path } : {}),
    sequence,
    original,
    redacted,
    rule,
    reason,
    ...(typeof score === 'number' ? { score } : {}),
  };
}

export function parseInputNote(value: unknown): InputNote | null {
  if (!isRecord(value)) return null;
  const { code, source, line, message } = value;
  if (
    typeof code !== 'string' ||
    !isNoteCode(code) ||
    typeof source !== 'string' ||
    typeof line !== 'number' ||
    typeof message !== 'string'
  ) {
    return null;
  }
  return { code, source, line, message };
}

function isReason(value: string): value is RedactionReason {
  return REASONS.has(value);
}

function isNoteCode(value: string): value is InputNote['code'] {
  return NOTE_CODES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function traceToJson(t: RedactionTrace): JsonValue {
  const out: { [key: string]: JsonValue } = {
    source: t.source,
    line: t.line,
    sequence: t.sequence,
    original: t.original,
    redacted: t.redacted,
    rule: t.rule,
    reason: t.reason,
  };
  if (t.path !== undefined) out.path = t.path;
  if (t.score !== undefined) out.score = t.score;
  return out;
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
