/**
 * Pattern rule set.
 *
 * Rules run strictly in profile order, each against the current state of the
 * line, so a replacement made by rule k is what rule k+1 scans. Within one rule
 * the line is scanned once, left to right: every match is replaced and the
 * scan resumes after the match, which bounds the work regardless of what the
 * replacement contains.
 */

import type { Span } from './entropy.js';

export type TemplatePart =
  | { kind: 'literal'; text: string }
  | { kind: 'group'; index: number }
  | { kind: 'named'; name: string };

export interface PatternRule {
  readonly id: string;
  /** Compiled once at load time; always carries the `g` flag. */
  readonly matcher: RegExp;
  /** Template source as written in the profile. */
  readonly replacement: string;
  readonly template: readonly TemplatePart[];
  readonly enabled: boolean;
  /** Index in the profile's ordered list; lower runs first. */
  readonly priority: number;
  readonly description?: string;
}

export interface RuleMatch {
  rule: string;
  original: string;
  redacted: string;
  /** Offset of the match in the line as the rule saw it. */
  start: number;
}

export interface RuleSetResult {
  text: string;
  matches: RuleMatch[];
  /** Spans of `text` that hold inserted replacement text. */
  protectedSpans: Span[];
}

export type TemplateParseResult = { ok: true; parts: TemplatePart[] } | { ok: false; error: string };

/** Number of capture groups in `matcher` and their names. */
export function describeGroups(matcher: RegExp): { count: number; names: Set<string> } {
  const groupCounter = new RegExp(`${matcher.source}|`, matcher.flags.replace(/[gy]/g, ''));
  const m = groupCounter.exec('');
  return {
    count: m ? m.length - 1 : 0,
    names: new Set(Object.keys(m?.groups ?? {})),
  };
}

/**
 * Parse a replacement template. `$n`, `$<name>` and `$$` are supported;
 * anything that would copy the matched text into the output (`$&`, `` $` ``,
 * `$'`, `$0`) is rejected.
 */
export function parseTemplate(template: string, matcher: RegExp): TemplateParseResult {
  const groups = describeGroups(matcher);
  const parts: TemplatePart[] = [];
  let literal = '';

  const flush = (): void => {
    if (literal) parts.push({ kind: 'literal', text: literal });
    literal = '';
  };

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch !== '$' || i === template.length - 1) {
      literal += ch;
      continue;
    }

    const next = template[i + 1];
    if (next === '$') {
      literal += '$';
      i++;
      continue;
    }
    if (next === '&' || next === '`' || next === "'") {
      return { ok: false, error: `"$${next}" would copy the matched text into the output` };
    }
    if (next === '<') {
      const close = template.indexOf('>', i + 2);
      if (close === -1) {
        literal += ch;
        continue;
      }
      const name = template.slice(i + 2, close);
      if (!groups.names.has(name)) {
        return { ok: false, error: `"$<${name}>" names a group the pattern does not define` };
      }
      flush();
      parts.push({ kind: 'named', name });
      i = close;
      continue;
    }
    if (next !== undefined && next >= '0' && next <= '9') {
      const twoDigit = template.slice(i + 1, i + 3);
      let index: number;
      if (/^\d\d$/.test(twoDigit) && Number(twoDigit) >= 1 && Number(twoDigit) <= groups.count) {
        index = Number(twoDigit);
        i += 2;
      } else {
        index = Number(next);
        i += 1;
      }
      if (index === 0) {
        return { ok: false, error: '"$0" would copy the matched text into the output' };
      }
      if (index > groups.count) {
        return {
          ok: false,
          error: `"$${index}" refers to a group the pattern does not define (it has ${groups.count})`,
        };
      }
      flush();
      parts.push({ kind: 'group', index });
      continue;
    }

    literal += ch;
  }

  flush();
  return { ok: true, parts };
}

export function expandTemplate(parts: readonly TemplatePart[], match: RegExpExecArray): string {
  let out = '';
  for (const part of parts) {
    switch (part.kind) {
      case 'literal':
        out += part.text;
        break;
      case 'group':
        out += match[part.index] ?? '';
        break;
      case 'named':
        out += match.groups?.[part.name] ?? '';
        break;
    }
  }
  return out;
}

/**
 * Apply every enabled rule, in order, to one line.
 */
export function applyRules(line: string, rules: readonly PatternRule[]): RuleSetResult {
  let text = line;
  let protectedSpans: Span[] = [];
  const matches: RuleMatch[] = [];

  for (const rule of rules) {
    if (!rule.enabled) continue;

    const pass = applyRule(text, rule);
    if (pass.replacements.length === 0) continue;

    protectedSpans = remapSpans(protectedSpans, pass.replacements);
    text = pass.text;
    for (const r of pass.replacements) {
      matches.push({ rule: rule.id, original: r.original, redacted: r.redacted, start: r.start });
    }
  }

  return { text, matches, protectedSpans };
}

interface Replacement {
  start: number;
  end: number;
  outStart: number;
  outEnd: number;
  original: string;
  redacted: string;
}

function applyRule(text: string, rule: PatternRule): { text: string; replacements: Replacement[] } {
  const re = rule.matcher;
  const replacements: Replacement[] = [];
  let out = '';
  let cursor = 0;

  re.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const original = m[0];
    if (original.length === 0) {
      re.lastIndex = advance(text, re.lastIndex, re.unicode);
      continue;
    }

    const redacted = expandTemplate(rule.template, m);
    if (redacted === original) continue;

    const start = m.index;
    const end = start + original.length;
    out += text.slice(cursor, start);
    const outStart = out.length;
    out += redacted;
    replacements.push({ start, end, outStart, outEnd: out.length, original, redacted });
    cursor = end;
  }
  re.lastIndex = 0;

  if (replacements.length === 0) return { text, replacements };
  out += text.slice(cursor);
  return { text: out, replacements };
}

function advance(text: string, index: number, unicode: boolean): number {
  if (!unicode || index >= text.length) return index + 1;
  const code = text.charCodeAt(index);
  return code >= 0xd800 && code <= 0xdbff ? index + 2 : index + 1;
}

/**
 * Carry protected spans through one rule pass and add the spans of the text
 * that pass inserted. A span cut by a replacement grows to cover it.
 */
function remapSpans(spans: readonly Span[], replacements: readonly Replacement[]): Span[] {
  const mapStart = (p: number): number => {
    let delta = 0;
    for (const r of replacements) {
      if (r.start <= p && p < r.end) return r.outStart;
      if (r.end <= p) delta += r.outEnd - r.outStart - (r.end - r.start);
    }
    return p + delta;
  };
  const mapEnd = (p: number): number => {
    let delta = 0;
    for (const r of replacements) {
      if (r.start < p && p <= r.end) return r.outEnd;
      if (r.end <= p) delta += r.outEnd - r.outStart - (r.end - r.start);
    }
    return p + delta;
  };

  const next: Span[] = spans.map((s) => ({ start: mapStart(s.start), end: mapEnd(s.end) }));
  for (const r of replacements) {
    if (r.outEnd > r.outStart) next.push({ start: r.outStart, end: r.outEnd });
  }
  return mergeSpans(next);
}

function mergeSpans(spans: Span[]): Span[] {
  const sorted = spans
    .filter((s) => s.end > s.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: Span[] = [];
  for (const s of sorted) {
    const last = merged[merged.length - 1];
    if (last && s.start <= last.end) {
      last.end = Math.max(last.end, s.end);
    } else {
      merged.push({ start: s.start, end: s.end });
    }
  }
  return merged;
}
