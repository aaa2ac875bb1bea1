/**
 * Redaction engine.
 *
 * `redactUnit` is a pure function of (unit, profile): it keeps no state
 * between calls and does no I/O, so any number of callers may run it at once
 * against the same profile. `RedactionEngine` adds a profile store on top and
 * reads the current profile exactly once per call.
 */

import { dump as dumpYaml, load as loadYaml, JSON_SCHEMA } from 'js-yaml';

import { decodeText, splitLines } from './decode.js';
import { ENTROPY_REPLACEMENT, ENTROPY_RULE, isSecret, markerSpans, score, tokenize } from './entropy.js';
import { ProfileStore } from './profile/store.js';
import type { Profile } from './profile/types.js';
import { applyRules } from './rules.js';
import { redactPaths } from './structured.js';
import {
  DEFAULT_SOURCE,
  type DocumentUnit,
  type InputNote,
  type JsonValue,
  type RedactionReason,
  type RedactionTrace,
  type RedactionUnit,
  type SanitizedResult,
  type StructuredFormat,
} from './types.js';

export interface Detection {
  original: string;
  redacted: string;
  rule: string;
  reason: RedactionReason;
  path?: string;
  score?: number;
}

export interface ScanResult {
  text: string;
  detections: Detection[];
}

/**
 * Pattern rules, then entropy over what is left. Detections come back in
 * that order: rule order and match position first, then token position.
 */
export function scanText(line: string, profile: Profile): ScanResult {
  const ruled = applyRules(line, profile.rules);
  const detections: Detection[] = ruled.matches.map((m) => ({
    original: m.original,
    redacted: m.redacted,
    rule: m.rule,
    reason: 'pattern_match',
  }));

  if (!profile.entropy.enabled) {
    return { text: ruled.text, detections };
  }

  // Markers left by an earlier pass are never rescored.
  const protectedSpans = [...ruled.protectedSpans, ...markerSpans(ruled.text)];
  let text = '';
  let cursor = 0;
  for (const token of tokenize(ruled.text, protectedSpans)) {
    if (!isSecret(token.value, profile.entropy)) continue;
    text += ruled.text.slice(cursor, token.start) + ENTROPY_REPLACEMENT;
    cursor = token.end;
    detections.push({
      original: token.value,
      redacted: ENTROPY_REPLACEMENT,
      rule: ENTROPY_RULE,
      reason: 'entropy',
      score: score(token.value),
    });
  }
  text += ruled.text.slice(cursor);

  return { text, detections };
}

export function redactUnit(unit: RedactionUnit, profile: Profile): SanitizedResult {
  const source = unit.source ?? DEFAULT_SOURCE;
  const line = unit.line ?? 1;

  if (unit.kind === 'line') {
    const scanned = scanText(unit.text, profile);
    return {
      kind: 'line',
      text: scanned.text,
      traces: toTraces(scanned.detections, source, line),
      notes: [],
    };
  }

  return redactDocument(unit, profile, source, line);
}

function redactDocument(unit: DocumentUnit, profile: Profile, source: string, line: number): SanitizedResult {
  const format = unit.format ?? 'json';
  let tree: JsonValue;
  let pretty = false;

  if ('value' in unit) {
    tree = unit.value;
  } else {
    const parsed = parseDocument(unit.text, format);
    if (!parsed.ok) {
      return redactAsText(unit.text, profile, source, line, parsed.reason);
    }
    tree = parsed.value;
    pretty = unit.text.trim().includes('\n');
  }

  const detections: Detection[] = [];
  const { value } = redactPaths(tree, profile.keyPaths, {
    onLeaf: (text, location) => {
      const scanned = scanText(text, profile);
      for (const d of scanned.detections) {
        detections.push(location ? { ...d, path: location } : d);
      }
      return scanned.text;
    },
    onRedaction: (r) => {
      detections.push({
        original: r.original,
        redacted: r.redacted,
        rule: r.rule,
        reason: 'key_path',
        path: r.location,
      });
    },
  });

  return {
    kind: 'document',
    text: serializeDocument(value, format, pretty),
    document: value,
    traces: toTraces(detections, source, line),
    notes: [],
  };
}

/** Unparseable documents are handled as plain lines; nothing is skipped. */
function redactAsText(text: string, profile: Profile, source: string, line: number, reason: string): SanitizedResult {
  const lines = text.split('\n');
  const traces: RedactionTrace[] = [];
  const out: string[] = [];

  lines.forEach((raw, i) => {
    const scanned = scanText(raw, profile);
    out.push(scanned.text);
    traces.push(...toTraces(scanned.detections, source, line + i));
  });

  return {
    kind: 'document',
    text: out.join('\n'),
    traces,
    notes: [{ code: 'malformed_document', source, line, message: `${reason}; redacted as plain text` }],
  };
}

type ParseResult = { ok: true; value: JsonValue } | { ok: false; reason: string };

export function parseDocument(text: string, format: StructuredFormat): ParseResult {
  let parsed: unknown;
  try {
    parsed = format === 'yaml' ? loadYaml(text, { schema: JSON_SCHEMA }) : JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message.split('\n')[0] : String(err);
    return { ok: false, reason: `invalid ${format.toUpperCase()}: ${message}` };
  }

  if (parsed === null || typeof parsed !== 'object') {
    return { ok: false, reason: `${format.toUpperCase()} document is not an object or array` };
  }
  if (!isJsonValue(parsed)) {
    return { ok: false, reason: `${format.toUpperCase()} document holds values that are not plain data` };
  }
  return { ok: true, value: parsed };
}

function serializeDocument(value: JsonValue, format: StructuredFormat, pretty: boolean): string {
  if (format === 'yaml') {
    return dumpYaml(value, { schema: JSON_SCHEMA, lineWidth: -1 }).replace(/\n$/, '');
  }
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every((item: unknown) => isJsonValue(item));
      if (Object.getPrototypeOf(value) !== Object.prototype && Object.getPrototypeOf(value) !== null) {
        return false;
      }
      return Object.values(value).every((item: unknown) => isJsonValue(item));
    default:
      return false;
  }
}

function toTraces(detections: readonly Detection[], source: string, line: number): RedactionTrace[] {
  return detections.map((d, i) => ({
    source,
    line,
    ...(d.path !== undefined ? { path: d.path } : {}),
    sequence: i + 1,
    original: d.original,
    redacted: d.redacted,
    rule: d.rule,
    reason: d.reason,
    ...(d.score !== undefined ? { score: d.score } : {}),
  }));
}

// --- Units from raw input ---

export interface TextUnitOptions {
  source?: string;
  /** Line number of the first line; defaults to 1. */
  firstLine?: number;
  /**
   * `json` treats each non-empty line as a document (JSON Lines); `yaml`
   * treats the whole text as one document.
   */
  structured?: StructuredFormat;
}

export function toUnits(text: string, options: TextUnitOptions = {}): RedactionUnit[] {
  const source = options.source ?? DEFAULT_SOURCE;
  const first = options.firstLine ?? 1;

  if (options.structured === 'yaml') {
    return text === '' ? [] : [{ kind: 'document', format: 'yaml', text, source, line: first }];
  }

  return splitLines(text).map((lineText, i): RedactionUnit => {
    const line = first + i;
    if (options.structured === 'json' && lineText.trim() !== '') {
      return { kind: 'document', format: 'json', text: lineText, source, line };
    }
    return { kind: 'line', text: lineText, source, line };
  });
}

function unitText(unit: RedactionUnit): string | undefined {
  if (unit.kind === 'line') return unit.text;
  return 'text' in unit ? unit.text : undefined;
}

/** Record an `invalid_utf8` note on every result whose input was decoded lossily. */
export function noteLossyInput(units: readonly RedactionUnit[], results: SanitizedResult[]): void {
  units.forEach((unit, i) => {
    const result = results[i];
    if (!result || !unitText(unit)?.includes('\uFFFD')) return;
    const note: InputNote = {
      code: 'invalid_utf8',
      source: unit.source ?? DEFAULT_SOURCE,
      line: unit.line ?? 1,
      message: 'invalid UTF-8 byte sequence replaced with U+FFFD',
    };
    result.notes.unshift(note);
  });
}

// --- Engine ---

export class RedactionEngine {
  private readonly store: ProfileStore;

  constructor(profile: Profile | ProfileStore) {
    this.store = profile instanceof ProfileStore ? profile : ProfileStore.fromProfile(profile);
  }

  get profile(): Profile {
    return this.store.current();
  }

  redact(unit: RedactionUnit): SanitizedResult {
    return redactUnit(unit, this.store.current());
  }

  /** Redact every unit against one profile snapshot. */
  redactAll(units: readonly RedactionUnit[]): SanitizedResult[] {
    const profile = this.store.current();
    return units.map((unit) => redactUnit(unit, profile));
  }

  redactText(text: string, options: TextUnitOptions = {}): SanitizedResult[] {
    return this.redactAll(toUnits(text, options));
  }

  redactBytes(bytes: Uint8Array, options: TextUnitOptions = {}): SanitizedResult[] {
    const decoded = decodeText(bytes);
    const units = toUnits(decoded.text, options);
    const results = this.redactAll(units);
    if (decoded.lossy) noteLossyInput(units, results);
    return results;
  }
}
