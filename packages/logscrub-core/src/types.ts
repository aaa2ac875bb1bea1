/**
 * Shapes shared by every part of the engine: the units it accepts, the
 * results it returns and the trace records that make up the audit log.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type StructuredFormat = 'json' | 'yaml';

export type RedactionReason = 'pattern_match' | 'entropy' | 'key_path';

export interface RedactionTrace {
  /** File name or stream id the unit came from. */
  source: string;
  /** 1-based line (or document) number within the source. */
  line: number;
  /** Location inside a structured document, e.g. `users[0].email`. */
  path?: string;
  /** Detection order within the unit. */
  sequence: number;
  original: string;
  redacted: string;
  /** Rule id, the literal `entropy`, or the configured key path. */
  rule: string;
  reason: RedactionReason;
  /** Bits per symbol, entropy detections only. */
  score?: number;
}

export type InputNoteCode = 'invalid_utf8' | 'malformed_document';

export interface InputNote {
  code: InputNoteCode;
  source: string;
  line: number;
  message: string;
}

export interface LineUnit {
  kind: 'line';
  text: string;
  source?: string;
  line?: number;
}

interface DocumentUnitBase {
  kind: 'document';
  format?: StructuredFormat;
  source?: string;
  line?: number;
}

export type DocumentUnit = DocumentUnitBase & ({ text: string } | { value: JsonValue });

export type RedactionUnit = LineUnit | DocumentUnit;

export interface SanitizedResult {
  kind: 'line' | 'document';
  text: string;
  /** Sanitized tree, present when a document parsed successfully. */
  document?: JsonValue;
  traces: RedactionTrace[];
  notes: InputNote[];
}

/** Default source id for units that do not name one. */
export const DEFAULT_SOURCE = '<stdin>';
