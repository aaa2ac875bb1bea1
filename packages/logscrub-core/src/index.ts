export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export { score, isSecret, tokenize, ENTROPY_RULE, ENTROPY_REPLACEMENT } from './entropy.js';
export type { EntropyConfig, Span, Token } from './entropy.js';
export { applyRules, parseTemplate, expandTemplate, describeGroups } from './rules.js';
export type { PatternRule, RuleMatch, RuleSetResult, TemplatePart } from './rules.js';
export { redactPaths, maskValue, findRule, REMOVED_MARKER } from './structured.js';
export type { PathRedaction, RedactPathsOptions, RedactPathsResult } from './structured.js';
export { decodeText, splitLines } from './decode.js';
export type { DecodedText } from './decode.js';
export {
  RedactionEngine,
  redactUnit,
  scanText,
  parseDocument,
  isJsonValue,
  toUnits,
  noteLossyInput,
} from './engine.js';
export type { Detection, ScanResult, TextUnitOptions } from './engine.js';
export {
  TraceAggregator,
  TRACE_FORMATS,
  GENESIS_DIGEST,
  compareTraces,
  digestTraces,
  parseTraceLog,
  parseRedactionTrace,
  parseInputNote,
  verifyTraceLog,
} from './trace.js';
export type { TraceFormat, TraceSummary, TraceVerification } from './trace.js';
export { canonicalize, sha256, toHex } from './canonical.js';
export { InProcessBackend } from './backend.js';
export type { RedactionBackend } from './backend.js';
export {
  BatchBackend,
  runBatch,
  mapConcurrent,
  fileInput,
  textInput,
  DEFAULT_CHUNK_SIZE,
} from './batch.js';
export type {
  BatchBackendOptions,
  BatchFile,
  BatchFileResult,
  BatchFileStatus,
  BatchOptions,
  BatchReport,
} from './batch.js';
export * from './profile/index.js';
