import { isLogLevel, type LogLevel } from './logger.js';
import { TRACE_FORMATS, type TraceFormat } from './trace.js';

export type BackendKind = 'inprocess' | 'batch' | 'cli';

export const BACKEND_KINDS: readonly BackendKind[] = ['inprocess', 'batch', 'cli'];

export interface LogscrubConfig {
  /** Built-in profile name or path to a profile file. */
  profile?: string;
  backend?: BackendKind;
  /** Files processed at once by the batch runner. */
  concurrency?: number;
  logLevel?: LogLevel;
  traceFormat?: TraceFormat;
  /** Per-call timeout for the subprocess backend. */
  timeoutMs?: number;
  /** Executable the subprocess backend runs. */
  enginePath?: string;
}

/** Config as it arrives from flags or the environment, before parsing. */
export type RawLogscrubConfig = {
  [K in keyof LogscrubConfig]?: string | number;
};

export const DEFAULT_CONFIG: Required<LogscrubConfig> = {
  profile: 'default',
  backend: 'inprocess',
  concurrency: 4,
  logLevel: 'info',
  traceFormat: 'jsonl',
  timeoutMs: 30_000,
  enginePath: 'logscrub',
};

export function mergeConfig(userConfig: LogscrubConfig = {}): Required<LogscrubConfig> {
  return {
    profile: userConfig.profile ?? DEFAULT_CONFIG.profile,
    backend: userConfig.backend ?? DEFAULT_CONFIG.backend,
    concurrency: userConfig.concurrency ?? DEFAULT_CONFIG.concurrency,
    logLevel: userConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    traceFormat: userConfig.traceFormat ?? DEFAULT_CONFIG.traceFormat,
    timeoutMs: userConfig.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    enginePath: userConfig.enginePath ?? DEFAULT_CONFIG.enginePath,
  };
}

/**
 * Validate configuration values
 */
export function validateConfig(config: LogscrubConfig): string[] {
  const errors: string[] = [];

  if (config.concurrency !== undefined && (!Number.isInteger(config.concurrency) || config.concurrency < 1)) {
    errors.push(`Invalid concurrency: ${config.concurrency}. Must be a positive integer`);
  }

  if (config.timeoutMs !== undefined && (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0)) {
    errors.push(`Invalid timeoutMs: ${config.timeoutMs}. Must be a positive number`);
  }

  if (config.profile !== undefined && config.profile.trim() === '') {
    errors.push('Invalid profile: must not be empty');
  }

  if (config.enginePath !== undefined && config.enginePath.trim() === '') {
    errors.push('Invalid enginePath: must not be empty');
  }

  return errors;
}

/**
 * Turn raw string values into a typed config. Unknown enum values and
 * unparseable numbers are reported alongside range errors.
 */
export function parseConfig(raw: RawLogscrubConfig): { config: LogscrubConfig; errors: string[] } {
  const errors: string[] = [];
  const config: LogscrubConfig = {};

  if (raw.profile !== undefined) config.profile = String(raw.profile);
  if (raw.enginePath !== undefined) config.enginePath = String(raw.enginePath);

  if (raw.backend !== undefined) {
    const backend = String(raw.backend);
    if (isBackendKind(backend)) config.backend = backend;
    else errors.push(`Invalid backend: ${backend}. Must be one of: ${BACKEND_KINDS.join(', ')}`);
  }

  if (raw.logLevel !== undefined) {
    const level = String(raw.logLevel);
    if (isLogLevel(level)) config.logLevel = level;
    else errors.push(`Invalid logLevel: ${level}. Must be one of: debug, info, warn, error`);
  }

  if (raw.traceFormat !== undefined) {
    const format = String(raw.traceFormat);
    if (isTraceFormat(format)) config.traceFormat = format;
    else errors.push(`Invalid traceFormat: ${format}. Must be one of: ${TRACE_FORMATS.join(', ')}`);
  }

  if (raw.concurrency !== undefined) config.concurrency = Number(raw.concurrency);
  if (raw.timeoutMs !== undefined) config.timeoutMs = Number(raw.timeoutMs);

  errors.push(...validateConfig(config));
  return { config, errors };
}

export function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

export function isTraceFormat(value: string): value is TraceFormat {
  return TRACE_FORMATS.some((format) => format === value);
}
