import { readFile } from 'node:fs/promises';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import type { RedactionBackend } from './backend.js';
import { decodeText } from './decode.js';
import { noteLossyInput, redactUnit, toUnits, type RedactionEngine } from './engine.js';
import { silentLogger, type Logger } from './logger.js';
import { TraceAggregator } from './trace.js';
import type { InputNote, RedactionUnit, SanitizedResult, StructuredFormat } from './types.js';

export interface BatchFile {
  /** Source id recorded in traces, usually the path as given. */
  source: string;
  load(): Promise<Uint8Array | string>;
}

export type BatchFileStatus = 'completed' | 'aborted' | 'failed';

export interface BatchFileResult {
  source: string;
  status: BatchFileStatus;
  /** Sanitized file content; only set for completed files. */
  text?: string;
  redactions: number;
  notes: InputNote[];
  error?: string;
}

export interface BatchOptions {
  backend: RedactionBackend;
  concurrency?: number;
  /** Units per backend call; workers yield between calls. */
  chunkSize?: number;
  structured?: StructuredFormat;
  signal?: AbortSignal;
  aggregator?: TraceAggregator;
  logger?: Logger;
  /** Called once per file as soon as it settles. */
  onFile?: (result: BatchFileResult) => void | Promise<void>;
}

export interface BatchReport {
  files: BatchFileResult[];
  aggregator: TraceAggregator;
  aborted: boolean;
}

export const DEFAULT_CHUNK_SIZE = 500;

export function fileInput(filePath: string, source: string = filePath): BatchFile {
  return { source, load: () => readFile(filePath) };
}

export function textInput(source: string, text: string): BatchFile {
  return { source, load: async () => text };
}

/**
 * Redact whole files on `concurrency` workers. Traces of a file reach the
 * aggregator only once the file is complete; a file cut short by the abort
 * signal is reported as `aborted` with no output.
 */
export async function runBatch(files: readonly BatchFile[], options: BatchOptions): Promise<BatchReport> {
  const aggregator = options.aggregator ?? new TraceAggregator();
  const logger = options.logger ?? silentLogger;
  const chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const signal = options.signal;

  const results = await mapConcurrent(files, options.concurrency ?? 1, async (file) => {
    const result = await processFile(file, options.backend, { chunkSize, structured: options.structured, signal });
    if (result.status === 'completed') {
      aggregator.add(result.traces);
    } else if (result.status === 'failed') {
      logger.error(`Failed to redact ${file.source}: ${result.file.error ?? 'unknown error'}`);
    } else {
      logger.warn(`Redaction of ${file.source} aborted; partial output discarded`);
    }
    logger.debug(`${file.source}: ${result.file.status}, ${result.file.redactions} redaction(s)`);
    await options.onFile?.(result.file);
    return result.file;
  });

  return { files: results, aggregator, aborted: signal?.aborted ?? false };
}

interface ProcessedFile {
  status: BatchFileStatus;
  file: BatchFileResult;
  traces: SanitizedResult['traces'];
}

async function processFile(
  file: BatchFile,
  backend: RedactionBackend,
  options: { chunkSize: number; structured?: StructuredFormat; signal?: AbortSignal },
): Promise<ProcessedFile> {
  const aborted = (): ProcessedFile => ({
    status: 'aborted',
    file: { source: file.source, status: 'aborted', redactions: 0, notes: [] },
    traces: [],
  });
  if (options.signal?.aborted) return aborted();

  try {
    const content = await file.load();
    const decoded = typeof content === 'string' ? { text: content, lossy: false } : decodeText(content);
    const units = toUnits(decoded.text, { source: file.source, structured: options.structured });

    const results: SanitizedResult[] = [];
    for (let i = 0; i < units.length; i += options.chunkSize) {
      if (options.signal?.aborted) return aborted();
      results.push(...(await backend.redact(units.slice(i, i + options.chunkSize))));
      await yieldToEventLoop();
    }
    if (options.signal?.aborted) return aborted();
    if (decoded.lossy) noteLossyInput(units, results);

    const traces = results.flatMap((r) => r.traces);
    let text = results.map((r) => r.text).join('\n');
    if (results.length > 0 && decoded.text.endsWith('\n')) text += '\n';

    return {
      status: 'completed',
      file: {
        source: file.source,
        status: 'completed',
        text,
        redactions: traces.length,
        notes: results.flatMap((r) => r.notes),
      },
      traces,
    };
  } catch (error) {
    return {
      status: 'failed',
      file: {
        source: file.source,
        status: 'failed',
        redactions: 0,
        notes: [],
        error: error instanceof Error ? error.message : String(error),
      },
      traces: [],
    };
  }
}

/** Run `fn` over `items` with at most `concurrency` in flight; results keep input order. */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      out[index] = await fn(items[index], index);
    }
  };

  const workers = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return out;
}

export interface BatchBackendOptions {
  concurrency?: number;
  chunkSize?: number;
  signal?: AbortSignal;
}

/**
 * In-process backend that splits a request by source and works through the
 * groups concurrently, yielding between chunks so a large request does not
 * hold the event loop.
 */
export class BatchBackend implements RedactionBackend {
  readonly name = 'batch';
  private readonly engine: RedactionEngine;
  private readonly options: BatchBackendOptions;

  constructor(engine: RedactionEngine, options: BatchBackendOptions = {}) {
    this.engine = engine;
    this.options = options;
  }

  async redact(units: readonly RedactionUnit[]): Promise<SanitizedResult[]> {
    const profile = this.engine.profile;
    const chunkSize = Math.max(1, this.options.chunkSize ?? DEFAULT_CHUNK_SIZE);

    const groups = new Map<string, number[]>();
    units.forEach((unit, i) => {
      const key = unit.source ?? '';
      const group = groups.get(key);
      if (group) group.push(i);
      else groups.set(key, [i]);
    });

    const out = new Array<SanitizedResult>(units.length);
    await mapConcurrent([...groups.values()], this.options.concurrency ?? 1, async (indices) => {
      for (let i = 0; i < indices.length; i += chunkSize) {
        this.options.signal?.throwIfAborted();
        for (const index of indices.slice(i, i + chunkSize)) {
          out[index] = redactUnit(units[index], profile);
        }
        await yieldToEventLoop();
      }
    });
    return out;
  }
}
