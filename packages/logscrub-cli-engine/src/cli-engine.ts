import { spawn } from 'node:child_process';

import {
  BackendError,
  isJsonValue,
  parseInputNote,
  parseRedactionTrace,
  type InputNote,
  type ProfileOverrides,
  type RedactionBackend,
  type RedactionTrace,
  type RedactionUnit,
  type SanitizedResult,
} from '@logscrub/core';

export interface CliEngineOptions {
  enginePath?: string;
  profileRef: string;
  timeoutMs?: number;
  /** Passed to the engine as the matching `redact` flags. */
  overrides?: ProfileOverrides;
}

export type EngineRedactRequestV1 = {
  version: 1;
  command: 'redact';
  units: RedactionUnit[];
};

export type EngineRedactResponseV1 = {
  version: 1;
  command: 'redact';
  results: SanitizedResult[];
};

const BACKEND = 'cli';

/**
 * Runs `<enginePath> engine <profileRef>` once per request. Any failure
 * (spawn, timeout, exit code, unreadable reply) is thrown as a
 * `BackendError`; the caller never gets the unsanitized units back.
 */
export class CliEngineBackend implements RedactionBackend {
  readonly name = BACKEND;
  private readonly enginePath: string;
  private readonly profileRef: string;
  private readonly timeoutMs: number;
  private readonly args: string[];

  constructor(options: CliEngineOptions) {
    this.enginePath = options.enginePath ?? 'logscrub';
    this.profileRef = options.profileRef;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.args = ['engine', this.profileRef, ...overrideArgs(options.overrides)];
  }

  async redact(units: readonly RedactionUnit[]): Promise<SanitizedResult[]> {
    if (units.length === 0) return [];

    const request: EngineRedactRequestV1 = { version: 1, command: 'redact', units: [...units] };
    const output = await spawnJson(this.enginePath, this.args, request, this.timeoutMs);

    let parsed: unknown;
    try {
      parsed = JSON.parse(output);
    } catch (error) {
      throw new BackendError(BACKEND, 'protocol', 'Invalid engine JSON: could not parse response', { cause: error });
    }

    const response = parseRedactResponse(parsed);
    if (response.results.length !== units.length) {
      throw new BackendError(
        BACKEND,
        'protocol',
        `Invalid engine JSON: expected ${units.length} result(s), got ${response.results.length}`,
      );
    }
    return response.results;
  }
}

export function createCliEngineBackend(options: CliEngineOptions): CliEngineBackend {
  return new CliEngineBackend(options);
}

async function spawnJson(command: string, args: string[], input: unknown, timeoutMs: number): Promise<string> {
  const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
  child.stdin.setDefaultEncoding('utf8');
  child.stdout.setEncoding('utf8');
  child.stderr.setEncoding('utf8');

  const stdoutChunks: string[] = [];
  const stderrChunks: string[] = [];

  child.stdout.on('data', (chunk) => stdoutChunks.push(String(chunk)));
  child.stderr.on('data', (chunk) => stderrChunks.push(String(chunk)));

  let settled = false;
  const settleOnce = <T>(fn: () => T): T | undefined => {
    if (settled) {
      return undefined;
    }
    settled = true;
    return fn();
  };

  child.stdin.on('error', (err) => stderrChunks.push(`stdin: ${err.message}\n`));
  child.stdin.write(JSON.stringify(input));
  child.stdin.end();

  return await new Promise<string>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      settleOnce(() => {
        child.kill('SIGKILL');
        reject(new BackendError(BACKEND, 'timeout', `${command} timed out after ${timeoutMs}ms${formatStderr(stderrChunks)}`));
      });
    }, timeoutMs);

    timeoutId.unref?.();

    child.once('error', (err) => {
      settleOnce(() => {
        clearTimeout(timeoutId);
        reject(new BackendError(BACKEND, 'spawn', `Failed to start ${command}: ${err.message}`, { cause: err }));
      });
    });

    child.once('close', (code, signal) => {
      settleOnce(() => {
        clearTimeout(timeoutId);

        if (signal) {
          reject(new BackendError(BACKEND, 'exit', `${command} exited with signal ${signal}${formatStderr(stderrChunks)}`));
          return;
        }

        if (code !== 0) {
          reject(new BackendError(BACKEND, 'exit', `${command} exited with code ${String(code)}${formatStderr(stderrChunks)}`));
          return;
        }

        resolve(stdoutChunks.join(''));
      });
    });
  });
}

export function parseRedactResponse(value: unknown): EngineRedactResponseV1 {
  if (!isRecord(value)) {
    throw new BackendError(BACKEND, 'protocol', 'Invalid engine JSON: expected object');
  }
  if (value.version !== 1) {
    throw new BackendError(BACKEND, 'protocol', 'Invalid engine JSON: expected version=1');
  }
  if (value.command !== 'redact') {
    throw new BackendError(BACKEND, 'protocol', 'Invalid engine JSON: expected command="redact"');
  }
  if (!Array.isArray(value.results)) {
    throw new BackendError(BACKEND, 'protocol', 'Invalid engine JSON: missing/invalid results');
  }

  const results = value.results.map((item: unknown, i: number) => {
    const result = parseResult(item);
    if (!result) {
      throw new BackendError(BACKEND, 'protocol', `Invalid engine JSON: result ${i} is malformed`);
    }
    return result;
  });

  return { version: 1, command: 'redact', results };
}

function parseResult(value: unknown): SanitizedResult | null {
  if (!isRecord(value)) return null;
  if (value.kind !== 'line' && value.kind !== 'document') return null;
  if (typeof value.text !== 'string') return null;
  if (!Array.isArray(value.traces) || !Array.isArray(value.notes)) return null;

  const traces: RedactionTrace[] = [];
  for (const item of value.traces) {
    const trace = parseRedactionTrace(item);
    if (!trace) return null;
    traces.push(trace);
  }

  const notes: InputNote[] = [];
  for (const item of value.notes) {
    const note = parseInputNote(item);
    if (!note) return null;
    notes.push(note);
  }

  const result: SanitizedResult = { kind: value.kind, text: value.text, traces, notes };
  if (value.document !== undefined) {
    if (!isJsonValue(value.document)) return null;
    result.document = value.document;
  }
  return result;
}

function overrideArgs(overrides: ProfileOverrides = {}): string[] {
  const args: string[] = [];
  const { enabled, threshold, minLength } = overrides.entropy ?? {};
  if (enabled === false) args.push('--disable-entropy');
  if (threshold !== undefined) args.push('--entropy-threshold', String(threshold));
  if (minLength !== undefined) args.push('--entropy-min-length', String(minLength));
  if (overrides.keyPaths && overrides.keyPaths.length > 0) {
    args.push('--keys-to-redact', overrides.keyPaths.join(','));
  }
  return args;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatStderr(chunks: string[]): string {
  const stderr = chunks.join('').trim();
  if (!stderr) {
    return '';
  }
  const truncated = stderr.length > 2048 ? `${stderr.slice(0, 2048)}\u2026` : stderr;
  return ` (stderr: ${truncated})`;
}
