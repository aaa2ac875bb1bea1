import type { EngineRedactRequestV1, EngineRedactResponseV1 } from '@logscrub/cli-engine';
import { RedactionEngine, isJsonValue, loadProfile, type RedactionUnit, type StructuredFormat } from '@logscrub/core';

import { processIo, readAll, type CommandIo } from '../io.js';
import { parseOverrides, type OverrideOptions } from '../overrides.js';

/**
 * `logscrub engine <profile>`: the other end of the subprocess backend. Reads
 * one request from stdin and writes one response to stdout. Failures go to
 * stderr with exit code 1 so the caller never mistakes them for output.
 */
export const engineCommands = {
  async run(profileRef: string, options: OverrideOptions = {}, io: CommandIo = processIo): Promise<void> {
    try {
      const errors: string[] = [];
      const overrides = parseOverrides(options, errors);
      if (errors.length > 0) {
        throw new Error(`Invalid options: ${errors.join('; ')}`);
      }
      const engine = new RedactionEngine(loadProfile(profileRef, { overrides }));
      const raw = new TextDecoder().decode(await readAll(io.stdin));
      const request = parseRedactRequest(JSON.parse(raw));

      const response: EngineRedactResponseV1 = {
        version: 1,
        command: 'redact',
        results: engine.redactAll(request.units),
      };
      io.stdout.write(JSON.stringify(response));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Failed to run engine: ${message}`);
      process.exit(1);
    }
  },
};

export function parseRedactRequest(value: unknown): EngineRedactRequestV1 {
  if (!isRecord(value)) {
    throw new Error('Invalid request: expected object');
  }
  if (value.version !== 1) {
    throw new Error('Invalid request: expected version=1');
  }
  if (value.command !== 'redact') {
    throw new Error('Invalid request: expected command="redact"');
  }
  if (!Array.isArray(value.units)) {
    throw new Error('Invalid request: missing/invalid units');
  }

  const units = value.units.map((item: unknown, i: number) => {
    const unit = parseUnit(item);
    if (!unit) {
      throw new Error(`Invalid request: unit ${i} is malformed`);
    }
    return unit;
  });

  return { version: 1, command: 'redact', units };
}

function parseUnit(value: unknown): RedactionUnit | null {
  if (!isRecord(value)) return null;
  const { kind, text, source, line, format } = value;

  if (source !== undefined && typeof source !== 'string') return null;
  if (line !== undefined && (typeof line !== 'number' || !Number.isInteger(line) || line < 1)) return null;
  const meta = {
    ...(typeof source === 'string' ? { source } : {}),
    ...(typeof line === 'number' ? { line } : {}),
  };

  if (kind === 'line') {
    return typeof text === 'string' ? { kind, text, ...meta } : null;
  }
  if (kind !== 'document') return null;
  if (format !== undefined && format !== 'json' && format !== 'yaml') return null;
  const fmt: { format?: StructuredFormat } = format === undefined ? {} : { format };

  if (typeof text === 'string') return { kind, text, ...fmt, ...meta };
  if ('value' in value && isJsonValue(value.value)) return { kind, value: value.value, ...fmt, ...meta };
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
