import { describe, expect, it, vi } from 'vitest';

import { InProcessBackend } from '../src/backend.js';
import { BatchBackend, mapConcurrent, runBatch, textInput, type BatchFile } from '../src/batch.js';
import { RedactionEngine } from '../src/engine.js';
import type { Logger } from '../src/logger.js';
import { loadProfile } from '../src/profile/loader.js';

const engine = new RedactionEngine(loadProfile('default'));

function makeFiles(): BatchFile[] {
  return [
    textInput('c.log', 'mail c@example.com\nhost 10.0.0.3\n'),
    textInput('a.log', 'mail a@example.com\n'),
    textInput('b.log', 'nothing here\nssn 123-45-6789\nhost 10.0.0.2'),
  ];
}

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

describe('runBatch', () => {
  it('produces the same output and trace log at any concurrency', async () => {
    const serial = await runBatch(makeFiles(), { backend: new InProcessBackend(engine), concurrency: 1 });
    const parallel = await runBatch(makeFiles(), {
      backend: new InProcessBackend(engine),
      concurrency: 4,
      chunkSize: 1,
    });

    expect(parallel.files).toEqual(serial.files);
    expect(parallel.aggregator.export('jsonl')).toBe(serial.aggregator.export('jsonl'));
    expect(serial.aggregator.entries().map((t) => [t.source, t.line, t.rule])).toEqual([
      ['a.log', 1, 'email'],
      ['b.log', 2, 'ssn'],
      ['b.log', 3, 'ipv4'],
      ['c.log', 1, 'email'],
      ['c.log', 2, 'ipv4'],
    ]);
  });

  it('reports files in input order with their sanitized text', async () => {
    const report = await runBatch(makeFiles(), { backend: new InProcessBackend(engine), concurrency: 2 });
    expect(report.aborted).toBe(false);
    expect(report.files.map((f) => [f.source, f.status, f.redactions])).toEqual([
      ['c.log', 'completed', 2],
      ['a.log', 'completed', 1],
      ['b.log', 'completed', 2],
    ]);
    expect(report.files[0]?.text).toBe('mail [REDACTED_EMAIL]\nhost [REDACTED_IP]\n');
    expect(report.files[2]?.text).toBe('nothing here\nssn [REDACTED_SSN]\nhost [REDACTED_IP]');
  });

  it('decodes byte input and notes invalid UTF-8', async () => {
    const file: BatchFile = {
      source: 'bin.log',
      load: async () => new Uint8Array([0x61, 0xff, 0x0a]),
    };
    const report = await runBatch([file], { backend: new InProcessBackend(engine) });
    expect(report.files[0]?.text).toBe('a\uFFFD\n');
    expect(report.files[0]?.notes.map((n) => [n.code, n.line])).toEqual([['invalid_utf8', 1]]);
  });

  it('treats each line as a JSON document when asked', async () => {
    const report = await runBatch([textInput('events.jsonl', '{"msg":"to a@example.com"}\n')], {
      backend: new InProcessBackend(engine),
      structured: 'json',
    });
    expect(report.files[0]?.text).toBe('{"msg":"to [REDACTED_EMAIL]"}\n');
    expect(report.aggregator.entries()[0]?.path).toBe('msg');
  });

  it('does nothing once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const logger = spyLogger();

    const report = await runBatch(makeFiles(), {
      backend: new InProcessBackend(engine),
      signal: controller.signal,
      logger,
    });

    expect(report.aborted).toBe(true);
    expect(report.files.every((f) => f.status === 'aborted' && f.text === undefined)).toBe(true);
    expect(report.aggregator.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Redaction of c.log aborted; partial output discarded');
  });

  it('keeps completed files and discards the rest when aborted mid-run', async () => {
    const controller = new AbortController();
    const report = await runBatch(makeFiles(), {
      backend: new InProcessBackend(engine),
      concurrency: 1,
      signal: controller.signal,
      onFile: () => controller.abort(),
    });

    expect(report.aborted).toBe(true);
    expect(report.files.map((f) => f.status)).toEqual(['completed', 'aborted', 'aborted']);
    expect(report.aggregator.entries().map((t) => t.source)).toEqual(['c.log', 'c.log']);
  });

  it('reports a file that cannot be read and carries on', async () => {
    const logger = spyLogger();
    const broken: BatchFile = {
      source: 'missing.log',
      load: () => Promise.reject(new Error('ENOENT: no such file')),
    };

    const report = await runBatch([broken, textInput('a.log', 'mail a@example.com')], {
      backend: new InProcessBackend(engine),
      logger,
    });

    expect(report.files[0]).toEqual({
      source: 'missing.log',
      status: 'failed',
      redactions: 0,
      notes: [],
      error: 'ENOENT: no such file',
    });
    expect(report.files[1]?.status).toBe('completed');
    expect(logger.error).toHaveBeenCalledWith('Failed to redact missing.log: ENOENT: no such file');
  });
});

describe('mapConcurrent', () => {
  it('never runs more than the limit at once and keeps input order', async () => {
    let active = 0;
    let peak = 0;
    const out = await mapConcurrent([5, 1, 4, 2, 3], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, n));
      active--;
      return n * 10;
    });
    expect(out).toEqual([50, 10, 40, 20, 30]);
    expect(peak).toBe(2);
  });
});

describe('BatchBackend', () => {
  it('returns one result per unit in request order', async () => {
    const backend = new BatchBackend(engine, { concurrency: 3, chunkSize: 1 });
    const results = await backend.redact([
      { kind: 'line', text: 'a@example.com', source: 'x', line: 1 },
      { kind: 'line', text: 'plain', source: 'y', line: 1 },
      { kind: 'line', text: '10.0.0.1', source: 'x', line: 2 },
    ]);
    expect(results.map((r) => r.text)).toEqual(['[REDACTED_EMAIL]', 'plain', '[REDACTED_IP]']);
    expect(results[2]?.traces[0]).toMatchObject({ source: 'x', line: 2, rule: 'ipv4' });
  });

  it('matches the in-process backend', async () => {
    const units = [
      { kind: 'line' as const, text: 'ssn 123-45-6789', source: 'a', line: 1 },
      { kind: 'document' as const, text: '{"m":"a@example.com"}', source: 'b', line: 1 },
    ];
    const batch = await new BatchBackend(engine, { concurrency: 2 }).redact(units);
    const direct = await new InProcessBackend(engine).redact(units);
    expect(batch).toEqual(direct);
  });

  it('rejects when its signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const backend = new BatchBackend(engine, { signal: controller.signal });
    await expect(backend.redact([{ kind: 'line', text: 'x', source: 'a' }])).rejects.toThrow();
  });
});
