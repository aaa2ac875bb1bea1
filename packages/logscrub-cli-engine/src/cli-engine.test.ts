import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { beforeEach, describe, it, expect, vi } from 'vitest';

import { BackendError, type RedactionUnit, type SanitizedResult } from '@logscrub/core';

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('node:child_process', () => ({
  spawn: (...args: unknown[]) => spawnMock(...args),
}));

import { CliEngineBackend, parseRedactResponse } from './cli-engine.js';

function createMockChildProcess() {
  const child = Object.assign(new EventEmitter(), {
    stdin: new PassThrough(),
    stdout: new PassThrough(),
    stderr: new PassThrough(),
    kill: vi.fn(),
    input: '',
  });
  child.stdin.setEncoding('utf8');
  child.stdin.on('data', (chunk) => {
    child.input += String(chunk);
  });
  return child;
}

type MockChildProcess = ReturnType<typeof createMockChildProcess>;

function finish(child: MockChildProcess, code: number | null, signal: string | null = null): void {
  setImmediate(() => child.emit('close', code, signal));
}

const units: RedactionUnit[] = [
  { kind: 'line', text: 'mail admin@example.com', source: 'app.log', line: 1 },
  { kind: 'line', text: 'nothing', source: 'app.log', line: 2 },
];

const results: SanitizedResult[] = [
  {
    kind: 'line',
    text: 'mail [REDACTED_EMAIL]',
    traces: [
      {
        source: 'app.log',
        line: 1,
        sequence: 1,
        original: 'admin@example.com',
        redacted: '[REDACTED_EMAIL]',
        rule: 'email',
        reason: 'pattern_match',
      },
    ],
    notes: [],
  },
  { kind: 'line', text: 'nothing', traces: [], notes: [] },
];

async function rejection(pending: Promise<unknown>): Promise<BackendError> {
  const error = await pending.then(
    () => undefined,
    (err: unknown) => err,
  );
  if (!(error instanceof BackendError)) {
    throw new Error(`expected a BackendError, got ${String(error)}`);
  }
  return error;
}

describe('CliEngineBackend', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it('spawns logscrub engine with the profile and sends the request on stdin', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const backend = new CliEngineBackend({ profileRef: 'nginx' });
    const pending = backend.redact(units);

    child.stdout.write(JSON.stringify({ version: 1, command: 'redact', results }));
    finish(child, 0);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith('logscrub', ['engine', 'nginx'], { stdio: ['pipe', 'pipe', 'pipe'] });
    expect(JSON.parse(child.input)).toEqual({ version: 1, command: 'redact', units });
  });

  it('forwards profile overrides as engine flags', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const backend = new CliEngineBackend({
      profileRef: 'default',
      overrides: { entropy: { enabled: false, threshold: 3.5, minLength: 12 }, keyPaths: ['user.token', 'auth'] },
    });
    const pending = backend.redact(units);

    child.stdout.write(JSON.stringify({ version: 1, command: 'redact', results }));
    finish(child, 0);
    await pending;

    expect(spawnMock.mock.calls[0]?.[1]).toEqual([
      'engine',
      'default',
      '--disable-entropy',
      '--entropy-threshold',
      '3.5',
      '--entropy-min-length',
      '12',
      '--keys-to-redact',
      'user.token,auth',
    ]);
  });

  it('returns the results of a valid response', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const backend = new CliEngineBackend({ profileRef: 'default', enginePath: '/opt/logscrub/bin/logscrub' });
    const pending = backend.redact(units);

    child.stdout.write(JSON.stringify({ version: 1, command: 'redact', results }));
    finish(child, 0);

    await expect(pending).resolves.toEqual(results);
    expect(spawnMock.mock.calls[0]?.[0]).toBe('/opt/logscrub/bin/logscrub');
  });

  it('does not spawn for an empty request', async () => {
    const backend = new CliEngineBackend({ profileRef: 'default' });
    await expect(backend.redact([])).resolves.toEqual([]);
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('fails on a non-zero exit code and includes stderr', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'missing' }).redact(units);
    child.stderr.write('Unknown profile or file not found: missing');
    finish(child, 1);

    const error = await rejection(pending);
    expect(error.code).toBe('exit');
    expect(error.backend).toBe('cli');
    expect(error.message).toBe(
      'logscrub exited with code 1 (stderr: Unknown profile or file not found: missing)',
    );
  });

  it('fails on a killing signal', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'default' }).redact(units);
    finish(child, null, 'SIGTERM');

    const error = await rejection(pending);
    expect(error.code).toBe('exit');
    expect(error.message).toBe('logscrub exited with signal SIGTERM');
  });

  it('fails when the executable cannot be started', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'default' }).redact(units);
    child.emit('error', new Error('spawn logscrub ENOENT'));

    const error = await rejection(pending);
    expect(error.code).toBe('spawn');
    expect(error.message).toBe('Failed to start logscrub: spawn logscrub ENOENT');
  });

  it('kills the process when it runs past the timeout', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'default', timeoutMs: 20 }).redact(units);

    const error = await rejection(pending);
    expect(error.code).toBe('timeout');
    expect(error.message).toBe('logscrub timed out after 20ms');
    expect(child.kill).toHaveBeenCalledWith('SIGKILL');
  });

  it('fails on malformed JSON', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'default' }).redact(units);
    child.stdout.write('{');
    finish(child, 0);

    const error = await rejection(pending);
    expect(error.code).toBe('protocol');
    expect(error.message).toBe('Invalid engine JSON: could not parse response');
  });

  it('fails when the result count does not match the request', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = new CliEngineBackend({ profileRef: 'default' }).redact(units);
    child.stdout.write(JSON.stringify({ version: 1, command: 'redact', results: results.slice(0, 1) }));
    finish(child, 0);

    const error = await rejection(pending);
    expect(error.message).toBe('Invalid engine JSON: expected 2 result(s), got 1');
  });
});

describe('parseRedactResponse', () => {
  it('rejects the wrong version or command', () => {
    expect(() => parseRedactResponse({ version: 2, command: 'redact', results: [] })).toThrow(
      'Invalid engine JSON: expected version=1',
    );
    expect(() => parseRedactResponse({ version: 1, command: 'scan', results: [] })).toThrow(
      'Invalid engine JSON: expected command="redact"',
    );
    expect(() => parseRedactResponse([])).toThrow('Invalid engine JSON: expected object');
  });

  it('rejects results with malformed traces', () => {
    const bad = {
      version: 1,
      command: 'redact',
      results: [{ kind: 'line', text: 'x', traces: [{ source: 'a', rule: 'email' }], notes: [] }],
    };
    expect(() => parseRedactResponse(bad)).toThrow('Invalid engine JSON: result 0 is malformed');
  });

  it('keeps documents, paths, scores and notes', () => {
    const result: SanitizedResult = {
      kind: 'document',
      text: '{"k":"[REDACTED_SECRET]"}',
      document: { k: '[REDACTED_SECRET]' },
      traces: [
        {
          source: 'a.json',
          line: 1,
          path: 'k',
          sequence: 1,
          original: 'Q7mZp2Xv9LkR4tWc8NbH3yJd6FsG1aUe5VoTrEiK',
          redacted: '[REDACTED_SECRET]',
          rule: 'entropy',
          reason: 'entropy',
          score: 5.3,
        },
      ],
      notes: [{ code: 'invalid_utf8', source: 'a.json', line: 1, message: 'invalid UTF-8 byte sequence replaced with U+FFFD' }],
    };
    expect(parseRedactResponse({ version: 1, command: 'redact', results: [result] }).results).toEqual([result]);
  });
});
