import path from 'node:path';

import { CliEngineBackend } from '@logscrub/cli-engine';
import {
  BatchBackend,
  InProcessBackend,
  isBuiltinRef,
  type LogscrubConfig,
  type ProfileOverrides,
  type RedactionBackend,
  type RedactionEngine,
} from '@logscrub/core';

export interface BackendContext {
  engine: RedactionEngine;
  /** Profile the engine was built from, as given on the command line. */
  profileRef: string;
  /** Applied to the profile the cli backend's engine loads. */
  overrides?: ProfileOverrides;
  signal?: AbortSignal;
}

/** Pick the backend named in the config. All of them give the same output. */
export function createBackend(config: Required<LogscrubConfig>, ctx: BackendContext): RedactionBackend {
  switch (config.backend) {
    case 'inprocess':
      return new InProcessBackend(ctx.engine);
    case 'batch':
      return new BatchBackend(ctx.engine, { concurrency: config.concurrency, signal: ctx.signal });
    case 'cli':
      return new CliEngineBackend({
        enginePath: config.enginePath,
        profileRef: isBuiltinRef(ctx.profileRef) ? ctx.profileRef : path.resolve(ctx.profileRef),
        timeoutMs: config.timeoutMs,
        overrides: ctx.overrides,
      });
  }
}
