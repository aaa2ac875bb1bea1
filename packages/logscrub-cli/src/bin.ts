#!/usr/bin/env node
import { createCli } from './index.js';

createCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`logscrub: ${message}`);
    process.exit(1);
  });
