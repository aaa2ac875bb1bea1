import { readFileSync } from 'node:fs';

import { TraceAggregator, parseTraceLog, verifyTraceLog } from '@logscrub/core';

import { formatSummary } from '../stats.js';

export const traceCommands = {
  async verify(file: string, digest: string): Promise<void> {
    try {
      const content = readFileSync(file, 'utf-8');
      const result = verifyTraceLog(content, digest);

      if (result.valid) {
        console.log('Trace log is valid');
        console.log(`   Entries: ${result.count}`);
        console.log(`   Digest: ${result.digest}`);
      } else {
        console.log('Trace log verification failed:');
        console.log(`   Expected: ${digest.trim().toLowerCase()}`);
        console.log(`   Actual:   ${result.digest}`);
        process.exit(1);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to verify trace log: ${message}`);
      process.exit(1);
    }
  },

  async summary(file: string): Promise<void> {
    try {
      const aggregator = new TraceAggregator();
      aggregator.add(parseTraceLog(readFileSync(file, 'utf-8')));
      const summary = aggregator.summary();

      console.log(`Redactions: ${summary.total} across ${summary.sources} source(s)`);
      console.log(`Digest: ${aggregator.digest()}`);
      console.log('');
      formatSummary(summary).forEach((line) => console.log(line));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`Failed to summarize trace log: ${message}`);
      process.exit(1);
    }
  },
};
