import type { TraceSummary } from '@logscrub/core';

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Per-rule and per-reason counts, one indented line each. */
export function formatSummary(summary: TraceSummary): string[] {
  const lines = ['By rule:'];
  for (const [rule, count] of Object.entries(summary.byRule).sort(byKey)) {
    lines.push(`   ${rule}: ${count}`);
  }
  lines.push('By reason:');
  for (const [reason, count] of Object.entries(summary.byReason).sort(byKey)) {
    lines.push(`   ${reason}: ${count}`);
  }
  return lines;
}
