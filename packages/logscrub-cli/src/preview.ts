import { splitLines } from '@logscrub/core';

/**
 * Line diff between a file and its sanitized form. Files whose line count
 * changed (structured YAML, removed keys) are shown whole.
 */
export function formatPreview(source: string, before: string, after: string): string[] {
  const original = splitLines(before);
  const redacted = splitLines(after);
  const hunks: string[] = [];

  if (original.length === redacted.length) {
    original.forEach((line, i) => {
      const next = redacted[i] ?? '';
      if (line !== next) hunks.push(`@@ line ${i + 1}`, `- ${line}`, `+ ${next}`);
    });
  } else {
    hunks.push('@@ whole file', ...original.map((line) => `- ${line}`), ...redacted.map((line) => `+ ${line}`));
  }

  if (hunks.length === 0) return [];
  return [`--- ${source}`, `+++ ${source} (redacted)`, ...hunks];
}
