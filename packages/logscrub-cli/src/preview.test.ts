import { describe, it, expect } from 'vitest';

import { formatPreview } from './preview.js';

describe('formatPreview', () => {
  it('returns nothing when no line changed', () => {
    expect(formatPreview('a.log', 'ok\r\nfine\n', 'ok\nfine\n')).toEqual([]);
  });

  it('shows the whole file when the line count changed', () => {
    expect(formatPreview('a.yaml', 'a: 1\nb: 2\n', '{}\n')).toEqual([
      '--- a.yaml',
      '+++ a.yaml (redacted)',
      '@@ whole file',
      '- a: 1',
      '- b: 2',
      '+ {}',
    ]);
  });
});
