import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatSaveResult } from './output';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatSaveResult', () => {
  it('reports saved and failed actions', () => {
    const lines = formatSaveResult({ saved: 2, failed: 1, errors: [new Error('bv-3: bd failed')] }, 'bd comments');
    expect(lines).toEqual([
      '✓ Saved 2 review action(s) to bd comments',
      '✘ 1 action(s) failed to save:',
      '  bv-3: bd failed',
    ]);
  });

  it('says when nothing was saved', () => {
    expect(formatSaveResult({ saved: 0, failed: 0, errors: [] }, 'x')).toEqual(['Nothing to save.']);
  });
});
