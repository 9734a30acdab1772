import { describe, it, expect } from 'vitest';
import { toastLine } from './toastView';

describe('toastLine', () => {
  it('returns null with nothing to show', () => {
    expect(toastLine([], 80)).toBeNull();
  });

  it('right-aligns the newest toast', () => {
    expect(toastLine([{ id: 1, message: 'Approved ep-1', severity: 'info' }], 80)).toEqual({
      text: '● Approved ep-1',
      color: 'cyan',
      offset: 61,
    });
  });

  it('counts the older toasts still showing', () => {
    const line = toastLine([
      { id: 1, message: 'Approved ep-1', severity: 'info' },
      { id: 2, message: 'Deferred ep-2', severity: 'warning' },
    ], 80);
    expect(line?.text).toBe('⚠ Deferred ep-2 (+1)');
    expect(line?.color).toBe('yellow');
  });

  it('truncates to a narrow terminal', () => {
    expect(toastLine([{ id: 1, message: 'Revision requested for ep-1.1', severity: 'error' }], 20)).toEqual({
      text: '✘ Revision requ…',
      color: 'red',
      offset: 0,
    });
  });
});
