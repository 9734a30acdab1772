import { describe, it, expect } from 'vitest';
import { clampCursor, ensureVisible, moveCursor, reconcile, setCursor } from './viewport';
import type { ViewportState } from './viewport';

describe('ensureVisible', () => {
  it('brings a far cursor to the last visible row', () => {
    const scroll = ensureVisible(95, 0, 100, 10);
    expect(scroll).toBe(86);
    expect(scroll).toBeLessThanOrEqual(95);
    expect(95).toBeLessThanOrEqual(scroll + 9);
    expect(scroll).toBeLessThanOrEqual(90);
  });

  it('scrolls up to a cursor above the window', () => {
    expect(ensureVisible(3, 20, 100, 10)).toBe(3);
  });

  it('leaves the offset alone when the cursor is visible', () => {
    expect(ensureVisible(25, 20, 100, 10)).toBe(20);
  });

  it('clamps to the last full page', () => {
    expect(ensureVisible(99, 95, 100, 10)).toBe(90);
  });

  it('pulls the offset back when the list shrinks', () => {
    expect(ensureVisible(2, 40, 5, 10)).toBe(0);
  });

  it('returns 0 for an empty list or window', () => {
    expect(ensureVisible(0, 7, 0, 10)).toBe(0);
    expect(ensureVisible(4, 2, 10, 0)).toBe(0);
  });
});

describe('clampCursor', () => {
  it('keeps the cursor within the list', () => {
    expect(clampCursor(-1, 5)).toBe(0);
    expect(clampCursor(9, 5)).toBe(4);
    expect(clampCursor(2, 5)).toBe(2);
    expect(clampCursor(3, 0)).toBe(0);
  });
});

describe('cursor movement', () => {
  it('scrolls as the cursor walks past the window', () => {
    let state: ViewportState = { cursor: 0, scroll: 0 };
    for (let i = 0; i < 6; i++) state = moveCursor(state, 1, 10, 5);
    expect(state).toEqual({ cursor: 6, scroll: 2 });
  });

  it('stops at both ends', () => {
    expect(moveCursor({ cursor: 0, scroll: 0 }, -1, 10, 5)).toEqual({ cursor: 0, scroll: 0 });
    expect(moveCursor({ cursor: 9, scroll: 5 }, 1, 10, 5)).toEqual({ cursor: 9, scroll: 5 });
  });

  it('jumps with setCursor', () => {
    expect(setCursor({ cursor: 5, scroll: 0 }, 95, 100, 10)).toEqual({ cursor: 95, scroll: 86 });
    expect(setCursor({ cursor: 95, scroll: 86 }, 0, 100, 10)).toEqual({ cursor: 0, scroll: 0 });
  });

  it('reconciles after a filter shrinks the list', () => {
    expect(reconcile({ cursor: 40, scroll: 35 }, 3, 10)).toEqual({ cursor: 2, scroll: 0 });
  });
});
