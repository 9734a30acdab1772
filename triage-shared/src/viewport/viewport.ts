/**
 * Cursor and scroll-offset arithmetic for windowed lists.
 *
 * @module viewport/viewport
 */

export interface ViewportState {
  cursor: number;
  scroll: number;
}

/** Cursor clamped to `[0, length)`, or 0 for an empty list. */
export function clampCursor(cursor: number, length: number): number {
  if (length <= 0) return 0;
  return Math.max(0, Math.min(cursor, length - 1));
}

/**
 * Scroll offset that keeps `cursor` inside a window of `height` rows: scrolls
 * up to a cursor above the window, or down until a cursor below it is the
 * last visible row. The result is clamped to `[0, max(0, length - height)]`.
 */
export function ensureVisible(cursor: number, scroll: number, length: number, height: number): number {
  if (height <= 0 || length <= 0) return 0;
  let offset = scroll;
  if (cursor < offset) offset = cursor;
  else if (cursor >= offset + height) offset = cursor - height + 1;
  const maxOffset = Math.max(0, length - height);
  return Math.max(0, Math.min(offset, maxOffset));
}

/** Moves the cursor by `delta` rows and re-derives the scroll offset. */
export function moveCursor(state: ViewportState, delta: number, length: number, height: number): ViewportState {
  const cursor = clampCursor(state.cursor + delta, length);
  return { cursor, scroll: ensureVisible(cursor, state.scroll, length, height) };
}

/** Places the cursor at `index` (clamped) and re-derives the scroll offset. */
export function setCursor(state: ViewportState, index: number, length: number, height: number): ViewportState {
  const cursor = clampCursor(index, length);
  return { cursor, scroll: ensureVisible(cursor, state.scroll, length, height) };
}

/** Re-validates a state after the list length or window height changed. */
export function reconcile(state: ViewportState, length: number, height: number): ViewportState {
  return setCursor(state, state.cursor, length, height);
}
