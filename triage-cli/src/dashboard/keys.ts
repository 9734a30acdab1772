/**
 * Terminal-independent key presses. The state machines consume these; the
 * Ink layer converts `useInput` callbacks with `fromInk`.
 */

import type { Key } from 'ink';

export type SpecialKey =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'pageUp'
  | 'pageDown'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'tab';

export type KeyPress =
  | { kind: 'special'; key: SpecialKey; shift: boolean }
  | { kind: 'char'; char: string; ctrl: boolean };

export function special(key: SpecialKey, shift = false): KeyPress {
  return { kind: 'special', key, shift };
}

export function char(value: string, ctrl = false): KeyPress {
  return { kind: 'char', char: value, ctrl };
}

/** Builds one char press per character, for typing a string in tests and pastes. */
export function typed(text: string): KeyPress[] {
  return Array.from(text, c => char(c));
}

export function isKey(press: KeyPress, key: SpecialKey): boolean {
  return press.kind === 'special' && press.key === key;
}

export function isChar(press: KeyPress, value: string): boolean {
  return press.kind === 'char' && !press.ctrl && press.char === value;
}

export function isCtrl(press: KeyPress, value: string): boolean {
  return press.kind === 'char' && press.ctrl && press.char === value;
}

/** Text a press would insert into an input buffer, or null for control keys. */
export function printable(press: KeyPress): string | null {
  if (press.kind !== 'char' || press.ctrl) return null;
  const text = press.char.replace(/[\x00-\x1f\x7f]/g, '');
  return text.length > 0 ? text : null;
}

export function fromInk(input: string, key: Key): KeyPress | null {
  if (key.upArrow) return special('up', key.shift);
  if (key.downArrow) return special('down', key.shift);
  if (key.leftArrow) return special('left', key.shift);
  if (key.rightArrow) return special('right', key.shift);
  if (key.pageUp) return special('pageUp');
  if (key.pageDown) return special('pageDown');
  if (key.return) return special('enter', key.shift);
  if (key.escape) return special('escape');
  // Most terminals send DEL for Backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete) return special('backspace');
  if (key.tab) return special('tab', key.shift);
  if (!input) return null;
  return char(input, key.ctrl);
}
