/**
 * Layout of the toast line shown in the top-right corner.
 */

import type { ToastSeverity } from './ReviewDashboardState';
import { truncate } from './formatters';

export interface ToastEntry {
  id: number;
  message: string;
  severity: ToastSeverity;
}

export const TOAST_DURATIONS: Record<ToastSeverity, number> = { error: 4000, warning: 3000, info: 2000 };

const TOAST_STYLE: Record<ToastSeverity, { color: string; icon: string }> = {
  error: { color: 'red', icon: '✘' },
  warning: { color: 'yellow', icon: '⚠' },
  info: { color: 'cyan', icon: '●' },
};

const MAX_MESSAGE = 56;

export interface ToastLine {
  text: string;
  color: string;
  /** Left margin that right-aligns the bordered box. */
  offset: number;
}

/** The newest toast, with a count of older ones still on screen. */
export function toastLine(toasts: readonly ToastEntry[], columns: number): ToastLine | null {
  const latest = toasts[toasts.length - 1];
  if (!latest) return null;

  const { color, icon } = TOAST_STYLE[latest.severity];
  const queued = toasts.length > 1 ? ` (+${toasts.length - 1})` : '';
  const room = Math.max(8, Math.min(MAX_MESSAGE, columns - 4) - queued.length - 2);
  const text = `${icon} ${truncate(latest.message, room)}${queued}`;
  // border and padding take four columns
  return { text, color, offset: Math.max(0, columns - text.length - 4) };
}
