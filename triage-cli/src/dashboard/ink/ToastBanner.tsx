/**
 * Transient notices for review actions, dismissed on a per-severity timer.
 */

import React, { useCallback, useEffect, useReducer, useRef } from 'react';
import { Box, Text } from 'ink';
import type { ToastSeverity } from '../ReviewDashboardState';
import { TOAST_DURATIONS, toastLine } from '../toastView';
import type { ToastEntry } from '../toastView';

type ToastAction =
  | { type: 'ADD_TOAST'; toast: ToastEntry }
  | { type: 'REMOVE_TOAST'; id: number };

function toastReducer(toasts: ToastEntry[], action: ToastAction): ToastEntry[] {
  switch (action.type) {
    case 'ADD_TOAST':
      return [...toasts, action.toast];
    case 'REMOVE_TOAST':
      return toasts.filter(t => t.id !== action.id);
  }
}

export function useToasts(): [ToastEntry[], (message: string, severity: ToastSeverity) => void] {
  const [toasts, dispatch] = useReducer(toastReducer, []);
  const nextId = useRef(0);
  const timers = useRef<NodeJS.Timeout[]>([]);

  useEffect(() => () => {
    for (const timer of timers.current) clearTimeout(timer);
  }, []);

  const addToast = useCallback((message: string, severity: ToastSeverity) => {
    const id = ++nextId.current;
    dispatch({ type: 'ADD_TOAST', toast: { id, message, severity } });
    timers.current.push(setTimeout(() => dispatch({ type: 'REMOVE_TOAST', id }), TOAST_DURATIONS[severity]));
  }, []);

  return [toasts, addToast];
}

export function ToastBanner({ toasts, columns }: { toasts: readonly ToastEntry[]; columns: number }): React.ReactElement | null {
  const line = toastLine(toasts, columns);
  if (!line) return null;
  return (
    <Box position="absolute" marginLeft={line.offset} borderStyle="single" borderColor={line.color} paddingX={1}>
      <Text color={line.color}>{line.text}</Text>
    </Box>
  );
}
