/**
 * Ink-based root picker shown before the dashboard when no root is given.
 * Wraps a LabelSelector; resolves with its result.
 */

import React, { useEffect, useReducer } from 'react';
import { Box, Text, useInput } from 'ink';
import type { FuzzyMatcher, Issue } from 'triage-shared';
import { LabelSelector } from '../selector/LabelSelector';
import type { SelectorResult } from '../selector/LabelSelector';
import { fromInk } from '../keys';
import { useTerminalSize } from './useTerminalSize';
import { SelectorPanel } from './SelectorPanel';

interface RootPickerProps {
  selector: LabelSelector;
  onDone: (result: SelectorResult) => void;
}

export function RootPicker({ selector, onDone }: RootPickerProps): React.ReactElement {
  const { columns, rows } = useTerminalSize();
  const [, rerender] = useReducer((n: number) => n + 1, 0);
  const listHeight = Math.max(3, rows - 10);

  useEffect(() => {
    selector.setHeight(listHeight);
    rerender();
  }, [selector, listHeight]);

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      onDone({ kind: 'cancelled' });
      return;
    }
    const press = fromInk(input, key);
    if (!press) return;
    selector.handleKey(press);
    const result = selector.result;
    if (result) {
      onDone(result);
      return;
    }
    rerender();
  });

  return (
    <Box flexDirection="column" width="100%" height={rows}>
      <Box justifyContent="center" marginTop={1}>
        <Text bold color="magenta">T R I A G E</Text>
        <Text dimColor>  pick an epic, label or issue to review</Text>
      </Box>
      <Box flexGrow={1} justifyContent="center" marginTop={1}>
        <SelectorPanel view={selector.view} width={Math.min(100, columns - 2)} viewportHeight={listHeight} />
      </Box>
    </Box>
  );
}

/** Shows the picker and resolves with the confirmed item, or `cancelled`. */
export async function showRootPicker(issues: readonly Issue[], matcher: FuzzyMatcher): Promise<SelectorResult> {
  const { render } = await import('ink');
  const selector = new LabelSelector(issues, matcher);

  return new Promise<SelectorResult>((resolve, reject) => {
    const instance = render(
      <RootPicker
        selector={selector}
        onDone={(result) => {
          instance.unmount();
          resolve(result);
        }}
      />,
      { exitOnCtrlC: false },
    );

    instance.waitUntilExit().then(() => {
      resolve({ kind: 'cancelled' });
    }).catch(reject);
  });
}
