/**
 * Status bar (bottom row) with segmented zones:
 * Left: brand + reviewer | Center: pending decisions | Right: keybinding hints
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ReviewType } from 'triage-shared';

interface StatusBarProps {
  reviewer: string;
  reviewType: ReviewType;
  pendingCount: number;
  focusTarget: 'tree' | 'detail';
}

export function StatusBar({ reviewer, reviewType, pendingCount, focusTarget }: StatusBarProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Box>
        <Text bold color="magenta">TRIAGE</Text>
        <Text dimColor> {reviewer} · {reviewType}</Text>
      </Box>

      <Box flexGrow={1} justifyContent="center">
        <Text dimColor> {'│'} </Text>
        {pendingCount > 0
          ? <Text color="yellow">{pendingCount} unsaved</Text>
          : <Text dimColor>no changes</Text>}
      </Box>

      <Box>
        <Text dimColor>{'│'} </Text>
        {focusTarget === 'tree' ? (
          <Text>
            <Text bold>a</Text><Text dimColor> approve </Text>
            <Text bold>r</Text><Text dimColor> revise </Text>
            <Text bold>d</Text><Text dimColor> defer </Text>
            <Text bold>n</Text><Text dimColor> note </Text>
            <Text bold>?</Text><Text dimColor> help </Text>
            <Text bold>q</Text><Text dimColor> quit</Text>
          </Text>
        ) : (
          <Text>
            <Text bold>j/k</Text><Text dimColor> scroll </Text>
            <Text bold>Tab</Text><Text dimColor> tree </Text>
            <Text bold>?</Text><Text dimColor> help </Text>
            <Text bold>q</Text><Text dimColor> quit</Text>
          </Text>
        )}
      </Box>
    </Box>
  );
}
