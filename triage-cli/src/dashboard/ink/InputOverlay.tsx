/**
 * Single-line prompt shown in place of the status bar while search, label
 * or assignee input is active.
 */

import React from 'react';
import { Box, Text } from 'ink';

interface InputOverlayProps {
  prompt: string;
  value: string;
  hint: string;
  /** Chips shown before the input, e.g. the active labels. */
  chips?: readonly string[];
}

export function InputOverlay({ prompt, value, hint, chips = [] }: InputOverlayProps): React.ReactElement {
  return (
    <Box height={1} width="100%">
      <Text bold color="magenta">{prompt} </Text>
      {chips.map(chip => (
        <Text key={chip} color="cyan">[{chip}] </Text>
      ))}
      <Text>{value}</Text>
      <Text color="gray">█</Text>
      <Box flexGrow={1} justifyContent="flex-end">
        <Text dimColor>{hint}</Text>
      </Box>
    </Box>
  );
}
