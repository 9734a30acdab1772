/**
 * Overlay shown when the terminal is below minimum dimensions.
 */

import React from 'react';
import { Box, Text } from 'ink';

export const MIN_COLUMNS = 60;
export const MIN_ROWS = 12;

interface TooSmallOverlayProps {
  columns: number;
  rows: number;
}

export function isTooSmall(columns: number, rows: number): boolean {
  return columns < MIN_COLUMNS || rows < MIN_ROWS;
}

export function TooSmallOverlay({ columns, rows }: TooSmallOverlayProps): React.ReactElement {
  return (
    <Box flexDirection="column" width={columns} height={rows} justifyContent="center" alignItems="center">
      <Box flexDirection="column" borderStyle="single" borderColor="red" paddingX={2}>
        <Text color="red">Terminal too small</Text>
        <Text color="gray">Need at least {MIN_COLUMNS}x{MIN_ROWS} (current: {columns}x{rows})</Text>
        <Text color="gray">Press q to quit</Text>
      </Box>
    </Box>
  );
}
