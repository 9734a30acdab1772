/**
 * Session summary shown before quitting with unsaved decisions.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { SummaryInput } from '../summaryView';
import { buildSummaryLines } from '../summaryView';
import { parseMarkup } from './markup';

export function SummaryOverlay(props: SummaryInput): React.ReactElement {
  const lines = buildSummaryLines(props);
  return (
    <Box flexGrow={1} alignItems="center" justifyContent="center">
      <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2} paddingY={1}>
        {lines.map((line, i) => (
          <Text key={i}>{parseMarkup(line) ?? ' '}</Text>
        ))}
      </Box>
    </Box>
  );
}
