/**
 * Detail pane (right side) with bordered container and windowed content scrolling.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { parseMarkup } from './markup';

interface DetailPaneProps {
  lines: readonly string[];
  scrollOffset: number;
  viewportHeight: number;
  focused: boolean;
}

export function DetailPane({ lines, scrollOffset, viewportHeight, focused }: DetailPaneProps): React.ReactElement {
  const borderColor = focused ? 'magenta' : 'gray';
  const totalLines = lines.length;
  const visibleLines = lines.slice(scrollOffset, scrollOffset + viewportHeight);
  const below = totalLines - scrollOffset - visibleLines.length;

  let title = ' Details ';
  if (scrollOffset > 0 || below > 0) title = ` Details ▲${scrollOffset} ▼${Math.max(0, below)} `;

  return (
    <Box flexDirection="column" flexGrow={1} borderStyle="single" borderColor={borderColor} paddingLeft={1}>
      <Box>
        <Text color={borderColor}>{title}</Text>
      </Box>

      {visibleLines.map((line, i) => (
        <Text key={scrollOffset + i} wrap="truncate">
          {parseMarkup(line) ?? ' '}
        </Text>
      ))}

      {visibleLines.length < viewportHeight &&
        Array.from({ length: viewportHeight - visibleLines.length }, (_, i) => (
          <Text key={`pad-${i}`}> </Text>
        ))}
    </Box>
  );
}
