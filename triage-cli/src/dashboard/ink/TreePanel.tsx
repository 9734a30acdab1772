/**
 * Issue tree list (left pane) with bordered container, windowed rows and
 * selection highlight.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { DisplayNode } from 'triage-shared';
import { formatTreeRow } from '../issueView';
import { parseMarkup } from './markup';

interface TreePanelProps {
  nodes: readonly DisplayNode[];
  cursor: number;
  scroll: number;
  focused: boolean;
  width: number;
  viewportHeight: number;
}

export function TreePanel({ nodes, cursor, scroll, focused, width, viewportHeight }: TreePanelProps): React.ReactElement {
  const borderColor = focused ? 'magenta' : 'gray';
  const borderStyle = focused ? 'double' : 'single';
  // Border (2) and padding (1)
  const innerWidth = Math.max(1, width - 3);
  const visible = nodes.slice(scroll, scroll + viewportHeight);

  return (
    <Box width={width} flexDirection="column" borderStyle={borderStyle} borderColor={borderColor} overflow="hidden">
      <Box>
        <Text color={borderColor}> Issues ({nodes.length}) </Text>
      </Box>

      {visible.map((node, i) => {
        const index = scroll + i;
        return (
          <Box key={node.issue.id} width={innerWidth}>
            <Text wrap="truncate">{parseMarkup(formatTreeRow(node, index === cursor, innerWidth))}</Text>
          </Box>
        );
      })}

      {nodes.length === 0 && (
        <Box justifyContent="center" width={innerWidth}>
          <Text color="gray">No matches</Text>
        </Box>
      )}

      {Array.from({ length: Math.max(0, viewportHeight - Math.max(visible.length, nodes.length === 0 ? 1 : 0)) }, (_, i) => (
        <Box key={`pad-${i}`} width={innerWidth}>
          <Text> </Text>
        </Box>
      ))}
    </Box>
  );
}
