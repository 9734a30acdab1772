/**
 * Renders a LabelSelector: mode and query line, scope chips and the
 * windowed item list.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { SelectorView } from '../selector/LabelSelector';
import { formatSelectorRow, modeHints, modeLabel } from '../selector/selectorView';
import { parseMarkup } from './markup';

interface SelectorPanelProps {
  view: SelectorView;
  width: number;
  viewportHeight: number;
}

export function SelectorPanel({ view, width, viewportHeight }: SelectorPanelProps): React.ReactElement {
  const innerWidth = Math.max(10, width - 4);
  const visible = view.items.slice(view.scroll, view.scroll + viewportHeight);
  const insert = view.mode.kind === 'insert';

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="magenta" paddingX={1} width={width}>
      <Box>
        <Text bold color={insert ? 'green' : 'magenta'}>[{modeLabel(view.mode)}] </Text>
        <Text>{view.query}</Text>
        {insert && <Text color="gray">█</Text>}
      </Box>
      {view.scopeLabels.length > 0 && (
        <Text>
          <Text dimColor>scope: </Text>
          {view.scopeLabels.map(label => (
            <Text key={label} color="cyan">[{label}] </Text>
          ))}
        </Text>
      )}
      <Text dimColor>{'─'.repeat(innerWidth)}</Text>

      {visible.map((item, i) => (
        <Text key={`${item.type}:${item.value}`} wrap="truncate">
          {parseMarkup(formatSelectorRow(item, view.scroll + i === view.cursor, innerWidth))}
        </Text>
      ))}
      {view.items.length === 0 && <Text color="gray">  No matches</Text>}

      <Text dimColor>{'─'.repeat(innerWidth)}</Text>
      <Text dimColor wrap="truncate">{modeHints(view.mode)}</Text>
    </Box>
  );
}
