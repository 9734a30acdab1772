/**
 * Help overlay showing all keybindings, centered over the dashboard.
 * Dot-leader alignment for consistent visual hierarchy.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { HELP_SECTIONS } from '../summaryView';

function helpRow(key: string, desc: string, keyWidth = 12, totalWidth = 56): React.ReactElement {
  const padding = keyWidth - key.length;
  const dotCount = Math.max(1, totalWidth - keyWidth - desc.length);
  return (
    <Text key={key}>
      {'  '}<Text bold>{key}</Text>{' '.repeat(Math.max(0, padding))} <Text dimColor>{'·'.repeat(dotCount)}</Text> {desc}
    </Text>
  );
}

export function HelpOverlay(): React.ReactElement {
  return (
    <Box flexGrow={1} alignItems="center" justifyContent="center">
      <Box flexDirection="column" borderStyle="single" borderColor="magenta" paddingX={1} width={64}>
        <Text bold color="cyan">  Keyboard Shortcuts</Text>
        {HELP_SECTIONS.map(section => (
          <React.Fragment key={section.title}>
            <Text> </Text>
            <Text bold>  {section.title}</Text>
            {section.keys.map(([key, desc]) => helpRow(key, desc))}
          </React.Fragment>
        ))}
        <Text> </Text>
        <Text dimColor>  Press any key to close</Text>
      </Box>
    </Box>
  );
}
