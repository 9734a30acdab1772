/**
 * Multi-line note editor for note, revision and defer actions.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { NoteAction } from '../ReviewDashboardState';
import { NOTE_CHAR_LIMIT } from '../ReviewDashboardState';

const TITLES: Record<NoteAction, { title: string; color: string }> = {
  note: { title: 'Add Note', color: 'cyan' },
  revision: { title: 'Request Revision', color: 'red' },
  defer: { title: 'Defer Review', color: 'yellow' },
};

interface NoteOverlayProps {
  action: NoteAction;
  issueId: string;
  buffer: string;
  width: number;
}

export function NoteOverlay({ action, issueId, buffer, width }: NoteOverlayProps): React.ReactElement {
  const { title, color } = TITLES[action];
  const lines = buffer.split('\n');

  return (
    <Box flexGrow={1} alignItems="center" justifyContent="center">
      <Box flexDirection="column" borderStyle="round" borderColor={color} paddingX={1} width={Math.min(72, width - 4)}>
        <Text bold color={color}>{title}: {issueId}</Text>
        <Text> </Text>
        {lines.map((line, i) => (
          <Text key={i} wrap="wrap">
            {line}
            {i === lines.length - 1 && <Text color="gray">█</Text>}
          </Text>
        ))}
        <Text> </Text>
        <Text dimColor>
          {buffer.length}/{NOTE_CHAR_LIMIT}  Ctrl+S save  Enter newline  Esc cancel
        </Text>
      </Box>
    </Box>
  );
}
