/**
 * Root Ink component for the review dashboard: header, tree and detail
 * panes, status bar, overlays and toasts. Key handling and all review state
 * live in ReviewDashboardState; this component renders it and forwards keys.
 */

import React, { useEffect, useReducer } from 'react';
import { Box, Text, useInput } from 'ink';
import type { ReviewDashboardState } from '../ReviewDashboardState';
import { reviewProgress } from '../summaryView';
import { escapeTags } from '../formatters';
import { fromInk } from '../keys';
import { useTerminalSize } from './useTerminalSize';
import { TreePanel } from './TreePanel';
import { DetailPane } from './DetailPane';
import { StatusBar } from './StatusBar';
import { HelpOverlay } from './HelpOverlay';
import { SummaryOverlay } from './SummaryOverlay';
import { InputOverlay } from './InputOverlay';
import { NoteOverlay } from './NoteOverlay';
import { SelectorPanel } from './SelectorPanel';
import { ToastBanner, useToasts } from './ToastBanner';
import { TooSmallOverlay, isTooSmall } from './TooSmallOverlay';
import { parseMarkup } from './markup';

interface ReviewDashboardProps {
  state: ReviewDashboardState;
  /** Called once when the user leaves; `save` asks for the action log to be persisted. */
  onQuit: (save: boolean) => void;
}

function Header({ state }: { state: ReviewDashboardState }): React.ReactElement {
  const { root } = state;
  const { reviewed, total } = reviewProgress(state.rows);
  const filters = [`filter: ${state.filter}`];
  if (state.searchQuery) filters.push(`search: "${escapeTags(state.searchQuery)}"`);
  if (state.activeLabels.length > 0) filters.push(`labels: ${escapeTags(state.activeLabels.join(', '))}`);

  return (
    <Box flexDirection="column" height={2}>
      <Box>
        <Box flexGrow={1}>
          <Text wrap="truncate">
            {parseMarkup(`{bold}{cyan-fg}Review ${escapeTags(root.id)}{/cyan-fg}{/bold} ${escapeTags(root.title)}`)}
          </Text>
        </Box>
        <Text color="green"> {reviewed}/{total} reviewed</Text>
      </Box>
      <Text dimColor wrap="truncate">{filters.join('  ·  ')}</Text>
    </Box>
  );
}

export function ReviewDashboard({ state, onQuit }: ReviewDashboardProps): React.ReactElement {
  const { columns, rows } = useTerminalSize();
  const [, rerender] = useReducer((n: number) => n + 1, 0);
  const [toasts, addToast] = useToasts();

  useEffect(() => {
    state.resize(rows, columns);
    rerender();
  }, [state, rows, columns]);

  const tooSmall = isTooSmall(columns, rows);

  useInput((input, key) => {
    // Ctrl+C leaves at once but keeps what was decided
    if (key.ctrl && input === 'c') {
      onQuit(state.session.pendingCount > 0);
      return;
    }
    if (tooSmall) {
      if (input === 'q') onQuit(state.session.pendingCount > 0);
      return;
    }

    const press = fromInk(input, key);
    if (!press) return;
    const effect = state.handleKey(press);
    if (effect.kind === 'quit') {
      onQuit(effect.save);
      return;
    }
    if (effect.kind === 'toast') addToast(effect.message, effect.severity);
    rerender();
  });

  if (tooSmall) {
    return <TooSmallOverlay columns={columns} rows={rows} />;
  }

  const overlay = state.activeOverlay;
  const { treeWidth, listHeight } = state.layout;
  const tracker = state.session;

  let body: React.ReactElement;
  switch (overlay.kind) {
    case 'help':
      body = <HelpOverlay />;
      break;
    case 'summary':
      body = (
        <SummaryOverlay
          rootId={state.root.id}
          reviewer={tracker.reviewer}
          elapsedMs={tracker.elapsedMs()}
          stats={tracker.stats}
          nodes={state.rows}
          copied={state.promptCopied}
        />
      );
      break;
    case 'selector':
      body = (
        <Box flexGrow={1} alignItems="center" justifyContent="center">
          <SelectorPanel view={state.labelSelector.view} width={Math.min(90, columns - 4)} viewportHeight={Math.max(3, listHeight - 4)} />
        </Box>
      );
      break;
    case 'note':
      body = <NoteOverlay action={overlay.action} issueId={overlay.issueId} buffer={overlay.buffer} width={columns} />;
      break;
    default:
      body = (
        <Box flexGrow={1} flexDirection="row">
          <TreePanel
            nodes={state.rows}
            cursor={state.cursor}
            scroll={state.scroll}
            focused={!state.hasDetailFocus}
            width={treeWidth}
            viewportHeight={listHeight}
          />
          <DetailPane
            lines={state.detailLines()}
            scrollOffset={state.detailOffset}
            viewportHeight={listHeight}
            focused={state.hasDetailFocus}
          />
        </Box>
      );
  }

  let footer: React.ReactElement;
  switch (overlay.kind) {
    case 'search':
      footer = <InputOverlay prompt="/" value={state.searchQuery} hint="Enter keep  Esc clear" />;
      break;
    case 'label':
      footer = (
        <InputOverlay
          prompt="Label:"
          value={overlay.buffer}
          chips={state.activeLabels}
          hint="Enter add  Backspace remove  Esc cancel"
        />
      );
      break;
    case 'assignee':
      footer = <InputOverlay prompt={`Assignee for ${overlay.issueId}:`} value={overlay.buffer} hint="Enter set  Esc cancel" />;
      break;
    default:
      footer = (
        <StatusBar
          reviewer={tracker.reviewer}
          reviewType={tracker.reviewType}
          pendingCount={tracker.pendingCount}
          focusTarget={state.hasDetailFocus ? 'detail' : 'tree'}
        />
      );
  }

  return (
    <Box flexDirection="column" height={rows} width={columns}>
      <Header state={state} />
      {body}
      {footer}
      <ToastBanner toasts={toasts} columns={columns} />
    </Box>
  );
}
