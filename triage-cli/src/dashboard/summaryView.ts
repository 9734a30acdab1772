/**
 * Tagged-text content of the session summary and help overlays.
 */

import type { DisplayNode, SessionStats } from 'triage-shared';
import { isUnreviewed } from 'triage-shared';
import { escapeTags, formatDuration } from './formatters';

export interface SummaryInput {
  rootId: string;
  reviewer: string;
  elapsedMs: number;
  stats: SessionStats;
  /** The rows currently shown; progress counts these. */
  nodes: readonly DisplayNode[];
  copied: boolean;
}

export function reviewProgress(nodes: readonly DisplayNode[]): { reviewed: number; total: number; percent: number } {
  const total = nodes.length;
  const reviewed = nodes.filter(n => !isUnreviewed(n.issue)).length;
  return { reviewed, total, percent: total > 0 ? Math.floor((reviewed * 100) / total) : 0 };
}

export function buildSummaryLines(input: SummaryInput): string[] {
  const { stats } = input;
  const { reviewed, total, percent } = reviewProgress(input.nodes);

  const lines = [
    '{bold}{cyan-fg}Review Session Summary{/cyan-fg}{/bold}',
    '─'.repeat(40),
    '',
    `{grey-fg}Root:     ${escapeTags(input.rootId)}{/grey-fg}`,
    `{grey-fg}Reviewer: ${escapeTags(input.reviewer)}{/grey-fg}`,
    `{grey-fg}Duration: ${formatDuration(input.elapsedMs)}{/grey-fg}`,
    '',
    '{bold}Items Reviewed:{/bold}',
    `  Total:            ${stats.itemsReviewed}`,
    `{green-fg}  ✓ Approved:       ${stats.approved}{/green-fg}`,
    `{red-fg}  ! Needs Revision: ${stats.needsRevision}{/red-fg}`,
    `{yellow-fg}  ? Deferred:       ${stats.deferred}{/yellow-fg}`,
    '',
    '{bold}Overall Progress:{/bold}',
    `  ${reviewed}/${total} items reviewed (${percent}%)`,
    '',
  ];

  if (input.copied) lines.push('{bold}{green-fg}✓ Copied to clipboard!{/green-fg}{/bold}', '');

  lines.push(
    '{cyan-fg}q{/cyan-fg}{grey-fg} save & quit  {/grey-fg}{cyan-fg}Q{/cyan-fg}{grey-fg} discard & quit{/grey-fg}',
    '{cyan-fg}p{/cyan-fg}{grey-fg} copy ID list  {/grey-fg}{cyan-fg}P{/cyan-fg}{grey-fg} copy AI prompt{/grey-fg}',
    '{cyan-fg}Esc{/cyan-fg}{grey-fg} continue reviewing{/grey-fg}',
  );
  return lines;
}

export interface HelpSection {
  title: string;
  keys: ReadonlyArray<readonly [string, string]>;
}

export const HELP_SECTIONS: readonly HelpSection[] = [
  {
    title: 'Navigation',
    keys: [
      ['j/k, ↑/↓', 'Move cursor / scroll detail'],
      ['g/G', 'Go to first/last item'],
      ['[/]', 'Jump to prev/next unreviewed'],
      ['Tab', 'Switch focus: tree ↔ detail'],
      ['/', 'Search issues'],
    ],
  },
  {
    title: 'Review Actions',
    keys: [
      ['a', 'Approve current item'],
      ['r', 'Request revision (+ note)'],
      ['d', 'Defer review (+ note)'],
      ['n', 'Add note (no status change)'],
      ['A', 'Set assignee'],
    ],
  },
  {
    title: 'Filters',
    keys: [
      ['f', 'Cycle: all → unreviewed → needs_revision'],
      ['s', 'Add label filter'],
      ['S', 'Clear all label filters'],
      ['L', 'Pick epic, label or issue'],
    ],
  },
  {
    title: 'Other',
    keys: [
      ['?', 'Show this help'],
      ['q', 'Show summary / quit'],
      ['Esc', 'Close modal / cancel'],
    ],
  },
];
