/**
 * Tagged-text rendering of tree rows and the issue detail pane.
 */

import type { DisplayNode, EpicProgress, Issue, ReviewStatus } from 'triage-shared';
import { escapeTags, truncate, visibleLength, wrapLines } from './formatters';

interface ReviewStyle {
  glyph: string;
  color: string;
}

const REVIEW_STYLES: Record<ReviewStatus, ReviewStyle> = {
  unreviewed: { glyph: '○', color: 'gray' },
  approved: { glyph: '✓', color: 'green' },
  needs_revision: { glyph: '!', color: 'red' },
  deferred: { glyph: '?', color: 'yellow' },
};

function reviewStyle(issue: Issue): ReviewStyle {
  return REVIEW_STYLES[issue.reviewStatus ?? 'unreviewed'];
}

/** One tree row: cursor, review glyph, tree prefix, id, title truncated to `width`. */
export function formatTreeRow(node: DisplayNode, selected: boolean, width: number): string {
  const { glyph, color } = reviewStyle(node.issue);
  const cursor = selected ? '{cyan-fg}▸{/cyan-fg} ' : '  ';
  const prefix = node.treePrefix ? `{grey-fg}${node.treePrefix}{/grey-fg}` : '';
  const id = selected ? `{bold}{blue-fg}${escapeTags(node.issue.id)}{/blue-fg}{/bold}` : `{blue-fg}${escapeTags(node.issue.id)}{/blue-fg}`;
  const head = `${cursor}{${color}-fg}${glyph}{/${color}-fg} ${prefix}${id} `;

  const titleWidth = Math.max(5, width - visibleLength(head));
  const title = escapeTags(truncate(node.issue.title, titleWidth));
  const styledTitle = selected ? `{cyan-fg}${title}{/cyan-fg}` : node.issue.status === 'closed' ? `{dim}${title}{/dim}` : title;
  return head + styledTitle;
}

export interface DetailContext {
  /** Issues blocking the selected one. */
  blockers: readonly Issue[];
  /** Descendant progress, for epics. */
  progress?: EpicProgress;
}

function section(lines: string[], heading: string, body: string, width: number): void {
  if (!body) return;
  lines.push(`{bold}${heading}{/bold}`);
  for (const line of wrapLines(body, width)) lines.push(escapeTags(line));
  lines.push('');
}

/** Detail pane content for `issue`, one tagged string per line. */
export function buildDetailLines(issue: Issue | undefined, width: number, ctx: DetailContext): string[] {
  if (!issue) return ['{grey-fg}No issue selected{/grey-fg}'];

  const inner = Math.max(10, width - 2);
  const lines: string[] = [
    `{bold}{cyan-fg}${escapeTags(issue.id)}{/cyan-fg}{/bold}`,
    '─'.repeat(inner),
    ...wrapLines(issue.title, inner).map(escapeTags),
    '',
    `{grey-fg}Status: ${issue.status} | Type: ${issue.issueType} | P${issue.priority}{/grey-fg}`,
  ];

  if (issue.assignee) lines.push(`{grey-fg}Assignee: ${escapeTags(issue.assignee)}{/grey-fg}`);
  if (issue.labels.length > 0) lines.push(`{grey-fg}Labels: ${escapeTags(issue.labels.join(', '))}{/grey-fg}`);
  if (ctx.progress && ctx.progress.total > 0) {
    lines.push(`{grey-fg}Progress: ${ctx.progress.closed}/${ctx.progress.total} closed{/grey-fg}`);
  }

  const { color } = reviewStyle(issue);
  const review = (issue.reviewStatus ?? 'unreviewed').toUpperCase();
  const by = issue.reviewedBy ? ` by ${escapeTags(issue.reviewedBy)}` : '';
  lines.push(`{bold}{${color}-fg}Review: ${review}{/${color}-fg}{/bold}${by}`);
  lines.push('');

  if (ctx.blockers.length > 0) {
    lines.push('{bold}Blocked by:{/bold}');
    for (const blocker of ctx.blockers) {
      lines.push(`  {red-fg}${escapeTags(blocker.id)}{/red-fg} ${escapeTags(truncate(blocker.title, inner - blocker.id.length - 3))}`);
    }
    lines.push('');
  }

  section(lines, 'Description:', issue.description, inner);
  section(lines, 'Design:', issue.design, inner);
  section(lines, 'Acceptance:', issue.acceptanceCriteria, inner);
  section(lines, 'Notes:', issue.notes, inner);

  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}
