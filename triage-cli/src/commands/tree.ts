/**
 * `triage tree <rootId>` — Print the review tree rooted at an issue.
 */

import * as path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import type { DisplayNode, ReviewStatus, StatusFilter } from 'triage-shared';
import {
  STATUS_FILTER_CYCLE,
  buildIssueFilter,
  flattenTree,
  isOneOf,
  isUnreviewed,
  loadIssues,
  loadReviewTree,
  seedReviewState,
  treeIssues,
} from 'triage-shared';
import { booleanOption, commandOptions, listOption, stringOption } from './options';
import { warn } from './output';

const REVIEW_MARKS: Record<ReviewStatus, () => string> = {
  unreviewed: () => chalk.gray('○'),
  approved: () => chalk.green('✓'),
  needs_revision: () => chalk.red('!'),
  deferred: () => chalk.yellow('?'),
};

export interface TreeRow {
  id: string;
  title: string;
  depth: number;
  status: string;
  priority: number;
  reviewStatus: ReviewStatus;
  reviewedBy?: string;
}

export function toTreeRow(node: DisplayNode): TreeRow {
  const { issue } = node;
  return {
    id: issue.id,
    title: issue.title,
    depth: node.depth,
    status: issue.status,
    priority: issue.priority,
    reviewStatus: issue.reviewStatus ?? 'unreviewed',
    reviewedBy: issue.reviewedBy,
  };
}

export function formatTreeLine(node: DisplayNode): string {
  const { issue } = node;
  const mark = REVIEW_MARKS[issue.reviewStatus ?? 'unreviewed']();
  const title = issue.status === 'closed' ? chalk.dim(issue.title) : issue.title;
  return `${chalk.gray(node.treePrefix)}${mark} ${chalk.blue(issue.id)} ${title} ${chalk.dim(`P${issue.priority}`)}`;
}

export function parseStatusFilter(value: string | undefined): StatusFilter {
  if (value === undefined) return 'all';
  if (!isOneOf(STATUS_FILTER_CYCLE, value)) {
    throw new Error(`invalid status filter: ${value} (expected one of ${STATUS_FILTER_CYCLE.join(', ')})`);
  }
  return value;
}

export async function treeAction(rootId: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = commandOptions(cmd);
  const workspace = path.resolve(stringOption(opts, 'workspace') ?? process.cwd());

  const issues = await loadIssues(workspace, warn);
  seedReviewState(issues);
  const tree = loadReviewTree(rootId, issues);
  const predicate = buildIssueFilter({
    status: parseStatusFilter(stringOption(opts, 'status')),
    search: stringOption(opts, 'search') ?? '',
    labels: listOption(opts, 'label'),
  });
  const nodes = flattenTree(tree.root, treeIssues(tree), predicate);

  if (booleanOption(opts, 'json')) {
    process.stdout.write(JSON.stringify(nodes.map(toTreeRow), null, 2) + '\n');
    return;
  }

  for (const node of nodes) process.stdout.write(formatTreeLine(node) + '\n');
  const reviewed = nodes.filter(n => !isUnreviewed(n.issue)).length;
  process.stdout.write(chalk.dim(`\n${reviewed}/${nodes.length} reviewed\n`));
}
