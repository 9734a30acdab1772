/**
 * Flattens an issue tree into display rows.
 *
 * The parent→children map is rebuilt from the issue list on every call;
 * nothing is cached between calls.
 *
 * @module tree/treeFlattener
 */

import type { Issue } from '../types/issue';
import { isUnreviewed, parentIdsOf } from '../types/issue';
import { compareByPriority } from '../sorting/hierarchicalId';

export const TREE_GLYPHS = {
  branch: '├─ ',
  corner: '└─ ',
  pipe: '│  ',
  blank: '   ',
} as const;

export interface DisplayNode {
  issue: Issue;
  depth: number;
  /** Indentation glyphs drawn before the issue; empty for the root. */
  treePrefix: string;
  isLast: boolean;
  /** isLast of each ancestor (root first) and of this node. */
  parentPath: boolean[];
}

export type StatusFilter = 'all' | 'unreviewed' | 'needs_revision';

export const STATUS_FILTER_CYCLE: readonly StatusFilter[] = ['all', 'unreviewed', 'needs_revision'];

export interface IssueFilterOptions {
  status: StatusFilter;
  search: string;
  /** Required labels; an issue must carry all of them. */
  labels: readonly string[];
}

export type IssuePredicate = (issue: Issue) => boolean;

/**
 * parent id → children, ordered by priority then hierarchical id.
 */
export function buildChildrenMap(issues: readonly Issue[]): Map<string, Issue[]> {
  const children = new Map<string, Issue[]>();
  for (const issue of issues) {
    for (const parentId of parentIdsOf(issue)) {
      const list = children.get(parentId);
      if (list) list.push(issue);
      else children.set(parentId, [issue]);
    }
  }
  for (const list of children.values()) list.sort(compareByPriority);
  return children;
}

/** Composes the status, search and label criteria; all must hold. */
export function buildIssueFilter(opts: IssueFilterOptions): IssuePredicate {
  const query = opts.search.toLowerCase();
  const required = opts.labels.map(l => l.toLowerCase());

  return (issue) => {
    switch (opts.status) {
      case 'unreviewed':
        if (!isUnreviewed(issue)) return false;
        break;
      case 'needs_revision':
        if (issue.reviewStatus !== 'needs_revision') return false;
        break;
    }

    if (query) {
      const title = issue.title.toLowerCase();
      const id = issue.id.toLowerCase();
      if (!title.includes(query) && !id.includes(query)) return false;
    }

    if (required.length > 0) {
      const have = new Set(issue.labels.map(l => l.toLowerCase()));
      if (!required.every(l => have.has(l))) return false;
    }

    return true;
  };
}

/**
 * Pre-order traversal from `root`. The root is always emitted at depth 0;
 * the predicate only applies to descendants, and a rejected node's children
 * are still visited.
 */
export function flattenTree(root: Issue, allIssues: readonly Issue[], predicate: IssuePredicate): DisplayNode[] {
  const children = buildChildrenMap(allIssues);
  const nodes: DisplayNode[] = [{
    issue: root,
    depth: 0,
    treePrefix: '',
    isLast: true,
    parentPath: [true],
  }];

  const visited = new Set<string>([root.id]);

  const walk = (parent: Issue, depth: number, parentPath: boolean[]): void => {
    // Siblings are claimed before descending; a shared child stays at its shallowest level
    const kids = (children.get(parent.id) ?? []).filter(c => !visited.has(c.id));
    for (const kid of kids) visited.add(kid.id);

    kids.forEach((child, i) => {
      const isLast = i === kids.length - 1;
      const path = [...parentPath, isLast];

      // The root's own slot (index 0) draws nothing
      let prefix = '';
      for (let j = 1; j < parentPath.length; j++) {
        prefix += parentPath[j] ? TREE_GLYPHS.blank : TREE_GLYPHS.pipe;
      }
      prefix += isLast ? TREE_GLYPHS.corner : TREE_GLYPHS.branch;

      if (predicate(child)) {
        nodes.push({ issue: child, depth, treePrefix: prefix, isLast, parentPath: path });
      }

      walk(child, depth + 1, path);
    });
  };

  walk(root, 1, [true]);
  return nodes;
}

export interface EpicProgress {
  total: number;
  closed: number;
}

/** Counts all descendants of `epicId` and how many are closed. */
export function countEpicChildren(epicId: string, issues: readonly Issue[]): EpicProgress {
  return countDescendants(epicId, buildChildrenMap(issues));
}

/** Breadth-first over a prebuilt children map, each node counted once. */
export function countDescendants(epicId: string, children: ReadonlyMap<string, Issue[]>): EpicProgress {
  const visited = new Set<string>([epicId]);
  const queue = [epicId];
  let total = 0;
  let closed = 0;

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const child of children.get(current) ?? []) {
      if (visited.has(child.id)) continue;
      visited.add(child.id);
      total++;
      if (child.status === 'closed') closed++;
      queue.push(child.id);
    }
  }

  return { total, closed };
}

/** Next status filter in the all → unreviewed → needs_revision cycle. */
export function nextStatusFilter(current: StatusFilter): StatusFilter {
  const idx = STATUS_FILTER_CYCLE.indexOf(current);
  return STATUS_FILTER_CYCLE[(idx + 1) % STATUS_FILTER_CYCLE.length];
}
