/**
 * Loads the review tree rooted at one issue: the root, every descendant
 * reachable over parent-child edges, and the external issues that block
 * something inside the tree.
 */

import type { Issue } from '../types/issue';
import { IssueNotFoundError } from '../errors';
import { buildChildrenMap } from './treeFlattener';

export interface ReviewTree {
  root: Issue;
  /** Descendants in breadth-first order. */
  descendants: Issue[];
  /** Issues outside the tree that block an issue inside it. */
  blockers: Issue[];
  /** Every issue in the collection by id. */
  issueMap: Map<string, Issue>;
}

export function buildIssueMap(issues: readonly Issue[]): Map<string, Issue> {
  const map = new Map<string, Issue>();
  for (const issue of issues) map.set(issue.id, issue);
  return map;
}

/**
 * Throws IssueNotFoundError when `rootId` is not in `issues`.
 */
export function loadReviewTree(rootId: string, issues: readonly Issue[]): ReviewTree {
  const issueMap = buildIssueMap(issues);
  const root = issueMap.get(rootId);
  if (!root) throw new IssueNotFoundError(rootId);

  const children = buildChildrenMap(issues);
  const inTree = new Set<string>([rootId]);
  const descendants: Issue[] = [];

  const queue = [rootId];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const child of children.get(current) ?? []) {
      if (inTree.has(child.id)) continue;
      inTree.add(child.id);
      descendants.push(child);
      queue.push(child.id);
    }
  }

  const blockers: Issue[] = [];
  const blockerIds = new Set<string>();
  for (const issue of [root, ...descendants]) {
    for (const dep of issue.dependencies) {
      if (dep.type !== 'blocks') continue;
      const blockerId = dep.dependsOnId;
      if (inTree.has(blockerId) || blockerIds.has(blockerId)) continue;
      const blocker = issueMap.get(blockerId);
      if (blocker) {
        blockers.push(blocker);
        blockerIds.add(blockerId);
      }
    }
  }

  return { root, descendants, blockers, issueMap };
}

/** Root followed by all descendants. */
export function treeIssues(tree: ReviewTree): Issue[] {
  return [tree.root, ...tree.descendants];
}

/** Ids of issues (inside or outside the tree) that block `issue`. */
export function blockingIdsOf(issue: Issue): string[] {
  return issue.dependencies.filter(d => d.type === 'blocks').map(d => d.dependsOnId);
}
