/**
 * Ordering for dotted hierarchical issue ids (`bv-xyz`, `bv-xyz.1`, `bv-xyz.1.2`).
 *
 * @module sorting/hierarchicalId
 */

import type { Issue } from '../types/issue';

const INTEGER_RE = /^[+-]?\d+$/;

function compareStrings(a: string, b: string): -1 | 0 | 1 {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Compares two hierarchical ids.
 *
 * The base segment (before the first dot) compares as a plain string. Later
 * segments compare numerically when both are integers (`x.9` < `x.10`),
 * otherwise as strings. When every shared segment matches, the shorter id
 * sorts first, so a parent precedes its children.
 */
export function compareHierarchicalIds(a: string, b: string): -1 | 0 | 1 {
  if (a === b) return 0;

  const partsA = a.split('.');
  const partsB = b.split('.');

  const base = compareStrings(partsA[0], partsB[0]);
  if (base !== 0) return base;

  const maxLen = Math.max(partsA.length, partsB.length);
  for (let i = 1; i < maxLen; i++) {
    if (i >= partsA.length) return -1;
    if (i >= partsB.length) return 1;

    const segA = partsA[i];
    const segB = partsB[i];
    if (INTEGER_RE.test(segA) && INTEGER_RE.test(segB)) {
      const numA = BigInt(segA);
      const numB = BigInt(segB);
      if (numA !== numB) return numA < numB ? -1 : 1;
      // `1` vs `01`: numerically equal, still distinct ids
      const spelling = compareStrings(segA, segB);
      if (spelling !== 0) return spelling;
    } else {
      const cmp = compareStrings(segA, segB);
      if (cmp !== 0) return cmp;
    }
  }

  return 0;
}

/** Priority ascending (P0 first), then hierarchical id. */
export function compareByPriority(a: Issue, b: Issue): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return compareHierarchicalIds(a.id, b.id);
}

/** Sorts in place by priority, then hierarchical id. */
export function sortIssuesByPriority(issues: Issue[]): Issue[] {
  return issues.sort(compareByPriority);
}

/** Lower values sort first. */
export type StatusOrderFn = (issue: Issue) => number;

/** Sorts in place by status order, then priority, then hierarchical id. */
export function sortIssuesByStatusThenPriority(issues: Issue[], statusOrder: StatusOrderFn): Issue[] {
  return issues.sort((a, b) => {
    const sa = statusOrder(a);
    const sb = statusOrder(b);
    if (sa !== sb) return sa - sb;
    return compareByPriority(a, b);
  });
}
