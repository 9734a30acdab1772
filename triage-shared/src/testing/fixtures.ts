/**
 * Issue builders for tests.
 */

import type { Dependency, Issue } from '../types/issue';

export function makeIssue(overrides: Partial<Issue> & { id: string }): Issue {
  return {
    title: overrides.id,
    description: '',
    design: '',
    acceptanceCriteria: '',
    notes: '',
    status: 'open',
    priority: 2,
    issueType: 'task',
    labels: [],
    dependencies: [],
    comments: [],
    ...overrides,
  };
}

/** A parent-child edge making `childId` a child of `parentId`. */
export function childOf(childId: string, parentId: string): Dependency {
  return { issueId: childId, dependsOnId: parentId, type: 'parent-child' };
}

/** A blocks edge: `blockerId` blocks `issueId`. */
export function blockedBy(issueId: string, blockerId: string): Dependency {
  return { issueId, dependsOnId: blockerId, type: 'blocks' };
}

/** Shorthand for an issue with one parent. */
export function makeChild(id: string, parentId: string, overrides: Partial<Issue> = {}): Issue {
  return makeIssue({ id, dependencies: [childOf(id, parentId)], ...overrides });
}
