/**
 * Issue model shared by the reader, tree engine and review tracker.
 * On-disk records use snake_case (see readers/issues.ts); this is the
 * in-memory shape.
 */

export type IssueStatus = 'open' | 'in_progress' | 'blocked' | 'closed';

export type IssueType = 'bug' | 'feature' | 'task' | 'epic' | 'chore';

export type DependencyType = 'blocks' | 'related' | 'parent-child' | 'discovered-from';

export type ReviewStatus = 'unreviewed' | 'approved' | 'needs_revision' | 'deferred';

export const ISSUE_STATUSES: readonly IssueStatus[] = ['open', 'in_progress', 'blocked', 'closed'];
export const ISSUE_TYPES: readonly IssueType[] = ['bug', 'feature', 'task', 'epic', 'chore'];
export const DEPENDENCY_TYPES: readonly DependencyType[] = ['blocks', 'related', 'parent-child', 'discovered-from'];

export interface Dependency {
  issueId: string;
  /** For parent-child edges this is the parent; for blocks edges, the blocker. */
  dependsOnId: string;
  type: DependencyType;
}

export interface IssueComment {
  author: string;
  text: string;
  createdAt: string;
}

export interface Issue {
  id: string;
  title: string;
  description: string;
  design: string;
  acceptanceCriteria: string;
  notes: string;
  status: IssueStatus;
  priority: number;
  issueType: IssueType;
  assignee?: string;
  labels: string[];
  dependencies: Dependency[];
  comments: IssueComment[];
  /** Absent means never reviewed. */
  reviewStatus?: ReviewStatus;
  reviewedBy?: string;
  reviewedAt?: string;
}

/** Narrows `value` to one of `allowed`. */
export function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some(a => a === value);
}

export function isIssueStatus(value: unknown): value is IssueStatus {
  return isOneOf(ISSUE_STATUSES, value);
}

export function isIssueType(value: unknown): value is IssueType {
  return isOneOf(ISSUE_TYPES, value);
}

export function isDependencyType(value: unknown): value is DependencyType {
  return isOneOf(DEPENDENCY_TYPES, value);
}

/** True when the issue has no review decision yet. */
export function isUnreviewed(issue: Issue): boolean {
  return !issue.reviewStatus || issue.reviewStatus === 'unreviewed';
}

/** Parent ids of an issue (its parent-child edges). */
export function parentIdsOf(issue: Issue): string[] {
  return issue.dependencies
    .filter(d => d.type === 'parent-child')
    .map(d => d.dependsOnId);
}
