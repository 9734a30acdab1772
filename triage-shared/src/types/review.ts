/**
 * Review session types.
 */

import type { ReviewStatus } from './issue';
import { isOneOf } from './issue';

export type ReviewType = 'plan' | 'implementation' | 'security';

/** Decision recorded for an issue; `note` leaves the review status alone. */
export type ReviewOutcome = Exclude<ReviewStatus, 'unreviewed'> | 'note';

export const REVIEW_TYPES: readonly ReviewType[] = ['plan', 'implementation', 'security'];

export interface ReviewAction {
  readonly issueId: string;
  readonly status: ReviewOutcome;
  readonly reviewer: string;
  readonly reviewType: ReviewType;
  readonly notes: string;
  /** ISO timestamp. */
  readonly timestamp: string;
}

export interface SessionStats {
  startedAt: string;
  itemsReviewed: number;
  approved: number;
  needsRevision: number;
  deferred: number;
}

export interface ReviewSaveResult {
  saved: number;
  failed: number;
  errors: Error[];
}

/** Persists a session's review log. Implementations do not retry. */
export interface ReviewSaver {
  save(actions: readonly ReviewAction[]): Promise<ReviewSaveResult>;
}

export function isReviewType(value: unknown): value is ReviewType {
  return isOneOf(REVIEW_TYPES, value);
}
