/**
 * In-memory review session: applies review decisions to issues, keeps the
 * session counters, and accumulates the action log handed to a
 * {@link ReviewSaver} when the session ends. Performs no I/O.
 *
 * @module review/reviewSession
 */

import type { Issue } from '../types/issue';
import { isUnreviewed } from '../types/issue';
import type { ReviewAction, ReviewOutcome, ReviewType, SessionStats } from '../types/review';
import { IssueNotFoundError } from '../errors';

export const NOTE_SEPARATOR = '\n\n---\n\n';

export interface ReviewSessionOptions {
  reviewer: string;
  reviewType: ReviewType;
  /** Resolves an issue id to the mutable issue record. */
  lookup: (issueId: string) => Issue | undefined;
  /** Clock; defaults to the system time. */
  now?: () => Date;
}

/** Appends `note` to `existing`, separated when both are non-empty. */
export function appendNote(existing: string, note: string): string {
  if (!note) return existing;
  return existing ? existing + NOTE_SEPARATOR + note : note;
}

export class ReviewSessionTracker {
  readonly reviewer: string;
  readonly reviewType: ReviewType;
  private readonly lookup: (issueId: string) => Issue | undefined;
  private readonly now: () => Date;
  private readonly log: ReviewAction[] = [];
  private readonly counters: SessionStats;

  constructor(options: ReviewSessionOptions) {
    this.reviewer = options.reviewer;
    this.reviewType = options.reviewType;
    this.lookup = options.lookup;
    this.now = options.now ?? (() => new Date());
    this.counters = {
      startedAt: this.now().toISOString(),
      itemsReviewed: 0,
      approved: 0,
      needsRevision: 0,
      deferred: 0,
    };
  }

  /**
   * Records one decision. A `note` outcome only appends the note. Any other
   * outcome overwrites the issue's review status, reviewer and timestamp;
   * "items reviewed" counts an issue the first time it leaves unreviewed,
   * while the per-status counter counts every decision.
   *
   * @throws IssueNotFoundError when the id does not resolve.
   */
  recordAction(issueId: string, outcome: ReviewOutcome, note = ''): ReviewAction {
    const issue = this.lookup(issueId);
    if (!issue) throw new IssueNotFoundError(issueId);

    const timestamp = this.now().toISOString();
    issue.notes = appendNote(issue.notes, note);

    if (outcome !== 'note') {
      if (isUnreviewed(issue)) this.counters.itemsReviewed++;
      switch (outcome) {
        case 'approved':
          this.counters.approved++;
          break;
        case 'needs_revision':
          this.counters.needsRevision++;
          break;
        case 'deferred':
          this.counters.deferred++;
          break;
      }
      issue.reviewStatus = outcome;
      issue.reviewedBy = this.reviewer;
      issue.reviewedAt = timestamp;
    }

    const action: ReviewAction = Object.freeze({
      issueId,
      status: outcome,
      reviewer: this.reviewer,
      reviewType: this.reviewType,
      notes: note,
      timestamp,
    });
    this.log.push(action);
    return action;
  }

  get stats(): SessionStats {
    return { ...this.counters };
  }

  /** The action log in recording order. */
  get actions(): readonly ReviewAction[] {
    return [...this.log];
  }

  get pendingCount(): number {
    return this.log.length;
  }

  /** Milliseconds since the session started. */
  elapsedMs(): number {
    return this.now().getTime() - Date.parse(this.counters.startedAt);
  }
}
