/**
 * Structured review comments stored on issues.
 *
 * ```
 * [REVIEW]
 * status: approved
 * reviewer: alice
 * date: 2024-03-01T10:00:00Z
 * type: plan
 * notes: looks good
 *   and can run over several lines
 * [/REVIEW]
 * ```
 *
 * Older comments open with `---REVIEW---` and may use title-case keys.
 *
 * @module review/reviewComment
 */

import type { Issue, ReviewStatus } from '../types/issue';
import type { ReviewAction, ReviewOutcome, ReviewType } from '../types/review';
import { isReviewType } from '../types/review';
import { isOneOf } from '../types/issue';

export const REVIEW_MARKER = '[REVIEW]';
export const REVIEW_END_MARKER = '[/REVIEW]';
export const LEGACY_REVIEW_MARKER = '---REVIEW---';

const OUTCOMES: readonly ReviewOutcome[] = ['approved', 'needs_revision', 'deferred', 'note'];

export interface ParsedReview {
  status: ReviewOutcome;
  reviewer: string;
  /** ISO timestamp; absent when the date line is missing or invalid. */
  reviewedAt?: string;
  reviewType?: ReviewType;
  notes: string;
}

export interface LatestReview {
  status: ReviewStatus;
  reviewer: string;
  reviewedAt?: string;
}

/** ISO-8601 without fractional seconds. */
export function toRfc3339(iso: string): string {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) return iso;
  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function formatReviewComment(action: ReviewAction): string {
  const lines = [
    REVIEW_MARKER,
    `status: ${action.status}`,
    `reviewer: ${action.reviewer}`,
    `date: ${toRfc3339(action.timestamp)}`,
  ];
  if (action.reviewType) lines.push(`type: ${action.reviewType}`);
  if (action.notes) lines.push(`notes: ${action.notes}`);
  lines.push(REVIEW_END_MARKER);
  return lines.join('\n');
}

/** `notes` is the last field; its body runs to the end marker. */
function readNotes(first: string, rest: readonly string[]): string {
  const body = [first];
  for (const line of rest) {
    if (line.trim() === REVIEW_END_MARKER) break;
    body.push(line);
  }
  return body.join('\n').trim();
}

/** Returns null for comments that are not reviews or carry no valid status. */
export function parseReviewFromComment(text: string): ParsedReview | null {
  if (!text.includes(REVIEW_MARKER) && !text.includes(LEGACY_REVIEW_MARKER)) return null;

  let status = '';
  let reviewer = '';
  let reviewedAt: string | undefined;
  let reviewType: ReviewType | undefined;
  let notes = '';

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    const sep = line.indexOf(':');
    if (sep < 0) continue;
    const key = line.slice(0, sep).toLowerCase();
    const value = line.slice(sep + 1).trim();

    switch (key) {
      case 'status':
        status = value.toLowerCase();
        break;
      case 'reviewer':
        reviewer = value;
        break;
      case 'date': {
        const ms = Date.parse(value);
        if (!Number.isNaN(ms)) reviewedAt = new Date(ms).toISOString();
        break;
      }
      case 'type':
        if (isReviewType(value)) reviewType = value;
        break;
      case 'notes':
        notes = readNotes(value, lines.slice(i + 1));
        i = lines.length;
        break;
    }
  }

  if (!isOneOf(OUTCOMES, status)) return null;
  return { status, reviewer, reviewedAt, reviewType, notes };
}

/**
 * The most recent status-bearing review among `comments`. Undated reviews
 * only win while no dated review has been seen; later comments win ties.
 */
export function getLatestReviewFromComments(comments: readonly string[]): LatestReview | null {
  let latest: LatestReview | null = null;
  let latestMs = 0;

  for (const text of comments) {
    const parsed = parseReviewFromComment(text);
    if (!parsed || parsed.status === 'note') continue;

    const ms = parsed.reviewedAt ? Date.parse(parsed.reviewedAt) : 0;
    if (ms > latestMs || latestMs === 0) {
      latest = { status: parsed.status, reviewer: parsed.reviewer, reviewedAt: parsed.reviewedAt };
      latestMs = ms;
    }
  }

  return latest;
}

/** Seeds review metadata on each issue from its review comments. */
export function seedReviewState(issues: Iterable<Issue>): void {
  for (const issue of issues) {
    if (issue.comments.length === 0) continue;
    const latest = getLatestReviewFromComments(issue.comments.map(c => c.text));
    if (!latest) continue;
    issue.reviewStatus = latest.status;
    issue.reviewedBy = latest.reviewer;
    issue.reviewedAt = latest.reviewedAt;
  }
}
