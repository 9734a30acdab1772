/**
 * Error types surfaced by the tree loader, reader and review tracker.
 */

/** A requested root or selected issue id is not in the collection. */
export class IssueNotFoundError extends Error {
  readonly issueId: string;

  constructor(issueId: string) {
    super(`issue not found: ${issueId}`);
    this.name = 'IssueNotFoundError';
    this.issueId = issueId;
  }
}

/** No usable issues file could be located or read. */
export class IssueSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IssueSourceError';
  }
}
