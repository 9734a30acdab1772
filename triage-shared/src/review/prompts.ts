/**
 * Markdown summaries of a review session, for pasting into an agent.
 */

import type { Issue } from '../types/issue';
import type { ReviewAction, ReviewOutcome } from '../types/review';

export const EMPTY_SESSION_PROMPT = 'No reviews recorded in this session.';

const OUTCOME_GLYPHS: Record<ReviewOutcome, string> = {
  approved: '✓',
  needs_revision: '!',
  deferred: '?',
  note: '•',
};

export function outcomeGlyph(outcome: ReviewOutcome): string {
  return OUTCOME_GLYPHS[outcome];
}

/** One line per recorded action. */
export function generateSimplePrompt(actions: readonly ReviewAction[]): string {
  if (actions.length === 0) return EMPTY_SESSION_PROMPT;

  let out = '# Review Session Summary\n\n';
  out += `Reviewed ${actions.length} issues:\n\n`;
  for (const action of actions) {
    out += `- ${outcomeGlyph(action.status)} ${action.issueId} → ${action.status}\n`;
  }
  return out;
}

/**
 * Grouped summary with review notes and instructions. `lookup` supplies
 * titles; unknown ids fall back to the id.
 */
export function generateFullPrompt(
  actions: readonly ReviewAction[],
  lookup: (issueId: string) => Issue | undefined,
): string {
  if (actions.length === 0) return EMPTY_SESSION_PROMPT;

  const titleOf = (id: string) => lookup(id)?.title ?? id;
  const approved = actions.filter(a => a.status === 'approved');
  const revision = actions.filter(a => a.status === 'needs_revision');
  const deferred = actions.filter(a => a.status === 'deferred');

  const lines: string[] = [
    '# Review Session Summary',
    '',
    'You are reviewing a beads issue tracking session. Go over the review feedback and suggest changes.',
    '',
    '## Session Stats',
    `- Approved: ${approved.length} issues`,
    `- Needs Revision: ${revision.length} issues`,
    `- Deferred: ${deferred.length} issues`,
    '',
  ];

  if (approved.length > 0) {
    lines.push('## Approved Issues');
    for (const a of approved) lines.push(`- \`${a.issueId}\`: ${titleOf(a.issueId)}`);
    lines.push('');
  }

  if (revision.length > 0) {
    lines.push('## Issues Needing Revision');
    for (const a of revision) {
      lines.push(`### \`${a.issueId}\`: ${titleOf(a.issueId)}`);
      if (a.notes) lines.push(`**Review Notes:** ${a.notes}`);
      lines.push('**Action Required:** Review feedback and suggest implementation changes.', '');
    }
  }

  if (deferred.length > 0) {
    lines.push('## Deferred Issues');
    for (const a of deferred) {
      lines.push(`### \`${a.issueId}\`: ${titleOf(a.issueId)}`);
      if (a.notes) lines.push(`**Reason:** ${a.notes}`);
      lines.push('');
    }
  }

  lines.push(
    '---',
    '',
    'For each issue with review feedback:',
    '1. Analyze the review notes',
    '2. Suggest concrete changes based on feedback',
    '3. Explain current bead state and dependencies',
    '',
  );

  return lines.join('\n');
}
