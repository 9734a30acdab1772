/**
 * Turns a confirmed selector item into a review root and label filter.
 */

import type { Issue } from 'triage-shared';
import { compareByPriority } from 'triage-shared';
import type { SelectorResult } from './selector/LabelSelector';

export interface RootSelection {
  rootId: string;
  labels: string[];
}

/** Highest-priority open epic carrying every label (exact match). */
export function epicForLabels(issues: readonly Issue[], labels: readonly string[]): Issue | undefined {
  return issues
    .filter(i => i.issueType === 'epic' && i.status !== 'closed' && labels.every(l => i.labels.includes(l)))
    .sort(compareByPriority)[0];
}

/**
 * Epics and issues become the root directly; a label picks the best epic in
 * scope and keeps the labels as the filter. Null when nothing fits.
 */
export function rootFromSelection(
  result: Extract<SelectorResult, { kind: 'confirmed' }>,
  issues: readonly Issue[],
): RootSelection | null {
  const { item, scopedLabels } = result;
  if (item.type !== 'label') return { rootId: item.value, labels: [] };

  const epic = epicForLabels(issues, scopedLabels);
  return epic ? { rootId: epic.id, labels: scopedLabels } : null;
}
