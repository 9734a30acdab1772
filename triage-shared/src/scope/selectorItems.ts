/**
 * Entries offered by the label/epic/issue selector.
 */

import type { Issue } from '../types/issue';
import { buildChildrenMap, countDescendants } from '../tree/treeFlattener';

export type SelectorItemType = 'label' | 'epic' | 'issue';

export interface SelectorItem {
  type: SelectorItemType;
  /** Label name, epic id or issue id. */
  value: string;
  /** Display text: the label name, or the issue title. */
  title: string;
  issueCount: number;
  closedCount: number;
  /** closedCount / issueCount, 0 when empty. */
  progress: number;
  /** Issues co-occurring with the active scope; 0 when no scope is set. */
  overlapCount: number;
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function ratio(closed: number, total: number): number {
  return total > 0 ? closed / total : 0;
}

/** Open epics with descendant progress, incomplete first. */
export function buildEpicItems(issues: readonly Issue[]): SelectorItem[] {
  const children = buildChildrenMap(issues);
  const epics: SelectorItem[] = [];

  for (const issue of issues) {
    if (issue.issueType !== 'epic' || issue.status === 'closed') continue;

    const { total, closed } = countDescendants(issue.id, children);
    epics.push({
      type: 'epic',
      value: issue.id,
      title: issue.title,
      issueCount: total,
      closedCount: closed,
      progress: ratio(closed, total),
      overlapCount: 0,
    });
  }

  return epics.sort((a, b) =>
    a.progress === b.progress ? byCodeUnit(a.title, b.title) : a.progress - b.progress,
  );
}

/** One entry per distinct label with direct issue counts, alphabetical. */
export function buildLabelItems(issues: readonly Issue[]): SelectorItem[] {
  const counts = new Map<string, { total: number; closed: number }>();
  for (const issue of issues) {
    for (const label of issue.labels) {
      const entry = counts.get(label) ?? { total: 0, closed: 0 };
      entry.total++;
      if (issue.status === 'closed') entry.closed++;
      counts.set(label, entry);
    }
  }

  return [...counts.entries()]
    .map(([name, { total, closed }]): SelectorItem => ({
      type: 'label',
      value: name,
      title: name,
      issueCount: total,
      closedCount: closed,
      progress: ratio(closed, total),
      overlapCount: 0,
    }))
    .sort((a, b) => byCodeUnit(a.value, b.value));
}

/** The unfiltered selector list: epics first, then labels. */
export function buildSelectorItems(issues: readonly Issue[]): SelectorItem[] {
  return [...buildEpicItems(issues), ...buildLabelItems(issues)];
}

export function issueItem(issue: Issue): SelectorItem {
  return {
    type: 'issue',
    value: issue.id,
    title: issue.title,
    issueCount: 1,
    closedCount: issue.status === 'closed' ? 1 : 0,
    progress: issue.status === 'closed' ? 1 : 0,
    overlapCount: 0,
  };
}

/**
 * Issues whose id starts with `query` (sorted by id) followed by issues whose
 * title contains it (sorted by title). Case-insensitive; empty query matches
 * nothing.
 */
export function lookupIssues(query: string, issues: readonly Issue[]): SelectorItem[] {
  const q = query.trim().toLowerCase();
  if (!q) return [];

  const idMatches: SelectorItem[] = [];
  const titleMatches: SelectorItem[] = [];
  for (const issue of issues) {
    if (issue.id.toLowerCase().startsWith(q)) idMatches.push(issueItem(issue));
    else if (issue.title.toLowerCase().includes(q)) titleMatches.push(issueItem(issue));
  }

  idMatches.sort((a, b) => byCodeUnit(a.value, b.value));
  titleMatches.sort((a, b) => byCodeUnit(a.title, b.title));
  return [...idMatches, ...titleMatches];
}
