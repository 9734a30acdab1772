/**
 * Label scope engine: narrows the selector to labels that co-occur with
 * every active scope label.
 *
 * @module scope/scopeFilter
 */

import type { Issue } from '../types/issue';
import type { SelectorItem } from './selectorItems';
import { buildSelectorItems } from './selectorItems';

export class ScopeFilterEngine {
  private readonly issues: readonly Issue[];
  private readonly unfiltered: readonly SelectorItem[];
  private labels: string[] = [];
  private current: SelectorItem[];

  constructor(issues: readonly Issue[], unfiltered: readonly SelectorItem[] = buildSelectorItems(issues)) {
    this.issues = issues;
    this.unfiltered = unfiltered;
    this.current = [...unfiltered];
  }

  /** Active scope labels in insertion order. */
  get scopeLabels(): readonly string[] {
    return this.labels;
  }

  get hasScope(): boolean {
    return this.labels.length > 0;
  }

  get candidates(): readonly SelectorItem[] {
    return this.current;
  }

  get unfilteredItems(): readonly SelectorItem[] {
    return this.unfiltered;
  }

  /** Adding a label that is already in scope leaves the list unchanged. */
  addToScope(label: string): SelectorItem[] {
    if (!this.labels.includes(label)) this.labels = [...this.labels, label];
    return this.recompute();
  }

  removeLastScope(): SelectorItem[] {
    if (this.labels.length === 0) return [...this.current];
    this.labels = this.labels.slice(0, -1);
    return this.recompute();
  }

  clearScope(): SelectorItem[] {
    this.labels = [];
    return this.recompute();
  }

  /** Issues carrying every scope label (exact match). */
  scopedIssues(): Issue[] {
    return this.issues.filter(issue => this.labels.every(l => issue.labels.includes(l)));
  }

  private recompute(): SelectorItem[] {
    if (this.labels.length === 0) {
      this.current = [...this.unfiltered];
      return [...this.current];
    }

    const scopeSet = new Set(this.labels);
    const overlap = new Map<string, number>();
    for (const issue of this.scopedIssues()) {
      for (const label of new Set(issue.labels)) {
        if (scopeSet.has(label)) continue;
        overlap.set(label, (overlap.get(label) ?? 0) + 1);
      }
    }

    const filtered: SelectorItem[] = [];
    for (const item of this.unfiltered) {
      if (item.type !== 'label' || scopeSet.has(item.value)) continue;
      const count = overlap.get(item.value) ?? 0;
      if (count > 0) filtered.push({ ...item, overlapCount: count });
    }

    // Array.prototype.sort is stable
    filtered.sort((a, b) => b.overlapCount - a.overlapCount);
    this.current = filtered;
    return [...filtered];
  }
}
