/**
 * Modal selector over epics, labels and issues, with vim-style modes.
 *
 * Normal mode navigates and manages the label scope; insert mode edits the
 * query, in one of three variants: fuzzy search, scope-add (Enter narrows the
 * scope instead of confirming) and review lookup (id/title lookup over all
 * issues). The selector is done once `result` is set; `reset()` readies it
 * for reuse.
 */

import type { FuzzyMatcher, Issue, SelectorItem, ViewportState } from 'triage-shared';
import { ScopeFilterEngine, lookupIssues, moveCursor, reconcile } from 'triage-shared';
import type { KeyPress } from '../keys';
import { isChar, isKey, printable } from '../keys';

export type InsertVariant = 'search' | 'scopeAdd' | 'reviewLookup';

export type SelectorMode =
  | { kind: 'normal' }
  | { kind: 'insert'; variant: InsertVariant };

export type SelectorResult =
  | { kind: 'confirmed'; item: SelectorItem; scopedLabels: string[] }
  | { kind: 'cancelled' };

export interface SelectorView {
  mode: SelectorMode;
  query: string;
  items: readonly SelectorItem[];
  cursor: number;
  scroll: number;
  scopeLabels: readonly string[];
}

const NORMAL: SelectorMode = { kind: 'normal' };

function typeRank(item: SelectorItem): number {
  return item.type === 'epic' ? 0 : 1;
}

export class LabelSelector {
  private engine: ScopeFilterEngine;
  private mode: SelectorMode = NORMAL;
  private query = '';
  private items: SelectorItem[];
  private viewport: ViewportState = { cursor: 0, scroll: 0 };
  private height = 10;
  private outcome: SelectorResult | null = null;

  constructor(
    private readonly issues: readonly Issue[],
    private readonly matcher: FuzzyMatcher,
  ) {
    this.engine = new ScopeFilterEngine(issues);
    this.items = [...this.engine.unfilteredItems];
  }

  get result(): SelectorResult | null {
    return this.outcome;
  }

  get view(): SelectorView {
    return {
      mode: this.mode,
      query: this.query,
      items: this.items,
      cursor: this.viewport.cursor,
      scroll: this.viewport.scroll,
      scopeLabels: this.engine.scopeLabels,
    };
  }

  get selected(): SelectorItem | undefined {
    return this.items[this.viewport.cursor];
  }

  /** Rows available for the list. */
  setHeight(height: number): void {
    this.height = Math.max(1, height);
    this.viewport = reconcile(this.viewport, this.items.length, this.height);
  }

  reset(): void {
    this.engine = new ScopeFilterEngine(this.issues, this.engine.unfilteredItems);
    this.mode = NORMAL;
    this.query = '';
    this.outcome = null;
    this.setItems([...this.engine.unfilteredItems]);
  }

  handleKey(press: KeyPress): void {
    if (this.outcome) return;
    if (this.mode.kind === 'insert') {
      this.handleInsert(press, this.mode.variant);
    } else {
      this.handleNormal(press);
    }
  }

  private handleNormal(press: KeyPress): void {
    if (isKey(press, 'up') || isChar(press, 'k')) {
      this.move(-1);
    } else if (isKey(press, 'down') || isChar(press, 'j')) {
      this.move(1);
    } else if (isChar(press, 'i') || isChar(press, '/')) {
      this.mode = { kind: 'insert', variant: 'search' };
    } else if (isChar(press, 's')) {
      this.mode = { kind: 'insert', variant: 'scopeAdd' };
    } else if (isChar(press, 'r')) {
      this.mode = { kind: 'insert', variant: 'reviewLookup' };
      this.query = '';
      this.setItems([]);
    } else if (isKey(press, 'enter')) {
      this.confirmSelected();
    } else if (isKey(press, 'escape')) {
      if (this.engine.hasScope) {
        this.engine.clearScope();
        this.refilter();
      } else {
        this.outcome = { kind: 'cancelled' };
      }
    } else if (isKey(press, 'backspace')) {
      if (this.query) {
        this.query = '';
        this.refilter();
      } else if (this.engine.hasScope) {
        this.engine.removeLastScope();
        this.refilter();
      }
    }
  }

  private handleInsert(press: KeyPress, variant: InsertVariant): void {
    if (isKey(press, 'escape')) {
      this.mode = NORMAL;
      if (variant === 'reviewLookup') {
        this.query = '';
        this.refilter();
      }
      return;
    }

    if (isKey(press, 'enter')) {
      const item = this.selected;
      if (!item) return;
      if (variant === 'scopeAdd' && item.type === 'label') {
        this.engine.addToScope(item.value);
        this.query = '';
        this.refilter();
        return;
      }
      this.confirmSelected();
      return;
    }

    if (isKey(press, 'backspace')) {
      if (this.query) {
        this.query = this.query.slice(0, -1);
        this.refilter(variant);
      }
      return;
    }

    if (isKey(press, 'up')) {
      this.move(-1);
      return;
    }
    if (isKey(press, 'down')) {
      this.move(1);
      return;
    }

    const text = printable(press);
    if (text !== null) {
      this.query += text;
      this.refilter(variant);
    }
  }

  private confirmSelected(): void {
    const item = this.selected;
    if (!item) return;
    const scopedLabels = item.type === 'label'
      ? [...this.engine.scopeLabels.filter(l => l !== item.value), item.value]
      : [];
    this.outcome = { kind: 'confirmed', item, scopedLabels };
  }

  /** Scope candidates while a scope is active, else the full list. */
  private baseItems(): readonly SelectorItem[] {
    return this.engine.hasScope ? this.engine.candidates : this.engine.unfilteredItems;
  }

  private refilter(variant?: InsertVariant): void {
    if (variant === 'reviewLookup') {
      this.setItems(lookupIssues(this.query, this.issues));
      return;
    }

    const base = this.baseItems();
    if (!this.query.trim()) {
      this.setItems([...base]);
      return;
    }

    const matches = this.matcher.find(this.query, base.map(item => `${item.title} ${item.value}`));
    const ranked = matches.map(m => base[m.index]).filter((item): item is SelectorItem => item !== undefined);
    ranked.sort((a, b) => typeRank(a) - typeRank(b));
    this.setItems(ranked);
  }

  private setItems(items: SelectorItem[]): void {
    this.items = items;
    this.viewport = reconcile({ cursor: 0, scroll: 0 }, items.length, this.height);
  }

  private move(delta: number): void {
    this.viewport = moveCursor(this.viewport, delta, this.items.length, this.height);
  }
}

