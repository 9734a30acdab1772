/**
 * Review dashboard state machine.
 *
 * Owns the flattened tree, cursor and scroll, the active filters and the
 * overlay stack, and routes every key press to the overlay that has focus.
 * Review decisions go through the session tracker; prompts are copied through
 * the injected clipboard. Rendering lives in ink/ReviewDashboard.tsx.
 */

import type {
  DisplayNode,
  FuzzyMatcher,
  Issue,
  ReviewOutcome,
  ReviewSessionTracker,
  ReviewTree,
  StatusFilter,
  ViewportState,
} from 'triage-shared';
import {
  IssueNotFoundError,
  blockingIdsOf,
  buildIssueFilter,
  countEpicChildren,
  flattenTree,
  generateFullPrompt,
  generateSimplePrompt,
  isUnreviewed,
  loadReviewTree,
  moveCursor,
  nextStatusFilter,
  reconcile,
  setCursor,
  treeIssues,
} from 'triage-shared';
import type { Clipboard } from './clipboard';
import type { KeyPress } from './keys';
import { isChar, isCtrl, isKey, printable } from './keys';
import { LabelSelector } from './selector/LabelSelector';
import { buildDetailLines } from './issueView';

export type NoteAction = 'note' | 'revision' | 'defer';

export type Overlay =
  | { kind: 'none' }
  | { kind: 'help' }
  | { kind: 'summary' }
  | { kind: 'search' }
  | { kind: 'label'; buffer: string }
  | { kind: 'assignee'; issueId: string; buffer: string }
  | { kind: 'note'; action: NoteAction; issueId: string; buffer: string }
  | { kind: 'selector' };

export type ToastSeverity = 'error' | 'warning' | 'info';

export type DashboardEffect =
  | { kind: 'none' }
  | { kind: 'quit'; save: boolean }
  | { kind: 'toast'; message: string; severity: ToastSeverity };

export interface ReviewDashboardOptions {
  tree: ReviewTree;
  /** The whole collection; re-rooting picks from it. */
  issues: readonly Issue[];
  tracker: ReviewSessionTracker;
  matcher: FuzzyMatcher;
  clipboard: Clipboard;
  labels?: readonly string[];
  statusFilter?: StatusFilter;
}

export interface DashboardLayout {
  treeWidth: number;
  detailWidth: number;
  /** Rows for the tree list and the detail pane. */
  listHeight: number;
}

export const NOTE_CHAR_LIMIT = 1000;

/** Header, filter line, pane borders and status bar. */
const CHROME_ROWS = 6;
const MIN_LIST_HEIGHT = 3;

const NONE: DashboardEffect = { kind: 'none' };
const CLOSED: Overlay = { kind: 'none' };

const NOTE_OUTCOMES: Record<NoteAction, ReviewOutcome> = {
  note: 'note',
  revision: 'needs_revision',
  defer: 'deferred',
};

const NOTE_TOASTS: Record<NoteAction, string> = {
  note: 'Note added to',
  revision: 'Revision requested for',
  defer: 'Deferred',
};

export class ReviewDashboardState {
  private tree: ReviewTree;
  private readonly issues: readonly Issue[];
  private readonly tracker: ReviewSessionTracker;
  private readonly clipboard: Clipboard;
  private readonly selector: LabelSelector;

  private nodes: DisplayNode[] = [];
  private viewport: ViewportState = { cursor: 0, scroll: 0 };
  private statusFilter: StatusFilter;
  private search = '';
  private labels: string[];
  private overlay: Overlay = CLOSED;
  private detailFocus = false;
  private detailScroll = 0;
  private copied = false;
  private layoutState: DashboardLayout = { treeWidth: 40, detailWidth: 40, listHeight: 18 };

  constructor(options: ReviewDashboardOptions) {
    this.tree = options.tree;
    this.issues = options.issues;
    this.tracker = options.tracker;
    this.clipboard = options.clipboard;
    this.selector = new LabelSelector(options.issues, options.matcher);
    this.labels = [...(options.labels ?? [])];
    this.statusFilter = options.statusFilter ?? 'all';
    this.rebuild();
  }

  // ── Read access for rendering ──

  get root(): Issue {
    return this.tree.root;
  }

  get rows(): readonly DisplayNode[] {
    return this.nodes;
  }

  get cursor(): number {
    return this.viewport.cursor;
  }

  get scroll(): number {
    return this.viewport.scroll;
  }

  get activeOverlay(): Overlay {
    return this.overlay;
  }

  get filter(): StatusFilter {
    return this.statusFilter;
  }

  get searchQuery(): string {
    return this.search;
  }

  get activeLabels(): readonly string[] {
    return this.labels;
  }

  get hasDetailFocus(): boolean {
    return this.detailFocus;
  }

  get detailOffset(): number {
    return this.detailScroll;
  }

  get promptCopied(): boolean {
    return this.copied;
  }

  get layout(): DashboardLayout {
    return this.layoutState;
  }

  get labelSelector(): LabelSelector {
    return this.selector;
  }

  get session(): ReviewSessionTracker {
    return this.tracker;
  }

  get selectedIssue(): Issue | undefined {
    return this.nodes[this.viewport.cursor]?.issue;
  }

  /** Detail pane content for the selected issue. */
  detailLines(): string[] {
    const issue = this.selectedIssue;
    if (!issue) return buildDetailLines(undefined, this.layoutState.detailWidth, { blockers: [] });

    const blockers = blockingIdsOf(issue)
      .map(id => this.tree.issueMap.get(id))
      .filter((b): b is Issue => b !== undefined);
    const progress = issue.issueType === 'epic' ? countEpicChildren(issue.id, this.issues) : undefined;
    return buildDetailLines(issue, this.layoutState.detailWidth, { blockers, progress });
  }

  // ── Layout ──

  resize(rows: number, columns: number): void {
    const listHeight = Math.max(MIN_LIST_HEIGHT, rows - CHROME_ROWS);
    const treeWidth = Math.floor(columns / 2);
    this.layoutState = { treeWidth, detailWidth: Math.max(10, columns - treeWidth - 4), listHeight };
    this.viewport = reconcile(this.viewport, this.nodes.length, listHeight);
    this.selector.setHeight(Math.max(MIN_LIST_HEIGHT, listHeight - 4));
    this.clampDetailScroll();
  }

  // ── Key routing ──

  handleKey(press: KeyPress): DashboardEffect {
    switch (this.overlay.kind) {
      case 'summary':
        return this.handleSummary(press);
      case 'help':
        this.overlay = CLOSED;
        return NONE;
      case 'search':
        this.handleSearch(press);
        return NONE;
      case 'label':
        this.handleLabelInput(press, this.overlay.buffer);
        return NONE;
      case 'assignee':
        return this.handleAssignee(press, this.overlay);
      case 'note':
        return this.handleNote(press, this.overlay);
      case 'selector':
        return this.handleSelector(press);
      case 'none':
        return this.handleNormal(press);
    }
  }

  private handleSummary(press: KeyPress): DashboardEffect {
    if (isChar(press, 'q')) return { kind: 'quit', save: true };
    if (isChar(press, 'Q')) return { kind: 'quit', save: false };
    if (isKey(press, 'escape')) {
      this.overlay = CLOSED;
      this.copied = false;
    } else if (isChar(press, 'p')) {
      this.copied = this.clipboard(generateSimplePrompt(this.tracker.actions)).success;
    } else if (isChar(press, 'P')) {
      const lookup = (id: string) => this.tree.issueMap.get(id);
      this.copied = this.clipboard(generateFullPrompt(this.tracker.actions, lookup)).success;
    }
    return NONE;
  }

  private handleSearch(press: KeyPress): void {
    if (isKey(press, 'escape')) {
      this.overlay = CLOSED;
      this.applySearch('');
    } else if (isKey(press, 'enter')) {
      this.overlay = CLOSED;
    } else if (isKey(press, 'backspace')) {
      if (this.search) this.applySearch(this.search.slice(0, -1));
    } else {
      const text = printable(press);
      if (text !== null) this.applySearch(this.search + text);
    }
  }

  private handleLabelInput(press: KeyPress, buffer: string): void {
    if (isKey(press, 'escape')) {
      this.overlay = CLOSED;
    } else if (isKey(press, 'enter')) {
      const label = buffer.trim();
      if (label && !this.labels.some(l => l.toLowerCase() === label.toLowerCase())) {
        this.setLabels([...this.labels, label]);
      }
      this.overlay = CLOSED;
    } else if (isKey(press, 'backspace')) {
      if (buffer) {
        this.overlay = { kind: 'label', buffer: buffer.slice(0, -1) };
      } else if (this.labels.length > 0) {
        this.setLabels(this.labels.slice(0, -1));
      }
    } else {
      const text = printable(press);
      if (text !== null) this.overlay = { kind: 'label', buffer: buffer + text };
    }
  }

  private handleAssignee(press: KeyPress, overlay: Extract<Overlay, { kind: 'assignee' }>): DashboardEffect {
    if (isKey(press, 'escape')) {
      this.overlay = CLOSED;
    } else if (isKey(press, 'enter')) {
      this.overlay = CLOSED;
      const issue = this.tree.issueMap.get(overlay.issueId);
      if (issue) {
        const assignee = overlay.buffer.trim();
        issue.assignee = assignee || undefined;
        return toast(assignee ? `Assigned ${issue.id} to ${assignee}` : `Unassigned ${issue.id}`);
      }
    } else if (isKey(press, 'backspace')) {
      this.overlay = { ...overlay, buffer: overlay.buffer.slice(0, -1) };
    } else {
      const text = printable(press);
      if (text !== null) this.overlay = { ...overlay, buffer: overlay.buffer + text };
    }
    return NONE;
  }

  private handleNote(press: KeyPress, overlay: Extract<Overlay, { kind: 'note' }>): DashboardEffect {
    if (isKey(press, 'escape')) {
      this.overlay = CLOSED;
      return NONE;
    }
    if (isCtrl(press, 's')) {
      this.overlay = CLOSED;
      return this.submitNote(overlay);
    }

    let buffer = overlay.buffer;
    if (isKey(press, 'enter')) {
      buffer += '\n';
    } else if (isKey(press, 'backspace')) {
      buffer = buffer.slice(0, -1);
    } else {
      const text = printable(press);
      if (text === null) return NONE;
      buffer += text;
    }
    this.overlay = { ...overlay, buffer: buffer.slice(0, NOTE_CHAR_LIMIT) };
    return NONE;
  }

  private submitNote(overlay: Extract<Overlay, { kind: 'note' }>): DashboardEffect {
    const note = overlay.buffer.trim();
    // A bare note with no text records nothing
    if (overlay.action === 'note' && !note) return NONE;
    return this.record(overlay.issueId, NOTE_OUTCOMES[overlay.action], note, `${NOTE_TOASTS[overlay.action]} ${overlay.issueId}`);
  }

  private handleSelector(press: KeyPress): DashboardEffect {
    this.selector.handleKey(press);
    const result = this.selector.result;
    if (!result) return NONE;

    this.overlay = CLOSED;
    if (result.kind === 'cancelled') return NONE;

    const { item, scopedLabels } = result;
    if (item.type === 'label') {
      this.setLabels(scopedLabels);
      return toast(`Label filter: ${scopedLabels.join(', ')}`);
    }
    return this.reroot(item.value);
  }

  private handleNormal(press: KeyPress): DashboardEffect {
    if (isKey(press, 'down') || isChar(press, 'j')) {
      this.step(1);
    } else if (isKey(press, 'up') || isChar(press, 'k')) {
      this.step(-1);
    } else if (isKey(press, 'pageDown')) {
      this.step(this.layoutState.listHeight);
    } else if (isKey(press, 'pageUp')) {
      this.step(-this.layoutState.listHeight);
    } else if (isChar(press, 'g')) {
      this.jumpTo(0);
    } else if (isChar(press, 'G')) {
      this.jumpTo(this.nodes.length - 1);
    } else if (isChar(press, 'f')) {
      this.statusFilter = nextStatusFilter(this.statusFilter);
      this.rebuild();
      this.viewport = reconcile(this.viewport, this.nodes.length, this.layoutState.listHeight);
    } else if (isKey(press, 'tab')) {
      this.detailFocus = !this.detailFocus;
    } else if (isChar(press, ']')) {
      this.jumpToUnreviewed(1);
    } else if (isChar(press, '[')) {
      this.jumpToUnreviewed(-1);
    } else if (isChar(press, 'a')) {
      const issue = this.selectedIssue;
      if (issue) return this.record(issue.id, 'approved', '', `Approved ${issue.id}`);
    } else if (isChar(press, 'n') || isChar(press, 'r') || isChar(press, 'd')) {
      const issue = this.selectedIssue;
      if (issue) {
        const action: NoteAction = isChar(press, 'n') ? 'note' : isChar(press, 'r') ? 'revision' : 'defer';
        this.overlay = { kind: 'note', action, issueId: issue.id, buffer: '' };
      }
    } else if (isChar(press, 'A')) {
      const issue = this.selectedIssue;
      if (issue) this.overlay = { kind: 'assignee', issueId: issue.id, buffer: issue.assignee ?? '' };
    } else if (isChar(press, '?')) {
      this.overlay = { kind: 'help' };
    } else if (isChar(press, '/')) {
      this.overlay = { kind: 'search' };
      if (this.search) this.applySearch('');
    } else if (isChar(press, 's')) {
      this.overlay = { kind: 'label', buffer: '' };
    } else if (isChar(press, 'S')) {
      this.setLabels([]);
    } else if (isChar(press, 'L')) {
      this.selector.reset();
      this.overlay = { kind: 'selector' };
    } else if (isChar(press, 'q') || isKey(press, 'escape')) {
      if (this.tracker.pendingCount === 0) return { kind: 'quit', save: false };
      this.overlay = { kind: 'summary' };
      this.copied = false;
    }
    return NONE;
  }

  // ── Actions ──

  private record(issueId: string, outcome: ReviewOutcome, note: string, message: string): DashboardEffect {
    try {
      this.tracker.recordAction(issueId, outcome, note);
    } catch (err) {
      if (err instanceof IssueNotFoundError) return toast(err.message, 'error');
      throw err;
    }
    return toast(message);
  }

  private reroot(rootId: string): DashboardEffect {
    try {
      this.tree = loadReviewTree(rootId, this.issues);
    } catch (err) {
      if (err instanceof IssueNotFoundError) return toast(err.message, 'error');
      throw err;
    }
    this.search = '';
    this.rebuild();
    this.viewport = { cursor: 0, scroll: 0 };
    this.detailScroll = 0;
    return toast(`Reviewing ${rootId}`);
  }

  private applySearch(query: string): void {
    this.search = query;
    this.rebuild();
    this.viewport = { cursor: 0, scroll: 0 };
  }

  private setLabels(labels: string[]): void {
    this.labels = labels;
    this.rebuild();
    this.viewport = { cursor: 0, scroll: 0 };
  }

  private rebuild(): void {
    const predicate = buildIssueFilter({ status: this.statusFilter, search: this.search, labels: this.labels });
    this.nodes = flattenTree(this.tree.root, treeIssues(this.tree), predicate);
    this.detailScroll = 0;
  }

  private step(delta: number): void {
    if (this.detailFocus) {
      this.detailScroll += delta;
      this.clampDetailScroll();
      return;
    }
    const before = this.viewport.cursor;
    this.viewport = moveCursor(this.viewport, delta, this.nodes.length, this.layoutState.listHeight);
    if (this.viewport.cursor !== before) this.detailScroll = 0;
  }

  private jumpTo(index: number): void {
    this.viewport = setCursor(this.viewport, index, this.nodes.length, this.layoutState.listHeight);
    this.detailScroll = 0;
  }

  /** Moves to the next (or previous) unreviewed row, wrapping around. */
  private jumpToUnreviewed(direction: 1 | -1): void {
    const count = this.nodes.length;
    for (let offset = 1; offset <= count; offset++) {
      const index = (this.viewport.cursor + direction * offset + count) % count;
      const node = this.nodes[index];
      if (node && isUnreviewed(node.issue)) {
        this.jumpTo(index);
        return;
      }
    }
  }

  private clampDetailScroll(): void {
    const max = Math.max(0, this.detailLines().length - this.layoutState.listHeight);
    this.detailScroll = Math.max(0, Math.min(this.detailScroll, max));
  }
}

function toast(message: string, severity: ToastSeverity = 'info'): DashboardEffect {
  return { kind: 'toast', message, severity };
}
