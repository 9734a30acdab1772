/**
 * Tagged-text rows and header for the selector.
 */

import type { SelectorItem } from 'triage-shared';
import { escapeTags, makeBar, truncate } from '../formatters';
import type { SelectorMode } from './LabelSelector';

const BAR_WIDTH = 10;

export function modeLabel(mode: SelectorMode): string {
  if (mode.kind === 'normal') return 'NORMAL';
  switch (mode.variant) {
    case 'search':
      return 'SEARCH';
    case 'scopeAdd':
      return 'SCOPE+';
    case 'reviewLookup':
      return 'REVIEW';
  }
}

export function modeHints(mode: SelectorMode): string {
  if (mode.kind === 'insert') return 'Enter select  Esc normal mode  ↑/↓ move';
  return 'j/k move  i search  s add scope  r review by id  Enter select  Esc back';
}

/** One selector row, its text truncated to `width` visible columns. */
export function formatSelectorRow(item: SelectorItem, selected: boolean, width: number): string {
  const cursor = selected ? '{cyan-fg}▸{/cyan-fg} ' : '  ';

  switch (item.type) {
    case 'epic': {
      const stats = ` ${makeBar(item.progress * 100, BAR_WIDTH)} ${item.closedCount}/${item.issueCount}`;
      const id = ` ${item.value}`;
      const title = truncate(item.title, Math.max(5, width - 4 - id.length - stats.length));
      return `${cursor}{magenta-fg}◆{/magenta-fg} {bold}${escapeTags(title)}{/bold}{grey-fg}${escapeTags(id)}{/grey-fg}{green-fg}${stats}{/green-fg}`;
    }
    case 'label': {
      const count = item.overlapCount > 0
        ? ` (${item.overlapCount} of ${item.issueCount})`
        : ` (${item.issueCount})`;
      const name = truncate(item.value, Math.max(5, width - 3 - count.length));
      return `${cursor}{cyan-fg}#{/cyan-fg}${escapeTags(name)}{grey-fg}${count}{/grey-fg}`;
    }
    case 'issue': {
      const title = truncate(item.title, Math.max(5, width - 3 - item.value.length));
      const style = item.closedCount > 0 ? 'dim' : 'white-fg';
      return `${cursor}{blue-fg}${escapeTags(item.value)}{/blue-fg} {${style}}${escapeTags(title)}{/${style}}`;
    }
  }
}
