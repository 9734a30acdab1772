/**
 * Text helpers for the review dashboard. Styled text uses `{color-fg}` /
 * `{bold}` tags, rendered by ink/markup.tsx.
 */

/** Strip style tags like `{cyan-fg}` or `{/bold}`, unescaping `{open}` and `{close}`. */
export function stripTags(text: string): string {
  return text.replace(/\{(\/?)([^}]+)\}/g, (_tag, slash: string, name: string) => {
    if (!slash && name === 'open') return '{';
    if (!slash && name === 'close') return '}';
    return '';
  });
}

/** Return the visible (non-tag) length of tagged text. */
export function visibleLength(text: string): number {
  return stripTags(text).length;
}

/** Escapes braces in user text so it renders literally. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, c => (c === '{' ? '{open}' : '{close}'));
}

/** Truncate text to maxLength, ending in an ellipsis if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 1) return text.slice(0, Math.max(0, maxLength));
  return text.slice(0, maxLength - 1) + '…';
}

/** Compact duration, e.g. `1h2m3s`, `4m0s`, `12s`. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) return `${h}h${m}m${s}s`;
  if (m > 0) return `${m}m${s}s`;
  return `${s}s`;
}

/** Build a progress bar of given width. */
export function makeBar(percent: number, width: number): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * Word-wrap plain text to a column width, preserving existing line breaks.
 * Runs of spaces collapse; blank lines are kept.
 */
export function wrapLines(text: string, width: number): string[] {
  const limit = width > 0 ? width : 40;
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      lines.push('');
      continue;
    }
    let current = '';
    for (const word of words) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= limit) {
        current += ' ' + word;
      } else {
        lines.push(current);
        current = word;
      }
    }
    lines.push(current);
  }
  return lines;
}
