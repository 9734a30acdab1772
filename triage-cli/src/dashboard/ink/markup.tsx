/**
 * Stack-based parser converting tagged strings to React/Ink nodes.
 *
 * Supports: {bold}, {underline}, {dim}, {color-fg}, {/tag}, nested tags,
 * and the literal-brace escapes {open} and {close}.
 */

import React from 'react';
import { Text } from 'ink';

function mapColor(c: string): string {
  if (c === 'grey') return 'gray';
  return c;
}

interface StyleFrame {
  bold?: boolean;
  underline?: boolean;
  dim?: boolean;
  color?: string;
}

const TAG_RE = /\{(\/?)([^}]+)\}/g;

/**
 * Parse a single line of tagged text into a React node.
 *
 * Examples:
 *   "{bold}Hello{/bold}" → <Text bold>Hello</Text>
 *   "{red-fg}Error{/red-fg}" → <Text color="red">Error</Text>
 */
export function parseMarkup(input: string): React.ReactNode {
  if (!input) return null;

  if (!input.includes('{')) {
    return input;
  }

  const segments: React.ReactNode[] = [];
  const styleStack: StyleFrame[] = [{}];
  let pending = '';
  let segKey = 0;

  const flush = () => {
    if (pending) segments.push(renderSpan(pending, currentStyle(styleStack), segKey++));
    pending = '';
  };

  let lastIndex = 0;
  let match: RegExpExecArray | null;
  TAG_RE.lastIndex = 0;

  while ((match = TAG_RE.exec(input)) !== null) {
    pending += input.slice(lastIndex, match.index);
    lastIndex = match.index + match[0].length;

    const isClose = match[1] === '/';
    const tagName = match[2];

    if (!isClose && tagName === 'open') {
      pending += '{';
      continue;
    }
    if (!isClose && tagName === 'close') {
      pending += '}';
      continue;
    }

    flush();
    if (isClose) {
      if (styleStack.length > 1) styleStack.pop();
    } else if (tagName === 'bold') {
      styleStack.push({ ...currentStyle(styleStack), bold: true });
    } else if (tagName === 'underline') {
      styleStack.push({ ...currentStyle(styleStack), underline: true });
    } else if (tagName === 'dim') {
      styleStack.push({ ...currentStyle(styleStack), dim: true });
    } else if (tagName.endsWith('-fg')) {
      styleStack.push({ ...currentStyle(styleStack), color: mapColor(tagName.slice(0, -3)) });
    } else {
      // Unknown tags carry no style; their closing tag pops this frame
      styleStack.push({ ...currentStyle(styleStack) });
    }
  }

  pending += input.slice(lastIndex);
  flush();

  if (segments.length === 0) return null;
  if (segments.length === 1) return segments[0];
  return <>{segments}</>;
}

function currentStyle(stack: StyleFrame[]): StyleFrame {
  return stack[stack.length - 1];
}

function renderSpan(text: string, style: StyleFrame, key: number): React.ReactNode {
  const hasStyle = style.bold || style.underline || style.dim || style.color;
  if (!hasStyle) {
    return <Text key={key}>{text}</Text>;
  }
  return (
    <Text
      key={key}
      bold={style.bold}
      underline={style.underline}
      dimColor={style.dim}
      color={style.color}
    >
      {text}
    </Text>
  );
}

/** One `<Text>` per line of tagged content. */
export function parseMarkupLines(content: string): React.ReactNode[] {
  if (!content) return [];
  return content.split('\n').map((line, i) => (
    <Text key={i}>{parseMarkup(line)}</Text>
  ));
}
