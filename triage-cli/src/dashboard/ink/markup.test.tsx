import { describe, it, expect } from 'vitest';
import React from 'react';
import { parseMarkup, parseMarkupLines } from './markup';

type Props = { children?: React.ReactNode } & Record<string, unknown>;

// Serializes an element tree, omitting undefined props
function serialize(node: React.ReactNode): string {
  if (node === null || node === undefined || typeof node === 'boolean') return '';
  if (typeof node === 'string' || typeof node === 'number') return String(node);
  if (Array.isArray(node)) return node.map(serialize).join('');
  if (React.isValidElement<Props>(node)) {
    const { children, ...props } = node.props;
    const tag = typeof node.type === 'string' ? node.type : node.type.name || 'Fragment';
    const attrs = Object.entries(props)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => ` ${k}=${JSON.stringify(v)}`)
      .join('');
    return `<${tag}${attrs}>${serialize(children)}</${tag}>`;
  }
  return '';
}

describe('parseMarkup', () => {
  it('returns plain text unchanged', () => {
    expect(parseMarkup('Hello World')).toBe('Hello World');
  });

  it('returns null for empty string', () => {
    expect(parseMarkup('')).toBeNull();
  });

  it('handles bold tag', () => {
    expect(serialize(parseMarkup('{bold}Hello{/bold}'))).toBe('<Text bold=true>Hello</Text>');
  });

  it('maps grey to gray', () => {
    expect(serialize(parseMarkup('{grey-fg}dim{/grey-fg}'))).toBe('<Text color="gray">dim</Text>');
  });

  it('handles nested tags', () => {
    expect(serialize(parseMarkup('{bold}{magenta-fg}styled{/magenta-fg}{/bold}')))
      .toBe('<Text bold=true color="magenta">styled</Text>');
  });

  it('handles mixed plain and tagged text', () => {
    expect(serialize(parseMarkup('before {dim}middle{/dim} after')))
      .toBe('<Fragment><Text>before </Text><Text dimColor=true>middle</Text><Text> after</Text></Fragment>');
  });

  it('renders escaped braces literally', () => {
    expect(serialize(parseMarkup('a {open}x{close} b'))).toBe('<Text>a {x} b</Text>');
  });

  it('keeps the style of an unclosed tag', () => {
    expect(serialize(parseMarkup('{underline}link'))).toBe('<Text underline=true>link</Text>');
  });

  it('balances unknown tags', () => {
    expect(serialize(parseMarkup('{bold}{center}x{/center}y{/bold}z')))
      .toBe('<Fragment><Text bold=true>x</Text><Text bold=true>y</Text><Text>z</Text></Fragment>');
  });
});

describe('parseMarkupLines', () => {
  it('returns empty array for empty string', () => {
    expect(parseMarkupLines('')).toEqual([]);
  });

  it('wraps each line in Text', () => {
    const result = parseMarkupLines('{bold}a{/bold}\n{red-fg}b{/red-fg}');
    expect(result.map(serialize)).toEqual([
      '<Text><Text bold=true>a</Text></Text>',
      '<Text><Text color="red">b</Text></Text>',
    ]);
  });
});
