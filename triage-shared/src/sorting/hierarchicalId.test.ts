import { describe, it, expect } from 'vitest';
import {
  compareHierarchicalIds,
  sortIssuesByPriority,
  sortIssuesByStatusThenPriority,
} from './hierarchicalId';
import { makeIssue } from '../testing/fixtures';

describe('compareHierarchicalIds', () => {
  const cases: Array<[string, string, -1 | 0 | 1]> = [
    ['bv-abc', 'bv-abc', 0],
    ['bv-abc.1', 'bv-abc.1', 0],
    ['bv-abc', 'bv-xyz', -1],
    ['bv-xyz', 'bv-abc', 1],
    ['bv-xyz.1', 'bv-xyz.2', -1],
    ['bv-xyz.2', 'bv-xyz.1', 1],
    ['bv-xyz.1', 'bv-xyz.10', -1],
    ['bv-xyz.9', 'bv-xyz.10', -1],
    ['bv-xyz.1', 'bv-xyz.1.1', -1],
    ['bv-xyz.1.1', 'bv-xyz.1', 1],
    ['bv-xyz.1.2', 'bv-xyz.1.10', -1],
    ['bv-xyz.a', 'bv-xyz.b', -1],
    ['bv-xyz.2', 'bv-xyz.a', -1],
    ['bv-xyz.99999999999999999999', 'bv-xyz.100000000000000000000', -1],
    ['bv-xyz.100000000000000000001', 'bv-xyz.100000000000000000000', 1],
  ];

  for (const [a, b, expected] of cases) {
    it(`compare(${a}, ${b}) = ${expected}`, () => {
      expect(compareHierarchicalIds(a, b)).toBe(expected);
    });
  }

  it('compares the base segment as a plain string', () => {
    // "bv-10" < "bv-9" lexicographically
    expect(compareHierarchicalIds('bv-10', 'bv-9')).toBe(-1);
    expect(compareHierarchicalIds('bv-10.5', 'bv-9.1')).toBe(-1);
  });

  it('is antisymmetric', () => {
    const ids = ['bv-1', 'bv-1.1', 'bv-1.2', 'bv-1.10', 'bv-1.1.3', 'bv-2', 'bv-1.x', 'bv-1.01'];
    for (const a of ids) {
      for (const b of ids) {
        expect(compareHierarchicalIds(a, b)).toBe(-compareHierarchicalIds(b, a) || 0);
      }
    }
  });

  it('returns 0 only for identical ids', () => {
    expect(compareHierarchicalIds('bv-1.1', 'bv-1.01')).not.toBe(0);
  });

  it('sorts a mixed list parent-first and numerically', () => {
    const ids = ['bv-1.10', 'bv-1.2', 'bv-1', 'bv-1.2.1', 'bv-0'];
    expect([...ids].sort(compareHierarchicalIds)).toEqual(['bv-0', 'bv-1', 'bv-1.2', 'bv-1.2.1', 'bv-1.10']);
  });
});

describe('sortIssuesByPriority', () => {
  it('orders by priority then id', () => {
    const issues = [
      makeIssue({ id: 'bv-1.10', priority: 1 }),
      makeIssue({ id: 'bv-1.3', priority: 2 }),
      makeIssue({ id: 'bv-1.2', priority: 1 }),
      makeIssue({ id: 'bv-1.1', priority: 0 }),
    ];
    expect(sortIssuesByPriority(issues).map(i => i.id)).toEqual(['bv-1.1', 'bv-1.2', 'bv-1.10', 'bv-1.3']);
  });
});

describe('sortIssuesByStatusThenPriority', () => {
  it('puts the status order first', () => {
    const order = { in_progress: 0, open: 1, blocked: 2, closed: 3 };
    const issues = [
      makeIssue({ id: 'bv-3', status: 'closed', priority: 0 }),
      makeIssue({ id: 'bv-2', status: 'open', priority: 1 }),
      makeIssue({ id: 'bv-1', status: 'open', priority: 1 }),
      makeIssue({ id: 'bv-4', status: 'in_progress', priority: 3 }),
    ];
    const sorted = sortIssuesByStatusThenPriority(issues, i => order[i.status]);
    expect(sorted.map(i => i.id)).toEqual(['bv-4', 'bv-1', 'bv-2', 'bv-3']);
  });
});
