import { describe, it, expect } from 'vitest';
import {
  buildChildrenMap,
  buildIssueFilter,
  countEpicChildren,
  flattenTree,
  nextStatusFilter,
} from './treeFlattener';
import type { IssueFilterOptions } from './treeFlattener';
import { makeChild, makeIssue, childOf } from '../testing/fixtures';

const ALL: IssueFilterOptions = { status: 'all', search: '', labels: [] };

describe('flattenTree', () => {
  it('flattens a root and its blocked child', () => {
    const root = makeIssue({ id: 'bv-1', status: 'open' });
    const child = makeChild('bv-1.1', 'bv-1', { status: 'blocked' });
    const issues = [root, child];

    const all = flattenTree(root, issues, buildIssueFilter(ALL));
    expect(all.map(n => n.issue.id)).toEqual(['bv-1', 'bv-1.1']);
    expect(all[0].treePrefix).toBe('');
    expect(all[0].depth).toBe(0);
    expect(all[1].treePrefix).toBe('└─ ');
    expect(all[1].depth).toBe(1);
    expect(all[1].isLast).toBe(true);

    const revision = flattenTree(root, issues, buildIssueFilter({ ...ALL, status: 'needs_revision' }));
    expect(revision.map(n => n.issue.id)).toEqual(['bv-1']);
  });

  it('draws continuation and blank glyphs from the ancestor path', () => {
    const root = makeIssue({ id: 'r' });
    const issues = [
      root,
      makeChild('r.2', 'r'),
      makeChild('r.1', 'r'),
      makeChild('r.1.2', 'r.1'),
      makeChild('r.1.1', 'r.1'),
      makeChild('r.2.1', 'r.2'),
    ];

    const nodes = flattenTree(root, issues, buildIssueFilter(ALL));
    expect(nodes.map(n => [n.issue.id, n.treePrefix])).toEqual([
      ['r', ''],
      ['r.1', '├─ '],
      ['r.1.1', '│  ├─ '],
      ['r.1.2', '│  └─ '],
      ['r.2', '└─ '],
      ['r.2.1', '   └─ '],
    ]);
    expect(nodes.find(n => n.issue.id === 'r.2.1')?.parentPath).toEqual([true, true, true]);
  });

  it('orders siblings by priority before id', () => {
    const root = makeIssue({ id: 'r' });
    const issues = [
      root,
      makeChild('r.1', 'r', { priority: 3 }),
      makeChild('r.2', 'r', { priority: 0 }),
      makeChild('r.10', 'r', { priority: 3 }),
      makeChild('r.9', 'r', { priority: 3 }),
    ];
    const nodes = flattenTree(root, issues, buildIssueFilter(ALL));
    expect(nodes.map(n => n.issue.id)).toEqual(['r', 'r.2', 'r.1', 'r.9', 'r.10']);
  });

  it('keeps visiting the children of filtered-out nodes', () => {
    const root = makeIssue({ id: 'r' });
    const issues = [
      root,
      makeChild('r.1', 'r'),
      makeChild('r.1.1', 'r.1', { reviewStatus: 'needs_revision' }),
      makeChild('r.2', 'r'),
    ];
    const nodes = flattenTree(root, issues, buildIssueFilter({ ...ALL, status: 'needs_revision' }));
    expect(nodes.map(n => n.issue.id)).toEqual(['r', 'r.1.1']);
    expect(nodes[1].depth).toBe(2);
    expect(nodes[1].treePrefix).toBe('│  └─ ');
  });

  it('includes the root even when it fails the filter', () => {
    const root = makeIssue({ id: 'r', reviewStatus: 'approved' });
    const nodes = flattenTree(root, [root, makeChild('r.1', 'r')], buildIssueFilter({ ...ALL, status: 'unreviewed' }));
    expect(nodes.map(n => n.issue.id)).toEqual(['r', 'r.1']);
  });

  it('emits each reachable issue once', () => {
    const root = makeIssue({ id: 'r' });
    const shared = makeIssue({ id: 'r.3', dependencies: [childOf('r.3', 'r.1'), childOf('r.3', 'r.2')] });
    const issues = [root, makeChild('r.1', 'r'), makeChild('r.2', 'r'), shared, makeIssue({ id: 'other' })];
    const ids = flattenTree(root, issues, buildIssueFilter(ALL)).map(n => n.issue.id);
    expect(ids).toEqual(['r', 'r.1', 'r.3', 'r.2']);
  });

  it('keeps a two-parent issue under the shallower parent with the corner glyph', () => {
    const root = makeIssue({ id: 'r' });
    const issues = [
      root,
      makeChild('r.1', 'r', { priority: 0 }),
      makeIssue({ id: 'r.2', priority: 1, dependencies: [childOf('r.2', 'r'), childOf('r.2', 'r.1')] }),
      makeChild('r.2.1', 'r.2'),
    ];
    const nodes = flattenTree(root, issues, buildIssueFilter(ALL));
    expect(nodes.map(n => [n.issue.id, n.treePrefix])).toEqual([
      ['r', ''],
      ['r.1', '├─ '],
      ['r.2', '└─ '],
      ['r.2.1', '   └─ '],
    ]);
    expect(nodes.find(n => n.issue.id === 'r.2.1')?.parentPath).toEqual([true, true, true]);
  });

  it('terminates on parent-child cycles', () => {
    const a = makeIssue({ id: 'a', dependencies: [childOf('a', 'b')] });
    const b = makeChild('b', 'a');
    const ids = flattenTree(a, [a, b], buildIssueFilter(ALL)).map(n => n.issue.id);
    expect(ids).toEqual(['a', 'b']);
  });

  it('returns only the root for a leaf', () => {
    const root = makeIssue({ id: 'solo' });
    expect(flattenTree(root, [root], buildIssueFilter(ALL))).toHaveLength(1);
  });
});

describe('buildIssueFilter', () => {
  const issue = makeIssue({ id: 'bv-42', title: 'Wire Auth Middleware', labels: ['Backend', 'urgent'] });

  it('matches search against title or id, ignoring case', () => {
    expect(buildIssueFilter({ ...ALL, search: 'auth' })(issue)).toBe(true);
    expect(buildIssueFilter({ ...ALL, search: 'BV-4' })(issue)).toBe(true);
    expect(buildIssueFilter({ ...ALL, search: 'frontend' })(issue)).toBe(false);
  });

  it('requires every active label', () => {
    expect(buildIssueFilter({ ...ALL, labels: ['backend'] })(issue)).toBe(true);
    expect(buildIssueFilter({ ...ALL, labels: ['backend', 'URGENT'] })(issue)).toBe(true);
    expect(buildIssueFilter({ ...ALL, labels: ['backend', 'docs'] })(issue)).toBe(false);
  });

  it('treats an explicit unreviewed status like an absent one', () => {
    const unreviewed = buildIssueFilter({ ...ALL, status: 'unreviewed' });
    expect(unreviewed(makeIssue({ id: 'x' }))).toBe(true);
    expect(unreviewed(makeIssue({ id: 'x', reviewStatus: 'unreviewed' }))).toBe(true);
    expect(unreviewed(makeIssue({ id: 'x', reviewStatus: 'deferred' }))).toBe(false);
  });

  it('combines all criteria', () => {
    const filter = buildIssueFilter({ status: 'needs_revision', search: 'auth', labels: ['urgent'] });
    expect(filter(issue)).toBe(false);
    expect(filter({ ...issue, reviewStatus: 'needs_revision' })).toBe(true);
  });
});

describe('buildChildrenMap', () => {
  it('ignores non parent-child edges', () => {
    const blocker = makeIssue({ id: 'b' });
    const blocked = makeIssue({ id: 'c', dependencies: [{ issueId: 'c', dependsOnId: 'b', type: 'blocks' }] });
    expect(buildChildrenMap([blocker, blocked]).size).toBe(0);
  });
});

describe('countEpicChildren', () => {
  it('counts every descendant and the closed ones', () => {
    const issues = [
      makeIssue({ id: 'e', issueType: 'epic' }),
      makeChild('e.1', 'e', { status: 'closed' }),
      makeChild('e.2', 'e'),
      makeChild('e.2.1', 'e.2', { status: 'closed' }),
      makeIssue({ id: 'x', status: 'closed' }),
    ];
    expect(countEpicChildren('e', issues)).toEqual({ total: 3, closed: 2 });
  });

  it('returns zeros for an unknown or childless id', () => {
    expect(countEpicChildren('missing', [])).toEqual({ total: 0, closed: 0 });
  });

  it('counts each node once under a cycle', () => {
    const issues = [
      makeIssue({ id: 'e', dependencies: [childOf('e', 'e.1')] }),
      makeChild('e.1', 'e'),
    ];
    expect(countEpicChildren('e', issues)).toEqual({ total: 1, closed: 0 });
  });
});

describe('nextStatusFilter', () => {
  it('cycles through every filter', () => {
    expect(nextStatusFilter('all')).toBe('unreviewed');
    expect(nextStatusFilter('unreviewed')).toBe('needs_revision');
    expect(nextStatusFilter('needs_revision')).toBe('all');
  });
});
