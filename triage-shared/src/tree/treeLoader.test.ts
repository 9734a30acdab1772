import { describe, it, expect } from 'vitest';
import { blockingIdsOf, loadReviewTree, treeIssues } from './treeLoader';
import { IssueNotFoundError } from '../errors';
import { blockedBy, makeChild, makeIssue } from '../testing/fixtures';

describe('loadReviewTree', () => {
  const issues = [
    makeIssue({ id: 'bv-1' }),
    makeChild('bv-1.1', 'bv-1'),
    makeChild('bv-1.2', 'bv-1', { dependencies: [{ issueId: 'bv-1.2', dependsOnId: 'bv-1', type: 'parent-child' }, blockedBy('bv-1.2', 'bv-9')] }),
    makeChild('bv-1.1.1', 'bv-1.1', { dependencies: [{ issueId: 'bv-1.1.1', dependsOnId: 'bv-1.1', type: 'parent-child' }, blockedBy('bv-1.1.1', 'bv-1.2')] }),
    makeIssue({ id: 'bv-9', title: 'Outside blocker' }),
    makeIssue({ id: 'bv-2' }),
  ];

  it('collects descendants breadth-first', () => {
    const tree = loadReviewTree('bv-1', issues);
    expect(tree.root.id).toBe('bv-1');
    expect(tree.descendants.map(i => i.id)).toEqual(['bv-1.1', 'bv-1.2', 'bv-1.1.1']);
    expect(treeIssues(tree).map(i => i.id)).toEqual(['bv-1', 'bv-1.1', 'bv-1.2', 'bv-1.1.1']);
  });

  it('reports only blockers outside the tree', () => {
    const tree = loadReviewTree('bv-1', issues);
    expect(tree.blockers.map(i => i.id)).toEqual(['bv-9']);
  });

  it('indexes the whole collection', () => {
    const tree = loadReviewTree('bv-1', issues);
    expect(tree.issueMap.get('bv-2')?.id).toBe('bv-2');
    expect(tree.issueMap.size).toBe(6);
  });

  it('throws IssueNotFoundError for an unknown root', () => {
    expect(() => loadReviewTree('bv-404', issues)).toThrow(IssueNotFoundError);
    expect(() => loadReviewTree('bv-404', issues)).toThrow('issue not found: bv-404');
  });

  it('loads a leaf with no descendants', () => {
    const tree = loadReviewTree('bv-2', issues);
    expect(tree.descendants).toEqual([]);
    expect(tree.blockers).toEqual([]);
  });
});

describe('blockingIdsOf', () => {
  it('lists blocks edges only', () => {
    const issue = issues();
    expect(blockingIdsOf(issue)).toEqual(['bv-7']);
  });

  function issues() {
    return makeChild('bv-3', 'bv-1', {
      dependencies: [
        { issueId: 'bv-3', dependsOnId: 'bv-1', type: 'parent-child' },
        blockedBy('bv-3', 'bv-7'),
        { issueId: 'bv-3', dependsOnId: 'bv-8', type: 'related' },
      ],
    });
  }
});
