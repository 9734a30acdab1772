import { describe, it, expect } from 'vitest';
import { ScopeFilterEngine } from './scopeFilter';
import { makeChild, makeIssue } from '../testing/fixtures';

const issues = [
  makeIssue({ id: 'i1', labels: ['backend', 'urgent', 'api'] }),
  makeIssue({ id: 'i2', labels: ['backend', 'db'] }),
  makeIssue({ id: 'i3', labels: ['backend', 'urgent'] }),
  makeIssue({ id: 'i4', labels: ['frontend', 'urgent'] }),
  makeIssue({ id: 'i5', labels: ['docs'] }),
];

const values = (items: readonly { value: string }[]) => items.map(i => i.value);

describe('ScopeFilterEngine', () => {
  it('starts with the unfiltered list', () => {
    const engine = new ScopeFilterEngine(issues);
    expect(values(engine.candidates)).toEqual(['api', 'backend', 'db', 'docs', 'frontend', 'urgent']);
    expect(engine.hasScope).toBe(false);
  });

  it('narrows to co-occurring labels ordered by overlap', () => {
    const engine = new ScopeFilterEngine(issues);
    const result = engine.addToScope('backend');
    expect(result.map(i => [i.value, i.overlapCount])).toEqual([
      ['urgent', 2],
      ['api', 1],
      ['db', 1],
    ]);
  });

  it('intersects multiple scope labels', () => {
    const engine = new ScopeFilterEngine(issues);
    engine.addToScope('backend');
    const result = engine.addToScope('urgent');
    expect(result.map(i => [i.value, i.overlapCount])).toEqual([['api', 1]]);
    expect(engine.scopeLabels).toEqual(['backend', 'urgent']);
    expect(engine.scopedIssues().map(i => i.id)).toEqual(['i1', 'i3']);
  });

  it('restores the single-label result when the last label is removed', () => {
    const engine = new ScopeFilterEngine(issues);
    const single = engine.addToScope('backend');
    engine.addToScope('urgent');
    expect(engine.removeLastScope()).toEqual(single);
    expect(engine.scopeLabels).toEqual(['backend']);
  });

  it('restores the unfiltered list on clear and on removing the only label', () => {
    const engine = new ScopeFilterEngine(issues);
    engine.addToScope('backend');
    engine.addToScope('urgent');
    expect(values(engine.clearScope())).toEqual(['api', 'backend', 'db', 'docs', 'frontend', 'urgent']);

    engine.addToScope('docs');
    expect(engine.candidates).toEqual([]);
    expect(values(engine.removeLastScope())).toEqual(['api', 'backend', 'db', 'docs', 'frontend', 'urgent']);
    expect(engine.hasScope).toBe(false);
  });

  it('ignores a duplicate label', () => {
    const engine = new ScopeFilterEngine(issues);
    const first = engine.addToScope('backend');
    expect(engine.addToScope('backend')).toEqual(first);
    expect(engine.scopeLabels).toEqual(['backend']);
  });

  it('treats removing from an empty scope as a no-op', () => {
    const engine = new ScopeFilterEngine(issues);
    expect(values(engine.removeLastScope())).toEqual(['api', 'backend', 'db', 'docs', 'frontend', 'urgent']);
    expect(engine.scopeLabels).toEqual([]);
  });

  it('matches scope labels exactly', () => {
    const engine = new ScopeFilterEngine(issues);
    expect(engine.addToScope('Backend')).toEqual([]);
  });

  it('drops epics from the scoped list', () => {
    const withEpic = [
      makeIssue({ id: 'e', issueType: 'epic', title: 'Epic', labels: ['backend'] }),
      makeChild('e.1', 'e', { labels: ['backend', 'db'] }),
    ];
    const engine = new ScopeFilterEngine(withEpic);
    expect(engine.candidates.map(i => i.type)).toEqual(['epic', 'label', 'label']);
    expect(engine.addToScope('backend').map(i => [i.type, i.value])).toEqual([['label', 'db']]);
  });
});
