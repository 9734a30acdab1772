import { describe, it, expect } from 'vitest';
import { CommentReviewSaver, JsonReviewSaver } from 'triage-shared';
import { createSaver, describeTarget, mergeLabels } from './review';

describe('createSaver', () => {
  it('posts comments by default', () => {
    expect(createSaver({ kind: 'comments' }, '/ws')).toBeInstanceOf(CommentReviewSaver);
  });

  it('writes JSON for a file target', () => {
    expect(createSaver({ kind: 'json', filePath: '/ws/reviews.json' }, '/ws')).toBeInstanceOf(JsonReviewSaver);
  });
});

describe('describeTarget', () => {
  it('names the destination', () => {
    expect(describeTarget({ kind: 'comments' })).toBe('bd comments');
    expect(describeTarget({ kind: 'json', filePath: '/ws/reviews.json' })).toBe('/ws/reviews.json');
  });
});

describe('mergeLabels', () => {
  it('drops case-insensitive duplicates, keeping the first spelling', () => {
    expect(mergeLabels(['UI', 'api'], ['ui', 'docs'])).toEqual(['UI', 'api', 'docs']);
  });
});
