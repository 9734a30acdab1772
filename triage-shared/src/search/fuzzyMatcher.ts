/**
 * Fuzzy ranking for the selector's free-text search.
 *
 * @module search/fuzzyMatcher
 */

import Fuse from 'fuse.js';

export interface FuzzyMatch {
  /** Index into the searched list. */
  index: number;
  /** 0 is a perfect match, 1 a complete mismatch. */
  score: number;
}

export interface FuzzyMatcher {
  /** Best matches first. An empty query matches nothing. */
  find(query: string, candidates: readonly string[]): FuzzyMatch[];
}

export interface FuseMatcherOptions {
  threshold?: number;
}

export class FuseMatcher implements FuzzyMatcher {
  private readonly threshold: number;

  constructor(options: FuseMatcherOptions = {}) {
    this.threshold = options.threshold ?? 0.4;
  }

  find(query: string, candidates: readonly string[]): FuzzyMatch[] {
    const q = query.trim();
    if (!q || candidates.length === 0) return [];

    const fuse = new Fuse([...candidates], {
      includeScore: true,
      ignoreLocation: true,
      threshold: this.threshold,
    });

    return fuse.search(q).map(result => ({
      index: result.refIndex,
      score: result.score ?? 0,
    }));
  }
}
