import Fuse from 'fuse.js';
import { FuzzyConfig, toFuseThreshold, toSimilarityScore } from '../config/fuzzy';

/**
 * Fuzzy matching utilities for game title resolution
 * Uses Fuse.js for fuzzy string matching
 */

export interface FuzzyMatch {
  item: string;
  score: number; // 0-100, higher is better
  index: number; // position in the candidate list
}

function normalize(text: string): string {
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/** Shorter over longer length, 1 for equal lengths */
function lengthRatio(needle: string, item: string): number {
  const length = normalize(item).length;
  return Math.min(needle.length, length) / Math.max(needle.length, length, 1);
}

export class FuzzyMatcher {
  /**
   * Find all candidates scoring at least `minScore`
   * @param query - Typed title
   * @param items - Candidate titles, in preference order
   * @param minScore - Minimum similarity (0-100)
   */
  static search(
    query: string,
    items: readonly string[],
    minScore: number = FuzzyConfig.DEFAULT_MIN_SCORE
  ): FuzzyMatch[] {
    const trimmed = query.trim();
    if (trimmed === '' || items.length === 0) {
      return [];
    }

    const fuse = new Fuse(items, {
      threshold: toFuseThreshold(minScore), // Fuse uses distance, we use similarity
      includeScore: true,
      ignoreLocation: FuzzyConfig.FUSE_CONFIG.IGNORE_LOCATION,
      ignoreFieldNorm: FuzzyConfig.FUSE_CONFIG.IGNORE_FIELD_NORM,
      isCaseSensitive: FuzzyConfig.FUSE_CONFIG.IS_CASE_SENSITIVE,
      minMatchCharLength: FuzzyConfig.MIN_MATCH_CHARACTER_LENGTH,
      shouldSort: false
    });

    const needle = normalize(trimmed);
    return fuse
      .search(trimmed)
      .map(result => ({
        item: result.item,
        score: toSimilarityScore(result.score ?? 0),
        index: result.refIndex
      }))
      .filter(match => match.score >= minScore)
      // Substrings all score 100: the exact title first, then the closest length, then candidate order
      .sort(
        (a, b) =>
          b.score - a.score ||
          Number(normalize(b.item) === needle) - Number(normalize(a.item) === needle) ||
          lengthRatio(needle, b.item) - lengthRatio(needle, a.item) ||
          a.index - b.index
      );
  }

  /**
   * Find single best match
   */
  static findBest(
    query: string,
    items: readonly string[],
    minScore: number = FuzzyConfig.DEFAULT_MIN_SCORE
  ): FuzzyMatch | null {
    const needle = normalize(query);
    const exact = needle === '' ? -1 : items.findIndex(item => normalize(item) === needle);
    if (exact !== -1) {
      return { item: items[exact], score: 100, index: exact };
    }
    const matches = this.search(query, items, minScore);
    return matches.length > 0 ? matches[0] : null;
  }
}
