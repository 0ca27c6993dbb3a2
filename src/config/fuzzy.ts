/**
 * Fuzzy Matching Configuration
 * Global constants for resolving typed game titles against known games
 */

export const FuzzyConfig = {
  /**
   * Default minimum similarity score (0-100, higher is more strict)
   * Used when no score is explicitly provided
   */
  DEFAULT_MIN_SCORE: 80,

  /**
   * Minimum number of characters required for a match
   * Shorter matches are ignored to avoid false positives
   */
  MIN_MATCH_CHARACTER_LENGTH: 2,

  /**
   * Fuse.js configuration
   * These settings control the behavior of the fuzzy search library
   */
  FUSE_CONFIG: {
    /**
     * Whether to ignore location when matching
     * true = match anywhere in the title, not just at the start
     */
    IGNORE_LOCATION: true,

    /**
     * Long titles are not penalised against short ones
     */
    IGNORE_FIELD_NORM: true,

    /**
     * Comparison is always case-insensitive
     */
    IS_CASE_SENSITIVE: false
  }
} as const;

/**
 * Helper to convert a 0-100 similarity score to a Fuse.js distance threshold
 * Fuse uses distance (0-1, lower is better), we use similarity (higher is better)
 */
export function toFuseThreshold(minScore: number): number {
  return (100 - minScore) / 100;
}

/**
 * Inverse of toFuseThreshold, rounded to a whole score
 */
export function toSimilarityScore(fuseDistance: number): number {
  return Math.round((1 - fuseDistance) * 100);
}
