import { createHash } from 'crypto';
import type { MirrorRow, RankedGame } from '../types';

/**
 * Binary (code unit) order; matches `COLLATE "C"` for the titles we store
 * and never depends on the host locale.
 */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Leaderboard order: tally descending, then name ascending */
export function compareStanding(a: MirrorRow, b: MirrorRow): number {
  return b.tally - a.tally || compareNames(a.name, b.name);
}

/** Rank by position; `rows` must already be in leaderboard order */
export function assignRanks(rows: MirrorRow[]): RankedGame[] {
  return rows.map((row, index) => ({ rank: index + 1, name: row.name, tally: row.tally }));
}

export function totalTally(rows: MirrorRow[]): number {
  return rows.reduce((sum, row) => sum + row.tally, 0);
}

/**
 * Content hash over (name, tally) pairs, independent of row order.
 * An empty data set hashes to ''.
 */
export function fingerprint(rows: MirrorRow[]): string {
  if (rows.length === 0) {
    return '';
  }
  const payload = [...rows]
    .sort((a, b) => compareNames(a.name, b.name) || a.tally - b.tally)
    .map(row => `${row.name}:${row.tally}`)
    .join('|');
  return createHash('md5').update(payload).digest('hex');
}
