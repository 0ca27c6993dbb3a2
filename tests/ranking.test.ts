import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';
import { assignRanks, compareNames, compareStanding, fingerprint, totalTally } from '../src/utils/ranking';

describe('ranking helpers', () => {
  it('orders names by code unit, so uppercase sorts first', () => {
    expect(['b', 'B', 'a', 'A'].sort(compareNames)).toEqual(['A', 'B', 'a', 'b']);
  });

  it('orders standings by tally descending then name', () => {
    const rows = [
      { name: 'Zelda', tally: 5 },
      { name: 'Celeste', tally: 9 },
      { name: 'Antichamber', tally: 5 }
    ].sort(compareStanding);
    expect(assignRanks(rows)).toEqual([
      { rank: 1, name: 'Celeste', tally: 9 },
      { rank: 2, name: 'Antichamber', tally: 5 },
      { rank: 3, name: 'Zelda', tally: 5 }
    ]);
    expect(totalTally(rows)).toBe(19);
  });

  it('fingerprints an empty data set as an empty string', () => {
    expect(fingerprint([])).toBe('');
  });

  it('fingerprints independently of row order', () => {
    const expected = createHash('md5').update('Chess:11|Go:3').digest('hex');
    expect(fingerprint([{ name: 'Go', tally: 3 }, { name: 'Chess', tally: 11 }])).toBe(expected);
    expect(fingerprint([{ name: 'Chess', tally: 11 }, { name: 'Go', tally: 3 }])).toBe(expected);
  });

  it('changes when any tally changes', () => {
    expect(fingerprint([{ name: 'Chess', tally: 11 }])).not.toBe(fingerprint([{ name: 'Chess', tally: 12 }]));
  });
});
