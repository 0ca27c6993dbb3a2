import { describe, expect, it } from 'vitest';
import { compareSources, evaluateSafety, SyncSafetyService } from '../src/services/sync/SyncSafetyService';
import type { MirrorRow } from '../src/types';
import { fingerprint } from '../src/utils/ranking';
import { FakeMirror, silentLogger } from './helpers/fakes';
import { InMemoryVoteStore } from './helpers/InMemoryVoteStore';

const storeRows: MirrorRow[] = [
  { name: 'Chess', tally: 20 },
  { name: 'Go', tally: 10 }
];

describe('compareSources', () => {
  it('reports names on one side only and differing tallies', () => {
    const comparison = compareSources(storeRows, [
      { name: 'Go', tally: 12 },
      { name: 'Tetris', tally: 4 }
    ]);

    expect(comparison).toMatchObject({
      storeGames: 2,
      mirrorGames: 2,
      storeTotal: 30,
      mirrorTotal: 16,
      onlyInStore: ['Chess'],
      onlyInMirror: ['Tetris'],
      tallyDifferences: [{ name: 'Go', store: 10, mirror: 12 }]
    });
  });
});

describe('evaluateSafety', () => {
  const base = {
    configuredMirrorId: 'sheet-main',
    recordedMirrorId: 'sheet-main',
    recordedFingerprint: fingerprint(storeRows),
    storeRows,
    mirrorRows: storeRows
  };

  it('allows a push when nothing diverged', () => {
    expect(evaluateSafety(base)).toEqual({ safe: true, action: 'sync', reason: null });
  });

  it('aborts when the store was synced to another mirror', () => {
    const verdict = evaluateSafety({ ...base, recordedMirrorId: 'sheet-staging' });
    expect(verdict.safe).toBe(false);
    expect(verdict.action).toBe('abort');
    expect(verdict.comparison?.storeTotal).toBe(30);
  });

  it('ignores an identity mismatch while the store is empty', () => {
    expect(evaluateSafety({ ...base, recordedMirrorId: 'sheet-staging', storeRows: [] }).safe).toBe(true);
  });

  it('blocks pushes over a populated mirror the store never imported', () => {
    const verdict = evaluateSafety({ ...base, recordedMirrorId: null, recordedFingerprint: null, storeRows: [{ name: 'Chess', tally: 1 }] });
    expect(verdict).toMatchObject({ safe: false, action: 'migrate', comparison: { storeGames: 1, mirrorGames: 2 } });
  });

  it('lets an unclaimed store push to an empty mirror', () => {
    expect(evaluateSafety({ ...base, recordedMirrorId: null, recordedFingerprint: null, mirrorRows: [] })).toEqual({
      safe: true,
      action: 'sync',
      reason: null
    });
  });

  it('refuses to overwrite a mirror that grew well beyond the store', () => {
    const verdict = evaluateSafety({
      ...base,
      storeRows: [...storeRows, { name: 'Tetris', tally: 1 }],
      mirrorRows: [{ name: 'Chess', tally: 40 }]
    });
    expect(verdict).toMatchObject({ safe: false, action: 'migrate' });
  });

  it('lets the store win a divergence within the tolerance', () => {
    const verdict = evaluateSafety({
      ...base,
      storeRows: [...storeRows, { name: 'Tetris', tally: 1 }],
      mirrorRows: [{ name: 'Chess', tally: 34 }]
    });
    expect(verdict).toMatchObject({ safe: true, action: 'sync', divergence: true });
  });
});

describe('SyncSafetyService', () => {
  it('aborts when the mirror cannot be read', async () => {
    const store = new InMemoryVoteStore();
    const mirror = new FakeMirror('sheet-main');
    mirror.readFailure = new Error('quota exceeded');

    const verdict = await new SyncSafetyService(store, mirror, 0.1, silentLogger).check();

    expect(verdict).toEqual({ safe: false, action: 'abort', reason: 'Could not read mirror data: quota exceeded' });
  });

  it('aborts when the mirror layout is wrong', async () => {
    const store = new InMemoryVoteStore();
    const mirror = new FakeMirror('sheet-main', [['Name', 'Score']]);

    const verdict = await new SyncSafetyService(store, mirror, 0.1, silentLogger).check();

    expect(verdict.safe).toBe(false);
    expect(verdict.action).toBe('abort');
  });
});
