import { SyncPolicy } from '../../config/voting';
import type { MirrorRow } from '../../types';
import type { VoteMirror, VoteStore } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { compareNames, fingerprint, totalTally } from '../../utils/ranking';
import { parseMirrorValues } from '../sheets/MirrorTable';

export interface SourceComparison {
  storeGames: number;
  mirrorGames: number;
  storeTotal: number;
  mirrorTotal: number;
  onlyInStore: string[];
  onlyInMirror: string[];
  tallyDifferences: Array<{ name: string; store: number; mirror: number }>;
  storeFingerprint: string;
  mirrorFingerprint: string;
}

export type SyncAction = 'sync' | 'migrate' | 'abort';

export interface SafetyVerdict {
  safe: boolean;
  action: SyncAction;
  reason: string | null;
  divergence?: boolean;
  comparison?: SourceComparison;
}

export interface SafetyInputs {
  configuredMirrorId: string;
  recordedMirrorId: string | null;
  recordedFingerprint: string | null;
  storeRows: MirrorRow[];
  mirrorRows: MirrorRow[];
}

/** Later duplicates of a name are ignored, matching migration */
function toTallyMap(rows: MirrorRow[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const row of rows) {
    if (!map.has(row.name)) {
      map.set(row.name, row.tally);
    }
  }
  return map;
}

export function compareSources(storeRows: MirrorRow[], mirrorRows: MirrorRow[]): SourceComparison {
  const store = toTallyMap(storeRows);
  const mirror = toTallyMap(mirrorRows);

  const onlyInStore = [...store.keys()].filter(name => !mirror.has(name)).sort(compareNames);
  const onlyInMirror = [...mirror.keys()].filter(name => !store.has(name)).sort(compareNames);
  const tallyDifferences: SourceComparison['tallyDifferences'] = [];
  for (const [name, storeTally] of store) {
    const mirrorTally = mirror.get(name);
    if (mirrorTally !== undefined && mirrorTally !== storeTally) {
      tallyDifferences.push({ name, store: storeTally, mirror: mirrorTally });
    }
  }
  tallyDifferences.sort((a, b) => compareNames(a.name, b.name));

  return {
    storeGames: storeRows.length,
    mirrorGames: mirrorRows.length,
    storeTotal: totalTally(storeRows),
    mirrorTotal: totalTally(mirrorRows),
    onlyInStore,
    onlyInMirror,
    tallyDifferences,
    storeFingerprint: fingerprint(storeRows),
    mirrorFingerprint: fingerprint(mirrorRows)
  };
}

/**
 * Pure decision over both data sets and the recorded sync state
 */
export function evaluateSafety(
  inputs: SafetyInputs,
  tolerance: number = SyncPolicy.MIRROR_GROWTH_TOLERANCE
): SafetyVerdict {
  const { configuredMirrorId, recordedMirrorId, recordedFingerprint, storeRows, mirrorRows } = inputs;

  if (recordedMirrorId && recordedMirrorId !== configuredMirrorId && storeRows.length > 0) {
    const comparison = compareSources(storeRows, mirrorRows);
    return {
      safe: false,
      action: 'abort',
      reason:
        `Mirror id mismatch: store was last synced to ${recordedMirrorId}, configured mirror is ${configuredMirrorId}. ` +
        `The store may have been copied from another environment. ` +
        `Store has ${comparison.storeGames} games (${comparison.storeTotal} votes), ` +
        `mirror has ${comparison.mirrorGames} games (${comparison.mirrorTotal} votes)`,
      comparison
    };
  }

  if (!recordedMirrorId && storeRows.length > 0 && mirrorRows.length > 0) {
    const comparison = compareSources(storeRows, mirrorRows);
    return {
      safe: false,
      action: 'migrate',
      reason:
        `No mirror has been imported into this store, but the mirror holds ${comparison.mirrorGames} games ` +
        `(${comparison.mirrorTotal} votes). Restart to import it, or use --force-sync to overwrite it`,
      comparison
    };
  }

  if (storeRows.length > 0 && recordedFingerprint) {
    const storeFingerprint = fingerprint(storeRows);
    const mirrorFingerprint = fingerprint(mirrorRows);
    if (storeFingerprint !== recordedFingerprint && mirrorFingerprint !== recordedFingerprint) {
      const comparison = compareSources(storeRows, mirrorRows);
      if (comparison.mirrorTotal > comparison.storeTotal * (1 + tolerance)) {
        return {
          safe: false,
          action: 'migrate',
          reason:
            `Mirror appears to hold newer data: store ${comparison.storeGames} games (${comparison.storeTotal} votes), ` +
            `mirror ${comparison.mirrorGames} games (${comparison.mirrorTotal} votes). A push would overwrite it`,
          comparison
        };
      }
      return { safe: true, action: 'sync', reason: null, divergence: true, comparison };
    }
  }

  return { safe: true, action: 'sync', reason: null };
}

/**
 * Decides whether overwriting the mirror with the store would destroy data
 */
export class SyncSafetyService {
  constructor(
    private readonly store: Pick<VoteStore, 'getSyncState' | 'listAllSorted'>,
    private readonly mirror: VoteMirror,
    private readonly tolerance: number = SyncPolicy.MIRROR_GROWTH_TOLERANCE,
    private readonly logger: Logger = defaultLogger
  ) {}

  async readMirrorRows(): Promise<MirrorRow[]> {
    return parseMirrorValues(await this.mirror.readValues()).rows;
  }

  async check(): Promise<SafetyVerdict> {
    const [state, ranked] = await Promise.all([this.store.getSyncState(), this.store.listAllSorted()]);

    let mirrorRows: MirrorRow[];
    try {
      mirrorRows = await this.readMirrorRows();
    } catch (error) {
      return { safe: false, action: 'abort', reason: `Could not read mirror data: ${errorMessage(error)}` };
    }

    const verdict = evaluateSafety(
      {
        configuredMirrorId: this.mirror.id,
        recordedMirrorId: state.mirrorId,
        recordedFingerprint: state.mirrorFingerprint,
        storeRows: ranked.map(game => ({ name: game.name, tally: game.tally })),
        mirrorRows
      },
      this.tolerance
    );

    if (verdict.divergence && verdict.comparison) {
      this.logger.info('Store and mirror both changed since the last sync; the store wins', {
        storeTotal: verdict.comparison.storeTotal,
        mirrorTotal: verdict.comparison.mirrorTotal
      });
    }
    return verdict;
  }
}
