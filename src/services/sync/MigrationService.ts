import type { MirrorRow } from '../../types';
import type { VoteMirror, VoteStore } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { fingerprint, totalTally } from '../../utils/ranking';
import { ParsedMirror, parseMirrorValues } from '../sheets/MirrorTable';

export type MigrationStatus = 'skipped' | 'imported' | 'declined' | 'unavailable';

export interface MigrationReport {
  status: MigrationStatus;
  imported: number;
  duplicates: number;
  malformed: number;
  blank: number;
  reason?: string;
}

/** Shown to the operator before the store is wiped */
export interface DiscrepancyReport {
  /** null when an earlier import never finished */
  recordedMirrorId: string | null;
  configuredMirrorId: string;
  storeGames: number;
  storeTotal: number;
  mirrorGames: number;
  mirrorTotal: number;
}

export type ConfirmReset = (report: DiscrepancyReport) => Promise<boolean>;

function emptyReport(status: MigrationStatus, reason?: string): MigrationReport {
  return { status, imported: 0, duplicates: 0, malformed: 0, blank: 0, reason };
}

/**
 * Start-up import of the mirror into an empty store, and the
 * operator-confirmed reset when the store belongs to another mirror.
 */
export class MigrationService {
  constructor(
    private readonly store: Pick<
      VoteStore,
      'getSyncState' | 'countGames' | 'listAllSorted' | 'setTallyAbsolute' | 'recordMirrorIdentity' | 'reset'
    >,
    private readonly mirror: VoteMirror,
    private readonly logger: Logger = defaultLogger
  ) {}

  async run(confirmReset: ConfirmReset): Promise<MigrationReport> {
    const [state, gameCount] = await Promise.all([this.store.getSyncState(), this.store.countGames()]);
    // Votes were counted, but no mirror was ever claimed: the start-up import failed
    const unclaimed = gameCount > 0 && state.mirrorId === null;
    const identityMismatch = state.mirrorId !== null && state.mirrorId !== this.mirror.id;

    if (gameCount > 0 && !identityMismatch && !unclaimed) {
      this.logger.info(`✓ Store already holds ${gameCount} games, migration skipped`);
      return emptyReport('skipped');
    }

    let parsed: ParsedMirror;
    try {
      parsed = parseMirrorValues(await this.mirror.readValues());
    } catch (error) {
      const reason = `Mirror could not be read: ${errorMessage(error)}`;
      this.logger.error(`❌ Migration unavailable. ${reason}`);
      return emptyReport('unavailable', reason);
    }

    if (unclaimed && parsed.rows.length === 0) {
      this.logger.info('Mirror is empty; the next sync will claim it for this store');
      return emptyReport('skipped');
    }

    if (gameCount > 0) {
      const storeRows = await this.store.listAllSorted();
      const report: DiscrepancyReport = {
        recordedMirrorId: state.mirrorId,
        configuredMirrorId: this.mirror.id,
        storeGames: storeRows.length,
        storeTotal: totalTally(storeRows),
        mirrorGames: parsed.rows.length,
        mirrorTotal: totalTally(parsed.rows)
      };
      this.logger.warn(
        unclaimed
          ? '🚨 Store holds votes but the mirror was never imported'
          : '🚨 Store was last synced to a different mirror',
        report
      );

      if (!(await confirmReset(report))) {
        this.logger.warn('Reset declined; keeping the existing store. Mirror pushes stay blocked until resolved');
        return emptyReport('declined');
      }
      await this.store.reset();
    }

    return this.importRows(parsed);
  }

  private async importRows(parsed: ParsedMirror): Promise<MigrationReport> {
    const report: MigrationReport = {
      ...emptyReport('imported'),
      malformed: parsed.skippedMalformed,
      blank: parsed.skippedBlank
    };
    const seen = new Set<string>();
    const imported: MirrorRow[] = [];

    for (const row of parsed.rows) {
      if (seen.has(row.name)) {
        report.duplicates++;
        this.logger.warn(`Duplicate mirror row for "${row.name}" ignored (${row.tally} votes)`);
        continue;
      }
      seen.add(row.name);
      await this.store.setTallyAbsolute(row.name, row.tally);
      imported.push(row);
    }

    await this.store.recordMirrorIdentity(this.mirror.id, fingerprint(imported));
    report.imported = imported.length;

    this.logger.info(`✓ Migration complete: ${report.imported} games imported`, {
      duplicates: report.duplicates,
      malformed: report.malformed,
      blank: report.blank
    });
    return report;
  }
}
