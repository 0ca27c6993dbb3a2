import { SyncPolicy } from '../../config/voting';
import type { VoteMirror, VoteStore } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { fingerprint } from '../../utils/ranking';
import { toMirrorValues } from '../sheets/MirrorTable';
import type { SafetyVerdict, SyncSafetyService } from './SyncSafetyService';

export type SyncCycleResult =
  | { status: 'idle' }
  | { status: 'busy' }
  | { status: 'cooldown' }
  | { status: 'stopped' }
  | { status: 'empty-store' }
  | { status: 'unsafe'; verdict: SafetyVerdict }
  | { status: 'pushed'; games: number; fingerprint: string }
  | { status: 'failed'; error: string };

export interface SyncWorkerStatus {
  running: boolean;
  consecutiveUnsafe: number;
  consecutiveFailures: number;
  cooldownUntil: Date | null;
  pushes: number;
  lastResult: SyncCycleResult['status'] | null;
}

export interface SheetsSyncWorkerOptions {
  unsafeWarningAfter?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * One-directional store -> mirror replication. Each cycle pushes the full
 * leaderboard when there are unsynced changes and the conflict check
 * allows it.
 */
export class SheetsSyncWorker {
  private inflight: Promise<SyncCycleResult> | null = null;
  private stopped = false;
  private consecutiveUnsafe = 0;
  private consecutiveFailures = 0;
  private cooldownUntil = 0;
  private pushes = 0;
  private lastResult: SyncCycleResult['status'] | null = null;

  private readonly unsafeWarningAfter: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly store: Pick<VoteStore, 'getSyncState' | 'listAllSorted' | 'markSynced'>,
    private readonly mirror: VoteMirror,
    private readonly safety: Pick<SyncSafetyService, 'check'>,
    options: SheetsSyncWorkerOptions = {}
  ) {
    this.unsafeWarningAfter = options.unsafeWarningAfter ?? SyncPolicy.UNSAFE_WARNING_AFTER;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Scheduled entry point; overlapping calls report `busy` */
  runCycle(): Promise<SyncCycleResult> {
    if (this.stopped) {
      return Promise.resolve({ status: 'stopped' });
    }
    if (this.inflight) {
      return Promise.resolve({ status: 'busy' });
    }
    if (this.now() < this.cooldownUntil) {
      return Promise.resolve({ status: 'cooldown' });
    }
    return this.track(this.cycle());
  }

  /**
   * Push immediately. With `force` the conflict check is skipped and the
   * configured mirror id is recorded as the store's mirror.
   */
  async push(options: { force?: boolean } = {}): Promise<SyncCycleResult> {
    // Another waiter may start a cycle first; start ours only once none is running
    while (this.inflight) {
      await this.inflight;
    }
    return this.track(options.force ? this.forcePush() : this.cycle());
  }

  /** Stop scheduling, wait for a running cycle, then make one last push attempt */
  async shutdown(): Promise<SyncCycleResult> {
    this.stopped = true;
    while (this.inflight) {
      await this.inflight;
    }
    const result = await this.track(this.cycle());
    if (result.status === 'pushed') {
      this.logger.info('✅ Final mirror sync completed');
    } else if (result.status !== 'idle') {
      this.logger.warn(`Final mirror sync did not complete: ${result.status}`);
    }
    return result;
  }

  getStatus(): SyncWorkerStatus {
    return {
      running: !this.stopped,
      consecutiveUnsafe: this.consecutiveUnsafe,
      consecutiveFailures: this.consecutiveFailures,
      cooldownUntil: this.cooldownUntil > this.now() ? new Date(this.cooldownUntil) : null,
      pushes: this.pushes,
      lastResult: this.lastResult
    };
  }

  private async track(work: Promise<SyncCycleResult>): Promise<SyncCycleResult> {
    this.inflight = work;
    try {
      const result = await work;
      this.lastResult = result.status;
      return result;
    } finally {
      if (this.inflight === work) {
        this.inflight = null;
      }
    }
  }

  private async cycle(): Promise<SyncCycleResult> {
    try {
      const state = await this.store.getSyncState();
      if (state.pendingChanges === 0) {
        return { status: 'idle' };
      }

      const verdict = await this.safety.check();
      if (!verdict.safe) {
        this.onUnsafe(verdict);
        return { status: 'unsafe', verdict };
      }
      this.consecutiveUnsafe = 0;

      return await this.write(state.pendingChanges);
    } catch (error) {
      return this.onFailure(error);
    }
  }

  private async forcePush(): Promise<SyncCycleResult> {
    try {
      const state = await this.store.getSyncState();
      this.logger.warn('⚠️  Forced mirror sync: conflict check skipped');
      return await this.write(state.pendingChanges);
    } catch (error) {
      return this.onFailure(error);
    }
  }

  private async write(pendingChanges: number): Promise<SyncCycleResult> {
    const games = await this.store.listAllSorted();
    if (games.length === 0) {
      // An empty push would blank the mirror
      this.logger.warn('⚠️  Store has no games, mirror sync skipped');
      return { status: 'empty-store' };
    }

    await this.mirror.writeValues(toMirrorValues(games));
    const written = fingerprint(games.map(game => ({ name: game.name, tally: game.tally })));
    await this.store.markSynced(this.mirror.id, written, pendingChanges);

    this.pushes++;
    this.consecutiveFailures = 0;
    this.logger.debug(`📊 Mirror synced (${games.length} games)`);
    return { status: 'pushed', games: games.length, fingerprint: written };
  }

  private onUnsafe(verdict: SafetyVerdict): void {
    this.consecutiveUnsafe++;
    const detail = { action: verdict.action, consecutive: this.consecutiveUnsafe };
    if (this.consecutiveUnsafe >= this.unsafeWarningAfter) {
      this.logger.warn(
        `🚨 Mirror sync blocked for ${this.consecutiveUnsafe} cycles: ${verdict.reason}. ` +
          'Votes keep being counted; resolve the conflict or restart with --force-sync',
        detail
      );
    } else {
      this.logger.info(`Mirror sync skipped: ${verdict.reason}`, detail);
    }
  }

  private onFailure(error: unknown): SyncCycleResult {
    this.consecutiveFailures++;
    this.logger.error('❌ Mirror sync failed', error);

    if (this.consecutiveFailures >= SyncPolicy.FAILURE_WARNING_AFTER) {
      this.logger.warn(`⚠️  Mirror sync has failed ${this.consecutiveFailures} times in a row`);
    }
    if (this.consecutiveFailures >= SyncPolicy.FAILURE_COOLDOWN_AFTER) {
      this.cooldownUntil = this.now() + SyncPolicy.FAILURE_COOLDOWN_MS;
      this.consecutiveFailures = 0;
      this.logger.warn(`⚠️  Too many sync failures, pausing for ${SyncPolicy.FAILURE_COOLDOWN_MS / 1000}s`);
    }
    return { status: 'failed', error: errorMessage(error) };
  }
}
