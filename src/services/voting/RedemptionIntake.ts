import { IntakePolicy } from '../../config/voting';
import type { RedemptionEvent } from '../../types';
import type { RedemptionSource } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import type { InaccurateInputLog } from '../storage/InaccurateInputLog';
import type { ProcessedEventLog } from '../storage/ProcessedEventLog';
import type { VoteQueue } from './VoteQueue';

export interface IntakePollResult {
  admitted: number;
  alreadyCounted: number;
  inFlight: number;
  empty: number;
  skipped?: 'cooldown' | 'closed';
}

export interface RedemptionIntakeDeps {
  source: RedemptionSource;
  queue: VoteQueue<RedemptionEvent>;
  processed: Pick<ProcessedEventLog, 'has' | 'add'>;
  inaccurate: Pick<InaccurateInputLog, 'record'>;
  logger?: Logger;
  now?: () => number;
}

/**
 * Admission side of the pipeline: polls the event source and enqueues each
 * redemption at most once per process.
 */
export class RedemptionIntake {
  private readonly inFlight = new Set<string>();
  private readonly fulfilmentRetried = new Set<string>();
  private consecutiveFailures = 0;
  private cooldownUntil = 0;

  private readonly source: RedemptionSource;
  private readonly queue: VoteQueue<RedemptionEvent>;
  private readonly processed: Pick<ProcessedEventLog, 'has' | 'add'>;
  private readonly inaccurate: Pick<InaccurateInputLog, 'record'>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: RedemptionIntakeDeps) {
    this.source = deps.source;
    this.queue = deps.queue;
    this.processed = deps.processed;
    this.inaccurate = deps.inaccurate;
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? Date.now;
  }

  isInFlight(eventId: string): boolean {
    return this.inFlight.has(eventId);
  }

  /** Called once the processor has finished with an event, successfully or not */
  release(eventId: string): void {
    this.inFlight.delete(eventId);
  }

  async poll(): Promise<IntakePollResult> {
    const result: IntakePollResult = { admitted: 0, alreadyCounted: 0, inFlight: 0, empty: 0 };

    if (this.queue.isClosed) {
      return { ...result, skipped: 'closed' };
    }
    if (this.now() < this.cooldownUntil) {
      return { ...result, skipped: 'cooldown' };
    }

    let events: RedemptionEvent[];
    try {
      events = await this.source.fetchUnfulfilled();
      this.consecutiveFailures = 0;
    } catch (error) {
      this.onPollFailure(error);
      return result;
    }

    for (const event of events) {
      if (this.processed.has(event.eventId)) {
        result.alreadyCounted++;
        await this.retryFulfilment(event);
        continue;
      }
      if (this.inFlight.has(event.eventId)) {
        result.inFlight++;
        continue;
      }
      if (event.rawText.trim() === '') {
        result.empty++;
        await this.dropEmpty(event);
        continue;
      }

      if (!this.queue.push(event)) {
        break;
      }
      this.inFlight.add(event.eventId);
      result.admitted++;
      this.logger.info(`📥 [${event.kind.toUpperCase()}] New vote from ${event.actor}: "${event.rawText.trim()}"`);
    }

    return result;
  }

  /** The vote was counted earlier but the source still lists it as open */
  private async retryFulfilment(event: RedemptionEvent): Promise<void> {
    if (this.fulfilmentRetried.has(event.eventId)) {
      return;
    }
    this.fulfilmentRetried.add(event.eventId);
    try {
      await this.source.markFulfilled(event.sourceRef);
    } catch (error) {
      this.logger.warn(`Retrying fulfilment of ${event.eventId} failed: ${errorMessage(error)}`);
    }
  }

  private async dropEmpty(event: RedemptionEvent): Promise<void> {
    this.logger.warn(`⚠️  Empty vote text from ${event.actor}, fulfilling without counting`);
    await this.inaccurate.record(event.rawText);
    let fulfilled = false;
    try {
      fulfilled = await this.source.markFulfilled(event.sourceRef);
    } catch (error) {
      this.logger.warn(`Fulfilling empty vote ${event.eventId} failed: ${errorMessage(error)}`);
    }
    if (fulfilled) {
      this.fulfilmentRetried.add(event.eventId);
    }
    await this.processed.add(event.eventId);
  }

  private onPollFailure(error: unknown): void {
    this.consecutiveFailures++;
    this.logger.error(`❌ Polling redemptions failed (${this.consecutiveFailures} in a row)`, error);

    if (this.consecutiveFailures >= IntakePolicy.FAILURE_COOLDOWN_AFTER) {
      this.cooldownUntil = this.now() + IntakePolicy.FAILURE_COOLDOWN_MS;
      this.consecutiveFailures = 0;
      this.logger.warn(
        `⚠️  Redemption polling paused for ${IntakePolicy.FAILURE_COOLDOWN_MS / 1000}s after repeated failures`
      );
    }
  }
}
