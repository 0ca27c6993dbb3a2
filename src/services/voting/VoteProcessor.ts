import type { VoteWeights } from '../../config/voting';
import type { RedemptionEvent, VoteResult } from '../../types';
import type { RedemptionSource, VoteStore } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import type { GameResolver, Resolution } from '../resolution/GameResolver';
import type { InaccurateInputLog } from '../storage/InaccurateInputLog';
import type { ProcessedEventLog } from '../storage/ProcessedEventLog';
import type { RankAnnouncer } from './RankAnnouncer';
import type { VoteQueue } from './VoteQueue';

export type ProcessOutcome =
  | { status: 'applied'; resolution: Exclude<Resolution, { kind: 'empty' }>; result: VoteResult }
  | { status: 'empty' };

export interface VoteProcessorDeps {
  queue: VoteQueue<RedemptionEvent>;
  resolver: GameResolver;
  store: Pick<VoteStore, 'applyVote'>;
  source: Pick<RedemptionSource, 'markFulfilled'>;
  processed: Pick<ProcessedEventLog, 'add'>;
  inaccurate: Pick<InaccurateInputLog, 'record'>;
  announcer: Pick<RankAnnouncer, 'announce'>;
  weights: VoteWeights;
  /** Invoked after every event leaves the pipeline, whatever the outcome */
  onDrained?: (event: RedemptionEvent) => void;
  logger?: Logger;
}

/**
 * Single consumer of the vote queue. Events are applied strictly in
 * arrival order; one failing event never stops the loop.
 */
export class VoteProcessor {
  private loop: Promise<void> | null = null;
  private processedCount = 0;
  private failedCount = 0;
  private readonly logger: Logger;

  constructor(private readonly deps: VoteProcessorDeps) {
    this.logger = deps.logger ?? defaultLogger;
  }

  start(): void {
    if (this.loop) {
      this.logger.warn('⚠️  Vote processor is already running');
      return;
    }
    this.loop = this.run();
    this.logger.info('✅ Vote processor started');
  }

  /** Close the queue, let already admitted votes drain and wait for the loop */
  async stop(): Promise<void> {
    this.deps.queue.close();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    this.logger.info(`🛑 Vote processor stopped (${this.processedCount} processed, ${this.failedCount} failed)`);
  }

  async run(): Promise<void> {
    for (let event = await this.deps.queue.pop(); event !== null; event = await this.deps.queue.pop()) {
      try {
        await this.process(event);
        this.processedCount++;
      } catch (error) {
        this.failedCount++;
        this.logger.error(`❌ Vote ${event.eventId} from ${event.actor} could not be processed`, error);
      } finally {
        this.deps.onDrained?.(event);
      }
    }
  }

  getStatus(): { running: boolean; queued: number; processed: number; failed: number } {
    return {
      running: this.loop !== null,
      queued: this.deps.queue.size,
      processed: this.processedCount,
      failed: this.failedCount
    };
  }

  async process(event: RedemptionEvent): Promise<ProcessOutcome> {
    const { resolver, store, source, processed, inaccurate, announcer, weights } = this.deps;

    const resolution = await resolver.resolve(event.rawText);
    if (resolution.kind === 'empty') {
      await inaccurate.record(event.rawText);
      await this.fulfil(event);
      await processed.add(event.eventId);
      return { status: 'empty' };
    }

    const weight = weights[event.kind];
    const result = await store.applyVote(resolution.name, weight, event.actor, event.kind);
    this.logger.info(
      result.created
        ? `✅ New game "${result.name}" added with ${result.tally} votes`
        : `✅ "${result.name}" now has ${result.tally} votes (+${weight})`
    );

    try {
      await processed.add(event.eventId);
    } catch (error) {
      // The vote is already counted; a redelivery would count it twice
      this.logger.error(`❌ Could not persist processed id ${event.eventId}`, error);
    }

    await Promise.allSettled([this.fulfil(event), announcer.announce(event.actor, result.name, result.tally)]);

    if (result.created) {
      resolver.invalidate();
      try {
        await resolver.refresh();
      } catch (error) {
        this.logger.warn(`Game list refresh failed: ${errorMessage(error)}`);
      }
    }

    return { status: 'applied', resolution, result };
  }

  private async fulfil(event: RedemptionEvent): Promise<void> {
    try {
      const fulfilled = await this.deps.source.markFulfilled(event.sourceRef);
      if (!fulfilled) {
        this.logger.warn(`Redemption ${event.eventId} was not marked fulfilled`);
      }
    } catch (error) {
      this.logger.warn(`Fulfilling redemption ${event.eventId} failed: ${errorMessage(error)}`);
    }
  }
}
