import type { VoteResult } from '../../types';
import type { VoteStore } from '../../types/interfaces';
import { InvalidVoteError, errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import type { GameResolver, Resolution } from '../resolution/GameResolver';
import type { RankAnnouncer } from './RankAnnouncer';

export interface ManualVoteReceipt {
  resolution: Exclude<Resolution, { kind: 'empty' }>;
  result: VoteResult;
  message: string;
}

/**
 * Operator path for adding votes by hand, e.g. for donations that arrive
 * outside the channel-point system.
 */
export class ManualVoteService {
  constructor(
    private readonly store: Pick<VoteStore, 'applyVote'>,
    private readonly resolver: GameResolver,
    private readonly announcer: Pick<RankAnnouncer, 'announce'>,
    private readonly channelName: string,
    private readonly logger: Logger = defaultLogger
  ) {}

  async submit(rawTitle: string, count: number): Promise<ManualVoteReceipt> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidVoteError('Vote count must be a positive integer');
    }

    const resolution = await this.resolver.resolve(rawTitle);
    if (resolution.kind === 'empty') {
      throw new InvalidVoteError('Game title must not be empty');
    }

    this.logger.info(`⌨️  Manual vote: ${count} for "${resolution.name}"`);
    const result = await this.store.applyVote(resolution.name, count, this.channelName, 'manual');

    if (result.created) {
      this.resolver.invalidate();
      try {
        await this.resolver.refresh();
      } catch (error) {
        this.logger.warn(`Game list refresh failed: ${errorMessage(error)}`);
      }
    }

    const message = await this.announcer.announce(this.channelName, result.name, result.tally);
    return { resolution, result, message };
  }
}
