import type { RankInfo } from '../../types';
import type { ChatNotifier, VoteStore } from '../../types/interfaces';
import { errorMessage } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';

export function formatVoteMessage(actor: string, game: string, tally: number, rank: RankInfo | null): string {
  if (!rank) {
    return `🎮 ${actor} voted for '${game}'! ${tally} votes! 🎮`;
  }
  return `🎮 ${actor} voted for '${game}'! Rank #${rank.rank} of ${rank.totalGames} with ${tally} votes! 🎮`;
}

/**
 * Posts the post-vote chat notice. Chat failures are logged and dropped;
 * a vote is never undone because the announcement failed.
 */
export class RankAnnouncer {
  constructor(
    private readonly store: Pick<VoteStore, 'getRank'>,
    private readonly chat: ChatNotifier,
    private readonly logger: Logger = defaultLogger
  ) {}

  async announce(actor: string, game: string, tally: number): Promise<string> {
    let rank: RankInfo | null = null;
    try {
      rank = await this.store.getRank(game);
    } catch (error) {
      this.logger.warn(`Rank lookup failed for "${game}", sending plain notice: ${errorMessage(error)}`);
    }

    const message = formatVoteMessage(actor, game, tally, rank);
    try {
      await this.chat.postMessage(message);
    } catch (error) {
      this.logger.warn(`Chat notice failed: ${errorMessage(error)}`);
    }
    return message;
  }
}
