import axios, { AxiosInstance } from 'axios';
import type { ChatNotifier } from '../../types/interfaces';
import { httpStatusOf, toExternalServiceError } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { HELIX_URL, helixHeaders } from './helix';
import type { TwitchTokenManager } from './TwitchTokenManager';

const MAX_MESSAGE_LENGTH = 500;

/**
 * Sends chat messages as the bot account
 */
export class TwitchChatService implements ChatNotifier {
  constructor(
    private readonly broadcasterId: string,
    private readonly botUserId: string,
    private readonly tokens: TwitchTokenManager,
    private readonly http: AxiosInstance = axios,
    private readonly logger: Logger = defaultLogger
  ) {}

  async postMessage(message: string): Promise<void> {
    try {
      await this.http.post(
        `${HELIX_URL}/chat/messages`,
        {
          broadcaster_id: this.broadcasterId,
          sender_id: this.botUserId,
          message: message.slice(0, MAX_MESSAGE_LENGTH)
        },
        { headers: await helixHeaders(this.tokens) }
      );
      this.logger.info(`💬 Chat message sent: ${message}`);
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 401) {
        this.tokens.invalidate();
      } else if (status === 403) {
        this.logger.warn('Bot is not allowed to chat: check the user:write:chat scope and moderator status');
      }
      throw toExternalServiceError('Twitch Chat', error);
    }
  }
}
