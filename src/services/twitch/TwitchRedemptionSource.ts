import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { IntakePolicy } from '../../config/voting';
import type { RedeemableKind, RedemptionEvent, RedemptionRef } from '../../types';
import type { RedemptionSource } from '../../types/interfaces';
import { ExternalServiceError, httpStatusOf, toExternalServiceError } from '../../utils/errors';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { HELIX_URL, helixHeaders } from './helix';
import type { TwitchTokenManager } from './TwitchTokenManager';

const SERVICE = 'Twitch Helix';
const REDEMPTIONS_URL = `${HELIX_URL}/channel_points/custom_rewards/redemptions`;

const redemptionsResponseSchema = z.object({
  data: z.array(
    z.object({
      id: z.string(),
      user_name: z.string(),
      user_input: z.string().default('')
    })
  )
});

const errorBodySchema = z.object({ message: z.string() });

export interface TwitchRedemptionSourceOptions {
  broadcasterId: string;
  rewards: Partial<Record<RedeemableKind, string>>;
  tokens: TwitchTokenManager;
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Channel-point redemptions for the configured vote rewards
 */
export class TwitchRedemptionSource implements RedemptionSource {
  private readonly disabledRewards = new Set<string>();
  private readonly broadcasterId: string;
  private readonly rewards: Array<[RedeemableKind, string]>;
  private readonly tokens: TwitchTokenManager;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: TwitchRedemptionSourceOptions) {
    this.broadcasterId = options.broadcasterId;
    this.tokens = options.tokens;
    this.http = options.http ?? axios;
    this.logger = options.logger ?? defaultLogger;
    this.rewards = [];
    for (const kind of ['ordinary', 'elevated', 'premium'] as const) {
      const rewardId = options.rewards[kind];
      if (rewardId) {
        this.rewards.push([kind, rewardId]);
      }
    }
  }

  /** All rewards are polled in parallel; fails only when every reward request failed */
  async fetchUnfulfilled(): Promise<RedemptionEvent[]> {
    const active = this.rewards.filter(([, rewardId]) => !this.disabledRewards.has(rewardId));
    if (active.length === 0) {
      return [];
    }

    const results = await Promise.allSettled(active.map(([kind, rewardId]) => this.fetchReward(kind, rewardId)));
    const events: RedemptionEvent[] = [];
    const failures: unknown[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') {
        events.push(...result.value);
      } else {
        failures.push(result.reason);
      }
    }

    if (failures.length === results.length) {
      throw failures[0];
    }
    for (const failure of failures) {
      this.logger.warn('Polling one vote reward failed', failure);
    }
    return events;
  }

  async markFulfilled(ref: RedemptionRef): Promise<boolean> {
    try {
      await this.http.patch(
        REDEMPTIONS_URL,
        { status: 'FULFILLED' },
        {
          params: { broadcaster_id: this.broadcasterId, reward_id: ref.rewardId, id: ref.redemptionId },
          headers: await helixHeaders(this.tokens)
        }
      );
      this.logger.debug(`Redemption ${ref.redemptionId} marked FULFILLED`);
      return true;
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 400 && /redemption is already/i.test(this.errorBodyMessage(error))) {
        this.logger.info(`Redemption ${ref.redemptionId} was already fulfilled or canceled`);
        return true;
      }
      if (status === 401) {
        this.tokens.invalidate();
      }
      throw toExternalServiceError(SERVICE, error);
    }
  }

  private async fetchReward(kind: RedeemableKind, rewardId: string): Promise<RedemptionEvent[]> {
    let body: unknown;
    try {
      const response = await this.http.get(REDEMPTIONS_URL, {
        params: {
          broadcaster_id: this.broadcasterId,
          reward_id: rewardId,
          status: 'UNFULFILLED',
          first: IntakePolicy.PAGE_SIZE
        },
        headers: await helixHeaders(this.tokens)
      });
      body = response.data;
    } catch (error) {
      const status = httpStatusOf(error);
      if (status === 403) {
        // Rewards created by another client can never be managed by this one
        this.disabledRewards.add(rewardId);
        this.logger.error(`❌ Reward ${rewardId} (${kind}) is not manageable by this app; polling for it is disabled`);
        return [];
      }
      if (status === 401) {
        this.tokens.invalidate();
      }
      throw toExternalServiceError(SERVICE, error);
    }

    const parsed = redemptionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, `Unexpected redemptions payload for reward ${rewardId}`);
    }

    return parsed.data.data.map(redemption => ({
      eventId: redemption.id,
      actor: redemption.user_name,
      rawText: redemption.user_input,
      kind,
      sourceRef: { rewardId, redemptionId: redemption.id }
    }));
  }

  private errorBodyMessage(error: unknown): string {
    if (!axios.isAxiosError(error)) {
      return '';
    }
    const parsed = errorBodySchema.safeParse(error.response?.data);
    return parsed.success ? parsed.data.message : '';
  }
}
