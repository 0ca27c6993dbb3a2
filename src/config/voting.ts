import type { RedeemableKind } from '../types';
import type { EnvironmentConfig } from './environment';

export type VoteWeights = Readonly<Record<RedeemableKind, number>>;

export const DEFAULT_VOTE_WEIGHTS: VoteWeights = {
  ordinary: 1,
  elevated: 10,
  premium: 25
};

/**
 * Reconciliation heuristics. These are safety nets rather than protocol
 * rules, so every deployment can tune them through the environment.
 */
export const SyncPolicy = {
  /** Mirror total may exceed the store total by this fraction before a push is refused */
  MIRROR_GROWTH_TOLERANCE: 0.1,
  /** Consecutive refused cycles before the warning becomes persistent */
  UNSAFE_WARNING_AFTER: 3,
  /** Consecutive failed cycles before each failure is escalated to a warning */
  FAILURE_WARNING_AFTER: 3,
  /** Consecutive failed cycles that trigger a cooldown */
  FAILURE_COOLDOWN_AFTER: 10,
  FAILURE_COOLDOWN_MS: 60_000
} as const;

export const IntakePolicy = {
  /** Consecutive failed polls before intake backs off */
  FAILURE_COOLDOWN_AFTER: 5,
  FAILURE_COOLDOWN_MS: 30_000,
  /** Redemptions requested per reward and poll */
  PAGE_SIZE: 20
} as const;

export const MIGRATION_ACTOR = '[Migration]';

export function voteWeightsFrom(config: EnvironmentConfig): VoteWeights {
  return {
    ordinary: config.ORDINARY_VOTE_WEIGHT,
    elevated: config.ELEVATED_VOTE_WEIGHT,
    premium: config.PREMIUM_VOTE_WEIGHT
  };
}

export function rewardIdsFrom(config: EnvironmentConfig): Partial<Record<RedeemableKind, string>> {
  const rewards: Partial<Record<RedeemableKind, string>> = {};
  if (config.REWARD_ID_ORDINARY) rewards.ordinary = config.REWARD_ID_ORDINARY;
  if (config.REWARD_ID_ELEVATED) rewards.elevated = config.REWARD_ID_ELEVATED;
  if (config.REWARD_ID_PREMIUM) rewards.premium = config.REWARD_ID_PREMIUM;
  return rewards;
}
