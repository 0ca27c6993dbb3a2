/**
 * Domain types shared by the store, the voting pipeline and the mirror sync
 */

export const VOTE_KINDS = ['ordinary', 'elevated', 'premium', 'manual', 'migration'] as const;

export type VoteKind = (typeof VOTE_KINDS)[number];

/** Kinds that arrive as channel-point redemptions and carry a configured weight */
export type RedeemableKind = Extract<VoteKind, 'ordinary' | 'elevated' | 'premium'>;

export interface VoteResult {
  name: string;
  tally: number;
  weight: number;
  created: boolean;
}

export interface RankInfo {
  rank: number;
  tally: number;
  totalGames: number;
}

export interface RankedGame {
  rank: number;
  name: string;
  tally: number;
}

export interface SyncState {
  lastSyncAt: Date | null;
  syncCount: number;
  pendingChanges: number;
  mirrorId: string | null;
  mirrorFingerprint: string | null;
}

export interface StoreStats {
  games: number;
  totalVotes: number;
  historyEntries: number;
  lastSyncAt: Date | null;
  syncCount: number;
}

export interface GameVoteStatistics {
  gameName: string;
  voteCount: number;
  totalWeight: number;
  uniqueVoters: number;
  firstVoteAt: Date | null;
  lastVoteAt: Date | null;
}

export interface GlobalVoteStatistics {
  voteCount: number;
  uniqueGames: number;
  uniqueVoters: number;
}

/** Where a redemption lives at the event source, needed to mark it fulfilled */
export interface RedemptionRef {
  rewardId: string;
  redemptionId: string;
}

export interface RedemptionEvent {
  eventId: string;
  actor: string;
  rawText: string;
  kind: RedeemableKind;
  sourceRef: RedemptionRef;
}

/** One `[tally, name]` row of the mirror's interchange schema */
export interface MirrorRow {
  name: string;
  tally: number;
}

export type MirrorCell = string | number;
