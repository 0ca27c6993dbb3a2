/**
 * Contracts between the voting core and its collaborators
 */

import type {
  GameVoteStatistics,
  GlobalVoteStatistics,
  MirrorCell,
  RankedGame,
  RankInfo,
  RedemptionEvent,
  RedemptionRef,
  StoreStats,
  SyncState,
  VoteKind,
  VoteResult
} from './index';

export interface VoteStore {
  initialize(): Promise<void>;
  /**
   * Add `weight` to the game's tally (creating it when absent), append a
   * history row when `actor` is given and bump the pending-change counter,
   * all as one atomic unit.
   */
  applyVote(name: string, weight: number, actor: string | null, kind: VoteKind): Promise<VoteResult>;
  /** Overwrite a tally; reserved for mirror migration */
  setTallyAbsolute(name: string, tally: number): Promise<void>;
  getTally(name: string): Promise<number | null>;
  getRank(name: string): Promise<RankInfo | null>;
  listAllSorted(): Promise<RankedGame[]>;
  listNames(): Promise<string[]>;
  search(term: string, limit?: number): Promise<string[]>;
  countGames(): Promise<number>;
  getStats(): Promise<StoreStats>;
  getGameStatistics(name: string): Promise<GameVoteStatistics>;
  getGlobalStatistics(): Promise<GlobalVoteStatistics>;
  getSyncState(): Promise<SyncState>;
  /** Record a successful push; `pushedChanges` pending changes are settled */
  markSynced(mirrorId: string, fingerprint: string, pushedChanges: number): Promise<void>;
  recordMirrorIdentity(mirrorId: string, fingerprint: string): Promise<void>;
  /** Irreversibly drop all games, history and sync state */
  reset(): Promise<void>;
}

export interface VoteMirror {
  /** Identity of the external sheet, e.g. a spreadsheet id */
  readonly id: string;
  readValues(): Promise<unknown[][]>;
  /** Replace the whole data region with `values` (header row first) */
  writeValues(values: MirrorCell[][]): Promise<void>;
}

export interface RedemptionSource {
  fetchUnfulfilled(): Promise<RedemptionEvent[]>;
  /** Resolves true once the source confirms the redemption is fulfilled */
  markFulfilled(ref: RedemptionRef): Promise<boolean>;
}

export interface ChatNotifier {
  postMessage(message: string): Promise<void>;
}
