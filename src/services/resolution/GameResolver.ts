/**
 * Game Resolver
 * Maps a typed title onto a known game using a cached snapshot of names
 */

import { FuzzyConfig } from '../../config/fuzzy';
import type { VoteStore } from '../../types/interfaces';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { FuzzyMatcher } from '../../utils/fuzzy';

export type Resolution =
  | { kind: 'matched'; name: string; score: number }
  | { kind: 'new'; name: string }
  | { kind: 'empty' };

export interface GameResolverOptions {
  minScore?: number;
  cacheValidityMs?: number;
  now?: () => number;
}

export class GameResolver {
  private snapshot: readonly string[] = [];
  private loadedAt = 0;
  private generation = 0;
  private loadedGeneration = -1;
  private inflight: { generation: number; promise: Promise<readonly string[]> } | null = null;

  private readonly minScore: number;
  private readonly cacheValidityMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: Pick<VoteStore, 'listNames'>,
    options: GameResolverOptions = {},
    private readonly logger: Logger = defaultLogger
  ) {
    this.minScore = options.minScore ?? FuzzyConfig.DEFAULT_MIN_SCORE;
    this.cacheValidityMs = options.cacheValidityMs ?? 300_000;
    this.now = options.now ?? Date.now;
  }

  isStale(): boolean {
    return (
      this.loadedGeneration !== this.generation || this.now() - this.loadedAt >= this.cacheValidityMs
    );
  }

  /** Force the next read to reload; used right after a game is created */
  invalidate(): void {
    this.generation++;
  }

  /**
   * Reload the snapshot. Callers arriving while a reload for the current
   * generation is running share its result.
   */
  refresh(): Promise<readonly string[]> {
    if (this.inflight && this.inflight.generation === this.generation) {
      return this.inflight.promise;
    }

    const generation = this.generation;
    const promise = this.load(generation).finally(() => {
      if (this.inflight?.promise === promise) {
        this.inflight = null;
      }
    });
    this.inflight = { generation, promise };
    return promise;
  }

  async ensureFresh(): Promise<readonly string[]> {
    return this.isStale() ? this.refresh() : this.snapshot;
  }

  getSnapshot(): readonly string[] {
    return this.snapshot;
  }

  async resolve(rawText: string): Promise<Resolution> {
    const query = rawText.trim();
    if (query === '') {
      return { kind: 'empty' };
    }

    const names = await this.ensureFresh();
    const best = FuzzyMatcher.findBest(query, names, this.minScore);
    if (best) {
      this.logger.debug(`🔍 Resolved "${query}" to "${best.item}"`, { score: best.score });
      return { kind: 'matched', name: best.item, score: best.score };
    }

    this.logger.debug(`🆕 No match for "${query}", treating as a new game`);
    return { kind: 'new', name: query };
  }

  private async load(generation: number): Promise<readonly string[]> {
    const names = await this.store.listNames();
    // A slower, older reload must not overwrite a newer snapshot
    if (generation >= this.loadedGeneration) {
      this.snapshot = Object.freeze([...names]);
      this.loadedAt = this.now();
      this.loadedGeneration = generation;
      this.logger.debug(`📚 Game name snapshot refreshed (${names.length} titles)`);
    }
    return this.snapshot;
  }
}
