import type { DatabasePool, Queryable } from '../../config/database';
import { MIGRATION_ACTOR } from '../../config/voting';
import type {
  GameVoteStatistics,
  GlobalVoteStatistics,
  RankedGame,
  RankInfo,
  StoreStats,
  SyncState,
  VoteKind,
  VoteResult
} from '../../types';
import type { VoteStore } from '../../types/interfaces';
import { InvalidVoteError } from '../../utils/errors';
import { toDateOrNull, toInteger, toNullableText, toText } from '../../utils/helpers';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { assignRanks } from '../../utils/ranking';
import { BaseService } from './BaseService';

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS games (
     name TEXT PRIMARY KEY,
     tally INTEGER NOT NULL DEFAULT 0 CHECK (tally >= 0),
     created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
     last_updated TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE TABLE IF NOT EXISTS vote_history (
     id BIGSERIAL PRIMARY KEY,
     game_name TEXT NOT NULL,
     actor TEXT NOT NULL,
     kind TEXT NOT NULL CHECK (kind IN ('ordinary', 'elevated', 'premium', 'manual', 'migration')),
     weight INTEGER NOT NULL CHECK (weight > 0),
     created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
   )`,
  `CREATE TABLE IF NOT EXISTS sync_state (
     id SMALLINT PRIMARY KEY CHECK (id = 1),
     last_sync_at TIMESTAMPTZ,
     sync_count INTEGER NOT NULL DEFAULT 0,
     pending_changes INTEGER NOT NULL DEFAULT 0,
     mirror_id TEXT,
     mirror_fingerprint TEXT
   )`,
  'CREATE INDEX IF NOT EXISTS idx_games_tally ON games (tally DESC)',
  'CREATE INDEX IF NOT EXISTS idx_vote_history_created ON vote_history (created_at DESC)',
  'CREATE INDEX IF NOT EXISTS idx_vote_history_game ON vote_history (game_name)',
  'INSERT INTO sync_state (id) VALUES (1) ON CONFLICT (id) DO NOTHING'
];

/** Escape LIKE metacharacters so a search term only ever matches literally */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, match => `\\${match}`);
}

/**
 * PostgreSQL-backed vote store. Tallies are maintained incrementally; the
 * history table is an audit log and never feeds the tally.
 */
export class GameService extends BaseService implements VoteStore {
  constructor(db: DatabasePool, loggerInstance: Logger = defaultLogger) {
    super(db, loggerInstance);
  }

  async initialize(): Promise<void> {
    await this.withTransaction(async client => {
      for (const statement of SCHEMA_STATEMENTS) {
        await this.executeQuery(statement, [], client);
      }
    });
    this.logger.info('✅ Vote store schema ready');
  }

  async applyVote(name: string, weight: number, actor: string | null, kind: VoteKind): Promise<VoteResult> {
    if (name.trim() === '') {
      throw new InvalidVoteError('Game name must not be empty');
    }
    if (!Number.isInteger(weight) || weight <= 0) {
      throw new InvalidVoteError(`Vote weight must be a positive integer, got ${weight}`);
    }

    return this.withTransaction(async client => {
      let created = false;
      let tally = await this.incrementExisting(client, name, weight);

      if (tally === null) {
        const inserted = await this.executeSingleQuery(
          `INSERT INTO games (name, tally) VALUES ($1, $2)
           ON CONFLICT (name) DO NOTHING
           RETURNING tally`,
          [name, weight],
          client
        );
        if (inserted) {
          created = true;
          tally = toInteger(inserted.tally);
        } else {
          // Another writer created the row between our lookup and insert
          tally = await this.incrementExisting(client, name, weight);
        }
      }

      if (tally === null) {
        throw new InvalidVoteError(`Game "${name}" could not be locked for update`);
      }

      if (actor) {
        await this.executeQuery(
          `INSERT INTO vote_history (game_name, actor, kind, weight) VALUES ($1, $2, $3, $4)`,
          [name, actor, kind, weight],
          client
        );
      }

      await this.executeQuery(
        'UPDATE sync_state SET pending_changes = pending_changes + 1 WHERE id = 1',
        [],
        client
      );

      return { name, tally, weight, created };
    });
  }

  async setTallyAbsolute(name: string, tally: number): Promise<void> {
    if (name.trim() === '') {
      throw new InvalidVoteError('Game name must not be empty');
    }
    if (!Number.isInteger(tally) || tally < 0) {
      throw new InvalidVoteError(`Tally must be a non-negative integer, got ${tally}`);
    }

    await this.withTransaction(async client => {
      await this.executeQuery(
        `INSERT INTO games (name, tally) VALUES ($1, $2)
         ON CONFLICT (name) DO UPDATE SET tally = EXCLUDED.tally, last_updated = NOW()`,
        [name, tally],
        client
      );
      if (tally > 0) {
        await this.executeQuery(
          `INSERT INTO vote_history (game_name, actor, kind, weight) VALUES ($1, $2, 'migration', $3)`,
          [name, MIGRATION_ACTOR, tally],
          client
        );
      }
    });
  }

  async getTally(name: string): Promise<number | null> {
    const row = await this.executeSingleQuery('SELECT tally FROM games WHERE name = $1', [name]);
    return row ? toInteger(row.tally) : null;
  }

  async getRank(name: string): Promise<RankInfo | null> {
    const row = await this.executeSingleQuery(
      `SELECT g.tally,
              (SELECT COUNT(*) FROM games o
                WHERE o.tally > g.tally
                   OR (o.tally = g.tally AND o.name COLLATE "C" < g.name COLLATE "C")) + 1 AS rank,
              (SELECT COUNT(*) FROM games) AS total
         FROM games g
        WHERE g.name = $1`,
      [name]
    );
    if (!row) {
      return null;
    }
    return {
      rank: toInteger(row.rank),
      tally: toInteger(row.tally),
      totalGames: toInteger(row.total)
    };
  }

  async listAllSorted(): Promise<RankedGame[]> {
    const rows = await this.executeQuery('SELECT name, tally FROM games ORDER BY tally DESC, name COLLATE "C" ASC');
    return assignRanks(rows.map(row => ({ name: toText(row.name), tally: toInteger(row.tally) })));
  }

  async listNames(): Promise<string[]> {
    const rows = await this.executeQuery('SELECT name FROM games ORDER BY tally DESC, name COLLATE "C" ASC');
    return rows.map(row => toText(row.name));
  }

  /** Case-insensitive substring search, most voted first */
  async search(term: string, limit: number = 10): Promise<string[]> {
    if (term.trim() === '' || limit <= 0) {
      return [];
    }
    const rows = await this.executeQuery(
      `SELECT name FROM games
        WHERE name ILIKE $1 ESCAPE '\\'
        ORDER BY tally DESC, name COLLATE "C" ASC
        LIMIT $2`,
      [`%${escapeLikePattern(term.trim())}%`, limit]
    );
    return rows.map(row => toText(row.name));
  }

  async countGames(): Promise<number> {
    const row = await this.executeSingleQuery('SELECT COUNT(*) AS count FROM games');
    return row ? toInteger(row.count) : 0;
  }

  async getStats(): Promise<StoreStats> {
    const row = await this.executeSingleQuery(
      `SELECT (SELECT COUNT(*) FROM games) AS games,
              (SELECT COALESCE(SUM(tally), 0) FROM games) AS total_votes,
              (SELECT COUNT(*) FROM vote_history) AS history_entries,
              s.last_sync_at,
              s.sync_count
         FROM sync_state s
        WHERE s.id = 1`
    );
    return {
      games: toInteger(row?.games),
      totalVotes: toInteger(row?.total_votes),
      historyEntries: toInteger(row?.history_entries),
      lastSyncAt: toDateOrNull(row?.last_sync_at),
      syncCount: toInteger(row?.sync_count)
    };
  }

  async getGameStatistics(name: string): Promise<GameVoteStatistics> {
    const row = await this.executeSingleQuery(
      `SELECT COUNT(*) AS vote_count,
              COALESCE(SUM(weight), 0) AS total_weight,
              COUNT(DISTINCT actor) AS unique_voters,
              MIN(created_at) AS first_vote,
              MAX(created_at) AS last_vote
         FROM vote_history
        WHERE game_name = $1`,
      [name]
    );
    return {
      gameName: name,
      voteCount: toInteger(row?.vote_count),
      totalWeight: toInteger(row?.total_weight),
      uniqueVoters: toInteger(row?.unique_voters),
      firstVoteAt: toDateOrNull(row?.first_vote),
      lastVoteAt: toDateOrNull(row?.last_vote)
    };
  }

  async getGlobalStatistics(): Promise<GlobalVoteStatistics> {
    const row = await this.executeSingleQuery(
      `SELECT COUNT(*) AS vote_count,
              COUNT(DISTINCT game_name) AS unique_games,
              COUNT(DISTINCT actor) AS unique_voters
         FROM vote_history`
    );
    return {
      voteCount: toInteger(row?.vote_count),
      uniqueGames: toInteger(row?.unique_games),
      uniqueVoters: toInteger(row?.unique_voters)
    };
  }

  async getSyncState(): Promise<SyncState> {
    const row = await this.executeSingleQuery(
      `SELECT last_sync_at, sync_count, pending_changes, mirror_id, mirror_fingerprint
         FROM sync_state WHERE id = 1`
    );
    return {
      lastSyncAt: toDateOrNull(row?.last_sync_at),
      syncCount: toInteger(row?.sync_count),
      pendingChanges: toInteger(row?.pending_changes),
      mirrorId: toNullableText(row?.mirror_id),
      mirrorFingerprint: toNullableText(row?.mirror_fingerprint)
    };
  }

  async markSynced(mirrorId: string, fingerprint: string, pushedChanges: number): Promise<void> {
    // Votes applied while the push was in flight stay pending for the next cycle
    await this.executeQuery(
      `UPDATE sync_state
          SET last_sync_at = NOW(),
              sync_count = sync_count + 1,
              pending_changes = GREATEST(pending_changes - $3, 0),
              mirror_id = $1,
              mirror_fingerprint = $2
        WHERE id = 1`,
      [mirrorId, fingerprint, pushedChanges]
    );
  }

  async recordMirrorIdentity(mirrorId: string, fingerprint: string): Promise<void> {
    await this.executeQuery(
      `UPDATE sync_state
          SET mirror_id = $1, mirror_fingerprint = $2, pending_changes = 0
        WHERE id = 1`,
      [mirrorId, fingerprint]
    );
  }

  async reset(): Promise<void> {
    await this.withTransaction(async client => {
      await this.executeQuery('TRUNCATE games, vote_history', [], client);
      await this.executeQuery(
        `UPDATE sync_state
            SET last_sync_at = NULL, sync_count = 0, pending_changes = 0,
                mirror_id = NULL, mirror_fingerprint = NULL
          WHERE id = 1`,
        [],
        client
      );
    });
    this.logger.warn('🗑️  Vote store reset: all games, history and sync state removed');
  }

  /** Row-locks the game and adds `weight`; null when the game does not exist */
  private async incrementExisting(client: Queryable, name: string, weight: number): Promise<number | null> {
    const locked = await this.executeSingleQuery('SELECT tally FROM games WHERE name = $1 FOR UPDATE', [name], client);
    if (!locked) {
      return null;
    }
    const updated = await this.executeSingleQuery(
      `UPDATE games SET tally = tally + $2, last_updated = NOW() WHERE name = $1 RETURNING tally`,
      [name, weight],
      client
    );
    return updated ? toInteger(updated.tally) : null;
  }
}
