import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { ManualVoteService } from '../services/voting/ManualVoteService';
import type { SyncWorkerStatus } from '../services/sync/SheetsSyncWorker';
import type { VoteStore } from '../types/interfaces';
import { NotFoundError } from '../utils/errors';

export interface ApiDependencies {
  store: Pick<
    VoteStore,
    'listAllSorted' | 'getRank' | 'search' | 'getStats' | 'getGameStatistics' | 'getGlobalStatistics' | 'getSyncState'
  >;
  manualVotes: Pick<ManualVoteService, 'submit'>;
  syncStatus: () => SyncWorkerStatus;
}

const limitSchema = z.coerce.number().int().min(1).max(500);

const leaderboardQuerySchema = z.object({
  limit: limitSchema.optional()
});

const searchQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
  limit: limitSchema.default(10)
});

const manualVoteSchema = z.object({
  game: z.string().trim().min(1, 'game is required'),
  count: z.number().int().positive()
});

export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApiRouter(deps: ApiDependencies): express.Router {
  const router = express.Router();
  const { store, manualVotes, syncStatus } = deps;

  router.get(
    '/leaderboard',
    asyncHandler(async (req, res) => {
      const { limit } = leaderboardQuerySchema.parse(req.query);
      const games = await store.listAllSorted();
      res.json({ games: limit ? games.slice(0, limit) : games, total: games.length });
    })
  );

  router.get(
    '/games/search',
    asyncHandler(async (req, res) => {
      const { q, limit } = searchQuerySchema.parse(req.query);
      res.json({ query: q, results: await store.search(q, limit) });
    })
  );

  router.get(
    '/games/:name',
    asyncHandler(async (req, res) => {
      const name = req.params.name;
      const rank = await store.getRank(name);
      if (!rank) {
        throw new NotFoundError(`Unknown game "${name}"`);
      }
      const statistics = await store.getGameStatistics(name);
      res.json({ name, ...rank, statistics });
    })
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      const [summary, votes] = await Promise.all([store.getStats(), store.getGlobalStatistics()]);
      res.json({ store: summary, votes });
    })
  );

  router.get(
    '/sync/status',
    asyncHandler(async (_req, res) => {
      res.json({ state: await store.getSyncState(), worker: syncStatus() });
    })
  );

  router.post(
    '/votes/manual',
    asyncHandler(async (req, res) => {
      const { game, count } = manualVoteSchema.parse(req.body);
      const receipt = await manualVotes.submit(game, count);
      res.status(201).json({
        game: receipt.result.name,
        tally: receipt.result.tally,
        created: receipt.result.created,
        matched: receipt.resolution.kind === 'matched',
        message: receipt.message
      });
    })
  );

  return router;
}
