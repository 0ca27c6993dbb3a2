import type { Server } from 'http';
import { createApp } from './app';
import { createPool, DatabasePool, testConnection } from './config/database';
import { assertRuntimeSettings, env, ENVIRONMENT } from './config/environment';
import { createSheetsClient } from './config/google';
import { rewardIdsFrom, voteWeightsFrom } from './config/voting';
import { GameService } from './services/database/GameService';
import { GameResolver } from './services/resolution/GameResolver';
import { SchedulerService } from './services/scheduler/SchedulerService';
import { GoogleSheetsMirror } from './services/sheets/GoogleSheetsMirror';
import { InaccurateInputLog } from './services/storage/InaccurateInputLog';
import { ProcessedEventLog } from './services/storage/ProcessedEventLog';
import { DiscrepancyReport, MigrationService } from './services/sync/MigrationService';
import { SheetsSyncWorker } from './services/sync/SheetsSyncWorker';
import { SyncSafetyService } from './services/sync/SyncSafetyService';
import { TwitchChatService } from './services/twitch/TwitchChatService';
import { TwitchRedemptionSource } from './services/twitch/TwitchRedemptionSource';
import { TwitchTokenManager } from './services/twitch/TwitchTokenManager';
import { ManualVoteService } from './services/voting/ManualVoteService';
import { RankAnnouncer } from './services/voting/RankAnnouncer';
import { RedemptionIntake } from './services/voting/RedemptionIntake';
import { VoteProcessor } from './services/voting/VoteProcessor';
import { VoteQueue } from './services/voting/VoteQueue';
import type { RedemptionEvent } from './types';
import { logger } from './utils/logger';
import { confirm } from './utils/prompt';

function describeDiscrepancy(report: DiscrepancyReport): string {
  return [
    report.recordedMirrorId
      ? '⚠️  The vote store was last synced to a different spreadsheet.'
      : '⚠️  The vote store holds votes but the spreadsheet was never imported.',
    `   Recorded spreadsheet:   ${report.recordedMirrorId ?? '(none)'}`,
    `   Configured spreadsheet: ${report.configuredMirrorId}`,
    `   Store:  ${report.storeGames} games, ${report.storeTotal} votes`,
    `   Sheet:  ${report.mirrorGames} games, ${report.mirrorTotal} votes`,
    'Resetting deletes every game and vote in the store and imports the sheet instead.'
  ].join('\n');
}

// Start server with database connection test
async function startServer(): Promise<void> {
  let pool: DatabasePool | null = null;
  try {
    assertRuntimeSettings(env);

    pool = createPool(env);
    if (!(await testConnection(pool))) {
      throw new Error('Database connection failed');
    }
    const store = new GameService(pool);
    await store.initialize();

    const processed = new ProcessedEventLog(env.PROCESSED_IDS_FILE);
    await processed.load();
    const inaccurate = new InaccurateInputLog(env.INACCURATE_INPUT_FILE);

    const mirror = new GoogleSheetsMirror(
      createSheetsClient(env.GOOGLE_APPLICATION_CREDENTIALS),
      env.SPREADSHEET_ID,
      env.SHEET_NAME
    );

    const streamerTokens = new TwitchTokenManager({
      label: 'streamer',
      clientId: env.TWITCH_CLIENT_ID,
      clientSecret: env.TWITCH_CLIENT_SECRET,
      accessToken: env.TWITCH_ACCESS_TOKEN,
      refreshToken: env.TWITCH_REFRESH_TOKEN
    });
    const botTokens = new TwitchTokenManager({
      label: 'chat bot',
      clientId: env.TWITCH_CLIENT_ID,
      clientSecret: env.TWITCH_CLIENT_SECRET,
      accessToken: env.TWITCH_BOT_ACCESS_TOKEN,
      refreshToken: env.TWITCH_BOT_REFRESH_TOKEN
    });
    const source = new TwitchRedemptionSource({
      broadcasterId: env.TWITCH_BROADCASTER_ID,
      rewards: rewardIdsFrom(env),
      tokens: streamerTokens
    });
    const chat = new TwitchChatService(env.TWITCH_BROADCASTER_ID, env.TWITCH_BOT_USER_ID, botTokens);

    // Reconcile with the mirror before any vote is counted
    const migration = new MigrationService(store, mirror);
    const report = await migration.run(discrepancy => {
      logger.warn(describeDiscrepancy(discrepancy));
      return confirm('Reset the store and import the spreadsheet?');
    });
    logger.info(`📊 Migration ${report.status}`, report);

    const safety = new SyncSafetyService(store, mirror, env.MIRROR_GROWTH_TOLERANCE);
    const syncWorker = new SheetsSyncWorker(store, mirror, safety, {
      unsafeWarningAfter: env.UNSAFE_WARNING_AFTER
    });
    if (process.argv.includes('--force-sync')) {
      const forced = await syncWorker.push({ force: true });
      logger.warn(`⚠️  Forced sync finished: ${forced.status}`);
    }

    const resolver = new GameResolver(store, {
      minScore: env.MIN_MATCH_SCORE,
      cacheValidityMs: env.NAME_CACHE_TTL_SECONDS * 1000
    });
    await resolver.refresh();
    const announcer = new RankAnnouncer(store, chat);

    const queue = new VoteQueue<RedemptionEvent>();
    const intake = new RedemptionIntake({ source, queue, processed, inaccurate });
    const processor = new VoteProcessor({
      queue,
      resolver,
      store,
      source,
      processed,
      inaccurate,
      announcer,
      weights: voteWeightsFrom(env),
      onDrained: event => intake.release(event.eventId)
    });
    processor.start();

    const scheduler = new SchedulerService();
    scheduler.schedule({ name: 'redemption-poll', intervalSeconds: env.POLL_INTERVAL_SECONDS, run: () => intake.poll() });
    scheduler.schedule({ name: 'sheets-sync', intervalSeconds: env.SYNC_INTERVAL_SECONDS, run: () => syncWorker.runCycle() });
    scheduler.start();

    const manualVotes = new ManualVoteService(store, resolver, announcer, env.TWITCH_CHANNEL_NAME);
    const app = createApp({ store, manualVotes, syncStatus: () => syncWorker.getStatus() });

    // Start HTTP server
    const server: Server = app.listen(env.PORT, () => {
      logger.info(`🚀 Server running on port ${env.PORT} (${ENVIRONMENT})`);
    });

    const activePool = pool;
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`${signal} received, shutting down...`);
      try {
        await scheduler.stop();
        await processor.stop();
        await syncWorker.shutdown();
        await new Promise<void>(resolve => server.close(() => resolve()));
        await activePool.end();
        logger.info('👋 Shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      }
    };
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    if (pool) {
      await pool.end().catch(endError => logger.error('Closing the database pool failed:', endError));
    }
    process.exit(1);
  }
}

void startServer();
