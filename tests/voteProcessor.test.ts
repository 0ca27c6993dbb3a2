import { beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_VOTE_WEIGHTS } from '../src/config/voting';
import { GameResolver } from '../src/services/resolution/GameResolver';
import { RankAnnouncer } from '../src/services/voting/RankAnnouncer';
import { VoteProcessor } from '../src/services/voting/VoteProcessor';
import { VoteQueue } from '../src/services/voting/VoteQueue';
import type { RedemptionEvent } from '../src/types';
import {
  FakeChat,
  FakeRedemptionSource,
  MemoryInaccurateLog,
  MemoryProcessedLog,
  redemption,
  silentLogger
} from './helpers/fakes';
import { InMemoryVoteStore } from './helpers/InMemoryVoteStore';

describe('VoteProcessor', () => {
  let store: InMemoryVoteStore;
  let source: FakeRedemptionSource;
  let chat: FakeChat;
  let processed: MemoryProcessedLog;
  let inaccurate: MemoryInaccurateLog;
  let queue: VoteQueue<RedemptionEvent>;
  let drained: string[];
  let processor: VoteProcessor;

  beforeEach(() => {
    store = new InMemoryVoteStore();
    source = new FakeRedemptionSource();
    chat = new FakeChat();
    processed = new MemoryProcessedLog();
    inaccurate = new MemoryInaccurateLog();
    queue = new VoteQueue<RedemptionEvent>();
    drained = [];
    processor = new VoteProcessor({
      queue,
      resolver: new GameResolver(store, { minScore: 80 }, silentLogger),
      store,
      source,
      processed,
      inaccurate,
      announcer: new RankAnnouncer(store, chat, silentLogger),
      weights: DEFAULT_VOTE_WEIGHTS,
      onDrained: event => drained.push(event.eventId),
      logger: silentLogger
    });
  });

  it('creates a game, then resolves a differently cased title onto it', async () => {
    const first = await processor.process(redemption('r1', 'alice', 'Chess'));
    expect(first).toMatchObject({ status: 'applied', result: { name: 'Chess', tally: 1, created: true } });
    expect(await store.getRank('Chess')).toEqual({ rank: 1, tally: 1, totalGames: 1 });

    const second = await processor.process(redemption('r2', 'bob', 'chess', 'elevated'));
    expect(second).toMatchObject({
      status: 'applied',
      resolution: { kind: 'matched', name: 'Chess' },
      result: { name: 'Chess', tally: 11, weight: 10, created: false }
    });

    expect(store.games.get('chess')).toBeUndefined();
    expect(chat.messages).toEqual([
      "🎮 alice voted for 'Chess'! Rank #1 of 1 with 1 votes! 🎮",
      "🎮 bob voted for 'Chess'! Rank #1 of 1 with 11 votes! 🎮"
    ]);
    expect(source.fulfilled.map(ref => ref.redemptionId)).toEqual(['r1', 'r2']);
    expect([...processed.ids]).toEqual(['r1', 'r2']);
    expect(store.syncState.pendingChanges).toBe(2);
  });

  it('records empty input, fulfils it and never touches the store', async () => {
    const outcome = await processor.process(redemption('r3', 'carol', '   '));

    expect(outcome).toEqual({ status: 'empty' });
    expect(store.games.size).toBe(0);
    expect(inaccurate.entries).toEqual(['   ']);
    expect(source.fulfilled.map(ref => ref.redemptionId)).toEqual(['r3']);
    expect(processed.has('r3')).toBe(true);
  });

  it('keeps the vote when chat and fulfilment fail', async () => {
    chat.failure = new Error('chat down');
    source.fulfilResult = false;

    const outcome = await processor.process(redemption('r4', 'dave', 'Go', 'premium'));

    expect(outcome).toMatchObject({ status: 'applied', result: { tally: 25 } });
    expect(processed.has('r4')).toBe(true);
  });

  it('drains every item in order and survives a failing one', async () => {
    store.failNextApply = new Error('connection reset');
    queue.push(redemption('r5', 'erin', 'Tetris'));
    queue.push(redemption('r6', 'frank', 'Tetris'));
    queue.push(redemption('r7', 'grace', 'Tetris'));
    queue.close();

    await processor.run();

    expect(drained).toEqual(['r5', 'r6', 'r7']);
    expect(store.games.get('Tetris')).toBe(2);
    expect(processed.has('r5')).toBe(false);
    expect(processor.getStatus()).toMatchObject({ processed: 2, failed: 1 });
  });

  it('finishes admitted votes before stop resolves', async () => {
    processor.start();
    queue.push(redemption('r8', 'heidi', 'Portal'));
    queue.push(redemption('r9', 'ivan', 'Portal'));

    await processor.stop();

    expect(store.games.get('Portal')).toBe(2);
    expect(queue.push(redemption('r10', 'judy', 'Portal'))).toBe(false);
  });

  it('keeps tallies exact under concurrent votes for the same game', async () => {
    await Promise.all(
      Array.from({ length: 20 }, (_, index) => store.applyVote('Chess', index % 2 === 0 ? 1 : 10, `user${index}`, 'ordinary'))
    );
    expect(store.games.get('Chess')).toBe(10 * 1 + 10 * 10);
    expect(store.history).toHaveLength(20);
  });
});
