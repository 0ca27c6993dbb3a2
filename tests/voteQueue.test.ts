import { describe, expect, it } from 'vitest';
import { VoteQueue } from '../src/services/voting/VoteQueue';

describe('VoteQueue', () => {
  it('delivers items in insertion order', async () => {
    const queue = new VoteQueue<{ id: number }>();
    queue.push({ id: 1 });
    queue.push({ id: 2 });
    expect(queue.size).toBe(2);
    expect(await queue.pop()).toEqual({ id: 1 });
    expect(await queue.pop()).toEqual({ id: 2 });
  });

  it('wakes a waiting consumer when an item arrives', async () => {
    const queue = new VoteQueue<{ id: number }>();
    const waiting = queue.pop();
    queue.push({ id: 7 });
    expect(await waiting).toEqual({ id: 7 });
    expect(queue.size).toBe(0);
  });

  it('drains queued items after close, then yields null', async () => {
    const queue = new VoteQueue<{ id: number }>();
    queue.push({ id: 1 });
    queue.close();

    expect(queue.push({ id: 2 })).toBe(false);
    expect(await queue.pop()).toEqual({ id: 1 });
    expect(await queue.pop()).toBeNull();
  });

  it('releases waiting consumers on close', async () => {
    const queue = new VoteQueue<{ id: number }>();
    const waiting = queue.pop();
    queue.close();
    expect(await waiting).toBeNull();
  });
});
