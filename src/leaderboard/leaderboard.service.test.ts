import { describe, it, expect, beforeEach } from 'vitest';

import { LeaderboardAggregator, compareRows } from './leaderboard.service.js';
import { MemoryLeaderboardStore, MemoryScoreLedger } from '../stores/memory.store.js';
import type { ValidationTier } from '../types/core.js';

const DAY_MS = 86_400_000;

describe('LeaderboardAggregator', () => {
  let ledger: MemoryScoreLedger;
  let rows: MemoryLeaderboardStore;
  let aggregator: LeaderboardAggregator;
  let sessionSeq = 0;

  async function record(
    chatId: string,
    userId: string,
    points: number,
    atMs: number,
    tier: ValidationTier = points > 0 ? 'full' : 'rejected'
  ) {
    sessionSeq += 1;
    const entry = await ledger.append({
      userId,
      chatId,
      sessionId: `s${sessionSeq}`,
      cardId: 'pushups-10',
      tier,
      points,
      streak: 1,
      createdAt: new Date(atMs),
      dateKey: atMs >= DAY_MS ? '1970-01-02' : '1970-01-01',
    });
    await aggregator.onScoreEntry(entry);
  }

  beforeEach(async () => {
    ledger = new MemoryScoreLedger();
    rows = new MemoryLeaderboardStore();
    aggregator = new LeaderboardAggregator(ledger, rows);
    sessionSeq = 0;

    await record('c1', 'u2', 10, 500);
    await record('c1', 'u3', 0, 100);
    await record('c1', 'u1', 10, 1000);
    await record('c1', 'u1', 5, 2000, 'reduced');
    await record('c1', 'u2', 5, DAY_MS + 1000, 'reduced');
    await record('c2', 'u4', 8, 1500);
  });

  it('ranks by points, breaking ties by who reached the total first', async () => {
    const board = await aggregator.getLeaderboard('c1', 10);

    expect(board.day).toBeNull();
    expect(board.rows.map((r) => [r.rank, r.userId, r.totalPoints, r.entries])).toEqual([
      [1, 'u1', 15, 2],
      [2, 'u2', 15, 2],
      [3, 'u3', 0, 1],
    ]);
    expect(board.rows[2].lastScoredAt).toBeNull();
  });

  it('limits the board to the top N rows', async () => {
    const board = await aggregator.getLeaderboard('c1', 1);
    expect(board.rows.map((r) => r.userId)).toEqual(['u1']);
    expect((await aggregator.getLeaderboard('c1', 0)).rows).toEqual([]);
  });

  it('keeps chats apart', async () => {
    const board = await aggregator.getLeaderboard('c2', 10);
    expect(board.rows.map((r) => [r.userId, r.totalPoints])).toEqual([['u4', 8]]);
    expect(await aggregator.getUserTotal('c2', 'u1')).toBe(0);
  });

  it('ranks a single day from the ledger', async () => {
    const first = await aggregator.getDailyLeaderboard('c1', '1970-01-01', 10);
    expect(first.rows.map((r) => [r.userId, r.totalPoints])).toEqual([
      ['u1', 15],
      ['u2', 10],
      ['u3', 0],
    ]);

    const second = await aggregator.getDailyLeaderboard('c1', '1970-01-02', 10);
    expect(second.rows.map((r) => [r.userId, r.totalPoints])).toEqual([['u2', 5]]);
  });

  it('summarizes a day per user', async () => {
    expect(await aggregator.getSummary('c1', '1970-01-01')).toEqual({
      chatId: 'c1',
      day: '1970-01-01',
      totalPoints: 25,
      totals: [
        { userId: 'u1', points: 15, completions: 2, attempts: 2 },
        { userId: 'u2', points: 10, completions: 1, attempts: 1 },
        { userId: 'u3', points: 0, completions: 0, attempts: 1 },
      ],
    });
  });

  it('refuses malformed days', async () => {
    await expect(aggregator.getSummary('c1', 'today')).rejects.toThrow(
      'Invalid day "today", expected YYYY-MM-DD'
    );
  });

  it('rebuilds the cache from the ledger alone', async () => {
    const before = await aggregator.getLeaderboard('c1', 10);
    await rows.replaceChat('c1', []);
    expect((await aggregator.reconcile('c1')).consistent).toBe(false);

    await aggregator.rebuild('c1');

    expect(await aggregator.getLeaderboard('c1', 10)).toEqual(before);
    expect(await aggregator.reconcile('c1')).toEqual({
      cachedTotal: 30,
      ledgerTotal: 30,
      consistent: true,
    });
  });

  it('serializes concurrent updates for one chat', async () => {
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => record('c3', `u${i % 3}`, 1, 10 + i))
    );
    const { cachedTotal, ledgerTotal } = await aggregator.reconcile('c3');
    expect(cachedTotal).toBe(20);
    expect(ledgerTotal).toBe(20);
  });
});

describe('compareRows', () => {
  it('falls back to user id when points and timestamps match', () => {
    const at = new Date(5);
    const a = { chatId: 'c', userId: 'a', totalPoints: 3, entries: 1, lastScoredAt: at };
    const b = { ...a, userId: 'b' };
    expect(compareRows(a, b)).toBeLessThan(0);
    expect(compareRows(b, a)).toBeGreaterThan(0);
  });
});
