import type { LeaderboardRow, ScoreEntryRecord } from '../types/core.js';
import type { LeaderboardStore, ScoreLedger } from '../stores/types.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { isDateKey } from '../utils/time.js';

export interface RankedRow extends LeaderboardRow {
  rank: number;
}

export interface RenderLeaderboard {
  chatId: string;
  day: string | null; // null = all time
  rows: RankedRow[];
}

export interface SummaryTotal {
  userId: string;
  points: number;
  completions: number; // reduced or full
  attempts: number;
}

export interface RenderSummary {
  chatId: string;
  day: string;
  totalPoints: number;
  totals: SummaryTotal[];
}

/**
 * Points descending; on equal points whoever reached the total first ranks
 * higher. Rows that never scored go last.
 */
export function compareRows(a: LeaderboardRow, b: LeaderboardRow): number {
  if (a.totalPoints !== b.totalPoints) return b.totalPoints - a.totalPoints;

  const aAt = a.lastScoredAt?.getTime() ?? Number.POSITIVE_INFINITY;
  const bAt = b.lastScoredAt?.getTime() ?? Number.POSITIVE_INFINITY;
  if (aAt !== bAt) return aAt < bAt ? -1 : 1;

  return a.userId.localeCompare(b.userId);
}

export function rankRows(rows: LeaderboardRow[], topN: number): RankedRow[] {
  if (topN <= 0) return [];
  return [...rows]
    .sort(compareRows)
    .slice(0, topN)
    .map((row, index) => ({ ...row, rank: index + 1 }));
}

/** Replays ledger entries into leaderboard rows. */
export function aggregateEntries(
  chatId: string,
  entries: ScoreEntryRecord[]
): LeaderboardRow[] {
  const rows = new Map<string, LeaderboardRow>();
  const ordered = [...entries].sort(
    (a, b) => a.createdAt.getTime() - b.createdAt.getTime()
  );

  for (const entry of ordered) {
    if (entry.chatId !== chatId) continue;
    const row = rows.get(entry.userId) ?? {
      chatId,
      userId: entry.userId,
      totalPoints: 0,
      entries: 0,
      lastScoredAt: null,
    };
    row.totalPoints += entry.points;
    row.entries += 1;
    if (entry.points > 0) row.lastScoredAt = entry.createdAt;
    rows.set(entry.userId, row);
  }

  return [...rows.values()];
}

export class LeaderboardAggregator {
  private readonly chatLocks = new KeyedMutex();

  constructor(
    private readonly ledger: ScoreLedger,
    private readonly rows: LeaderboardStore
  ) {}

  async onScoreEntry(entry: ScoreEntryRecord): Promise<LeaderboardRow> {
    return this.chatLocks.runExclusive(entry.chatId, () =>
      this.rows.increment({
        chatId: entry.chatId,
        userId: entry.userId,
        points: entry.points,
        at: entry.createdAt,
      })
    );
  }

  async getUserTotal(chatId: string, userId: string): Promise<number> {
    const row = await this.rows.get(chatId, userId);
    return row?.totalPoints ?? 0;
  }

  async getLeaderboard(chatId: string, topN: number): Promise<RenderLeaderboard> {
    const rows = await this.rows.listByChat(chatId);
    return { chatId, day: null, rows: rankRows(rows, topN) };
  }

  async getDailyLeaderboard(
    chatId: string,
    day: string,
    topN: number
  ): Promise<RenderLeaderboard> {
    assertDateKey(day);
    const entries = await this.ledger.listByChat(chatId, { dateKey: day });
    return {
      chatId,
      day,
      rows: rankRows(aggregateEntries(chatId, entries), topN),
    };
  }

  async getSummary(chatId: string, day: string): Promise<RenderSummary> {
    assertDateKey(day);
    const entries = await this.ledger.listByChat(chatId, { dateKey: day });

    const totals = new Map<string, SummaryTotal>();
    for (const entry of entries) {
      const total = totals.get(entry.userId) ?? {
        userId: entry.userId,
        points: 0,
        completions: 0,
        attempts: 0,
      };
      total.points += entry.points;
      total.attempts += 1;
      if (entry.tier !== 'rejected') total.completions += 1;
      totals.set(entry.userId, total);
    }

    const list = [...totals.values()].sort(
      (a, b) => b.points - a.points || a.userId.localeCompare(b.userId)
    );

    return {
      chatId,
      day,
      totalPoints: list.reduce((sum, t) => sum + t.points, 0),
      totals: list,
    };
  }

  /** Recompute the chat's rows from the ledger and replace the cache. */
  async rebuild(chatId: string): Promise<LeaderboardRow[]> {
    return this.chatLocks.runExclusive(chatId, async () => {
      const entries = await this.ledger.listByChat(chatId);
      const rows = aggregateEntries(chatId, entries);
      await this.rows.replaceChat(chatId, rows);
      console.log(
        `🔁 Rebuilt leaderboard for chat ${chatId} from ${entries.length} entries`
      );
      return rows;
    });
  }

  async reconcile(
    chatId: string
  ): Promise<{ cachedTotal: number; ledgerTotal: number; consistent: boolean }> {
    const [rows, entries] = await Promise.all([
      this.rows.listByChat(chatId),
      this.ledger.listByChat(chatId),
    ]);
    const cachedTotal = rows.reduce((sum, row) => sum + row.totalPoints, 0);
    const ledgerTotal = entries.reduce((sum, entry) => sum + entry.points, 0);
    return { cachedTotal, ledgerTotal, consistent: cachedTotal === ledgerTotal };
  }
}

function assertDateKey(day: string): void {
  if (!isDateKey(day)) {
    throw new Error(`Invalid day "${day}", expected YYYY-MM-DD`);
  }
}
