import { Types } from 'mongoose';

import type {
  CardSessionRecord,
  LeaderboardRow,
  ScoreEntryRecord,
  UserRecord,
} from '../types/core.js';
import type {
  NewCardSession,
  SessionTransitionPatch,
} from '../sessions/cardSession.machine.js';
import type { NewScoreEntry } from '../scoring/scoring.js';
import {
  DuplicateScoreEntryError,
  PendingSessionConflictError,
} from '../utils/errors.js';
import type {
  CardSessionStore,
  LeaderboardStore,
  NewUser,
  ScoreLedger,
  Stores,
  UserPatch,
  UserStore,
} from './types.js';

function newId(): string {
  return new Types.ObjectId().toHexString();
}

export class MemoryUserStore implements UserStore {
  private readonly users = new Map<string, UserRecord>();

  async findById(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async findOrCreate(input: NewUser): Promise<UserRecord> {
    const existing = this.users.get(input.userId);
    if (existing) return { ...existing };

    const user: UserRecord = {
      userId: input.userId,
      chatId: input.chatId,
      intervalMinutes: input.intervalMinutes,
      premium: false,
      active: true,
      streak: 0,
      lastSuccessAt: null,
      lastIssuedAt: null,
      lastActiveAt: null,
      createdAt: input.createdAt,
    };
    this.users.set(user.userId, user);
    return { ...user };
  }

  async update(userId: string, patch: UserPatch): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    if (!user) return null;
    const updated = { ...user, ...patch };
    this.users.set(userId, updated);
    return { ...updated };
  }

  async listActive(): Promise<UserRecord[]> {
    return [...this.users.values()]
      .filter((user) => user.active)
      .map((user) => ({ ...user }));
  }
}

export class MemoryCardSessionStore implements CardSessionStore {
  private readonly sessions = new Map<string, CardSessionRecord>();

  async create(input: NewCardSession): Promise<CardSessionRecord> {
    if (input.status === 'pending' && this.pendingFor(input.userId)) {
      throw new PendingSessionConflictError(input.userId);
    }
    const session: CardSessionRecord = { id: newId(), ...input };
    this.sessions.set(session.id, session);
    return { ...session };
  }

  async findById(sessionId: string): Promise<CardSessionRecord | null> {
    const session = this.sessions.get(sessionId);
    return session ? { ...session } : null;
  }

  async findPendingForUser(userId: string): Promise<CardSessionRecord | null> {
    const session = this.pendingFor(userId);
    return session ? { ...session } : null;
  }

  async completePending(
    sessionId: string,
    patch: SessionTransitionPatch
  ): Promise<CardSessionRecord | null> {
    const session = this.sessions.get(sessionId);
    if (!session || session.status !== 'pending') return null;
    const updated = { ...session, ...patch };
    this.sessions.set(sessionId, updated);
    return { ...updated };
  }

  async deletePending(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session || session.status !== 'pending') return false;
    return this.sessions.delete(sessionId);
  }

  async listOverdue(now: Date): Promise<CardSessionRecord[]> {
    return [...this.sessions.values()]
      .filter(
        (s) => s.status === 'pending' && s.expiresAt.getTime() <= now.getTime()
      )
      .map((s) => ({ ...s }));
  }

  async listForUser(userId: string): Promise<CardSessionRecord[]> {
    return [...this.sessions.values()]
      .filter((s) => s.userId === userId)
      .sort((a, b) => a.issuedAt.getTime() - b.issuedAt.getTime())
      .map((s) => ({ ...s }));
  }

  private pendingFor(userId: string): CardSessionRecord | undefined {
    for (const session of this.sessions.values()) {
      if (session.userId === userId && session.status === 'pending') {
        return session;
      }
    }
    return undefined;
  }
}

export class MemoryScoreLedger implements ScoreLedger {
  private readonly entries: ScoreEntryRecord[] = [];

  async append(entry: NewScoreEntry): Promise<ScoreEntryRecord> {
    if (this.entries.some((e) => e.sessionId === entry.sessionId)) {
      throw new DuplicateScoreEntryError(entry.sessionId);
    }
    const record: ScoreEntryRecord = { id: newId(), ...entry };
    this.entries.push(record);
    return { ...record };
  }

  async findBySession(sessionId: string): Promise<ScoreEntryRecord | null> {
    const entry = this.entries.find((e) => e.sessionId === sessionId);
    return entry ? { ...entry } : null;
  }

  async listByChat(
    chatId: string,
    filter: { dateKey?: string } = {}
  ): Promise<ScoreEntryRecord[]> {
    return this.entries
      .filter(
        (e) =>
          e.chatId === chatId &&
          (filter.dateKey === undefined || e.dateKey === filter.dateKey)
      )
      .map((e) => ({ ...e }));
  }
}

export class MemoryLeaderboardStore implements LeaderboardStore {
  private readonly rows = new Map<string, LeaderboardRow>();

  async increment(params: {
    chatId: string;
    userId: string;
    points: number;
    at: Date;
  }): Promise<LeaderboardRow> {
    const key = rowKey(params.chatId, params.userId);
    const current = this.rows.get(key) ?? {
      chatId: params.chatId,
      userId: params.userId,
      totalPoints: 0,
      entries: 0,
      lastScoredAt: null,
    };
    const updated: LeaderboardRow = {
      ...current,
      totalPoints: current.totalPoints + params.points,
      entries: current.entries + 1,
      lastScoredAt: params.points > 0 ? params.at : current.lastScoredAt,
    };
    this.rows.set(key, updated);
    return { ...updated };
  }

  async get(chatId: string, userId: string): Promise<LeaderboardRow | null> {
    const row = this.rows.get(rowKey(chatId, userId));
    return row ? { ...row } : null;
  }

  async listByChat(chatId: string): Promise<LeaderboardRow[]> {
    return [...this.rows.values()]
      .filter((row) => row.chatId === chatId)
      .map((row) => ({ ...row }));
  }

  async replaceChat(chatId: string, rows: LeaderboardRow[]): Promise<void> {
    for (const [key, row] of this.rows) {
      if (row.chatId === chatId) this.rows.delete(key);
    }
    for (const row of rows) {
      this.rows.set(rowKey(row.chatId, row.userId), { ...row });
    }
  }
}

function rowKey(chatId: string, userId: string): string {
  return `${chatId}:${userId}`;
}

export function createMemoryStores(): Stores {
  return {
    users: new MemoryUserStore(),
    sessions: new MemoryCardSessionStore(),
    ledger: new MemoryScoreLedger(),
    leaderboard: new MemoryLeaderboardStore(),
  };
}
