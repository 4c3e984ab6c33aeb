import type { Types } from 'mongoose';

import { UserModel, type UserFields } from '../models/user.model.js';
import {
  CardSessionModel,
  type CardSessionFields,
} from '../models/cardSession.model.js';
import {
  ScoreEntryModel,
  type ScoreEntryFields,
} from '../models/scoreEntry.model.js';
import {
  LeaderboardRowModel,
  type LeaderboardRowFields,
} from '../models/leaderboardRow.model.js';
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
  isDuplicateKeyError,
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

type WithId<T> = T & { _id: Types.ObjectId };

function toUserRecord(doc: UserFields): UserRecord {
  return {
    userId: doc.userId,
    chatId: doc.chatId,
    intervalMinutes: doc.intervalMinutes,
    premium: doc.premium,
    active: doc.active,
    streak: doc.streak,
    lastSuccessAt: doc.lastSuccessAt ?? null,
    lastIssuedAt: doc.lastIssuedAt ?? null,
    lastActiveAt: doc.lastActiveAt ?? null,
    createdAt: doc.createdAt,
  };
}

function toSessionRecord(doc: WithId<CardSessionFields>): CardSessionRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId,
    chatId: doc.chatId,
    cardId: doc.cardId,
    cardKind: doc.cardKind,
    issuedAt: doc.issuedAt,
    expiresAt: doc.expiresAt,
    status: doc.status,
    acknowledgedAt: doc.acknowledgedAt ?? null,
    expiredAt: doc.expiredAt ?? null,
    expiryReason: doc.expiryReason ?? null,
  };
}

function toScoreEntryRecord(doc: WithId<ScoreEntryFields>): ScoreEntryRecord {
  return {
    id: doc._id.toString(),
    userId: doc.userId,
    chatId: doc.chatId,
    sessionId: doc.sessionId,
    cardId: doc.cardId,
    tier: doc.tier,
    points: doc.points,
    streak: doc.streak,
    createdAt: doc.createdAt,
    dateKey: doc.dateKey,
  };
}

function toLeaderboardRow(doc: LeaderboardRowFields): LeaderboardRow {
  return {
    chatId: doc.chatId,
    userId: doc.userId,
    totalPoints: doc.totalPoints,
    entries: doc.entries,
    lastScoredAt: doc.lastScoredAt ?? null,
  };
}

export class MongoUserStore implements UserStore {
  async findById(userId: string): Promise<UserRecord | null> {
    const doc = await UserModel.findOne({ userId }).lean().exec();
    return doc ? toUserRecord(doc) : null;
  }

  async findOrCreate(input: NewUser): Promise<UserRecord> {
    const doc = await UserModel.findOneAndUpdate(
      { userId: input.userId },
      {
        $setOnInsert: {
          userId: input.userId,
          chatId: input.chatId,
          intervalMinutes: input.intervalMinutes,
          createdAt: input.createdAt,
        },
      },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    )
      .lean()
      .exec();

    if (!doc) {
      throw new Error(`Failed to upsert user ${input.userId}`);
    }
    return toUserRecord(doc);
  }

  async update(userId: string, patch: UserPatch): Promise<UserRecord | null> {
    const doc = await UserModel.findOneAndUpdate(
      { userId },
      { $set: patch },
      { new: true }
    )
      .lean()
      .exec();
    return doc ? toUserRecord(doc) : null;
  }

  async listActive(): Promise<UserRecord[]> {
    const docs = await UserModel.find({ active: true }).lean().exec();
    return docs.map(toUserRecord);
  }
}

export class MongoCardSessionStore implements CardSessionStore {
  async create(input: NewCardSession): Promise<CardSessionRecord> {
    try {
      const doc = await CardSessionModel.create(input);
      return toSessionRecord(doc);
    } catch (error) {
      // partial unique index on pending sessions
      if (isDuplicateKeyError(error)) {
        throw new PendingSessionConflictError(input.userId);
      }
      throw error;
    }
  }

  async findById(sessionId: string): Promise<CardSessionRecord | null> {
    if (!isObjectIdHex(sessionId)) return null;
    const doc = await CardSessionModel.findById(sessionId).lean().exec();
    return doc ? toSessionRecord(doc) : null;
  }

  async findPendingForUser(userId: string): Promise<CardSessionRecord | null> {
    const doc = await CardSessionModel.findOne({ userId, status: 'pending' })
      .lean()
      .exec();
    return doc ? toSessionRecord(doc) : null;
  }

  async completePending(
    sessionId: string,
    patch: SessionTransitionPatch
  ): Promise<CardSessionRecord | null> {
    if (!isObjectIdHex(sessionId)) return null;
    const doc = await CardSessionModel.findOneAndUpdate(
      { _id: sessionId, status: 'pending' },
      { $set: patch },
      { new: true }
    )
      .lean()
      .exec();
    return doc ? toSessionRecord(doc) : null;
  }

  async deletePending(sessionId: string): Promise<boolean> {
    if (!isObjectIdHex(sessionId)) return false;
    const result = await CardSessionModel.deleteOne({
      _id: sessionId,
      status: 'pending',
    }).exec();
    return result.deletedCount === 1;
  }

  async listOverdue(now: Date): Promise<CardSessionRecord[]> {
    const docs = await CardSessionModel.find({
      status: 'pending',
      expiresAt: { $lte: now },
    })
      .lean()
      .exec();
    return docs.map(toSessionRecord);
  }

  async listForUser(userId: string): Promise<CardSessionRecord[]> {
    const docs = await CardSessionModel.find({ userId })
      .sort({ issuedAt: 1 })
      .lean()
      .exec();
    return docs.map(toSessionRecord);
  }
}

export class MongoScoreLedger implements ScoreLedger {
  async append(entry: NewScoreEntry): Promise<ScoreEntryRecord> {
    try {
      const doc = await ScoreEntryModel.create(entry);
      return toScoreEntryRecord(doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateScoreEntryError(entry.sessionId);
      }
      throw error;
    }
  }

  async findBySession(sessionId: string): Promise<ScoreEntryRecord | null> {
    const doc = await ScoreEntryModel.findOne({ sessionId }).lean().exec();
    return doc ? toScoreEntryRecord(doc) : null;
  }

  async listByChat(
    chatId: string,
    filter: { dateKey?: string } = {}
  ): Promise<ScoreEntryRecord[]> {
    const query =
      filter.dateKey === undefined
        ? { chatId }
        : { chatId, dateKey: filter.dateKey };
    const docs = await ScoreEntryModel.find(query)
      .sort({ createdAt: 1 })
      .lean()
      .exec();
    return docs.map(toScoreEntryRecord);
  }
}

export class MongoLeaderboardStore implements LeaderboardStore {
  async increment(params: {
    chatId: string;
    userId: string;
    points: number;
    at: Date;
  }): Promise<LeaderboardRow> {
    const update =
      params.points > 0
        ? {
            $inc: { totalPoints: params.points, entries: 1 },
            $set: { lastScoredAt: params.at },
          }
        : {
            $inc: { totalPoints: 0, entries: 1 },
            $setOnInsert: { lastScoredAt: null },
          };

    const doc = await LeaderboardRowModel.findOneAndUpdate(
      { chatId: params.chatId, userId: params.userId },
      update,
      { upsert: true, new: true }
    )
      .lean()
      .exec();

    if (!doc) {
      throw new Error(
        `Failed to update leaderboard row ${params.chatId}/${params.userId}`
      );
    }
    return toLeaderboardRow(doc);
  }

  async get(chatId: string, userId: string): Promise<LeaderboardRow | null> {
    const doc = await LeaderboardRowModel.findOne({ chatId, userId })
      .lean()
      .exec();
    return doc ? toLeaderboardRow(doc) : null;
  }

  async listByChat(chatId: string): Promise<LeaderboardRow[]> {
    const docs = await LeaderboardRowModel.find({ chatId }).lean().exec();
    return docs.map(toLeaderboardRow);
  }

  async replaceChat(chatId: string, rows: LeaderboardRow[]): Promise<void> {
    await LeaderboardRowModel.deleteMany({ chatId }).exec();
    if (rows.length > 0) {
      await LeaderboardRowModel.insertMany(rows);
    }
  }
}

function isObjectIdHex(value: string): boolean {
  return /^[a-f0-9]{24}$/i.test(value);
}

export function createMongoStores(): Stores {
  return {
    users: new MongoUserStore(),
    sessions: new MongoCardSessionStore(),
    ledger: new MongoScoreLedger(),
    leaderboard: new MongoLeaderboardStore(),
  };
}
