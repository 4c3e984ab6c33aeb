import type {
  CardSessionRecord,
  IntervalMinutes,
  LeaderboardRow,
  ScoreEntryRecord,
  UserRecord,
} from '../types/core.js';
import type {
  NewCardSession,
  SessionTransitionPatch,
} from '../sessions/cardSession.machine.js';
import type { NewScoreEntry } from '../scoring/scoring.js';

export type UserPatch = Partial<
  Pick<
    UserRecord,
    | 'chatId'
    | 'intervalMinutes'
    | 'premium'
    | 'active'
    | 'streak'
    | 'lastSuccessAt'
    | 'lastIssuedAt'
    | 'lastActiveAt'
  >
>;

export interface NewUser {
  userId: string;
  chatId: string;
  intervalMinutes: IntervalMinutes;
  createdAt: Date;
}

export interface UserStore {
  findById(userId: string): Promise<UserRecord | null>;
  /** Creates the user, or returns the existing one untouched. */
  findOrCreate(input: NewUser): Promise<UserRecord>;
  update(userId: string, patch: UserPatch): Promise<UserRecord | null>;
  listActive(): Promise<UserRecord[]>;
}

export interface CardSessionStore {
  /** Throws PendingSessionConflictError when the user already has one pending. */
  create(input: NewCardSession): Promise<CardSessionRecord>;
  findById(sessionId: string): Promise<CardSessionRecord | null>;
  findPendingForUser(userId: string): Promise<CardSessionRecord | null>;
  /**
   * Applies the patch only while the session is still pending. Returns null
   * when another writer got there first.
   */
  completePending(
    sessionId: string,
    patch: SessionTransitionPatch
  ): Promise<CardSessionRecord | null>;
  /** Deletes a session that is still pending; used to roll back failed issues. */
  deletePending(sessionId: string): Promise<boolean>;
  listOverdue(now: Date): Promise<CardSessionRecord[]>;
  listForUser(userId: string): Promise<CardSessionRecord[]>;
}

export interface ScoreLedger {
  /** Throws DuplicateScoreEntryError when the session already has an entry. */
  append(entry: NewScoreEntry): Promise<ScoreEntryRecord>;
  findBySession(sessionId: string): Promise<ScoreEntryRecord | null>;
  listByChat(
    chatId: string,
    filter?: { dateKey?: string }
  ): Promise<ScoreEntryRecord[]>;
}

export interface LeaderboardStore {
  increment(params: {
    chatId: string;
    userId: string;
    points: number;
    at: Date;
  }): Promise<LeaderboardRow>;
  get(chatId: string, userId: string): Promise<LeaderboardRow | null>;
  listByChat(chatId: string): Promise<LeaderboardRow[]>;
  replaceChat(chatId: string, rows: LeaderboardRow[]): Promise<void>;
}

export interface Stores {
  users: UserStore;
  sessions: CardSessionStore;
  ledger: ScoreLedger;
  leaderboard: LeaderboardStore;
}
