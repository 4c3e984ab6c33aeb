import type { Clock } from '../clock/clock.js';
import { TimerRegistry } from '../clock/timerRegistry.js';
import type { CardCatalog, RandomSource } from '../catalog/catalog.js';
import type { EngineConfig } from '../config/engine.config.js';
import {
  FREE_INTERVAL_MINUTES,
  PREMIUM_INTERVALS,
} from '../config/constants.js';
import {
  LeaderboardAggregator,
  type RenderLeaderboard,
  type RenderSummary,
} from '../leaderboard/leaderboard.service.js';
import { classify } from '../scoring/antiCheat.js';
import { score } from '../scoring/scoring.js';
import {
  createPendingSession,
  isOverdue,
  toTransitionPatch,
  transition,
} from '../sessions/cardSession.machine.js';
import type { Stores, UserPatch } from '../stores/types.js';
import type {
  CardDefinition,
  CardSessionRecord,
  ExpiryReason,
  IntervalMinutes,
  ScoreEntryRecord,
  UserRecord,
  ValidationResult,
  ValidationTier,
} from '../types/core.js';
import {
  DeliveryFailureError,
  DuplicateScoreEntryError,
  PendingSessionConflictError,
  describeError,
} from '../utils/errors.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import { getDateKeyForTimezone, minutesToMs } from '../utils/time.js';

// Outbound commands

export interface DeliverCardCommand {
  userId: string;
  chatId: string;
  sessionId: string;
  card: CardDefinition;
}

export interface NotifyScoreCommand {
  userId: string;
  chatId: string;
  points: number;
  newTotal: number;
  tier: ValidationTier;
  streak: number;
}

/** Sends a card; rejects when the card could not be delivered. */
export interface CardDeliveryPort {
  deliverCard(command: DeliverCardCommand): Promise<void>;
}

export interface ScoreNotifier {
  notifyScore(command: NotifyScoreCommand): Promise<void>;
}

// Outcomes

export type IssueSkipReason =
  | 'user_not_found'
  | 'user_paused'
  | 'pending_session_exists'
  | 'interval_not_elapsed';

export type IssueOutcome =
  | { status: 'issued'; session: CardSessionRecord; card: CardDefinition }
  | { status: 'delivery_failed'; sessionId: string }
  | { status: 'skipped'; reason: IssueSkipReason };

export type DeliveryResultOutcome =
  | { status: 'confirmed'; session: CardSessionRecord }
  | { status: 'rolled_back'; sessionId: string }
  | { status: 'ignored'; reason: 'unknown_session' | 'not_pending' };

export type AcknowledgeIgnoreReason =
  | 'no_pending_session'
  | 'duplicate_acknowledgement'
  | 'not_acknowledgeable'
  | 'session_expired';

export type AcknowledgeOutcome =
  | {
      status: 'scored';
      entry: ScoreEntryRecord;
      validation: ValidationResult;
      newTotal: number;
    }
  | { status: 'ignored'; reason: AcknowledgeIgnoreReason };

export type ConfigureIntervalOutcome =
  | { ok: true; user: UserRecord }
  | {
      ok: false;
      reason: 'user_not_found' | 'invalid_interval_config';
      allowed: readonly IntervalMinutes[];
    };

export type UserUpdateOutcome =
  | { ok: true; user: UserRecord; expiredSessionId: string | null }
  | { ok: false; reason: 'user_not_found' };

export interface SweepResult {
  expired: number;
  rearmed: number;
}

export interface ReminderEngineDeps {
  stores: Stores;
  clock: Clock;
  catalog: CardCatalog;
  delivery: CardDeliveryPort;
  notifier: ScoreNotifier;
  config: EngineConfig;
  random?: RandomSource;
}

type DeliveryAttemptResult = 'delivered' | 'failed' | 'blocked';

const tickKey = (userId: string) => `tick:${userId}`;
const expireKey = (userId: string) => `expire:${userId}`;

export function allowedIntervals(
  user: Pick<UserRecord, 'premium'>
): readonly IntervalMinutes[] {
  return user.premium ? PREMIUM_INTERVALS : [FREE_INTERVAL_MINUTES];
}

function isIntervalMinutes(value: number): value is IntervalMinutes {
  return PREMIUM_INTERVALS.some((interval) => interval === value);
}

/**
 * Per-user reminder loop plus the acknowledgement path. Every mutation of a
 * user's sessions, streak or interval runs under that user's lock; different
 * users never wait on each other.
 */
export class ReminderEngine {
  readonly leaderboard: LeaderboardAggregator;

  private readonly stores: Stores;
  private readonly clock: Clock;
  private readonly catalog: CardCatalog;
  private readonly delivery: CardDeliveryPort;
  private readonly notifier: ScoreNotifier;
  private readonly config: EngineConfig;
  private readonly random: RandomSource;
  private readonly timers: TimerRegistry;
  private readonly userLocks = new KeyedMutex();

  constructor(deps: ReminderEngineDeps) {
    const longestMs = deps.catalog.longestDurationSeconds() * 1000;
    if (deps.config.graceWindowMs <= longestMs) {
      throw new Error(
        `Grace window (${deps.config.graceWindowMs}ms) must exceed the longest card duration (${longestMs}ms)`
      );
    }

    this.stores = deps.stores;
    this.clock = deps.clock;
    this.catalog = deps.catalog;
    this.delivery = deps.delivery;
    this.notifier = deps.notifier;
    this.config = deps.config;
    this.random = deps.random ?? Math.random;
    this.timers = new TimerRegistry(deps.clock);
    this.leaderboard = new LeaderboardAggregator(
      deps.stores.ledger,
      deps.stores.leaderboard
    );
  }

  // --- users ---

  async registerUser(params: {
    userId: string;
    chatId: string;
  }): Promise<UserRecord> {
    return this.userLocks.runExclusive(params.userId, async () => {
      const now = this.clock.now();
      const created = await this.stores.users.findOrCreate({
        userId: params.userId,
        chatId: params.chatId,
        intervalMinutes: FREE_INTERVAL_MINUTES,
        createdAt: now,
      });
      // Reminders follow the chat the user last registered from
      const patch: UserPatch = { lastActiveAt: now };
      if (created.chatId !== params.chatId) {
        console.log(
          `🔀 User ${params.userId} moved from chat ${created.chatId} to ${params.chatId}`
        );
        patch.chatId = params.chatId;
      }
      const user =
        (await this.stores.users.update(params.userId, patch)) ?? created;

      if (user.active) {
        const pending = await this.stores.sessions.findPendingForUser(
          user.userId
        );
        if (pending) this.armExpiry(pending);
        this.armTick(user, pending);
      }
      return user;
    });
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    return this.stores.users.findById(userId);
  }

  async configureInterval(
    userId: string,
    minutes: number
  ): Promise<ConfigureIntervalOutcome> {
    return this.userLocks.runExclusive(userId, () =>
      this.configureIntervalLocked(userId, minutes)
    );
  }

  /** Losing premium drops the user back to the free interval. */
  async setPremium(
    userId: string,
    premium: boolean
  ): Promise<UserUpdateOutcome> {
    return this.userLocks.runExclusive(userId, () =>
      this.setPremiumLocked(userId, premium)
    );
  }

  async pauseUser(userId: string): Promise<UserUpdateOutcome> {
    return this.userLocks.runExclusive(userId, () => this.pauseLocked(userId));
  }

  async resumeUser(userId: string): Promise<UserUpdateOutcome> {
    return this.userLocks.runExclusive(userId, () => this.resumeLocked(userId));
  }

  // --- issuing ---

  /** Issues a card when nothing is pending and the interval has passed. */
  async onTick(userId: string): Promise<IssueOutcome> {
    return this.issue(userId, false);
  }

  /** On-demand card; ignores the interval but never the one-pending rule. */
  async requestCard(userId: string): Promise<IssueOutcome> {
    return this.issue(userId, true);
  }

  /**
   * Outcome of a delivery attempt. A failed delivery rolls the session back
   * so the next tick can try again.
   */
  async handleDeliveryResult(
    sessionId: string,
    ok: boolean
  ): Promise<DeliveryResultOutcome> {
    const session = await this.stores.sessions.findById(sessionId);
    if (!session) return { status: 'ignored', reason: 'unknown_session' };

    return this.userLocks.runExclusive(session.userId, () =>
      this.deliveryResultLocked(sessionId, ok)
    );
  }

  // --- acknowledgement ---

  async acknowledge(
    userId: string,
    sessionId: string,
    at: Date
  ): Promise<AcknowledgeOutcome> {
    const outcome = await this.userLocks.runExclusive(userId, () =>
      this.acknowledgeLocked(userId, sessionId, at)
    );

    if (outcome.status === 'scored') {
      try {
        await this.notifier.notifyScore({
          userId,
          chatId: outcome.entry.chatId,
          points: outcome.entry.points,
          newTotal: outcome.newTotal,
          tier: outcome.entry.tier,
          streak: outcome.entry.streak,
        });
      } catch (error) {
        console.warn(
          `⚠️ Score notification failed for user ${userId}: ${describeError(error)}`
        );
      }
    }
    return outcome;
  }

  // --- queries ---

  todayKey(): string {
    return getDateKeyForTimezone(this.config.summaryTimezone, this.clock.now());
  }

  async getLeaderboard(
    chatId: string,
    topN: number
  ): Promise<RenderLeaderboard> {
    return this.leaderboard.getLeaderboard(chatId, topN);
  }

  async getDailyLeaderboard(
    chatId: string,
    day: string,
    topN: number
  ): Promise<RenderLeaderboard> {
    return this.leaderboard.getDailyLeaderboard(chatId, day, topN);
  }

  async getSummary(chatId: string, day: string): Promise<RenderSummary> {
    return this.leaderboard.getSummary(chatId, day);
  }

  // --- maintenance ---

  /**
   * Expires overdue sessions and re-arms timers that are missing, e.g. after
   * a restart. Safe to run at any time.
   */
  async sweep(): Promise<SweepResult> {
    const now = this.clock.now();
    let expired = 0;
    let rearmed = 0;

    for (const session of await this.stores.sessions.listOverdue(now)) {
      const result = await this.userLocks.runExclusive(session.userId, () =>
        this.expireIfDueLocked(session.id)
      );
      if (result) expired += 1;
    }

    for (const user of await this.stores.users.listActive()) {
      const armedNow = await this.userLocks.runExclusive(user.userId, () =>
        this.restoreTimersLocked(user.userId)
      );
      if (armedNow) rearmed += 1;
    }

    return { expired, rearmed };
  }

  hasTimer(kind: 'tick' | 'expire', userId: string): boolean {
    const key = kind === 'tick' ? tickKey(userId) : expireKey(userId);
    return this.timers.has(key);
  }

  stop(): void {
    this.timers.cancelAll();
  }

  // --- internals ---

  private async configureIntervalLocked(
    userId: string,
    minutes: number
  ): Promise<ConfigureIntervalOutcome> {
    const user = await this.stores.users.findById(userId);
    if (!user) {
      return {
        ok: false,
        reason: 'user_not_found',
        allowed: [FREE_INTERVAL_MINUTES],
      };
    }

    const allowed = allowedIntervals(user);
    if (!isIntervalMinutes(minutes) || !allowed.includes(minutes)) {
      console.warn(
        `⚠️ Rejected interval ${minutes}min for user ${userId} (allowed: ${allowed.join('/')})`
      );
      return { ok: false, reason: 'invalid_interval_config', allowed };
    }

    const updated =
      (await this.stores.users.update(userId, { intervalMinutes: minutes })) ??
      user;
    await this.rearmLocked(updated);

    console.log(`⏱️ User ${userId} interval set to ${minutes}min`);
    return { ok: true, user: updated };
  }

  private async setPremiumLocked(
    userId: string,
    premium: boolean
  ): Promise<UserUpdateOutcome> {
    const user = await this.stores.users.findById(userId);
    if (!user) return { ok: false, reason: 'user_not_found' };

    const intervalMinutes = allowedIntervals({ premium }).includes(
      user.intervalMinutes
    )
      ? user.intervalMinutes
      : FREE_INTERVAL_MINUTES;

    const updated =
      (await this.stores.users.update(userId, { premium, intervalMinutes })) ??
      user;
    if (updated.intervalMinutes !== user.intervalMinutes) {
      await this.rearmLocked(updated);
    }
    return { ok: true, user: updated, expiredSessionId: null };
  }

  private async pauseLocked(userId: string): Promise<UserUpdateOutcome> {
    const user = await this.stores.users.update(userId, { active: false });
    if (!user) return { ok: false, reason: 'user_not_found' };

    this.timers.cancel(tickKey(userId));
    const pending = await this.stores.sessions.findPendingForUser(userId);
    let expiredSessionId: string | null = null;
    if (pending) {
      const expired = await this.expireLocked(pending, 'paused');
      expiredSessionId = expired?.id ?? null;
    }

    console.log(`⏸️ Reminders paused for user ${userId}`);
    return { ok: true, user, expiredSessionId };
  }

  private async resumeLocked(userId: string): Promise<UserUpdateOutcome> {
    const user = await this.stores.users.update(userId, {
      active: true,
      lastActiveAt: this.clock.now(),
    });
    if (!user) return { ok: false, reason: 'user_not_found' };

    this.armTick(user, null);
    console.log(`▶️ Reminders resumed for user ${userId}`);
    return { ok: true, user, expiredSessionId: null };
  }

  private async deliveryResultLocked(
    sessionId: string,
    ok: boolean
  ): Promise<DeliveryResultOutcome> {
    const current = await this.stores.sessions.findById(sessionId);
    if (!current) return { status: 'ignored', reason: 'unknown_session' };

    if (!ok) {
      if (current.status !== 'pending') {
        return { status: 'ignored', reason: 'not_pending' };
      }
      await this.stores.sessions.deletePending(current.id);
      this.timers.cancel(expireKey(current.userId));

      const user = await this.stores.users.findById(current.userId);
      if (user?.active) {
        const retryAt = new Date(
          this.clock.now().getTime() + this.config.deliveryRetryMs
        );
        this.timers.armAt(tickKey(user.userId), retryAt, async () => {
          await this.onTick(user.userId);
        });
      }
      console.warn(
        `⚠️ Delivery failed for session ${current.id}, rolled back (user ${current.userId})`
      );
      return { status: 'rolled_back', sessionId: current.id };
    }

    const user = await this.stores.users.update(current.userId, {
      lastIssuedAt: current.issuedAt,
    });

    let confirmed = current;
    if (current.cardKind === 'wellness_tip' && current.status === 'pending') {
      confirmed =
        (await this.expireLocked(current, 'informational')) ?? current;
    }

    if (user?.active) {
      this.armTick(user, confirmed.status === 'pending' ? confirmed : null);
    }
    return { status: 'confirmed', session: confirmed };
  }

  private async issue(userId: string, force: boolean): Promise<IssueOutcome> {
    const prepared = await this.userLocks.runExclusive(userId, () =>
      this.prepareIssueLocked(userId, force)
    );
    if ('status' in prepared) return prepared;

    const { session, card } = prepared;
    const attempt = await this.deliverWithRetry({
      userId,
      chatId: session.chatId,
      sessionId: session.id,
      card,
    });

    const result = await this.handleDeliveryResult(
      session.id,
      attempt === 'delivered'
    );

    if (attempt === 'blocked') {
      await this.pauseUser(userId);
    }

    if (result.status === 'confirmed') {
      console.log(
        `📤 Card ${card.id} issued to user ${userId} (session ${session.id})`
      );
      return { status: 'issued', session: result.session, card };
    }
    return { status: 'delivery_failed', sessionId: session.id };
  }

  private async prepareIssueLocked(
    userId: string,
    force: boolean
  ): Promise<
    | { status: 'skipped'; reason: IssueSkipReason }
    | { session: CardSessionRecord; card: CardDefinition }
  > {
    const now = this.clock.now();
    const user = await this.stores.users.findById(userId);
    if (!user) return { status: 'skipped', reason: 'user_not_found' };
    if (!user.active) return { status: 'skipped', reason: 'user_paused' };

    const pending = await this.stores.sessions.findPendingForUser(userId);
    if (pending) {
      if (!isOverdue(pending, now)) {
        this.armExpiry(pending);
        this.armTick(user, pending);
        return { status: 'skipped', reason: 'pending_session_exists' };
      }
      // missed expiry timer; settle it before issuing
      await this.expireLocked(pending, 'timeout');
    }

    if (!force && user.lastIssuedAt) {
      const elapsed = now.getTime() - user.lastIssuedAt.getTime();
      if (elapsed < minutesToMs(user.intervalMinutes)) {
        this.armTick(user, null);
        return { status: 'skipped', reason: 'interval_not_elapsed' };
      }
    }

    const card = this.catalog.pick(this.random);
    let session: CardSessionRecord;
    try {
      session = await this.stores.sessions.create(
        createPendingSession({
          userId,
          chatId: user.chatId,
          card,
          issuedAt: now,
          graceWindowMs: this.config.graceWindowMs,
        })
      );
    } catch (error) {
      if (error instanceof PendingSessionConflictError) {
        return { status: 'skipped', reason: 'pending_session_exists' };
      }
      throw error;
    }

    this.armExpiry(session);
    return { session, card };
  }

  private async deliverWithRetry(
    command: DeliverCardCommand
  ): Promise<DeliveryAttemptResult> {
    for (let attempt = 1; attempt <= this.config.deliveryAttempts; attempt++) {
      try {
        await this.delivery.deliverCard(command);
        return 'delivered';
      } catch (error) {
        console.warn(
          `  ⚠️ Delivery attempt ${attempt}/${this.config.deliveryAttempts} failed for user ${command.userId}: ${describeError(error)}`
        );
        if (error instanceof DeliveryFailureError && error.permanent) {
          return 'blocked';
        }
      }
    }
    return 'failed';
  }

  private async acknowledgeLocked(
    userId: string,
    sessionId: string,
    at: Date
  ): Promise<AcknowledgeOutcome> {
    const session = await this.stores.sessions.findById(sessionId);
    if (!session || session.userId !== userId) {
      console.log(`ℹ️ Done tap from ${userId} for unknown session ${sessionId}`);
      return { status: 'ignored', reason: 'no_pending_session' };
    }

    if (session.cardKind !== 'exercise') {
      return { status: 'ignored', reason: 'not_acknowledgeable' };
    }

    const result = transition(session, { type: 'acknowledge', at });
    if (!result.ok) {
      if (result.reason === 'past_expiry') {
        await this.expireLocked(session, 'late_acknowledgement');
        return { status: 'ignored', reason: 'session_expired' };
      }
      if (session.status === 'expired') {
        return { status: 'ignored', reason: 'session_expired' };
      }
      console.log(
        `ℹ️ Duplicate Done tap for ${session.status} session ${sessionId}`
      );
      return { status: 'ignored', reason: 'duplicate_acknowledgement' };
    }

    const card = this.catalog.get(session.cardId);
    if (!card || card.kind !== 'exercise') {
      return { status: 'ignored', reason: 'not_acknowledgeable' };
    }

    const acknowledged = await this.stores.sessions.completePending(
      session.id,
      toTransitionPatch(result.session)
    );
    if (!acknowledged) {
      return { status: 'ignored', reason: 'duplicate_acknowledgement' };
    }
    this.timers.cancel(expireKey(userId));

    const validation = classify(acknowledged, card, {
      rejectRatio: this.config.rejectRatio,
    });
    if (validation.tier === 'rejected') {
      console.warn(
        `🚩 Suspicious completion by user ${userId}: ${validation.elapsedMs}ms for card ${card.id} (expected ${validation.expectedMs}ms)`
      );
    }

    const user = await this.stores.users.findById(userId);
    if (!user) {
      throw new Error(
        `User ${userId} owns session ${sessionId} but does not exist`
      );
    }

    const outcome = score({
      user: { ...user, chatId: acknowledged.chatId },
      validation,
      card,
      at,
      dateKey: getDateKeyForTimezone(this.config.summaryTimezone, at),
      options: { streakBonusEnabled: this.config.streakBonusEnabled },
    });

    let entry: ScoreEntryRecord;
    try {
      entry = await this.stores.ledger.append(outcome.entry);
    } catch (error) {
      if (error instanceof DuplicateScoreEntryError) {
        return { status: 'ignored', reason: 'duplicate_acknowledgement' };
      }
      throw error;
    }

    const updated = await this.stores.users.update(userId, {
      streak: outcome.streak,
      lastSuccessAt: outcome.lastSuccessAt,
      lastActiveAt: at,
    });
    // The tick may have been pushed to the end of the grace window
    if (updated?.active) this.armTick(updated, null);
    const row = await this.leaderboard.onScoreEntry(entry);

    console.log(
      `✅ User ${userId} scored ${entry.points} (${validation.tier}, streak ${entry.streak})`
    );
    return {
      status: 'scored',
      entry,
      validation,
      newTotal: row.totalPoints,
    };
  }

  private async expireIfDueLocked(
    sessionId: string
  ): Promise<CardSessionRecord | null> {
    const session = await this.stores.sessions.findById(sessionId);
    if (!session || session.status !== 'pending') return null;

    if (!isOverdue(session, this.clock.now())) {
      this.armExpiry(session);
      return null;
    }
    return this.expireLocked(session, 'timeout');
  }

  private async expireLocked(
    session: CardSessionRecord,
    reason: ExpiryReason
  ): Promise<CardSessionRecord | null> {
    const result = transition(session, {
      type: 'expire',
      at: this.clock.now(),
      reason,
    });
    if (!result.ok) return null;

    const expired = await this.stores.sessions.completePending(
      session.id,
      toTransitionPatch(result.session)
    );
    this.timers.cancel(expireKey(session.userId));
    if (!expired) return null;

    if (reason === 'timeout' || reason === 'late_acknowledgement') {
      console.log(
        `⌛ Session ${session.id} for user ${session.userId} expired`
      );
    }

    const user = await this.stores.users.findById(session.userId);
    if (user?.active) this.armTick(user, null);
    return expired;
  }

  private async restoreTimersLocked(userId: string): Promise<boolean> {
    const user = await this.stores.users.findById(userId);
    if (!user?.active) return false;

    let armed = false;
    const pending = await this.stores.sessions.findPendingForUser(user.userId);
    if (pending && !this.timers.has(expireKey(user.userId))) {
      this.armExpiry(pending);
      armed = true;
    }
    if (!this.timers.has(tickKey(user.userId))) {
      this.armTick(user, pending);
      armed = true;
    }
    return armed;
  }

  private async rearmLocked(user: UserRecord): Promise<void> {
    if (!user.active) return;
    const pending = await this.stores.sessions.findPendingForUser(user.userId);
    if (pending) this.armExpiry(pending);
    this.armTick(user, pending);
  }

  private armTick(user: UserRecord, pending: CardSessionRecord | null): void {
    const now = this.clock.now().getTime();
    const base = (user.lastIssuedAt ?? user.createdAt).getTime();
    let at = Math.max(now, base + minutesToMs(user.intervalMinutes));
    if (pending) at = Math.max(at, pending.expiresAt.getTime());

    this.timers.armAt(tickKey(user.userId), new Date(at), async () => {
      await this.onTick(user.userId);
    });
  }

  private armExpiry(session: CardSessionRecord): void {
    const key = expireKey(session.userId);
    this.timers.armAt(key, session.expiresAt, async () => {
      await this.userLocks.runExclusive(session.userId, () =>
        this.expireIfDueLocked(session.id)
      );
    });
  }
}
