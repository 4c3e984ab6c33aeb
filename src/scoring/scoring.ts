import {
  EXERCISE_POINTS,
  STREAK_BONUS_MAX_PERCENT,
  STREAK_BONUS_STEP_PERCENT,
} from '../config/constants.js';
import { minutesToMs } from '../utils/time.js';
import type {
  ExerciseCard,
  ScoreEntryRecord,
  UserRecord,
  ValidationResult,
  ValidationTier,
} from '../types/core.js';

export interface ScoringOptions {
  streakBonusEnabled: boolean;
}

export type NewScoreEntry = Omit<ScoreEntryRecord, 'id'>;

export interface ScoreOutcome {
  entry: NewScoreEntry;
  streak: number;
  lastSuccessAt: Date | null;
  basePoints: number;
  bonusPercent: number;
}

export function basePointsFor(tier: ValidationTier, nominal: number): number {
  if (tier === 'rejected' || nominal <= 0) return 0;
  if (tier === 'reduced') return Math.max(1, Math.floor(nominal / 2));
  return nominal;
}

/**
 * Successes no more than two intervals apart extend the streak; a rejected
 * completion drops it to zero so the next success starts over at 1.
 */
export function nextStreak(
  previous: Pick<UserRecord, 'streak' | 'lastSuccessAt'>,
  tier: ValidationTier,
  at: Date,
  intervalMs: number
): number {
  if (tier === 'rejected') return 0;
  if (!previous.lastSuccessAt || previous.streak <= 0) return 1;

  const gap = at.getTime() - previous.lastSuccessAt.getTime();
  return gap <= 2 * intervalMs ? previous.streak + 1 : 1;
}

export function streakBonusPercent(streak: number, enabled: boolean): number {
  if (!enabled || streak <= 1) return 100;
  return Math.min(
    100 + (streak - 1) * STREAK_BONUS_STEP_PERCENT,
    STREAK_BONUS_MAX_PERCENT
  );
}

export function score(params: {
  user: Pick<
    UserRecord,
    'userId' | 'chatId' | 'streak' | 'lastSuccessAt' | 'intervalMinutes'
  >;
  validation: ValidationResult;
  card: ExerciseCard;
  at: Date;
  dateKey: string;
  options: ScoringOptions;
}): ScoreOutcome {
  const { user, validation, card, at } = params;

  const basePoints = basePointsFor(
    validation.tier,
    EXERCISE_POINTS[card.exerciseType]
  );
  const streak = nextStreak(
    user,
    validation.tier,
    at,
    minutesToMs(user.intervalMinutes)
  );
  const bonusPercent = streakBonusPercent(
    streak,
    params.options.streakBonusEnabled
  );
  const points = Math.floor((basePoints * bonusPercent) / 100);

  return {
    entry: {
      userId: user.userId,
      chatId: user.chatId,
      sessionId: validation.sessionId,
      cardId: card.id,
      tier: validation.tier,
      points,
      streak,
      createdAt: at,
      dateKey: params.dateKey,
    },
    streak,
    lastSuccessAt: validation.tier === 'rejected' ? user.lastSuccessAt : at,
    basePoints,
    bonusPercent,
  };
}
