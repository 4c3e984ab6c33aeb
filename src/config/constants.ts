import type { ExerciseType, IntervalMinutes } from '../types/core.js';

export const FREE_INTERVAL_MINUTES: IntervalMinutes = 60;
export const PREMIUM_INTERVALS: readonly IntervalMinutes[] = [30, 45, 60];

// Must exceed the longest card duration in the catalog
export const DEFAULT_GRACE_WINDOW_SECONDS = 600;

// Completions faster than this share of the expected duration are rejected
export const DEFAULT_REJECT_RATIO = 1 / 3;

export const DEFAULT_WELLNESS_TIP_SHARE = 0.25;

export const DEFAULT_DELIVERY_ATTEMPTS = 2;
export const DEFAULT_DELIVERY_RETRY_SECONDS = 60;

export const DEFAULT_SUMMARY_TIMEZONE = 'UTC';

// Streak bonus in percent: +10% per consecutive completion, capped at x2
export const STREAK_BONUS_STEP_PERCENT = 10;
export const STREAK_BONUS_MAX_PERCENT = 200;

export const EXERCISE_POINTS: Record<ExerciseType, number> = {
  push_ups: 10,
  squats: 10,
  plank: 12,
  stretch: 6,
  walk: 8,
};

export const SWEEP_CRON = '* * * * *';

export const LEADERBOARD_TOP_N = 10;
