import {
  DEFAULT_DELIVERY_ATTEMPTS,
  DEFAULT_DELIVERY_RETRY_SECONDS,
  DEFAULT_GRACE_WINDOW_SECONDS,
  DEFAULT_REJECT_RATIO,
  DEFAULT_SUMMARY_TIMEZONE,
  DEFAULT_WELLNESS_TIP_SHARE,
} from './constants.js';
import { isValidTimezone } from '../utils/time.js';

export type StoreDriver = 'mongo' | 'memory';

export interface EngineConfig {
  storeDriver: StoreDriver;
  graceWindowMs: number;
  rejectRatio: number;
  streakBonusEnabled: boolean;
  summaryTimezone: string;
  deliveryAttempts: number;
  deliveryRetryMs: number;
  wellnessTipShare: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  storeDriver: 'mongo',
  graceWindowMs: DEFAULT_GRACE_WINDOW_SECONDS * 1000,
  rejectRatio: DEFAULT_REJECT_RATIO,
  streakBonusEnabled: false,
  summaryTimezone: DEFAULT_SUMMARY_TIMEZONE,
  deliveryAttempts: DEFAULT_DELIVERY_ATTEMPTS,
  deliveryRetryMs: DEFAULT_DELIVERY_RETRY_SECONDS * 1000,
  wellnessTipShare: DEFAULT_WELLNESS_TIP_SHARE,
};

type EnvSource = Record<string, string | undefined>;

function readNumber(
  env: EnvSource,
  key: string,
  fallback: number,
  isValid: (value: number) => boolean
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    throw new Error(`Invalid ${key}: "${raw}"`);
  }
  return value;
}

function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  throw new Error(`Invalid ${key}: "${raw}"`);
}

function readStoreDriver(env: EnvSource): StoreDriver {
  const raw = env.STORE_DRIVER?.trim().toLowerCase();
  if (!raw) return DEFAULT_ENGINE_CONFIG.storeDriver;
  if (raw === 'mongo' || raw === 'memory') return raw;
  throw new Error(`Invalid STORE_DRIVER: "${raw}" (expected mongo or memory)`);
}

/**
 * Build engine settings from environment variables, falling back to defaults
 * for anything unset. Throws on malformed values so the process never starts
 * half-configured.
 */
export function resolveEngineConfig(env: EnvSource): EngineConfig {
  const summaryTimezone =
    env.SUMMARY_TIMEZONE?.trim() || DEFAULT_ENGINE_CONFIG.summaryTimezone;
  if (!isValidTimezone(summaryTimezone)) {
    throw new Error(`Invalid SUMMARY_TIMEZONE: "${summaryTimezone}"`);
  }

  return {
    storeDriver: readStoreDriver(env),
    graceWindowMs:
      readNumber(
        env,
        'GRACE_WINDOW_SECONDS',
        DEFAULT_GRACE_WINDOW_SECONDS,
        (v) => v > 0
      ) * 1000,
    rejectRatio: readNumber(
      env,
      'REJECT_RATIO',
      DEFAULT_REJECT_RATIO,
      (v) => v > 0 && v < 1
    ),
    streakBonusEnabled: readBoolean(env, 'STREAK_BONUS_ENABLED', false),
    summaryTimezone,
    deliveryAttempts: readNumber(
      env,
      'DELIVERY_ATTEMPTS',
      DEFAULT_DELIVERY_ATTEMPTS,
      (v) => Number.isInteger(v) && v >= 1
    ),
    deliveryRetryMs:
      readNumber(
        env,
        'DELIVERY_RETRY_SECONDS',
        DEFAULT_DELIVERY_RETRY_SECONDS,
        (v) => v > 0
      ) * 1000,
    wellnessTipShare: readNumber(
      env,
      'WELLNESS_TIP_SHARE',
      DEFAULT_WELLNESS_TIP_SHARE,
      (v) => v >= 0 && v < 1
    ),
  };
}
