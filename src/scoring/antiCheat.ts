import type {
  CardDefinition,
  CardSessionRecord,
  ValidationResult,
  ValidationTier,
} from '../types/core.js';

export interface AntiCheatThresholds {
  // share of the expected duration below which a completion is impossible
  rejectRatio: number;
}

export function classifyElapsed(
  elapsedMs: number,
  expectedMs: number,
  rejectRatio: number
): ValidationTier {
  const elapsed = Math.max(0, elapsedMs);
  if (elapsed < expectedMs * rejectRatio) return 'rejected';
  if (elapsed < expectedMs) return 'reduced';
  return 'full';
}

/**
 * Judge an acknowledged exercise session against its card's minimum
 * plausible duration. Pure: same inputs, same tier.
 */
export function classify(
  session: CardSessionRecord,
  card: CardDefinition,
  thresholds: AntiCheatThresholds
): ValidationResult {
  if (card.kind !== 'exercise') {
    throw new Error(`Card ${card.id} is not an exercise and cannot be validated`);
  }
  if (!session.acknowledgedAt) {
    throw new Error(`Session ${session.id} has not been acknowledged`);
  }

  const elapsedMs = session.acknowledgedAt.getTime() - session.issuedAt.getTime();
  const expectedMs = card.minDurationSeconds * 1000;

  return {
    sessionId: session.id,
    tier: classifyElapsed(elapsedMs, expectedMs, thresholds.rejectRatio),
    elapsedMs: Math.max(0, elapsedMs),
    expectedMs,
  };
}
