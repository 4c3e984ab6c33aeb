// Card kinds in the catalog
export type CardKind = 'exercise' | 'wellness_tip';

// Exercise sub-types, each with its own nominal points
export type ExerciseType = 'push_ups' | 'squats' | 'plank' | 'stretch' | 'walk';

// Session lifecycle
export type SessionStatus = 'pending' | 'acknowledged' | 'expired';

export type ExpiryReason =
  | 'timeout'
  | 'paused'
  | 'informational'
  | 'late_acknowledgement';

// Anti-cheat classification of a completion
export type ValidationTier = 'rejected' | 'reduced' | 'full';

// Reminder cadence in minutes
export type IntervalMinutes = 30 | 45 | 60;

export interface ExerciseCard {
  id: string;
  kind: 'exercise';
  exerciseType: ExerciseType;
  text: string;
  minDurationSeconds: number;
  weight: number;
}

export interface WellnessTipCard {
  id: string;
  kind: 'wellness_tip';
  text: string;
  weight: number;
}

export type CardDefinition = ExerciseCard | WellnessTipCard;

export interface UserRecord {
  userId: string;
  chatId: string;
  intervalMinutes: IntervalMinutes;
  premium: boolean;
  active: boolean;
  streak: number;
  lastSuccessAt: Date | null;
  lastIssuedAt: Date | null;
  lastActiveAt: Date | null;
  createdAt: Date;
}

export interface CardSessionRecord {
  id: string;
  userId: string;
  chatId: string;
  cardId: string;
  cardKind: CardKind;
  issuedAt: Date;
  expiresAt: Date;
  status: SessionStatus;
  acknowledgedAt: Date | null;
  expiredAt: Date | null;
  expiryReason: ExpiryReason | null;
}

export interface ValidationResult {
  sessionId: string;
  tier: ValidationTier;
  elapsedMs: number;
  expectedMs: number;
}

export interface ScoreEntryRecord {
  id: string;
  userId: string;
  chatId: string;
  sessionId: string;
  cardId: string;
  tier: ValidationTier;
  points: number;
  streak: number;
  createdAt: Date;
  dateKey: string; // "YYYY-MM-DD" in the summary timezone
}

export interface LeaderboardRow {
  chatId: string;
  userId: string;
  totalPoints: number;
  entries: number;
  lastScoredAt: Date | null;
}
