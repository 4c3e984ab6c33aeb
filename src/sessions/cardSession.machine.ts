import type {
  CardDefinition,
  CardSessionRecord,
  ExpiryReason,
} from '../types/core.js';

export type SessionEvent =
  | { type: 'acknowledge'; at: Date }
  | { type: 'expire'; at: Date; reason: ExpiryReason };

export type TransitionFailure =
  | 'not_pending'
  | 'not_acknowledgeable'
  | 'past_expiry';

export type TransitionResult =
  | { ok: true; session: CardSessionRecord }
  | { ok: false; reason: TransitionFailure };

export type NewCardSession = Omit<CardSessionRecord, 'id'>;

// Fields a pending -> terminal transition writes
export type SessionTransitionPatch = Pick<
  CardSessionRecord,
  'status' | 'acknowledgedAt' | 'expiredAt' | 'expiryReason'
>;

export function createPendingSession(params: {
  userId: string;
  chatId: string;
  card: CardDefinition;
  issuedAt: Date;
  graceWindowMs: number;
}): NewCardSession {
  return {
    userId: params.userId,
    chatId: params.chatId,
    cardId: params.card.id,
    cardKind: params.card.kind,
    issuedAt: params.issuedAt,
    expiresAt: new Date(params.issuedAt.getTime() + params.graceWindowMs),
    status: 'pending',
    acknowledgedAt: null,
    expiredAt: null,
    expiryReason: null,
  };
}

/**
 * pending -> acknowledged | expired. Terminal sessions never move again.
 */
export function transition(
  session: CardSessionRecord,
  event: SessionEvent
): TransitionResult {
  if (session.status !== 'pending') {
    return { ok: false, reason: 'not_pending' };
  }

  if (event.type === 'expire') {
    return {
      ok: true,
      session: {
        ...session,
        status: 'expired',
        expiredAt: event.at,
        expiryReason: event.reason,
      },
    };
  }

  if (session.cardKind !== 'exercise') {
    return { ok: false, reason: 'not_acknowledgeable' };
  }
  if (event.at.getTime() > session.expiresAt.getTime()) {
    return { ok: false, reason: 'past_expiry' };
  }

  return {
    ok: true,
    session: { ...session, status: 'acknowledged', acknowledgedAt: event.at },
  };
}

export function toTransitionPatch(
  session: CardSessionRecord
): SessionTransitionPatch {
  return {
    status: session.status,
    acknowledgedAt: session.acknowledgedAt,
    expiredAt: session.expiredAt,
    expiryReason: session.expiryReason,
  };
}

export function isOverdue(session: CardSessionRecord, now: Date): boolean {
  return (
    session.status === 'pending' &&
    now.getTime() >= session.expiresAt.getTime()
  );
}
