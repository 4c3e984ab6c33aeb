import { describe, it, expect } from 'vitest';

import {
  createPendingSession,
  isOverdue,
  toTransitionPatch,
  transition,
} from './cardSession.machine.js';
import type { CardDefinition, CardSessionRecord } from '../types/core.js';

const pushups: CardDefinition = {
  id: 'pushups-10',
  kind: 'exercise',
  exerciseType: 'push_ups',
  text: '10 push-ups',
  minDurationSeconds: 20,
  weight: 1,
};

const tip: CardDefinition = {
  id: 'tip-water',
  kind: 'wellness_tip',
  text: 'Drink water',
  weight: 1,
};

function pending(card: CardDefinition = pushups): CardSessionRecord {
  return {
    id: 's1',
    ...createPendingSession({
      userId: 'u1',
      chatId: 'c1',
      card,
      issuedAt: new Date(0),
      graceWindowMs: 600_000,
    }),
  };
}

describe('card session state machine', () => {
  it('creates pending sessions that expire after the grace window', () => {
    const session = pending();
    expect(session.status).toBe('pending');
    expect(session.cardKind).toBe('exercise');
    expect(session.expiresAt.getTime()).toBe(600_000);
    expect(session.acknowledgedAt).toBeNull();
  });

  it('acknowledges a pending exercise session', () => {
    const result = transition(pending(), {
      type: 'acknowledge',
      at: new Date(25_000),
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.session.status).toBe('acknowledged');
    expect(result.session.acknowledgedAt?.getTime()).toBe(25_000);
  });

  it('expires a pending session with the given reason', () => {
    const result = transition(pending(), {
      type: 'expire',
      at: new Date(600_000),
      reason: 'timeout',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(toTransitionPatch(result.session)).toEqual({
      status: 'expired',
      acknowledgedAt: null,
      expiredAt: new Date(600_000),
      expiryReason: 'timeout',
    });
  });

  it('never moves a terminal session', () => {
    const done = transition(pending(), { type: 'acknowledge', at: new Date(1) });
    if (!done.ok) throw new Error('expected acknowledgement');

    expect(
      transition(done.session, { type: 'acknowledge', at: new Date(2) })
    ).toEqual({ ok: false, reason: 'not_pending' });
    expect(
      transition(done.session, {
        type: 'expire',
        at: new Date(3),
        reason: 'timeout',
      })
    ).toEqual({ ok: false, reason: 'not_pending' });
  });

  it('refuses to acknowledge wellness tips', () => {
    expect(
      transition(pending(tip), { type: 'acknowledge', at: new Date(5000) })
    ).toEqual({ ok: false, reason: 'not_acknowledgeable' });
  });

  it('refuses acknowledgements stamped after the grace window', () => {
    expect(
      transition(pending(), { type: 'acknowledge', at: new Date(600_001) })
    ).toEqual({ ok: false, reason: 'past_expiry' });
  });

  it('detects overdue pending sessions', () => {
    expect(isOverdue(pending(), new Date(599_999))).toBe(false);
    expect(isOverdue(pending(), new Date(600_000))).toBe(true);
  });
});
