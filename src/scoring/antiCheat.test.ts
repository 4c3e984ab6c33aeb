import { describe, it, expect } from 'vitest';

import { classify, classifyElapsed } from './antiCheat.js';
import type { CardDefinition, CardSessionRecord } from '../types/core.js';

const squats: CardDefinition = {
  id: 'squats-60',
  kind: 'exercise',
  exerciseType: 'squats',
  text: '30 squats',
  minDurationSeconds: 60,
  weight: 1,
};

function acknowledgedAfter(ms: number | null): CardSessionRecord {
  return {
    id: 's1',
    userId: 'u1',
    chatId: 'c1',
    cardId: squats.id,
    cardKind: 'exercise',
    issuedAt: new Date(1_000_000),
    expiresAt: new Date(1_600_000),
    status: ms === null ? 'pending' : 'acknowledged',
    acknowledgedAt: ms === null ? null : new Date(1_000_000 + ms),
    expiredAt: null,
    expiryReason: null,
  };
}

describe('classifyElapsed', () => {
  const third = 1 / 3;

  it('rejects an instant completion', () => {
    expect(classifyElapsed(0, 60_000, third)).toBe('rejected');
  });

  it('gives full credit at the expected duration', () => {
    expect(classifyElapsed(60_000, 60_000, third)).toBe('full');
  });

  it('reduces credit at half the expected duration', () => {
    expect(classifyElapsed(30_000, 60_000, third)).toBe('reduced');
  });

  it('applies the tier boundaries inclusively from below', () => {
    expect(classifyElapsed(4_999, 20_000, 0.25)).toBe('rejected');
    expect(classifyElapsed(5_000, 20_000, 0.25)).toBe('reduced');
    expect(classifyElapsed(19_999, 20_000, 0.25)).toBe('reduced');
    expect(classifyElapsed(20_000, 20_000, 0.25)).toBe('full');
  });

  it('has no upper bound', () => {
    expect(classifyElapsed(3_600_000, 20_000, third)).toBe('full');
  });

  it('treats negative elapsed time as zero', () => {
    expect(classifyElapsed(-5_000, 20_000, third)).toBe('rejected');
  });
});

describe('classify', () => {
  it('measures elapsed time from issuance to acknowledgement', () => {
    expect(classify(acknowledgedAfter(2_000), squats, { rejectRatio: 1 / 3 })).toEqual({
      sessionId: 's1',
      tier: 'rejected',
      elapsedMs: 2_000,
      expectedMs: 60_000,
    });
    expect(
      classify(acknowledgedAfter(75_000), squats, { rejectRatio: 1 / 3 }).tier
    ).toBe('full');
  });

  it('refuses sessions without an acknowledgement', () => {
    expect(() =>
      classify(acknowledgedAfter(null), squats, { rejectRatio: 1 / 3 })
    ).toThrow('Session s1 has not been acknowledged');
  });

  it('refuses wellness tips', () => {
    const tip: CardDefinition = {
      id: 'tip-eyes',
      kind: 'wellness_tip',
      text: 'Rest your eyes',
      weight: 1,
    };
    expect(() =>
      classify(acknowledgedAfter(1_000), tip, { rejectRatio: 1 / 3 })
    ).toThrow('Card tip-eyes is not an exercise and cannot be validated');
  });
});
