import { describe, it, expect } from 'vitest';

import {
  formatCard,
  formatLeaderboard,
  formatScoreNotification,
  formatSummary,
} from './format.js';

const names: Record<string, string> = { u1: 'Ann', u2: 'Bo' };
const nameOf = (userId: string) => names[userId] ?? userId;

describe('formatCard', () => {
  it('adds the minimum duration and the button hint to exercises', () => {
    const text = formatCard({
      id: 'plank-side-45',
      kind: 'exercise',
      exerciseType: 'plank',
      text: 'Side plank, both sides.',
      minDurationSeconds: 90,
      weight: 1,
    });

    expect(text).toBe(
      'Side plank, both sides.\n\n' +
        'Takes at least 1m 30s. Tap "Done ✅" when you are finished.'
    );
  });

  it('sends tips as they are', () => {
    expect(
      formatCard({
        id: 'tip-hydration',
        kind: 'wellness_tip',
        text: 'Drink water.',
        weight: 1,
      })
    ).toBe('Drink water.');
  });
});

describe('formatScoreNotification', () => {
  const base = { userId: 'u1', chatId: 'c1', newTotal: 30 };

  it('shows the streak once it is above one', () => {
    expect(
      formatScoreNotification(
        { ...base, points: 10, tier: 'full', streak: 3 },
        'Ann'
      )
    ).toBe('✅ Ann +10. Total: 30. 🔥 Streak: 3');
    expect(
      formatScoreNotification(
        { ...base, points: 10, tier: 'full', streak: 1 },
        'Ann'
      )
    ).toBe('✅ Ann +10. Total: 30.');
  });

  it('explains reduced and rejected completions', () => {
    expect(
      formatScoreNotification(
        { ...base, points: 5, tier: 'reduced', streak: 1 },
        'Ann'
      )
    ).toBe('🟡 Ann +5 (a little fast, half points). Total: 30.');
    expect(
      formatScoreNotification(
        { ...base, points: 0, tier: 'rejected', streak: 0 },
        'Ann'
      )
    ).toBe(
      '🚩 Ann, that was too quick to count. No points this time and the streak starts over.'
    );
  });
});

describe('formatLeaderboard', () => {
  it('lists ranked rows with medals for the podium', () => {
    const row = { chatId: 'c1', entries: 1, lastScoredAt: null };
    const text = formatLeaderboard(
      {
        chatId: 'c1',
        day: '2024-03-05',
        rows: [
          { ...row, userId: 'u1', totalPoints: 30, rank: 1 },
          { ...row, userId: 'u2', totalPoints: 20, rank: 2 },
          { ...row, userId: 'u3', totalPoints: 10, rank: 3 },
          { ...row, userId: 'u4', totalPoints: 5, rank: 4 },
        ],
      },
      nameOf
    );

    expect(text.split('\n')).toEqual([
      '🏆 Leaderboard for 2024-03-05',
      '',
      '🥇 Ann - 30 pts',
      '🥈 Bo - 20 pts',
      '🥉 u3 - 10 pts',
      '4. u4 - 5 pts',
    ]);
  });

  it('says so when nobody has scored', () => {
    expect(formatLeaderboard({ chatId: 'c1', day: null, rows: [] }, nameOf)).toBe(
      '🏆 All-time leaderboard\n\nNo points yet. Use /flashcard to get moving!'
    );
  });
});

describe('formatSummary', () => {
  it('prints per-user totals and the chat total', () => {
    const text = formatSummary(
      {
        chatId: 'c1',
        day: '2024-03-05',
        totalPoints: 25,
        totals: [
          { userId: 'u1', points: 20, completions: 2, attempts: 3 },
          { userId: 'u2', points: 5, completions: 1, attempts: 1 },
        ],
      },
      nameOf
    );

    expect(text.split('\n')).toEqual([
      '📊 Summary for 2024-03-05',
      '',
      '• Ann: 20 pts, 2/3 completed',
      '• Bo: 5 pts, 1/1 completed',
      '',
      'Chat total: 25 pts',
    ]);
  });
});
