import type {
  RenderLeaderboard,
  RenderSummary,
} from '../leaderboard/leaderboard.service.js';
import type { NotifyScoreCommand } from '../services/reminderEngine.service.js';
import type { CardDefinition } from '../types/core.js';
import { DONE_BUTTON_LABEL } from '../ui/keyboards.js';
import { formatSeconds } from './time.js';

export type NameResolver = (userId: string) => string;

export const DISCLAIMER =
  'Not medical advice. Skip anything that hurts and check with a doctor if you have an injury or condition.';

const MEDALS = ['🥇', '🥈', '🥉'];

function rankLabel(rank: number): string {
  return MEDALS[rank - 1] ?? `${rank}.`;
}

export function formatCard(card: CardDefinition): string {
  if (card.kind === 'wellness_tip') return card.text;

  return (
    `${card.text}\n\n` +
    `Takes at least ${formatSeconds(card.minDurationSeconds * 1000)}. ` +
    `Tap "${DONE_BUTTON_LABEL}" when you are finished.`
  );
}

export function formatScoreNotification(
  command: NotifyScoreCommand,
  name: string
): string {
  if (command.tier === 'rejected') {
    return `🚩 ${name}, that was too quick to count. No points this time and the streak starts over.`;
  }

  const streak = command.streak > 1 ? ` 🔥 Streak: ${command.streak}` : '';
  if (command.tier === 'reduced') {
    return (
      `🟡 ${name} +${command.points} (a little fast, half points). ` +
      `Total: ${command.newTotal}.${streak}`
    );
  }
  return `✅ ${name} +${command.points}. Total: ${command.newTotal}.${streak}`;
}

export function formatLeaderboard(
  board: RenderLeaderboard,
  nameOf: NameResolver
): string {
  const header = board.day
    ? `🏆 Leaderboard for ${board.day}`
    : '🏆 All-time leaderboard';

  if (!board.rows.length) {
    return `${header}\n\nNo points yet. Use /flashcard to get moving!`;
  }

  const lines = board.rows.map(
    (row) =>
      `${rankLabel(row.rank)} ${nameOf(row.userId)} - ${row.totalPoints} pts`
  );
  return [header, '', ...lines].join('\n');
}

export function formatSummary(
  summary: RenderSummary,
  nameOf: NameResolver
): string {
  const header = `📊 Summary for ${summary.day}`;
  if (!summary.totals.length) {
    return `${header}\n\nNo activity recorded for this day.`;
  }

  const lines = summary.totals.map(
    (total) =>
      `• ${nameOf(total.userId)}: ${total.points} pts, ` +
      `${total.completions}/${total.attempts} completed`
  );
  return [
    header,
    '',
    ...lines,
    '',
    `Chat total: ${summary.totalPoints} pts`,
  ].join('\n');
}
