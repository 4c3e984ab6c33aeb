import { Markup } from 'telegraf';

export const QUICK_ACTION_LABELS = {
  flashcard: '🏋️ Flashcard',
  leaderboard: '🏆 Leaderboard',
  summary: '📊 Summary',
  pause: '⏸️ Pause',
  resume: '▶️ Resume',
} as const;

export const HELP_BUTTON_LABEL = '❓ Help';

export const DONE_BUTTON_LABEL = 'Done ✅';
export const DONE_ACTION_PREFIX = 'done:';

export function buildMainKeyboard() {
  return Markup.keyboard([
    [QUICK_ACTION_LABELS.flashcard, QUICK_ACTION_LABELS.leaderboard],
    [QUICK_ACTION_LABELS.summary, HELP_BUTTON_LABEL],
    [QUICK_ACTION_LABELS.pause, QUICK_ACTION_LABELS.resume],
  ]).resize();
}

/** Inline "Done" button carrying the session id in its callback data. */
export function buildCardKeyboard(sessionId: string) {
  return Markup.inlineKeyboard([
    Markup.button.callback(
      DONE_BUTTON_LABEL,
      `${DONE_ACTION_PREFIX}${sessionId}`
    ),
  ]);
}

export function buildIntervalKeyboard(allowed: readonly number[]) {
  return Markup.keyboard([allowed.map((minutes) => `/interval ${minutes}`)])
    .oneTime()
    .resize();
}

export type CardKeyboard = ReturnType<typeof buildCardKeyboard>;
