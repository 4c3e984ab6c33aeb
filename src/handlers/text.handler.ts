import type { Context, Telegraf } from 'telegraf';

import type { BotDeps } from '../bot/context.js';
import { requestFlashcard } from '../commands/flashcard.command.js';
import { sendHelp } from '../commands/help.command.js';
import { sendLeaderboard } from '../commands/leaderboard.command.js';
import { pauseReminders, resumeReminders } from '../commands/pause.command.js';
import { sendSummary } from '../commands/summary.command.js';
import { HELP_BUTTON_LABEL, QUICK_ACTION_LABELS } from '../ui/keyboards.js';

type QuickAction = (ctx: Context, deps: BotDeps) => Promise<void>;

const QUICK_ACTIONS: Record<string, QuickAction> = {
  [QUICK_ACTION_LABELS.flashcard]: requestFlashcard,
  [QUICK_ACTION_LABELS.leaderboard]: (ctx, deps) =>
    sendLeaderboard(ctx, deps, 'today'),
  [QUICK_ACTION_LABELS.summary]: (ctx, deps) =>
    sendSummary(ctx, deps, deps.engine.todayKey()),
  [QUICK_ACTION_LABELS.pause]: pauseReminders,
  [QUICK_ACTION_LABELS.resume]: resumeReminders,
  [HELP_BUTTON_LABEL]: sendHelp,
};

/** Reply-keyboard buttons; any other text only refreshes the sender's name. */
export function registerTextHandler(bot: Telegraf, deps: BotDeps): void {
  bot.on('text', async (ctx) => {
    deps.names.remember(ctx);

    const action = QUICK_ACTIONS[ctx.message.text.trim()];
    if (!action) return;

    try {
      await action(ctx, deps);
    } catch (error) {
      console.error('Error in quick action handler:', error);
      await ctx.reply('Something went wrong. Please try again later.');
    }
  });
}
