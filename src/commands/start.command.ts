import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';
import { buildMainKeyboard } from '../ui/keyboards.js';
import { DISCLAIMER } from '../utils/format.js';
import type { UserRecord } from '../types/core.js';

function buildStartMessage(firstName: string, user: UserRecord): string {
  const status = user.active
    ? `I will send you a short exercise card every ${user.intervalMinutes} minutes.`
    : 'Your reminders are paused. Send /resume to continue.';

  return (
    `Hello, ${firstName}! 👋\n\n` +
    `I am Desk Warrior - a bot that gets you off your chair during the workday.\n\n` +
    `${status}\n` +
    `Do the exercise, tap "Done ✅" and collect points for the chat leaderboard. ` +
    `Tapping before you could possibly have finished does not count.\n\n` +
    `⚠️ ${DISCLAIMER}`
  );
}

export function registerStartCommand(bot: Telegraf, deps: BotDeps): void {
  bot.start(async (ctx: Context) => {
    try {
      const identity = readIdentity(ctx);
      if (!identity || !ctx.from) {
        await ctx.reply(NO_IDENTITY_REPLY);
        return;
      }

      deps.names.remember(ctx);
      const user = await deps.engine.registerUser(identity);

      await ctx.reply(
        buildStartMessage(ctx.from.first_name, user),
        buildMainKeyboard()
      );
    } catch (error) {
      console.error('Error in /start handler:', error);
      await ctx.reply(
        'Something went wrong while initializing your profile. Please try again later.'
      );
    }
  });
}
