import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  NO_PROFILE_REPLY,
  readCommandArgs,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';
import { allowedIntervals } from '../services/reminderEngine.service.js';
import { buildIntervalKeyboard, buildMainKeyboard } from '../ui/keyboards.js';

export function registerIntervalCommand(bot: Telegraf, deps: BotDeps): void {
  bot.command('interval', async (ctx: Context) => {
    try {
      const identity = readIdentity(ctx);
      if (!identity) {
        await ctx.reply(NO_IDENTITY_REPLY);
        return;
      }

      const [arg] = readCommandArgs(ctx);
      if (!arg) {
        const user = await deps.engine.getUser(identity.userId);
        if (!user) {
          await ctx.reply(NO_PROFILE_REPLY);
          return;
        }
        const allowed = allowedIntervals(user);
        await ctx.reply(
          `Current interval: ${user.intervalMinutes} minutes.\n` +
            `Available: ${allowed.join(', ')} minutes.`,
          buildIntervalKeyboard(allowed)
        );
        return;
      }

      const outcome = await deps.engine.configureInterval(
        identity.userId,
        Number(arg)
      );
      if (outcome.ok) {
        await ctx.reply(
          `Interval updated to ${outcome.user.intervalMinutes} minutes.`,
          buildMainKeyboard()
        );
        return;
      }

      if (outcome.reason === 'user_not_found') {
        await ctx.reply(NO_PROFILE_REPLY);
        return;
      }
      const premiumHint =
        outcome.allowed.length === 1
          ? ' Shorter intervals are a premium feature.'
          : '';
      await ctx.reply(
        `Allowed intervals: ${outcome.allowed.join(', ')} minutes.${premiumHint}`
      );
    } catch (error) {
      console.error('Error in /interval handler:', error);
      await ctx.reply('Could not update the interval. Please try again later.');
    }
  });
}
