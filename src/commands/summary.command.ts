import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  readCommandArgs,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';
import { formatSummary } from '../utils/format.js';
import { isDateKey } from '../utils/time.js';

export async function sendSummary(
  ctx: Context,
  deps: BotDeps,
  day: string
): Promise<void> {
  const identity = readIdentity(ctx);
  if (!identity) {
    await ctx.reply(NO_IDENTITY_REPLY);
    return;
  }

  deps.names.remember(ctx);
  const summary = await deps.engine.getSummary(identity.chatId, day);
  await ctx.reply(formatSummary(summary, deps.names.resolve));
}

export function registerSummaryCommand(bot: Telegraf, deps: BotDeps): void {
  bot.command('summary', async (ctx: Context) => {
    const [day] = readCommandArgs(ctx);
    if (day && !isDateKey(day)) {
      await ctx.reply('Usage: /summary or /summary 2024-03-05');
      return;
    }

    try {
      await sendSummary(ctx, deps, day ?? deps.engine.todayKey());
    } catch (error) {
      console.error('Error in /summary handler:', error);
      await ctx.reply('Could not build the summary. Please try again later.');
    }
  });
}
