import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  readCommandArgs,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';
import { LEADERBOARD_TOP_N } from '../config/constants.js';
import { formatLeaderboard } from '../utils/format.js';

export type LeaderboardScope = 'today' | 'all';

export async function sendLeaderboard(
  ctx: Context,
  deps: BotDeps,
  scope: LeaderboardScope
): Promise<void> {
  const identity = readIdentity(ctx);
  if (!identity) {
    await ctx.reply(NO_IDENTITY_REPLY);
    return;
  }

  deps.names.remember(ctx);
  const board =
    scope === 'all'
      ? await deps.engine.getLeaderboard(identity.chatId, LEADERBOARD_TOP_N)
      : await deps.engine.getDailyLeaderboard(
          identity.chatId,
          deps.engine.todayKey(),
          LEADERBOARD_TOP_N
        );

  await ctx.reply(formatLeaderboard(board, deps.names.resolve));
}

export function registerLeaderboardCommand(
  bot: Telegraf,
  deps: BotDeps
): void {
  bot.command('leaderboard', async (ctx: Context) => {
    const [arg] = readCommandArgs(ctx);
    if (arg && arg !== 'all') {
      await ctx.reply('Usage: /leaderboard or /leaderboard all');
      return;
    }

    try {
      await sendLeaderboard(ctx, deps, arg === 'all' ? 'all' : 'today');
    } catch (error) {
      console.error('Error in /leaderboard handler:', error);
      await ctx.reply('Could not load the leaderboard. Please try again later.');
    }
  });
}
