import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  NO_PROFILE_REPLY,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';

export async function pauseReminders(
  ctx: Context,
  deps: BotDeps
): Promise<void> {
  const identity = readIdentity(ctx);
  if (!identity) {
    await ctx.reply(NO_IDENTITY_REPLY);
    return;
  }

  const outcome = await deps.engine.pauseUser(identity.userId);
  if (!outcome.ok) {
    await ctx.reply(NO_PROFILE_REPLY);
    return;
  }

  const dropped = outcome.expiredSessionId
    ? ' Your open card was cancelled.'
    : '';
  await ctx.reply(`⏸️ Reminders paused.${dropped} Send /resume to continue.`);
}

export async function resumeReminders(
  ctx: Context,
  deps: BotDeps
): Promise<void> {
  const identity = readIdentity(ctx);
  if (!identity) {
    await ctx.reply(NO_IDENTITY_REPLY);
    return;
  }

  const outcome = await deps.engine.resumeUser(identity.userId);
  if (!outcome.ok) {
    await ctx.reply(NO_PROFILE_REPLY);
    return;
  }

  await ctx.reply(
    `▶️ Reminders resumed. Next card within ${outcome.user.intervalMinutes} minutes.`
  );
}

export function registerPauseCommands(bot: Telegraf, deps: BotDeps): void {
  bot.command('pause', async (ctx: Context) => {
    try {
      await pauseReminders(ctx, deps);
    } catch (error) {
      console.error('Error in /pause handler:', error);
      await ctx.reply('Something went wrong. Please try again later.');
    }
  });

  bot.command('resume', async (ctx: Context) => {
    try {
      await resumeReminders(ctx, deps);
    } catch (error) {
      console.error('Error in /resume handler:', error);
      await ctx.reply('Something went wrong. Please try again later.');
    }
  });
}
