import type { Context, Telegraf } from 'telegraf';

import type { BotDeps } from '../bot/context.js';
import { buildMainKeyboard } from '../ui/keyboards.js';
import { DISCLAIMER } from '../utils/format.js';
import { formatSeconds } from '../utils/time.js';

export function registerHelpCommand(bot: Telegraf, deps: BotDeps): void {
  bot.command('help', async (ctx: Context) => {
    await sendHelp(ctx, deps);
  });
}

export async function sendHelp(ctx: Context, deps: BotDeps): Promise<void> {
  const grace = formatSeconds(deps.config.graceWindowMs);
  const lines = [
    'Available commands:',
    '/start - Create profile and start reminders',
    '/help - Show this list',
    '/flashcard - Get an exercise card right now',
    "/leaderboard [all] - Today's ranking in this chat, or all time",
    '/summary [YYYY-MM-DD] - Points and completions for a day',
    '/interval [30|45|60] - Show or change the reminder interval',
    '/pause - Stop reminders',
    '/resume - Start reminders again',
    '',
    'How it works:',
    '- Free accounts get a card every 60 minutes; premium can pick 30 or 45',
    '- Each exercise has a minimum duration; finishing faster earns half points',
    '- Tapping "Done ✅" implausibly fast earns nothing and resets your streak',
    '- Consecutive completions build a streak 🔥',
    `- A card you do not finish within ${grace} expires`,
    '- Wellness tips are just for reading, no button needed',
    '',
    `⚠️ ${DISCLAIMER}`,
  ];

  await ctx.reply(lines.join('\n'), buildMainKeyboard());
}
