import type { Context, Telegraf } from 'telegraf';

import {
  NO_IDENTITY_REPLY,
  NO_PROFILE_REPLY,
  readIdentity,
  type BotDeps,
} from '../bot/context.js';
import type { IssueOutcome } from '../services/reminderEngine.service.js';

function describeIssue(outcome: IssueOutcome): string | null {
  if (outcome.status === 'issued') return null;
  if (outcome.status === 'delivery_failed') {
    return 'Could not send a card right now. I will try again shortly.';
  }

  switch (outcome.reason) {
    case 'user_not_found':
      return NO_PROFILE_REPLY;
    case 'user_paused':
      return 'Your reminders are paused. Send /resume first.';
    case 'pending_session_exists':
      return 'You already have a card waiting. Finish that one first 💪';
    case 'interval_not_elapsed':
      return 'Your next card is not due yet.';
  }
}

export async function requestFlashcard(
  ctx: Context,
  deps: BotDeps
): Promise<void> {
  const identity = readIdentity(ctx);
  if (!identity) {
    await ctx.reply(NO_IDENTITY_REPLY);
    return;
  }

  deps.names.remember(ctx);
  const outcome = await deps.engine.requestCard(identity.userId);
  const reply = describeIssue(outcome);
  if (reply) await ctx.reply(reply);
}

export function registerFlashcardCommand(bot: Telegraf, deps: BotDeps): void {
  bot.command('flashcard', async (ctx: Context) => {
    try {
      await requestFlashcard(ctx, deps);
    } catch (error) {
      console.error('Error in /flashcard handler:', error);
      await ctx.reply('Something went wrong. Please try again later.');
    }
  });
}
