import type { Telegraf } from 'telegraf';

import { readIdentity, type BotDeps } from '../bot/context.js';
import type { AcknowledgeOutcome } from '../services/reminderEngine.service.js';
import { DONE_ACTION_PREFIX } from '../ui/keyboards.js';
import { describeError } from '../utils/errors.js';

const DONE_ACTION = new RegExp(`^${DONE_ACTION_PREFIX}(.+)$`);

function describeAcknowledgement(outcome: AcknowledgeOutcome): string {
  if (outcome.status === 'scored') {
    const points = outcome.entry.points;
    return points > 0 ? `+${points} 💪` : 'Too fast 🚩';
  }

  switch (outcome.reason) {
    case 'no_pending_session':
      return 'This card is not yours.';
    case 'duplicate_acknowledgement':
      return 'Already counted 👍';
    case 'session_expired':
      return 'This card has expired ⌛';
    case 'not_acknowledgeable':
      return 'Nothing to confirm here.';
  }
}

export function registerDoneHandler(bot: Telegraf, deps: BotDeps): void {
  bot.action(DONE_ACTION, async (ctx) => {
    const sessionId = ctx.match[1];
    const identity = readIdentity(ctx);
    if (!identity) {
      await ctx.answerCbQuery();
      return;
    }

    try {
      deps.names.remember(ctx);
      const outcome = await deps.engine.acknowledge(
        identity.userId,
        sessionId,
        new Date()
      );
      await ctx.answerCbQuery(describeAcknowledgement(outcome));

      const settled =
        outcome.status === 'scored' ||
        outcome.reason === 'session_expired' ||
        outcome.reason === 'duplicate_acknowledgement';
      if (settled) {
        await ctx.editMessageReplyMarkup(undefined).catch((error: unknown) => {
          console.warn(
            `⚠️ Could not remove Done button for session ${sessionId}: ${describeError(error)}`
          );
        });
      }
    } catch (error) {
      console.error(`Error handling Done for session ${sessionId}:`, error);
      await ctx.answerCbQuery('Something went wrong, please tap again.');
    }
  });
}
