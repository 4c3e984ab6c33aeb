import { TelegramError } from 'telegraf';

import type {
  CardDeliveryPort,
  DeliverCardCommand,
  NotifyScoreCommand,
  ScoreNotifier,
} from '../services/reminderEngine.service.js';
import { buildCardKeyboard, type CardKeyboard } from '../ui/keyboards.js';
import { DeliveryFailureError, describeError } from '../utils/errors.js';
import { formatCard, formatScoreNotification } from '../utils/format.js';
import type { DisplayNames } from './context.js';

/** The slice of `bot.telegram` the delivery adapter needs. */
export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    extra?: CardKeyboard
  ): Promise<unknown>;
}

export function isTelegramBlockError(error: unknown): boolean {
  if (!(error instanceof TelegramError)) return false;

  return (
    error.code === 403 ||
    error.code === 401 ||
    /bot was blocked by the user/i.test(error.description) ||
    /user is deactivated/i.test(error.description) ||
    /chat not found/i.test(error.description)
  );
}

/**
 * Sends cards with a Done button and score messages into the user's chat.
 * Blocked chats surface as permanent delivery failures.
 */
export class TelegramDelivery implements CardDeliveryPort, ScoreNotifier {
  constructor(
    private readonly sender: MessageSender,
    private readonly names: DisplayNames
  ) {}

  async deliverCard(command: DeliverCardCommand): Promise<void> {
    const text = formatCard(command.card);
    const extra =
      command.card.kind === 'exercise'
        ? buildCardKeyboard(command.sessionId)
        : undefined;

    try {
      await this.sender.sendMessage(command.chatId, text, extra);
    } catch (error) {
      const permanent = isTelegramBlockError(error);
      throw new DeliveryFailureError(
        `Cannot deliver to chat ${command.chatId}: ${describeError(error)}`,
        permanent,
        { cause: error }
      );
    }
  }

  async notifyScore(command: NotifyScoreCommand): Promise<void> {
    const name = this.names.resolve(command.userId);
    await this.sender.sendMessage(
      command.chatId,
      formatScoreNotification(command, name)
    );
  }
}
