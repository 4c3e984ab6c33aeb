import { describe, it, expect } from 'vitest';
import { TelegramError } from 'telegraf';

import { DisplayNames } from './context.js';
import {
  TelegramDelivery,
  isTelegramBlockError,
  type MessageSender,
} from './telegram.delivery.js';
import type { CardKeyboard } from '../ui/keyboards.js';
import { DeliveryFailureError } from '../utils/errors.js';

interface SentMessage {
  chatId: string;
  text: string;
  extra?: CardKeyboard;
}

class FakeSender implements MessageSender {
  sent: SentMessage[] = [];
  failure: unknown = null;

  async sendMessage(
    chatId: string,
    text: string,
    extra?: CardKeyboard
  ): Promise<unknown> {
    if (this.failure) throw this.failure;
    this.sent.push({ chatId, text, extra });
    return {};
  }
}

const pushups = {
  id: 'pushups-10',
  kind: 'exercise',
  exerciseType: 'push_ups',
  text: '10 push-ups.',
  minDurationSeconds: 20,
  weight: 1,
} as const;

describe('isTelegramBlockError', () => {
  it('recognizes blocked and missing chats', () => {
    expect(
      isTelegramBlockError(
        new TelegramError({
          error_code: 403,
          description: 'Forbidden: bot was blocked by the user',
        })
      )
    ).toBe(true);
    expect(
      isTelegramBlockError(
        new TelegramError({
          error_code: 400,
          description: 'Bad Request: chat not found',
        })
      )
    ).toBe(true);
  });

  it('treats rate limits and plain errors as transient', () => {
    expect(
      isTelegramBlockError(
        new TelegramError({
          error_code: 429,
          description: 'Too Many Requests: retry after 5',
        })
      )
    ).toBe(false);
    expect(isTelegramBlockError(new Error('socket hang up'))).toBe(false);
  });
});

describe('TelegramDelivery', () => {
  it('attaches the Done button to exercise cards only', async () => {
    const sender = new FakeSender();
    const delivery = new TelegramDelivery(sender, new DisplayNames());

    await delivery.deliverCard({
      userId: 'u1',
      chatId: 'c1',
      sessionId: 's1',
      card: pushups,
    });
    await delivery.deliverCard({
      userId: 'u1',
      chatId: 'c1',
      sessionId: 's2',
      card: {
        id: 'tip-eyes',
        kind: 'wellness_tip',
        text: 'Look away.',
        weight: 1,
      },
    });

    expect(sender.sent[0].extra?.reply_markup).toMatchObject({
      inline_keyboard: [[{ text: 'Done ✅', callback_data: 'done:s1' }]],
    });
    expect(sender.sent[1]).toEqual({
      chatId: 'c1',
      text: 'Look away.',
      extra: undefined,
    });
  });

  it('marks blocked chats as permanent failures', async () => {
    const sender = new FakeSender();
    sender.failure = new TelegramError({
      error_code: 403,
      description: 'Forbidden: bot was blocked by the user',
    });
    const delivery = new TelegramDelivery(sender, new DisplayNames());

    const attempt = delivery.deliverCard({
      userId: 'u1',
      chatId: 'c1',
      sessionId: 's1',
      card: pushups,
    });

    await expect(attempt).rejects.toBeInstanceOf(DeliveryFailureError);
    await expect(attempt).rejects.toMatchObject({ permanent: true });
  });

  it('marks other send errors as transient', async () => {
    const sender = new FakeSender();
    sender.failure = new Error('ETIMEDOUT');
    const delivery = new TelegramDelivery(sender, new DisplayNames());

    await expect(
      delivery.deliverCard({
        userId: 'u1',
        chatId: 'c1',
        sessionId: 's1',
        card: pushups,
      })
    ).rejects.toMatchObject({
      permanent: false,
      message: 'Cannot deliver to chat c1: ETIMEDOUT',
    });
  });

  it('sends the score message to the chat', async () => {
    const sender = new FakeSender();
    const delivery = new TelegramDelivery(sender, new DisplayNames());

    await delivery.notifyScore({
      userId: 'u1',
      chatId: 'c1',
      points: 10,
      newTotal: 10,
      tier: 'full',
      streak: 1,
    });

    expect(sender.sent).toEqual([
      { chatId: 'c1', text: '✅ u1 +10. Total: 10.', extra: undefined },
    ]);
  });
});
