import type { Context } from 'telegraf';

import type { EngineConfig } from '../config/engine.config.js';
import type { ReminderEngine } from '../services/reminderEngine.service.js';

export interface Identity {
  userId: string;
  chatId: string;
}

/**
 * Display names seen in chat updates. Only kept in memory; users that have
 * not spoken since the last restart render as their Telegram id.
 */
export class DisplayNames {
  private readonly names = new Map<string, string>();

  remember(ctx: Context): void {
    const from = ctx.from;
    if (!from) return;
    const name = from.username ? `@${from.username}` : from.first_name;
    this.names.set(String(from.id), name);
  }

  resolve = (userId: string): string => this.names.get(userId) ?? userId;
}

export interface BotDeps {
  engine: ReminderEngine;
  names: DisplayNames;
  config: EngineConfig;
}

export function readIdentity(ctx: Context): Identity | null {
  if (!ctx.from || !ctx.chat) return null;
  return { userId: String(ctx.from.id), chatId: String(ctx.chat.id) };
}

export function readCommandArgs(ctx: Context): string[] {
  const message = ctx.message;
  const text = message && 'text' in message ? message.text : '';
  return text.trim().split(/\s+/).slice(1);
}

export const NO_PROFILE_REPLY =
  'You do not have a profile yet. Send /start first.';
export const NO_IDENTITY_REPLY =
  'Unable to read your Telegram profile. Please try again.';
