import 'dotenv/config';
import mongoose from 'mongoose';
import { Telegraf } from 'telegraf';

import { DisplayNames, type BotDeps } from './bot/context.js';
import { TelegramDelivery } from './bot/telegram.delivery.js';
import { CardCatalog } from './catalog/catalog.js';
import { DEFAULT_CARDS } from './catalog/cards.js';
import { systemClock } from './clock/clock.js';
import { resolveEngineConfig } from './config/engine.config.js';
import { registerStartCommand } from './commands/start.command.js';
import { registerHelpCommand } from './commands/help.command.js';
import { registerFlashcardCommand } from './commands/flashcard.command.js';
import { registerLeaderboardCommand } from './commands/leaderboard.command.js';
import { registerSummaryCommand } from './commands/summary.command.js';
import { registerIntervalCommand } from './commands/interval.command.js';
import { registerPauseCommands } from './commands/pause.command.js';
import { registerDoneHandler } from './handlers/done.handler.js';
import { registerTextHandler } from './handlers/text.handler.js';
import { startMaintenanceScheduler } from './scheduler/maintenanceScheduler.js';
import { ReminderEngine } from './services/reminderEngine.service.js';
import { createMemoryStores } from './stores/memory.store.js';
import { createMongoStores } from './stores/mongo.store.js';
import type { Stores } from './stores/types.js';

// Validate required environment variables
const botToken = process.env.TELEGRAM_BOT_TOKEN;

if (!botToken) {
  throw new Error(
    'TELEGRAM_BOT_TOKEN is not defined in the environment variables'
  );
}

const validatedBotToken: string = botToken;
const config = resolveEngineConfig(process.env);

async function connectToDatabase(mongoUri: string): Promise<void> {
  try {
    await mongoose.connect(mongoUri);
    console.log('✅ MongoDB connection established');
  } catch (error) {
    console.error('❌ MongoDB connection failed:', error);
    process.exit(1);
  }
}

async function createStores(): Promise<Stores> {
  if (config.storeDriver === 'memory') {
    console.warn('⚠️ Using in-memory stores; data is lost on restart');
    return createMemoryStores();
  }

  const mongoUri = process.env.MONGODB_URI;
  if (!mongoUri) {
    throw new Error('MONGODB_URI is not defined in the environment variables');
  }
  await connectToDatabase(mongoUri);
  return createMongoStores();
}

async function main(): Promise<void> {
  const stores = await createStores();

  const bot = new Telegraf(validatedBotToken);
  const names = new DisplayNames();
  const delivery = new TelegramDelivery(bot.telegram, names);

  const engine = new ReminderEngine({
    stores,
    clock: systemClock,
    catalog: CardCatalog.build(DEFAULT_CARDS, {
      wellnessTipShare: config.wellnessTipShare,
    }),
    delivery,
    notifier: delivery,
    config,
  });
  const deps: BotDeps = { engine, names, config };

  // Register commands
  registerStartCommand(bot, deps);
  registerHelpCommand(bot, deps);
  registerFlashcardCommand(bot, deps);
  registerLeaderboardCommand(bot, deps);
  registerSummaryCommand(bot, deps);
  registerIntervalCommand(bot, deps);
  registerPauseCommands(bot, deps);

  registerDoneHandler(bot, deps);
  registerTextHandler(bot, deps);

  bot.catch((error, ctx) => {
    console.error(
      `❌ Unhandled error for update ${ctx.update.update_id}:`,
      error
    );
  });

  // Restore timers for users that were active before the restart
  const restored = await engine.sweep();
  console.log(
    `🔁 Restored timers: ${restored.rearmed} user(s), expired ${restored.expired} stale session(s)`
  );
  const maintenance = startMaintenanceScheduler(engine, {
    storeDriver: config.storeDriver,
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, stopping bot`);
    maintenance?.stop();
    engine.stop();
    bot.stop(signal);
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await bot.launch(() => {
    console.log('🤖 Desk Warrior bot is up and running!');
  });
}

main().catch((error) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
