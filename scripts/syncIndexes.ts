import 'dotenv/config';
import mongoose from 'mongoose';

import { CardSessionModel } from '../src/models/cardSession.model.js';
import { LeaderboardRowModel } from '../src/models/leaderboardRow.model.js';
import { ScoreEntryModel } from '../src/models/scoreEntry.model.js';
import { UserModel } from '../src/models/user.model.js';

interface IndexedModel {
  modelName: string;
  syncIndexes(): Promise<unknown>;
}

const MODELS: IndexedModel[] = [
  UserModel,
  CardSessionModel,
  ScoreEntryModel,
  LeaderboardRowModel,
];

async function main(): Promise<void> {
  const mongoUri = process.env.MONGODB_URI;
  if (!mongoUri) {
    throw new Error('MONGODB_URI is not defined');
  }

  await mongoose.connect(mongoUri);
  console.log('✅ Connected to MongoDB, syncing indexes...');

  let failed = false;
  try {
    for (const model of MODELS) {
      try {
        await model.syncIndexes();
        console.log(`✅ ${model.modelName} indexes are in sync with the schema.`);
      } catch (error) {
        failed = true;
        console.error(
          `❌ Failed to sync ${model.modelName} indexes. Check for duplicate pending sessions or score entries.`,
          error
        );
      }
    }
  } finally {
    await mongoose.disconnect();
    console.log('🔌 Disconnected from MongoDB.');
  }

  if (failed) process.exitCode = 1;
}

void main().catch((err) => {
  console.error('❌ Unexpected error while syncing indexes:', err);
  process.exit(1);
});
