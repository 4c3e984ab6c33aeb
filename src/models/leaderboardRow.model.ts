import { Schema, model, type Model } from 'mongoose';

export interface LeaderboardRowFields {
  chatId: string;
  userId: string;
  totalPoints: number;
  entries: number;
  lastScoredAt: Date | null;
}

// Derived cache; rebuilt from the score ledger when needed
const LeaderboardRowSchema = new Schema<LeaderboardRowFields>({
  chatId: {
    type: String,
    required: true,
  },
  userId: {
    type: String,
    required: true,
  },
  totalPoints: {
    type: Number,
    required: true,
    default: 0,
  },
  entries: {
    type: Number,
    required: true,
    default: 0,
  },
  lastScoredAt: {
    type: Date,
    default: null,
  },
});

LeaderboardRowSchema.index({ chatId: 1, userId: 1 }, { unique: true });

export const LeaderboardRowModel: Model<LeaderboardRowFields> =
  model<LeaderboardRowFields>('LeaderboardRow', LeaderboardRowSchema);
