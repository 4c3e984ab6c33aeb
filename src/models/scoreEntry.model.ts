import { Schema, model, type Model } from 'mongoose';
import type { ValidationTier } from '../types/core.js';

export interface ScoreEntryFields {
  userId: string;
  chatId: string;
  sessionId: string;
  cardId: string;
  tier: ValidationTier;
  points: number;
  streak: number;
  createdAt: Date;
  dateKey: string;
}

// Append-only: nothing in the app updates or deletes these
const ScoreEntrySchema = new Schema<ScoreEntryFields>({
  userId: {
    type: String,
    required: true,
  },
  chatId: {
    type: String,
    required: true,
  },
  sessionId: {
    type: String,
    required: true,
    unique: true,
  },
  cardId: {
    type: String,
    required: true,
  },
  tier: {
    type: String,
    enum: ['rejected', 'reduced', 'full'],
    required: true,
  },
  points: {
    type: Number,
    required: true,
    min: 0,
  },
  streak: {
    type: Number,
    required: true,
    min: 0,
  },
  createdAt: {
    type: Date,
    required: true,
  },
  dateKey: {
    type: String,
    required: true,
  },
});

ScoreEntrySchema.index({ chatId: 1, dateKey: 1 });
ScoreEntrySchema.index({ chatId: 1, createdAt: 1 });

export const ScoreEntryModel: Model<ScoreEntryFields> = model<ScoreEntryFields>(
  'ScoreEntry',
  ScoreEntrySchema
);
