import { Schema, model, type Model } from 'mongoose';
import type { IntervalMinutes } from '../types/core.js';

export interface UserFields {
  userId: string;
  chatId: string;
  intervalMinutes: IntervalMinutes;
  premium: boolean;
  active: boolean;
  streak: number;
  lastSuccessAt: Date | null;
  lastIssuedAt: Date | null;
  lastActiveAt: Date | null;
  createdAt: Date;
}

const UserSchema = new Schema<UserFields>(
  {
    userId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    chatId: {
      type: String,
      required: true,
      index: true,
    },
    intervalMinutes: {
      type: Number,
      enum: [30, 45, 60],
      required: true,
      default: 60,
    },
    premium: {
      type: Boolean,
      required: true,
      default: false,
    },
    // false while reminders are paused
    active: {
      type: Boolean,
      required: true,
      default: true,
    },
    streak: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    lastSuccessAt: {
      type: Date,
      default: null,
    },
    lastIssuedAt: {
      type: Date,
      default: null,
    },
    lastActiveAt: {
      type: Date,
      default: null,
    },
    createdAt: {
      type: Date,
      required: true,
    },
  },
  {
    timestamps: { createdAt: false, updatedAt: true },
  }
);

export const UserModel: Model<UserFields> = model<UserFields>('User', UserSchema);
