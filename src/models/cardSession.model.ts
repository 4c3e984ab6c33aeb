import { Schema, model, type Model } from 'mongoose';
import type { CardKind, ExpiryReason, SessionStatus } from '../types/core.js';

export interface CardSessionFields {
  userId: string;
  chatId: string;
  cardId: string;
  cardKind: CardKind;
  issuedAt: Date;
  expiresAt: Date;
  status: SessionStatus;
  acknowledgedAt: Date | null;
  expiredAt: Date | null;
  expiryReason: ExpiryReason | null;
}

const CardSessionSchema = new Schema<CardSessionFields>(
  {
    userId: {
      type: String,
      required: true,
    },
    chatId: {
      type: String,
      required: true,
    },
    cardId: {
      type: String,
      required: true,
    },
    cardKind: {
      type: String,
      enum: ['exercise', 'wellness_tip'],
      required: true,
    },
    issuedAt: {
      type: Date,
      required: true,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    status: {
      type: String,
      enum: ['pending', 'acknowledged', 'expired'],
      required: true,
      default: 'pending',
    },
    acknowledgedAt: {
      type: Date,
      default: null,
    },
    expiredAt: {
      type: Date,
      default: null,
    },
    expiryReason: {
      type: String,
      enum: ['timeout', 'paused', 'informational', 'late_acknowledgement', null],
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// At most one pending session per user
CardSessionSchema.index(
  { userId: 1 },
  {
    name: 'one_pending_per_user',
    unique: true,
    partialFilterExpression: { status: 'pending' },
  }
);
CardSessionSchema.index({ userId: 1, issuedAt: 1 });
CardSessionSchema.index({ status: 1, expiresAt: 1 });

export const CardSessionModel: Model<CardSessionFields> =
  model<CardSessionFields>('CardSession', CardSessionSchema);
