import mongoose, { Document, Schema } from 'mongoose';

import { TransactionStatus, TransactionType } from '../types/ledger';

export interface ITransaction extends Document {
  transactionId: string;
  userId: string;
  type: TransactionType;
  cidDelta: number;
  usdCentsDelta: number;
  status: TransactionStatus;
  correlationId?: string;
  description: string;
  failureReason?: string;
  metadata?: Record<string, unknown>;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const transactionSchema = new Schema<ITransaction>(
  {
    transactionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    type: {
      type: String,
      required: true,
      enum: Object.values(TransactionType),
    },
    cidDelta: {
      type: Number,
      required: true,
      default: 0,
    },
    usdCentsDelta: {
      type: Number,
      required: true,
      default: 0,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(TransactionStatus),
      default: TransactionStatus.PENDING,
      index: true,
    },
    correlationId: {
      type: String,
    },
    description: {
      type: String,
      required: true,
      trim: true,
    },
    failureReason: {
      type: String,
    },
    metadata: {
      type: Schema.Types.Mixed,
    },
    completedAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

// A txid, voucher code or CID request id can back at most one completed entry
transactionSchema.index(
  { correlationId: 1 },
  {
    unique: true,
    partialFilterExpression: {
      status: TransactionStatus.COMPLETED,
      correlationId: { $type: 'string' },
    },
  }
);
transactionSchema.index({ userId: 1, status: 1 });
transactionSchema.index({ userId: 1, createdAt: -1 });

export const Transaction = mongoose.model<ITransaction>('LedgerTransaction', transactionSchema);
