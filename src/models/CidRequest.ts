import mongoose, { Document, Schema } from 'mongoose';

import { CidRequestStatus } from '../types/ledger';

export interface ICidRequest extends Document {
  requestId: string;
  userId: string;
  installationId: string;
  confirmationId?: string;
  status: CidRequestStatus;
  costCid: number;
  errorMessage?: string;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const cidRequestSchema = new Schema<ICidRequest>(
  {
    requestId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
    },
    installationId: {
      type: String,
      required: true,
    },
    confirmationId: {
      type: String,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(CidRequestStatus),
      default: CidRequestStatus.PROCESSING,
    },
    costCid: {
      type: Number,
      required: true,
      default: 1,
    },
    errorMessage: {
      type: String,
    },
    completedAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

cidRequestSchema.index({ userId: 1, status: 1, createdAt: -1 });
cidRequestSchema.index({ status: 1, createdAt: -1 });

export const CidRequest = mongoose.model<ICidRequest>('CidRequest', cidRequestSchema);
