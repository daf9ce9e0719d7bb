import mongoose, { Document, Schema } from 'mongoose';

export interface IVoucher extends Document {
  code: string;
  cidAmount: number;
  usdCents: number;
  isUsed: boolean;
  createdBy: string;
  expiresAt?: Date;
  usedBy?: string;
  usedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const voucherSchema = new Schema<IVoucher>(
  {
    code: {
      type: String,
      required: true,
      unique: true,
      uppercase: true,
      trim: true,
    },
    cidAmount: {
      type: Number,
      required: true,
      min: 0,
    },
    usdCents: {
      type: Number,
      required: true,
      min: 0,
    },
    isUsed: {
      type: Boolean,
      default: false,
      index: true,
    },
    createdBy: {
      type: String,
      required: true,
    },
    expiresAt: {
      type: Date,
    },
    usedBy: {
      type: String,
    },
    usedAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

export const Voucher = mongoose.model<IVoucher>('Voucher', voucherSchema);
