import mongoose, { Document, Schema } from 'mongoose';

export interface IVoucherUse extends Document {
  code: string;
  userId: string;
  usedAt: Date;
}

const voucherUseSchema = new Schema<IVoucherUse>({
  code: {
    type: String,
    required: true,
  },
  userId: {
    type: String,
    required: true,
  },
  usedAt: {
    type: Date,
    required: true,
    default: Date.now,
  },
});

voucherUseSchema.index({ code: 1, userId: 1 }, { unique: true });

export const VoucherUse = mongoose.model<IVoucherUse>('VoucherUse', voucherUseSchema);
