import mongoose, { Document, Schema } from 'mongoose';

interface IBalanceSnapshot {
  cid: number;
  usdCents: number;
}

export interface IAdminLog extends Document {
  logId: string;
  adminId: string;
  action: string;
  targetUserId?: string;
  details: string;
  before?: IBalanceSnapshot;
  after?: IBalanceSnapshot;
  createdAt: Date;
}

const balanceSnapshotSchema = new Schema<IBalanceSnapshot>(
  {
    cid: { type: Number, required: true },
    usdCents: { type: Number, required: true },
  },
  { _id: false }
);

const adminLogSchema = new Schema<IAdminLog>({
  logId: {
    type: String,
    required: true,
    unique: true,
  },
  adminId: {
    type: String,
    required: true,
    index: true,
  },
  action: {
    type: String,
    required: true,
  },
  targetUserId: {
    type: String,
    index: true,
  },
  details: {
    type: String,
    default: '',
  },
  before: {
    type: balanceSnapshotSchema,
  },
  after: {
    type: balanceSnapshotSchema,
  },
  createdAt: {
    type: Date,
    required: true,
    default: Date.now,
  },
});

adminLogSchema.index({ createdAt: -1 });

export const AdminLog = mongoose.model<IAdminLog>('AdminLog', adminLogSchema);
