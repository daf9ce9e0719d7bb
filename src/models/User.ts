import mongoose, { Document, Schema } from 'mongoose';

export interface IUser extends Document {
  userId: string;
  username?: string;
  firstName?: string;
  cidBalance: number;
  cidReserved: number;
  usdCents: number;
  isBanned: boolean;
  isAdmin: boolean;
  registeredAt: Date;
  lastActivityAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    userId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    username: {
      type: String,
      trim: true,
    },
    firstName: {
      type: String,
      trim: true,
    },
    // Only the ledger store's guarded $inc touches the balances
    cidBalance: {
      type: Number,
      required: true,
      default: 0,
    },
    // Units held by open CID requests; never above cidBalance for consumer holds
    cidReserved: {
      type: Number,
      required: true,
      default: 0,
      min: 0,
    },
    usdCents: {
      type: Number,
      required: true,
      default: 0,
    },
    isBanned: {
      type: Boolean,
      default: false,
    },
    isAdmin: {
      type: Boolean,
      default: false,
    },
    registeredAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
    lastActivityAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
  },
  {
    timestamps: true,
  }
);

export const User = mongoose.model<IUser>('User', userSchema);
