import mongoose, { Document, Schema } from 'mongoose';

import { ReservationStatus } from '../types/ledger';

export interface IReservation extends Document {
  reservationId: string;
  userId: string;
  packageId: string;
  requiredCents: number;
  priceCents: number;
  cidAmount: number;
  status: ReservationStatus;
  expiresAt: Date;
  paymentTxid?: string;
  completedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const reservationSchema = new Schema<IReservation>(
  {
    reservationId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      required: true,
    },
    packageId: {
      type: String,
      required: true,
    },
    requiredCents: {
      type: Number,
      required: true,
      min: 0,
    },
    priceCents: {
      type: Number,
      required: true,
      min: 0,
    },
    cidAmount: {
      type: Number,
      required: true,
      min: 0,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(ReservationStatus),
      default: ReservationStatus.ACTIVE,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    paymentTxid: {
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

reservationSchema.index({ userId: 1, status: 1 });
reservationSchema.index({ status: 1, expiresAt: 1 });

export const Reservation = mongoose.model<IReservation>('Reservation', reservationSchema);
