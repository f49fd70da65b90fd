import mongoose, { Schema } from 'mongoose';

import { OrderStatus } from '../types/events';
import { OrderRecord } from '../types/ledger';

const orderSchema = new Schema<OrderRecord>(
  {
    orderId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    referenceCode: {
      type: String,
      required: true,
      uppercase: true,
      trim: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    claimedPayerAddress: {
      type: String,
      default: null,
    },
    receivingAddress: {
      type: String,
      required: true,
    },
    durationDays: {
      type: Number,
      required: true,
      min: 1,
      max: 365,
    },
    channelIds: {
      type: [String],
      required: true,
      validate: (value: string[]) => value.length > 0,
    },
    expectedAmount: {
      type: Number,
      required: true,
      min: 0,
    },
    baseCost: {
      type: Number,
      required: true,
      min: 0,
    },
    postsPerDay: {
      type: Number,
      required: true,
    },
    discountPercent: {
      type: Number,
      required: true,
    },
    scheduleTimes: {
      type: [String],
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(OrderStatus),
      default: OrderStatus.PENDING,
      index: true,
    },
    createdAt: {
      type: Date,
      required: true,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    matchedTxId: {
      type: String,
      default: null,
    },
    matchedAt: {
      type: Date,
      default: null,
    },
    closedAt: {
      type: Date,
      default: null,
    },
    campaignId: {
      type: String,
      default: null,
    },
  },
  {
    collection: 'orders',
    versionKey: false,
  }
);

// Reference codes are unique among pending orders only; they free up once
// the order is matched, expired or cancelled.
orderSchema.index(
  { referenceCode: 1 },
  { unique: true, partialFilterExpression: { status: OrderStatus.PENDING } }
);
orderSchema.index({ referenceCode: 1, createdAt: -1 });
orderSchema.index({ status: 1, expiresAt: 1 });
orderSchema.index({ status: 1, campaignId: 1 });
orderSchema.index({ userId: 1, createdAt: -1 });

export const Order = mongoose.model<OrderRecord>('Order', orderSchema);
