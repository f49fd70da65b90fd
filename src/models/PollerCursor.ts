import mongoose, { Schema } from 'mongoose';

import { CursorBackfill, PollerCursor as PollerCursorRecord } from '../types/ledger';

const backfillSchema = new Schema<CursorBackfill>(
  {
    txId: { type: String, required: true },
    lt: { type: String, required: true },
    headTxId: { type: String, default: null },
    headTimestamp: { type: Date, default: null },
  },
  { _id: false }
);

const pollerCursorSchema = new Schema<PollerCursorRecord>(
  {
    address: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    lastTimestamp: {
      type: Date,
      required: true,
    },
    lastTxId: {
      type: String,
      default: null,
    },
    backfill: {
      type: backfillSchema,
      default: null,
    },
    updatedAt: {
      type: Date,
      required: true,
    },
  },
  {
    collection: 'poller_cursors',
    versionKey: false,
  }
);

export const PollerCursor = mongoose.model<PollerCursorRecord>('PollerCursor', pollerCursorSchema);
