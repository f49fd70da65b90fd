import mongoose, { Schema } from 'mongoose';

import { OutcomeReason, TransactionOutcome, TransactionResolution } from '../types/events';
import { ObservedTransactionRecord } from '../types/ledger';

const observedTransactionSchema = new Schema<ObservedTransactionRecord>(
  {
    txId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    receivingAddress: {
      type: String,
      required: true,
    },
    fromAddress: {
      type: String,
      default: null,
    },
    toAddress: {
      type: String,
      required: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 0,
    },
    memo: {
      type: String,
      default: null,
    },
    occurredAt: {
      type: Date,
      required: true,
    },
    observedAt: {
      type: Date,
      required: true,
    },
    processed: {
      type: Boolean,
      required: true,
      default: false,
    },
    processedAt: {
      type: Date,
      default: null,
    },
    outcome: {
      type: String,
      enum: [...Object.values(TransactionOutcome), null],
      default: null,
    },
    outcomeReason: {
      type: String,
      enum: [...Object.values(OutcomeReason), null],
      default: null,
    },
    orderId: {
      type: String,
      default: null,
      index: true,
    },
    resolution: {
      type: String,
      enum: [...Object.values(TransactionResolution), null],
      default: null,
    },
    resolvedBy: {
      type: String,
      default: null,
    },
    resolvedAt: {
      type: Date,
      default: null,
    },
  },
  {
    collection: 'observed_transactions',
    versionKey: false,
  }
);

observedTransactionSchema.index({ receivingAddress: 1, processed: 1, occurredAt: 1 });
observedTransactionSchema.index({ outcome: 1, resolution: 1, observedAt: -1 });

export const ObservedTransaction = mongoose.model<ObservedTransactionRecord>(
  'ObservedTransaction',
  observedTransactionSchema
);
