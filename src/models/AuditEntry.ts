import mongoose, { Schema } from 'mongoose';

import { AuditAction } from '../types/events';
import { AuditEntryRecord } from '../types/ledger';

const auditEntrySchema = new Schema<AuditEntryRecord>(
  {
    auditId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    actor: {
      type: String,
      required: true,
    },
    action: {
      type: String,
      required: true,
      enum: Object.values(AuditAction),
    },
    targetType: {
      type: String,
      required: true,
      enum: ['order', 'transaction'],
    },
    targetId: {
      type: String,
      required: true,
      index: true,
    },
    reason: {
      type: String,
      required: true,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    createdAt: {
      type: Date,
      required: true,
    },
  },
  {
    collection: 'audit_entries',
    versionKey: false,
  }
);

auditEntrySchema.index({ createdAt: -1 });

export const AuditEntry = mongoose.model<AuditEntryRecord>('AuditEntry', auditEntrySchema);
