import mongoose, { Schema } from 'mongoose';

import { CampaignRecord } from '../types/ledger';

const campaignSchema = new Schema<CampaignRecord>(
  {
    campaignId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    orderId: {
      type: String,
      required: true,
      unique: true,
    },
    userId: {
      type: String,
      required: true,
      index: true,
    },
    channelIds: {
      type: [String],
      required: true,
    },
    durationDays: {
      type: Number,
      required: true,
    },
    postsPerDay: {
      type: Number,
      required: true,
    },
    slotTimes: {
      type: [String],
      required: true,
    },
    totalPosts: {
      type: Number,
      required: true,
    },
    startsAt: {
      type: Date,
      required: true,
    },
    createdAt: {
      type: Date,
      required: true,
    },
    confirmationClaimedAt: {
      type: Date,
      default: null,
    },
  },
  {
    collection: 'campaigns',
    versionKey: false,
  }
);

campaignSchema.index({ confirmationClaimedAt: 1 });

export const Campaign = mongoose.model<CampaignRecord>('Campaign', campaignSchema);
