import mongoose, { Schema } from 'mongoose';

import { PostStatus } from '../types/events';
import { ScheduledPostRecord } from '../types/ledger';

const scheduledPostSchema = new Schema<ScheduledPostRecord>(
  {
    postId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    campaignId: {
      type: String,
      required: true,
    },
    channelId: {
      type: String,
      required: true,
    },
    dayIndex: {
      type: Number,
      required: true,
      min: 0,
    },
    slotTime: {
      type: String,
      required: true,
    },
    absoluteTimestamp: {
      type: Date,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: Object.values(PostStatus),
      default: PostStatus.SCHEDULED,
    },
    statusChangedAt: {
      type: Date,
      default: null,
    },
    failureReason: {
      type: String,
      default: null,
    },
    externalMessageId: {
      type: String,
      default: null,
    },
  },
  {
    collection: 'scheduled_posts',
    versionKey: false,
  }
);

// One row per (campaign, channel, day, slot)
scheduledPostSchema.index(
  { campaignId: 1, channelId: 1, dayIndex: 1, slotTime: 1 },
  { unique: true }
);
scheduledPostSchema.index({ campaignId: 1, absoluteTimestamp: 1 });
scheduledPostSchema.index({ status: 1, absoluteTimestamp: 1 });

export const ScheduledPost = mongoose.model<ScheduledPostRecord>(
  'ScheduledPost',
  scheduledPostSchema
);
