/**
 * BullMQ Queue Configuration
 *
 * Provides connection settings and default job options for all queues.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

/**
 * Redis connection configuration for BullMQ
 */
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Default job options for confirmation delivery
 */
export const notificationJobOptions: DefaultJobOptions = {
  attempts: 5,
  backoff: {
    type: 'exponential',
    delay: 1000, // 1s, 2s, 4s, 8s, 16s
  },
  removeOnComplete: {
    count: 100,
  },
  removeOnFail: {
    count: 1000,
  },
};

/**
 * Queue names
 * Note: BullMQ doesn't allow colons in queue names as they are used as Redis key separators
 */
export const QUEUE_NAMES = {
  NOTIFICATIONS: 'channelcast-notifications',
} as const;

/**
 * Worker concurrency settings
 */
export const WORKER_CONCURRENCY = {
  NOTIFICATIONS: 5,
} as const;
