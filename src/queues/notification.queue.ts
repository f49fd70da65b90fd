/**
 * Notification Queue
 *
 * Carries campaign confirmations to the notification worker.
 */

import { Queue, Job } from 'bullmq';

import { logger } from '../observability';
import { CampaignProvisionedEvent, EventType } from '../types/events';

import { queueConnection, notificationJobOptions, QUEUE_NAMES } from './queue.config';

/**
 * Wire form of CampaignProvisionedEvent: dates as ISO strings
 */
export interface ConfirmationJobData {
  eventType: EventType.CAMPAIGN_PROVISIONED;
  userId: string;
  orderId: string;
  campaignId: string;
  channelCount: number;
  totalPosts: number;
  scheduleSummary: {
    durationDays: number;
    postsPerDay: number;
    slotTimes: string[];
    firstPostAt: string;
    lastPostAt: string;
  };
  timestamp: string;
}

export interface ConfirmationJobResult {
  delivered: boolean;
  channel: 'webhook' | 'log';
  statusCode?: number;
}

export const confirmationJobId = (campaignId: string): string => `confirmation-${campaignId}`;

export function toConfirmationJobData(event: CampaignProvisionedEvent): ConfirmationJobData {
  return {
    eventType: event.eventType,
    userId: event.userId,
    orderId: event.orderId,
    campaignId: event.campaignId,
    channelCount: event.channelCount,
    totalPosts: event.totalPosts,
    scheduleSummary: {
      durationDays: event.scheduleSummary.durationDays,
      postsPerDay: event.scheduleSummary.postsPerDay,
      slotTimes: event.scheduleSummary.slotTimes,
      firstPostAt: event.scheduleSummary.firstPostAt.toISOString(),
      lastPostAt: event.scheduleSummary.lastPostAt.toISOString(),
    },
    timestamp: event.timestamp.toISOString(),
  };
}

let notificationQueue: Queue<ConfirmationJobData, ConfirmationJobResult> | null = null;

/**
 * Get or create the notification queue
 */
export function getNotificationQueue(): Queue<ConfirmationJobData, ConfirmationJobResult> {
  if (!notificationQueue) {
    notificationQueue = new Queue<ConfirmationJobData, ConfirmationJobResult>(
      QUEUE_NAMES.NOTIFICATIONS,
      {
        connection: queueConnection,
        defaultJobOptions: notificationJobOptions,
      }
    );
    logger.info('Notification queue initialized');
  }
  return notificationQueue;
}

/**
 * Add a confirmation job. The campaign ID keys the job, so BullMQ ignores
 * a second add for the same campaign.
 */
export async function enqueueConfirmation(
  event: CampaignProvisionedEvent
): Promise<Job<ConfirmationJobData, ConfirmationJobResult>> {
  const queue = getNotificationQueue();
  const job = await queue.add('confirmation', toConfirmationJobData(event), {
    jobId: confirmationJobId(event.campaignId),
  });
  logger.debug({ jobId: job.id, campaignId: event.campaignId }, 'Confirmation job added');
  return job;
}

/**
 * Close the notification queue connection
 */
export async function closeNotificationQueue(): Promise<void> {
  if (notificationQueue) {
    await notificationQueue.close();
    notificationQueue = null;
    logger.info('Notification queue closed');
  }
}

export async function getNotificationQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getNotificationQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
