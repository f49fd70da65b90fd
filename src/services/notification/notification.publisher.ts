import { createServiceLogger } from '../../observability';
import { enqueueConfirmation } from '../../queues/notification.queue';
import { CampaignProvisionedEvent } from '../../types/events';

import { NotificationPublisher } from './notification.types';

const log = createServiceLogger('notification');

/**
 * Hands confirmations to the BullMQ notification queue. The job ID is
 * derived from the campaign, so a repeated enqueue is dropped by the queue.
 */
export class QueueNotificationPublisher implements NotificationPublisher {
  async emitConfirmation(event: CampaignProvisionedEvent): Promise<void> {
    const job = await enqueueConfirmation(event);
    log.info({ campaignId: event.campaignId, jobId: job.id }, 'Confirmation enqueued');
  }
}

/**
 * Used when no Redis is available (in-memory driver, local runs)
 */
export class LoggingNotificationPublisher implements NotificationPublisher {
  async emitConfirmation(event: CampaignProvisionedEvent): Promise<void> {
    log.info(
      {
        campaignId: event.campaignId,
        userId: event.userId,
        orderId: event.orderId,
        totalPosts: event.totalPosts,
      },
      'Campaign confirmation'
    );
  }
}
