/**
 * Notification Worker
 *
 * Delivers campaign confirmations to the configured webhook, or logs them
 * when none is configured. Failed deliveries are retried by BullMQ.
 */

import crypto from 'crypto';

import axios from 'axios';
import { Worker, Job } from 'bullmq';

import { NOTIFICATION_CONFIG } from '../../config/environments';
import { createServiceLogger, queueJobDuration, queueJobsTotal } from '../../observability';
import { ConfirmationJobData, ConfirmationJobResult } from '../notification.queue';
import { queueConnection, QUEUE_NAMES, WORKER_CONCURRENCY } from '../queue.config';

const log = createServiceLogger('notification-worker');

export interface DeliveryOptions {
  webhookUrl?: string;
  signingSecret?: string;
  timeoutMs: number;
}

let notificationWorker: Worker<ConfirmationJobData, ConfirmationJobResult> | null = null;

/**
 * HMAC-SHA256 of the JSON body, hex encoded
 */
export function signPayload(payload: object, secret: string): string {
  return crypto.createHmac('sha256', secret).update(JSON.stringify(payload)).digest('hex');
}

export function createConfirmationProcessor(options: DeliveryOptions = NOTIFICATION_CONFIG) {
  return async (
    job: Job<ConfirmationJobData, ConfirmationJobResult>
  ): Promise<ConfirmationJobResult> => {
    const data = job.data;

    if (!options.webhookUrl) {
      log.info(
        { jobId: job.id, campaignId: data.campaignId, userId: data.userId },
        'No notification webhook configured; confirmation logged'
      );
      return { delivered: true, channel: 'log' };
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Channelcast-Event': data.eventType,
      'X-Channelcast-Delivery-ID': String(job.id),
    };
    if (options.signingSecret) {
      headers['X-Channelcast-Signature'] = `sha256=${signPayload(data, options.signingSecret)}`;
    }

    const response = await axios.post(options.webhookUrl, data, {
      headers,
      timeout: options.timeoutMs,
      validateStatus: (status) => status >= 200 && status < 300,
    });

    log.info(
      { jobId: job.id, campaignId: data.campaignId, statusCode: response.status },
      'Confirmation delivered'
    );
    return { delivered: true, channel: 'webhook', statusCode: response.status };
  };
}

function setupWorkerEvents(worker: Worker<ConfirmationJobData, ConfirmationJobResult>): void {
  worker.on('completed', (job) => {
    queueJobsTotal.inc({ queue: QUEUE_NAMES.NOTIFICATIONS, status: 'completed' });
    if (job.finishedOn && job.processedOn) {
      queueJobDuration.observe(
        { queue: QUEUE_NAMES.NOTIFICATIONS },
        (job.finishedOn - job.processedOn) / 1000
      );
    }
  });

  worker.on('failed', (job, err) => {
    queueJobsTotal.inc({ queue: QUEUE_NAMES.NOTIFICATIONS, status: 'failed' });
    log.error(
      { jobId: job?.id, attemptsMade: job?.attemptsMade, error: err.message },
      'Confirmation delivery failed'
    );
  });

  worker.on('error', (err) => {
    log.error({ error: err.message }, 'Notification worker error');
  });
}

export function startNotificationWorker(): Worker<ConfirmationJobData, ConfirmationJobResult> {
  if (notificationWorker) {
    return notificationWorker;
  }

  notificationWorker = new Worker<ConfirmationJobData, ConfirmationJobResult>(
    QUEUE_NAMES.NOTIFICATIONS,
    createConfirmationProcessor(),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.NOTIFICATIONS,
    }
  );

  setupWorkerEvents(notificationWorker);
  log.info('Notification worker started');

  return notificationWorker;
}

export async function stopNotificationWorker(): Promise<void> {
  if (notificationWorker) {
    await notificationWorker.close();
    notificationWorker = null;
    log.info('Notification worker stopped');
  }
}

export function isNotificationWorkerRunning(): boolean {
  return notificationWorker !== null && !notificationWorker.closing;
}
