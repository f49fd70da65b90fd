/**
 * Queue Module Exports
 */

// Configuration
export { queueConnection, notificationJobOptions, QUEUE_NAMES, WORKER_CONCURRENCY } from './queue.config';

// Notification Queue
export {
  ConfirmationJobData,
  ConfirmationJobResult,
  confirmationJobId,
  toConfirmationJobData,
  getNotificationQueue,
  enqueueConfirmation,
  closeNotificationQueue,
  getNotificationQueueStats,
} from './notification.queue';

// Workers
export {
  createConfirmationProcessor,
  signPayload,
  startNotificationWorker,
  stopNotificationWorker,
  isNotificationWorkerRunning,
} from './workers/notification.worker';
