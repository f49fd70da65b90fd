/**
 * Notification Worker Unit Tests
 *
 * Tests confirmation delivery, HMAC signing and worker lifecycle.
 */

import crypto from 'crypto';

import { Job } from 'bullmq';

import { ConfirmationJobData, ConfirmationJobResult } from '../../../src/queues/notification.queue';
import { EventType } from '../../../src/types/events';

const mockAxios = {
  post: jest.fn(),
  isAxiosError: jest.fn(),
};
jest.mock('axios', () => mockAxios);

const mockWorkerInstance = {
  on: jest.fn(),
  close: jest.fn().mockResolvedValue(undefined),
  closing: undefined as Promise<void> | undefined,
};
const MockWorker = jest.fn().mockImplementation(() => mockWorkerInstance);
jest.mock('bullmq', () => ({
  Worker: MockWorker,
  Queue: jest.fn(),
}));

jest.mock('../../../src/queues/queue.config', () => ({
  queueConnection: { host: 'localhost', port: 6379 },
  QUEUE_NAMES: { NOTIFICATIONS: 'notifications' },
  WORKER_CONCURRENCY: { NOTIFICATIONS: 5 },
}));

const data: ConfirmationJobData = {
  eventType: EventType.CAMPAIGN_PROVISIONED,
  userId: 'buyer-1',
  orderId: 'ORD-1',
  campaignId: 'CAM-2026-03-AB12',
  channelCount: 2,
  totalPosts: 42,
  scheduleSummary: {
    durationDays: 7,
    postsPerDay: 3,
    slotTimes: ['00:00', '08:00', '16:00'],
    firstPostAt: '2026-03-01T10:00:00.000Z',
    lastPostAt: '2026-03-08T02:00:00.000Z',
  },
  timestamp: '2026-03-01T10:00:05.000Z',
};

const jobFor = (payload: ConfirmationJobData) =>
  ({ id: `confirmation-${payload.campaignId}`, data: payload }) as unknown as Job<
    ConfirmationJobData,
    ConfirmationJobResult
  >;

describe('Notification Worker', () => {
  let workerModule: typeof import('../../../src/queues/workers/notification.worker');

  beforeEach(async () => {
    jest.clearAllMocks();
    mockWorkerInstance.closing = undefined;
    jest.resetModules();
    workerModule = await import('../../../src/queues/workers/notification.worker');
  });

  afterEach(async () => {
    await workerModule.stopNotificationWorker();
  });

  describe('signPayload', () => {
    it('should produce a hex HMAC-SHA256 of the JSON body', () => {
      const expected = crypto
        .createHmac('sha256', 'test-secret')
        .update(JSON.stringify(data))
        .digest('hex');

      expect(workerModule.signPayload(data, 'test-secret')).toBe(expected);
    });
  });

  describe('createConfirmationProcessor', () => {
    it('should log the confirmation when no webhook is configured', async () => {
      const processJob = workerModule.createConfirmationProcessor({ timeoutMs: 5000 });

      await expect(processJob(jobFor(data))).resolves.toEqual({ delivered: true, channel: 'log' });
      expect(mockAxios.post).not.toHaveBeenCalled();
    });

    it('should post a signed payload to the webhook', async () => {
      mockAxios.post.mockResolvedValue({ status: 202 });
      const processJob = workerModule.createConfirmationProcessor({
        webhookUrl: 'http://notify.test/hooks/confirmations',
        signingSecret: 'test-secret',
        timeoutMs: 5000,
      });

      const result = await processJob(jobFor(data));

      expect(result).toEqual({ delivered: true, channel: 'webhook', statusCode: 202 });
      expect(mockAxios.post).toHaveBeenCalledWith(
        'http://notify.test/hooks/confirmations',
        data,
        expect.objectContaining({
          timeout: 5000,
          headers: {
            'Content-Type': 'application/json',
            'X-Channelcast-Event': 'CAMPAIGN_PROVISIONED',
            'X-Channelcast-Delivery-ID': 'confirmation-CAM-2026-03-AB12',
            'X-Channelcast-Signature': `sha256=${workerModule.signPayload(data, 'test-secret')}`,
          },
        })
      );
    });

    it('should omit the signature without a secret', async () => {
      mockAxios.post.mockResolvedValue({ status: 200 });
      const processJob = workerModule.createConfirmationProcessor({
        webhookUrl: 'http://notify.test/hooks',
        timeoutMs: 5000,
      });

      await processJob(jobFor(data));

      const [, , options] = mockAxios.post.mock.calls[0];
      expect(options.headers['X-Channelcast-Signature']).toBeUndefined();
    });

    it('should reject so BullMQ retries a failed delivery', async () => {
      mockAxios.post.mockRejectedValue(new Error('Request failed with status code 500'));
      const processJob = workerModule.createConfirmationProcessor({
        webhookUrl: 'http://notify.test/hooks',
        timeoutMs: 5000,
      });

      await expect(processJob(jobFor(data))).rejects.toThrow('Request failed with status code 500');
    });
  });

  describe('worker lifecycle', () => {
    it('should start a single worker with event handlers', () => {
      const first = workerModule.startNotificationWorker();
      const second = workerModule.startNotificationWorker();

      expect(first).toBe(second);
      expect(MockWorker).toHaveBeenCalledTimes(1);
      expect(MockWorker).toHaveBeenCalledWith('notifications', expect.any(Function), {
        connection: { host: 'localhost', port: 6379 },
        concurrency: 5,
      });
      expect(mockWorkerInstance.on).toHaveBeenCalledWith('completed', expect.any(Function));
      expect(mockWorkerInstance.on).toHaveBeenCalledWith('failed', expect.any(Function));
      expect(mockWorkerInstance.on).toHaveBeenCalledWith('error', expect.any(Function));
      expect(workerModule.isNotificationWorkerRunning()).toBe(true);
    });

    it('should close the worker on stop', async () => {
      workerModule.startNotificationWorker();

      await workerModule.stopNotificationWorker();

      expect(mockWorkerInstance.close).toHaveBeenCalledTimes(1);
      expect(workerModule.isNotificationWorkerRunning()).toBe(false);
    });
  });
});
