import { LoggingNotificationPublisher } from '../../../src/services/notification';
import { CampaignProvisionedEvent, EventType } from '../../../src/types/events';

const eventFor = (n: number): CampaignProvisionedEvent => ({
  eventType: EventType.CAMPAIGN_PROVISIONED,
  userId: 'buyer-1',
  orderId: `ord_${n}`,
  campaignId: `CAM-2026-03-${String(n).padStart(4, '0')}`,
  channelCount: 1,
  totalPosts: 3,
  scheduleSummary: {
    durationDays: 1,
    postsPerDay: 3,
    slotTimes: ['00:00', '08:00', '16:00'],
    firstPostAt: new Date('2026-03-01T10:00:00.000Z'),
    lastPostAt: new Date('2026-03-01T18:00:00.000Z'),
  },
  timestamp: new Date('2026-03-01T10:00:01.000Z'),
});

describe('LoggingNotificationPublisher', () => {
  it('should log each confirmation without keeping it', async () => {
    const publisher = new LoggingNotificationPublisher();

    for (let n = 0; n < 500; n++) {
      await expect(publisher.emitConfirmation(eventFor(n))).resolves.toBeUndefined();
    }

    expect(Object.keys(publisher)).toEqual([]);
  });
});
