import { buildProvisionedEvent, summarizeSchedule } from '../../../src/services/notification';
import { EventType } from '../../../src/types/events';
import { CampaignRecord } from '../../../src/types/ledger';

const campaign: CampaignRecord = {
  campaignId: 'CAM-2026-03-AB12',
  orderId: 'ord_1',
  userId: 'buyer-1',
  channelIds: ['chan-a', 'chan-b'],
  durationDays: 7,
  postsPerDay: 3,
  slotTimes: ['00:00', '08:00', '16:00'],
  totalPosts: 42,
  startsAt: new Date('2026-03-01T10:00:00.000Z'),
  createdAt: new Date('2026-03-01T10:00:01.000Z'),
  confirmationClaimedAt: null,
};

describe('summarizeSchedule', () => {
  it('should span from the first slot to the last slot of the final day', () => {
    expect(summarizeSchedule(campaign)).toEqual({
      durationDays: 7,
      postsPerDay: 3,
      slotTimes: ['00:00', '08:00', '16:00'],
      firstPostAt: new Date('2026-03-01T10:00:00.000Z'),
      lastPostAt: new Date('2026-03-08T02:00:00.000Z'),
    });
  });

  it('should handle a single-day campaign', () => {
    const summary = summarizeSchedule({
      ...campaign,
      durationDays: 1,
      postsPerDay: 1,
      slotTimes: ['00:00'],
    });

    expect(summary.firstPostAt).toEqual(campaign.startsAt);
    expect(summary.lastPostAt).toEqual(campaign.startsAt);
  });
});

describe('buildProvisionedEvent', () => {
  it('should carry the campaign identity and counts', () => {
    const timestamp = new Date('2026-03-01T10:00:05.000Z');
    const event = buildProvisionedEvent(campaign, timestamp);

    expect(event).toMatchObject({
      eventType: EventType.CAMPAIGN_PROVISIONED,
      userId: 'buyer-1',
      orderId: 'ord_1',
      campaignId: 'CAM-2026-03-AB12',
      channelCount: 2,
      totalPosts: 42,
      timestamp,
    });
  });
});
