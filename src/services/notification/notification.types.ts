import { CampaignProvisionedEvent, EventType, ScheduleSummary } from '../../types/events';
import { CampaignRecord } from '../../types/ledger';
import { slotOffsetMinutes } from '../pricing/pricing.service';

/**
 * Outbound boundary for campaign confirmations. Rendering the message for
 * the buyer happens downstream.
 */
export interface NotificationPublisher {
  emitConfirmation(event: CampaignProvisionedEvent): Promise<void>;
}

/**
 * First and last post times for a campaign starting at `startsAt`
 */
export function summarizeSchedule(campaign: CampaignRecord): ScheduleSummary {
  const offsets = campaign.slotTimes.map((slot) => slotOffsetMinutes(slot) * 60_000);
  const start = campaign.startsAt.getTime();
  const lastDay = (campaign.durationDays - 1) * 24 * 60 * 60_000;

  return {
    durationDays: campaign.durationDays,
    postsPerDay: campaign.postsPerDay,
    slotTimes: [...campaign.slotTimes],
    firstPostAt: new Date(start + Math.min(...offsets)),
    lastPostAt: new Date(start + lastDay + Math.max(...offsets)),
  };
}

export function buildProvisionedEvent(
  campaign: CampaignRecord,
  timestamp: Date
): CampaignProvisionedEvent {
  return {
    eventType: EventType.CAMPAIGN_PROVISIONED,
    userId: campaign.userId,
    orderId: campaign.orderId,
    campaignId: campaign.campaignId,
    channelCount: campaign.channelIds.length,
    totalPosts: campaign.totalPosts,
    scheduleSummary: summarizeSchedule(campaign),
    timestamp,
  };
}
