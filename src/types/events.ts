export enum OrderStatus {
  PENDING = 'pending',
  MATCHED = 'matched',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

export enum TransactionOutcome {
  MATCHED = 'matched',
  UNTRACKED = 'untracked',
  LATE = 'late',
  CONFLICTED = 'conflicted',
}

export enum OutcomeReason {
  NO_MEMO = 'NO_MEMO',
  UNKNOWN_REFERENCE = 'UNKNOWN_REFERENCE',
  INSUFFICIENT_AMOUNT = 'INSUFFICIENT_AMOUNT',
  ORDER_EXPIRED = 'ORDER_EXPIRED',
  ORDER_MATCHED = 'ORDER_MATCHED',
  ORDER_CANCELLED = 'ORDER_CANCELLED',
  MATCH_CONFLICT = 'MATCH_CONFLICT',
  MANUAL_MATCH = 'MANUAL_MATCH',
}

export enum TransactionResolution {
  REFUNDED = 'refunded',
  DISMISSED = 'dismissed',
  FORCE_MATCHED = 'force_matched',
}

export enum PostStatus {
  SCHEDULED = 'scheduled',
  PUBLISHED = 'published',
  FAILED = 'failed',
}

export enum AuditAction {
  FORCE_MATCH = 'FORCE_MATCH',
  RESOLVE_TRANSACTION = 'RESOLVE_TRANSACTION',
  RETRY_PROVISIONING = 'RETRY_PROVISIONING',
  CANCEL_ORDER = 'CANCEL_ORDER',
}

export enum EventType {
  CAMPAIGN_PROVISIONED = 'CAMPAIGN_PROVISIONED',
}

/**
 * Structured summary of a campaign's cadence. Rendering it for people
 * happens outside this service.
 */
export interface ScheduleSummary {
  durationDays: number;
  postsPerDay: number;
  slotTimes: string[];
  firstPostAt: Date;
  lastPostAt: Date;
}

export interface CampaignProvisionedEvent {
  eventType: EventType.CAMPAIGN_PROVISIONED;
  userId: string;
  orderId: string;
  campaignId: string;
  channelCount: number;
  totalPosts: number;
  scheduleSummary: ScheduleSummary;
  timestamp: Date;
}
