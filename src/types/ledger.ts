import {
  AuditAction,
  OrderStatus,
  OutcomeReason,
  PostStatus,
  TransactionOutcome,
  TransactionResolution,
} from './events';

/**
 * Persisted shapes shared by both storage drivers.
 * Amounts are integer micro-units.
 */

export interface OrderRecord {
  orderId: string;
  referenceCode: string;
  userId: string;
  claimedPayerAddress: string | null;
  receivingAddress: string;
  durationDays: number;
  channelIds: string[];
  expectedAmount: number;
  baseCost: number;
  postsPerDay: number;
  discountPercent: number;
  scheduleTimes: string[];
  status: OrderStatus;
  createdAt: Date;
  expiresAt: Date;
  matchedTxId: string | null;
  matchedAt: Date | null;
  closedAt: Date | null;
  campaignId: string | null;
}

export interface ObservedTransactionRecord {
  txId: string;
  receivingAddress: string;
  fromAddress: string | null;
  toAddress: string;
  amount: number;
  memo: string | null;
  occurredAt: Date;
  observedAt: Date;
  processed: boolean;
  processedAt: Date | null;
  outcome: TransactionOutcome | null;
  outcomeReason: OutcomeReason | null;
  orderId: string | null;
  resolution: TransactionResolution | null;
  resolvedBy: string | null;
  resolvedAt: Date | null;
}

export type NewObservedTransaction = Pick<
  ObservedTransactionRecord,
  'txId' | 'receivingAddress' | 'fromAddress' | 'toAddress' | 'amount' | 'memo' | 'occurredAt'
>;

export interface CampaignRecord {
  campaignId: string;
  orderId: string;
  userId: string;
  channelIds: string[];
  durationDays: number;
  postsPerDay: number;
  slotTimes: string[];
  totalPosts: number;
  startsAt: Date;
  createdAt: Date;
  confirmationClaimedAt: Date | null;
}

export interface ScheduledPostRecord {
  postId: string;
  campaignId: string;
  channelId: string;
  dayIndex: number;
  slotTime: string;
  absoluteTimestamp: Date;
  status: PostStatus;
  statusChangedAt: Date | null;
  failureReason: string | null;
  externalMessageId: string | null;
}

/**
 * Unread gap below a truncated fetch. Paging resumes under `txId`/`lt`
 * until the window start is reached.
 */
export interface CursorBackfill {
  txId: string;
  lt: string;
  /** Newest record seen when the gap opened; null once a rejected record holds the cursor */
  headTxId: string | null;
  headTimestamp: Date | null;
}

export interface PollerCursor {
  address: string;
  lastTimestamp: Date;
  lastTxId: string | null;
  backfill: CursorBackfill | null;
  updatedAt: Date;
}

export interface AuditEntryRecord {
  auditId: string;
  actor: string;
  action: AuditAction;
  targetType: 'order' | 'transaction';
  targetId: string;
  reason: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}
