import { OrderStatus, OutcomeReason, PostStatus, TransactionOutcome, TransactionResolution } from '../types/events';
import {
  AuditEntryRecord,
  CampaignRecord,
  NewObservedTransaction,
  ObservedTransactionRecord,
  OrderRecord,
  PollerCursor,
  ScheduledPostRecord,
} from '../types/ledger';

/**
 * Storage contract shared by the MongoDB and in-memory drivers.
 *
 * Every state change is a conditional update: it names the state the record
 * must currently be in and returns null when that precondition no longer
 * holds. Callers treat null as "someone else got there first".
 */

export interface Page<T> {
  items: T[];
  total: number;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface OrderQuery extends PageOptions {
  userId?: string;
  status?: OrderStatus;
}

export interface OrderTransition {
  from: OrderStatus[];
  to: OrderStatus.EXPIRED | OrderStatus.CANCELLED;
  at: Date;
  /** Only transition when the order's expiry has passed at `at` */
  requireLapsed?: boolean;
}

export interface OrderStore {
  /** Throws DuplicateKeyError('referenceCode') when a pending order already holds the code */
  insert(order: OrderRecord): Promise<OrderRecord>;
  findById(orderId: string): Promise<OrderRecord | null>;
  findPendingByReference(referenceCode: string): Promise<OrderRecord | null>;
  findLatestByReference(referenceCode: string): Promise<OrderRecord | null>;
  transition(orderId: string, transition: OrderTransition): Promise<OrderRecord | null>;
  findLapsed(now: Date, limit: number): Promise<OrderRecord[]>;
  findAwaitingProvision(limit: number): Promise<OrderRecord[]>;
  list(query: OrderQuery): Promise<Page<OrderRecord>>;
}

export interface ProcessedMark {
  outcome: TransactionOutcome;
  reason: OutcomeReason;
  orderId: string | null;
  at: Date;
}

export interface ResolutionMark {
  resolution: TransactionResolution.REFUNDED | TransactionResolution.DISMISSED;
  actor: string;
  at: Date;
}

export interface TransactionQuery extends PageOptions {
  outcome?: TransactionOutcome;
  unresolvedOnly?: boolean;
}

export interface TransactionStore {
  /** Insert unless the hash is already known; never overwrites */
  record(
    transaction: NewObservedTransaction,
    observedAt: Date
  ): Promise<{ record: ObservedTransactionRecord; inserted: boolean }>;
  findById(txId: string): Promise<ObservedTransactionRecord | null>;
  findUnprocessed(receivingAddress: string, limit: number): Promise<ObservedTransactionRecord[]>;
  /** processed: false -> true */
  markProcessed(txId: string, mark: ProcessedMark): Promise<ObservedTransactionRecord | null>;
  /** processed, not matched, resolution: null -> mark.resolution */
  resolve(txId: string, mark: ResolutionMark): Promise<ObservedTransactionRecord | null>;
  list(query: TransactionQuery): Promise<Page<ObservedTransactionRecord>>;
}

export interface PostTransition {
  from: PostStatus;
  to: PostStatus;
  at: Date;
  failureReason?: string | null;
  externalMessageId?: string | null;
}

export interface CampaignStore {
  /**
   * Write the campaign, its posts and the order's campaign link as one unit.
   * Resolves to the existing campaign when the order already has one.
   * Throws DuplicateKeyError('campaignId') on an ID collision.
   */
  create(
    campaign: CampaignRecord,
    posts: ScheduledPostRecord[]
  ): Promise<{ campaign: CampaignRecord; created: boolean }>;
  findById(campaignId: string): Promise<CampaignRecord | null>;
  findByOrderId(orderId: string): Promise<CampaignRecord | null>;
  /** confirmationClaimedAt: null -> at. True for the single caller that wins. */
  claimConfirmation(campaignId: string, at: Date): Promise<boolean>;
  /** confirmationClaimedAt: at -> null, so a failed emit can be retried */
  releaseConfirmation(campaignId: string, claimedAt: Date): Promise<boolean>;
  findUnconfirmed(limit: number): Promise<CampaignRecord[]>;
  listPosts(campaignId: string): Promise<ScheduledPostRecord[]>;
  findPost(postId: string): Promise<ScheduledPostRecord | null>;
  transitionPost(postId: string, transition: PostTransition): Promise<ScheduledPostRecord | null>;
  findDuePosts(before: Date, limit: number): Promise<ScheduledPostRecord[]>;
}

export interface CursorStore {
  get(address: string): Promise<PollerCursor | null>;
  save(cursor: PollerCursor): Promise<void>;
}

export interface AuditStore {
  append(entry: AuditEntryRecord): Promise<AuditEntryRecord>;
  list(options: PageOptions): Promise<Page<AuditEntryRecord>>;
}

export interface MatchRequest {
  orderId: string;
  txId: string;
  at: Date;
  /** Statuses the order may be in; automatic matching only allows pending */
  orderFrom: OrderStatus[];
  /** Reject when `at` is not before the order's expiry */
  enforceExpiry: boolean;
  /**
   * `unprocessed`: the transaction has not been classified yet (automatic path).
   * `unresolved`: it was classified without a match and has no resolution (manual path).
   */
  transactionState: 'unprocessed' | 'unresolved';
  /** Null for automatic matches */
  reason: OutcomeReason | null;
  resolvedBy?: string;
}

export interface LedgerStore {
  readonly orders: OrderStore;
  readonly transactions: TransactionStore;
  readonly campaigns: CampaignStore;
  readonly cursors: CursorStore;
  readonly audit: AuditStore;

  /**
   * Flip the order to matched and the transaction to processed/matched in a
   * single atomic unit. Null when either precondition fails; nothing changes.
   */
  matchOrder(request: MatchRequest): Promise<OrderRecord | null>;
}
