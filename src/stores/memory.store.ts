import { OrderStatus, PostStatus, TransactionOutcome, TransactionResolution } from '../types/events';
import {
  AuditEntryRecord,
  CampaignRecord,
  NewObservedTransaction,
  ObservedTransactionRecord,
  OrderRecord,
  PollerCursor,
  ScheduledPostRecord,
} from '../types/ledger';

import { DuplicateKeyError } from './errors';
import {
  AuditStore,
  CampaignStore,
  CursorStore,
  LedgerStore,
  MatchRequest,
  OrderQuery,
  OrderStore,
  OrderTransition,
  Page,
  PageOptions,
  PostTransition,
  ProcessedMark,
  ResolutionMark,
  TransactionQuery,
  TransactionStore,
} from './ledger.store';

/**
 * In-process ledger store.
 *
 * Each conditional update checks and writes without yielding to the event
 * loop, which gives it the same all-or-nothing behaviour as a guarded
 * findOneAndUpdate. Records are cloned on the way in and out so callers can
 * never mutate stored state.
 */

const clone = <T>(value: T): T => structuredClone(value);

const paginate = <T>(items: T[], { limit, offset }: PageOptions): Page<T> => ({
  items: items.slice(offset, offset + limit).map(clone),
  total: items.length,
});

const byDateDesc =
  <T>(field: (item: T) => Date) =>
  (a: T, b: T): number =>
    field(b).getTime() - field(a).getTime();

export class MemoryOrderStore implements OrderStore {
  readonly records = new Map<string, OrderRecord>();

  private pendingWithCode(referenceCode: string): OrderRecord | undefined {
    return [...this.records.values()].find(
      (o) => o.referenceCode === referenceCode && o.status === OrderStatus.PENDING
    );
  }

  async insert(order: OrderRecord): Promise<OrderRecord> {
    if (this.records.has(order.orderId)) {
      throw new DuplicateKeyError('orderId');
    }
    if (order.status === OrderStatus.PENDING && this.pendingWithCode(order.referenceCode)) {
      throw new DuplicateKeyError('referenceCode');
    }
    this.records.set(order.orderId, clone(order));
    return clone(order);
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    const order = this.records.get(orderId);
    return order ? clone(order) : null;
  }

  async findPendingByReference(referenceCode: string): Promise<OrderRecord | null> {
    const order = this.pendingWithCode(referenceCode);
    return order ? clone(order) : null;
  }

  async findLatestByReference(referenceCode: string): Promise<OrderRecord | null> {
    const [latest] = [...this.records.values()]
      .filter((o) => o.referenceCode === referenceCode)
      .sort(byDateDesc((o) => o.createdAt));
    return latest ? clone(latest) : null;
  }

  async transition(orderId: string, transition: OrderTransition): Promise<OrderRecord | null> {
    const order = this.records.get(orderId);
    if (!order || !transition.from.includes(order.status)) {
      return null;
    }
    if (transition.requireLapsed && order.expiresAt.getTime() > transition.at.getTime()) {
      return null;
    }
    order.status = transition.to;
    order.closedAt = transition.at;
    return clone(order);
  }

  async findLapsed(now: Date, limit: number): Promise<OrderRecord[]> {
    return [...this.records.values()]
      .filter((o) => o.status === OrderStatus.PENDING && o.expiresAt.getTime() <= now.getTime())
      .slice(0, limit)
      .map(clone);
  }

  async findAwaitingProvision(limit: number): Promise<OrderRecord[]> {
    return [...this.records.values()]
      .filter((o) => o.status === OrderStatus.MATCHED && o.campaignId === null)
      .slice(0, limit)
      .map(clone);
  }

  async list(query: OrderQuery): Promise<Page<OrderRecord>> {
    const matching = [...this.records.values()]
      .filter((o) => (query.userId ? o.userId === query.userId : true))
      .filter((o) => (query.status ? o.status === query.status : true))
      .sort(byDateDesc((o) => o.createdAt));
    return paginate(matching, query);
  }
}

export class MemoryTransactionStore implements TransactionStore {
  readonly records = new Map<string, ObservedTransactionRecord>();

  async record(
    transaction: NewObservedTransaction,
    observedAt: Date
  ): Promise<{ record: ObservedTransactionRecord; inserted: boolean }> {
    const existing = this.records.get(transaction.txId);
    if (existing) {
      return { record: clone(existing), inserted: false };
    }

    const record: ObservedTransactionRecord = {
      ...transaction,
      observedAt,
      processed: false,
      processedAt: null,
      outcome: null,
      outcomeReason: null,
      orderId: null,
      resolution: null,
      resolvedBy: null,
      resolvedAt: null,
    };
    this.records.set(record.txId, clone(record));
    return { record, inserted: true };
  }

  async findById(txId: string): Promise<ObservedTransactionRecord | null> {
    const tx = this.records.get(txId);
    return tx ? clone(tx) : null;
  }

  async findUnprocessed(
    receivingAddress: string,
    limit: number
  ): Promise<ObservedTransactionRecord[]> {
    return [...this.records.values()]
      .filter((tx) => !tx.processed && tx.receivingAddress === receivingAddress)
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime())
      .slice(0, limit)
      .map(clone);
  }

  async markProcessed(
    txId: string,
    mark: ProcessedMark
  ): Promise<ObservedTransactionRecord | null> {
    const tx = this.records.get(txId);
    if (!tx || tx.processed) {
      return null;
    }
    tx.processed = true;
    tx.processedAt = mark.at;
    tx.outcome = mark.outcome;
    tx.outcomeReason = mark.reason;
    tx.orderId = mark.orderId;
    return clone(tx);
  }

  async resolve(txId: string, mark: ResolutionMark): Promise<ObservedTransactionRecord | null> {
    const tx = this.records.get(txId);
    if (!tx || !this.isUnresolved(tx)) {
      return null;
    }
    tx.resolution = mark.resolution;
    tx.resolvedBy = mark.actor;
    tx.resolvedAt = mark.at;
    return clone(tx);
  }

  async list(query: TransactionQuery): Promise<Page<ObservedTransactionRecord>> {
    const matching = [...this.records.values()]
      .filter((tx) => (query.outcome ? tx.outcome === query.outcome : true))
      .filter((tx) => (query.unresolvedOnly ? this.isUnresolved(tx) : true))
      .sort(byDateDesc((tx) => tx.observedAt));
    return paginate(matching, query);
  }

  /** Classified without a match and not yet handled by an operator */
  isUnresolved(tx: ObservedTransactionRecord): boolean {
    return tx.processed && tx.outcome !== TransactionOutcome.MATCHED && tx.resolution === null;
  }
}

export class MemoryCampaignStore implements CampaignStore {
  readonly records = new Map<string, CampaignRecord>();
  readonly posts = new Map<string, ScheduledPostRecord>();

  constructor(private readonly orders: MemoryOrderStore) {}

  async create(
    campaign: CampaignRecord,
    posts: ScheduledPostRecord[]
  ): Promise<{ campaign: CampaignRecord; created: boolean }> {
    const existing = this.byOrderId(campaign.orderId);
    if (existing) {
      return { campaign: clone(existing), created: false };
    }
    if (this.records.has(campaign.campaignId)) {
      throw new DuplicateKeyError('campaignId');
    }

    this.records.set(campaign.campaignId, clone(campaign));
    for (const post of posts) {
      this.posts.set(post.postId, clone(post));
    }
    const order = this.orders.records.get(campaign.orderId);
    if (order) {
      order.campaignId = campaign.campaignId;
    }
    return { campaign: clone(campaign), created: true };
  }

  private byOrderId(orderId: string): CampaignRecord | undefined {
    return [...this.records.values()].find((c) => c.orderId === orderId);
  }

  async findById(campaignId: string): Promise<CampaignRecord | null> {
    const campaign = this.records.get(campaignId);
    return campaign ? clone(campaign) : null;
  }

  async findByOrderId(orderId: string): Promise<CampaignRecord | null> {
    const campaign = this.byOrderId(orderId);
    return campaign ? clone(campaign) : null;
  }

  async claimConfirmation(campaignId: string, at: Date): Promise<boolean> {
    const campaign = this.records.get(campaignId);
    if (!campaign || campaign.confirmationClaimedAt !== null) {
      return false;
    }
    campaign.confirmationClaimedAt = at;
    return true;
  }

  async releaseConfirmation(campaignId: string, claimedAt: Date): Promise<boolean> {
    const campaign = this.records.get(campaignId);
    if (!campaign || campaign.confirmationClaimedAt?.getTime() !== claimedAt.getTime()) {
      return false;
    }
    campaign.confirmationClaimedAt = null;
    return true;
  }

  async findUnconfirmed(limit: number): Promise<CampaignRecord[]> {
    return [...this.records.values()]
      .filter((c) => c.confirmationClaimedAt === null)
      .slice(0, limit)
      .map(clone);
  }

  async listPosts(campaignId: string): Promise<ScheduledPostRecord[]> {
    return [...this.posts.values()]
      .filter((p) => p.campaignId === campaignId)
      .sort((a, b) => a.absoluteTimestamp.getTime() - b.absoluteTimestamp.getTime())
      .map(clone);
  }

  async findPost(postId: string): Promise<ScheduledPostRecord | null> {
    const post = this.posts.get(postId);
    return post ? clone(post) : null;
  }

  async transitionPost(
    postId: string,
    transition: PostTransition
  ): Promise<ScheduledPostRecord | null> {
    const post = this.posts.get(postId);
    if (!post || post.status !== transition.from) {
      return null;
    }
    post.status = transition.to;
    post.statusChangedAt = transition.at;
    post.failureReason = transition.failureReason ?? null;
    post.externalMessageId = transition.externalMessageId ?? null;
    return clone(post);
  }

  async findDuePosts(before: Date, limit: number): Promise<ScheduledPostRecord[]> {
    return [...this.posts.values()]
      .filter(
        (p) =>
          p.status === PostStatus.SCHEDULED && p.absoluteTimestamp.getTime() <= before.getTime()
      )
      .sort((a, b) => a.absoluteTimestamp.getTime() - b.absoluteTimestamp.getTime())
      .slice(0, limit)
      .map(clone);
  }
}

export class MemoryCursorStore implements CursorStore {
  readonly records = new Map<string, PollerCursor>();

  async get(address: string): Promise<PollerCursor | null> {
    const cursor = this.records.get(address);
    return cursor ? clone(cursor) : null;
  }

  async save(cursor: PollerCursor): Promise<void> {
    this.records.set(cursor.address, clone(cursor));
  }
}

export class MemoryAuditStore implements AuditStore {
  readonly records: AuditEntryRecord[] = [];

  async append(entry: AuditEntryRecord): Promise<AuditEntryRecord> {
    this.records.push(clone(entry));
    return clone(entry);
  }

  async list(options: PageOptions): Promise<Page<AuditEntryRecord>> {
    return paginate([...this.records].sort(byDateDesc((e) => e.createdAt)), options);
  }
}

export class MemoryLedgerStore implements LedgerStore {
  readonly orders = new MemoryOrderStore();
  readonly transactions = new MemoryTransactionStore();
  readonly campaigns = new MemoryCampaignStore(this.orders);
  readonly cursors = new MemoryCursorStore();
  readonly audit = new MemoryAuditStore();

  async matchOrder(request: MatchRequest): Promise<OrderRecord | null> {
    const order = this.orders.records.get(request.orderId);
    const tx = this.transactions.records.get(request.txId);
    if (!order || !tx) {
      return null;
    }

    if (!request.orderFrom.includes(order.status)) {
      return null;
    }
    if (request.enforceExpiry && request.at.getTime() >= order.expiresAt.getTime()) {
      return null;
    }
    if (request.transactionState === 'unprocessed' && tx.processed) {
      return null;
    }
    if (request.transactionState === 'unresolved' && !this.transactions.isUnresolved(tx)) {
      return null;
    }

    order.status = OrderStatus.MATCHED;
    order.matchedTxId = tx.txId;
    order.matchedAt = request.at;

    tx.processed = true;
    tx.processedAt = tx.processedAt ?? request.at;
    tx.outcome = TransactionOutcome.MATCHED;
    tx.outcomeReason = request.reason;
    tx.orderId = order.orderId;
    if (request.resolvedBy) {
      tx.resolution = TransactionResolution.FORCE_MATCHED;
      tx.resolvedBy = request.resolvedBy;
      tx.resolvedAt = request.at;
    }

    return clone(order);
  }
}
