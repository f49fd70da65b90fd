import mongoose, { ClientSession, FilterQuery } from 'mongoose';

import {
  AuditEntry,
  Campaign,
  ObservedTransaction,
  Order,
  PollerCursor as PollerCursorModel,
  ScheduledPost,
} from '../models';
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
 * MongoDB ledger store.
 *
 * Single-document state changes are guarded findOneAndUpdate calls. Writes
 * that span collections (matching, campaign provisioning) run inside a
 * multi-document transaction, which needs a replica set.
 */

/** Thrown inside a transaction callback to abort it when a guard misses */
class PreconditionFailed extends Error {
  constructor() {
    super('Precondition failed');
    this.name = 'PreconditionFailed';
  }
}

const isDuplicateKey = (error: unknown): error is InstanceType<typeof mongoose.mongo.MongoServerError> =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

const duplicateKeyOf = (error: InstanceType<typeof mongoose.mongo.MongoServerError>): string => {
  const pattern: Record<string, unknown> = error.keyPattern ?? {};
  return Object.keys(pattern)[0] ?? 'unknown';
};

const toOrder = (doc: OrderRecord): OrderRecord => ({
  orderId: doc.orderId,
  referenceCode: doc.referenceCode,
  userId: doc.userId,
  claimedPayerAddress: doc.claimedPayerAddress ?? null,
  receivingAddress: doc.receivingAddress,
  durationDays: doc.durationDays,
  channelIds: [...doc.channelIds],
  expectedAmount: doc.expectedAmount,
  baseCost: doc.baseCost,
  postsPerDay: doc.postsPerDay,
  discountPercent: doc.discountPercent,
  scheduleTimes: [...doc.scheduleTimes],
  status: doc.status,
  createdAt: doc.createdAt,
  expiresAt: doc.expiresAt,
  matchedTxId: doc.matchedTxId ?? null,
  matchedAt: doc.matchedAt ?? null,
  closedAt: doc.closedAt ?? null,
  campaignId: doc.campaignId ?? null,
});

const toTransaction = (doc: ObservedTransactionRecord): ObservedTransactionRecord => ({
  txId: doc.txId,
  receivingAddress: doc.receivingAddress,
  fromAddress: doc.fromAddress ?? null,
  toAddress: doc.toAddress,
  amount: doc.amount,
  memo: doc.memo ?? null,
  occurredAt: doc.occurredAt,
  observedAt: doc.observedAt,
  processed: doc.processed,
  processedAt: doc.processedAt ?? null,
  outcome: doc.outcome ?? null,
  outcomeReason: doc.outcomeReason ?? null,
  orderId: doc.orderId ?? null,
  resolution: doc.resolution ?? null,
  resolvedBy: doc.resolvedBy ?? null,
  resolvedAt: doc.resolvedAt ?? null,
});

const toCampaign = (doc: CampaignRecord): CampaignRecord => ({
  campaignId: doc.campaignId,
  orderId: doc.orderId,
  userId: doc.userId,
  channelIds: [...doc.channelIds],
  durationDays: doc.durationDays,
  postsPerDay: doc.postsPerDay,
  slotTimes: [...doc.slotTimes],
  totalPosts: doc.totalPosts,
  startsAt: doc.startsAt,
  createdAt: doc.createdAt,
  confirmationClaimedAt: doc.confirmationClaimedAt ?? null,
});

const toPost = (doc: ScheduledPostRecord): ScheduledPostRecord => ({
  postId: doc.postId,
  campaignId: doc.campaignId,
  channelId: doc.channelId,
  dayIndex: doc.dayIndex,
  slotTime: doc.slotTime,
  absoluteTimestamp: doc.absoluteTimestamp,
  status: doc.status,
  statusChangedAt: doc.statusChangedAt ?? null,
  failureReason: doc.failureReason ?? null,
  externalMessageId: doc.externalMessageId ?? null,
});

const toCursor = (doc: PollerCursor): PollerCursor => ({
  address: doc.address,
  lastTimestamp: doc.lastTimestamp,
  lastTxId: doc.lastTxId ?? null,
  backfill: doc.backfill
    ? {
        txId: doc.backfill.txId,
        lt: doc.backfill.lt,
        headTxId: doc.backfill.headTxId ?? null,
        headTimestamp: doc.backfill.headTimestamp ?? null,
      }
    : null,
  updatedAt: doc.updatedAt,
});

const toAuditEntry = (doc: AuditEntryRecord): AuditEntryRecord => ({
  auditId: doc.auditId,
  actor: doc.actor,
  action: doc.action,
  targetType: doc.targetType,
  targetId: doc.targetId,
  reason: doc.reason,
  metadata: { ...doc.metadata },
  createdAt: doc.createdAt,
});

const unresolvedFilter: FilterQuery<ObservedTransactionRecord> = {
  processed: true,
  outcome: { $ne: TransactionOutcome.MATCHED },
  resolution: null,
};

export class MongoOrderStore implements OrderStore {
  async insert(order: OrderRecord): Promise<OrderRecord> {
    try {
      await Order.create(order);
    } catch (error) {
      if (isDuplicateKey(error)) {
        throw new DuplicateKeyError(duplicateKeyOf(error));
      }
      throw error;
    }
    return toOrder(order);
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    const doc = await Order.findOne({ orderId }).lean();
    return doc ? toOrder(doc) : null;
  }

  async findPendingByReference(referenceCode: string): Promise<OrderRecord | null> {
    const doc = await Order.findOne({ referenceCode, status: OrderStatus.PENDING }).lean();
    return doc ? toOrder(doc) : null;
  }

  async findLatestByReference(referenceCode: string): Promise<OrderRecord | null> {
    const doc = await Order.findOne({ referenceCode }).sort({ createdAt: -1 }).lean();
    return doc ? toOrder(doc) : null;
  }

  async transition(orderId: string, transition: OrderTransition): Promise<OrderRecord | null> {
    const filter: FilterQuery<OrderRecord> = { orderId, status: { $in: transition.from } };
    if (transition.requireLapsed) {
      filter.expiresAt = { $lte: transition.at };
    }
    const doc = await Order.findOneAndUpdate(
      filter,
      { $set: { status: transition.to, closedAt: transition.at } },
      { new: true }
    ).lean();
    return doc ? toOrder(doc) : null;
  }

  async findLapsed(now: Date, limit: number): Promise<OrderRecord[]> {
    const docs = await Order.find({ status: OrderStatus.PENDING, expiresAt: { $lte: now } })
      .sort({ expiresAt: 1 })
      .limit(limit)
      .lean();
    return docs.map(toOrder);
  }

  async findAwaitingProvision(limit: number): Promise<OrderRecord[]> {
    const docs = await Order.find({ status: OrderStatus.MATCHED, campaignId: null })
      .sort({ matchedAt: 1 })
      .limit(limit)
      .lean();
    return docs.map(toOrder);
  }

  async list(query: OrderQuery): Promise<Page<OrderRecord>> {
    const filter: FilterQuery<OrderRecord> = {};
    if (query.userId) filter.userId = query.userId;
    if (query.status) filter.status = query.status;

    const [docs, total] = await Promise.all([
      Order.find(filter).sort({ createdAt: -1 }).skip(query.offset).limit(query.limit).lean(),
      Order.countDocuments(filter),
    ]);
    return { items: docs.map(toOrder), total };
  }
}

export class MongoTransactionStore implements TransactionStore {
  async record(
    transaction: NewObservedTransaction,
    observedAt: Date
  ): Promise<{ record: ObservedTransactionRecord; inserted: boolean }> {
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

    try {
      await ObservedTransaction.create(record);
      return { record, inserted: true };
    } catch (error) {
      if (!isDuplicateKey(error)) {
        throw error;
      }
    }

    const existing = await ObservedTransaction.findOne({ txId: transaction.txId }).lean();
    if (!existing) {
      throw new Error(`Transaction ${transaction.txId} reported as duplicate but not found`);
    }
    return { record: toTransaction(existing), inserted: false };
  }

  async findById(txId: string): Promise<ObservedTransactionRecord | null> {
    const doc = await ObservedTransaction.findOne({ txId }).lean();
    return doc ? toTransaction(doc) : null;
  }

  async findUnprocessed(
    receivingAddress: string,
    limit: number
  ): Promise<ObservedTransactionRecord[]> {
    const docs = await ObservedTransaction.find({ receivingAddress, processed: false })
      .sort({ occurredAt: 1 })
      .limit(limit)
      .lean();
    return docs.map(toTransaction);
  }

  async markProcessed(
    txId: string,
    mark: ProcessedMark
  ): Promise<ObservedTransactionRecord | null> {
    const doc = await ObservedTransaction.findOneAndUpdate(
      { txId, processed: false },
      {
        $set: {
          processed: true,
          processedAt: mark.at,
          outcome: mark.outcome,
          outcomeReason: mark.reason,
          orderId: mark.orderId,
        },
      },
      { new: true }
    ).lean();
    return doc ? toTransaction(doc) : null;
  }

  async resolve(txId: string, mark: ResolutionMark): Promise<ObservedTransactionRecord | null> {
    const doc = await ObservedTransaction.findOneAndUpdate(
      { txId, ...unresolvedFilter },
      { $set: { resolution: mark.resolution, resolvedBy: mark.actor, resolvedAt: mark.at } },
      { new: true }
    ).lean();
    return doc ? toTransaction(doc) : null;
  }

  async list(query: TransactionQuery): Promise<Page<ObservedTransactionRecord>> {
    const conditions: FilterQuery<ObservedTransactionRecord>[] = [];
    if (query.outcome) conditions.push({ outcome: query.outcome });
    if (query.unresolvedOnly) conditions.push(unresolvedFilter);
    const filter: FilterQuery<ObservedTransactionRecord> = conditions.length
      ? { $and: conditions }
      : {};

    const [docs, total] = await Promise.all([
      ObservedTransaction.find(filter)
        .sort({ observedAt: -1 })
        .skip(query.offset)
        .limit(query.limit)
        .lean(),
      ObservedTransaction.countDocuments(filter),
    ]);
    return { items: docs.map(toTransaction), total };
  }
}

export class MongoCampaignStore implements CampaignStore {
  async create(
    campaign: CampaignRecord,
    posts: ScheduledPostRecord[]
  ): Promise<{ campaign: CampaignRecord; created: boolean }> {
    try {
      const created = await mongoose.connection.transaction(async (session: ClientSession) => {
        const existing = await Campaign.findOne({ orderId: campaign.orderId })
          .session(session)
          .lean();
        if (existing) {
          return { campaign: toCampaign(existing), created: false };
        }

        await Campaign.create([campaign], { session });
        await ScheduledPost.insertMany(posts, { session });
        await Order.updateOne(
          { orderId: campaign.orderId, campaignId: null },
          { $set: { campaignId: campaign.campaignId } },
          { session }
        );
        return { campaign: toCampaign(campaign), created: true };
      });
      return created;
    } catch (error) {
      if (!isDuplicateKey(error)) {
        throw error;
      }
      if (duplicateKeyOf(error) === 'orderId') {
        // Another provisioner committed first
        const winner = await this.findByOrderId(campaign.orderId);
        if (winner) {
          return { campaign: winner, created: false };
        }
      }
      throw new DuplicateKeyError(duplicateKeyOf(error));
    }
  }

  async findById(campaignId: string): Promise<CampaignRecord | null> {
    const doc = await Campaign.findOne({ campaignId }).lean();
    return doc ? toCampaign(doc) : null;
  }

  async findByOrderId(orderId: string): Promise<CampaignRecord | null> {
    const doc = await Campaign.findOne({ orderId }).lean();
    return doc ? toCampaign(doc) : null;
  }

  async claimConfirmation(campaignId: string, at: Date): Promise<boolean> {
    const result = await Campaign.updateOne(
      { campaignId, confirmationClaimedAt: null },
      { $set: { confirmationClaimedAt: at } }
    );
    return result.modifiedCount === 1;
  }

  async releaseConfirmation(campaignId: string, claimedAt: Date): Promise<boolean> {
    const result = await Campaign.updateOne(
      { campaignId, confirmationClaimedAt: claimedAt },
      { $set: { confirmationClaimedAt: null } }
    );
    return result.modifiedCount === 1;
  }

  async findUnconfirmed(limit: number): Promise<CampaignRecord[]> {
    const docs = await Campaign.find({ confirmationClaimedAt: null })
      .sort({ createdAt: 1 })
      .limit(limit)
      .lean();
    return docs.map(toCampaign);
  }

  async listPosts(campaignId: string): Promise<ScheduledPostRecord[]> {
    const docs = await ScheduledPost.find({ campaignId }).sort({ absoluteTimestamp: 1 }).lean();
    return docs.map(toPost);
  }

  async findPost(postId: string): Promise<ScheduledPostRecord | null> {
    const doc = await ScheduledPost.findOne({ postId }).lean();
    return doc ? toPost(doc) : null;
  }

  async transitionPost(
    postId: string,
    transition: PostTransition
  ): Promise<ScheduledPostRecord | null> {
    const doc = await ScheduledPost.findOneAndUpdate(
      { postId, status: transition.from },
      {
        $set: {
          status: transition.to,
          statusChangedAt: transition.at,
          failureReason: transition.failureReason ?? null,
          externalMessageId: transition.externalMessageId ?? null,
        },
      },
      { new: true }
    ).lean();
    return doc ? toPost(doc) : null;
  }

  async findDuePosts(before: Date, limit: number): Promise<ScheduledPostRecord[]> {
    const docs = await ScheduledPost.find({
      status: PostStatus.SCHEDULED,
      absoluteTimestamp: { $lte: before },
    })
      .sort({ absoluteTimestamp: 1 })
      .limit(limit)
      .lean();
    return docs.map(toPost);
  }
}

export class MongoCursorStore implements CursorStore {
  async get(address: string): Promise<PollerCursor | null> {
    const doc = await PollerCursorModel.findOne({ address }).lean();
    return doc ? toCursor(doc) : null;
  }

  async save(cursor: PollerCursor): Promise<void> {
    await PollerCursorModel.updateOne(
      { address: cursor.address },
      { $set: cursor },
      { upsert: true }
    );
  }
}

export class MongoAuditStore implements AuditStore {
  async append(entry: AuditEntryRecord): Promise<AuditEntryRecord> {
    await AuditEntry.create(entry);
    return toAuditEntry(entry);
  }

  async list(options: PageOptions): Promise<Page<AuditEntryRecord>> {
    const [docs, total] = await Promise.all([
      AuditEntry.find().sort({ createdAt: -1 }).skip(options.offset).limit(options.limit).lean(),
      AuditEntry.countDocuments(),
    ]);
    return { items: docs.map(toAuditEntry), total };
  }
}

export class MongoLedgerStore implements LedgerStore {
  readonly orders = new MongoOrderStore();
  readonly transactions = new MongoTransactionStore();
  readonly campaigns = new MongoCampaignStore();
  readonly cursors = new MongoCursorStore();
  readonly audit = new MongoAuditStore();

  async matchOrder(request: MatchRequest): Promise<OrderRecord | null> {
    const orderFilter: FilterQuery<OrderRecord> = {
      orderId: request.orderId,
      status: { $in: request.orderFrom },
    };
    if (request.enforceExpiry) {
      orderFilter.expiresAt = { $gt: request.at };
    }

    const txFilter: FilterQuery<ObservedTransactionRecord> =
      request.transactionState === 'unprocessed'
        ? { txId: request.txId, processed: false }
        : { txId: request.txId, ...unresolvedFilter };

    const txUpdate: Partial<ObservedTransactionRecord> = {
      processed: true,
      outcome: TransactionOutcome.MATCHED,
      outcomeReason: request.reason,
      orderId: request.orderId,
    };
    if (request.transactionState === 'unprocessed') {
      txUpdate.processedAt = request.at;
    }
    if (request.resolvedBy) {
      txUpdate.resolution = TransactionResolution.FORCE_MATCHED;
      txUpdate.resolvedBy = request.resolvedBy;
      txUpdate.resolvedAt = request.at;
    }

    try {
      return await mongoose.connection.transaction(async (session: ClientSession) => {
        const order = await Order.findOneAndUpdate(
          orderFilter,
          {
            $set: {
              status: OrderStatus.MATCHED,
              matchedTxId: request.txId,
              matchedAt: request.at,
            },
          },
          { new: true, session }
        ).lean();
        if (!order) {
          throw new PreconditionFailed();
        }

        const tx = await ObservedTransaction.findOneAndUpdate(
          txFilter,
          { $set: txUpdate },
          { new: true, session }
        ).lean();
        if (!tx) {
          throw new PreconditionFailed();
        }

        return toOrder(order);
      });
    } catch (error) {
      if (error instanceof PreconditionFailed) {
        return null;
      }
      throw error;
    }
  }
}
