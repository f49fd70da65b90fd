import { ORDER_CONFIG } from '../../config/environments';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, orderTransitionsTotal, ordersCreatedTotal } from '../../observability';
import { DuplicateKeyError, LedgerStore, Page } from '../../stores';
import { AuditAction, OrderStatus } from '../../types/events';
import { OrderRecord } from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import {
  generateAuditId,
  generateOrderId,
  generateReferenceCode,
  normalizeReferenceCode,
} from '../../utils/identifiers';
import { PricingResult, PricingService } from '../pricing/pricing.service';

import { isValidTransition, statusesAllowing } from './order.state';

const log = createServiceLogger('order');

export type OrderConfig = typeof ORDER_CONFIG;

export interface CreateOrderDTO {
  durationDays: number;
  channelIds: string[];
  claimedPayerAddress?: string | null;
}

export interface CreatedOrder {
  order: OrderRecord;
  pricing: PricingResult;
}

export interface OrderQueryOptions {
  status?: OrderStatus;
  limit: number;
  offset: number;
}

export interface Requester {
  userId: string;
  role: string;
}

export interface OrderServiceDeps {
  store: LedgerStore;
  pricing: PricingService;
  receivingAddresses: string[];
  config?: OrderConfig;
  clock?: Clock;
  referenceCodes?: () => string;
  /** Rows scanned per expiry sweep */
  sweepBatchLimit?: number;
}

export class OrderService {
  private readonly store: LedgerStore;
  private readonly pricing: PricingService;
  private readonly receivingAddresses: string[];
  private readonly config: OrderConfig;
  private readonly clock: Clock;
  private readonly referenceCodes: () => string;
  private readonly sweepBatchLimit: number;

  constructor(deps: OrderServiceDeps) {
    this.store = deps.store;
    this.pricing = deps.pricing;
    this.receivingAddresses = deps.receivingAddresses;
    this.config = deps.config ?? ORDER_CONFIG;
    this.clock = deps.clock ?? systemClock;
    this.referenceCodes = deps.referenceCodes ?? generateReferenceCode;
    this.sweepBatchLimit = deps.sweepBatchLimit ?? 200;
  }

  /**
   * Price the request, allocate a reference code not held by any pending
   * order, and persist the order as pending
   */
  async createOrder(userId: string, dto: CreateOrderDTO): Promise<CreatedOrder> {
    const channelIds = [...new Set(dto.channelIds.map((id) => id.trim()).filter(Boolean))];
    if (channelIds.length === 0) {
      throw ApiError.invalidChannels('At least one channel is required');
    }
    if (channelIds.length > this.config.maxChannelsPerOrder) {
      throw ApiError.invalidChannels(
        `At most ${this.config.maxChannelsPerOrder} channels per order`
      );
    }

    const pricing = this.pricing.computePricing(dto.durationDays, channelIds.length);

    const [receivingAddress] = this.receivingAddresses;
    if (!receivingAddress) {
      throw ApiError.internal('No receiving address configured');
    }

    for (let attempt = 1; attempt <= this.config.referenceRetries; attempt++) {
      const now = this.clock();
      const order: OrderRecord = {
        orderId: generateOrderId(),
        referenceCode: this.referenceCodes(),
        userId,
        claimedPayerAddress: dto.claimedPayerAddress?.trim() || null,
        receivingAddress,
        durationDays: pricing.durationDays,
        channelIds,
        expectedAmount: pricing.finalCost,
        baseCost: pricing.baseCost,
        postsPerDay: pricing.postsPerDay,
        discountPercent: pricing.discountPercent,
        scheduleTimes: pricing.scheduleTimes,
        status: OrderStatus.PENDING,
        createdAt: now,
        expiresAt: new Date(now.getTime() + this.config.ttlSeconds * 1000),
        matchedTxId: null,
        matchedAt: null,
        closedAt: null,
        campaignId: null,
      };

      try {
        const created = await this.store.orders.insert(order);
        ordersCreatedTotal.inc();
        log.info(
          {
            orderId: created.orderId,
            userId,
            referenceCode: created.referenceCode,
            expectedAmount: created.expectedAmount,
            attempt,
          },
          'Order created'
        );
        return { order: created, pricing };
      } catch (error) {
        if (error instanceof DuplicateKeyError && error.key === 'referenceCode') {
          log.debug({ attempt, referenceCode: order.referenceCode }, 'Reference code collision');
          continue;
        }
        throw error;
      }
    }

    log.error({ userId, retries: this.config.referenceRetries }, 'Reference codes exhausted');
    throw ApiError.referenceCodeExhausted();
  }

  /**
   * Pending order carrying the code, matched case-insensitively
   */
  async findByReferenceCode(referenceCode: string): Promise<OrderRecord | null> {
    return this.store.orders.findPendingByReference(normalizeReferenceCode(referenceCode));
  }

  /**
   * Most recent order that ever carried the code, in any status
   */
  async findLatestByReferenceCode(referenceCode: string): Promise<OrderRecord | null> {
    return this.store.orders.findLatestByReference(normalizeReferenceCode(referenceCode));
  }

  /**
   * pending and unexpired -> matched, together with the transaction's
   * processed flag. Resolves to the matched order, or null when either
   * side no longer qualifies.
   */
  async matchPayment(orderId: string, txId: string): Promise<OrderRecord | null> {
    const matched = await this.store.matchOrder({
      orderId,
      txId,
      at: this.clock(),
      orderFrom: statusesAllowing(OrderStatus.MATCHED),
      enforceExpiry: true,
      transactionState: 'unprocessed',
      reason: null,
    });
    if (matched) {
      orderTransitionsTotal.inc({ status: OrderStatus.MATCHED });
      log.info({ orderId, txId }, 'Order matched');
    }
    return matched;
  }

  async tryMatch(orderId: string, txId: string): Promise<boolean> {
    return (await this.matchPayment(orderId, txId)) !== null;
  }

  /**
   * Expire every pending order whose TTL has lapsed. Safe to run
   * concurrently with matching: each expiry re-checks status and expiry.
   */
  async expireStale(): Promise<number> {
    const now = this.clock();
    const lapsed = await this.store.orders.findLapsed(now, this.sweepBatchLimit);

    let expired = 0;
    for (const order of lapsed) {
      const result = await this.store.orders.transition(order.orderId, {
        from: statusesAllowing(OrderStatus.EXPIRED),
        to: OrderStatus.EXPIRED,
        at: now,
        requireLapsed: true,
      });
      if (result) {
        expired++;
        orderTransitionsTotal.inc({ status: OrderStatus.EXPIRED });
        log.info({ orderId: order.orderId, referenceCode: order.referenceCode }, 'Order expired');
      }
    }
    return expired;
  }

  async cancel(orderId: string, requester: Requester): Promise<OrderRecord> {
    const order = await this.getOrderForUser(orderId, requester);
    if (!isValidTransition(order.status, OrderStatus.CANCELLED)) {
      throw ApiError.orderNotCancellable(order.status);
    }

    const now = this.clock();
    const cancelled = await this.store.orders.transition(orderId, {
      from: statusesAllowing(OrderStatus.CANCELLED),
      to: OrderStatus.CANCELLED,
      at: now,
    });
    if (!cancelled) {
      // Matched or expired between the read and the write
      const current = await this.getOrder(orderId);
      throw ApiError.orderNotCancellable(current.status);
    }

    await this.store.audit.append({
      auditId: generateAuditId(),
      actor: requester.userId,
      action: AuditAction.CANCEL_ORDER,
      targetType: 'order',
      targetId: orderId,
      reason: 'Cancelled by requester',
      metadata: { referenceCode: cancelled.referenceCode },
      createdAt: now,
    });

    orderTransitionsTotal.inc({ status: OrderStatus.CANCELLED });
    log.info({ orderId, userId: requester.userId }, 'Order cancelled');
    return cancelled;
  }

  async getOrder(orderId: string): Promise<OrderRecord> {
    const order = await this.store.orders.findById(orderId);
    if (!order) {
      throw ApiError.notFound('Order');
    }
    return order;
  }

  /**
   * Owners see their own orders; admins see all
   */
  async getOrderForUser(orderId: string, requester: Requester): Promise<OrderRecord> {
    const order = await this.getOrder(orderId);
    if (order.userId !== requester.userId && requester.role !== 'admin') {
      throw ApiError.forbidden('Not authorized to view this order');
    }
    return order;
  }

  async listUserOrders(userId: string, options: OrderQueryOptions): Promise<Page<OrderRecord>> {
    return this.store.orders.list({ userId, ...options });
  }

  async findAwaitingProvision(limit: number): Promise<OrderRecord[]> {
    return this.store.orders.findAwaitingProvision(limit);
  }
}
