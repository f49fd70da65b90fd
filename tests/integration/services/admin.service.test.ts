/**
 * Admin Service Integration Tests
 *
 * Operator corrections on top of reconciliation outcomes.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import {
  AuditAction,
  OrderStatus,
  OutcomeReason,
  TransactionOutcome,
  TransactionResolution,
} from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';
import { ObservedTransactionRecord, OrderRecord } from '../../../src/types/ledger';
import {
  createTestContext,
  recordPayment,
  sequentialCodes,
  TEST_START,
  TestContext,
} from '../../helpers';

const TTL_MS = 1200 * 1000;

const captureError = async (promise: Promise<unknown>): Promise<ApiError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ApiError) return error;
    throw error;
  }
  throw new Error('Expected the call to fail');
};

describe('AdminService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({ referenceCodes: sequentialCodes('AB1234', 'CD5678') });
  });

  const admin = () => ctx.container.admin;

  const createOrder = async (): Promise<OrderRecord> =>
    (
      await ctx.container.orders.createOrder('buyer-1', {
        durationDays: 1,
        channelIds: ['chan-a'],
      })
    ).order;

  /**
   * An underpayment: classified untracked with the order attached
   */
  const shortPayment = async (): Promise<ObservedTransactionRecord> => {
    const tx = await recordPayment(ctx, { amount: 100_000, memo: 'AB1234' });
    await ctx.container.reconciliation.reconcile([tx]);
    return tx;
  };

  describe('forceMatch', () => {
    it('should match an untracked transfer to a pending order', async () => {
      const order = await createOrder();
      const tx = await shortPayment();
      ctx.clock.advance(60_000);

      const result = await admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'Payer topped up off-chain');

      expect(result.order).toMatchObject({
        status: OrderStatus.MATCHED,
        matchedTxId: tx.txId,
        matchedAt: new Date(TEST_START.getTime() + 60_000),
      });
      expect(result.campaign?.orderId).toBe(order.orderId);
      expect(ctx.notifier.emitted).toHaveLength(1);

      expect(await ctx.store.transactions.findById(tx.txId)).toMatchObject({
        outcome: TransactionOutcome.MATCHED,
        outcomeReason: OutcomeReason.MANUAL_MATCH,
        orderId: order.orderId,
        resolution: TransactionResolution.FORCE_MATCHED,
        resolvedBy: 'ops-1',
      });

      expect(ctx.store.audit.records).toHaveLength(1);
      expect(ctx.store.audit.records[0]).toMatchObject({
        actor: 'ops-1',
        action: AuditAction.FORCE_MATCH,
        targetType: 'transaction',
        targetId: tx.txId,
        reason: 'Payer topped up off-chain',
        metadata: {
          orderId: order.orderId,
          previousOrderStatus: OrderStatus.PENDING,
          previousOutcome: TransactionOutcome.UNTRACKED,
          previousReason: OutcomeReason.INSUFFICIENT_AMOUNT,
          amount: 100_000,
          expectedAmount: 290_000,
        },
      });
    });

    it('should match a late transfer to its expired order', async () => {
      const order = await createOrder();
      ctx.clock.advance(TTL_MS);
      await ctx.container.orders.expireStale();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await ctx.container.reconciliation.reconcile([tx]);

      const result = await admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'Paid a minute late');

      expect(result.order.status).toBe(OrderStatus.MATCHED);
      expect(ctx.store.audit.records[0].metadata.previousOrderStatus).toBe(OrderStatus.EXPIRED);
    });

    it('should refuse a cancelled order', async () => {
      const order = await createOrder();
      const tx = await shortPayment();
      await ctx.container.orders.cancel(order.orderId, { userId: 'buyer-1', role: 'user' });

      const error = await captureError(admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'x'));

      expect(error.errorCode).toBe(ErrorCode.INVALID_STATE_TRANSITION);
      expect(error.message).toBe(`Order ${order.orderId} is cancelled and cannot be matched`);
    });

    it('should refuse a transfer that already matched', async () => {
      const order = await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await ctx.container.reconciliation.reconcile([tx]);

      const error = await captureError(admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'x'));

      expect(error.errorCode).toBe(ErrorCode.TRANSACTION_ALREADY_RESOLVED);
      expect(error.statusCode).toBe(409);
    });

    it('should refuse a transfer that was not reconciled yet', async () => {
      const order = await createOrder();
      const tx = await recordPayment(ctx, { amount: 100_000, memo: 'AB1234' });

      const error = await captureError(admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'x'));

      expect(error.errorCode).toBe(ErrorCode.INVALID_STATE_TRANSITION);
      expect(error.message).toBe(`Transaction ${tx.txId} has not been reconciled yet`);
    });

    it('should report unknown transactions and orders', async () => {
      const tx = await shortPayment();

      expect((await captureError(admin().forceMatch('missing', 'ord_x', 'ops-1', 'x'))).errorCode).toBe(
        ErrorCode.TRANSACTION_NOT_FOUND
      );
      expect((await captureError(admin().forceMatch(tx.txId, 'ord_x', 'ops-1', 'x'))).errorCode).toBe(
        ErrorCode.ORDER_NOT_FOUND
      );
    });

    it('should keep the match when provisioning fails', async () => {
      const order = await createOrder();
      const tx = await shortPayment();
      ctx.notifier.failNext();

      const result = await admin().forceMatch(tx.txId, order.orderId, 'ops-1', 'x');

      expect(result.order.status).toBe(OrderStatus.MATCHED);
      expect(result.campaign).toBeNull();
      expect(ctx.store.campaigns.records.size).toBe(1);
    });
  });

  describe('resolveTransaction', () => {
    it('should mark an untracked transfer refunded once', async () => {
      await createOrder();
      const tx = await shortPayment();
      ctx.clock.advance(5000);

      const resolved = await admin().resolveTransaction(
        tx.txId,
        TransactionResolution.REFUNDED,
        'ops-1',
        'Refunded to sender'
      );

      expect(resolved).toMatchObject({
        resolution: TransactionResolution.REFUNDED,
        resolvedBy: 'ops-1',
        resolvedAt: new Date(TEST_START.getTime() + 5000),
        outcome: TransactionOutcome.UNTRACKED,
      });
      expect(ctx.store.audit.records[0]).toMatchObject({
        action: AuditAction.RESOLVE_TRANSACTION,
        targetId: tx.txId,
        reason: 'Refunded to sender',
        metadata: {
          resolution: TransactionResolution.REFUNDED,
          outcome: TransactionOutcome.UNTRACKED,
          reason: OutcomeReason.INSUFFICIENT_AMOUNT,
        },
      });

      const error = await captureError(
        admin().resolveTransaction(tx.txId, TransactionResolution.DISMISSED, 'ops-2', 'again')
      );
      expect(error.errorCode).toBe(ErrorCode.TRANSACTION_ALREADY_RESOLVED);
      expect(error.message).toBe(`Transaction ${tx.txId} is already refunded`);
    });
  });

  describe('retryProvisioning', () => {
    it('should provision a matched order and audit the retry', async () => {
      const order = await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await ctx.container.orders.matchPayment(order.orderId, tx.txId);

      const campaign = await admin().retryProvisioning(order.orderId, 'ops-1');

      expect(campaign.orderId).toBe(order.orderId);
      expect(ctx.store.audit.records[0]).toMatchObject({
        action: AuditAction.RETRY_PROVISIONING,
        targetType: 'order',
        targetId: order.orderId,
        reason: 'Provisioning retried by operator',
        metadata: { campaignId: campaign.campaignId },
      });
    });

    it('should refuse an order that was never paid', async () => {
      const order = await createOrder();

      const error = await captureError(admin().retryProvisioning(order.orderId, 'ops-1'));

      expect(error.errorCode).toBe(ErrorCode.INVALID_STATE_TRANSITION);
      expect(ctx.store.audit.records).toHaveLength(0);
    });

    it('should report an unknown order', async () => {
      expect((await captureError(admin().retryProvisioning('ord_x', 'ops-1'))).errorCode).toBe(
        ErrorCode.ORDER_NOT_FOUND
      );
    });
  });

  describe('listings', () => {
    it('should list unresolved transfers only when asked', async () => {
      await createOrder();
      const short = await shortPayment();
      const paid = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await ctx.container.reconciliation.reconcile([paid]);

      const all = await admin().listTransactions({ limit: 10, offset: 0 });
      const unresolved = await admin().listTransactions({ unresolvedOnly: true, limit: 10, offset: 0 });

      expect(all.total).toBe(2);
      expect(unresolved.items.map((t) => t.txId)).toEqual([short.txId]);
    });

    it('should filter by outcome', async () => {
      const tx = await recordPayment(ctx, { amount: 1, memo: null });
      await ctx.container.reconciliation.reconcile([tx]);

      const untracked = await admin().listTransactions({
        outcome: TransactionOutcome.UNTRACKED,
        limit: 10,
        offset: 0,
      });
      const matched = await admin().listTransactions({
        outcome: TransactionOutcome.MATCHED,
        limit: 10,
        offset: 0,
      });

      expect(untracked.total).toBe(1);
      expect(matched.total).toBe(0);
    });

    it('should list audit entries newest first', async () => {
      const first = await createOrder();
      await ctx.container.orders.cancel(first.orderId, { userId: 'buyer-1', role: 'user' });
      ctx.clock.advance(1000);
      const second = await createOrder();
      await ctx.container.orders.cancel(second.orderId, { userId: 'buyer-1', role: 'user' });

      const page = await admin().listAudit({ limit: 10, offset: 0 });

      expect(page.total).toBe(2);
      expect(page.items.map((e) => e.targetId)).toEqual([second.orderId, first.orderId]);
    });
  });
});
