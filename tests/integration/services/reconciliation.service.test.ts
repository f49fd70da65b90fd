/**
 * Reconciliation Integration Tests
 *
 * Observed transfers are recorded directly in the in-memory store and run
 * through the same services the poller uses.
 */

import { OrderStatus, OutcomeReason, TransactionOutcome } from '../../../src/types/events';
import { ObservedTransactionRecord, OrderRecord } from '../../../src/types/ledger';
import {
  createTestContext,
  recordPayment,
  sequentialCodes,
  TEST_START,
  TestContext,
} from '../../helpers';

const DAY_MS = 24 * 60 * 60 * 1000;
const TTL_MS = 1200 * 1000;

describe('ReconciliationService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({ referenceCodes: sequentialCodes('AB1234', 'CD5678', 'EF9012') });
  });

  const reconcile = (...batch: ObservedTransactionRecord[]) =>
    ctx.container.reconciliation.reconcile(batch);

  const createOrder = async (durationDays = 1, channelIds = ['chan-a']): Promise<OrderRecord> =>
    (await ctx.container.orders.createOrder('buyer-1', { durationDays, channelIds })).order;

  const storedTx = async (txId: string): Promise<ObservedTransactionRecord | null> =>
    ctx.store.transactions.findById(txId);

  describe('matching', () => {
    it('should match an exact payment and provision the campaign', async () => {
      const order = await createOrder(7, ['chan-a', 'chan-b']);
      ctx.clock.advance(60_000);
      const tx = await recordPayment(ctx, { amount: 11_497_920, memo: 'AB1234' });

      const summary = await reconcile(tx);

      expect(summary).toEqual({
        matched: 1,
        untracked: 0,
        late: 0,
        conflicted: 0,
        skipped: 0,
        provisioningFailures: 0,
      });

      const matched = await ctx.container.orders.getOrder(order.orderId);
      const matchedAt = new Date(TEST_START.getTime() + 60_000);
      expect(matched.status).toBe(OrderStatus.MATCHED);
      expect(matched.matchedTxId).toBe(tx.txId);
      expect(matched.matchedAt).toEqual(matchedAt);
      expect(matched.campaignId).not.toBeNull();

      expect(await storedTx(tx.txId)).toMatchObject({
        processed: true,
        outcome: TransactionOutcome.MATCHED,
        outcomeReason: null,
        orderId: order.orderId,
      });

      const campaign = await ctx.container.campaigns.getCampaign(matched.campaignId ?? '');
      expect(campaign.totalPosts).toBe(42);
      const posts = await ctx.container.campaigns.listPosts(campaign.campaignId);
      expect(posts).toHaveLength(42);
      expect(posts[0].absoluteTimestamp).toEqual(matchedAt);
      expect(posts[41].absoluteTimestamp).toEqual(
        new Date(matchedAt.getTime() + 6 * DAY_MS + 16 * 60 * 60 * 1000)
      );

      expect(ctx.notifier.emitted).toHaveLength(1);
      expect(ctx.notifier.emitted[0]).toMatchObject({
        campaignId: campaign.campaignId,
        orderId: order.orderId,
        channelCount: 2,
        totalPosts: 42,
      });
    });

    it('should accept a payment short by exactly the tolerance', async () => {
      const order = await createOrder();
      const tx = await recordPayment(ctx, { amount: 284_200, memo: 'AB1234' });

      expect((await reconcile(tx)).matched).toBe(1);
      expect((await ctx.container.orders.getOrder(order.orderId)).status).toBe(
        OrderStatus.MATCHED
      );
    });

    it('should accept an overpayment', async () => {
      await createOrder();
      const tx = await recordPayment(ctx, { amount: 1_000_000, memo: 'AB1234' });

      expect((await reconcile(tx)).matched).toBe(1);
    });

    it('should match a memo regardless of case and whitespace', async () => {
      await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: '  ab1234\n' });

      expect((await reconcile(tx)).matched).toBe(1);
    });
  });

  describe('untracked transfers', () => {
    it('should flag a payment below the tolerance and keep the order open', async () => {
      const order = await createOrder();
      const tx = await recordPayment(ctx, { amount: 281_300, memo: 'AB1234' });

      expect((await reconcile(tx)).untracked).toBe(1);
      expect(await storedTx(tx.txId)).toMatchObject({
        processed: true,
        outcome: TransactionOutcome.UNTRACKED,
        outcomeReason: OutcomeReason.INSUFFICIENT_AMOUNT,
        orderId: order.orderId,
      });
      expect((await ctx.container.orders.getOrder(order.orderId)).status).toBe(
        OrderStatus.PENDING
      );
    });

    it('should flag a transfer without a memo', async () => {
      const tx = await recordPayment(ctx, { amount: 290_000, memo: null });

      await reconcile(tx);

      expect(await storedTx(tx.txId)).toMatchObject({
        outcome: TransactionOutcome.UNTRACKED,
        outcomeReason: OutcomeReason.NO_MEMO,
        orderId: null,
      });
    });

    it('should treat a blank memo as missing', async () => {
      const tx = await recordPayment(ctx, { amount: 290_000, memo: '   ' });

      await reconcile(tx);

      expect((await storedTx(tx.txId))?.outcomeReason).toBe(OutcomeReason.NO_MEMO);
    });

    it('should flag a memo that is not a reference code', async () => {
      await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'thanks for the ads' });

      await reconcile(tx);

      expect((await storedTx(tx.txId))?.outcomeReason).toBe(OutcomeReason.UNKNOWN_REFERENCE);
    });

    it('should flag a reference code no order ever carried', async () => {
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'ZZ9999' });

      await reconcile(tx);

      expect(await storedTx(tx.txId)).toMatchObject({
        outcome: TransactionOutcome.UNTRACKED,
        outcomeReason: OutcomeReason.UNKNOWN_REFERENCE,
        orderId: null,
      });
    });
  });

  describe('late transfers', () => {
    it('should classify a payment after the order expired', async () => {
      const order = await createOrder();
      ctx.clock.advance(TTL_MS);
      await ctx.container.orders.expireStale();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      expect((await reconcile(tx)).late).toBe(1);
      expect(await storedTx(tx.txId)).toMatchObject({
        outcome: TransactionOutcome.LATE,
        outcomeReason: OutcomeReason.ORDER_EXPIRED,
        orderId: order.orderId,
      });
    });

    it('should classify a payment to a lapsed order the sweeper has not reached', async () => {
      const order = await createOrder();
      ctx.clock.advance(TTL_MS);
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      expect((await reconcile(tx)).late).toBe(1);
      expect((await storedTx(tx.txId))?.outcomeReason).toBe(OutcomeReason.ORDER_EXPIRED);
      expect((await ctx.container.orders.getOrder(order.orderId)).status).toBe(
        OrderStatus.PENDING
      );
    });

    it('should classify a payment to a cancelled order', async () => {
      const order = await createOrder();
      await ctx.container.orders.cancel(order.orderId, { userId: 'buyer-1', role: 'user' });
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      await reconcile(tx);

      expect((await storedTx(tx.txId))?.outcomeReason).toBe(OutcomeReason.ORDER_CANCELLED);
    });

    it('should classify a second payment to a matched order', async () => {
      const order = await createOrder();
      const first = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await reconcile(first);
      const second = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      await reconcile(second);

      expect(await storedTx(second.txId)).toMatchObject({
        outcome: TransactionOutcome.LATE,
        outcomeReason: OutcomeReason.ORDER_MATCHED,
        orderId: order.orderId,
      });
      expect((await ctx.container.orders.getOrder(order.orderId)).matchedTxId).toBe(first.txId);
    });

    it('should let the earliest transfer in a batch win', async () => {
      const order = await createOrder();
      const later = await recordPayment(ctx, {
        amount: 290_000,
        memo: 'AB1234',
        occurredAt: new Date(TEST_START.getTime() + 2000),
      });
      const earlier = await recordPayment(ctx, {
        amount: 290_000,
        memo: 'AB1234',
        occurredAt: new Date(TEST_START.getTime() + 1000),
      });

      const summary = await reconcile(later, earlier);

      expect(summary.matched).toBe(1);
      expect(summary.late).toBe(1);
      expect((await ctx.container.orders.getOrder(order.orderId)).matchedTxId).toBe(earlier.txId);
    });
  });

  describe('concurrency', () => {
    it('should match exactly one of two racing payments', async () => {
      const order = await createOrder();
      const a = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      const b = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      const [first, second] = await Promise.all([reconcile(a), reconcile(b)]);

      expect(first.matched + second.matched).toBe(1);
      expect(first.conflicted + second.conflicted).toBe(1);

      const matched = await ctx.container.orders.getOrder(order.orderId);
      const loser = matched.matchedTxId === a.txId ? b : a;
      expect(await storedTx(loser.txId)).toMatchObject({
        outcome: TransactionOutcome.CONFLICTED,
        outcomeReason: OutcomeReason.MATCH_CONFLICT,
        orderId: order.orderId,
      });
      expect(await ctx.store.campaigns.findByOrderId(order.orderId)).not.toBeNull();
      expect(ctx.notifier.emitted).toHaveLength(1);
    });

    it('should process a transfer handed to two workers once', async () => {
      await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      const [first, second] = await Promise.all([reconcile(tx), reconcile(tx)]);

      expect(first.matched + second.matched).toBe(1);
      expect(first.skipped + second.skipped).toBe(1);
      expect(ctx.store.campaigns.records.size).toBe(1);
    });

    it('should skip a stale copy of a processed transfer', async () => {
      await createOrder();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });
      await reconcile(tx);

      const again = await reconcile(tx);

      expect(again.skipped).toBe(1);
      expect((await storedTx(tx.txId))?.outcome).toBe(TransactionOutcome.MATCHED);
    });

    it('should skip records already marked processed', async () => {
      const tx = await recordPayment(ctx, { amount: 290_000, memo: null });
      await reconcile(tx);
      const processed = await storedTx(tx.txId);

      expect(processed && (await reconcile(processed)).skipped).toBe(1);
    });
  });

  describe('provisioning failures', () => {
    it('should keep the match and leave the confirmation for a retry', async () => {
      const order = await createOrder();
      ctx.notifier.failNext();
      const tx = await recordPayment(ctx, { amount: 290_000, memo: 'AB1234' });

      const summary = await reconcile(tx);

      expect(summary.matched).toBe(1);
      expect(summary.provisioningFailures).toBe(1);
      expect((await ctx.container.orders.getOrder(order.orderId)).status).toBe(
        OrderStatus.MATCHED
      );
      const campaign = await ctx.store.campaigns.findByOrderId(order.orderId);
      expect(campaign?.confirmationClaimedAt).toBeNull();
      expect(ctx.notifier.emitted).toHaveLength(0);

      const resumed = await ctx.container.campaigns.resumePending();

      expect(resumed).toEqual({ provisioned: 0, confirmed: 1, failed: 0 });
      expect(ctx.notifier.emitted).toHaveLength(1);
      expect(ctx.notifier.attempts).toBe(2);
    });
  });
});
