import { RECONCILIATION_CONFIG } from '../../config/environments';
import { createServiceLogger, observedTransactionsTotal, provisioningFailuresTotal } from '../../observability';
import { LedgerStore } from '../../stores';
import { OrderStatus, OutcomeReason, TransactionOutcome } from '../../types/events';
import { ObservedTransactionRecord, OrderRecord } from '../../types/ledger';
import { meetsTolerance } from '../../utils/amount';
import { Clock, systemClock } from '../../utils/clock';
import { normalizeReferenceCode, REFERENCE_CODE_PATTERN } from '../../utils/identifiers';
import { CampaignService } from '../campaign/campaign.service';
import { OrderService } from '../order/order.service';

const log = createServiceLogger('reconciliation');

export type ReconciliationSummary = Record<TransactionOutcome, number> & {
  /** Already processed elsewhere; nothing written */
  skipped: number;
  provisioningFailures: number;
};

export interface ReconciliationServiceDeps {
  store: LedgerStore;
  orders: OrderService;
  campaigns: CampaignService;
  toleranceBasisPoints?: number;
  clock?: Clock;
}

type Decision = TransactionOutcome | 'skipped';

const lateReasonFor = (status: OrderStatus): OutcomeReason => {
  switch (status) {
    case OrderStatus.MATCHED:
      return OutcomeReason.ORDER_MATCHED;
    case OrderStatus.CANCELLED:
      return OutcomeReason.ORDER_CANCELLED;
    default:
      // Expired, or still pending in the store but past its expiry
      return OutcomeReason.ORDER_EXPIRED;
  }
};

const emptySummary = (): ReconciliationSummary => ({
  [TransactionOutcome.MATCHED]: 0,
  [TransactionOutcome.UNTRACKED]: 0,
  [TransactionOutcome.LATE]: 0,
  [TransactionOutcome.CONFLICTED]: 0,
  skipped: 0,
  provisioningFailures: 0,
});

/**
 * Correlates observed transfers with pending orders by memo and amount
 */
export class ReconciliationService {
  private readonly store: LedgerStore;
  private readonly orders: OrderService;
  private readonly campaigns: CampaignService;
  private readonly toleranceBasisPoints: number;
  private readonly clock: Clock;

  constructor(deps: ReconciliationServiceDeps) {
    this.store = deps.store;
    this.orders = deps.orders;
    this.campaigns = deps.campaigns;
    this.toleranceBasisPoints =
      deps.toleranceBasisPoints ?? RECONCILIATION_CONFIG.toleranceBasisPoints;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Classify each transaction in ledger order. Storage errors abort the
   * batch; provisioning errors after a match do not.
   */
  async reconcile(batch: ObservedTransactionRecord[]): Promise<ReconciliationSummary> {
    const summary = emptySummary();
    const ordered = [...batch].sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime());

    for (const tx of ordered) {
      const decision = await this.reconcileOne(tx, summary);
      summary[decision]++;
    }
    return summary;
  }

  private async reconcileOne(
    tx: ObservedTransactionRecord,
    summary: ReconciliationSummary
  ): Promise<Decision> {
    if (tx.processed) {
      return 'skipped';
    }

    const memo = tx.memo ? normalizeReferenceCode(tx.memo) : '';
    if (!memo) {
      return this.classify(tx, TransactionOutcome.UNTRACKED, OutcomeReason.NO_MEMO, null);
    }
    if (!REFERENCE_CODE_PATTERN.test(memo)) {
      return this.classify(tx, TransactionOutcome.UNTRACKED, OutcomeReason.UNKNOWN_REFERENCE, null);
    }

    const order = await this.orders.findByReferenceCode(memo);
    if (!order) {
      const previous = await this.orders.findLatestByReferenceCode(memo);
      if (previous) {
        return this.classify(
          tx,
          TransactionOutcome.LATE,
          lateReasonFor(previous.status),
          previous.orderId
        );
      }
      return this.classify(tx, TransactionOutcome.UNTRACKED, OutcomeReason.UNKNOWN_REFERENCE, null);
    }

    if (!meetsTolerance(tx.amount, order.expectedAmount, this.toleranceBasisPoints)) {
      log.warn(
        { txId: tx.txId, orderId: order.orderId, amount: tx.amount, expected: order.expectedAmount },
        'Payment below expected amount'
      );
      return this.classify(
        tx,
        TransactionOutcome.UNTRACKED,
        OutcomeReason.INSUFFICIENT_AMOUNT,
        order.orderId
      );
    }

    const matched = await this.orders.matchPayment(order.orderId, tx.txId);
    if (matched) {
      observedTransactionsTotal.inc({ outcome: TransactionOutcome.MATCHED, reason: 'none' });
      await this.provisionAfterMatch(matched, summary);
      return TransactionOutcome.MATCHED;
    }

    return this.resolveLostMatch(tx, order);
  }

  /**
   * The match CAS failed: either this transfer was handled by another
   * worker, or the order moved on
   */
  private async resolveLostMatch(
    tx: ObservedTransactionRecord,
    order: OrderRecord
  ): Promise<Decision> {
    const current = await this.store.transactions.findById(tx.txId);
    if (!current || current.processed) {
      log.info({ txId: tx.txId }, 'Transaction already processed');
      return 'skipped';
    }

    const latest = await this.orders.getOrder(order.orderId);
    if (latest.status === OrderStatus.MATCHED) {
      log.info(
        { txId: tx.txId, orderId: order.orderId, matchedTxId: latest.matchedTxId },
        'Order matched by another transfer'
      );
      return this.classify(
        tx,
        TransactionOutcome.CONFLICTED,
        OutcomeReason.MATCH_CONFLICT,
        order.orderId
      );
    }

    return this.classify(tx, TransactionOutcome.LATE, lateReasonFor(latest.status), order.orderId);
  }

  private async classify(
    tx: ObservedTransactionRecord,
    outcome: TransactionOutcome,
    reason: OutcomeReason,
    orderId: string | null
  ): Promise<Decision> {
    const marked = await this.store.transactions.markProcessed(tx.txId, {
      outcome,
      reason,
      orderId,
      at: this.clock(),
    });
    if (!marked) {
      log.info({ txId: tx.txId }, 'Transaction already processed');
      return 'skipped';
    }

    observedTransactionsTotal.inc({ outcome, reason });
    const logFn = outcome === TransactionOutcome.UNTRACKED ? log.info.bind(log) : log.warn.bind(log);
    logFn({ txId: tx.txId, outcome, reason, orderId, amount: tx.amount }, 'Transaction classified');
    return outcome;
  }

  private async provisionAfterMatch(
    order: OrderRecord,
    summary: ReconciliationSummary
  ): Promise<void> {
    try {
      await this.campaigns.provisionAndConfirm(order);
    } catch (error) {
      summary.provisioningFailures++;
      provisioningFailuresTotal.inc();
      log.error(
        {
          orderId: order.orderId,
          error: error instanceof Error ? error.message : String(error),
        },
        'Provisioning failed after match; left for the sweeper'
      );
    }
  }
}
