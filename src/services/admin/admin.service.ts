import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, orderTransitionsTotal } from '../../observability';
import { LedgerStore, Page, PageOptions, TransactionQuery } from '../../stores';
import {
  AuditAction,
  OrderStatus,
  OutcomeReason,
  TransactionOutcome,
  TransactionResolution,
} from '../../types/events';
import {
  AuditEntryRecord,
  CampaignRecord,
  ObservedTransactionRecord,
  OrderRecord,
} from '../../types/ledger';
import { Clock, systemClock } from '../../utils/clock';
import { generateAuditId } from '../../utils/identifiers';
import { CampaignService } from '../campaign/campaign.service';

const log = createServiceLogger('admin');

export type ManualResolution = TransactionResolution.REFUNDED | TransactionResolution.DISMISSED;

export interface ForceMatchResult {
  order: OrderRecord;
  /** Null when provisioning failed; the sweeper retries it */
  campaign: CampaignRecord | null;
}

export interface AdminServiceDeps {
  store: LedgerStore;
  campaigns: CampaignService;
  clock?: Clock;
}

/**
 * Operator corrections. Every change goes through the same conditional
 * updates as the automatic path and leaves an audit entry.
 */
export class AdminService {
  private readonly store: LedgerStore;
  private readonly campaigns: CampaignService;
  private readonly clock: Clock;

  constructor(deps: AdminServiceDeps) {
    this.store = deps.store;
    this.campaigns = deps.campaigns;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Attach an unmatched transfer to a pending or expired order. The amount
   * is not checked against the order.
   */
  async forceMatch(
    txId: string,
    orderId: string,
    actor: string,
    reason: string
  ): Promise<ForceMatchResult> {
    const tx = await this.requireUnresolved(txId);
    const order = await this.store.orders.findById(orderId);
    if (!order) {
      throw ApiError.notFound('Order');
    }
    if (order.status !== OrderStatus.PENDING && order.status !== OrderStatus.EXPIRED) {
      throw ApiError.invalidTransition(`Order ${orderId} is ${order.status} and cannot be matched`);
    }

    const now = this.clock();
    const matched = await this.store.matchOrder({
      orderId,
      txId,
      at: now,
      orderFrom: [OrderStatus.PENDING, OrderStatus.EXPIRED],
      enforceExpiry: false,
      transactionState: 'unresolved',
      reason: OutcomeReason.MANUAL_MATCH,
      resolvedBy: actor,
    });
    if (!matched) {
      throw ApiError.invalidTransition(
        `Transaction ${txId} or order ${orderId} changed while matching; reload and retry`
      );
    }
    orderTransitionsTotal.inc({ status: OrderStatus.MATCHED });

    await this.audit(actor, AuditAction.FORCE_MATCH, 'transaction', txId, reason, {
      orderId,
      previousOrderStatus: order.status,
      previousOutcome: tx.outcome,
      previousReason: tx.outcomeReason,
      amount: tx.amount,
      expectedAmount: order.expectedAmount,
    });
    log.warn({ txId, orderId, actor }, 'Transaction force-matched');

    let campaign: CampaignRecord | null = null;
    try {
      campaign = await this.campaigns.provisionAndConfirm(matched);
    } catch (error) {
      log.error(
        { orderId, error: error instanceof Error ? error.message : String(error) },
        'Provisioning after force-match failed; left for the sweeper'
      );
    }
    return { order: matched, campaign };
  }

  /**
   * Close out an unmatched transfer as refunded or dismissed
   */
  async resolveTransaction(
    txId: string,
    resolution: ManualResolution,
    actor: string,
    note: string
  ): Promise<ObservedTransactionRecord> {
    await this.requireUnresolved(txId);

    const now = this.clock();
    const resolved = await this.store.transactions.resolve(txId, { resolution, actor, at: now });
    if (!resolved) {
      throw ApiError.alreadyResolved();
    }

    await this.audit(actor, AuditAction.RESOLVE_TRANSACTION, 'transaction', txId, note, {
      resolution,
      outcome: resolved.outcome,
      reason: resolved.outcomeReason,
    });
    log.info({ txId, resolution, actor }, 'Transaction resolved');
    return resolved;
  }

  /**
   * Provision (or re-confirm) a matched order's campaign
   */
  async retryProvisioning(orderId: string, actor: string): Promise<CampaignRecord> {
    const order = await this.store.orders.findById(orderId);
    if (!order) {
      throw ApiError.notFound('Order');
    }

    const campaign = await this.campaigns.provisionAndConfirm(order);
    await this.audit(
      actor,
      AuditAction.RETRY_PROVISIONING,
      'order',
      orderId,
      'Provisioning retried by operator',
      { campaignId: campaign.campaignId }
    );
    log.info({ orderId, campaignId: campaign.campaignId, actor }, 'Provisioning retried');
    return campaign;
  }

  async listTransactions(query: TransactionQuery): Promise<Page<ObservedTransactionRecord>> {
    return this.store.transactions.list(query);
  }

  async listAudit(options: PageOptions): Promise<Page<AuditEntryRecord>> {
    return this.store.audit.list(options);
  }

  private async requireUnresolved(txId: string): Promise<ObservedTransactionRecord> {
    const tx = await this.store.transactions.findById(txId);
    if (!tx) {
      throw ApiError.notFound('Transaction');
    }
    if (!tx.processed) {
      throw ApiError.invalidTransition(`Transaction ${txId} has not been reconciled yet`);
    }
    if (tx.outcome === TransactionOutcome.MATCHED || tx.resolution !== null) {
      throw ApiError.alreadyResolved(`Transaction ${txId} is already ${tx.resolution ?? tx.outcome}`);
    }
    return tx;
  }

  private async audit(
    actor: string,
    action: AuditAction,
    targetType: AuditEntryRecord['targetType'],
    targetId: string,
    reason: string,
    metadata: Record<string, unknown>
  ): Promise<AuditEntryRecord> {
    return this.store.audit.append({
      auditId: generateAuditId(),
      actor,
      action,
      targetType,
      targetId,
      reason,
      metadata,
      createdAt: this.clock(),
    });
  }
}
