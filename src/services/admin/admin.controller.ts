import { Response, NextFunction } from 'express';

import { getAuthUser } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';
import { TransactionOutcome, TransactionResolution } from '../../types/events';
import { ObservedTransactionRecord } from '../../types/ledger';
import { formatAmount } from '../../utils/amount';
import { toEnumValue, toPageOptions } from '../../utils/query';
import { toCampaignDTO } from '../campaign/campaign.controller';

import { AdminService, ManualResolution } from './admin.service';

interface ForceMatchBody {
  orderId: string;
  reason: string;
}

interface ResolveBody {
  resolution: string;
  note: string;
}

const OUTCOMES = Object.values(TransactionOutcome);
const MANUAL_RESOLUTIONS: readonly ManualResolution[] = [
  TransactionResolution.REFUNDED,
  TransactionResolution.DISMISSED,
];

const toTransactionDTO = (tx: ObservedTransactionRecord) => ({
  txId: tx.txId,
  receivingAddress: tx.receivingAddress,
  fromAddress: tx.fromAddress,
  amount: formatAmount(tx.amount),
  amountMicros: tx.amount,
  memo: tx.memo,
  occurredAt: tx.occurredAt,
  observedAt: tx.observedAt,
  processed: tx.processed,
  outcome: tx.outcome,
  outcomeReason: tx.outcomeReason,
  orderId: tx.orderId,
  resolution: tx.resolution,
  resolvedBy: tx.resolvedBy,
  resolvedAt: tx.resolvedAt,
});

export class AdminController {
  constructor(private readonly admin: AdminService) {}

  /**
   * GET /admin/transactions
   */
  async listTransactions(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = toPageOptions(req.query);
      const result = await this.admin.listTransactions({
        ...page,
        outcome: toEnumValue(OUTCOMES, req.query.outcome),
        unresolvedOnly: req.query.unresolvedOnly === 'true',
      });

      res.status(200).json({
        success: true,
        data: {
          transactions: result.items.map(toTransactionDTO),
          pagination: { ...page, total: result.total },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/transactions/:txId/match
   */
  async forceMatch(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const input: ForceMatchBody = req.body;

      const { order, campaign } = await this.admin.forceMatch(
        req.params.txId,
        input.orderId,
        user.userId,
        input.reason
      );

      res.status(200).json({
        success: true,
        data: {
          orderId: order.orderId,
          status: order.status,
          matchedTxId: order.matchedTxId,
          campaign: campaign ? toCampaignDTO(campaign) : null,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/transactions/:txId/resolve
   */
  async resolveTransaction(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const input: ResolveBody = req.body;
      const resolution = toEnumValue(MANUAL_RESOLUTIONS, input.resolution);
      if (!resolution) {
        throw ApiError.validationError('Invalid resolution');
      }

      const tx = await this.admin.resolveTransaction(
        req.params.txId,
        resolution,
        user.userId,
        input.note
      );

      res.status(200).json({
        success: true,
        data: { transaction: toTransactionDTO(tx) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /admin/orders/:id/provision
   */
  async retryProvisioning(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const campaign = await this.admin.retryProvisioning(req.params.id, user.userId);

      res.status(200).json({
        success: true,
        data: { campaign: toCampaignDTO(campaign) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /admin/audit
   */
  async listAudit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const page = toPageOptions(req.query);
      const result = await this.admin.listAudit(page);

      res.status(200).json({
        success: true,
        data: {
          entries: result.items,
          pagination: { ...page, total: result.total },
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
