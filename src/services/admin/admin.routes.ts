import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { requireRole } from '../../auth/auth.middleware';
import { validateRequest } from '../../middlewares/validateRequest';

import { AdminController } from './admin.controller';
import {
  forceMatchValidation,
  listAuditValidation,
  listTransactionsValidation,
  resolveTransactionValidation,
  retryProvisioningValidation,
} from './admin.validation';

export const createAdminRoutes = (controller: AdminController, authenticate: RequestHandler): Router => {
  const router = Router();

  // All admin routes require the admin role
  router.use(authenticate, requireRole('admin'));

  // GET /admin/transactions - Observed transfers, filterable by outcome
  router.get(
    '/transactions',
    listTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.listTransactions(req, res, next)
  );

  // POST /admin/transactions/:txId/match - Force-match a transfer to an order
  router.post(
    '/transactions/:txId/match',
    forceMatchValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.forceMatch(req, res, next)
  );

  // POST /admin/transactions/:txId/resolve - Mark a transfer refunded or dismissed
  router.post(
    '/transactions/:txId/resolve',
    resolveTransactionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.resolveTransaction(req, res, next)
  );

  // POST /admin/orders/:id/provision - Retry campaign provisioning
  router.post(
    '/orders/:id/provision',
    retryProvisioningValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.retryProvisioning(req, res, next)
  );

  // GET /admin/audit - Audit trail
  router.get(
    '/audit',
    listAuditValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listAudit(req, res, next)
  );

  return router;
};
