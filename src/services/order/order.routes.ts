import { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import { requireRole } from '../../auth/auth.middleware';
import { orderLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';
import { quoteValidation } from '../pricing/pricing.validation';

import { OrderController } from './order.controller';
import { createOrderValidation, listOrdersValidation, orderIdValidation } from './order.validation';

export const createOrderRoutes = (controller: OrderController, authenticate: RequestHandler): Router => {
  const router = Router();

  // GET /orders/quote - Public price quote
  router.get(
    '/quote',
    quoteValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.quote(req, res, next)
  );

  // Everything below requires an authenticated buyer
  router.use(authenticate, requireRole('user'));

  // POST /orders - Create a pending order
  router.post(
    '/',
    orderLimiter,
    createOrderValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.createOrder(req, res, next)
  );

  // GET /orders - List the caller's orders
  router.get(
    '/',
    listOrdersValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listOrders(req, res, next)
  );

  // GET /orders/:id - Order details
  router.get(
    '/:id',
    orderIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getOrder(req, res, next)
  );

  // POST /orders/:id/cancel - Cancel a pending order
  router.post(
    '/:id/cancel',
    orderIdValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.cancelOrder(req, res, next)
  );

  return router;
};
