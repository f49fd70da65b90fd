import { Response, NextFunction } from 'express';

import { getAuthUser } from '../../auth/auth.middleware';
import { AuthRequest } from '../../auth/auth.types';
import { OrderStatus } from '../../types/events';
import { formatAmount } from '../../utils/amount';
import { toEnumValue, toInteger, toPageOptions } from '../../utils/query';
import { PricingService } from '../pricing/pricing.service';

import { toOrderDTO, toQuoteDTO } from './order.dto';
import { OrderService } from './order.service';

interface CreateOrderBody {
  durationDays: number;
  channelIds: string[];
  claimedPayerAddress?: string | null;
}

const ORDER_STATUSES = Object.values(OrderStatus);

export class OrderController {
  constructor(
    private readonly orders: OrderService,
    private readonly pricing: PricingService
  ) {}

  /**
   * Price a campaign without creating an order
   * GET /orders/quote
   */
  async quote(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const pricing = this.pricing.computePricing(
        toInteger(req.query.durationDays, NaN),
        toInteger(req.query.channelCount, NaN)
      );

      res.status(200).json({
        success: true,
        data: { quote: toQuoteDTO(pricing, this.pricing.currency) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Create a pending order and return its payment instructions
   * POST /orders
   */
  async createOrder(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const input: CreateOrderBody = req.body;

      const { order, pricing } = await this.orders.createOrder(user.userId, {
        durationDays: input.durationDays,
        channelIds: input.channelIds,
        claimedPayerAddress: input.claimedPayerAddress,
      });
      const currency = this.pricing.currency;

      res.status(201).json({
        success: true,
        data: {
          payment: {
            referenceCode: order.referenceCode,
            receivingAddress: order.receivingAddress,
            expectedAmount: formatAmount(order.expectedAmount),
            currency,
            expiresAt: order.expiresAt,
          },
          order: toOrderDTO(order, currency),
          quote: toQuoteDTO(pricing, currency),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List the caller's orders
   * GET /orders
   */
  async listOrders(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const page = toPageOptions(req.query);

      const result = await this.orders.listUserOrders(user.userId, {
        ...page,
        status: toEnumValue(ORDER_STATUSES, req.query.status),
      });

      res.status(200).json({
        success: true,
        data: {
          orders: result.items.map((order) => toOrderDTO(order, this.pricing.currency)),
          pagination: { ...page, total: result.total },
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /orders/:id
   */
  async getOrder(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const order = await this.orders.getOrderForUser(req.params.id, user);

      res.status(200).json({
        success: true,
        data: { order: toOrderDTO(order, this.pricing.currency) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /orders/:id/cancel
   */
  async cancelOrder(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthUser(req);
      const order = await this.orders.cancel(req.params.id, user);

      res.status(200).json({
        success: true,
        data: { order: toOrderDTO(order, this.pricing.currency) },
      });
    } catch (error) {
      next(error);
    }
  }
}
