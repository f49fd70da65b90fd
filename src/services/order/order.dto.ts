import { OrderRecord } from '../../types/ledger';
import { formatAmount } from '../../utils/amount';
import { PricingResult } from '../pricing/pricing.service';

/**
 * Wire shapes. Amounts go out both as display strings and as integer
 * micro-units.
 */

export const toQuoteDTO = (pricing: PricingResult, currency: string) => ({
  durationDays: pricing.durationDays,
  channelCount: pricing.channelCount,
  postsPerDay: pricing.postsPerDay,
  totalPosts: pricing.totalPosts,
  discountPercent: pricing.discountPercent,
  baseCost: formatAmount(pricing.baseCost),
  finalCost: formatAmount(pricing.finalCost),
  finalCostMicros: pricing.finalCost,
  currency,
  scheduleTimes: pricing.scheduleTimes,
});

export const toOrderDTO = (order: OrderRecord, currency: string) => ({
  orderId: order.orderId,
  referenceCode: order.referenceCode,
  status: order.status,
  receivingAddress: order.receivingAddress,
  claimedPayerAddress: order.claimedPayerAddress,
  expectedAmount: formatAmount(order.expectedAmount),
  expectedAmountMicros: order.expectedAmount,
  currency,
  durationDays: order.durationDays,
  channelIds: order.channelIds,
  postsPerDay: order.postsPerDay,
  discountPercent: order.discountPercent,
  scheduleTimes: order.scheduleTimes,
  createdAt: order.createdAt,
  expiresAt: order.expiresAt,
  matchedTxId: order.matchedTxId,
  matchedAt: order.matchedAt,
  closedAt: order.closedAt,
  campaignId: order.campaignId,
});

export type OrderDTO = ReturnType<typeof toOrderDTO>;
export type QuoteDTO = ReturnType<typeof toQuoteDTO>;
