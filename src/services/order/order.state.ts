import { OrderStatus } from '../../types/events';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Order lifecycle
 *
 * PENDING ──► MATCHED     (payment reconciled)
 *    │
 *    ├──────► EXPIRED     (TTL lapsed)
 *    │
 *    └──────► CANCELLED   (buyer withdrew)
 *
 * Every state other than PENDING is terminal for automatic processing.
 * Operators may force-match an EXPIRED order through the admin API.
 */
const validTransitions: Record<OrderStatus, OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.MATCHED, OrderStatus.EXPIRED, OrderStatus.CANCELLED],
  [OrderStatus.MATCHED]: [],
  [OrderStatus.EXPIRED]: [],
  [OrderStatus.CANCELLED]: [],
};

export function isValidTransition(currentStatus: OrderStatus, newStatus: OrderStatus): boolean {
  return validTransitions[currentStatus].includes(newStatus);
}

/**
 * Throws ApiError if the transition is not allowed
 */
export function validateTransition(
  currentStatus: OrderStatus,
  newStatus: OrderStatus,
  orderId: string
): void {
  if (!isValidTransition(currentStatus, newStatus)) {
    throw ApiError.invalidTransition(
      `Invalid state transition from ${currentStatus} to ${newStatus} for order ${orderId}`
    );
  }
}

export function isTerminalState(status: OrderStatus): boolean {
  return validTransitions[status].length === 0;
}

export function getAllowedTransitions(status: OrderStatus): OrderStatus[] {
  return validTransitions[status];
}

/**
 * Statuses an order may be in for `target` to be reached. Used as the
 * guard of conditional store updates.
 */
export function statusesAllowing(target: OrderStatus): OrderStatus[] {
  return Object.values(OrderStatus).filter((status) => isValidTransition(status, target));
}
