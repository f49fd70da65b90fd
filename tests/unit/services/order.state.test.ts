/**
 * Order state machine
 *
 * Pure functions, no setup required.
 */

import { ApiError } from '../../../src/middlewares/errorHandler';
import {
  getAllowedTransitions,
  isTerminalState,
  isValidTransition,
  statusesAllowing,
  validateTransition,
} from '../../../src/services/order/order.state';
import { OrderStatus } from '../../../src/types/events';

describe('Order State Machine', () => {
  describe('isValidTransition', () => {
    describe('from PENDING state', () => {
      it('should allow transition to MATCHED', () => {
        expect(isValidTransition(OrderStatus.PENDING, OrderStatus.MATCHED)).toBe(true);
      });

      it('should allow transition to EXPIRED', () => {
        expect(isValidTransition(OrderStatus.PENDING, OrderStatus.EXPIRED)).toBe(true);
      });

      it('should allow transition to CANCELLED', () => {
        expect(isValidTransition(OrderStatus.PENDING, OrderStatus.CANCELLED)).toBe(true);
      });
    });

    describe('from terminal states', () => {
      it('should not allow MATCHED to move anywhere', () => {
        expect(isValidTransition(OrderStatus.MATCHED, OrderStatus.CANCELLED)).toBe(false);
        expect(isValidTransition(OrderStatus.MATCHED, OrderStatus.EXPIRED)).toBe(false);
      });

      it('should not allow EXPIRED back to PENDING', () => {
        expect(isValidTransition(OrderStatus.EXPIRED, OrderStatus.PENDING)).toBe(false);
      });

      it('should not allow CANCELLED to be matched', () => {
        expect(isValidTransition(OrderStatus.CANCELLED, OrderStatus.MATCHED)).toBe(false);
      });
    });
  });

  describe('validateTransition', () => {
    it('should pass for a valid transition', () => {
      expect(() => validateTransition(OrderStatus.PENDING, OrderStatus.MATCHED, 'ORD-1')).not.toThrow();
    });

    it('should throw a 409 for an invalid transition', () => {
      expect(() => validateTransition(OrderStatus.EXPIRED, OrderStatus.MATCHED, 'ORD-1')).toThrow(ApiError);
      try {
        validateTransition(OrderStatus.EXPIRED, OrderStatus.MATCHED, 'ORD-1');
      } catch (error) {
        expect(error).toBeInstanceOf(ApiError);
        if (error instanceof ApiError) {
          expect(error.statusCode).toBe(409);
        }
      }
    });
  });

  describe('isTerminalState', () => {
    it('should treat everything but PENDING as terminal', () => {
      expect(isTerminalState(OrderStatus.PENDING)).toBe(false);
      expect(isTerminalState(OrderStatus.MATCHED)).toBe(true);
      expect(isTerminalState(OrderStatus.EXPIRED)).toBe(true);
      expect(isTerminalState(OrderStatus.CANCELLED)).toBe(true);
    });
  });

  describe('getAllowedTransitions', () => {
    it('should list the exits from PENDING', () => {
      expect(getAllowedTransitions(OrderStatus.PENDING)).toEqual([
        OrderStatus.MATCHED,
        OrderStatus.EXPIRED,
        OrderStatus.CANCELLED,
      ]);
    });

    it('should be empty for terminal states', () => {
      expect(getAllowedTransitions(OrderStatus.CANCELLED)).toEqual([]);
    });
  });

  describe('statusesAllowing', () => {
    it('should only allow automatic transitions out of PENDING', () => {
      expect(statusesAllowing(OrderStatus.MATCHED)).toEqual([OrderStatus.PENDING]);
      expect(statusesAllowing(OrderStatus.EXPIRED)).toEqual([OrderStatus.PENDING]);
      expect(statusesAllowing(OrderStatus.PENDING)).toEqual([]);
    });
  });
});
