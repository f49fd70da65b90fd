import { PRICING_CONFIG } from '../../../src/config/environments';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { PricingService, slotOffsetMinutes } from '../../../src/services/pricing';
import { ErrorCode } from '../../../src/types/errors';

describe('PricingService', () => {
  const pricing = new PricingService(PRICING_CONFIG);

  const captureError = (fn: () => unknown): ApiError => {
    try {
      fn();
    } catch (error) {
      if (error instanceof ApiError) return error;
    }
    throw new Error('Expected an ApiError');
  };

  describe('computePricing', () => {
    it('should price a 7-day, 2-channel campaign', () => {
      expect(pricing.computePricing(7, 2)).toEqual({
        durationDays: 7,
        channelCount: 2,
        postsPerDay: 3,
        totalPosts: 42,
        discountBasisPoints: 560,
        discountPercent: 5.6,
        baseCost: 12_180_000,
        finalCost: 11_497_920,
        scheduleTimes: ['00:00', '08:00', '16:00'],
      });
    });

    it('should not go below the minimum order amount', () => {
      const result = pricing.computePricing(1, 1);

      expect(result.baseCost).toBe(290000);
      expect(result.finalCost).toBe(290000);
    });

    it('should cap frequency and discount for a full year', () => {
      const result = pricing.computePricing(365, 1);

      expect(result.postsPerDay).toBe(12);
      expect(result.discountBasisPoints).toBe(2500);
      expect(result.baseCost).toBe(1_270_200_000);
      expect(result.finalCost).toBe(952_650_000);
    });

    it('should reject durations outside 1..365 days', () => {
      for (const days of [0, 366, 1.5, -3]) {
        const error = captureError(() => pricing.computePricing(days, 1));
        expect(error.errorCode).toBe(ErrorCode.INVALID_DURATION);
        expect(error.statusCode).toBe(400);
      }
    });

    it('should reject fewer than one channel', () => {
      const error = captureError(() => pricing.computePricing(7, 0));

      expect(error.errorCode).toBe(ErrorCode.INVALID_CHANNELS);
    });
  });

  describe('postsPerDay', () => {
    it('should add a daily slot every 2.5 days', () => {
      expect(pricing.postsPerDay(1)).toBe(1);
      expect(pricing.postsPerDay(2)).toBe(1);
      expect(pricing.postsPerDay(3)).toBe(2);
      expect(pricing.postsPerDay(5)).toBe(3);
      expect(pricing.postsPerDay(27)).toBe(11);
      expect(pricing.postsPerDay(28)).toBe(12);
      expect(pricing.postsPerDay(90)).toBe(12);
    });
  });

  describe('discountBasisPoints', () => {
    it('should grow by 80 basis points per day up to 2500', () => {
      expect(pricing.discountBasisPoints(1)).toBe(80);
      expect(pricing.discountBasisPoints(31)).toBe(2480);
      expect(pricing.discountBasisPoints(32)).toBe(2500);
    });
  });

  describe('computeScheduleTimes', () => {
    it('should spread marks evenly from midnight', () => {
      expect(pricing.computeScheduleTimes(1)).toEqual(['00:00']);
      expect(pricing.computeScheduleTimes(7)).toEqual([
        '00:00',
        '03:25',
        '06:51',
        '10:17',
        '13:42',
        '17:08',
        '20:34',
      ]);
    });

    it('should produce two-hour slots at the maximum frequency', () => {
      const times = pricing.computeScheduleTimes(12);

      expect(times).toHaveLength(12);
      expect(times[1]).toBe('02:00');
      expect(times[11]).toBe('22:00');
    });

    it('should reject a non-positive frequency', () => {
      expect(() => pricing.computeScheduleTimes(0)).toThrow(ApiError);
    });
  });

  describe('slotOffsetMinutes', () => {
    it('should convert HH:MM to minutes after midnight', () => {
      expect(slotOffsetMinutes('00:00')).toBe(0);
      expect(slotOffsetMinutes('03:25')).toBe(205);
      expect(slotOffsetMinutes('16:00')).toBe(960);
    });
  });

  it('should expose the configured currency', () => {
    expect(pricing.currency).toBe('TON');
  });
});
