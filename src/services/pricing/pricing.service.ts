import { PRICING_CONFIG } from '../../config/environments';
import { ApiError } from '../../middlewares/errorHandler';
import { applyDiscount } from '../../utils/amount';

export type PricingConfig = typeof PRICING_CONFIG;

export interface PricingResult {
  durationDays: number;
  channelCount: number;
  postsPerDay: number;
  totalPosts: number;
  /** Basis points */
  discountBasisPoints: number;
  discountPercent: number;
  /** Micro-units */
  baseCost: number;
  /** Micro-units */
  finalCost: number;
  scheduleTimes: string[];
}

const MINUTES_PER_DAY = 24 * 60;

const formatClock = (minuteOfDay: number): string => {
  const hours = Math.floor(minuteOfDay / 60);
  const minutes = minuteOfDay % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
};

/**
 * Deterministic pricing and cadence for a campaign request.
 *
 * Longer campaigns post more often (one extra daily slot per 2.5 days) and
 * earn a per-day discount, both capped.
 */
export class PricingService {
  constructor(private readonly config: PricingConfig = PRICING_CONFIG) {}

  computePricing(durationDays: number, channelCount: number): PricingResult {
    this.assertDuration(durationDays);
    if (!Number.isInteger(channelCount) || channelCount < 1) {
      throw ApiError.invalidChannels('At least one channel is required');
    }

    const postsPerDay = this.postsPerDay(durationDays);
    const discountBasisPoints = this.discountBasisPoints(durationDays);
    const totalPosts = durationDays * postsPerDay * channelCount;
    const baseCost = totalPosts * this.config.baseRatePerPostPerDay;
    const finalCost = Math.max(
      this.config.minimumOrderAmount,
      applyDiscount(baseCost, discountBasisPoints)
    );

    return {
      durationDays,
      channelCount,
      postsPerDay,
      totalPosts,
      discountBasisPoints,
      discountPercent: discountBasisPoints / 100,
      baseCost,
      finalCost,
      scheduleTimes: this.computeScheduleTimes(postsPerDay),
    };
  }

  postsPerDay(durationDays: number): number {
    // floor(d / 2.5) without floating point
    const frequency = Math.floor((durationDays * 2) / 5) + 1;
    return Math.min(Math.max(frequency, 1), this.config.maxPostsPerDay);
  }

  discountBasisPoints(durationDays: number): number {
    return Math.min(
      this.config.maxDiscountBasisPoints,
      durationDays * this.config.discountPerDayBasisPoints
    );
  }

  /**
   * HH:MM marks spread evenly across the day starting at 00:00
   */
  computeScheduleTimes(postsPerDay: number): string[] {
    if (!Number.isInteger(postsPerDay) || postsPerDay < 1) {
      throw ApiError.validationError('postsPerDay must be a positive integer');
    }
    return Array.from({ length: postsPerDay }, (_, i) =>
      formatClock(Math.floor((i * MINUTES_PER_DAY) / postsPerDay))
    );
  }

  get currency(): string {
    return this.config.currency;
  }

  private assertDuration(durationDays: number): void {
    const { minDurationDays, maxDurationDays } = this.config;
    if (
      !Number.isInteger(durationDays) ||
      durationDays < minDurationDays ||
      durationDays > maxDurationDays
    ) {
      throw ApiError.invalidDuration(
        `Duration must be a whole number of days between ${minDurationDays} and ${maxDurationDays}`
      );
    }
  }
}

/**
 * Minutes after midnight for an HH:MM mark
 */
export const slotOffsetMinutes = (slot: string): number => {
  const [hours, minutes] = slot.split(':').map((part) => parseInt(part, 10));
  return hours * 60 + minutes;
};
