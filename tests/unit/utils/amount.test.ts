import {
  applyDiscount,
  formatAmount,
  meetsTolerance,
  nanosToMicros,
  toMicros,
} from '../../../src/utils/amount';

describe('Amount helpers', () => {
  describe('toMicros', () => {
    it('should parse decimal strings', () => {
      expect(toMicros('0.29')).toBe(290000);
      expect(toMicros('12')).toBe(12_000_000);
      expect(toMicros(' 11.49792 ')).toBe(11_497_920);
    });

    it('should truncate digits beyond the sixth decimal', () => {
      expect(toMicros('1.2345678')).toBe(1_234_567);
    });

    it('should accept numbers', () => {
      expect(toMicros(11.5)).toBe(11_500_000);
    });

    it('should reject negative and malformed input', () => {
      expect(() => toMicros('-1')).toThrow('Invalid amount: -1');
      expect(() => toMicros('abc')).toThrow('Invalid amount: abc');
    });
  });

  describe('nanosToMicros', () => {
    it('should truncate nano-units to micro-units', () => {
      expect(nanosToMicros('11497920000')).toBe(11_497_920);
      expect(nanosToMicros('1500000999')).toBe(1_500_000);
      expect(nanosToMicros('999')).toBe(0);
    });

    it('should reject non-integer strings', () => {
      expect(() => nanosToMicros('1.5')).toThrow('Invalid nano amount: 1.5');
    });
  });

  describe('formatAmount', () => {
    it('should keep at least two decimals and drop trailing zeros', () => {
      expect(formatAmount(11_497_920)).toBe('11.49792');
      expect(formatAmount(290000)).toBe('0.29');
      expect(formatAmount(1_000_000)).toBe('1.00');
      expect(formatAmount(952_650_000)).toBe('952.65');
      expect(formatAmount(1)).toBe('0.000001');
    });
  });

  describe('applyDiscount', () => {
    it('should apply basis points and round to the nearest micro-unit', () => {
      expect(applyDiscount(12_180_000, 560)).toBe(11_497_920);
      expect(applyDiscount(290000, 80)).toBe(287680);
      expect(applyDiscount(5, 1000)).toBe(5); // 4.5 rounds up
    });
  });

  describe('meetsTolerance', () => {
    it('should accept payments down to the tolerance boundary', () => {
      expect(meetsTolerance(290000, 290000, 200)).toBe(true);
      expect(meetsTolerance(284200, 290000, 200)).toBe(true);
      expect(meetsTolerance(300000, 290000, 200)).toBe(true);
    });

    it('should reject payments below the boundary', () => {
      expect(meetsTolerance(284199, 290000, 200)).toBe(false);
      expect(meetsTolerance(281300, 290000, 200)).toBe(false);
    });

    it('should keep the boundary exact for amounts near 2^53', () => {
      expect(meetsTolerance(4_900_000_000_000_016, 5_000_000_000_000_017, 200)).toBe(false);
      expect(meetsTolerance(4_900_000_000_000_017, 5_000_000_000_000_017, 200)).toBe(true);
    });
  });
});
