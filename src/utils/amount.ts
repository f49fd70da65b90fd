/**
 * Fixed-point money helpers.
 *
 * Every amount in the system is an integer number of micro-units
 * (1 unit = 1_000_000 micro-units). Ledger sources that report in
 * nano-units are truncated to micro-units on the way in.
 */

export const MICROS_PER_UNIT = 1_000_000;
const NANOS_PER_MICRO = 1000n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal amount ("0.29", "12", 11.5) into micro-units.
 * Digits beyond the sixth decimal are truncated.
 */
export function toMicros(value: string | number): number {
  const text = typeof value === 'number' ? value.toFixed(6) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Invalid amount: ${value}`);
  }

  const whole = parseInt(match[1], 10);
  const fraction = (match[2] || '').slice(0, 6).padEnd(6, '0');
  return whole * MICROS_PER_UNIT + parseInt(fraction, 10);
}

/**
 * Convert a nano-unit integer string (as reported by TON ledgers) to micro-units
 */
export function nanosToMicros(nanos: string): number {
  if (!/^\d+$/.test(nanos)) {
    throw new Error(`Invalid nano amount: ${nanos}`);
  }
  return Number(BigInt(nanos) / NANOS_PER_MICRO);
}

/**
 * Render micro-units as a decimal string with at least two decimals
 * and no trailing zeros beyond that: 11497920 -> "11.49792", 290000 -> "0.29"
 */
export function formatAmount(micros: number): string {
  const whole = Math.floor(micros / MICROS_PER_UNIT);
  const fraction = (micros % MICROS_PER_UNIT)
    .toString()
    .padStart(6, '0')
    .replace(/0+$/, '')
    .padEnd(2, '0');
  return `${whole}.${fraction}`;
}

/**
 * Apply a basis-point reduction, rounding to the nearest micro-unit
 */
export function applyDiscount(micros: number, discountBasisPoints: number): number {
  return Math.round((micros * (10000 - discountBasisPoints)) / 10000);
}

/**
 * Whether `received` covers `expected` once `toleranceBasisPoints` of
 * shortfall is allowed. Compared in bigint; the products outgrow 2^53.
 */
export function meetsTolerance(
  received: number,
  expected: number,
  toleranceBasisPoints: number
): boolean {
  return (
    BigInt(received) * 10000n >= BigInt(expected) * BigInt(10000 - toleranceBasisPoints)
  );
}
