/**
 * Integer-only arithmetic for money, ratios and basis-point interest.
 * Every division truncates toward zero; nothing rounds to nearest.
 */

export const BPS_SCALE = 10_000n;
// 12 months × 10_000 bps: turns an annual bps rate into a per-month fraction.
const MONTHLY_BPS_DIVISOR = 120_000n;

/**
 * `numerator * scale / denominator`, truncated.
 * A zero denominator yields `scale` itself: the maximal ratio, treated as the
 * worst case rather than a fault (income 0 → DTI 100.00%).
 */
export function ratioBasisPoints(numerator: bigint, denominator: bigint, scale: bigint): bigint {
  if (denominator === 0n) return scale;
  return (numerator * scale) / denominator;
}

/**
 * Straight-line payment estimate: simple interest over the whole term, spread
 * evenly. Not declining-balance amortization.
 */
export function amortizedMonthlyPayment(principal: bigint, annualRateBps: number, months: number): bigint {
  if (!Number.isSafeInteger(months) || months <= 0) throw new RangeError(`months must be a positive integer, got ${months}`);
  const totalInterest = (principal * BigInt(annualRateBps) * BigInt(months)) / MONTHLY_BPS_DIVISOR;
  return (principal + totalInterest) / BigInt(months);
}

/** Truncating division on safe integers. */
export function idiv(a: number, b: number): number {
  if (b === 0) throw new RangeError('division by zero');
  return Math.trunc(a / b);
}

export function percentOf(amount: bigint, percent: bigint): bigint {
  return (amount * percent) / 100n;
}

/** max(0, a - b) */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}
