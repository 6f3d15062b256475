import { amortizedMonthlyPayment, idiv, percentOf, ratioBasisPoints, saturatingSub } from '../fixedPoint.js';

describe('fixed point math', () => {
  test('ratio scales and truncates', () => {
    expect(ratioBasisPoints(20_000n, 100_000n, 10_000n)).toBe(2_000n);
    expect(ratioBasisPoints(1n, 3n, 100n)).toBe(33n);
  });

  test('zero denominator is the maximal ratio', () => {
    for (const x of [0n, 1n, 123n, 10_000_000n]) {
      expect(ratioBasisPoints(x, 0n, 10_000n)).toBe(10_000n);
      expect(ratioBasisPoints(x, 0n, 100n)).toBe(100n);
    }
  });

  test('straight-line monthly payment', () => {
    // 50000 * 300 * 60 / 120000 = 7500 interest; 57500 / 60 = 958.33
    expect(amortizedMonthlyPayment(50_000n, 300, 60)).toBe(958n);
    // 10000 * 1200 * 12 / 120000 = 1200 interest; 11200 / 12 = 933.33
    expect(amortizedMonthlyPayment(10_000n, 1200, 12)).toBe(933n);
    expect(amortizedMonthlyPayment(1_000n, 0, 12)).toBe(83n);
  });

  test('monthly payment on a principal past 2^53 stays exact', () => {
    const big = 2n ** 60n;
    const months = 12;
    const interest = (big * 2000n * 12n) / 120_000n;
    expect(amortizedMonthlyPayment(big, 2000, months)).toBe((big + interest) / 12n);
  });

  test('non-positive term is rejected', () => {
    expect(() => amortizedMonthlyPayment(1_000n, 300, 0)).toThrow(RangeError);
    expect(() => amortizedMonthlyPayment(1_000n, 300, -6)).toThrow(RangeError);
  });

  test('helpers truncate toward zero and saturate', () => {
    expect(idiv(7, 2)).toBe(3);
    expect(idiv(-7, 2)).toBe(-3);
    expect(() => idiv(1, 0)).toThrow(RangeError);
    expect(percentOf(100_000n, 40n)).toBe(40_000n);
    expect(percentOf(99n, 40n)).toBe(39n);
    expect(saturatingSub(10n, 3n)).toBe(7n);
    expect(saturatingSub(5n, 10n)).toBe(0n);
  });
});
