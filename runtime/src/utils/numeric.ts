/**
 * Numeric clamping and integer-ratio utilities.
 *
 * Amounts are bigint base units, so ratios use integer division and
 * floor toward zero for non-negative operands.
 *
 * @module
 */

/** Clamp an integer to [`min`, `max`]. Non-finite values resolve to `min`. */
export function clampInteger(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, Math.trunc(value)));
}

/**
 * `floor(numerator * 100 / denominator)` for non-negative counts.
 * A zero denominator yields 0.
 */
export function percentFloor(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return Math.floor((numerator * 100) / denominator);
}

/**
 * Apply a per-mille rate to an amount, rounding down.
 *
 * @example
 * ```typescript
 * applyPermille(1000n, 25); // 25n (2.5%)
 * applyPermille(66n, 25);   // 1n
 * ```
 */
export function applyPermille(amount: bigint, ratePermille: number): bigint {
  return (amount * BigInt(ratePermille)) / 1000n;
}

/** Sum a list of bigint amounts. */
export function sumBigInt(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) total += value;
  return total;
}
