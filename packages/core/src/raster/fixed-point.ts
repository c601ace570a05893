/**
 * 16.16 fixed-point helpers. Values are plain numbers holding integers,
 * exact while they stay within the safe integer range.
 */

export const FIXED_SHIFT = 16;
export const FIXED_ONE = 1 << FIXED_SHIFT;
const FRACTION_MASK = FIXED_ONE - 1;

export function toFixed(value: number): number {
  return value * FIXED_ONE;
}

/** `(num << 16) / den`, truncated toward zero. */
export function fixedDiv(num: number, den: number): number {
  return Number((BigInt(num) << BigInt(FIXED_SHIFT)) / BigInt(den));
}

/** `(fixed * value) >> 16`, an arithmetic (flooring) shift. */
export function fixedMulInt(fixed: number, value: number): number {
  return Number((BigInt(fixed) * BigInt(value)) >> BigInt(FIXED_SHIFT));
}

/** Smallest integer not below the fixed-point value. */
export function fixedCeil(fixed: number): number {
  // division by a power of two is exact
  return Math.floor((fixed + FRACTION_MASK) / FIXED_ONE);
}
