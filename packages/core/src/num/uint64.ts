/**
 * Unsigned 64-bit helpers
 *
 * Cell ids are unsigned 64-bit integers held as `bigint`. JavaScript bigints
 * are unbounded, so every result that may leave [0, 2^64) goes through `u64`
 * to get the wrap-around a machine word would give.
 */

/** 2^64 - 1 */
export const U64_MAX = (1n << 64n) - 1n;

/** Reduce a bigint modulo 2^64 */
export function u64(x: bigint): bigint {
  return BigInt.asUintN(64, x);
}

/**
 * Lowest set bit of x, or 0 when x is 0.
 * Bigint bitwise ops behave as infinite two's complement, so `x & -x` is exact.
 */
export function lowestSetBit(x: bigint): bigint {
  return x & -x;
}

function ctz32(v: number): number {
  return 31 - Math.clz32(v & -v);
}

/**
 * Number of trailing zero bits. Requires x !== 0.
 */
export function countTrailingZeros64(x: bigint): number {
  const lo = Number(x & 0xffffffffn);
  if (lo !== 0) {
    return ctz32(lo);
  }
  return 32 + ctz32(Number((x >> 32n) & 0xffffffffn));
}

/**
 * Index of the most significant set bit. Requires x !== 0.
 */
export function mostSignificantBit64(x: bigint): number {
  const hi = Number((x >> 32n) & 0xffffffffn);
  if (hi !== 0) {
    return 63 - Math.clz32(hi);
  }
  return 31 - Math.clz32(Number(x & 0xffffffffn));
}

/** Zero-padded 16 digit lowercase hex */
export function toHex16(x: bigint): string {
  return u64(x).toString(16).padStart(16, '0');
}

/** Larger of two bigints */
export function maxU64(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
