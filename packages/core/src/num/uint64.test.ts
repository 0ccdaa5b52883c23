import { describe, it, expect } from 'vitest';
import {
  U64_MAX,
  u64,
  lowestSetBit,
  countTrailingZeros64,
  mostSignificantBit64,
  toHex16,
  maxU64,
} from './uint64.js';

describe('uint64', () => {
  it('should wrap modulo 2^64', () => {
    expect(U64_MAX).toBe(0xffffffffffffffffn);
    expect(u64(-1n)).toBe(U64_MAX);
    expect(u64(1n << 64n)).toBe(0n);
    expect(u64(U64_MAX + 6n)).toBe(5n);
  });

  it('should isolate the lowest set bit', () => {
    expect(lowestSetBit(0b1100n)).toBe(4n);
    expect(lowestSetBit(1n << 63n)).toBe(1n << 63n);
    expect(lowestSetBit(0n)).toBe(0n);
  });

  it('should count trailing zeros in both halves', () => {
    expect(countTrailingZeros64(1n)).toBe(0);
    expect(countTrailingZeros64(1n << 31n)).toBe(31);
    expect(countTrailingZeros64(1n << 40n)).toBe(40);
    expect(countTrailingZeros64(0x1000000000000000n)).toBe(60);
    expect(countTrailingZeros64(1n << 63n)).toBe(63);
  });

  it('should find the most significant bit in both halves', () => {
    expect(mostSignificantBit64(1n)).toBe(0);
    expect(mostSignificantBit64(0xffffffffn)).toBe(31);
    expect(mostSignificantBit64(1n << 32n)).toBe(32);
    expect(mostSignificantBit64(U64_MAX)).toBe(63);
  });

  it('should format 16 hex digits', () => {
    expect(toHex16(255n)).toBe('00000000000000ff');
    expect(toHex16(U64_MAX)).toBe('ffffffffffffffff');
  });

  it('should pick the larger value', () => {
    expect(maxU64(3n, 5n)).toBe(5n);
    expect(maxU64(U64_MAX, 0n)).toBe(U64_MAX);
  });
});
