/**
 * Cell tokens
 *
 * A token is the id in lowercase hex with trailing zero digits removed, so
 * "89c25" stands for 0x89c2500000000000. Shorter tokens name larger cells
 * and tokens sort in the same order as the ids they encode. The zero id
 * (None) is written "X".
 */

import { countTrailingZeros64, toHex16 } from '../num/uint64.js';

export const NONE_TOKEN = 'X';

const MAX_TOKEN_LENGTH = 16;
const HEX_DIGIT = /^[0-9a-fA-F]*$/;

export function idToToken(id: bigint): string {
  if (id === 0n) return NONE_TOKEN;
  const zeroDigits = countTrailingZeros64(id) >> 2;
  return toHex16(id).slice(0, MAX_TOKEN_LENGTH - zeroDigits);
}

/**
 * Id named by a token, or 0n when the text is not 0-16 hex digits.
 * The id is not checked for validity.
 */
export function tokenToId(token: string): bigint {
  if (token.length > MAX_TOKEN_LENGTH || !HEX_DIGIT.test(token)) return 0n;
  if (token.length === 0) return 0n;
  return BigInt(`0x${token}`) << BigInt(4 * (MAX_TOKEN_LENGTH - token.length));
}
