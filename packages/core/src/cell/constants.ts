/**
 * Primary cell id layout
 *
 * A cell id is an unsigned 64-bit integer:
 *
 *   fff ppppp...pppp 1 000...000
 *   \_/ \__________/ | \_______/
 *  face  2 bits per  |  2·(30 - level) zero bits
 *        level       marker bit (lsb)
 *
 * The position bits are the cell's place on the face's Hilbert curve, so
 * ordering ids as integers orders cells along the curve.
 */

export const FACE_BITS = 3;
export const NUM_FACES = 6;
export const MAX_LEVEL = 30;

/** Bits holding the curve position, marker bit included */
export const POS_BITS = 2 * MAX_LEVEL + 1;

/** Leaf cells along a face edge */
export const MAX_SIZE = 2 ** MAX_LEVEL;

/** One past the largest valid id; curve positions wrap modulo this */
export const WRAP_OFFSET = BigInt(NUM_FACES) << BigInt(POS_BITS);

/** Bits where a valid marker can sit (even bit-pair boundaries) */
export const MARKER_BITS = 0x1555555555555555n;

/** Marker bits of the even levels 0..28 */
export const EVEN_LEVEL_MARKERS = 0x1111111111111110n;

/**
 * Marker bit of cells at `level`
 */
export function lsbForLevel(level: number): bigint {
  return 1n << BigInt(2 * (MAX_LEVEL - level));
}
