/**
 * Hilbert curve lookup tables
 *
 * Each face is traversed by a Hilbert curve. Converting between (i,j) and a
 * curve position walks the curve 4 levels at a time using two tables built
 * once at module load. An entry is indexed by a 4-bit block of i, a 4-bit
 * block of j (or an 8-bit block of position) and the 2-bit orientation of
 * the curve entering the block, and holds the other coordinate plus the
 * orientation leaving the block.
 */

/** Levels handled per table lookup */
export const LOOKUP_BITS = 4;

/** Orientation bit: i and j are swapped */
export const SWAP_MASK = 0x01;

/** Orientation bit: i and j are inverted */
export const INVERT_MASK = 0x02;

/** (i,j) quadrant, as (i << 1) | j, at each curve position, per orientation */
export const POS_TO_IJ: readonly (readonly number[])[] = [
  [0, 1, 3, 2], // canonical order
  [0, 2, 3, 1], // axes swapped
  [3, 2, 0, 1], // bits inverted
  [3, 1, 0, 2], // swapped & inverted
];

/** Inverse of POS_TO_IJ */
export const IJ_TO_POS: readonly (readonly number[])[] = [
  [0, 1, 3, 2],
  [0, 3, 1, 2],
  [2, 3, 1, 0],
  [2, 1, 3, 0],
];

/** Orientation change applied when descending into each child position */
export const POS_TO_ORIENTATION: readonly number[] = [SWAP_MASK, 0, 0, INVERT_MASK | SWAP_MASK];

const TABLE_SIZE = 1 << (2 * LOOKUP_BITS + 2);

/** (i,j,orientation) -> (pos,orientation) */
export const LOOKUP_POS = new Uint16Array(TABLE_SIZE);

/** (pos,orientation) -> (i,j,orientation) */
export const LOOKUP_IJ = new Uint16Array(TABLE_SIZE);

function initLookupCell(
  level: number,
  i: number,
  j: number,
  origOrientation: number,
  pos: number,
  orientation: number
): void {
  if (level === LOOKUP_BITS) {
    const ij = (i << LOOKUP_BITS) + j;
    LOOKUP_POS[(ij << 2) + origOrientation] = (pos << 2) + orientation;
    LOOKUP_IJ[(pos << 2) + origOrientation] = (ij << 2) + orientation;
    return;
  }
  const r = POS_TO_IJ[orientation];
  for (let p = 0; p < 4; p++) {
    initLookupCell(
      level + 1,
      (i << 1) + (r[p] >> 1),
      (j << 1) + (r[p] & 1),
      origOrientation,
      (pos << 2) + p,
      orientation ^ POS_TO_ORIENTATION[p]
    );
  }
}

for (const orientation of [0, SWAP_MASK, INVERT_MASK, SWAP_MASK | INVERT_MASK]) {
  initLookupCell(0, 0, 0, orientation, 0, orientation);
}
