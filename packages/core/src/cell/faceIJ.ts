/**
 * Conversion between raw ids and (face, i, j) leaf coordinates
 */

import { faceUVToXYZ, stToIJ, xyzToFaceUV } from '../geometry/coords.js';
import { countTrailingZeros64 } from '../num/uint64.js';
import { MAX_LEVEL, MAX_SIZE, EVEN_LEVEL_MARKERS } from './constants.js';
import { INVERT_MASK, LOOKUP_BITS, LOOKUP_IJ, LOOKUP_POS, SWAP_MASK } from './hilbert.js';

export interface FaceIJOrientation {
  face: number;
  i: number;
  j: number;
  /** Hilbert curve orientation of the cell (SWAP_MASK | INVERT_MASK bits) */
  orientation: number;
}

const BLOCK_MASK = (1 << LOOKUP_BITS) - 1;
const BLOCKS = [7, 6, 5, 4, 3, 2, 1, 0] as const;
const POS_SHIFT = BLOCKS.map((k) => BigInt(k * 2 * LOOKUP_BITS));
const ID_SHIFT = BLOCKS.map((k) => BigInt(k * 2 * LOOKUP_BITS + 1));

/**
 * Leaf id at (face, i, j); i and j must be in [0, MAX_SIZE)
 */
export function faceIJToId(face: number, i: number, j: number): bigint {
  let n = BigInt(face) << 60n;
  let bits = face & SWAP_MASK;
  for (let b = 0; b < BLOCKS.length; b++) {
    const shift = BLOCKS[b] * LOOKUP_BITS;
    bits += (Math.floor(i / 2 ** shift) & BLOCK_MASK) << (LOOKUP_BITS + 2);
    bits += (Math.floor(j / 2 ** shift) & BLOCK_MASK) << 2;
    bits = LOOKUP_POS[bits];
    n |= BigInt(bits >> 2) << POS_SHIFT[b];
    bits &= SWAP_MASK | INVERT_MASK;
  }
  return n * 2n + 1n;
}

/**
 * Face, leaf coordinates and orientation of a cell.
 * (i,j) is a leaf within the cell next to its centre.
 */
export function idToFaceIJOrientation(id: bigint): FaceIJOrientation {
  let i = 0;
  let j = 0;
  const face = Number(id >> 61n);
  let bits = face & SWAP_MASK;
  for (let b = 0; b < BLOCKS.length; b++) {
    const k = BLOCKS[b];
    // The top block holds the 2 levels left over after seven full blocks
    const nbits = k === 7 ? MAX_LEVEL - 7 * LOOKUP_BITS : LOOKUP_BITS;
    const mask = BigInt((1 << (2 * nbits)) - 1);
    bits += Number((id >> ID_SHIFT[b]) & mask) << 2;
    bits = LOOKUP_IJ[bits];
    i += (bits >> (LOOKUP_BITS + 2)) * 2 ** (k * LOOKUP_BITS);
    j += ((bits >> 2) & BLOCK_MASK) * 2 ** (k * LOOKUP_BITS);
    bits &= SWAP_MASK | INVERT_MASK;
  }
  // The loop walked down to a leaf; undo the orientation change of the
  // levels below an even-level cell
  const lsb = id & -id;
  if ((lsb & EVEN_LEVEL_MARKERS) !== 0n) {
    bits ^= SWAP_MASK;
  }
  return { face, i, j, orientation: bits };
}

/**
 * Leaf id for (i,j) up to one leaf outside `face`, reprojected onto the
 * adjacent face. Coordinates further out are clamped to that band.
 */
export function faceIJWrapToId(face: number, i: number, j: number): bigint {
  const ic = Math.max(-1, Math.min(MAX_SIZE, i));
  const jc = Math.max(-1, Math.min(MAX_SIZE, j));

  // Go through (x,y,z) with the linear projection, keeping (u,v) barely
  // outside [-1,1] so the reprojection lands in the right leaf
  const scale = 1 / MAX_SIZE;
  const limit = 1 + Number.EPSILON;
  const u = Math.max(-limit, Math.min(limit, scale * (2 * (ic - MAX_SIZE / 2) + 1)));
  const v = Math.max(-limit, Math.min(limit, scale * (2 * (jc - MAX_SIZE / 2) + 1)));

  const p = faceUVToXYZ(face, u, v);
  const target = xyzToFaceUV(p);
  return faceIJToId(target.face, stToIJ(0.5 * (target.u + 1)), stToIJ(0.5 * (target.v + 1)));
}

export function faceIJSameToId(face: number, i: number, j: number, sameFace: boolean): bigint {
  return sameFace ? faceIJToId(face, i, j) : faceIJWrapToId(face, i, j);
}

/**
 * Level of a non-zero id
 */
export function levelOf(id: bigint): number {
  return MAX_LEVEL - (countTrailingZeros64(id) >> 1);
}
