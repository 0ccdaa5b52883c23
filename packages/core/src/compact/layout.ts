/**
 * Compact cell id layout
 *
 *   fff pppp...pppp lllll
 *   \_/ \_________/ \___/
 *  face  path (56)  level (5)
 *
 * A level-l cell keeps its l child positions (2 bits each) in the low 2·l
 * bits of the path field, the face's child first. Level is at most 28.
 *
 * Face 0 at level 0 would encode as 0, which is the invalid id. That cell
 * is stored as ROOT_MARKER (top path bit set, everything else clear); this
 * value is part of the wire format.
 */

import { U64_MAX } from '../num/uint64.js';

export const COMPACT_MAX_LEVEL = 28;
export const LEVEL_BITS = 5;
export const PATH_BITS = 56;

/** Face 0, level 0 */
export const ROOT_MARKER = 1n << BigInt(LEVEL_BITS + PATH_BITS - 1);

/** Invalid value ordered after every valid compact id */
export const COMPACT_SENTINEL = U64_MAX;

const FACE_SHIFT = BigInt(LEVEL_BITS + PATH_BITS);
const LEVEL_MASK = (1n << BigInt(LEVEL_BITS)) - 1n;
const PATH_MASK = (1n << BigInt(PATH_BITS)) - 1n;

export function rawFace(raw: bigint): number {
  if (raw === ROOT_MARKER) return 0;
  return Number(raw >> FACE_SHIFT);
}

export function rawLevel(raw: bigint): number {
  if (raw === ROOT_MARKER) return 0;
  return Number(raw & LEVEL_MASK);
}

/** Whole path field, including any bits above the level's positions */
function rawPathField(raw: bigint): bigint {
  return (raw >> BigInt(LEVEL_BITS)) & PATH_MASK;
}

/**
 * Child positions of the cell, right-aligned; 0n at level 0
 */
export function rawPath(raw: bigint): bigint {
  const level = rawLevel(raw);
  if (level === 0) return 0n;
  const field = rawPathField(raw);
  if (level > COMPACT_MAX_LEVEL) return field;
  return field & ((1n << BigInt(2 * level)) - 1n);
}

/**
 * Pack face, path and level; face 0 level 0 becomes ROOT_MARKER
 */
export function packRaw(face: number, path: bigint, level: number): bigint {
  const raw = (BigInt(face) << FACE_SHIFT) | (path << BigInt(LEVEL_BITS)) | BigInt(level);
  return raw === 0n ? ROOT_MARKER : raw;
}

export function isValidRaw(raw: bigint): boolean {
  if (raw === ROOT_MARKER) return true;
  if (raw === 0n) return false;
  const face = Number(raw >> FACE_SHIFT);
  const level = Number(raw & LEVEL_MASK);
  if (face >= 6 || level > COMPACT_MAX_LEVEL) return false;
  // No path bits above the level's own positions
  return rawPathField(raw) >> BigInt(2 * level) === 0n;
}
