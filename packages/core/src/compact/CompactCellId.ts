/**
 * Compact cell identifier
 *
 * Names the same cells as CellId down to level 28, stored as face, level
 * and quadtree path (see layout.ts). Face, level, path and short parent or
 * child hops are read from the compact layout. Anything defined by curve
 * position (ordering, ranges, stepping, neighbors, geometry) goes through
 * the primary id, and a result that is invalid or deeper than level 28
 * comes back as none().
 */

import type * as encoding from 'lib0/encoding';
import type * as decoding from 'lib0/decoding';
import { CellId, type EdgeNeighbors } from '../cell/CellId.js';
import type { FaceIJOrientation } from '../cell/faceIJ.js';
import { writeIdBits } from '../codec/binary.js';
import { INVALID_CELL_STRING, formatCanonical, parseCanonical } from '../codec/text.js';
import { assertContract, codecFailure, codecSuccess, type CodecResult } from '../errors.js';
import type { LatLng } from '../geometry/latlng.js';
import type { Rect2 } from '../geometry/rect.js';
import { createLogger } from '../logger.js';
import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import { u64 } from '../num/uint64.js';
import { applyDeepCellPolicy, compactFromPrimary, compactToPrimary } from './convert.js';
import { COMPACT_MAX_LEVEL, COMPACT_SENTINEL, isValidRaw, packRaw, rawFace, rawLevel, rawPath } from './layout.js';

const log = createLogger('CompactCellId');

/** Parent hops longer than this go through the primary id */
const MAX_DIRECT_HOPS = 5;

function isCompactLevel(level: number): boolean {
  return Number.isInteger(level) && level >= 0 && level <= COMPACT_MAX_LEVEL;
}

export class CompactCellId {
  /** Raw 64-bit compact value */
  readonly raw: bigint;

  constructor(raw: bigint) {
    this.raw = u64(raw);
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  static none(): CompactCellId {
    return NONE;
  }

  static sentinel(): CompactCellId {
    return SENTINEL;
  }

  /** Exact conversion; none() for invalid cells or cells below level 28 */
  static fromCellId(cell: CellId): CompactCellId {
    const raw = compactFromPrimary(cell);
    return raw === 0n ? NONE : new CompactCellId(raw);
  }

  /** Conversion of external input, after the deep-cell policy */
  private static fromExternal(cell: CellId): CompactCellId {
    return CompactCellId.fromCellId(applyDeepCellPolicy(cell));
  }

  static fromFace(face: number): CompactCellId {
    return CompactCellId.fromFaceLevel(face, 0);
  }

  /**
   * First cell at `level` on `face`; none() when either is out of range
   */
  static fromFaceLevel(face: number, level: number): CompactCellId {
    if (!Number.isInteger(face) || face < 0 || face > 5 || !isCompactLevel(level)) return NONE;
    if (level === 0) return new CompactCellId(packRaw(face, 0n, 0));
    return CompactCellId.fromCellId(CellId.fromFacePosLevel(face, 0n, level));
  }

  static fromFacePosLevel(face: number, pos: bigint, level: number): CompactCellId {
    if (level > COMPACT_MAX_LEVEL) return NONE;
    return CompactCellId.fromCellId(CellId.fromFacePosLevel(face, pos, level));
  }

  static fromFaceIJ(face: number, i: number, j: number): CompactCellId {
    return CompactCellId.fromExternal(CellId.fromFaceIJ(face, i, j));
  }

  static fromPoint(p: Vec3): CompactCellId {
    return CompactCellId.fromExternal(CellId.fromPoint(p));
  }

  static fromLatLng(ll: LatLng): CompactCellId {
    return CompactCellId.fromExternal(CellId.fromLatLng(ll));
  }

  static fromToken(token: string): CompactCellId {
    const cell = CellId.fromToken(token);
    if (!cell.isValid()) return NONE;
    return CompactCellId.fromExternal(cell);
  }

  static fromDebugString(text: string): CompactCellId {
    const cell = CellId.fromDebugString(text);
    if (!cell.isValid()) return NONE;
    return CompactCellId.fromExternal(cell);
  }

  /** Parse the canonical "f" / "f/digits" form, at most 28 digits */
  static fromString(text: string): CompactCellId {
    const parsed = parseCanonical(text, COMPACT_MAX_LEVEL);
    if (!parsed.ok) {
      log.debug(parsed.error.message, { text });
      return NONE;
    }
    let path = 0n;
    for (const digit of parsed.value.digits) {
      path = (path << 2n) | BigInt(digit);
    }
    return new CompactCellId(packRaw(parsed.value.face, path, parsed.value.digits.length));
  }

  static begin(level: number): CompactCellId {
    if (!isCompactLevel(level)) return NONE;
    return CompactCellId.fromCellId(CellId.begin(level));
  }

  /**
   * End of iteration at `level`. The primary end is not a cell, so this is
   * none(), which is also what next() returns after the last cell.
   */
  static end(level: number): CompactCellId {
    if (!isCompactLevel(level)) return NONE;
    return CompactCellId.fromCellId(CellId.end(level));
  }

  static lsbForLevel(level: number): bigint {
    return CellId.lsbForLevel(level);
  }

  static getSizeIJ(level: number): number {
    return CellId.getSizeIJ(level);
  }

  static getSizeST(level: number): number {
    return CellId.getSizeST(level);
  }

  static ijLevelToBoundUV(ij: Vec2, level: number): Rect2 {
    return CellId.ijLevelToBoundUV(ij, level);
  }

  static expandedByDistanceUV(uv: Rect2, distance: number): Rect2 {
    return CellId.expandedByDistanceUV(uv, distance);
  }

  /** Comparator for Array.prototype.sort; curve order */
  static compare(a: CompactCellId, b: CompactCellId): number {
    return CellId.compare(a.toCellId(), b.toCellId());
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  /** Primary id of the same cell */
  get id(): bigint {
    return this.toCellId().id;
  }

  toCellId(): CellId {
    return compactToPrimary(this.raw);
  }

  face(): number {
    return rawFace(this.raw);
  }

  level(): number {
    return rawLevel(this.raw);
  }

  /** Child positions from the face down, right-aligned */
  path(): bigint {
    return rawPath(this.raw);
  }

  isValid(): boolean {
    return isValidRaw(this.raw);
  }

  isLeaf(): boolean {
    return this.level() === COMPACT_MAX_LEVEL;
  }

  isFace(): boolean {
    return this.level() === 0;
  }

  pos(): bigint {
    return this.toCellId().pos();
  }

  lsb(): bigint {
    return this.toCellId().lsb();
  }

  /**
   * Position (0-3) within the parent, or of the ancestor at `level`;
   * -1 for invalid cells, face cells or levels outside [1, level()]
   */
  childPosition(level?: number): number {
    if (!this.isValid()) return -1;
    const current = this.level();
    const target = level ?? current;
    if (!Number.isInteger(target) || target <= 0 || target > current) return -1;
    return Number((this.path() >> BigInt(2 * (current - target))) & 3n);
  }

  getSizeIJ(): number {
    return CellId.getSizeIJ(this.level());
  }

  getSizeST(): number {
    return CellId.getSizeST(this.level());
  }

  // ==========================================================================
  // Hierarchy
  // ==========================================================================

  /**
   * Parent, or ancestor at `level`. none() for invalid cells, a face cell's
   * parent and levels outside [0,28]; the cell itself when level >= level().
   */
  parent(level?: number): CompactCellId {
    if (!this.isValid()) return NONE;
    const current = this.level();
    if (level === undefined) {
      if (current === 0) return NONE;
      return new CompactCellId(packRaw(this.face(), this.path() >> 2n, current - 1));
    }
    if (!isCompactLevel(level)) return NONE;
    if (level >= current) return this;
    if (current - level > MAX_DIRECT_HOPS) {
      return CompactCellId.fromCellId(this.toCellId().parent(level));
    }
    let cell: CompactCellId = this;
    while (cell.level() > level) {
      cell = cell.parent();
    }
    return cell;
  }

  /** none() for invalid cells, positions outside [0,3] and level-28 cells */
  child(position: number): CompactCellId {
    if (!this.isValid()) return NONE;
    if (!Number.isInteger(position) || position < 0 || position > 3) return NONE;
    const current = this.level();
    if (current >= COMPACT_MAX_LEVEL) return NONE;
    return new CompactCellId(packRaw(this.face(), (this.path() << 2n) | BigInt(position), current + 1));
  }

  childBegin(level?: number): CompactCellId {
    if (!this.isValid()) return NONE;
    if (level === undefined) return this.child(0);
    if (!isCompactLevel(level) || level < this.level()) return NONE;
    return CompactCellId.fromCellId(this.toCellId().childBegin(level));
  }

  /** none() where the primary end lies past the last face */
  childEnd(level?: number): CompactCellId {
    if (!this.isValid()) return NONE;
    if (level === undefined) {
      if (this.isLeaf()) return NONE;
      return CompactCellId.fromCellId(this.toCellId().childEnd());
    }
    if (!isCompactLevel(level) || level < this.level()) return NONE;
    return CompactCellId.fromCellId(this.toCellId().childEnd(level));
  }

  /** Smallest level-28 cell in this cell */
  rangeMin(): CompactCellId {
    return this.delegate((cell) => cell.rangeMin().parent(COMPACT_MAX_LEVEL));
  }

  /** Largest level-28 cell in this cell */
  rangeMax(): CompactCellId {
    return this.delegate((cell) => cell.rangeMax().parent(COMPACT_MAX_LEVEL));
  }

  contains(other: CompactCellId): boolean {
    return this.toCellId().contains(other.toCellId());
  }

  intersects(other: CompactCellId): boolean {
    return this.toCellId().intersects(other.toCellId());
  }

  getCommonAncestorLevel(other: CompactCellId): number {
    return this.toCellId().getCommonAncestorLevel(other.toCellId());
  }

  /** none() when the tile would be deeper than level 28 */
  maximumTile(limit: CompactCellId): CompactCellId {
    return this.delegate((cell) => cell.maximumTile(limit.toCellId()));
  }

  // ==========================================================================
  // Curve traversal
  // ==========================================================================

  next(): CompactCellId {
    return this.delegate((cell) => cell.next());
  }

  prev(): CompactCellId {
    return this.delegate((cell) => cell.prev());
  }

  nextWrap(): CompactCellId {
    return this.delegate((cell) => cell.nextWrap());
  }

  prevWrap(): CompactCellId {
    return this.delegate((cell) => cell.prevWrap());
  }

  advance(steps: number | bigint): CompactCellId {
    return this.delegate((cell) => cell.advance(steps));
  }

  advanceWrap(steps: number | bigint): CompactCellId {
    return this.delegate((cell) => cell.advanceWrap(steps));
  }

  distanceFromBegin(): bigint {
    assertContract(this.isValid(), 'CompactCellId.distanceFromBegin', 'requires a valid cell', () => ({
      raw: this.raw,
    }));
    return this.toCellId().distanceFromBegin();
  }

  private delegate(op: (cell: CellId) => CellId): CompactCellId {
    if (!this.isValid()) return NONE;
    return CompactCellId.fromCellId(op(this.toCellId()));
  }

  // ==========================================================================
  // Neighbors
  // ==========================================================================

  getEdgeNeighbors(): EdgeNeighbors<CompactCellId> {
    const [down, right, up, left] = this.toCellId().getEdgeNeighbors();
    return [
      CompactCellId.fromCellId(down),
      CompactCellId.fromCellId(right),
      CompactCellId.fromCellId(up),
      CompactCellId.fromCellId(left),
    ];
  }

  /** Appends nothing for levels outside [0,28] */
  appendVertexNeighbors(level: number, output: CompactCellId[]): void {
    if (!isCompactLevel(level)) return;
    const neighbors: CellId[] = [];
    this.toCellId().appendVertexNeighbors(level, neighbors);
    appendConverted(neighbors, output);
  }

  /** Appends nothing for levels outside [0,28] */
  appendAllNeighbors(level: number, output: CompactCellId[]): void {
    if (!isCompactLevel(level)) return;
    const neighbors: CellId[] = [];
    this.toCellId().appendAllNeighbors(level, neighbors);
    appendConverted(neighbors, output);
  }

  // ==========================================================================
  // Geometry
  // ==========================================================================

  toPoint(): Vec3 {
    return this.toCellId().toPoint();
  }

  toPointRaw(): Vec3 {
    return this.toCellId().toPointRaw();
  }

  toLatLng(): LatLng {
    return this.toCellId().toLatLng();
  }

  getCenterST(): Vec2 {
    return this.toCellId().getCenterST();
  }

  getCenterUV(): Vec2 {
    return this.toCellId().getCenterUV();
  }

  getBoundST(): Rect2 {
    return this.toCellId().getBoundST();
  }

  getBoundUV(): Rect2 {
    return this.toCellId().getBoundUV();
  }

  getCenterSiTi(): { face: number; si: number; ti: number } {
    return this.toCellId().getCenterSiTi();
  }

  toFaceIJOrientation(): FaceIJOrientation {
    return this.toCellId().toFaceIJOrientation();
  }

  // ==========================================================================
  // Ordering
  // ==========================================================================

  /** Same raw value */
  equals(other: CompactCellId): boolean {
    return this.raw === other.raw;
  }

  compareTo(other: CompactCellId): number {
    return CompactCellId.compare(this, other);
  }

  lessThan(other: CompactCellId): boolean {
    return this.compareTo(other) < 0;
  }

  lessOrEqual(other: CompactCellId): boolean {
    return this.compareTo(other) <= 0;
  }

  greaterThan(other: CompactCellId): boolean {
    return this.compareTo(other) > 0;
  }

  greaterOrEqual(other: CompactCellId): boolean {
    return this.compareTo(other) >= 0;
  }

  // ==========================================================================
  // Text and binary
  // ==========================================================================

  /** Canonical form: "0", "3/2", "INVALID" */
  toString(): string {
    if (!this.isValid()) return INVALID_CELL_STRING;
    const level = this.level();
    const path = this.path();
    const digits: number[] = [];
    for (let l = level - 1; l >= 0; l--) {
      digits.push(Number((path >> BigInt(2 * l)) & 3n));
    }
    return formatCanonical({ face: this.face(), digits });
  }

  /** Token of the primary id */
  toToken(): string {
    return this.toCellId().toToken();
  }

  /** Debug form of the primary id */
  toDebugString(): string {
    return this.toCellId().toDebugString();
  }

  /** Writes the primary id, so both kinds share one wire format */
  encode(encoder: encoding.Encoder): void {
    writeIdBits(encoder, this.toCellId().id);
  }

  /** Read a primary id written by encode(); see compactFromDecoded() */
  static decode(decoder: decoding.Decoder): CodecResult<CompactCellId> {
    const decoded = CellId.decode(decoder);
    if (!decoded.ok) return decoded;
    return compactFromDecoded(decoded.value);
  }
}

/**
 * Compact form of a decoded primary id under the deep-cell policy. A valid
 * id rejected by the policy fails with "outOfRange"; an invalid id gives
 * none().
 */
export function compactFromDecoded(cell: CellId): CodecResult<CompactCellId> {
  if (!cell.isValid()) return codecSuccess(NONE);
  const kept = applyDeepCellPolicy(cell);
  if (!kept.isValid()) {
    return codecFailure('outOfRange', `Cell ${cell.toToken()} is deeper than level ${COMPACT_MAX_LEVEL}`);
  }
  return codecSuccess(CompactCellId.fromCellId(kept));
}

function appendConverted(neighbors: CellId[], output: CompactCellId[]): void {
  for (const neighbor of neighbors) {
    if (neighbor.isValid() && neighbor.level() <= COMPACT_MAX_LEVEL) {
      output.push(CompactCellId.fromCellId(neighbor));
    }
  }
}

const NONE = new CompactCellId(0n);
const SENTINEL = new CompactCellId(COMPACT_SENTINEL);
