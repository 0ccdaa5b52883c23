/**
 * Primary cell identifier
 *
 * A CellId names one cell of the recursive subdivision of the six cube
 * faces: face cells at level 0, each split into four children down to leaf
 * cells at level 30. The id is a 64-bit integer (see constants.ts for the
 * layout) and ids compare in Hilbert curve order.
 *
 * CellId is an immutable value. Operations with a documented precondition
 * throw CellContractError when it is broken and `checks` is enabled; data
 * errors (bad tokens or strings) produce `CellId.none()`.
 */

import type * as encoding from 'lib0/encoding';
import type * as decoding from 'lib0/decoding';
import { readIdBits, writeIdBits } from '../codec/binary.js';
import {
  INVALID_CELL_STRING,
  formatCanonical,
  formatDebug,
  formatInvalidDebug,
  parseCanonical,
  parseDebug,
  type CellPath,
} from '../codec/text.js';
import { idToToken, tokenToId } from '../codec/token.js';
import { assertContract, type CodecResult } from '../errors.js';
import { ijToSTMin, siTiToST, sizeIJ } from '../geometry/coords.js';
import { latLngFromPoint, latLngToPoint, type LatLng } from '../geometry/latlng.js';
import { expandedByDistanceUV, getProjection } from '../geometry/projection.js';
import { rectFromCenterSize, type Rect2 } from '../geometry/rect.js';
import { createLogger } from '../logger.js';
import type { Vec2 } from '../num/vec2.js';
import { isFinite3, normalize3, type Vec3 } from '../num/vec3.js';
import { U64_MAX, lowestSetBit, maxU64, mostSignificantBit64, u64 } from '../num/uint64.js';
import {
  MARKER_BITS,
  MAX_LEVEL,
  MAX_SIZE,
  NUM_FACES,
  POS_BITS,
  WRAP_OFFSET,
  lsbForLevel,
} from './constants.js';
import {
  faceIJSameToId,
  faceIJToId,
  idToFaceIJOrientation,
  levelOf,
  type FaceIJOrientation,
} from './faceIJ.js';

const log = createLogger('CellId');

/** Edge neighbors in down, right, up, left order */
export type EdgeNeighbors<T> = [T, T, T, T];

function isFaceNumber(face: number): boolean {
  return Number.isInteger(face) && face >= 0 && face < NUM_FACES;
}

function isLevelNumber(level: number, max = MAX_LEVEL): boolean {
  return Number.isInteger(level) && level >= 0 && level <= max;
}

export class CellId {
  /** Raw 64-bit value */
  readonly id: bigint;

  constructor(id: bigint) {
    this.id = u64(id);
  }

  // ==========================================================================
  // Factories
  // ==========================================================================

  /** The invalid id 0 */
  static none(): CellId {
    return NONE;
  }

  /** Invalid id that orders after every valid id */
  static sentinel(): CellId {
    return SENTINEL;
  }

  static fromFace(face: number): CellId {
    assertContract(isFaceNumber(face), 'CellId.fromFace', 'face must be in [0,5]', () => ({ face }));
    return new CellId((BigInt(face) << BigInt(POS_BITS)) + lsbForLevel(0));
  }

  /**
   * Cell at `level` containing curve position `pos` of `face`
   */
  static fromFacePosLevel(face: number, pos: bigint, level: number): CellId {
    assertContract(isFaceNumber(face), 'CellId.fromFacePosLevel', 'face must be in [0,5]', () => ({ face }));
    assertContract(isLevelNumber(level), 'CellId.fromFacePosLevel', 'level must be in [0,30]', () => ({ level }));
    const cell = new CellId((BigInt(face) << BigInt(POS_BITS)) + (pos | 1n));
    return cell.parent(level);
  }

  /** Leaf cell at (i,j) of `face` */
  static fromFaceIJ(face: number, i: number, j: number): CellId {
    assertContract(isFaceNumber(face), 'CellId.fromFaceIJ', 'face must be in [0,5]', () => ({ face }));
    assertContract(
      Number.isInteger(i) && Number.isInteger(j) && i >= 0 && j >= 0 && i < MAX_SIZE && j < MAX_SIZE,
      'CellId.fromFaceIJ',
      'i and j must be in [0, 2^30)',
      () => ({ i, j })
    );
    return new CellId(faceIJToId(face, i, j));
  }

  /** Leaf cell containing the direction p (any non-zero length) */
  static fromPoint(p: Vec3): CellId {
    assertContract(
      isFinite3(p) && (p[0] !== 0 || p[1] !== 0 || p[2] !== 0),
      'CellId.fromPoint',
      'point must be finite and non-zero',
      () => ({ point: p })
    );
    const { face, i, j } = getProjection().pointToFaceIJ(p);
    return new CellId(faceIJToId(face, i, j));
  }

  static fromLatLng(ll: LatLng): CellId {
    return CellId.fromPoint(latLngToPoint(ll));
  }

  /** First cell at `level` in curve order */
  static begin(level: number): CellId {
    return CellId.fromFace(0).childBegin(level);
  }

  /** One past the last cell at `level`; not a valid cell */
  static end(level: number): CellId {
    return CellId.fromFace(5).childEnd(level);
  }

  /** Malformed tokens give none() */
  static fromToken(token: string): CellId {
    const id = tokenToId(token);
    if (id === 0n && token !== 'X') {
      log.debug('Rejected token', { token });
    }
    return id === 0n ? NONE : new CellId(id);
  }

  /** Parse the "f/digits" debug form; malformed text gives none() */
  static fromDebugString(text: string): CellId {
    return CellId.fromPath(parseDebug(text, MAX_LEVEL), text);
  }

  /** Parse the canonical "f" / "f/digits" form; malformed text gives none() */
  static fromString(text: string): CellId {
    return CellId.fromPath(parseCanonical(text, MAX_LEVEL), text);
  }

  private static fromPath(path: CodecResult<CellPath>, text: string): CellId {
    if (!path.ok) {
      log.debug(path.error.message, { text });
      return NONE;
    }
    let cell = CellId.fromFace(path.value.face);
    for (const digit of path.value.digits) {
      cell = cell.child(digit);
    }
    return cell;
  }

  static lsbForLevel(level: number): bigint {
    return lsbForLevel(level);
  }

  /** Edge length of a level's cells in leaf units */
  static getSizeIJ(level: number): number {
    return sizeIJ(level);
  }

  /** Edge length of a level's cells in (s,t) units */
  static getSizeST(level: number): number {
    return ijToSTMin(sizeIJ(level));
  }

  static ijLevelToBoundUV(ij: Vec2, level: number): Rect2 {
    return getProjection().ijLevelToBoundUV(ij, level);
  }

  static expandedByDistanceUV(uv: Rect2, distance: number): Rect2 {
    return expandedByDistanceUV(uv, distance);
  }

  /** Comparator for Array.prototype.sort; ascending id order */
  static compare(a: CellId, b: CellId): number {
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  face(): number {
    return Number(this.id >> BigInt(POS_BITS));
  }

  /** Curve position within the face, marker bit included */
  pos(): bigint {
    return this.id & (U64_MAX >> 3n);
  }

  level(): number {
    assertContract(this.id !== 0n, 'CellId.level', 'requires a non-zero id');
    return levelOf(this.id);
  }

  isValid(): boolean {
    return this.face() < NUM_FACES && (this.lsb() & MARKER_BITS) !== 0n;
  }

  isLeaf(): boolean {
    return (this.id & 1n) !== 0n;
  }

  isFace(): boolean {
    return (this.id & (lsbForLevel(0) - 1n)) === 0n;
  }

  /** Marker bit */
  lsb(): bigint {
    return lowestSetBit(this.id);
  }

  /**
   * Position (0-3) of this cell within its parent, or of its ancestor at
   * `level` within that ancestor's parent
   */
  childPosition(level?: number): number {
    const lvl = level ?? this.level();
    assertContract(this.isValid(), 'CellId.childPosition', 'requires a valid cell', () => ({ id: this.id }));
    assertContract(
      Number.isInteger(lvl) && lvl >= 1 && lvl <= this.level(),
      'CellId.childPosition',
      'level must be in [1, level()]',
      () => ({ level: lvl })
    );
    return Number((this.id >> BigInt(2 * (MAX_LEVEL - lvl) + 1)) & 3n);
  }

  getSizeIJ(): number {
    return sizeIJ(this.level());
  }

  getSizeST(): number {
    return CellId.getSizeST(this.level());
  }

  // ==========================================================================
  // Hierarchy
  // ==========================================================================

  parent(level?: number): CellId {
    assertContract(this.isValid(), 'CellId.parent', 'requires a valid cell', () => ({ id: this.id }));
    if (level === undefined) {
      assertContract(!this.isFace(), 'CellId.parent', 'face cells have no parent');
      const newLsb = this.lsb() << 2n;
      return new CellId((this.id & -newLsb) | newLsb);
    }
    assertContract(
      Number.isInteger(level) && level >= 0 && level <= this.level(),
      'CellId.parent',
      'level must be in [0, level()]',
      () => ({ level, current: this.level() })
    );
    const newLsb = lsbForLevel(level);
    return new CellId((this.id & -newLsb) | newLsb);
  }

  child(position: number): CellId {
    assertContract(this.isValid(), 'CellId.child', 'requires a valid cell', () => ({ id: this.id }));
    assertContract(!this.isLeaf(), 'CellId.child', 'leaf cells have no children');
    assertContract(
      Number.isInteger(position) && position >= 0 && position <= 3,
      'CellId.child',
      'position must be in [0,3]',
      () => ({ position })
    );
    const newLsb = this.lsb() >> 2n;
    return new CellId(this.id + BigInt(2 * position + 1 - 4) * newLsb);
  }

  /** First descendant at `level` (default: first child) */
  childBegin(level?: number): CellId {
    assertContract(this.isValid(), 'CellId.childBegin', 'requires a valid cell', () => ({ id: this.id }));
    const lsb = this.lsb();
    if (level === undefined) {
      assertContract(!this.isLeaf(), 'CellId.childBegin', 'leaf cells have no children');
      return new CellId(this.id - lsb + (lsb >> 2n));
    }
    assertContract(
      Number.isInteger(level) && level >= this.level() && level <= MAX_LEVEL,
      'CellId.childBegin',
      'level must be in [level(), 30]',
      () => ({ level })
    );
    return new CellId(this.id - lsb + lsbForLevel(level));
  }

  /**
   * One past the last descendant at `level` (default: last child).
   * The result is for comparison only and may not be a valid cell.
   */
  childEnd(level?: number): CellId {
    assertContract(this.isValid(), 'CellId.childEnd', 'requires a valid cell', () => ({ id: this.id }));
    const lsb = this.lsb();
    if (level === undefined) {
      assertContract(!this.isLeaf(), 'CellId.childEnd', 'leaf cells have no children');
      return new CellId(this.id + lsb + (lsb >> 2n));
    }
    assertContract(
      Number.isInteger(level) && level >= this.level() && level <= MAX_LEVEL,
      'CellId.childEnd',
      'level must be in [level(), 30]',
      () => ({ level })
    );
    return new CellId(this.id + lsb + lsbForLevel(level));
  }

  /** Smallest leaf id contained in this cell */
  rangeMin(): CellId {
    return new CellId(this.id - (this.lsb() - 1n));
  }

  /** Largest leaf id contained in this cell */
  rangeMax(): CellId {
    return new CellId(this.id + (this.lsb() - 1n));
  }

  contains(other: CellId): boolean {
    assertContract(this.isValid() && other.isValid(), 'CellId.contains', 'both cells must be valid', () => ({
      id: this.id,
      other: other.id,
    }));
    return other.id >= this.rangeMin().id && other.id <= this.rangeMax().id;
  }

  intersects(other: CellId): boolean {
    assertContract(this.isValid() && other.isValid(), 'CellId.intersects', 'both cells must be valid', () => ({
      id: this.id,
      other: other.id,
    }));
    return other.rangeMin().id <= this.rangeMax().id && other.rangeMax().id >= this.rangeMin().id;
  }

  /**
   * Deepest level at which this cell and `other` share an ancestor;
   * -1 when they are on different faces
   */
  getCommonAncestorLevel(other: CellId): number {
    const bits = maxU64(this.id ^ other.id, maxU64(this.lsb(), other.lsb()));
    assertContract(bits !== 0n, 'CellId.getCommonAncestorLevel', 'requires non-zero ids');
    return Math.max(60 - mostSignificantBit64(bits), -1) >> 1;
  }

  /**
   * Largest cell starting at this cell's rangeMin() that ends before
   * `limit.rangeMin()`. Returns `limit` when no such cell exists, so
   * iterating from a start until `limit` covers a range without gaps.
   */
  maximumTile(limit: CellId): CellId {
    let cell: CellId = this;
    const start = cell.rangeMin();
    if (start.id >= limit.rangeMin().id) return limit;

    if (cell.rangeMax().id >= limit.id) {
      // Too large: shrink. Reaches a leaf at the latest since start < limit.
      do {
        cell = cell.child(0);
      } while (cell.rangeMax().id >= limit.id);
      return cell;
    }
    while (!cell.isFace()) {
      const parent = cell.parent();
      if (parent.rangeMin().id !== start.id || parent.rangeMax().id >= limit.id) break;
      cell = parent;
    }
    return cell;
  }

  // ==========================================================================
  // Curve traversal
  // ==========================================================================

  /** Next cell at the same level; does not wrap past the last face */
  next(): CellId {
    return new CellId(this.id + (this.lsb() << 1n));
  }

  /** Previous cell at the same level; does not wrap before the first face */
  prev(): CellId {
    return new CellId(this.id - (this.lsb() << 1n));
  }

  /** Like next(), but the last cell is followed by the first */
  nextWrap(): CellId {
    const n = this.next();
    if (n.id < WRAP_OFFSET) return n;
    return new CellId(n.id - WRAP_OFFSET);
  }

  /** Like prev(), but the first cell is preceded by the last */
  prevWrap(): CellId {
    const p = this.prev();
    if (p.id < WRAP_OFFSET) return p;
    return new CellId(p.id + WRAP_OFFSET);
  }

  /**
   * Move `steps` cells along the curve at this level, stopping at
   * begin(level) or end(level)
   */
  advance(steps: number | bigint): CellId {
    let n = BigInt(steps);
    if (n === 0n) return this;
    const stepShift = BigInt(2 * (MAX_LEVEL - this.level()) + 1);
    if (n < 0n) {
      const minSteps = -(this.id >> stepShift);
      if (n < minSteps) n = minSteps;
    } else {
      const maxSteps = (WRAP_OFFSET + this.lsb() - this.id) >> stepShift;
      if (n > maxSteps) n = maxSteps;
    }
    return new CellId(this.id + (n << stepShift));
  }

  /**
   * Move `steps` cells along the curve at this level, wrapping around the
   * six faces. Never returns end(level).
   */
  advanceWrap(steps: number | bigint): CellId {
    let n = BigInt(steps);
    if (n === 0n) return this;
    const stepShift = BigInt(2 * (MAX_LEVEL - this.level()) + 1);
    const stepWrap = WRAP_OFFSET >> stepShift;
    if (n < 0n) {
      const minSteps = -(this.id >> stepShift);
      if (n < minSteps) {
        n %= stepWrap;
        if (n < minSteps) n += stepWrap;
      }
    } else {
      const maxSteps = (WRAP_OFFSET - this.id) >> stepShift;
      if (n > maxSteps) {
        n %= stepWrap;
        if (n > maxSteps) n -= stepWrap;
      }
    }
    return new CellId(this.id + (n << stepShift));
  }

  /** Number of steps from begin(level()) to this cell */
  distanceFromBegin(): bigint {
    const stepShift = BigInt(2 * (MAX_LEVEL - this.level()) + 1);
    return this.id >> stepShift;
  }

  // ==========================================================================
  // Neighbors
  // ==========================================================================

  /**
   * The four cells at this level sharing an edge with this one, in the
   * order down, right, up, left. They are pairwise distinct.
   */
  getEdgeNeighbors(): EdgeNeighbors<CellId> {
    assertContract(this.isValid(), 'CellId.getEdgeNeighbors', 'requires a valid cell', () => ({ id: this.id }));
    const level = this.level();
    const size = sizeIJ(level);
    const { face, i, j } = this.toFaceIJOrientation();
    const at = (ni: number, nj: number, sameFace: boolean): CellId =>
      new CellId(faceIJSameToId(face, ni, nj, sameFace)).parent(level);
    return [
      at(i, j - size, j - size >= 0),
      at(i + size, j, i + size < MAX_SIZE),
      at(i, j + size, j + size < MAX_SIZE),
      at(i - size, j, i - size >= 0),
    ];
  }

  /**
   * Append the cells at `level` sharing the vertex closest to this cell:
   * 4 cells, or 3 at the eight cube corners. The first is
   * parent(level). Requires level < level().
   */
  appendVertexNeighbors(level: number, output: CellId[]): void {
    assertContract(this.isValid(), 'CellId.appendVertexNeighbors', 'requires a valid cell', () => ({ id: this.id }));
    assertContract(
      Number.isInteger(level) && level >= 0 && level < this.level(),
      'CellId.appendVertexNeighbors',
      'level must be in [0, level())',
      () => ({ level, current: this.level() })
    );
    const { face, i, j } = this.toFaceIJOrientation();

    // Which quadrant of parent(level) holds this cell decides the direction
    // of the nearest vertex
    const halfSize = sizeIJ(level + 1);
    const size = halfSize * 2;
    let iOffset: number;
    let jOffset: number;
    let iSame: boolean;
    let jSame: boolean;
    if (i & halfSize) {
      iOffset = size;
      iSame = i + size < MAX_SIZE;
    } else {
      iOffset = -size;
      iSame = i - size >= 0;
    }
    if (j & halfSize) {
      jOffset = size;
      jSame = j + size < MAX_SIZE;
    } else {
      jOffset = -size;
      jSame = j - size >= 0;
    }

    output.push(this.parent(level));
    output.push(new CellId(faceIJSameToId(face, i + iOffset, j, iSame)).parent(level));
    output.push(new CellId(faceIJSameToId(face, i, j + jOffset, jSame)).parent(level));
    // At a cube corner both edge neighbors are off-face and there is no diagonal cell
    if (iSame || jSame) {
      output.push(new CellId(faceIJSameToId(face, i + iOffset, j + jOffset, iSame && jSame)).parent(level));
    }
  }

  /**
   * Append every cell at `level` whose boundary touches this cell's
   * boundary. Cells at cube corners may appear twice. Requires
   * level >= level().
   */
  appendAllNeighbors(level: number, output: CellId[]): void {
    assertContract(this.isValid(), 'CellId.appendAllNeighbors', 'requires a valid cell', () => ({ id: this.id }));
    assertContract(
      Number.isInteger(level) && level >= this.level() && level <= MAX_LEVEL,
      'CellId.appendAllNeighbors',
      'level must be in [level(), 30]',
      () => ({ level, current: this.level() })
    );
    const orientation = this.toFaceIJOrientation();
    const face = orientation.face;

    // Lower-left leaf of this cell
    const size = this.getSizeIJ();
    const i = orientation.i - (orientation.i % size);
    const j = orientation.j - (orientation.j % size);
    const nbrSize = sizeIJ(level);
    const at = (ni: number, nj: number, sameFace: boolean): CellId =>
      new CellId(faceIJSameToId(face, ni, nj, sameFace)).parent(level);

    // Bottom/top rows, left/right columns and the four diagonals in one pass
    for (let k = -nbrSize; ; k += nbrSize) {
      let sameFace: boolean;
      if (k < 0) {
        sameFace = j + k >= 0;
      } else if (k >= size) {
        sameFace = j + k < MAX_SIZE;
      } else {
        sameFace = true;
        output.push(at(i + k, j - nbrSize, j - size >= 0));
        output.push(at(i + k, j + size, j + size < MAX_SIZE));
      }
      output.push(at(i - nbrSize, j + k, sameFace && i - size >= 0));
      output.push(at(i + size, j + k, sameFace && i + size < MAX_SIZE));
      if (k >= size) break;
    }
  }

  // ==========================================================================
  // Geometry
  // ==========================================================================

  toFaceIJOrientation(): FaceIJOrientation {
    return idToFaceIJOrientation(this.id);
  }

  /**
   * Centre of the cell in (si,ti) units. Odd values are leaf centres; cells
   * above leaf level have centres on even values.
   */
  getCenterSiTi(): { face: number; si: number; ti: number } {
    const { face, i, j } = this.toFaceIJOrientation();
    // (i,j) is a leaf next to the centre; which side depends on bit 2 of the id
    const delta = this.isLeaf() ? 1 : ((i ^ Number((this.id >> 2n) & 1n)) & 1) !== 0 ? 2 : 0;
    return { face, si: 2 * i + delta, ti: 2 * j + delta };
  }

  /** Centre direction, not normalized */
  toPointRaw(): Vec3 {
    assertContract(this.isValid(), 'CellId.toPointRaw', 'requires a valid cell', () => ({ id: this.id }));
    const { face, si, ti } = this.getCenterSiTi();
    return getProjection().faceSiTiToPoint(face, si, ti);
  }

  /** Unit-length centre direction */
  toPoint(): Vec3 {
    return normalize3(this.toPointRaw());
  }

  toLatLng(): LatLng {
    return latLngFromPoint(this.toPointRaw());
  }

  getCenterST(): Vec2 {
    const { si, ti } = this.getCenterSiTi();
    return [siTiToST(si), siTiToST(ti)];
  }

  getCenterUV(): Vec2 {
    const { si, ti } = this.getCenterSiTi();
    const { stToUV } = getProjection();
    return [stToUV(siTiToST(si)), stToUV(siTiToST(ti))];
  }

  getBoundST(): Rect2 {
    const size = this.getSizeST();
    return rectFromCenterSize(this.getCenterST(), [size, size]);
  }

  getBoundUV(): Rect2 {
    const { i, j } = this.toFaceIJOrientation();
    return getProjection().ijLevelToBoundUV([i, j], this.level());
  }

  // ==========================================================================
  // Ordering
  // ==========================================================================

  equals(other: CellId): boolean {
    return this.id === other.id;
  }

  compareTo(other: CellId): number {
    return CellId.compare(this, other);
  }

  lessThan(other: CellId): boolean {
    return this.id < other.id;
  }

  lessOrEqual(other: CellId): boolean {
    return this.id <= other.id;
  }

  greaterThan(other: CellId): boolean {
    return this.id > other.id;
  }

  greaterOrEqual(other: CellId): boolean {
    return this.id >= other.id;
  }

  // ==========================================================================
  // Text and binary
  // ==========================================================================

  toToken(): string {
    return idToToken(this.id);
  }

  /** Face and child positions from the face down */
  toPath(): CellPath {
    const level = this.level();
    const digits: number[] = [];
    for (let l = 1; l <= level; l++) {
      digits.push(Number((this.id >> BigInt(2 * (MAX_LEVEL - l) + 1)) & 3n));
    }
    return { face: this.face(), digits };
  }

  /** Canonical form: "3", "3/2", "INVALID" */
  toString(): string {
    if (!this.isValid()) return INVALID_CELL_STRING;
    return formatCanonical(this.toPath());
  }

  /** Debug form: "3/", "3/2", "Invalid: 0000000000000000" */
  toDebugString(): string {
    if (!this.isValid()) return formatInvalidDebug(this.id);
    return formatDebug(this.toPath());
  }

  /** Write the raw id as 8 big-endian bytes */
  encode(encoder: encoding.Encoder): void {
    writeIdBits(encoder, this.id);
  }

  /**
   * Read 8 bytes written by encode(). Fails without consuming input when
   * fewer than 8 bytes remain.
   */
  static decode(decoder: decoding.Decoder): CodecResult<CellId> {
    const bits = readIdBits(decoder);
    if (!bits.ok) {
      log.debug(bits.error.message);
      return bits;
    }
    return { ok: true, value: new CellId(bits.value) };
  }
}

const NONE = new CellId(0n);
const SENTINEL = new CellId(U64_MAX);
