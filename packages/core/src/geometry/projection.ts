/**
 * (s,t) <-> (u,v) projections and the point/cell boundary
 *
 * The projection decides how cell sizes vary across a face:
 * - linear: u = 2s - 1; cheapest, area ratio of about 5.2
 * - tan: u = tan(π/2·s - π/4); nearly uniform, uses trig
 * - quadratic: piecewise quadratic; nearly as uniform as tan, no trig
 *
 * The active projection is chosen by the `projection` config option. Cells
 * built with one projection map to different points under another, so a
 * process should pick one before creating cells from points.
 */

import { getCellConfig, type ProjectionKind } from '../config.js';
import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import {
  faceUVToXYZ,
  ijToSTMin,
  siTiToST,
  sizeIJ,
  stToIJ,
  xyzToFaceUV,
  type FaceIndex,
} from './coords.js';
import { interval, rect2, type Rect2 } from './rect.js';

// ============================================================================
// Types
// ============================================================================

/** Face and leaf coordinates of a point */
export interface FaceIJ {
  face: FaceIndex;
  i: number;
  j: number;
}

export interface CellProjection {
  readonly kind: ProjectionKind;
  stToUV(s: number): number;
  uvToST(u: number): number;
  /** Leaf containing p; p need not be unit length */
  pointToFaceIJ(p: Vec3): FaceIJ;
  /** Direction of (si,ti) on face; not unit length */
  faceSiTiToPoint(face: number, si: number, ti: number): Vec3;
  /** (u,v) bounds of the level-`level` cell containing leaf ij */
  ijLevelToBoundUV(ij: Vec2, level: number): Rect2;
}

// ============================================================================
// Projection functions
// ============================================================================

const LINEAR = {
  stToUV: (s: number): number => 2 * s - 1,
  uvToST: (u: number): number => 0.5 * (u + 1),
};

const TAN = {
  stToUV(s: number): number {
    const u = Math.tan((Math.PI / 2) * s - Math.PI / 4);
    // tan(π/4) is slightly below 1; nudge so the face edge maps to exactly 1
    return u + u * 2 ** -53;
  },
  uvToST(u: number): number {
    return (2 / Math.PI) * (Math.atan(u) + Math.PI / 4);
  },
};

const QUADRATIC = {
  stToUV(s: number): number {
    if (s >= 0.5) return (1 / 3) * (4 * s * s - 1);
    return (1 / 3) * (1 - 4 * (1 - s) * (1 - s));
  },
  uvToST(u: number): number {
    if (u >= 0) return 0.5 * Math.sqrt(1 + 3 * u);
    return 1 - 0.5 * Math.sqrt(1 - 3 * u);
  },
};

const FUNCTIONS: Record<ProjectionKind, { stToUV(s: number): number; uvToST(u: number): number }> = {
  linear: LINEAR,
  tan: TAN,
  quadratic: QUADRATIC,
};

/**
 * Build the projection for `kind`
 */
export function createCellProjection(kind: ProjectionKind): CellProjection {
  const { stToUV, uvToST } = FUNCTIONS[kind];
  return {
    kind,
    stToUV,
    uvToST,
    pointToFaceIJ(p) {
      const { face, u, v } = xyzToFaceUV(p);
      return { face, i: stToIJ(uvToST(u)), j: stToIJ(uvToST(v)) };
    },
    faceSiTiToPoint(face, si, ti) {
      return faceUVToXYZ(face, stToUV(siTiToST(si)), stToUV(siTiToST(ti)));
    },
    ijLevelToBoundUV(ij, level) {
      const cellSize = sizeIJ(level);
      const [x, y] = ij.map((c) => {
        const lo = c - (c % cellSize);
        return interval(stToUV(ijToSTMin(lo)), stToUV(ijToSTMin(lo + cellSize)));
      });
      return rect2(x, y);
    },
  };
}

const cache = new Map<ProjectionKind, CellProjection>();

/**
 * Projection selected by the current config
 */
export function getProjection(): CellProjection {
  const kind = getCellConfig().projection;
  let projection = cache.get(kind);
  if (!projection) {
    projection = createCellProjection(kind);
    cache.set(kind, projection);
  }
  return projection;
}

// ============================================================================
// Bound expansion
// ============================================================================

function expandEndpoint(u: number, maxV: number, sinDist: number): number {
  // Solve the spherical right triangle through the side's far corner
  const sinUShift = sinDist * Math.sqrt((1 + u * u + maxV * maxV) / (1 + u * u));
  const cosUShift = Math.sqrt(1 - sinUShift * sinUShift);
  // tan(atan(u) + asin(sinUShift))
  return (cosUShift * u + sinUShift) / (cosUShift - sinUShift * u);
}

/**
 * Expand each side of a (u,v) rectangle just enough to include every point
 * within `distance` radians of that side. A negative distance shrinks it.
 * The sides move by different amounts in (u,v) space.
 */
export function expandedByDistanceUV(uv: Rect2, distance: number): Rect2 {
  const u0 = uv.x.lo;
  const u1 = uv.x.hi;
  const v0 = uv.y.lo;
  const v1 = uv.y.hi;
  const maxU = Math.max(Math.abs(u0), Math.abs(u1));
  const maxV = Math.max(Math.abs(v0), Math.abs(v1));
  const sinDist = Math.sin(distance);
  return rect2(
    interval(expandEndpoint(u0, maxV, -sinDist), expandEndpoint(u1, maxV, sinDist)),
    interval(expandEndpoint(v0, maxU, -sinDist), expandEndpoint(v1, maxU, sinDist))
  );
}
