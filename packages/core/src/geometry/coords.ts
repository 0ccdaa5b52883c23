/**
 * Cube-face coordinate systems
 *
 * A point on the sphere is projected onto one of six cube faces:
 * - (x,y,z): direction in 3-space, any non-zero length
 * - (face,u,v): gnomonic face coordinates in [-1,1]
 * - (face,s,t): face coordinates in [0,1] after the (u,v)->(s,t) projection
 * - (face,i,j): leaf-cell coordinates in [0, 2^30)
 * - (face,si,ti): discrete (s,t) in [0, 2^31], odd values are leaf centres
 *
 * Functions here do not depend on which (s,t)<->(u,v) projection is active;
 * those live in projection.ts.
 */

import { largestAbsComponent3, type Vec3 } from '../num/vec3.js';

/** Number of leaf cells along a face edge */
export const LIMIT_IJ = 2 ** 30;

/** Largest si/ti value */
export const MAX_SI_TI = 2 ** 31;

export type FaceIndex = 0 | 1 | 2 | 3 | 4 | 5;

/**
 * (face,u,v) to an (x,y,z) direction; the result is not unit length
 */
export function faceUVToXYZ(face: number, u: number, v: number): Vec3 {
  switch (face) {
    case 0:
      return [1, u, v];
    case 1:
      return [-u, 1, v];
    case 2:
      return [-u, -v, 1];
    case 3:
      return [-1, -v, -u];
    case 4:
      return [v, -1, -u];
    default:
      return [v, u, -1];
  }
}

/**
 * Face whose axis is closest to p
 */
export function getFace(p: Vec3): FaceIndex {
  const axis = largestAbsComponent3(p);
  if (p[axis] < 0) {
    return axis === 0 ? 3 : axis === 1 ? 4 : 5;
  }
  return axis;
}

/**
 * (u,v) of p on `face`. p must lie in the face's hemisphere.
 */
export function validFaceXYZToUV(face: number, p: Vec3): [number, number] {
  const [x, y, z] = p;
  switch (face) {
    case 0:
      return [y / x, z / x];
    case 1:
      return [-x / y, z / y];
    case 2:
      return [-x / z, -y / z];
    case 3:
      return [z / x, y / x];
    case 4:
      return [z / y, -x / y];
    default:
      return [-y / z, -x / z];
  }
}

/**
 * (u,v) of p on `face`, or null when p is on the far side of that face's
 * axis. The result may fall outside [-1,1] when p belongs to another face.
 */
export function faceXYZToUV(face: number, p: Vec3): [number, number] | null {
  if (face < 3) {
    if (p[face] <= 0) return null;
  } else if (p[face - 3] >= 0) {
    return null;
  }
  return validFaceXYZToUV(face, p);
}

/**
 * Project p onto its own face
 */
export function xyzToFaceUV(p: Vec3): { face: FaceIndex; u: number; v: number } {
  const face = getFace(p);
  const [u, v] = validFaceXYZToUV(face, p);
  return { face, u, v };
}

/**
 * Leaf-cell coordinate containing s, clamped to [0, LIMIT_IJ - 1]
 */
export function stToIJ(s: number): number {
  return Math.max(0, Math.min(LIMIT_IJ - 1, Math.round(LIMIT_IJ * s - 0.5)));
}

/**
 * Minimum s of leaf coordinate i. Also valid for i = LIMIT_IJ.
 */
export function ijToSTMin(i: number): number {
  return i / LIMIT_IJ;
}

export function siTiToST(si: number): number {
  return si / MAX_SI_TI;
}

/**
 * Edge length of a level's cells in leaf units
 */
export function sizeIJ(level: number): number {
  return 2 ** (30 - level);
}
