/**
 * 3D vector operations
 *
 * Points on the sphere are Vec3 directions; they need not be unit length
 * unless a function says so.
 */

export type Vec3 = [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Squared length of vector
 */
export function lengthSq3(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2];
}

/**
 * Length of vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(lengthSq3(v));
}

/**
 * Normalize vector to unit length
 * Returns zero vector if input is zero
 */
export function normalize3(v: Vec3): Vec3 {
  const len = length3(v);
  if (len === 0) {
    return [0, 0, 0];
  }
  return [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Index (0, 1, 2) of the component with the largest absolute value.
 * Ties go to the later axis.
 */
export function largestAbsComponent3(v: Vec3): 0 | 1 | 2 {
  const ax = Math.abs(v[0]);
  const ay = Math.abs(v[1]);
  const az = Math.abs(v[2]);
  if (ax > ay) {
    return ax > az ? 0 : 2;
  }
  return ay > az ? 1 : 2;
}

/**
 * True when every component is finite
 */
export function isFinite3(v: Vec3): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2]);
}
