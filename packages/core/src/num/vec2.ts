/**
 * 2D vector operations
 *
 * Vectors are tuples [number, number], used for (s,t) and (u,v) face
 * coordinates.
 */

export type Vec2 = [number, number];

/**
 * Create a 2D vector
 */
export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}
