/**
 * Closed intervals and axis-aligned rectangles in (s,t) or (u,v) space
 */

import type { Vec2 } from '../num/vec2.js';

export interface Interval {
  lo: number;
  hi: number;
}

export interface Rect2 {
  x: Interval;
  y: Interval;
}

export function interval(lo: number, hi: number): Interval {
  return { lo, hi };
}

export function rect2(x: Interval, y: Interval): Rect2 {
  return { x, y };
}

/**
 * Rectangle centred on `center` with full side lengths `size`
 */
export function rectFromCenterSize(center: Vec2, size: Vec2): Rect2 {
  return {
    x: { lo: center[0] - 0.5 * size[0], hi: center[0] + 0.5 * size[0] },
    y: { lo: center[1] - 0.5 * size[1], hi: center[1] + 0.5 * size[1] },
  };
}

export function rectCenter(rect: Rect2): Vec2 {
  return [0.5 * (rect.x.lo + rect.x.hi), 0.5 * (rect.y.lo + rect.y.hi)];
}

/** Closed containment test */
export function rectContains(rect: Rect2, p: Vec2): boolean {
  return p[0] >= rect.x.lo && p[0] <= rect.x.hi && p[1] >= rect.y.lo && p[1] <= rect.y.hi;
}
