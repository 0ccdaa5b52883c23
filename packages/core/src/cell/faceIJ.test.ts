import { describe, it, expect } from 'vitest';
import { MAX_SIZE } from './constants.js';
import { faceIJSameToId, faceIJToId, faceIJWrapToId, idToFaceIJOrientation, levelOf } from './faceIJ.js';

describe('faceIJ', () => {
  it('should encode the first leaf of each face', () => {
    expect(faceIJToId(0, 0, 0)).toBe(1n);
    expect(faceIJToId(1, 0, 0)).toBe(0x2000000000000001n);
  });

  it('should recover (face, i, j) from a leaf id', () => {
    const cases: [number, number, number][] = [
      [0, 0, 0],
      [3, 12345, 987654321],
      [5, MAX_SIZE - 1, 0],
      [2, MAX_SIZE - 1, MAX_SIZE - 1],
    ];
    for (const [face, i, j] of cases) {
      const { face: f, i: ri, j: rj } = idToFaceIJOrientation(faceIJToId(face, i, j));
      expect([f, ri, rj]).toEqual([face, i, j]);
    }
  });

  it('should give a face cell a leaf next to its centre', () => {
    const { i, j } = idToFaceIJOrientation(1n << 60n);
    expect(Math.abs(i - MAX_SIZE / 2)).toBeLessThanOrEqual(1);
    expect(Math.abs(j - MAX_SIZE / 2)).toBeLessThanOrEqual(1);
  });

  it('should read the level from the trailing zeros', () => {
    expect(levelOf(1n)).toBe(30);
    expect(levelOf(1n << 60n)).toBe(0);
    expect(levelOf(0x7300000000000000n)).toBe(2);
  });

  it('should reproject coordinates just outside a face', () => {
    const id = faceIJWrapToId(0, -1, 0);
    expect(id >> 61n).toBe(4n);
    expect(id).toBe(faceIJToId(4, MAX_SIZE - 1, MAX_SIZE - 1));
  });

  it('should only reproject when asked', () => {
    expect(faceIJSameToId(2, 3, 4, true)).toBe(faceIJToId(2, 3, 4));
    expect(faceIJSameToId(0, -1, 0, false)).toBe(faceIJWrapToId(0, -1, 0));
  });
});
