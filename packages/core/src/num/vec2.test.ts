import { describe, it, expect } from 'vitest';
import { vec2 } from './vec2.js';

describe('vec2', () => {
  it('should create vectors', () => {
    const v = vec2(3, 4);
    expect(v[0]).toBe(3);
    expect(v[1]).toBe(4);
  });
});
