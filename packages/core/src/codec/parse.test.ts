import { describe, it, expect } from 'vitest';
import { CellId } from '../cell/CellId.js';
import { ROOT_MARKER } from '../compact/layout.js';
import { formatTokenFlag, parseCellString, parseCompactCellString, parseToken } from './parse.js';

describe('parsers', () => {
  const cell = CellId.fromFace(3).child(2).child(1);

  describe('parseToken', () => {
    it('should accept tokens of valid cells', () => {
      const result = parseToken('73');
      expect(result.ok && result.value.equals(cell)).toBe(true);
    });

    it('should explain what it rejected', () => {
      expect(parseToken('zz')).toEqual({
        ok: false,
        error: { code: 'malformed', message: "Expected valid cell token, got: 'zz'" },
      });
      expect(parseToken('X').ok).toBe(false);
      expect(parseToken('2').ok).toBe(false);
      expect(parseToken('f').ok).toBe(false);
    });

    it('should round-trip through formatTokenFlag', () => {
      expect(formatTokenFlag(CellId.fromFace(5))).toBe('b');
      const result = parseToken(formatTokenFlag(cell));
      expect(result.ok && result.value.equals(cell)).toBe(true);
    });
  });

  describe('parseCellString', () => {
    it('should parse the canonical form', () => {
      const result = parseCellString('3/21');
      expect(result.ok && result.value.equals(cell)).toBe(true);
    });

    it('should return the parse error', () => {
      expect(parseCellString('3/4')).toEqual({
        ok: false,
        error: { code: 'malformed', message: "Invalid child position '4' in '3/4'" },
      });
    });
  });

  describe('parseCompactCellString', () => {
    it('should parse up to level 28', () => {
      const face = parseCompactCellString('0');
      expect(face.ok && face.value.raw).toBe(ROOT_MARKER);
      const deep = parseCompactCellString(`2/${'1'.repeat(28)}`);
      expect(deep.ok && deep.value.level()).toBe(28);
    });

    it('should reject deeper paths', () => {
      const result = parseCompactCellString(`2/${'1'.repeat(29)}`);
      expect(!result.ok && result.error.code).toBe('outOfRange');
    });
  });
});
