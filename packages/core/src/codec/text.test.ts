import { describe, it, expect } from 'vitest';
import { formatCanonical, formatDebug, formatInvalidDebug, parseCanonical, parseDebug } from './text.js';

describe('cell text', () => {
  describe('formatting', () => {
    it('should omit the slash for face cells in canonical form', () => {
      expect(formatCanonical({ face: 4, digits: [] })).toBe('4');
      expect(formatCanonical({ face: 3, digits: [0, 2] })).toBe('3/02');
    });

    it('should always write the slash in debug form', () => {
      expect(formatDebug({ face: 4, digits: [] })).toBe('4/');
      expect(formatDebug({ face: 1, digits: [3, 3, 0] })).toBe('1/330');
    });

    it('should print invalid ids in hex', () => {
      expect(formatInvalidDebug(0xabn)).toBe('Invalid: 00000000000000ab');
    });
  });

  describe('parseCanonical', () => {
    it('should accept faces and paths', () => {
      expect(parseCanonical('4', 30)).toEqual({ ok: true, value: { face: 4, digits: [] } });
      expect(parseCanonical('4/', 30)).toEqual({ ok: true, value: { face: 4, digits: [] } });
      expect(parseCanonical('3/021', 30)).toEqual({ ok: true, value: { face: 3, digits: [0, 2, 1] } });
    });

    it('should reject bad faces', () => {
      expect(parseCanonical('', 30)).toEqual({
        ok: false,
        error: { code: 'malformed', message: "Expected a face number, got: ''" },
      });
      expect(parseCanonical('a/1', 30).ok).toBe(false);
      expect(parseCanonical('7/1', 30)).toEqual({
        ok: false,
        error: { code: 'outOfRange', message: "Face out of range [0,5]: '7/1'" },
      });
    });

    it('should reject bad digits', () => {
      expect(parseCanonical('2/014', 30)).toEqual({
        ok: false,
        error: { code: 'malformed', message: "Invalid child position '4' in '2/014'" },
      });
      expect(parseCanonical('2/0/1', 30).ok).toBe(false);
    });

    it('should reject paths deeper than the limit', () => {
      const text = `1/${'2'.repeat(29)}`;
      expect(parseCanonical(text, 30).ok).toBe(true);
      expect(parseCanonical(text, 28)).toEqual({
        ok: false,
        error: { code: 'outOfRange', message: `Cell path deeper than level 28: '${text}'` },
      });
    });
  });

  describe('parseDebug', () => {
    it('should require the slash', () => {
      expect(parseDebug('5/', 30)).toEqual({ ok: true, value: { face: 5, digits: [] } });
      expect(parseDebug('5/3', 30)).toEqual({ ok: true, value: { face: 5, digits: [3] } });
      expect(parseDebug('5', 30).ok).toBe(false);
      expect(parseDebug('53', 30).ok).toBe(false);
    });

    it('should reject out-of-range faces', () => {
      expect(parseDebug('6/1', 30)).toEqual({
        ok: false,
        error: { code: 'outOfRange', message: "Face out of range [0,5]: '6/1'" },
      });
    });
  });
});
