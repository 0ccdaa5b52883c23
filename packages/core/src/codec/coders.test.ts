import { afterEach, describe, it, expect } from 'vitest';
import * as encoding from 'lib0/encoding';
import * as decoding from 'lib0/decoding';
import { CellId } from '../cell/CellId.js';
import { CompactCellId } from '../compact/CompactCellId.js';
import { configureCells, resetCellConfig } from '../config.js';
import {
  cellIdCoder,
  cellIdTokenCoder,
  compactCellIdCoder,
  compactCellIdTokenCoder,
  decodeCellIds,
  decodeCellList,
  decodeCompactCellId,
  encodeCellIds,
  encodeCellList,
  encodeCompactCellId,
  type CellCoder,
} from './coders.js';

function encodeWith<T>(coder: CellCoder<T>, value: T): Uint8Array {
  const encoder = encoding.createEncoder();
  coder.encode(encoder, value);
  return encoding.toUint8Array(encoder);
}

describe('coders', () => {
  afterEach(() => {
    resetCellConfig();
  });

  const cell = CellId.fromFace(3).child(2).child(1);

  it('should write primary and compact cells identically', () => {
    expect(encodeWith(cellIdCoder, cell)).toEqual(encodeWith(compactCellIdCoder, CompactCellId.fromCellId(cell)));

    const encoder = encoding.createEncoder();
    encodeCompactCellId(encoder, CompactCellId.fromCellId(cell));
    const back = cellIdCoder.decode(decoding.createDecoder(encoding.toUint8Array(encoder)));
    expect(back.ok && back.value.equals(cell)).toBe(true);
  });

  it('should read a primary id as a compact id', () => {
    const result = decodeCompactCellId(decoding.createDecoder(encodeWith(cellIdCoder, cell)));
    expect(result.ok && result.value.toString()).toBe('3/21');
  });

  describe('token coders', () => {
    it('should write the token as a var-string', () => {
      expect(Array.from(encodeWith(cellIdTokenCoder, CellId.fromFace(5)))).toEqual([1, 0x62]);
      expect(Array.from(encodeWith(cellIdTokenCoder, CellId.none()))).toEqual([1, 0x58]);
    });

    it('should read tokens back', () => {
      const result = cellIdTokenCoder.decode(decoding.createDecoder(encodeWith(cellIdTokenCoder, cell)));
      expect(result.ok && result.value.equals(cell)).toBe(true);

      const none = cellIdTokenCoder.decode(decoding.createDecoder(new Uint8Array([1, 0x58])));
      expect(none.ok && none.value.equals(CellId.none())).toBe(true);
    });

    it('should reject tokens of invalid cells', () => {
      const result = cellIdTokenCoder.decode(decoding.createDecoder(new Uint8Array([2, 0x7a, 0x7a])));
      expect(result).toEqual({
        ok: false,
        error: { code: 'malformed', message: "Expected valid cell token, got: 'zz'" },
      });
    });

    it('should report a short string', () => {
      const result = cellIdTokenCoder.decode(decoding.createDecoder(new Uint8Array([2, 0x37])));
      expect(!result.ok && result.error.code).toBe('truncated');
    });

    it('should apply the deep-cell policy to compact tokens', () => {
      const leaf = CellId.fromFaceIJ(3, 10, 20);
      const bytes = encodeWith(cellIdTokenCoder, leaf);

      const truncated = compactCellIdTokenCoder.decode(decoding.createDecoder(bytes));
      expect(truncated.ok && truncated.value.toCellId().equals(leaf.parent(28))).toBe(true);

      configureCells({ deepCellPolicy: 'reject' });
      const rejected = compactCellIdTokenCoder.decode(decoding.createDecoder(bytes));
      expect(!rejected.ok && rejected.error.code).toBe('outOfRange');
    });

    it('should write compact cells by their primary token', () => {
      expect(Array.from(encodeWith(compactCellIdTokenCoder, CompactCellId.fromFace(0)))).toEqual([1, 0x31]);
    });
  });

  describe('lists', () => {
    it('should prefix the count', () => {
      const encoder = encoding.createEncoder();
      encodeCellIds(encoder, [CellId.fromFace(0), cell]);
      expect(Array.from(encoding.toUint8Array(encoder))).toEqual([
        2, 0x10, 0, 0, 0, 0, 0, 0, 0, 0x73, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it('should read back in order', () => {
      const cells = [CellId.fromFace(4), cell, CellId.fromFaceIJ(1, 2, 3)];
      const encoder = encoding.createEncoder();
      encodeCellIds(encoder, cells);
      const result = decodeCellIds(decoding.createDecoder(encoding.toUint8Array(encoder)));
      expect(result.ok && result.value.map((c) => c.toToken())).toEqual(cells.map((c) => c.toToken()));
    });

    it('should work with any coder', () => {
      const cells = [CompactCellId.fromFace(2), CompactCellId.fromFace(0).child(3)];
      const encoder = encoding.createEncoder();
      encodeCellList(encoder, cells, compactCellIdTokenCoder);
      const result = decodeCellList(decoding.createDecoder(encoding.toUint8Array(encoder)), compactCellIdTokenCoder);
      expect(result.ok && result.value.map((c) => c.toString())).toEqual(['2', '0/3']);
    });

    it('should name the item that failed', () => {
      const result = decodeCellIds(
        decoding.createDecoder(new Uint8Array([2, 0x73, 0, 0, 0, 0, 0, 0, 0]))
      );
      expect(result).toEqual({
        ok: false,
        error: { code: 'truncated', message: 'Item 1 of 2: Expected 8 bytes for a cell id, 0 remaining' },
      });
    });

    it('should decode an empty list', () => {
      expect(decodeCellIds(decoding.createDecoder(new Uint8Array([0])))).toEqual({ ok: true, value: [] });
    });
  });
});
