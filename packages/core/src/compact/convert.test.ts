import { afterEach, describe, it, expect, vi } from 'vitest';
import { CellId } from '../cell/CellId.js';
import { configureCells, resetCellConfig } from '../config.js';
import { applyDeepCellPolicy, canRepresentAsCompact, compactFromPrimary, compactToPrimary } from './convert.js';
import { COMPACT_SENTINEL, ROOT_MARKER, packRaw } from './layout.js';

describe('compact conversion', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetCellConfig();
  });

  const cell = CellId.fromFace(3).child(2).child(1);
  const leaf = CellId.fromFaceIJ(2, 1000, 2000);

  it('should pack the child positions face first', () => {
    expect(compactFromPrimary(cell)).toBe(packRaw(3, 0b1001n, 2));
    expect(compactFromPrimary(CellId.fromFace(0))).toBe(ROOT_MARKER);
    expect(compactFromPrimary(CellId.fromFace(4))).toBe(4n << 61n);
  });

  it('should repack the positions of a parent walk root first', () => {
    const deeper = CellId.fromFace(5).child(3).child(0).child(2);
    expect(compactFromPrimary(deeper)).toBe(packRaw(5, 0b110010n, 3));
    const deep = leaf.parent(28);
    let path = 0n;
    for (let level = 1; level <= 28; level++) {
      path = (path << 2n) | BigInt(deep.childPosition(level));
    }
    expect(compactFromPrimary(deep)).toBe(packRaw(2, path, 28));
  });

  it('should have no compact form for deep or invalid cells', () => {
    expect(compactFromPrimary(leaf)).toBe(0n);
    expect(compactFromPrimary(leaf.parent(29))).toBe(0n);
    expect(compactFromPrimary(CellId.none())).toBe(0n);
    expect(compactFromPrimary(CellId.sentinel())).toBe(0n);
  });

  it('should convert back to the primary cell', () => {
    expect(compactToPrimary(packRaw(3, 0b1001n, 2)).equals(cell)).toBe(true);
    expect(compactToPrimary(ROOT_MARKER).equals(CellId.fromFace(0))).toBe(true);
    const deep = leaf.parent(28);
    expect(compactToPrimary(compactFromPrimary(deep)).equals(deep)).toBe(true);
  });

  it('should map invalid values to none or sentinel', () => {
    expect(compactToPrimary(0n).equals(CellId.none())).toBe(true);
    expect(compactToPrimary(packRaw(1, 0n, 29)).equals(CellId.none())).toBe(true);
    expect(compactToPrimary(COMPACT_SENTINEL).equals(CellId.sentinel())).toBe(true);
  });

  it('should report which cells fit', () => {
    expect(canRepresentAsCompact(leaf.parent(28))).toBe(true);
    expect(canRepresentAsCompact(leaf)).toBe(false);
    expect(canRepresentAsCompact(CellId.none())).toBe(false);
  });

  describe('applyDeepCellPolicy', () => {
    it('should truncate to level 28 by default', () => {
      expect(applyDeepCellPolicy(leaf).equals(leaf.parent(28))).toBe(true);
    });

    it('should reject when configured to', () => {
      configureCells({ deepCellPolicy: 'reject' });
      expect(applyDeepCellPolicy(leaf).equals(CellId.none())).toBe(true);
    });

    it('should pass shallow and invalid cells through', () => {
      configureCells({ deepCellPolicy: 'reject' });
      expect(applyDeepCellPolicy(cell).equals(cell)).toBe(true);
      expect(applyDeepCellPolicy(CellId.sentinel()).equals(CellId.sentinel())).toBe(true);
    });

    it('should log the decision at debug level', () => {
      configureCells({ logLevel: 'debug' });
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      applyDeepCellPolicy(leaf);
      expect(debug).toHaveBeenCalledWith('[Compact] Cell deeper than level 28', {
        token: leaf.toToken(),
        policy: 'truncate',
      });
    });
  });
});
