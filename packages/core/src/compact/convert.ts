/**
 * Conversion between primary and compact ids
 *
 * Primary ids deeper than COMPACT_MAX_LEVEL have no compact form. Factories
 * that take external input pass through applyDeepCellPolicy() first; the
 * conversion itself never truncates.
 */

import { CellId } from '../cell/CellId.js';
import { getCellConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { COMPACT_MAX_LEVEL, COMPACT_SENTINEL, ROOT_MARKER, isValidRaw, packRaw, rawFace, rawLevel, rawPath } from './layout.js';

const log = createLogger('Compact');

/**
 * Compact raw value of a primary cell, or 0n (invalid) when the cell is
 * invalid or deeper than level 28
 */
export function compactFromPrimary(cell: CellId): bigint {
  if (!cell.isValid()) return 0n;
  const face = cell.face();
  const level = cell.level();
  if (level > COMPACT_MAX_LEVEL) return 0n;
  if (level === 0) return packRaw(face, 0n, 0);

  // Positions come out leaf first; the path field wants them root first.
  const positions: number[] = [];
  let current = cell;
  while (current.level() > 0) {
    positions.push(current.childPosition());
    current = current.parent();
  }
  if (current.face() !== face) {
    log.warn(`Root face ${current.face()} does not match face ${face}`, { token: cell.toToken() });
    return 0n;
  }

  let path = 0n;
  while (positions.length > 0) {
    path = (path << 2n) | BigInt(positions.pop() ?? 0);
  }
  return packRaw(face, path, level);
}

/**
 * Primary cell of a compact raw value. The compact sentinel maps to the
 * primary sentinel; any other invalid value maps to none().
 */
export function compactToPrimary(raw: bigint): CellId {
  if (raw === COMPACT_SENTINEL) return CellId.sentinel();
  if (raw === ROOT_MARKER) return CellId.fromFace(0);
  if (!isValidRaw(raw)) return CellId.none();

  const level = rawLevel(raw);
  const path = rawPath(raw);
  let cell = CellId.fromFace(rawFace(raw));
  for (let l = 0; l < level; l++) {
    const position = Number((path >> BigInt(2 * (level - 1 - l))) & 3n);
    cell = cell.child(position);
    if (!cell.isValid()) return CellId.none();
  }
  return cell;
}

export function canRepresentAsCompact(cell: CellId): boolean {
  return cell.isValid() && cell.level() <= COMPACT_MAX_LEVEL;
}

/**
 * Bring a valid primary cell within compact depth according to the
 * `deepCellPolicy` option: "truncate" returns its level-28 ancestor,
 * "reject" returns none(). Other cells pass through unchanged.
 */
export function applyDeepCellPolicy(cell: CellId): CellId {
  if (!cell.isValid() || cell.level() <= COMPACT_MAX_LEVEL) return cell;
  const policy = getCellConfig().deepCellPolicy;
  log.debug(`Cell deeper than level ${COMPACT_MAX_LEVEL}`, { token: cell.toToken(), policy });
  if (policy === 'reject') return CellId.none();
  return cell.parent(COMPACT_MAX_LEVEL);
}
