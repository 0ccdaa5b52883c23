/**
 * Result-returning parsers
 *
 * The factories on CellId and CompactCellId turn bad input into none().
 * These return a CodecResult carrying the reason instead, for callers that
 * report errors (option parsing, request validation).
 */

import { CellId } from '../cell/CellId.js';
import { MAX_LEVEL } from '../cell/constants.js';
import { CompactCellId } from '../compact/CompactCellId.js';
import { COMPACT_MAX_LEVEL } from '../compact/layout.js';
import { codecFailure, codecSuccess, type CodecResult } from '../errors.js';
import { parseCanonical } from './text.js';
import { tokenToId } from './token.js';

/**
 * Parse a token naming a valid cell
 */
export function parseToken(text: string): CodecResult<CellId> {
  const cell = new CellId(tokenToId(text));
  if (!cell.isValid()) {
    return codecFailure('malformed', `Expected valid cell token, got: '${text}'`);
  }
  return codecSuccess(cell);
}

/**
 * Inverse of parseToken(), for writing option and flag values
 */
export function formatTokenFlag(cell: CellId): string {
  return cell.toToken();
}

/**
 * Parse the canonical "f" / "f/digits" form
 */
export function parseCellString(text: string): CodecResult<CellId> {
  const path = parseCanonical(text, MAX_LEVEL);
  if (!path.ok) return path;
  let cell = CellId.fromFace(path.value.face);
  for (const digit of path.value.digits) {
    cell = cell.child(digit);
  }
  return codecSuccess(cell);
}

/**
 * Parse the canonical form into a compact id (at most 28 digits)
 */
export function parseCompactCellString(text: string): CodecResult<CompactCellId> {
  const path = parseCanonical(text, COMPACT_MAX_LEVEL);
  if (!path.ok) return path;
  return codecSuccess(CompactCellId.fromString(text));
}
