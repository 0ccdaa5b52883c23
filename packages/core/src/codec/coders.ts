/**
 * Coders for writing cells into lib0 byte streams
 *
 * Two wire forms exist: the fixed 8-byte id, and the token as a lib0
 * var-string. Compact cells are always written as their primary id, so a
 * stream written with one kind can be read back as the other.
 */

import * as encoding from 'lib0/encoding';
import type * as decoding from 'lib0/decoding';
import { CellId } from '../cell/CellId.js';
import { CompactCellId, compactFromDecoded } from '../compact/CompactCellId.js';
import { codecFailure, codecSuccess, type CodecResult } from '../errors.js';
import { createLogger } from '../logger.js';
import { readCount, readVarStringChecked } from './binary.js';
import { NONE_TOKEN } from './token.js';
import { parseToken } from './parse.js';

const log = createLogger('Codec');

export interface CellCoder<T> {
  encode(encoder: encoding.Encoder, value: T): void;
  /** Fails without throwing on truncated or malformed input */
  decode(decoder: decoding.Decoder): CodecResult<T>;
}

// ============================================================================
// Single cells
// ============================================================================

export function encodeCellId(encoder: encoding.Encoder, cell: CellId): void {
  cell.encode(encoder);
}

export function decodeCellId(decoder: decoding.Decoder): CodecResult<CellId> {
  return CellId.decode(decoder);
}

export function encodeCompactCellId(encoder: encoding.Encoder, cell: CompactCellId): void {
  cell.encode(encoder);
}

export function decodeCompactCellId(decoder: decoding.Decoder): CodecResult<CompactCellId> {
  return CompactCellId.decode(decoder);
}

export const cellIdCoder: CellCoder<CellId> = {
  encode: encodeCellId,
  decode: decodeCellId,
};

export const compactCellIdCoder: CellCoder<CompactCellId> = {
  encode: encodeCompactCellId,
  decode: decodeCompactCellId,
};

function decodeTokenCell(decoder: decoding.Decoder): CodecResult<CellId> {
  const token = readVarStringChecked(decoder);
  if (!token.ok) {
    log.debug(token.error.message);
    return token;
  }
  if (token.value === NONE_TOKEN) return codecSuccess(CellId.none());
  const parsed = parseToken(token.value);
  if (!parsed.ok) log.debug(parsed.error.message);
  return parsed;
}

/** Token written as a var-string; "X" stands for none() */
export const cellIdTokenCoder: CellCoder<CellId> = {
  encode(encoder, cell) {
    encoding.writeVarString(encoder, cell.toToken());
  },
  decode: decodeTokenCell,
};

/** Token of the primary id; decoding applies the deep-cell policy */
export const compactCellIdTokenCoder: CellCoder<CompactCellId> = {
  encode(encoder, cell) {
    encoding.writeVarString(encoder, cell.toToken());
  },
  decode(decoder) {
    const decoded = decodeTokenCell(decoder);
    if (!decoded.ok) return decoded;
    return compactFromDecoded(decoded.value);
  },
};

// ============================================================================
// Lists
// ============================================================================

/**
 * Write a var-uint count followed by each value
 */
export function encodeCellList<T>(encoder: encoding.Encoder, values: readonly T[], coder: CellCoder<T>): void {
  encoding.writeVarUint(encoder, values.length);
  for (const value of values) {
    coder.encode(encoder, value);
  }
}

/**
 * Read a list written by encodeCellList(). Stops at the first failure.
 */
export function decodeCellList<T>(decoder: decoding.Decoder, coder: CellCoder<T>): CodecResult<T[]> {
  const count = readCount(decoder);
  if (!count.ok) return count;
  const values: T[] = [];
  for (let k = 0; k < count.value; k++) {
    const value = coder.decode(decoder);
    if (!value.ok) {
      return codecFailure(value.error.code, `Item ${k} of ${count.value}: ${value.error.message}`);
    }
    values.push(value.value);
  }
  return codecSuccess(values);
}

export function encodeCellIds(encoder: encoding.Encoder, cells: readonly CellId[]): void {
  encodeCellList(encoder, cells, cellIdCoder);
}

export function decodeCellIds(decoder: decoding.Decoder): CodecResult<CellId[]> {
  return decodeCellList(decoder, cellIdCoder);
}
