/**
 * Byte-level cell encoding over lib0's Encoder/Decoder
 *
 * An id is written as 8 bytes, most significant first. Invalid ids are
 * written as-is; interpreting them is the reader's concern. Reads report a
 * short stream as a "truncated" CodecResult instead of throwing.
 */

import * as encoding from 'lib0/encoding';
import * as decoding from 'lib0/decoding';
import { codecFailure, codecSuccess, type CodecErrorCode, type CodecResult } from '../errors.js';

export const CELL_ID_BYTES = 8;

export function writeIdBits(encoder: encoding.Encoder, id: bigint): void {
  encoding.writeBigUint64(encoder, id);
}

/**
 * Read 8 bytes. When fewer remain the decoder is left where it was.
 */
export function readIdBits(decoder: decoding.Decoder): CodecResult<bigint> {
  const remaining = decoder.arr.length - decoder.pos;
  if (remaining < CELL_ID_BYTES) {
    return codecFailure(
      'truncated',
      `Expected ${CELL_ID_BYTES} bytes for a cell id, ${remaining} remaining`
    );
  }
  return codecSuccess(decoding.readBigUint64(decoder));
}

/** A var-uint that stops at the end of input is truncated; one too large is malformed */
function varUintErrorCode(decoder: decoding.Decoder): CodecErrorCode {
  return decoder.pos >= decoder.arr.length ? 'truncated' : 'malformed';
}

/**
 * Read a lib0 var-string. When the length prefix or the bytes it announces
 * run past the end, the decoder is left where it was.
 */
export function readVarStringChecked(decoder: decoding.Decoder): CodecResult<string> {
  const start = decoder.pos;
  let length: number;
  try {
    length = decoding.readVarUint(decoder);
  } catch (error) {
    const code = varUintErrorCode(decoder);
    decoder.pos = start;
    return codecFailure(code, `Unreadable string length: ${String(error)}`);
  }
  const remaining = decoder.arr.length - decoder.pos;
  decoder.pos = start;
  if (remaining < length) {
    return codecFailure('truncated', `Expected ${length} string bytes, ${remaining} remaining`);
  }
  return codecSuccess(decoding.readVarString(decoder));
}

/**
 * Read a lib0 var-uint count prefix
 */
export function readCount(decoder: decoding.Decoder): CodecResult<number> {
  const start = decoder.pos;
  try {
    return codecSuccess(decoding.readVarUint(decoder));
  } catch (error) {
    const code = varUintErrorCode(decoder);
    decoder.pos = start;
    return codecFailure(code, `Unreadable count: ${String(error)}`);
  }
}
