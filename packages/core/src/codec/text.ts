/**
 * Text forms of a cell path
 *
 * Canonical form: "<face>" for a face cell, otherwise "<face>/<digits>" with
 * one child position (0-3) per level from the face down, e.g. "3/02".
 * "<face>/" is accepted as the face cell. Invalid cells print "INVALID".
 *
 * Debug form: always "<face>/<digits>" ("4/" for a face cell); invalid ids
 * print "Invalid: " followed by 16 hex digits.
 */

import { codecFailure, codecSuccess, type CodecResult } from '../errors.js';
import { toHex16 } from '../num/uint64.js';

export const INVALID_CELL_STRING = 'INVALID';

/** Face and child positions from the face down */
export interface CellPath {
  face: number;
  digits: number[];
}

const FACE_TEXT = /^[0-9]+$/;

export function formatCanonical(path: CellPath): string {
  if (path.digits.length === 0) return String(path.face);
  return `${path.face}/${path.digits.join('')}`;
}

export function formatDebug(path: CellPath): string {
  return `${path.face}/${path.digits.join('')}`;
}

export function formatInvalidDebug(id: bigint): string {
  return `Invalid: ${toHex16(id)}`;
}

function parseDigits(text: string, maxLevel: number, input: string): CodecResult<number[]> {
  if (text.length > maxLevel) {
    return codecFailure('outOfRange', `Cell path deeper than level ${maxLevel}: '${input}'`);
  }
  const digits: number[] = [];
  for (const ch of text) {
    const digit = ch.charCodeAt(0) - 48;
    if (digit < 0 || digit > 3) {
      return codecFailure('malformed', `Invalid child position '${ch}' in '${input}'`);
    }
    digits.push(digit);
  }
  return codecSuccess(digits);
}

/**
 * Parse the canonical form
 */
export function parseCanonical(text: string, maxLevel: number): CodecResult<CellPath> {
  const slash = text.indexOf('/');
  const faceText = slash < 0 ? text : text.slice(0, slash);
  if (!FACE_TEXT.test(faceText)) {
    return codecFailure('malformed', `Expected a face number, got: '${text}'`);
  }
  const face = Number(faceText);
  if (face > 5) {
    return codecFailure('outOfRange', `Face out of range [0,5]: '${text}'`);
  }
  if (slash < 0) return codecSuccess({ face, digits: [] });

  const digits = parseDigits(text.slice(slash + 1), maxLevel, text);
  if (!digits.ok) return digits;
  return codecSuccess({ face, digits: digits.value });
}

/**
 * Parse the debug form: one face digit, '/', then the child positions
 */
export function parseDebug(text: string, maxLevel: number): CodecResult<CellPath> {
  if (text.length < 2 || text[1] !== '/') {
    return codecFailure('malformed', `Expected '<face>/<digits>', got: '${text}'`);
  }
  const face = text.charCodeAt(0) - 48;
  if (face < 0 || face > 5) {
    return codecFailure('outOfRange', `Face out of range [0,5]: '${text}'`);
  }
  const digits = parseDigits(text.slice(2), maxLevel, text);
  if (!digits.ok) return digits;
  return codecSuccess({ face, digits: digits.value });
}
