/**
 * @spherecell/core - Hilbert curve cell identifiers for the sphere
 *
 * ## Identifiers
 * - CellId: primary 64-bit id, levels 0-30, ordered along the curve
 * - CompactCellId: face + quadtree path encoding, levels 0-28
 * - compactFromPrimary / compactToPrimary: conversion between the two
 *
 * ## Codecs
 * - tokens ("89c25"), canonical strings ("3/02"), debug strings ("3/02")
 * - fixed 8-byte and token coders over lib0 Encoder/Decoder
 *
 * ## Ambient
 * - configureCells / getCellConfig: checks, log level, projection,
 *   deep-cell policy
 * - createLogger, CellContractError, CodecResult
 */

// =============================================================================
// Identifiers
// =============================================================================
export { CellId, type EdgeNeighbors } from './cell/CellId.js';
export {
  FACE_BITS,
  NUM_FACES,
  MAX_LEVEL,
  POS_BITS,
  MAX_SIZE,
  WRAP_OFFSET,
  lsbForLevel,
} from './cell/constants.js';
export type { FaceIJOrientation } from './cell/faceIJ.js';
export { SWAP_MASK, INVERT_MASK } from './cell/hilbert.js';

export { CompactCellId, compactFromDecoded } from './compact/CompactCellId.js';
export {
  compactFromPrimary,
  compactToPrimary,
  canRepresentAsCompact,
  applyDeepCellPolicy,
} from './compact/convert.js';
export { COMPACT_MAX_LEVEL, ROOT_MARKER, COMPACT_SENTINEL } from './compact/layout.js';

// =============================================================================
// Codecs
// =============================================================================
export { NONE_TOKEN } from './codec/token.js';
export { INVALID_CELL_STRING, type CellPath } from './codec/text.js';
export { CELL_ID_BYTES } from './codec/binary.js';
export { parseToken, formatTokenFlag, parseCellString, parseCompactCellString } from './codec/parse.js';
export {
  type CellCoder,
  encodeCellId,
  decodeCellId,
  encodeCompactCellId,
  decodeCompactCellId,
  cellIdCoder,
  compactCellIdCoder,
  cellIdTokenCoder,
  compactCellIdTokenCoder,
  encodeCellList,
  decodeCellList,
  encodeCellIds,
  decodeCellIds,
} from './codec/coders.js';

// =============================================================================
// Geometry
// =============================================================================
export {
  type CellProjection,
  type FaceIJ,
  createCellProjection,
  getProjection,
  expandedByDistanceUV,
} from './geometry/projection.js';
export {
  type FaceIndex,
  LIMIT_IJ,
  MAX_SI_TI,
  faceUVToXYZ,
  faceXYZToUV,
  validFaceXYZToUV,
  xyzToFaceUV,
  getFace,
  stToIJ,
  ijToSTMin,
  siTiToST,
} from './geometry/coords.js';
export {
  type LatLng,
  latLng,
  latLngFromDegrees,
  latLngToDegrees,
  latLngToPoint,
  latLngFromPoint,
  isValidLatLng,
} from './geometry/latlng.js';
export { type Interval, type Rect2, interval, rect2, rectFromCenterSize, rectCenter, rectContains } from './geometry/rect.js';
export { vec2, type Vec2 } from './num/vec2.js';
export { vec3, type Vec3, normalize3 } from './num/vec3.js';

// =============================================================================
// Configuration, logging, errors
// =============================================================================
export {
  type CellConfig,
  type LogLevel,
  type ProjectionKind,
  type DeepCellPolicy,
  cellConfigSchema,
  DEFAULT_CELL_CONFIG,
  getCellConfig,
  configureCells,
  resetCellConfig,
} from './config.js';
export { type Logger, type LogContext, createLogger } from './logger.js';
export {
  CellContractError,
  assertContract,
  type CodecError,
  type CodecErrorCode,
  type CodecResult,
  codecSuccess,
  codecFailure,
  unwrapCodecResult,
  unwrapOr,
} from './errors.js';
