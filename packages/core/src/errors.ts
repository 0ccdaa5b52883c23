/**
 * Error types
 *
 * Two kinds of failure exist:
 * - contract violations: a caller broke an operation's precondition
 *   (child() on a leaf, parent() on a face, level out of range). These throw
 *   CellContractError while `checks` is enabled and are unchecked otherwise.
 * - data errors: malformed tokens, strings or bytes. These never throw; they
 *   produce the invalid cell or a failed CodecResult.
 */

import { getCellConfig } from './config.js';
import { createLogger } from './logger.js';

const log = createLogger('Contract');

// ============================================================================
// Contract violations
// ============================================================================

export class CellContractError extends Error {
  readonly operation: string;
  readonly details?: Record<string, unknown>;

  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(`${operation}: ${message}`);
    this.name = 'CellContractError';
    this.operation = operation;
    this.details = details;
  }
}

/**
 * Throw CellContractError when `condition` is false and checks are enabled.
 * `details` is only evaluated on failure.
 */
export function assertContract(
  condition: boolean,
  operation: string,
  message: string,
  details?: () => Record<string, unknown>
): void {
  if (condition || !getCellConfig().checks) return;
  const info = details?.();
  log.error(`${operation}: ${message}`, info);
  throw new CellContractError(operation, message, info);
}

// ============================================================================
// Codec results
// ============================================================================

/**
 * Why a decode or parse failed
 */
export type CodecErrorCode =
  | `truncated` // Byte stream ended early
  | `malformed` // Text or bytes do not follow the grammar
  | `outOfRange`; // Well-formed but names no cell (bad face, too deep)

export interface CodecError {
  code: CodecErrorCode;
  message: string;
}

/**
 * Result of a parse or decode
 *
 * ```ts
 * const result = parseToken("89c25");
 * if (result.ok) {
 *   use(result.value);
 * } else {
 *   console.warn(result.error.message);
 * }
 * ```
 */
export type CodecResult<T> = { ok: true; value: T } | { ok: false; error: CodecError };

export function codecSuccess<T>(value: T): CodecResult<T> {
  return { ok: true, value };
}

export function codecFailure<T>(code: CodecErrorCode, message: string): CodecResult<T> {
  return { ok: false, error: { code, message } };
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapCodecResult<T>(result: CodecResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Codec operation failed (${result.error.code}): ${result.error.message}`);
}

/**
 * Extract the value from a result, or return a default
 */
export function unwrapOr<T>(result: CodecResult<T>, defaultValue: T): T {
  return result.ok ? result.value : defaultValue;
}
