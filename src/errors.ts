// SPDX-License-Identifier: BUSL-1.1
// Copyright (c) 2025 Theodor Storm

/**
 * Error classes for the reference store and its MCP surface
 *
 * This module distinguishes between user-facing errors (safe to surface to
 * clients) and system errors (sanitized before they leave the server).
 *
 * Error Hierarchy:
 * - UserError (base class for all user-facing errors)
 *   - ValidationError (invalid tool arguments, bad max age, missing input)
 *   - ReferenceStoreError (the store's closed failure taxonomy, see {@link ReferenceStoreErrorKind})
 *     - InvalidReferenceNameError
 *     - ReferenceNotFoundError
 *     - StorageIOError
 *     - FormatError
 *
 * System errors (plain Error) are caught and sanitized to "Internal server error"
 *
 * @module errors
 */

/**
 * Base class for all user-facing errors that are safe to return to clients.
 *
 * @example
 * throw new UserError('Invalid operation', 'INVALID_OPERATION', {
 *   attempted: 'delete',
 *   reason: 'missing reference'
 * });
 */
export class UserError extends Error {
  /**
   * Create a user-facing error
   * @param message - Human-readable error description
   * @param code - Machine-readable error code (UPPER_SNAKE_CASE)
   * @param details - Optional additional context (no sensitive data)
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'UserError';

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UserError);
    }
  }
}

/**
 * Error thrown when input other than a reference name fails validation.
 *
 * Use for:
 * - Tool arguments with the wrong shape
 * - Negative or non-finite cleanup ages
 * - Input composition with no source
 *
 * @example
 * throw new ValidationError(
 *   'max_age_seconds must be a finite, non-negative number',
 *   'INVALID_MAX_AGE',
 *   { provided: -5 }
 * );
 */
export class ValidationError extends UserError {
  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'ValidationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

/** Store operations named in error details. */
export type StoreOperation =
  | 'resolve'
  | 'create_or_update'
  | 'read'
  | 'update'
  | 'delete'
  | 'list'
  | 'cleanup'
  | 'initialize';

/**
 * Closed set of failure kinds the store reports.
 *
 * - `InvalidReferenceName`: caller error, never worth retrying
 * - `ReferenceNotFound`: recoverable by creating the reference
 * - `StorageIOError`: see {@link StorageIOError.retryable}
 * - `FormatError`: a record exists but is unreadable in both formats
 */
export type ReferenceStoreErrorKind =
  | 'InvalidReferenceName'
  | 'ReferenceNotFound'
  | 'StorageIOError'
  | 'FormatError';

/**
 * Base class of every failure raised by the reference store.
 *
 * `details` always carries the offending reference (or prefix) and the
 * attempted operation so callers can build their own message.
 */
export abstract class ReferenceStoreError extends UserError {
  abstract readonly kind: ReferenceStoreErrorKind;

  constructor(
    message: string,
    code: string,
    public readonly reference: string,
    public readonly operation: StoreOperation,
    details?: Record<string, unknown>
  ) {
    super(message, code, { reference, operation, ...details });
    this.name = 'ReferenceStoreError';
  }
}

/**
 * Thrown when a reference name (or listing prefix) is malformed.
 *
 * @example
 * throw new InvalidReferenceNameError(
 *   'Invalid reference name: segment ".." is not allowed',
 *   '../etc/passwd',
 *   'resolve',
 *   { segment: '..' }
 * );
 */
export class InvalidReferenceNameError extends ReferenceStoreError {
  readonly kind = 'InvalidReferenceName' as const;

  constructor(
    message: string,
    reference: string,
    operation: StoreOperation,
    details?: Record<string, unknown>
  ) {
    super(message, 'INVALID_REFERENCE_NAME', reference, operation, details);
    this.name = 'InvalidReferenceNameError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidReferenceNameError);
    }
  }
}

/**
 * Thrown when no record exists for a name in either format.
 */
export class ReferenceNotFoundError extends ReferenceStoreError {
  readonly kind = 'ReferenceNotFound' as const;

  constructor(reference: string, operation: StoreOperation) {
    super(`Reference not found: ${reference}`, 'REFERENCE_NOT_FOUND', reference, operation);
    this.name = 'ReferenceNotFoundError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReferenceNotFoundError);
    }
  }
}

/** errno codes worth retrying with backoff. */
const TRANSIENT_IO_CODES = new Set([
  'EAGAIN',
  'EBUSY',
  'EMFILE',
  'ENFILE',
  'EINTR',
  'ETIMEDOUT',
  'LOCK_TIMEOUT'
]);

/**
 * Thrown when the backing file system fails.
 *
 * `retryable` is true for transient causes (busy files, descriptor
 * exhaustion, lock timeouts) and false for permission or space problems.
 *
 * @example
 * throw StorageIOError.fromCause(err, 'prompts/greeting', 'create_or_update');
 */
export class StorageIOError extends ReferenceStoreError {
  readonly kind = 'StorageIOError' as const;

  readonly retryable: boolean;

  constructor(
    message: string,
    reference: string,
    operation: StoreOperation,
    public readonly cause_code: string,
    code = 'STORAGE_IO_ERROR'
  ) {
    super(message, code, reference, operation, {
      cause: cause_code,
      retryable: TRANSIENT_IO_CODES.has(cause_code)
    });
    this.retryable = TRANSIENT_IO_CODES.has(cause_code);
    this.name = 'StorageIOError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StorageIOError);
    }
  }

  static fromCause(err: unknown, reference: string, operation: StoreOperation): StorageIOError {
    const causeCode = errnoCode(err) ?? 'EIO';
    const reason = err instanceof Error ? err.message : String(err);
    return new StorageIOError(
      `Storage failure during ${operation} of ${reference}: ${reason}`,
      reference,
      operation,
      causeCode
    );
  }
}

/**
 * Thrown when a record exists but cannot be parsed as either the current
 * YAML format or the legacy JSON format. Never repaired automatically.
 */
export class FormatError extends ReferenceStoreError {
  readonly kind = 'FormatError' as const;

  constructor(
    reference: string,
    operation: StoreOperation,
    format: 'current' | 'legacy',
    reason: string
  ) {
    super(
      `Reference ${reference} is stored in an unreadable ${format} record: ${reason}`,
      'FORMAT_ERROR',
      reference,
      operation,
      { format, reason }
    );
    this.name = 'FormatError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormatError);
    }
  }
}

/**
 * Type guard to check if an error is a UserError
 * @param error - Error to check
 * @returns true if error is UserError or subclass
 */
export function isUserError(error: unknown): error is UserError {
  return error instanceof UserError;
}

export function isReferenceStoreError(error: unknown): error is ReferenceStoreError {
  return error instanceof ReferenceStoreError;
}

/**
 * Extracts the `code` of a Node.js system error (`ENOENT`, `EACCES`, ...).
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Tagged outcome of a store call. */
export type StoreOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReferenceStoreError };

/**
 * Awaits a store call and folds its failure into a {@link StoreOutcome}.
 *
 * Only store failures are folded; anything else is rethrown.
 *
 * @example
 * const outcome = await settle(store.read('drafts/intro'));
 * if (!outcome.ok && outcome.error.kind === 'ReferenceNotFound') {
 *   // nothing to show yet
 * }
 */
export async function settle<T>(operation: Promise<T>): Promise<StoreOutcome<T>> {
  try {
    return { ok: true, value: await operation };
  } catch (error: unknown) {
    if (isReferenceStoreError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
