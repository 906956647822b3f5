/**
 * Change Detection Errors
 *
 * Every failure raised by the engine itself is a ChangeDetectionError tagged
 * with an ErrorCode, so callers can branch on `error.code` instead of
 * matching messages.
 */

export enum ErrorCode {
  InvalidFieldSelector = 'INVALID_FIELD_SELECTOR',
  DigestInProgress = 'DIGEST_IN_PROGRESS',
  GroupRemoved = 'GROUP_REMOVED',
}

export class ChangeDetectionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'ChangeDetectionError';
    this.code = code;
  }
}

/**
 * Raised at watch() time (or when a record's object is replaced) when the
 * selector cannot be applied to the object's runtime shape.
 */
export class InvalidFieldSelectorError extends ChangeDetectionError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super(ErrorCode.InvalidFieldSelector, `Invalid field selector "${field}": ${reason}`);
    this.name = 'InvalidFieldSelectorError';
    this.field = field;
  }
}

/**
 * Raised when the watch tree is mutated, or a nested digest is started,
 * while collectChanges() is running.
 */
export class DigestInProgressError extends ChangeDetectionError {
  constructor(operation: string) {
    super(
      ErrorCode.DigestInProgress,
      `Cannot ${operation} while a digest pass is in progress`
    );
    this.name = 'DigestInProgressError';
  }
}

export class GroupRemovedError extends ChangeDetectionError {
  constructor(operation: string) {
    super(ErrorCode.GroupRemoved, `Cannot ${operation} on a removed watch group`);
    this.name = 'GroupRemovedError';
  }
}

export function isChangeDetectionError(error: unknown): error is ChangeDetectionError {
  return error instanceof ChangeDetectionError;
}
