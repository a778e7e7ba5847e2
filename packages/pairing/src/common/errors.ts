import { isStoreError } from '@anchorwatch/store';

export type PairingErrorCode =
  | 'invalid-token'
  | 'not-found'
  | 'expired'
  | 'inactive'
  | 'permission-denied'
  | 'rate-limited'
  | 'quota-exceeded'
  | 'corrupted-state'
  | 'not-primary';

/**
 * Base class for pairing failures surfaced to callers.
 */
export class PairingError extends Error {
  public readonly code: PairingErrorCode;
  public cause?: unknown;

  constructor(code: PairingErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'PairingError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PairingError);
    }
  }
}

/** Malformed token; raised before any store access. */
export class InvalidTokenError extends PairingError {
  constructor(message = 'Invalid session token format') {
    super('invalid-token', message);
    this.name = 'InvalidTokenError';
  }
}

export class NotFoundError extends PairingError {
  constructor(token: string) {
    super('not-found', `Session ${token} not found`);
    this.name = 'NotFoundError';
  }
}

export class ExpiredError extends PairingError {
  constructor(token: string) {
    super('expired', `Session ${token} has expired`);
    this.name = 'ExpiredError';
  }
}

export class InactiveError extends PairingError {
  constructor(token: string) {
    super('inactive', `Session ${token} is no longer active`);
    this.name = 'InactiveError';
  }
}

export class PermissionDeniedError extends PairingError {
  constructor(message = 'Permission denied', cause?: unknown) {
    super('permission-denied', message, cause);
    this.name = 'PermissionDeniedError';
  }
}

export class RateLimitedError extends PairingError {
  /** Time left until another session may be created */
  public readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('rate-limited', `Please wait ${Math.ceil(retryAfterMs / 1000)}s before creating another session`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class QuotaExceededError extends PairingError {
  constructor(message = 'Store quota exceeded', cause?: unknown) {
    super('quota-exceeded', message, cause);
    this.name = 'QuotaExceededError';
  }
}

/** A stored session record failed validation. */
export class CorruptedStateError extends PairingError {
  constructor(message: string) {
    super('corrupted-state', message);
    this.name = 'CorruptedStateError';
  }
}

export class NotPrimaryError extends PairingError {
  constructor() {
    super('not-primary', 'Only the primary device can end the session');
    this.name = 'NotPrimaryError';
  }
}

export function isPairingError(err: unknown, code?: PairingErrorCode): err is PairingError {
  return err instanceof PairingError && (code === undefined || err.code === code);
}

/**
 * Translate store failures that have a pairing meaning; anything else is
 * returned unchanged.
 */
export function toPairingError(err: unknown): unknown {
  if (isStoreError(err, 'permission-denied')) {
    return new PermissionDeniedError(err.message, err);
  }
  if (isStoreError(err, 'resource-exhausted')) {
    return new QuotaExceededError(err.message, err);
  }
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
