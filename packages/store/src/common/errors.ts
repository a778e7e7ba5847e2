/**
 * Store failure codes shared by every backend and the wire protocol.
 */
export type StoreErrorCode =
  | 'permission-denied'
  | 'resource-exhausted'
  | 'unavailable'
  | 'unauthenticated'
  | 'invalid-argument'
  | 'cancelled'
  | 'internal';

const STORE_ERROR_CODES: ReadonlySet<string> = new Set<StoreErrorCode>([
  'permission-denied',
  'resource-exhausted',
  'unavailable',
  'unauthenticated',
  'invalid-argument',
  'cancelled',
  'internal',
]);

/**
 * Error raised by a RemoteStore operation.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public cause?: unknown;

  constructor(code: StoreErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'StoreError';
    this.code = code;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError);
    }
  }
}

export function isStoreErrorCode(value: unknown): value is StoreErrorCode {
  return typeof value === 'string' && STORE_ERROR_CODES.has(value);
}

export function isStoreError(err: unknown, code?: StoreErrorCode): err is StoreError {
  return err instanceof StoreError && (code === undefined || err.code === code);
}

export function isPermissionDenied(err: unknown): err is StoreError {
  return isStoreError(err, 'permission-denied');
}

export function isResourceExhausted(err: unknown): err is StoreError {
  return isStoreError(err, 'resource-exhausted');
}
