/**
 * Core types for the remote document store.
 */

// ============================================================================
// Values
// ============================================================================

export type StoreScalar = string | number | boolean;

/**
 * A JSON-like value held in the store. There is no null: writing null or
 * undefined removes the node.
 */
export type StoreValue = StoreScalar | StoreValue[] | StoreObject;

export interface StoreObject {
  [key: string]: StoreValue;
}

/**
 * Multi-child update. Keys may be nested paths ("devices/abc"); a null value
 * removes that child.
 */
export type StoreUpdate = Record<string, StoreValue | null>;

/** A '/'-separated path string or a pre-split segment list. */
export type StorePath = string | readonly string[];

// ============================================================================
// Store Contract
// ============================================================================

/** Receives the current value of a watched path; undefined when absent. */
export type WatchListener = (value: StoreValue | undefined) => void;

export type WatchErrorListener = (error: Error) => void;

export type Unsubscribe = () => void;

/**
 * Authentication surface, separated so retry helpers only need this much.
 */
export interface StoreAuthenticator {
  /** Identity of the signed-in device, once known. */
  readonly identity: string | undefined;
  /** Sign in if needed; resolves to the stable device identity. */
  ensureAuthenticated(): Promise<string>;
  /** Re-establish credentials after a permission failure. */
  refreshAuthentication(): Promise<string>;
}

/**
 * Eventually-consistent, last-writer-wins document store.
 */
export interface RemoteStore extends StoreAuthenticator {
  get(path: StorePath): Promise<StoreValue | undefined>;
  set(path: StorePath, value: StoreValue): Promise<void>;
  update(path: StorePath, changes: StoreUpdate): Promise<void>;
  delete(path: StorePath): Promise<void>;
  /**
   * Observe a path. The listener receives the current value first and then
   * every change; the returned function cancels the subscription.
   */
  watch(path: StorePath, listener: WatchListener, onError?: WatchErrorListener): Unsubscribe;
  close(): Promise<void>;
}

// ============================================================================
// Value Helpers
// ============================================================================

export function isStoreObject(value: unknown): value is StoreObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an untyped value (typically parsed JSON) as a StoreValue.
 * Nulls inside objects are dropped; a null or undefined input yields undefined.
 * Throws on values the store cannot hold.
 */
export function toStoreValue(input: unknown): StoreValue | undefined {
  if (input === null || input === undefined) return undefined;
  switch (typeof input) {
    case 'string':
    case 'boolean':
      return input;
    case 'number':
      if (!Number.isFinite(input)) {
        throw new TypeError(`Non-finite number cannot be stored: ${input}`);
      }
      return input;
    case 'object':
      break;
    default:
      throw new TypeError(`Unsupported value type: ${typeof input}`);
  }

  if (Array.isArray(input)) {
    const items: StoreValue[] = [];
    for (const item of input) {
      const value = toStoreValue(item);
      if (value === undefined) {
        throw new TypeError('Arrays cannot contain null entries');
      }
      items.push(value);
    }
    return items;
  }

  if (!isRecord(input)) {
    throw new TypeError('Unsupported object value');
  }

  const result: StoreObject = {};
  for (const [key, raw] of Object.entries(input)) {
    const value = toStoreValue(raw);
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Validate an untyped multi-child update.
 */
export function toStoreUpdate(input: unknown): StoreUpdate {
  if (!isRecord(input)) {
    throw new TypeError('Update must be an object');
  }
  const result: StoreUpdate = {};
  for (const [key, raw] of Object.entries(input)) {
    result[key] = toStoreValue(raw) ?? null;
  }
  return result;
}

export function cloneValue<T extends StoreValue>(value: T): T;
export function cloneValue(value: StoreValue | undefined): StoreValue | undefined;
export function cloneValue(value: StoreValue | undefined): StoreValue | undefined {
  return value === undefined ? undefined : structuredClone(value);
}

/**
 * Structural equality; object key order is ignored.
 */
export function valuesEqual(a: StoreValue | undefined, b: StoreValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isStoreObject(a) && isStoreObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(key => key in b && valuesEqual(a[key], b[key]));
  }
  return false;
}
