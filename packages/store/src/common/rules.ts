/**
 * Access rules for the pairing document layout.
 *
 * Both backends evaluate these before touching the tree, so a client sees
 * the same permission failures whether it talks to the in-process backend
 * or to the relay.
 */

import type { DocumentTree } from './document-tree.js';
import { StoreError } from './errors.js';
import { DEVICE_SESSIONS_ROOT, DEVICES_KEY, SESSIONS_ROOT, splitPath } from './paths.js';
import { isStoreObject, type StorePath, type StoreUpdate, type StoreValue } from './types.js';

export type WriteOperation = 'set' | 'update' | 'delete';

interface WriteTarget {
  identity: string | undefined;
  path: StorePath;
}

export type WriteRequest =
  | (WriteTarget & { operation: 'set'; value: StoreValue })
  | (WriteTarget & { operation: 'update'; changes: StoreUpdate })
  | (WriteTarget & { operation: 'delete' });

export interface WritePolicy {
  /** Current time, for expiry checks */
  now: number;
  /** Maximum number of session records; undefined = unlimited */
  maxSessions?: number;
}

function deny(message: string): never {
  throw new StoreError('permission-denied', message);
}

function ownerOf(record: unknown): string | undefined {
  if (!isStoreObject(record)) return undefined;
  const owner = record.ownerIdentity;
  return typeof owner === 'string' ? owner : undefined;
}

/**
 * A session record anyone may delete: gone, ownerless, ended or expired.
 */
function isReclaimable(record: StoreValue | undefined, now: number): boolean {
  if (!isStoreObject(record) || ownerOf(record) === undefined) return true;
  if (record.isActive === false) return true;
  const expiresAt = record.expiresAt;
  return typeof expiresAt === 'number' && expiresAt < now;
}

/**
 * Reads require a signed-in identity and nothing else.
 */
export function authorizeRead(identity: string | undefined): void {
  if (!identity) {
    throw new StoreError('unauthenticated', 'Sign-in required');
  }
}

/**
 * Validate a write against the pairing rules and the session quota.
 * Throws StoreError('permission-denied' | 'unauthenticated' | 'resource-exhausted').
 */
export function authorizeWrite(tree: DocumentTree, request: WriteRequest, policy: WritePolicy): void {
  const { identity, operation } = request;
  if (!identity) {
    throw new StoreError('unauthenticated', 'Sign-in required');
  }

  const segments = splitPath(request.path);
  const root: string | undefined = segments[0];
  const key: string | undefined = segments[1];

  if (root === DEVICE_SESSIONS_ROOT) {
    if (key !== identity) deny(`${identity} may not write ${segments.join('/')}`);
    return;
  }

  if (root !== SESSIONS_ROOT) return;

  if (key === undefined) deny('The sessions collection cannot be written as a whole');

  const existing = tree.get([SESSIONS_ROOT, key]);
  const owner = ownerOf(existing);
  const isOwner = owner !== undefined && owner === identity;

  // sessions/{token}/devices/{deviceId}/...
  if (segments.length >= 4 && segments[2] === DEVICES_KEY) {
    if (segments[3] !== identity && !isOwner) {
      deny(`${identity} may not write device ${segments[3]}`);
    }
    if (existing === undefined && operation !== 'delete') {
      deny(`Session ${key} does not exist`);
    }
    return;
  }

  if (segments.length === 2 && operation === 'delete') {
    if (!isOwner && !isReclaimable(existing, policy.now)) {
      deny(`${identity} may not delete session ${key}`);
    }
    return;
  }

  if (existing !== undefined && !isOwner) {
    deny(`${identity} does not own session ${key}`);
  }

  if (existing === undefined) {
    // Creating a record: it must name the writer as owner
    const created = request.operation === 'set' ? request.value : undefined;
    if (segments.length !== 2 || ownerOf(created) !== identity) {
      deny(`Session ${key} must be created whole by its owner`);
    }
    if (policy.maxSessions !== undefined && tree.childCount([SESSIONS_ROOT]) >= policy.maxSessions) {
      throw new StoreError('resource-exhausted', `Session quota of ${policy.maxSessions} reached`);
    }
  }
}
