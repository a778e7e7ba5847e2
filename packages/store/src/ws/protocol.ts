/**
 * Wire protocol between WebSocketRemoteStore and the relay.
 *
 * Every request carries an id; the relay answers with a message bearing the
 * same id. Watch snapshots are pushed with the id of the watch request.
 */

import { isStoreErrorCode, type StoreErrorCode } from '../common/errors.js';
import { isRecord, toStoreUpdate, toStoreValue, type StoreUpdate, type StoreValue } from '../common/types.js';

// ============================================================================
// Client -> Relay
// ============================================================================

export interface HelloMessage {
  type: 'hello';
  id: string;
  /** Credential from an earlier session; omitted on first contact */
  credential?: string;
}

export interface GetMessage {
  type: 'get';
  id: string;
  path: string;
}

export interface SetMessage {
  type: 'set';
  id: string;
  path: string;
  value: StoreValue;
}

export interface UpdateMessage {
  type: 'update';
  id: string;
  path: string;
  changes: StoreUpdate;
}

export interface DeleteMessage {
  type: 'delete';
  id: string;
  path: string;
}

export interface WatchMessage {
  type: 'watch';
  id: string;
  path: string;
}

export interface UnwatchMessage {
  type: 'unwatch';
  id: string;
  watchId: string;
}

export interface PingMessage {
  type: 'ping';
  id: string;
}

export type ClientMessage =
  | HelloMessage
  | GetMessage
  | SetMessage
  | UpdateMessage
  | DeleteMessage
  | WatchMessage
  | UnwatchMessage
  | PingMessage;

// ============================================================================
// Relay -> Client
// ============================================================================

export interface HelloAckMessage {
  type: 'hello_ack';
  id: string;
  identity: string;
  credential: string;
}

export interface ResultMessage {
  type: 'result';
  id: string;
  value?: StoreValue;
}

export interface SnapshotMessage {
  type: 'snapshot';
  watchId: string;
  value?: StoreValue;
}

export interface ErrorMessage {
  type: 'error';
  id?: string;
  code: StoreErrorCode;
  message: string;
}

export interface PongMessage {
  type: 'pong';
  id: string;
}

export type ServerMessage =
  | HelloAckMessage
  | ResultMessage
  | SnapshotMessage
  | ErrorMessage
  | PongMessage;

// ============================================================================
// Parsing
// ============================================================================

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

function requireString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ProtocolError(`Field "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ProtocolError(`Field "${key}" must be a string`);
  }
  return value;
}

function parseJson(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProtocolError('Message is not valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new ProtocolError('Message must be a JSON object');
  }
  return parsed;
}

function withValue(raw: unknown): { value?: StoreValue } {
  const value = toStoreValue(raw);
  return value === undefined ? {} : { value };
}

/**
 * Parse and validate a message received by the relay.
 */
export function parseClientMessage(raw: string): ClientMessage {
  const msg = parseJson(raw);
  const type = requireString(msg, 'type');
  const id = requireString(msg, 'id');

  switch (type) {
    case 'hello': {
      const credential = optionalString(msg, 'credential');
      return credential === undefined ? { type, id } : { type, id, credential };
    }
    case 'get':
    case 'delete':
    case 'watch':
      return { type, id, path: requireString(msg, 'path') };
    case 'set': {
      const value = toStoreValue(msg.value);
      if (value === undefined) {
        throw new ProtocolError('set requires a value; use delete to remove');
      }
      return { type, id, path: requireString(msg, 'path'), value };
    }
    case 'update':
      return { type, id, path: requireString(msg, 'path'), changes: toStoreUpdate(msg.changes) };
    case 'unwatch':
      return { type, id, watchId: requireString(msg, 'watchId') };
    case 'ping':
      return { type, id };
    default:
      throw new ProtocolError(`Unknown message type: ${type}`);
  }
}

/**
 * Parse and validate a message received by the client.
 */
export function parseServerMessage(raw: string): ServerMessage {
  const msg = parseJson(raw);
  const type = requireString(msg, 'type');

  switch (type) {
    case 'hello_ack':
      return {
        type,
        id: requireString(msg, 'id'),
        identity: requireString(msg, 'identity'),
        credential: requireString(msg, 'credential'),
      };
    case 'result':
      return { type, id: requireString(msg, 'id'), ...withValue(msg.value) };
    case 'snapshot':
      return { type, watchId: requireString(msg, 'watchId'), ...withValue(msg.value) };
    case 'error': {
      const code = msg.code;
      return {
        type,
        id: optionalString(msg, 'id'),
        code: isStoreErrorCode(code) ? code : 'internal',
        message: optionalString(msg, 'message') ?? 'Unknown relay error',
      };
    }
    case 'pong':
      return { type, id: requireString(msg, 'id') };
    default:
      throw new ProtocolError(`Unknown message type: ${type}`);
  }
}
