/**
 * @anchorwatch/store - remote document store for anchorwatch pairing sessions.
 *
 * @example
 * ```typescript
 * import { MemoryBackend, sessionPath } from '@anchorwatch/store';
 *
 * const backend = new MemoryBackend();
 * const store = backend.connect('device-a');
 * await store.ensureAuthenticated();
 * const unwatch = store.watch(sessionPath(token), value => render(value));
 * ```
 */

// Contract and values
export {
  type StoreScalar,
  type StoreValue,
  type StoreObject,
  type StoreUpdate,
  type StorePath,
  type WatchListener,
  type WatchErrorListener,
  type Unsubscribe,
  type StoreAuthenticator,
  type RemoteStore,
  isStoreObject,
  isRecord,
  toStoreValue,
  toStoreUpdate,
  cloneValue,
  valuesEqual,
} from './common/types.js';

// Errors
export {
  type StoreErrorCode,
  StoreError,
  isStoreError,
  isStoreErrorCode,
  isPermissionDenied,
  isResourceExhausted,
} from './common/errors.js';

// Paths
export {
  SESSIONS_ROOT,
  DEVICE_SESSIONS_ROOT,
  DEVICES_KEY,
  ALARMS_KEY,
  isValidSegment,
  splitPath,
  joinPath,
  sessionPath,
  sessionDevicesPath,
  sessionDevicePath,
  sessionAlarmsPath,
  sessionAlarmPath,
  ownedSessionPath,
  pathsOverlap,
} from './common/paths.js';

// Tree and rules (backend building blocks)
export { DocumentTree, type TreeListener } from './common/document-tree.js';
export {
  type WriteOperation,
  type WriteRequest,
  type WritePolicy,
  authorizeRead,
  authorizeWrite,
} from './common/rules.js';

// Retry
export {
  type AuthRetryOptions,
  DEFAULT_AUTH_RETRIES,
  DEFAULT_AUTH_RETRY_DELAY_MS,
  withAuthRetry,
} from './common/auth-retry.js';

// Backends
export {
  type MemoryBackendOptions,
  type MemoryOperation,
  type MemoryStoreCall,
  MemoryBackend,
  MemoryRemoteStore,
} from './memory/memory-store.js';

export {
  type ConnectionStatus,
  type WebSocketRemoteStoreOptions,
  WebSocketRemoteStore,
} from './ws/ws-store.js';
export {
  type SocketHandlers,
  type SocketLike,
  type SocketFactory,
  connectWebSocket,
} from './ws/socket.js';
export {
  type ClientMessage,
  type ServerMessage,
  type HelloMessage,
  type HelloAckMessage,
  type GetMessage,
  type SetMessage,
  type UpdateMessage,
  type DeleteMessage,
  type WatchMessage,
  type UnwatchMessage,
  type PingMessage,
  type ResultMessage,
  type SnapshotMessage,
  type ErrorMessage,
  type PongMessage,
  ProtocolError,
  parseClientMessage,
  parseServerMessage,
} from './ws/protocol.js';

export { createLogger } from './common/logger.js';
