/**
 * WebSocketRemoteStore - RemoteStore client for the anchorwatch relay.
 *
 * Handles:
 * - Connection and hello handshake (stable identity via a stored credential)
 * - Request/response correlation with per-request timeouts
 * - Watch subscriptions, re-sent after every reconnect
 * - Reconnection with exponential backoff
 */

import { StoreError } from '../common/errors.js';
import { wsLog } from '../common/logger.js';
import { splitPath } from '../common/paths.js';
import type {
  RemoteStore,
  StorePath,
  StoreUpdate,
  StoreValue,
  Unsubscribe,
  WatchErrorListener,
  WatchListener,
} from '../common/types.js';
import { parseServerMessage, type ClientMessage, type ServerMessage } from './protocol.js';
import { connectWebSocket, type SocketFactory, type SocketLike } from './socket.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_RECONNECT_DELAY_MS = 1000;
const DEFAULT_MAX_RECONNECT_DELAY_MS = 60_000;

export type ConnectionStatus =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'connected'; identity: string };

export interface WebSocketRemoteStoreOptions {
  /** Relay WebSocket URL, e.g. ws://host:8080/relay/ws */
  url: string;
  /** Credential saved from an earlier connection */
  credential?: string;
  /** Called whenever the relay confirms (or issues) a credential */
  onCredential?: (credential: string, identity: string) => void;
  /** Called on connection status changes */
  onStatusChange?: (status: ConnectionStatus) => void;
  requestTimeoutMs?: number;
  autoReconnect?: boolean;
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
  /** Socket factory; defaults to the `ws` package */
  createSocket?: SocketFactory;
}

interface PendingRequest {
  resolve: (message: ServerMessage) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

interface WatchEntry {
  path: string;
  listener: WatchListener;
  onError?: WatchErrorListener;
}

export class WebSocketRemoteStore implements RemoteStore {
  private readonly options: Required<Pick<WebSocketRemoteStoreOptions,
    'requestTimeoutMs' | 'autoReconnect' | 'reconnectDelayMs' | 'maxReconnectDelayMs' | 'createSocket'
  >> & WebSocketRemoteStoreOptions;

  private socket: SocketLike | null = null;
  private connecting: Promise<void> | null = null;
  private ready = false;
  private _status: ConnectionStatus = { status: 'disconnected' };
  private _identity: string | undefined = undefined;
  private credential: string | undefined;

  private nextId = 1;
  private readonly pending: Map<string, PendingRequest> = new Map();
  private readonly watches: Map<string, WatchEntry> = new Map();

  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  constructor(options: WebSocketRemoteStoreOptions) {
    this.options = {
      ...options,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      autoReconnect: options.autoReconnect ?? true,
      reconnectDelayMs: options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS,
      maxReconnectDelayMs: options.maxReconnectDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS,
      createSocket: options.createSocket ?? connectWebSocket,
    };
    this.credential = options.credential;
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  get identity(): string | undefined {
    return this._identity;
  }

  get isConnected(): boolean {
    return this.ready && this.socket?.isOpen === true;
  }

  // ==========================================================================
  // RemoteStore
  // ==========================================================================

  async ensureAuthenticated(): Promise<string> {
    await this.connect();
    return this.requireIdentity();
  }

  async refreshAuthentication(): Promise<string> {
    await this.connect();
    await this.hello();
    return this.requireIdentity();
  }

  async get(path: StorePath): Promise<StoreValue | undefined> {
    const reply = await this.request({ type: 'get', id: this.newId(), path: normalizePath(path) });
    return reply.type === 'result' ? reply.value : undefined;
  }

  async set(path: StorePath, value: StoreValue): Promise<void> {
    await this.request({ type: 'set', id: this.newId(), path: normalizePath(path), value });
  }

  async update(path: StorePath, changes: StoreUpdate): Promise<void> {
    await this.request({ type: 'update', id: this.newId(), path: normalizePath(path), changes });
  }

  async delete(path: StorePath): Promise<void> {
    await this.request({ type: 'delete', id: this.newId(), path: normalizePath(path) });
  }

  watch(path: StorePath, listener: WatchListener, onError?: WatchErrorListener): Unsubscribe {
    const watchId = `w${this.newId()}`;
    const entry: WatchEntry = { path: normalizePath(path), listener, onError };
    this.watches.set(watchId, entry);

    if (this.isConnected) {
      this.send({ type: 'watch', id: watchId, path: entry.path });
    } else {
      // Sent by resubscribe() once the handshake completes
      this.connect().catch((err: unknown) => {
        wsLog('Watch %s waiting for connection: %O', watchId, err);
        if (this.watches.get(watchId) === entry) {
          entry.onError?.(toError(err));
        }
      });
    }

    return () => {
      if (!this.watches.delete(watchId)) return;
      if (this.isConnected) {
        this.send({ type: 'unwatch', id: this.newId(), watchId });
      }
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.clearReconnectTimer();
    this.watches.clear();
    this.rejectPending(new StoreError('cancelled', 'Store closed'));
    const socket = this.socket;
    this.socket = null;
    this.ready = false;
    socket?.close();
    this.setStatus({ status: 'disconnected' });
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  /**
   * Open the socket and complete the handshake; shared by concurrent callers.
   */
  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new StoreError('cancelled', 'Store closed'));
    }
    if (this.isConnected) return Promise.resolve();
    if (this.connecting) return this.connecting;

    this.clearReconnectTimer();
    this.setStatus({ status: 'connecting' });

    this.connecting = new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        this.connecting = null;
        if (error) reject(error);
        else resolve();
      };

      const socket = this.options.createSocket(this.options.url, {
        onOpen: () => {
          if (this.socket !== socket) return;
          this.hello().then(
            () => {
              this.ready = true;
              this.reconnectAttempts = 0;
              this.resubscribe();
              settle();
            },
            (err: unknown) => {
              settle(toError(err));
              socket.close();
            }
          );
        },
        onMessage: (data) => {
          if (this.socket === socket) this.handleMessage(data);
        },
        onClose: (code, reason) => {
          if (this.socket !== socket) return;
          this.handleClose(code, reason);
          settle(new StoreError('unavailable', `Connection closed (${code})`));
        },
        onError: (err) => {
          wsLog('Socket error: %s', err.message);
          settle(new StoreError('unavailable', `Connection failed: ${err.message}`, err));
        },
      });
      this.socket = socket;
    });

    return this.connecting;
  }

  private async hello(): Promise<void> {
    const message: ClientMessage = this.credential === undefined
      ? { type: 'hello', id: this.newId() }
      : { type: 'hello', id: this.newId(), credential: this.credential };
    const reply = await this.dispatch(message);
    if (reply.type !== 'hello_ack') {
      throw new StoreError('internal', `Unexpected handshake reply: ${reply.type}`);
    }

    this._identity = reply.identity;
    this.credential = reply.credential;
    this.setStatus({ status: 'connected', identity: reply.identity });
    wsLog('Authenticated as %s', reply.identity);
    this.options.onCredential?.(reply.credential, reply.identity);
  }

  private resubscribe(): void {
    for (const [watchId, entry] of this.watches) {
      this.send({ type: 'watch', id: watchId, path: entry.path });
    }
  }

  private handleClose(code: number, reason: string): void {
    wsLog('Connection closed: %d %s', code, reason);
    this.socket = null;
    this.ready = false;
    this.rejectPending(new StoreError('unavailable', 'Connection lost'));
    this.setStatus({ status: 'disconnected' });
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closed || !this.options.autoReconnect || this.reconnectTimer) {
      return;
    }

    // Exponential backoff: 1s, 2s, 4s, 8s, ... up to max
    const delay = Math.min(
      this.options.reconnectDelayMs * Math.pow(2, this.reconnectAttempts),
      this.options.maxReconnectDelayMs
    );
    this.reconnectAttempts++;
    wsLog('Reconnecting in %dms (attempt %d)', delay, this.reconnectAttempts);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((err: unknown) => {
        // The close handler schedules the next attempt
        wsLog('Reconnect failed: %s', toError(err).message);
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ==========================================================================
  // Messaging
  // ==========================================================================

  private async request(message: ClientMessage): Promise<ServerMessage> {
    await this.connect();
    return this.dispatch(message);
  }

  private dispatch(message: ClientMessage): Promise<ServerMessage> {
    return new Promise<ServerMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(message.id);
        reject(new StoreError('unavailable', `Request ${message.type} timed out`));
      }, this.options.requestTimeoutMs);

      this.pending.set(message.id, { resolve, reject, timer });
      if (!this.send(message)) {
        clearTimeout(timer);
        this.pending.delete(message.id);
        reject(new StoreError('unavailable', 'Not connected'));
      }
    });
  }

  private send(message: ClientMessage): boolean {
    if (!this.socket?.isOpen) return false;
    this.socket.send(JSON.stringify(message));
    return true;
  }

  private handleMessage(data: string): void {
    let message: ServerMessage;
    try {
      message = parseServerMessage(data);
    } catch (err) {
      wsLog('Dropping malformed message: %O', err);
      return;
    }

    switch (message.type) {
      case 'snapshot': {
        const entry = this.watches.get(message.watchId);
        if (entry) entry.listener(message.value);
        break;
      }

      case 'error': {
        const error = new StoreError(message.code, message.message);
        if (message.id !== undefined && this.settle(message.id, undefined, error)) break;
        const entry = message.id !== undefined ? this.watches.get(message.id) : undefined;
        if (entry && message.id !== undefined) {
          this.watches.delete(message.id);
          entry.onError?.(error);
          break;
        }
        wsLog('Relay error: %s (%s)', message.message, message.code);
        break;
      }

      default:
        if (!this.settle(message.id, message)) {
          wsLog('Reply for unknown request %s', message.id);
        }
    }
  }

  private settle(id: string, message?: ServerMessage, error?: Error): boolean {
    const request = this.pending.get(id);
    if (!request) return false;
    this.pending.delete(id);
    clearTimeout(request.timer);
    if (error) request.reject(error);
    else if (message) request.resolve(message);
    return true;
  }

  private rejectPending(error: Error): void {
    for (const [id, request] of this.pending) {
      clearTimeout(request.timer);
      request.reject(error);
      this.pending.delete(id);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private newId(): string {
    return String(this.nextId++);
  }

  private requireIdentity(): string {
    if (this._identity === undefined) {
      throw new StoreError('unauthenticated', 'No identity after handshake');
    }
    return this._identity;
  }

  private setStatus(status: ConnectionStatus): void {
    this._status = status;
    this.options.onStatusChange?.(status);
  }
}

function normalizePath(path: StorePath): string {
  return splitPath(path).join('/');
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new StoreError('internal', String(err));
}
