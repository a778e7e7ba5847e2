/**
 * In-process remote store.
 *
 * A MemoryBackend plays the server: one document tree, the pairing access
 * rules and a session quota. Each device gets its own MemoryRemoteStore
 * handle with a stable identity. Operations and watch deliveries are
 * asynchronous, as they would be over a network.
 */

import { randomUUID } from 'node:crypto';
import { DocumentTree } from '../common/document-tree.js';
import { StoreError } from '../common/errors.js';
import { memoryLog } from '../common/logger.js';
import { splitPath } from '../common/paths.js';
import { authorizeRead, authorizeWrite, type WriteRequest } from '../common/rules.js';
import type {
  RemoteStore,
  StorePath,
  StoreUpdate,
  StoreValue,
  Unsubscribe,
  WatchErrorListener,
  WatchListener,
} from '../common/types.js';

export type MemoryOperation = 'auth' | 'get' | 'set' | 'update' | 'delete';

export interface MemoryBackendOptions {
  /** Apply the pairing access rules (default true) */
  enforceRules?: boolean;
  /** Maximum number of session records */
  maxSessions?: number;
  /** Clock used for expiry rules */
  now?: () => number;
}

export interface MemoryStoreCall {
  operation: MemoryOperation;
  path: string;
}

/**
 * Shared state behind every MemoryRemoteStore handle.
 */
export class MemoryBackend {
  private readonly tree = new DocumentTree();
  private readonly options: Required<Pick<MemoryBackendOptions, 'enforceRules' | 'now'>> & MemoryBackendOptions;
  private offline = false;

  constructor(options: MemoryBackendOptions = {}) {
    this.options = {
      ...options,
      enforceRules: options.enforceRules ?? true,
      now: options.now ?? Date.now,
    };
  }

  /**
   * Create a client handle for one device.
   */
  connect(identity: string = `device-${randomUUID().slice(0, 8)}`): MemoryRemoteStore {
    return new MemoryRemoteStore(this, identity);
  }

  /** While offline every operation fails with 'unavailable'. */
  setOffline(offline: boolean): void {
    memoryLog('Backend %s', offline ? 'offline' : 'online');
    this.offline = offline;
  }

  get isOffline(): boolean {
    return this.offline;
  }

  /** Read without rules (test inspection). */
  peek(path: StorePath): StoreValue | undefined {
    return this.tree.get(path);
  }

  /** Write without rules (test setup). */
  seed(path: StorePath, value: StoreValue | undefined): void {
    this.tree.set(path, value);
  }

  get watchCount(): number {
    return this.tree.watchCount;
  }

  // ==========================================================================
  // Operations used by client handles
  // ==========================================================================

  read(identity: string | undefined, path: StorePath): StoreValue | undefined {
    this.checkOnline();
    if (this.options.enforceRules) authorizeRead(identity);
    return this.tree.get(path);
  }

  write(request: WriteRequest): void {
    this.checkOnline();
    if (this.options.enforceRules) {
      authorizeWrite(this.tree, request, {
        now: this.options.now(),
        maxSessions: this.options.maxSessions,
      });
    }
    switch (request.operation) {
      case 'set':
        this.tree.set(request.path, request.value);
        break;
      case 'update':
        this.tree.update(request.path, request.changes);
        break;
      case 'delete':
        this.tree.delete(request.path);
        break;
    }
  }

  observe(identity: string | undefined, path: StorePath, listener: (value: StoreValue | undefined) => void): Unsubscribe {
    if (this.options.enforceRules) authorizeRead(identity);
    return this.tree.watch(path, listener);
  }

  private checkOnline(): void {
    if (this.offline) {
      throw new StoreError('unavailable', 'Backend is offline');
    }
  }
}

interface InjectedFault {
  operation: MemoryOperation;
  path?: string;
  error: StoreError;
  remaining: number;
}

/**
 * One device's view of a MemoryBackend.
 */
export class MemoryRemoteStore implements RemoteStore {
  private readonly backend: MemoryBackend;
  private readonly deviceIdentity: string;
  private authenticated = false;
  private closed = false;
  private readonly faults: InjectedFault[] = [];
  private readonly subscriptions: Set<Unsubscribe> = new Set();

  /** Every operation attempted through this handle, in order. */
  readonly calls: MemoryStoreCall[] = [];
  /** Number of refreshAuthentication() calls. */
  authRefreshCount = 0;

  constructor(backend: MemoryBackend, identity: string) {
    this.backend = backend;
    this.deviceIdentity = identity;
  }

  get identity(): string | undefined {
    return this.authenticated ? this.deviceIdentity : undefined;
  }

  /**
   * Make the next matching operation(s) fail with the given error.
   */
  failNext(operation: MemoryOperation, error: StoreError, options: { times?: number; path?: string } = {}): void {
    this.faults.push({
      operation,
      path: options.path,
      error,
      remaining: options.times ?? 1,
    });
  }

  async ensureAuthenticated(): Promise<string> {
    await this.begin('auth', '');
    if (!this.authenticated && this.backend.isOffline) {
      throw new StoreError('unavailable', 'Cannot sign in while offline');
    }
    this.authenticated = true;
    return this.deviceIdentity;
  }

  async refreshAuthentication(): Promise<string> {
    this.authRefreshCount++;
    this.authenticated = false;
    return this.ensureAuthenticated();
  }

  async get(path: StorePath): Promise<StoreValue | undefined> {
    await this.begin('get', path);
    return this.backend.read(this.identity, path);
  }

  async set(path: StorePath, value: StoreValue): Promise<void> {
    await this.begin('set', path);
    this.backend.write({ identity: this.identity, operation: 'set', path, value });
  }

  async update(path: StorePath, changes: StoreUpdate): Promise<void> {
    await this.begin('update', path);
    this.backend.write({ identity: this.identity, operation: 'update', path, changes });
  }

  async delete(path: StorePath): Promise<void> {
    await this.begin('delete', path);
    this.backend.write({ identity: this.identity, operation: 'delete', path });
  }

  watch(path: StorePath, listener: WatchListener, onError?: WatchErrorListener): Unsubscribe {
    let active = true;
    let cancel: Unsubscribe | undefined;

    const unsubscribe = () => {
      if (!active) return;
      active = false;
      cancel?.();
      this.subscriptions.delete(unsubscribe);
    };
    this.subscriptions.add(unsubscribe);

    const deliver = (value: StoreValue | undefined) => {
      queueMicrotask(() => {
        if (active) listener(value);
      });
    };

    // Attach on a later tick so cancelling immediately never delivers
    queueMicrotask(() => {
      if (!active) return;
      try {
        cancel = this.backend.observe(this.identity, path, deliver);
      } catch (err) {
        active = false;
        this.subscriptions.delete(unsubscribe);
        const error = err instanceof Error ? err : new StoreError('internal', String(err));
        memoryLog('Watch on %s rejected: %s', pathKey(path), error.message);
        onError?.(error);
      }
    });

    return unsubscribe;
  }

  /** Active watch subscriptions held by this handle. */
  get watchCount(): number {
    return this.subscriptions.size;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const unsubscribe of [...this.subscriptions]) {
      unsubscribe();
    }
  }

  private async begin(operation: MemoryOperation, path: StorePath): Promise<void> {
    const key = pathKey(path);
    this.calls.push({ operation, path: key });
    await Promise.resolve();

    if (this.closed) {
      throw new StoreError('cancelled', 'Store handle is closed');
    }

    const fault = this.faults.find(f => f.operation === operation && (f.path === undefined || f.path === key));
    if (fault) {
      fault.remaining--;
      if (fault.remaining <= 0) {
        this.faults.splice(this.faults.indexOf(fault), 1);
      }
      memoryLog('Injected %s failure on %s: %s', operation, key, fault.error.code);
      throw fault.error;
    }
  }
}

function pathKey(path: StorePath): string {
  return splitPath(path).join('/');
}
