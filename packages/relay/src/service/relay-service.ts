/**
 * RelayService - the passive document store behind the relay.
 *
 * Holds one document tree, issues anonymous identities, and checks every
 * operation against the pairing access rules and the configured limits.
 * It has no notion of sessions beyond those rules.
 */

import { randomUUID } from 'node:crypto';
import {
  DocumentTree,
  SESSIONS_ROOT,
  StoreError,
  authorizeRead,
  authorizeWrite,
  type StorePath,
  type StoreValue,
  type TreeListener,
  type Unsubscribe,
  type WriteRequest,
} from '@anchorwatch/store';
import type { RelayConfig } from '../config/types.js';
import { authLog, serviceLog } from '../common/logger.js';

export interface RelayServiceOptions {
  config: RelayConfig;
  /** Clock used for expiry rules */
  now?: () => number;
}

export interface RelayIdentity {
  identity: string;
  credential: string;
}

export interface RelayStatus {
  connectedClients: number;
  watchers: number;
  sessions: number;
  uptime: number;
}

export class RelayService {
  private readonly config: RelayConfig;
  private readonly now: () => number;
  private readonly tree = new DocumentTree();
  /** credential -> identity */
  private readonly credentials: Map<string, string> = new Map();
  private connectedClients = 0;
  private readonly startedAt: number;

  constructor(options: RelayServiceOptions) {
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.startedAt = Date.now();
  }

  // ==========================================================================
  // Identity
  // ==========================================================================

  /**
   * Resolve a credential to its identity. An unknown or missing credential
   * gets a fresh anonymous identity.
   */
  authenticate(credential?: string): RelayIdentity {
    if (credential !== undefined) {
      const identity = this.credentials.get(credential);
      if (identity) {
        // Re-insert so the map stays in least-recently-used order
        this.credentials.delete(credential);
        this.credentials.set(credential, identity);
        authLog('Resumed identity %s', identity);
        return { identity, credential };
      }
      authLog('Unknown credential, issuing a new identity');
    }
    return this.issueIdentity();
  }

  issueIdentity(): RelayIdentity {
    const identity = `anon-${randomUUID().replace(/-/g, '').slice(0, 20)}`;
    const credential = randomUUID();
    this.credentials.set(credential, identity);
    authLog('Issued identity %s', identity);
    this.evictIdentities();
    return { identity, credential };
  }

  /** Number of credentials currently resolvable. */
  get identityCount(): number {
    return this.credentials.size;
  }

  private evictIdentities(): void {
    const limit = this.config.limits.maxIdentities;
    for (const oldest of this.credentials.keys()) {
      if (this.credentials.size <= limit) break;
      authLog('Dropping credential of %s', this.credentials.get(oldest));
      this.credentials.delete(oldest);
    }
  }

  // ==========================================================================
  // Document operations
  // ==========================================================================

  read(identity: string | undefined, path: StorePath): StoreValue | undefined {
    authorizeRead(identity);
    return this.tree.get(path);
  }

  write(request: WriteRequest): void {
    authorizeWrite(this.tree, request, {
      now: this.now(),
      maxSessions: this.config.limits.maxSessions,
    });
    this.checkSize(request);

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
    serviceLog('%s %s by %s', request.operation, pathLabel(request.path), request.identity);
  }

  watch(identity: string | undefined, path: StorePath, listener: TreeListener): Unsubscribe {
    authorizeRead(identity);
    return this.tree.watch(path, listener);
  }

  // ==========================================================================
  // Connections & status
  // ==========================================================================

  connectionOpened(): void {
    this.connectedClients++;
  }

  connectionClosed(): void {
    this.connectedClients = Math.max(0, this.connectedClients - 1);
  }

  getStatus(): RelayStatus {
    return {
      connectedClients: this.connectedClients,
      watchers: this.tree.watchCount,
      sessions: this.tree.childCount([SESSIONS_ROOT]),
      uptime: Date.now() - this.startedAt,
    };
  }

  async shutdown(): Promise<void> {
    serviceLog('Shutting down with %d connected clients', this.connectedClients);
    this.tree.clear();
    this.credentials.clear();
  }

  private checkSize(request: WriteRequest): void {
    const payload = request.operation === 'set'
      ? request.value
      : request.operation === 'update' ? request.changes : undefined;
    if (payload === undefined) return;

    const bytes = Buffer.byteLength(JSON.stringify(payload), 'utf-8');
    if (bytes > this.config.limits.maxValueBytes) {
      throw new StoreError(
        'resource-exhausted',
        `Write of ${bytes} bytes exceeds the ${this.config.limits.maxValueBytes} byte limit`
      );
    }
  }
}

function pathLabel(path: StorePath): string {
  return typeof path === 'string' ? path : path.join('/');
}
