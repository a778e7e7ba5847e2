/**
 * Sync Coordinator
 *
 * While this device is primary with a session token, publishes the anchor,
 * the boat position and the active alarms into the session record. Each
 * value is written only when it differs from what was last published
 * successfully.
 */

import type { StoreObject, StoreUpdate, Unsubscribe } from '@anchorwatch/store';
import { errorMessage } from '../common/errors.js';
import { syncLog } from '../common/logger.js';
import { SerialQueue } from '../common/serial-queue.js';
import { ValueStream, type ReadonlyValueStream } from '../common/value-stream.js';
import { DEFAULT_PAIRING_CONFIG, type SyncSettings } from '../config/types.js';
import {
  isActiveAlarm,
  serializeAlarm,
  serializeAnchor,
  serializePosition,
  type AlarmEvent,
} from '../model/domain.js';
import type { PairingRoleState } from '../model/role-state.js';
import type { PairingRoleCoordinator } from '../role/role-coordinator.js';
import type { SessionRepository } from '../session/session-repository.js';
import type { DomainDataProducer } from './domain-source.js';

export interface SyncCoordinatorOptions {
  roles: PairingRoleCoordinator;
  repository: SessionRepository;
  producer: DomainDataProducer;
  settings?: Partial<SyncSettings>;
  /** Clock for the position throttle (default Date.now) */
  now?: () => number;
}

export type SyncStatus =
  | { status: 'idle' }
  | { status: 'starting'; token: string }
  | { status: 'active'; token: string };

type DataKind = 'anchor' | 'position' | 'alarms';

/** Everything owned by one publishing run. */
interface Publication {
  token: string;
  started: boolean;
  detach: Unsubscribe[];
  /** Serialized form of the last published values */
  anchorKey?: string;
  positionKey?: string;
  alarmKeys: Map<string, string>;
  lastPositionAt?: number;
  positionTimer?: NodeJS.Timeout;
}

const IDLE: SyncStatus = { status: 'idle' };

function statusEqual(a: SyncStatus, b: SyncStatus): boolean {
  if (a.status === 'idle' || b.status === 'idle') return a.status === b.status;
  return a.status === b.status && a.token === b.token;
}

function publishedToken(state: PairingRoleState): string | undefined {
  return state.role === 'primary' ? state.localSessionToken : undefined;
}

function keyOf(value: StoreObject | undefined): string {
  return JSON.stringify(value ?? null);
}

function activeAlarmRecords(alarms: readonly AlarmEvent[]): Map<string, StoreObject> {
  const records = new Map<string, StoreObject>();
  for (const alarm of alarms) {
    if (isActiveAlarm(alarm)) records.set(alarm.id, serializeAlarm(alarm));
  }
  return records;
}

export class SyncCoordinator {
  private readonly roles: PairingRoleCoordinator;
  private readonly repository: SessionRepository;
  private readonly producer: DomainDataProducer;
  private readonly settings: SyncSettings;
  private readonly now: () => number;
  private readonly ops = new SerialQueue();
  private readonly statusStream = new ValueStream<SyncStatus>(IDLE, statusEqual);
  private readonly detachRoles: Unsubscribe[] = [];
  private publication: Publication | undefined;
  private targetToken: string | undefined;
  private disposed = false;

  constructor(options: SyncCoordinatorOptions) {
    this.roles = options.roles;
    this.repository = options.repository;
    this.producer = options.producer;
    this.settings = { ...DEFAULT_PAIRING_CONFIG.sync, ...options.settings };
    this.now = options.now ?? Date.now;

    this.detachRoles.push(
      this.roles.onLeaving((_state, { sessionGone }) => this.stop({ remote: !sessionGone })),
      this.roles.subscribe(state => this.handleRoleState(state), { emitCurrent: true })
    );
  }

  get status(): SyncStatus {
    return this.statusStream.value;
  }

  get statuses(): ReadonlyValueStream<SyncStatus> {
    return this.statusStream;
  }

  /** Token currently being published to, if any. */
  get activeToken(): string | undefined {
    return this.publication?.token;
  }

  /** Settles once queued publications have finished. */
  whenIdle(): Promise<void> {
    return this.ops.whenIdle();
  }

  /**
   * Stop publishing and mark monitoring inactive (best-effort). With
   * `remote: false` nothing is written, for a record that no longer exists.
   */
  stop(options: { remote?: boolean } = {}): Promise<void> {
    this.targetToken = undefined;
    return this.ops.run(() => this.stopCurrent(options.remote ?? true));
  }

  /**
   * Detach from everything without further remote writes.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const detach of this.detachRoles.splice(0)) detach();
    const publication = this.publication;
    if (publication) {
      this.publication = undefined;
      this.release(publication);
    }
    this.statusStream.set(IDLE);
    this.statusStream.clear();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  private handleRoleState(state: PairingRoleState): void {
    const target = publishedToken(state);
    if (this.disposed || target === this.targetToken) return;
    this.targetToken = target;

    void this.ops.run(async () => {
      if (this.publication && this.publication.token !== target) {
        await this.stopCurrent();
      }
      if (target && !this.publication && this.targetToken === target && !this.disposed) {
        await this.startPublication(target);
      }
    }).catch(err => {
      syncLog('Role change handling failed: %s', errorMessage(err));
    });
  }

  private async startPublication(token: string): Promise<void> {
    const publication: Publication = {
      token,
      started: false,
      detach: [],
      alarmKeys: new Map(),
    };
    this.publication = publication;
    this.statusStream.set({ status: 'starting', token });
    syncLog('Starting publication to %s', token);

    publication.detach.push(
      this.producer.anchor.subscribe(() => this.schedule(publication, 'anchor')),
      this.producer.position.subscribe(() => this.schedule(publication, 'position')),
      this.producer.alarms.subscribe(() => this.schedule(publication, 'alarms'))
    );

    await this.activate(publication);
  }

  private async stopCurrent(remote = true): Promise<void> {
    const publication = this.publication;
    if (!publication) return;
    this.publication = undefined;
    this.release(publication);
    this.statusStream.set(IDLE);
    syncLog('Stopped publication to %s', publication.token);

    if (publication.started && remote) {
      try {
        await this.repository.updateSession(publication.token, { monitoringActive: false });
      } catch (err) {
        syncLog('Could not mark monitoring inactive on %s: %s', publication.token, errorMessage(err));
      }
    }
  }

  private release(publication: Publication): void {
    for (const detach of publication.detach.splice(0)) detach();
    if (publication.positionTimer) {
      clearTimeout(publication.positionTimer);
      publication.positionTimer = undefined;
    }
  }

  /**
   * First write of a run: monitoring flag plus every current value. On
   * failure the run stays unstarted and the next data change tries again.
   */
  private async activate(publication: Publication): Promise<void> {
    const anchor = this.producer.anchor.value;
    const position = this.producer.position.value;
    const alarms = activeAlarmRecords(this.producer.alarms.value);

    const anchorRecord = anchor ? serializeAnchor(anchor) : undefined;
    const positionRecord = position ? serializePosition(position) : undefined;
    const alarmsRecord: StoreObject = Object.fromEntries(alarms);

    const changes: StoreUpdate = {
      monitoringActive: true,
      anchor: anchorRecord ?? null,
      boatPosition: positionRecord ?? null,
      alarms: alarms.size > 0 ? alarmsRecord : null,
    };

    try {
      await this.repository.updateSession(publication.token, changes);
    } catch (err) {
      syncLog('Start on %s failed, retrying on next change: %s', publication.token, errorMessage(err));
      return;
    }

    publication.started = true;
    publication.anchorKey = keyOf(anchorRecord);
    publication.positionKey = keyOf(positionRecord);
    publication.lastPositionAt = this.now();
    publication.alarmKeys = new Map([...alarms].map(([id, record]): [string, string] => [id, keyOf(record)]));
    if (this.publication === publication) {
      this.statusStream.set({ status: 'active', token: publication.token });
    }
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  private schedule(publication: Publication, kind: DataKind): void {
    const interval = this.settings.positionIntervalMs;
    if (kind === 'position' && interval > 0 && publication.started) {
      if (publication.positionTimer) return;
      const last = publication.lastPositionAt ?? 0;
      const wait = last + interval - this.now();
      if (wait > 0) {
        publication.positionTimer = setTimeout(() => {
          publication.positionTimer = undefined;
          this.enqueue(publication, 'position');
        }, wait);
        return;
      }
    }
    this.enqueue(publication, kind);
  }

  private enqueue(publication: Publication, kind: DataKind): void {
    void this.ops.run(() => this.publish(publication, kind)).catch(err => {
      syncLog('Publishing %s failed: %s', kind, errorMessage(err));
    });
  }

  private async publish(publication: Publication, kind: DataKind): Promise<void> {
    if (this.publication !== publication) return;
    if (!publication.started) {
      await this.activate(publication);
      return;
    }

    switch (kind) {
      case 'anchor':
        await this.publishAnchor(publication);
        break;
      case 'position':
        await this.publishPosition(publication);
        break;
      case 'alarms':
        await this.publishAlarms(publication);
        break;
    }
  }

  private async publishAnchor(publication: Publication): Promise<void> {
    const anchor = this.producer.anchor.value;
    const record = anchor ? serializeAnchor(anchor) : undefined;
    const key = keyOf(record);
    if (key === publication.anchorKey) return;

    try {
      await this.repository.updateSession(publication.token, { anchor: record ?? null });
      publication.anchorKey = key;
    } catch (err) {
      syncLog('Anchor publish failed: %s', errorMessage(err));
    }
  }

  private async publishPosition(publication: Publication): Promise<void> {
    const position = this.producer.position.value;
    const record = position ? serializePosition(position) : undefined;
    const key = keyOf(record);
    if (key === publication.positionKey) return;

    publication.lastPositionAt = this.now();
    try {
      await this.repository.updateSession(publication.token, { boatPosition: record ?? null });
      publication.positionKey = key;
    } catch (err) {
      syncLog('Position publish failed: %s', errorMessage(err));
    }
  }

  /**
   * Write new or changed active alarms; delete ones that left the set.
   */
  private async publishAlarms(publication: Publication): Promise<void> {
    const desired = activeAlarmRecords(this.producer.alarms.value);

    for (const [id, record] of desired) {
      const key = keyOf(record);
      if (publication.alarmKeys.get(id) === key) continue;
      try {
        await this.repository.putAlarm(publication.token, id, record);
        publication.alarmKeys.set(id, key);
      } catch (err) {
        syncLog('Alarm %s publish failed: %s', id, errorMessage(err));
      }
    }

    for (const id of [...publication.alarmKeys.keys()]) {
      if (desired.has(id)) continue;
      try {
        await this.repository.deleteAlarm(publication.token, id);
        publication.alarmKeys.delete(id);
      } catch (err) {
        syncLog('Alarm %s removal failed: %s', id, errorMessage(err));
      }
    }
  }
}
