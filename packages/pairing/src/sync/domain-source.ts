/**
 * Producer side of the monitoring data: whatever tracks the anchor, the
 * boat position and alarms exposes them as streams.
 */

import { ValueStream, type ReadonlyValueStream } from '../common/value-stream.js';
import type { AlarmEvent, Anchor, PositionUpdate } from '../model/domain.js';

export interface DomainDataProducer {
  readonly anchor: ReadonlyValueStream<Anchor | undefined>;
  readonly position: ReadonlyValueStream<PositionUpdate | undefined>;
  readonly alarms: ReadonlyValueStream<readonly AlarmEvent[]>;
}

/**
 * In-memory producer fed by the host application.
 */
export class DomainDataSource implements DomainDataProducer {
  readonly anchor = new ValueStream<Anchor | undefined>(undefined);
  readonly position = new ValueStream<PositionUpdate | undefined>(undefined);
  readonly alarms = new ValueStream<readonly AlarmEvent[]>([]);

  setAnchor(anchor: Anchor | undefined): void {
    this.anchor.set(anchor);
  }

  updatePosition(position: PositionUpdate): void {
    this.position.set(position);
  }

  raiseAlarm(alarm: AlarmEvent): void {
    this.alarms.set([...this.alarms.value.filter(a => a.id !== alarm.id), alarm]);
  }

  acknowledgeAlarm(id: string, at: number = Date.now()): void {
    this.alarms.set(this.alarms.value.map(a => (a.id === id ? { ...a, acknowledged: true, acknowledgedAt: at } : a)));
  }

  clearAlarms(): void {
    this.alarms.set([]);
  }
}
