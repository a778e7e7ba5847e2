/**
 * Monitoring data published by the primary and read back by secondaries.
 *
 * Stored field names are short (lat/lon) for anchor and position, matching
 * what observers on other platforms read.
 */

import { isStoreObject, type StoreObject, type StoreValue } from '@anchorwatch/store';

export interface Anchor {
  id: string;
  latitude: number;
  longitude: number;
  /** Alarm radius in meters */
  radius: number;
  createdAt: number;
  isActive: boolean;
}

/** An anchor as a secondary sees it; the store does not carry the id. */
export type RemoteAnchor = Omit<Anchor, 'id'>;

export interface PositionUpdate {
  timestamp: number;
  latitude: number;
  longitude: number;
  speed?: number;
  accuracy?: number;
  heading?: number;
}

export type AlarmType = 'driftExceeded' | 'gpsLost' | 'gpsInaccurate';
export type AlarmSeverity = 'alarm' | 'warning';

export interface AlarmEvent {
  id: string;
  type: AlarmType;
  severity: AlarmSeverity;
  timestamp: number;
  latitude: number;
  longitude: number;
  distanceFromAnchor: number;
  acknowledged: boolean;
  acknowledgedAt?: number;
}

const ALARM_TYPES: readonly AlarmType[] = ['driftExceeded', 'gpsLost', 'gpsInaccurate'];

function isAlarmType(value: unknown): value is AlarmType {
  return ALARM_TYPES.some(t => t === value);
}

function isSeverity(value: unknown): value is AlarmSeverity {
  return value === 'alarm' || value === 'warning';
}

function num(value: StoreValue | undefined): value is number {
  return typeof value === 'number';
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeAnchor(anchor: Anchor): StoreObject {
  return {
    lat: anchor.latitude,
    lon: anchor.longitude,
    radius: anchor.radius,
    isActive: anchor.isActive,
    createdAt: anchor.createdAt,
  };
}

export function serializePosition(position: PositionUpdate): StoreObject {
  const record: StoreObject = {
    lat: position.latitude,
    lon: position.longitude,
    timestamp: position.timestamp,
  };
  if (position.speed !== undefined) record.speed = position.speed;
  if (position.accuracy !== undefined) record.accuracy = position.accuracy;
  if (position.heading !== undefined) record.heading = position.heading;
  return record;
}

export function serializeAlarm(alarm: AlarmEvent): StoreObject {
  const record: StoreObject = {
    type: alarm.type,
    severity: alarm.severity,
    timestamp: alarm.timestamp,
    latitude: alarm.latitude,
    longitude: alarm.longitude,
    distanceFromAnchor: alarm.distanceFromAnchor,
    acknowledged: alarm.acknowledged,
  };
  if (alarm.acknowledgedAt !== undefined) record.acknowledgedAt = alarm.acknowledgedAt;
  return record;
}

// ============================================================================
// Parsing (lenient: malformed publication fields read as absent)
// ============================================================================

export function parseRemoteAnchor(raw: StoreValue | undefined): RemoteAnchor | undefined {
  if (!isStoreObject(raw)) return undefined;
  const { lat, lon, radius, createdAt } = raw;
  if (!num(lat) || !num(lon) || !num(radius)) return undefined;
  return {
    latitude: lat,
    longitude: lon,
    radius,
    createdAt: num(createdAt) ? createdAt : 0,
    isActive: raw.isActive !== false,
  };
}

export function parsePosition(raw: StoreValue | undefined): PositionUpdate | undefined {
  if (!isStoreObject(raw)) return undefined;
  const { lat, lon, timestamp, speed, accuracy, heading } = raw;
  if (!num(lat) || !num(lon) || !num(timestamp)) return undefined;
  const position: PositionUpdate = { latitude: lat, longitude: lon, timestamp };
  if (num(speed)) position.speed = speed;
  if (num(accuracy)) position.accuracy = accuracy;
  if (num(heading)) position.heading = heading;
  return position;
}

export function parseAlarm(id: string, raw: StoreValue | undefined): AlarmEvent | undefined {
  if (!isStoreObject(raw)) return undefined;
  const { type, severity, timestamp, latitude, longitude, distanceFromAnchor, acknowledgedAt } = raw;
  if (!isAlarmType(type) || !isSeverity(severity)) return undefined;
  if (!num(timestamp) || !num(latitude) || !num(longitude)) return undefined;
  const alarm: AlarmEvent = {
    id,
    type,
    severity,
    timestamp,
    latitude,
    longitude,
    distanceFromAnchor: num(distanceFromAnchor) ? distanceFromAnchor : 0,
    acknowledged: raw.acknowledged === true,
  };
  if (num(acknowledgedAt)) alarm.acknowledgedAt = acknowledgedAt;
  return alarm;
}

/**
 * Alarms keyed by id, newest first.
 */
export function parseAlarms(raw: StoreValue | undefined): AlarmEvent[] {
  if (!isStoreObject(raw)) return [];
  const alarms: AlarmEvent[] = [];
  for (const [id, value] of Object.entries(raw)) {
    const alarm = parseAlarm(id, value);
    if (alarm) alarms.push(alarm);
  }
  return alarms.sort((a, b) => b.timestamp - a.timestamp);
}

export function isActiveAlarm(alarm: AlarmEvent): boolean {
  return !alarm.acknowledged;
}
