/**
 * Path scheme of the pairing documents.
 *
 *   sessions/{token}                      session record
 *   sessions/{token}/devices/{deviceId}   device entry
 *   sessions/{token}/alarms/{alarmId}     published alarm
 *   deviceSessions/{identity}             reverse index: owner -> token
 */

import { StoreError } from './errors.js';
import type { StorePath } from './types.js';

export const SESSIONS_ROOT = 'sessions';
export const DEVICE_SESSIONS_ROOT = 'deviceSessions';
export const DEVICES_KEY = 'devices';
export const ALARMS_KEY = 'alarms';

const INVALID_SEGMENT = /[.#$[\]/]/;

export function isValidSegment(segment: string): boolean {
  return segment.length > 0 && !INVALID_SEGMENT.test(segment);
}

function segment(value: string, what: string): string {
  if (!isValidSegment(value)) {
    throw new StoreError('invalid-argument', `Invalid ${what}: "${value}"`);
  }
  return value;
}

/**
 * Split a path into segments, ignoring leading, trailing and doubled slashes.
 * An empty path addresses the root.
 */
export function splitPath(path: StorePath): string[] {
  const segments = typeof path === 'string'
    ? path.split('/').filter(s => s.length > 0)
    : [...path];
  for (const s of segments) segment(s, 'path segment');
  return segments;
}

export function joinPath(...segments: string[]): string {
  return segments.join('/');
}

export function sessionPath(token: string): string {
  return joinPath(SESSIONS_ROOT, segment(token, 'session token'));
}

export function sessionDevicesPath(token: string): string {
  return joinPath(sessionPath(token), DEVICES_KEY);
}

export function sessionDevicePath(token: string, deviceId: string): string {
  return joinPath(sessionDevicesPath(token), segment(deviceId, 'device id'));
}

export function sessionAlarmsPath(token: string): string {
  return joinPath(sessionPath(token), ALARMS_KEY);
}

export function sessionAlarmPath(token: string, alarmId: string): string {
  return joinPath(sessionAlarmsPath(token), segment(alarmId, 'alarm id'));
}

export function ownedSessionPath(identity: string): string {
  return joinPath(DEVICE_SESSIONS_ROOT, segment(identity, 'identity'));
}

/**
 * True when one path equals or contains the other.
 */
export function pathsOverlap(a: readonly string[], b: readonly string[]): boolean {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
