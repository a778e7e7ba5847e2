/**
 * Session records and their validating (de)serialization.
 *
 * parseSession is the only place a raw store value becomes a Session; any
 * record that does not hold together is reported as corrupted.
 */

import { isStoreObject, type StoreObject, type StoreValue } from '@anchorwatch/store';
import { CorruptedStateError } from '../common/errors.js';

export type DeviceRole = 'primary' | 'secondary';

export interface Device {
  deviceId: string;
  role: DeviceRole;
  joinedAt: number;
  lastSeenAt?: number;
}

export interface Session {
  token: string;
  ownerIdentity: string;
  devices: Record<string, Device>;
  createdAt: number;
  expiresAt: number;
  isActive: boolean;
}

export function isDeviceRole(value: unknown): value is DeviceRole {
  return value === 'primary' || value === 'secondary';
}

/**
 * A fresh session with its creator installed as the primary device.
 */
export function createSession(token: string, ownerIdentity: string, now: number, ttlMs: number): Session {
  return {
    token,
    ownerIdentity,
    devices: {
      [ownerIdentity]: { deviceId: ownerIdentity, role: 'primary', joinedAt: now },
    },
    createdAt: now,
    expiresAt: now + ttlMs,
    isActive: true,
  };
}

export function isSessionExpired(session: Session, now: number): boolean {
  return now > session.expiresAt;
}

/** Active and not yet expired. */
export function isSessionUsable(session: Session, now: number): boolean {
  return session.isActive && !isSessionExpired(session, now);
}

export function primaryDevice(session: Session): Device | undefined {
  return Object.values(session.devices).find(d => d.role === 'primary');
}

export function secondaryDevices(session: Session): Device[] {
  return Object.values(session.devices).filter(d => d.role === 'secondary');
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeDevice(device: Device): StoreObject {
  const record: StoreObject = {
    deviceId: device.deviceId,
    role: device.role,
    joinedAt: device.joinedAt,
  };
  if (device.lastSeenAt !== undefined) record.lastSeenAt = device.lastSeenAt;
  return record;
}

/**
 * The stored record; the token is the record's key, not a field.
 */
export function serializeSession(session: Session): StoreObject {
  const devices: StoreObject = {};
  for (const [id, device] of Object.entries(session.devices)) {
    devices[id] = serializeDevice(device);
  }
  return {
    ownerIdentity: session.ownerIdentity,
    devices,
    createdAt: session.createdAt,
    expiresAt: session.expiresAt,
    isActive: session.isActive,
  };
}

function corrupted(token: string, problem: string): never {
  throw new CorruptedStateError(`Session ${token} is corrupted: ${problem}`);
}

function parseDevice(token: string, key: string, raw: StoreValue): Device {
  if (!isStoreObject(raw)) corrupted(token, `device ${key} is not an object`);

  const deviceId = raw.deviceId ?? key;
  if (typeof deviceId !== 'string' || deviceId !== key) {
    corrupted(token, `device ${key} has a mismatched id`);
  }
  if (!isDeviceRole(raw.role)) corrupted(token, `device ${key} has no valid role`);
  if (typeof raw.joinedAt !== 'number') corrupted(token, `device ${key} has no joinedAt`);
  if (raw.lastSeenAt !== undefined && typeof raw.lastSeenAt !== 'number') {
    corrupted(token, `device ${key} has an invalid lastSeenAt`);
  }

  const device: Device = { deviceId, role: raw.role, joinedAt: raw.joinedAt };
  if (typeof raw.lastSeenAt === 'number') device.lastSeenAt = raw.lastSeenAt;
  return device;
}

/**
 * Turn a stored record into a Session. An absent record yields undefined;
 * a malformed one throws CorruptedStateError.
 */
export function parseSession(token: string, raw: StoreValue | undefined): Session | undefined {
  if (raw === undefined) return undefined;
  if (!isStoreObject(raw)) corrupted(token, 'record is not an object');

  const { ownerIdentity, createdAt, expiresAt } = raw;
  if (typeof ownerIdentity !== 'string' || ownerIdentity.length === 0) corrupted(token, 'missing ownerIdentity');
  if (typeof createdAt !== 'number') corrupted(token, 'missing createdAt');
  if (typeof expiresAt !== 'number') corrupted(token, 'missing expiresAt');
  if (expiresAt <= createdAt) corrupted(token, 'expiresAt precedes createdAt');

  const isActive = raw.isActive ?? true;
  if (typeof isActive !== 'boolean') corrupted(token, 'isActive is not a boolean');

  if (!isStoreObject(raw.devices)) corrupted(token, 'missing devices');
  const devices: Record<string, Device> = {};
  for (const [key, value] of Object.entries(raw.devices)) {
    devices[key] = parseDevice(token, key, value);
  }

  const primaries = Object.values(devices).filter(d => d.role === 'primary');
  if (primaries.length !== 1 || primaries[0]?.deviceId !== ownerIdentity) {
    corrupted(token, 'owner is not the single primary device');
  }

  return { token, ownerIdentity, devices, createdAt, expiresAt, isActive };
}
