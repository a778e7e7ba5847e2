/**
 * The device's pairing role. Owned by the device itself and persisted after
 * every change.
 */

import type { DeviceRole } from './session.js';

export type PairingRole = DeviceRole;

/**
 * A primary keeps its own session in localSessionToken; a secondary keeps
 * the joined session in remoteSessionToken. Never both.
 */
export interface PairingRoleState {
  readonly role: PairingRole;
  readonly localSessionToken?: string;
  readonly remoteSessionToken?: string;
  readonly ownerIdentity?: string;
}

export type PairingPhase = 'unpaired' | 'active-primary' | 'active-secondary';

export const UNPAIRED_STATE: PairingRoleState = { role: 'primary' };

export function primaryState(token: string, ownerIdentity?: string): PairingRoleState {
  return ownerIdentity === undefined
    ? { role: 'primary', localSessionToken: token }
    : { role: 'primary', localSessionToken: token, ownerIdentity };
}

export function secondaryState(token: string, ownerIdentity?: string): PairingRoleState {
  return ownerIdentity === undefined
    ? { role: 'secondary', remoteSessionToken: token }
    : { role: 'secondary', remoteSessionToken: token, ownerIdentity };
}

export function effectiveSessionToken(state: PairingRoleState): string | undefined {
  return state.remoteSessionToken ?? state.localSessionToken;
}

export function phaseOf(state: PairingRoleState): PairingPhase {
  if (state.role === 'secondary' && state.remoteSessionToken) return 'active-secondary';
  if (state.role === 'primary' && state.localSessionToken) return 'active-primary';
  return 'unpaired';
}

export function roleStatesEqual(a: PairingRoleState, b: PairingRoleState): boolean {
  return a.role === b.role
    && a.localSessionToken === b.localSessionToken
    && a.remoteSessionToken === b.remoteSessionToken
    && a.ownerIdentity === b.ownerIdentity;
}
