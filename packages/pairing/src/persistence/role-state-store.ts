/**
 * Persisted form of the pairing role: the effective token and the role,
 * stored under fixed keys. The role is present whenever a token is.
 */

import { persistenceLog } from '../common/logger.js';
import { isDeviceRole } from '../model/session.js';
import {
  UNPAIRED_STATE,
  effectiveSessionToken,
  primaryState,
  secondaryState,
  type PairingRoleState,
} from '../model/role-state.js';
import { isValidSessionToken } from '../model/token.js';
import type { LocalPersistence } from './local-persistence.js';

export const PERSISTENCE_KEYS = {
  sessionToken: 'sessionToken',
  role: 'role',
} as const;

export async function loadRoleState(persistence: LocalPersistence): Promise<PairingRoleState> {
  const token = await persistence.getString(PERSISTENCE_KEYS.sessionToken);
  const role = await persistence.getString(PERSISTENCE_KEYS.role);

  if (token === undefined) return UNPAIRED_STATE;
  if (!isValidSessionToken(token) || !isDeviceRole(role)) {
    persistenceLog('Ignoring unreadable persisted state (role %s)', role);
    return UNPAIRED_STATE;
  }
  return role === 'secondary' ? secondaryState(token) : primaryState(token);
}

export async function saveRoleState(persistence: LocalPersistence, state: PairingRoleState): Promise<void> {
  const token = effectiveSessionToken(state);
  await persistence.setStrings({
    [PERSISTENCE_KEYS.sessionToken]: token ?? null,
    [PERSISTENCE_KEYS.role]: token === undefined ? null : state.role,
  });
}
