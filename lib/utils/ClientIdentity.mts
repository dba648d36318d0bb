/**
 * Client identity helpers
 *
 * The spa identifies each client by `IOS<uuid>`. Hosts should generate the
 * UUID once and persist it so the spa sees the same client across restarts.
 */

import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import { CLIENT_IDENTITY } from '../SpaProtocol.mjs';
import { ERROR_CODES, SpaManagerError } from '../errors.mjs';

/**
 * Generate a fresh client UUID
 */
export function generateClientUuid(): string {
  return uuidv4();
}

/**
 * Build the identity bytes sent to the spa for a client UUID. Anything
 * other than a well-formed UUID is rejected.
 */
export function createClientId(clientUuid: string): Buffer {
  if (!uuidValidate(clientUuid)) {
    throw new SpaManagerError(ERROR_CODES.INVALID_CLIENT_UUID, clientUuid);
  }
  return Buffer.from(`${CLIENT_IDENTITY.PREFIX}${clientUuid}`, CLIENT_IDENTITY.ENCODING);
}

/**
 * Normalise an optional hint: empty strings mean "not configured"
 */
export function normalizeHint(value: string | null | undefined): string | null {
  if (value === undefined || value === null || value === '') {
    return null;
  }
  return value;
}
