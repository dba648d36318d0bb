/**
 * Utilities - Public API
 */

export { createLogger, type Logger } from './Logger.mjs';
export { createClientId, generateClientUuid, normalizeHint } from './ClientIdentity.mjs';
