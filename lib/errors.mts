/**
 * Spa Manager Errors
 *
 * Operational faults (spa not found, missed pings, RF errors) are lifecycle
 * states, not errors. The errors here are configuration mistakes and
 * precondition violations, which must halt the caller.
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  INVALID_CLIENT_UUID: 'INVALID_CLIENT_UUID',
  PRECONDITION_FAILED: 'PRECONDITION_FAILED',
  DISCOVERY_FAILED: 'DISCOVERY_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error Messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.INVALID_CLIENT_UUID]: 'Client UUID is not a valid UUID',
  [ERROR_CODES.PRECONDITION_FAILED]: 'Spa manager precondition failed',
  [ERROR_CODES.DISCOVERY_FAILED]: 'Spa discovery failed',
};

/**
 * Error with code and details
 */
export class SpaManagerError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, details: unknown = null, options?: { cause?: unknown }) {
    const suffix = typeof details === 'string' ? `: ${details}` : '';
    super(`${ERROR_MESSAGES[code]}${suffix}`, options);
    this.name = 'SpaManagerError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Throw a PRECONDITION_FAILED error unless the condition holds
 */
export function assertPrecondition(condition: boolean, details: string): asserts condition {
  if (!condition) {
    throw new SpaManagerError(ERROR_CODES.PRECONDITION_FAILED, details);
  }
}

/**
 * True for the errors raised when an AbortSignal cancels work
 */
export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}
