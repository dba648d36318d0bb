/**
 * Spa Protocol Constants
 *
 * This module defines the lifecycle states, dispatched events, discovery
 * constants and timing defaults used by the spa manager.
 */

/**
 * Lifecycle states of the spa manager
 */
export const SPA_STATES = {
  IDLE: 'idle',
  LOCATING_SPAS: 'locating_spas',
  CONNECTING: 'connecting',
  SPA_READY: 'spa_ready',
  CONNECTED: 'connected',
  ERROR_SPA_NOT_FOUND: 'error_spa_not_found',
  ERROR_PING_MISSED: 'error_ping_missed',
  ERROR_RF_FAULT: 'error_rf_fault',
  ERROR_NEEDS_ATTENTION: 'error_needs_attention',
} as const;

export type SpaState = (typeof SPA_STATES)[keyof typeof SPA_STATES];

/**
 * States that a successful ping recovers from via a full reset
 */
export const RECOVERABLE_STATES: ReadonlySet<SpaState> = new Set<SpaState>([
  SPA_STATES.ERROR_PING_MISSED,
  SPA_STATES.ERROR_RF_FAULT,
  SPA_STATES.ERROR_NEEDS_ATTENTION,
]);

/**
 * Events passed through the spa manager's dispatcher
 */
export const SPA_EVENTS = {
  // Manager lifetime
  MANAGER_ENTERED: 'manager-entered',
  MANAGER_EXITED: 'manager-exited',

  // Discovery
  LOCATING_STARTED: 'locating-started',
  LOCATING_DISCOVERED_SPA: 'locating-discovered-spa',
  LOCATING_FINISHED: 'locating-finished',
  SPA_NOT_FOUND: 'spa-not-found',

  // Connection
  CONNECTION_STARTED: 'connection-started',
  SESSION_PROTOCOL_COMPLETE: 'session-protocol-complete',
  CONNECTION_FINISHED: 'connection-finished',

  // Running session
  PING_MISSED: 'ping-missed',
  PING_RECEIVED: 'ping-received',
  SESSION_DISCONNECTED: 'session-disconnected',

  // Errors
  RF_ERROR: 'rf-error',
  PROTOCOL_RETRY_EXCEEDED: 'protocol-retry-exceeded',
  RF_ERROR_RETRY_EXCEEDED: 'rf-error-retry-exceeded',
  TOO_MANY_RF_ERRORS: 'too-many-rf-errors',
} as const;

export type SpaEvent = (typeof SPA_EVENTS)[keyof typeof SPA_EVENTS];

/**
 * Events that escalate to the needs-attention state
 */
export const EXHAUSTION_EVENTS: ReadonlySet<SpaEvent> = new Set<SpaEvent>([
  SPA_EVENTS.PROTOCOL_RETRY_EXCEEDED,
  SPA_EVENTS.RF_ERROR_RETRY_EXCEEDED,
  SPA_EVENTS.TOO_MANY_RF_ERRORS,
]);

/**
 * Client identity formatting
 */
export const CLIENT_IDENTITY = {
  PREFIX: 'IOS',
  ENCODING: 'latin1',
} as const;

/**
 * Protocol Configuration
 */
export const PROTOCOL_CONFIG = {
  DISCOVERY: {
    PORT: 10022,
    BROADCAST_ADDRESS: '255.255.255.255',
    HELLO_REQUEST: '<HELLO>1</HELLO>',
    ENCODING: 'latin1',
  },
  TIMEOUTS: {
    DISCOVERY_INITIAL: 500, // re-send hello every 500ms
    DISCOVERY: 4000, // 4 seconds
    ERROR_RETRY_DELAY: 5000, // 5 seconds
    RECONNECT_DELAY: 5000, // 5 seconds
  },
  TASKS: {
    MANAGER_KEY: 'SPAMAN',
    SEQUENCE_PUMP: 'Sequence Pump',
  },
} as const;

