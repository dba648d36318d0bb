/**
 * Spa Lifecycle Manager - Public API
 *
 * This is the main entry point for the library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Configuration
  SpaManagerConfig,
  LoggerFunction,
  // Events
  EmptyPayload,
  SpaEventPayloads,
  SpaEventCallback,
  SpaEventHandler,
  // Collaborators
  SpaManagerView,
  LocatorOptions,
  SpaLocator,
  LocatorFactory,
  SpaSession,
  SessionFactory,
  SpaFacade,
  FacadeFactory,
  // Datagrams
  DatagramEndpoint,
  DatagramTransport,
  DatagramTransportFactory,
} from './types.mjs';

// =============================================================================
// Constants
// =============================================================================
export {
  SPA_STATES,
  SPA_EVENTS,
  RECOVERABLE_STATES,
  EXHAUSTION_EVENTS,
  CLIENT_IDENTITY,
  PROTOCOL_CONFIG,
  type SpaState,
  type SpaEvent,
} from './SpaProtocol.mjs';

// =============================================================================
// Errors
// =============================================================================
export {
  ERROR_CODES,
  ERROR_MESSAGES,
  SpaManagerError,
  assertPrecondition,
  isAbortError,
  type ErrorCode,
} from './errors.mjs';

// =============================================================================
// Utilities
// =============================================================================
export * from './utils/index.mjs';

// =============================================================================
// Manager
// =============================================================================
export * from './manager/index.mjs';

// =============================================================================
// Discovery
// =============================================================================
export * from './locator/index.mjs';

// =============================================================================
// Tasks
// =============================================================================
export * from './tasks/index.mjs';

// =============================================================================
// Host helpers
// =============================================================================
export * from './host/index.mjs';
