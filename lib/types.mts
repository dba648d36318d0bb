/**
 * Spa Manager - Shared TypeScript Interfaces
 *
 * This file contains the shared type definitions used across the library:
 * configuration, the event payload map, the host handler and the
 * collaborator interfaces (locator, session, facade).
 */

import type { SpaEvent, SpaState } from './SpaProtocol.mjs';
import type { SpaDescriptor } from './locator/SpaDescriptor.mjs';

// =============================================================================
// Configuration Types
// =============================================================================

/** Logger function signature */
export type LoggerFunction = (...args: unknown[]) => void;

/**
 * Configuration for creating a SpaManager
 */
export interface SpaManagerConfig<TFacade extends SpaFacade = SpaFacade> {
  /** Client UUID; identifies this client to the spa */
  clientUuid: string;
  /** Receives every dispatched event */
  handler: SpaEventHandler;
  /** Builds the session that performs the spa protocol */
  createSession: SessionFactory;
  /** Wraps a ready session into the control surface */
  createFacade: FacadeFactory<TFacade>;
  /** Builds the discovery locator (default: UDP broadcast locator) */
  createLocator?: LocatorFactory;
  /** IP address of the spa. Useful if the spa is on a sub-net */
  spaAddress?: string | null;
  /** Identifier of the spa */
  spaIdentifier?: string | null;
  /** Name of the spa, for status feedback */
  spaName?: string | null;
  /** Pause after a failed pump attempt in ms (default: 5000) */
  errorRetryDelay?: number;
  /** Optional logger function (defaults to console.log / console.error) */
  logger?: LoggerFunction;
}

// =============================================================================
// Event Types
// =============================================================================

/** Payload of events that carry nothing */
export type EmptyPayload = Record<string, never>;

/**
 * Payload carried by each event
 */
export interface SpaEventPayloads {
  'manager-entered': EmptyPayload;
  'manager-exited': { error: unknown };
  'locating-started': EmptyPayload;
  'locating-discovered-spa': { spaDescriptor: SpaDescriptor };
  'locating-finished': { spaDescriptors: readonly SpaDescriptor[] | null };
  'spa-not-found': { spaAddress: string | null; spaIdentifier: string | null };
  'connection-started': EmptyPayload;
  'session-protocol-complete': EmptyPayload;
  'connection-finished': { facade: SpaFacade | null };
  'ping-missed': EmptyPayload;
  'ping-received': EmptyPayload;
  'session-disconnected': EmptyPayload;
  'rf-error': EmptyPayload;
  'protocol-retry-exceeded': EmptyPayload;
  'rf-error-retry-exceeded': EmptyPayload;
  'too-many-rf-errors': EmptyPayload;
}

/**
 * Event entry point handed to collaborators
 */
export type SpaEventCallback = <E extends SpaEvent>(
  event: E,
  payload: SpaEventPayloads[E]
) => Promise<void>;

/**
 * Implemented by the host application. Receives every event after the
 * manager has updated its state; the place for reconnect strategies,
 * logging and UI updates.
 */
export interface SpaEventHandler {
  handleEvent<E extends SpaEvent>(event: E, payload: SpaEventPayloads[E]): Promise<void>;
}

// =============================================================================
// Collaborator Types
// =============================================================================

/**
 * Read-only view of the manager given to collaborators
 */
export interface SpaManagerView {
  readonly clientId: Buffer;
  readonly spaAddress: string | null;
  readonly spaIdentifier: string | null;
  readonly spaName: string | null;
  readonly spaState: SpaState;
  readonly statusLine: string;
}

/**
 * Hints narrowing a discovery run
 */
export interface LocatorOptions {
  spaAddress: string | null;
  spaIdentifier: string | null;
}

/**
 * Finds spas on the network
 */
export interface SpaLocator {
  discover(signal?: AbortSignal): Promise<void>;
  /** Spas found, in discovery order; read after discover() */
  readonly spas: readonly SpaDescriptor[];
}

export type LocatorFactory = (
  manager: SpaManagerView,
  onEvent: SpaEventCallback,
  options: LocatorOptions
) => SpaLocator;

/**
 * Live connection to one spa. Reports handshake completion and running
 * faults through the event callback it was built with.
 */
export interface SpaSession {
  connect(signal?: AbortSignal): Promise<void>;
  disconnect(): Promise<void>;
}

export type SessionFactory = (
  clientId: Buffer,
  spaDescriptor: SpaDescriptor,
  manager: SpaManagerView,
  onEvent: SpaEventCallback
) => SpaSession;

/**
 * Control surface handed to the host once a session is ready
 */
export interface SpaFacade {
  readonly name: string;
  readonly uniqueId: string;
}

export type FacadeFactory<TFacade extends SpaFacade = SpaFacade> = (
  session: SpaSession,
  manager: SpaManagerView
) => TFacade;

// =============================================================================
// Datagram Types
// =============================================================================

/**
 * Remote endpoint of a datagram
 */
export interface DatagramEndpoint {
  address: string;
  port: number;
}

/**
 * Minimal UDP socket used by the locator
 */
export interface DatagramTransport {
  send(data: Buffer, endpoint: DatagramEndpoint): Promise<void>;
  onMessage(callback: (data: Buffer, remote: DatagramEndpoint) => void): void;
  onError(callback: (error: Error) => void): void;
  close(): void;
}

export type DatagramTransportFactory = (options: { broadcast: boolean }) => Promise<DatagramTransport>;
