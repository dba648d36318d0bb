/**
 * Spa Manager
 *
 * Owns the lifetime of one connection to a spa:
 * - Dispatches every protocol/lifecycle event through the transition table,
 *   then forwards it to the host handler
 * - Discovery and connection, each with a guaranteed "finished" event
 * - Reset, which is also how every error state is left
 * - The sequence pump, which drives discovery and connection from the
 *   configured hints while the manager is idle
 *
 * Use it inside `withSpaManager()` (or pair `enter()` / `exit()` yourself).
 * Without any hints the pump only discovers once, and the host drives
 * `locateSpas()` / `connectToSpa()` / `connect()` itself.
 */

import { EventEmitter } from 'node:events';
import { setImmediate as yieldTick, setTimeout as sleep } from 'node:timers/promises';
import { PROTOCOL_CONFIG, SPA_EVENTS, SPA_STATES, type SpaEvent, type SpaState } from '../SpaProtocol.mjs';
import { assertPrecondition, isAbortError } from '../errors.mjs';
import { createUdpLocator } from '../locator/SpaLocator.mjs';
import { TaskSupervisor } from '../tasks/TaskSupervisor.mjs';
import { createClientId, normalizeHint } from '../utils/ClientIdentity.mjs';
import { createLogger, type Logger } from '../utils/Logger.mjs';
import { formatStatusLine, nextTransition } from './EventDispatcher.mjs';
import type { SpaDescriptor } from '../locator/SpaDescriptor.mjs';
import type {
  FacadeFactory,
  LocatorFactory,
  SessionFactory,
  SpaEventCallback,
  SpaEventHandler,
  SpaEventPayloads,
  SpaFacade,
  SpaManagerConfig,
  SpaManagerView,
  SpaSession,
} from '../types.mjs';

/** Options accepted by the discovery and connect operations */
export interface OperationOptions {
  signal?: AbortSignal;
}

const { MANAGER_KEY, SEQUENCE_PUMP } = PROTOCOL_CONFIG.TASKS;

// ============================================================================
// SpaManager Class
// ============================================================================

export class SpaManager<TFacade extends SpaFacade = SpaFacade> implements SpaManagerView {
  private id: Buffer;
  private handler: SpaEventHandler;
  private createLocator: LocatorFactory;
  private createSession: SessionFactory;
  private createFacade: FacadeFactory<TFacade>;
  private errorRetryDelay: number;
  private logger: Logger;
  private supervisor: TaskSupervisor;

  // Hints
  private address: string | null;
  private identifier: string | null;
  private name: string | null;

  // State
  private descriptors: readonly SpaDescriptor[] | null = null;
  private session: SpaSession | null = null;
  private connecting: boolean = false;
  private currentFacade: TFacade | null = null;
  private state: SpaState = SPA_STATES.IDLE;
  private status: string = formatStatusLine(SPA_STATES.IDLE, null);

  // Bumped whenever anything the pump decides on changes
  private revision: number = 0;
  private notifier: EventEmitter = new EventEmitter();

  private readonly onEvent: SpaEventCallback = <E extends SpaEvent>(
    event: E,
    payload: SpaEventPayloads[E]
  ) => this.dispatch(event, payload);

  constructor(config: SpaManagerConfig<TFacade>) {
    this.id = createClientId(config.clientUuid);
    this.handler = config.handler;
    this.createLocator = config.createLocator ?? createUdpLocator;
    this.createSession = config.createSession;
    this.createFacade = config.createFacade;
    this.errorRetryDelay = config.errorRetryDelay ?? PROTOCOL_CONFIG.TIMEOUTS.ERROR_RETRY_DELAY;
    this.logger = createLogger('SpaManager', config.logger);
    this.supervisor = new TaskSupervisor(config.logger);

    this.address = normalizeHint(config.spaAddress);
    this.identifier = normalizeHint(config.spaIdentifier);
    this.name = normalizeHint(config.spaName);
  }

  // ===========================================================================
  // Scoped lifetime
  // ===========================================================================

  /**
   * Enter the manager's scope: dispatches `manager-entered` and starts the
   * sequence pump
   */
  async enter(): Promise<this> {
    await this.supervisor.enter();
    await this.dispatch(SPA_EVENTS.MANAGER_ENTERED, {});
    this.supervisor.addTask((signal) => this.sequencePump(signal), SEQUENCE_PUMP, MANAGER_KEY);
    return this;
  }

  /**
   * Leave the manager's scope. The pump is cancelled and has settled before
   * `manager-exited` is dispatched; the owned session is disconnected last.
   */
  async exit(error: unknown = null): Promise<void> {
    await this.supervisor.cancelKeyTasks(MANAGER_KEY);
    try {
      await this.dispatch(SPA_EVENTS.MANAGER_EXITED, { error });
    } finally {
      await this.supervisor.exit();
      await this.reset();
    }
  }

  // ===========================================================================
  // Public API - Operations
  // ===========================================================================

  /**
   * Forget descriptors and facade, disconnect the session and return to idle
   */
  async reset(): Promise<void> {
    this.descriptors = null;
    this.currentFacade = null;

    const session = this.session;
    this.session = null;
    try {
      if (session) {
        await session.disconnect();
      }
    } finally {
      this.state = SPA_STATES.IDLE;
      this.changed();
    }
  }

  /**
   * Locate spas on this network. `locating-finished` always fires, also when
   * the locator fails; the failure then propagates.
   */
  async locateSpas(
    spaAddress: string | null = null,
    spaIdentifier: string | null = null,
    options: OperationOptions = {}
  ): Promise<readonly SpaDescriptor[] | null> {
    try {
      await this.dispatch(SPA_EVENTS.LOCATING_STARTED, {});
      const locator = this.createLocator(this, this.onEvent, {
        spaAddress: normalizeHint(spaAddress),
        spaIdentifier: normalizeHint(spaIdentifier),
      });
      await locator.discover(options.signal);
      this.descriptors = [...locator.spas];
      this.notifier.emit('descriptors');
    } finally {
      await this.dispatch(SPA_EVENTS.LOCATING_FINISHED, { spaDescriptors: this.descriptors });
    }

    return this.descriptors;
  }

  /**
   * Connect to the spa described by the descriptor. The facade is only built
   * if the session reported protocol completion during its handshake.
   */
  async connectToSpa(spaDescriptor: SpaDescriptor, options: OperationOptions = {}): Promise<TFacade | null> {
    assertPrecondition(this.currentFacade === null, 'a facade already exists, reset before connecting');
    assertPrecondition(this.session === null, 'a session already exists, reset before connecting');
    assertPrecondition(!this.connecting, 'a connection attempt is already in progress');

    this.connecting = true;
    try {
      await this.dispatch(SPA_EVENTS.CONNECTION_STARTED, {});
      const session = this.createSession(this.id, spaDescriptor, this, this.onEvent);
      this.session = session;
      await session.connect(options.signal);

      if (this.state === SPA_STATES.SPA_READY) {
        this.currentFacade = this.createFacade(session, this);
        this.notifier.emit('facade');
      }
    } finally {
      this.connecting = false;
      await this.dispatch(SPA_EVENTS.CONNECTION_FINISHED, { facade: this.currentFacade });
    }

    return this.currentFacade;
  }

  /**
   * Find a spa by identifier (optionally at an address) and connect to the
   * first match
   */
  async connect(
    spaIdentifier: string,
    spaAddress: string | null = null,
    options: OperationOptions = {}
  ): Promise<TFacade | null> {
    this.logger.log(`connect: ID:${spaIdentifier} ADDR:${spaAddress}`);

    const spaDescriptors = await this.locateSpas(spaAddress, spaIdentifier, options);
    assertPrecondition(spaDescriptors !== null, 'discovery finished without descriptors');

    const [first] = spaDescriptors;
    if (!first) {
      await this.dispatch(SPA_EVENTS.SPA_NOT_FOUND, {
        spaAddress: normalizeHint(spaAddress),
        spaIdentifier: normalizeHint(spaIdentifier),
      });
      return null;
    }

    return this.connectToSpa(first, options);
  }

  /**
   * Replace the hints the sequence pump works from, then reset
   */
  async setSpaInfo(
    spaAddress: string | null,
    spaIdentifier: string | null,
    spaName: string | null
  ): Promise<void> {
    this.logger.log(`setSpaInfo: ADDR:${spaAddress} ID:${spaIdentifier} NAME:${spaName}`);
    this.address = normalizeHint(spaAddress);
    this.identifier = normalizeHint(spaIdentifier);
    this.name = normalizeHint(spaName);
    await this.reset();
  }

  /**
   * Resolve once descriptors are available
   */
  waitForDescriptors(signal?: AbortSignal): Promise<readonly SpaDescriptor[]> {
    return this.waitFor(() => this.descriptors, 'descriptors', signal);
  }

  /**
   * Resolve once a facade is available
   */
  waitForFacade(signal?: AbortSignal): Promise<TFacade> {
    return this.waitFor(() => this.currentFacade, 'facade', signal);
  }

  // ===========================================================================
  // Public API - Properties
  // ===========================================================================

  get clientId(): Buffer {
    return this.id;
  }

  get spaAddress(): string | null {
    return this.address;
  }

  get spaIdentifier(): string | null {
    return this.identifier;
  }

  get spaName(): string | null {
    return this.name;
  }

  get spaDescriptors(): readonly SpaDescriptor[] | null {
    return this.descriptors;
  }

  get facade(): TFacade | null {
    return this.currentFacade;
  }

  get spaState(): SpaState {
    return this.state;
  }

  get statusLine(): string {
    return this.status;
  }

  get isConnected(): boolean {
    return this.state === SPA_STATES.CONNECTED;
  }

  toString(): string {
    return this.status;
  }

  // ===========================================================================
  // Event dispatch
  // ===========================================================================

  private async dispatch<E extends SpaEvent>(event: E, payload: SpaEventPayloads[E]): Promise<void> {
    const transition = nextTransition(this.state, event, this.currentFacade !== null);

    if (transition.reset) {
      this.logger.log(`Recovered from ${this.state}, resetting`);
      try {
        await this.reset();
      } catch (error) {
        this.logger.error('Reset after recovery failed:', error);
      }
    }

    this.state = transition.state;
    this.status = formatStatusLine(this.state, event);
    this.changed();

    await this.handler.handleEvent(event, payload);
  }

  private changed(): void {
    this.revision++;
    this.notifier.emit('changed');
  }

  private waitFor<T>(read: () => T | null, eventName: string, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const current = read();
      if (current !== null) {
        resolve(current);
        return;
      }
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const cleanup = () => {
        this.notifier.off(eventName, onNotify);
        signal?.removeEventListener('abort', onAbort);
      };
      const onNotify = () => {
        const value = read();
        if (value !== null) {
          cleanup();
          resolve(value);
        }
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason);
      };

      this.notifier.on(eventName, onNotify);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // ===========================================================================
  // Sequence pump
  // ===========================================================================

  private async sequencePump(signal: AbortSignal): Promise<void> {
    this.logger.log('Sequence pump started');

    try {
      for (;;) {
        const seen = this.revision;
        let worked: boolean;

        try {
          worked = await this.pumpOnce(signal);
        } catch (error) {
          if (isAbortError(error) && signal.aborted) throw error;
          this.logger.error('Sequence pump attempt failed:', error);
          await sleep(this.errorRetryDelay, undefined, { signal });
          worked = true;
        }

        await yieldTick(undefined, { signal });

        if (!worked) {
          // nothing to do until state or hints change
          await this.waitFor(() => (this.revision !== seen ? true : null), 'changed', signal);
        }
      }
    } catch (error) {
      if (isAbortError(error)) {
        this.logger.log('Sequence pump cancelled');
      }
      throw error;
    }
  }

  /**
   * Run at most one discovery or connection attempt; false when idle
   */
  private async pumpOnce(signal: AbortSignal): Promise<boolean> {
    if (this.state !== SPA_STATES.IDLE) return false;

    if (this.identifier !== null) {
      if (this.currentFacade !== null) return false;
      await this.connect(this.identifier, this.address, { signal });
      return true;
    }

    if (this.descriptors === null) {
      await this.locateSpas(this.address, null, { signal });
      return true;
    }

    return false;
  }
}

/**
 * Run `body` inside the manager's scope; the manager is always exited and
 * the body's error rethrown
 */
export async function withSpaManager<TFacade extends SpaFacade, T>(
  manager: SpaManager<TFacade>,
  body: (manager: SpaManager<TFacade>) => Promise<T>
): Promise<T> {
  await manager.enter();

  let result: T;
  try {
    result = await body(manager);
  } catch (error) {
    await manager.exit(error);
    throw error;
  }

  await manager.exit();
  return result;
}
