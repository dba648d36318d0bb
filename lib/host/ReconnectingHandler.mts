/**
 * Reconnecting event handler
 *
 * A ready-made host handler: logs every event, forwards it to an optional
 * inner handler, and resets the manager after a delay when the connection
 * attempt failed or the spa needs attention. The reset puts the manager back
 * to idle, where the sequence pump retries from the configured hints.
 */

import { EXHAUSTION_EVENTS, PROTOCOL_CONFIG, SPA_EVENTS, type SpaEvent } from '../SpaProtocol.mjs';
import { createLogger, type Logger } from '../utils/Logger.mjs';
import type { LoggerFunction, SpaEventHandler, SpaEventPayloads } from '../types.mjs';

export interface ReconnectingHandlerOptions {
  /** Delay before the reset in ms (default: 5000) */
  reconnectDelay?: number;
  /** Receives every event after this handler */
  inner?: SpaEventHandler;
  logger?: LoggerFunction;
}

/** The part of the manager this handler drives */
export interface Resettable {
  reset(): Promise<void>;
}

export class ReconnectingHandler implements SpaEventHandler {
  private manager: Resettable | null = null;
  private reconnectDelay: number;
  private inner?: SpaEventHandler;
  private logger: Logger;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: ReconnectingHandlerOptions = {}) {
    this.reconnectDelay = options.reconnectDelay ?? PROTOCOL_CONFIG.TIMEOUTS.RECONNECT_DELAY;
    this.inner = options.inner;
    this.logger = createLogger('ReconnectingHandler', options.logger);
  }

  attach(manager: Resettable): void {
    this.manager = manager;
  }

  get isReconnectPending(): boolean {
    return this.reconnectTimer !== null;
  }

  async handleEvent<E extends SpaEvent>(event: E, payload: SpaEventPayloads[E]): Promise<void> {
    this.logger.log(`Event: ${event}`);

    if (event === SPA_EVENTS.MANAGER_EXITED) {
      this.cancelReconnect();
    } else if (this.needsReset(event, payload)) {
      this.scheduleReconnect(event);
    }

    await this.inner?.handleEvent(event, payload);
  }

  cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private needsReset(event: SpaEvent, payload: SpaEventPayloads[SpaEvent]): boolean {
    if (event === SPA_EVENTS.SPA_NOT_FOUND || EXHAUSTION_EVENTS.has(event)) {
      return true;
    }
    if (event === SPA_EVENTS.CONNECTION_FINISHED) {
      return 'facade' in payload && payload.facade === null;
    }
    return false;
  }

  private scheduleReconnect(event: SpaEvent): void {
    if (this.reconnectTimer || !this.manager) return;

    const manager = this.manager;
    this.logger.log(`Scheduling reset in ${this.reconnectDelay}ms after ${event}`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      manager.reset().catch((err) => {
        this.logger.error('Reset failed:', err);
      });
    }, this.reconnectDelay);
  }
}
