/**
 * Lifecycle transition table
 *
 * Maps (current state, event) to the next state. A successful ping while in
 * one of the recoverable error states asks for a full reset instead; the
 * manager performs it and lands in `idle`.
 */

import {
  EXHAUSTION_EVENTS,
  RECOVERABLE_STATES,
  SPA_EVENTS,
  SPA_STATES,
  type SpaEvent,
  type SpaState,
} from '../SpaProtocol.mjs';

export interface Transition {
  state: SpaState;
  reset: boolean;
}

export function nextTransition(state: SpaState, event: SpaEvent, hasFacade: boolean): Transition {
  switch (event) {
    case SPA_EVENTS.LOCATING_STARTED:
      return { state: SPA_STATES.LOCATING_SPAS, reset: false };

    case SPA_EVENTS.LOCATING_FINISHED:
      return { state: SPA_STATES.IDLE, reset: false };

    case SPA_EVENTS.SPA_NOT_FOUND:
      return { state: SPA_STATES.ERROR_SPA_NOT_FOUND, reset: false };

    case SPA_EVENTS.CONNECTION_STARTED:
      return { state: SPA_STATES.CONNECTING, reset: false };

    case SPA_EVENTS.SESSION_PROTOCOL_COMPLETE:
      return { state: SPA_STATES.SPA_READY, reset: false };

    case SPA_EVENTS.CONNECTION_FINISHED:
      return { state: hasFacade ? SPA_STATES.CONNECTED : state, reset: false };

    case SPA_EVENTS.PING_MISSED:
      return { state: SPA_STATES.ERROR_PING_MISSED, reset: false };

    case SPA_EVENTS.PING_RECEIVED:
      if (RECOVERABLE_STATES.has(state)) {
        return { state: SPA_STATES.IDLE, reset: true };
      }
      return { state, reset: false };

    case SPA_EVENTS.RF_ERROR:
      return { state: SPA_STATES.ERROR_RF_FAULT, reset: false };

    default:
      if (EXHAUSTION_EVENTS.has(event)) {
        return { state: SPA_STATES.ERROR_NEEDS_ATTENTION, reset: false };
      }
      // manager-entered, manager-exited, locating-discovered-spa and
      // session-disconnected pass through unchanged
      return { state, reset: false };
  }
}

export function formatStatusLine(state: SpaState, event: SpaEvent | null): string {
  return `State: ${state}, last event ${event ?? 'none'}`;
}
