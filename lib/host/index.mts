/**
 * Host helpers - Public API
 */

export {
  ReconnectingHandler,
  type ReconnectingHandlerOptions,
  type Resettable,
} from './ReconnectingHandler.mjs';
