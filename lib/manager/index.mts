/**
 * Manager - Public API
 *
 * Barrel exports for the spa lifecycle manager.
 */

export { SpaManager, withSpaManager, type OperationOptions } from './SpaManager.mjs';

export { nextTransition, formatStatusLine, type Transition } from './EventDispatcher.mjs';
