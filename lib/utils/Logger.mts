/**
 * Tagged console logger
 *
 * Every line is prefixed with the component tag, e.g.
 * `[SpaManager] Sequence pump started`.
 */

import type { LoggerFunction } from '../types.mjs';

export interface Logger {
  log: LoggerFunction;
  error: LoggerFunction;
}

export function createLogger(tag: string, sink?: LoggerFunction): Logger {
  const prefix = `[${tag}]`;
  return {
    log: (...args: unknown[]) => (sink ?? console.log)(prefix, ...args),
    error: (...args: unknown[]) => (sink ?? console.error)(prefix, ...args),
  };
}
