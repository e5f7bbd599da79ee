import type { ResourceLogger } from "../types/index.js";

const noop = () => {};

export const silentLogger: ResourceLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export const consoleLogger: ResourceLogger = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

/**
 * Maps the public `logger` option onto a concrete logger.
 * `undefined` selects the console, `false` discards everything.
 */
export function resolveLogger(
  logger: ResourceLogger | false | undefined
): ResourceLogger {
  if (logger === false) return silentLogger;
  return logger ?? consoleLogger;
}
