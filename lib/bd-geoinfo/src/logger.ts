/**
 * Logger Abstraction
 *
 * Defaults to console. Can be overridden with a custom logger
 * (pino, winston, etc) through `setLogger()` or `configure({ logger })`.
 */

import type { Logger } from './types.js';

let _logger: Logger = console;

/**
 * Set custom logger implementation
 * @param customLogger - Logger instance with info, warn, error, debug methods
 */
export function setLogger(customLogger: Logger): void {
  _logger = customLogger;
}

/**
 * Logger proxy - delegates to current logger implementation
 */
export const logger: Logger = {
  info: (...args: unknown[]): void => {
    (_logger.info ?? _logger.log)?.call(_logger, '[bd-geoinfo]', ...args);
  },
  warn: (...args: unknown[]): void => {
    (_logger.warn ?? _logger.log)?.call(_logger, '[bd-geoinfo] WARN:', ...args);
  },
  error: (...args: unknown[]): void => {
    (_logger.error ?? _logger.log)?.call(_logger, '[bd-geoinfo] ERROR:', ...args);
  },
  debug: (...args: unknown[]): void => {
    (_logger.debug ?? _logger.log)?.call(_logger, '[bd-geoinfo] DEBUG:', ...args);
  },
};

export default logger;
