/**
 * Console Logger
 *
 * Level-gated console output. The level is read from configuration on every
 * call so tests can change JSON_LOG_LEVEL and reset the config.
 */

import { getConfig, LOG_LEVELS, type LogLevel } from '../config.js';

type MessageLevel = Exclude<LogLevel, 'none'>;

function enabled(level: MessageLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(getConfig().logLevel);
}

/**
 * Area-scoped logger
 *
 * @example
 * ```ts
 * const log = createLogger('Stream');
 * log.debug('opened data.json'); // "Stream: opened data.json"
 * ```
 */
export interface Logger {
  error(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  info(message: string): void;
  debug(message: string): void;
}

export function createLogger(area: string): Logger {
  const prefix = `${area}:`;

  return {
    error(message, details) {
      if (!enabled('error')) return;
      if (details === undefined) {
        console.error(prefix, message);
      } else {
        console.error(prefix, message, details);
      }
    },
    warn(message, details) {
      if (!enabled('warn')) return;
      if (details === undefined) {
        console.warn(prefix, message);
      } else {
        console.warn(prefix, message, details);
      }
    },
    info(message) {
      if (enabled('info')) console.log(prefix, message);
    },
    debug(message) {
      if (enabled('debug')) console.debug(prefix, message);
    },
  };
}
