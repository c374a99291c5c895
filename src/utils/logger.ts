/**
 * Logger utility using Pino
 *
 * Provides centralized logging with support for:
 * - Child loggers for component-specific logging
 * - Structured logging with JSON output
 * - Pretty printing in development
 */

import pino, { type Logger } from 'pino';
import pretty from 'pino-pretty';
import { config } from '../config/index.js';

export type { Logger };

/**
 * Base logger instance
 */
export const logger: Logger = config.logging.prettyPrint
  ? pino(
      {
        level: config.logging.level,
      },
      pretty({
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
        customColors: 'trace:gray,debug:blue,info:green,warn:yellow,error:red,fatal:redBright',
        sync: false,
      })
    )
  : pino({
      level: config.logging.level,
    });

/**
 * Create a child logger for a specific component
 *
 * @example
 * const log = createChildLogger('pool');
 * log.warn({ from: 'helius-0', to: 'public-1' }, 'Switching provider');
 */
export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
