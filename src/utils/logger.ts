/**
 * Logging - pino root logger with per-module children
 *
 * LOG_LEVEL sets the level (default: info, "silent" disables output).
 * LOG_PRETTY=1 routes output through pino-pretty for local runs.
 */

import pino, { type Logger } from 'pino';

const level = process.env.LOG_LEVEL?.trim() || 'info';

export const logger: Logger = pino({
  level,
  base: { service: 'signalpost' },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env.LOG_PRETTY === '1'
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
      : undefined,
});

/** Create a child logger tagged with a module name. */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
