/**
 * Logging
 *
 * Structured logging with pino. Components accept an optional Logger and
 * derive a child bound to their component name. The library default is
 * silent unless CMDSYNTAX_LOG_LEVEL says otherwise.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { loadConfig } from './config';
import type { Config } from './config';

export type { Logger };

export function createLogger(config: Config = loadConfig()): Logger {
  return pino({
    name: 'cmdsyntax',
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let defaultLogger: Logger | undefined;

/** Shared logger used when a component is not given one. */
export function getDefaultLogger(): Logger {
  if (defaultLogger === undefined) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
