/**
 * Library logger
 */

import { pino, type Logger } from 'pino';
import { loadConfig, type AsyncGraphConfig } from './config.js';

export type { Logger };

export function createLogger(config: AsyncGraphConfig): Logger {
  return pino({
    name: 'async-graph',
    level: config.logLevel,
    formatters: {
      level: (label) => ({ level: label })
    }
  });
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger, configured from the environment on first use
 */
export function getLogger(): Logger {
  defaultLogger ??= createLogger(loadConfig());
  return defaultLogger;
}
