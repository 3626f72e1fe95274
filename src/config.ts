/**
 * Environment configuration
 */

import { z } from 'zod';
import { AsyncGraphConfigError } from './errors.js';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  ASYNC_GRAPH_LOG_LEVEL: LogLevelSchema.default('warn')
});

export type AsyncGraphConfig = {
  logLevel: LogLevel;
};

/**
 * Read configuration from environment variables
 *
 * @example
 * // ASYNC_GRAPH_LOG_LEVEL=debug
 * loadConfig(); // { logLevel: 'debug' }
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AsyncGraphConfig {
  const parsed = EnvSchema.safeParse({
    ASYNC_GRAPH_LOG_LEVEL: env['ASYNC_GRAPH_LOG_LEVEL'] || undefined
  });
  if (!parsed.success) {
    throw new AsyncGraphConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return { logLevel: parsed.data.ASYNC_GRAPH_LOG_LEVEL };
}
