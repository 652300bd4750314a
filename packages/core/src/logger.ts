/**
 * Logger - Structured diagnostics using pino
 *
 * Log lines are JSON written to stderr so that they never mix with the
 * human-readable output the CLI prints on stdout.
 *
 * Environment variables:
 *   TIDEMARK_LOG_LEVEL - trace | debug | info | warn | error | fatal | silent (default: warn)
 */

import pino, { type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
   level?: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = [ 'trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent' ];

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
   return LOG_LEVELS.some((level) => { return level === value; });
}

/**
 * Resolve the log level from the environment, falling back to `warn`.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
   const envLevel = env.TIDEMARK_LOG_LEVEL?.toLowerCase();

   if (envLevel && isLogLevel(envLevel)) {
      return envLevel;
   }

   return DEFAULT_LOG_LEVEL;
}

/**
 * Create a logger for one component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('migrator');
 * logger.info({ migration: id }, 'Applying migration');
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
   return pino(
      {
         name: component,
         level: options.level ?? getLogLevel(),
      },
      pino.destination({ dest: 2, sync: true })
   );
}
