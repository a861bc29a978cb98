/**
 * Logging for cache internals.
 *
 * Caches log what they do on their own (evictions, expirations, skipped
 * writes) at debug level. Nothing is logged unless a logger is passed in
 * or the TYPED_CACHE_DEBUG environment variable is set.
 *
 * @packageDocumentation
 */

import { readDebugFlag } from '../config/options.js';

/**
 * Structured context attached to a log line.
 */
export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Logger interface accepted by every cache factory.
 */
export interface CacheLogger {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
}

/**
 * Options carrying an optional logger.
 */
export interface LoggerOptions {
  /** Logger for cache internals (default: silent unless TYPED_CACHE_DEBUG is set) */
  readonly logger?: CacheLogger | undefined;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: CacheLogger = {
  debug: () => undefined,
  warn: () => undefined,
};

/**
 * Creates a logger writing `[scope] message` lines to stderr.
 *
 * Stderr keeps cache diagnostics out of a process's stdout, which may be
 * carrying protocol traffic.
 *
 * @param scope - Prefix identifying the component that logs
 */
export const createConsoleLogger = (scope: string): CacheLogger => {
  const write = (level: string, message: string, context?: LogContext): void => {
    if (context === undefined) {
      console.error(`[${scope}] ${level}: ${message}`);
    } else {
      console.error(`[${scope}] ${level}: ${message}`, context);
    }
  };

  return {
    debug: (message, context) => {
      write('debug', message, context);
    },
    warn: (message, context) => {
      write('warn', message, context);
    },
  };
};

/**
 * Picks the logger a component should use.
 *
 * @param options - Component options that may carry a logger
 * @param scope - Prefix for the console logger used in debug mode
 * @param env - Environment to read TYPED_CACHE_DEBUG from (default: process.env)
 */
export const resolveLogger = (
  options: LoggerOptions,
  scope: string,
  env: NodeJS.ProcessEnv = process.env
): CacheLogger => {
  if (options.logger !== undefined) {
    return options.logger;
  }
  return readDebugFlag(env) ? createConsoleLogger(scope) : silentLogger;
};
