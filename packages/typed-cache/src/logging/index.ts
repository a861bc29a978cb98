export { createConsoleLogger, resolveLogger, silentLogger } from './logger.js';
export type { CacheLogger, LogContext, LoggerOptions } from './logger.js';
