/**
 * Observability module
 */

export { ConsoleLogger, NoopLogger, logError, logRequest, logResponse, redactHeaders } from './logging.js';
export type { ConsoleLoggerOptions, LogLevel, Logger } from './logging.js';
