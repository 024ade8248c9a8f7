/**
 * @module synthwire/application/logging
 */

export { consoleLogger, silentLogger, createConsoleLogger, parseLogLevel, isLogLevel } from './logger';
export type { ILogger, LogLevel } from './logger';
