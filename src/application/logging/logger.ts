/**
 * synthwire - Logger
 *
 * Logging port used by the synthesizers. Decoration-time decisions (which
 * attribute got which property, which one was skipped) are reported at debug
 * level.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Console logger that drops messages below `level`
 */
export function createConsoleLogger(level: LogLevel): ILogger {
  const threshold = LEVEL_ORDER[level];
  const pick = (candidate: LogLevel, write: ILogger['debug']): ILogger['debug'] =>
    LEVEL_ORDER[candidate] >= threshold ? write : silentLogger.debug;
  return {
    debug: pick('debug', consoleLogger.debug),
    info: pick('info', consoleLogger.info),
    warn: pick('warn', consoleLogger.warn),
    error: pick('error', consoleLogger.error),
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Parse a level name, case-insensitively, falling back on anything else
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
