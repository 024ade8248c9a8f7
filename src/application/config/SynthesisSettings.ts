/**
 * synthwire - Settings
 *
 * Process-wide defaults for the decorators. Options passed to a single
 * `applyForwarding` / `applyComposition` call take precedence.
 *
 * @example
 * ```typescript
 * configureSynthesis({
 *   logger: createConsoleLogger('debug'),
 *   defaultCachingStrategy: CachingStrategy.NotThreadSafe,
 * });
 * ```
 */

import { CachingStrategy } from '../../domain/policies/CachingStrategy';
import { ILogger, LogLevel, createConsoleLogger, parseLogLevel } from '../logging/logger';

export interface SynthesisSettings {
  /** Receives decoration-time diagnostics */
  logger: ILogger;

  /** Strategy used by `@Composition()` without arguments */
  defaultCachingStrategy: CachingStrategy;

  /** Prefix stripped from forwarded attribute names */
  defaultPrefix: string;

  /** Whether forwarding may fall back to deferred bindings */
  allowDeferred: boolean;
}

/**
 * Environment variable selecting the default console log level
 */
export const LOG_LEVEL_ENV = 'SYNTHWIRE_LOG_LEVEL';

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

function defaultSettings(): SynthesisSettings {
  return {
    logger: createConsoleLogger(parseLogLevel(process.env[LOG_LEVEL_ENV], DEFAULT_LOG_LEVEL)),
    defaultCachingStrategy: CachingStrategy.Disabled,
    defaultPrefix: '_',
    allowDeferred: true,
  };
}

let current: SynthesisSettings = defaultSettings();

export function configureSynthesis(overrides: Partial<SynthesisSettings>): void {
  current = { ...current, ...overrides };
}

export function getSynthesisSettings(): Readonly<SynthesisSettings> {
  return current;
}

/**
 * Restore defaults, re-reading the environment
 */
export function resetSynthesisSettings(): void {
  current = defaultSettings();
}
