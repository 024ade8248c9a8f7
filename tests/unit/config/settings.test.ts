/**
 * @fileoverview Unit tests for settings and logging
 */

import 'reflect-metadata';

import {
  CachingStrategy,
  Declare,
  LOG_LEVEL_ENV,
  applyForwarding,
  configureSynthesis,
  createConsoleLogger,
  getSynthesisSettings,
  parseLogLevel,
  resetSynthesisSettings,
  silentLogger,
} from '../../../src';

class Settings {
  @Declare() timeout!: number;
}

describe('Synthesis Settings', () => {
  afterEach(() => {
    process.env[LOG_LEVEL_ENV] = 'silent';
    resetSynthesisSettings();
    jest.restoreAllMocks();
  });

  it('should start from the documented defaults', () => {
    const settings = getSynthesisSettings();

    expect(settings.defaultCachingStrategy).toBe(CachingStrategy.Disabled);
    expect(settings.defaultPrefix).toBe('_');
    expect(settings.allowDeferred).toBe(true);
  });

  it('should merge overrides and restore defaults on reset', () => {
    configureSynthesis({ defaultPrefix: 'cfg_', logger: silentLogger });

    expect(getSynthesisSettings().defaultPrefix).toBe('cfg_');
    expect(getSynthesisSettings().allowDeferred).toBe(true);

    resetSynthesisSettings();

    expect(getSynthesisSettings().defaultPrefix).toBe('_');
  });

  it('should apply the default prefix to forwarding passes', () => {
    configureSynthesis({ defaultPrefix: 'cfg_' });
    class Job {
      @Declare() settings!: Settings;
      @Declare() cfg_timeout!: number;
    }

    applyForwarding(Job, 'settings');

    expect(Object.prototype.hasOwnProperty.call(Job.prototype, 'cfg_timeout')).toBe(true);
  });

  it('should read the console log level from the environment', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    process.env[LOG_LEVEL_ENV] = 'error';
    resetSynthesisSettings();

    getSynthesisSettings().logger.warn('dropped');
    getSynthesisSettings().logger.error('kept');

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[ERROR] kept');
  });
});

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('should accept level names case-insensitively', () => {
      expect(parseLogLevel(' DEBUG ', 'warn')).toBe('debug');
      expect(parseLogLevel('Silent', 'warn')).toBe('silent');
    });

    it('should fall back for unknown or missing values', () => {
      expect(parseLogLevel('loud', 'warn')).toBe('warn');
      expect(parseLogLevel(undefined, 'info')).toBe('info');
    });
  });

  describe('createConsoleLogger', () => {
    it('should drop messages below the level', () => {
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = createConsoleLogger('warn');

      logger.debug('hidden');
      logger.warn('careful', 3);

      expect(debug).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith('[WARN] careful', 3);
    });

    it('should write nothing when silent', () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      createConsoleLogger('silent').error('nothing');

      expect(error).not.toHaveBeenCalled();
    });
  });
});
