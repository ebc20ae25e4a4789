/**
 * Unit tests for the global Logger
 */

import { Logger, configureLoggerFromEnvironment, isLogLevel } from '../../../../src/core/components/Logger';

describe('Logger', () => {
  const initial = Logger.getConfig();

  afterEach(() => {
    Logger.configure(initial);
  });

  it('should only log at or above the configured level', () => {
    Logger.configure({ enabled: true, level: 'warn' });

    expect(Logger.shouldLog('debug')).toBe(false);
    expect(Logger.shouldLog('info')).toBe(false);
    expect(Logger.shouldLog('warn')).toBe(true);
    expect(Logger.shouldLog('error')).toBe(true);
  });

  it('should log nothing when disabled or silent', () => {
    Logger.configure({ enabled: true, level: 'silent' });
    expect(Logger.shouldLog('error')).toBe(false);

    Logger.configure({ level: 'debug' });
    Logger.disable();
    expect(Logger.shouldLog('error')).toBe(false);
    Logger.enable();
    expect(Logger.shouldLog('debug')).toBe(true);
  });

  it('should return a copy of its configuration', () => {
    const config = Logger.getConfig();
    config.level = 'silent';
    expect(Logger.getConfig().level).toBe(initial.level);
  });

  describe('configureLoggerFromEnvironment', () => {
    beforeEach(() => {
      Logger.configure({ enabled: true, level: 'info' });
    });

    it('should turn on debug output with ZIPSTEP_DEBUG=true', () => {
      configureLoggerFromEnvironment({ ZIPSTEP_DEBUG: 'true' });
      expect(Logger.getConfig()).toEqual({ enabled: true, level: 'debug' });
    });

    it('should disable output with ZIPSTEP_DEBUG=false', () => {
      configureLoggerFromEnvironment({ ZIPSTEP_DEBUG: 'false' });
      expect(Logger.getConfig().enabled).toBe(false);
    });

    it('should apply a valid ZIPSTEP_LOG_LEVEL and ignore others', () => {
      configureLoggerFromEnvironment({ ZIPSTEP_LOG_LEVEL: 'error' });
      expect(Logger.getConfig().level).toBe('error');

      configureLoggerFromEnvironment({ ZIPSTEP_LOG_LEVEL: 'loud' });
      expect(Logger.getConfig().level).toBe('error');
    });

    it('should restrict output to errors in production', () => {
      configureLoggerFromEnvironment({ NODE_ENV: 'production', ZIPSTEP_LOG_LEVEL: 'debug' });
      expect(Logger.getConfig().level).toBe('error');
    });
  });

  it('should recognise log level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
