/**
 * Logger Service Tests
 */

import { Logger, ModuleLogger, getLogger } from '../../src/services/Logger';
import type { DebugSettings } from '../../src/types/settings';
import { DEFAULT_DEBUG_MODULES } from '../../src/types/settings';

describe('Logger', () => {
  let consoleSpy: {
    log: jest.SpyInstance;
    info: jest.SpyInstance;
    warn: jest.SpyInstance;
    error: jest.SpyInstance;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(),
      info: jest.spyOn(console, 'info').mockImplementation(),
      warn: jest.spyOn(console, 'warn').mockImplementation(),
      error: jest.spyOn(console, 'error').mockImplementation(),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('initialization', () => {
    it('should initialize logger singleton', () => {
      const debugSettings: DebugSettings = {
        enabled: true,
        modules: { ...DEFAULT_DEBUG_MODULES },
      };

      const logger = Logger.initialize({
        prefix: 'Test',
        getDebugSettings: () => debugSettings,
      });

      expect(logger).toBeDefined();
      expect(Logger.getInstance()).toBe(logger);
    });
  });

  describe('logging', () => {
    let debugSettings: DebugSettings;
    let logger: Logger;

    beforeEach(() => {
      debugSettings = {
        enabled: true,
        modules: { ...DEFAULT_DEBUG_MODULES },
      };

      logger = Logger.initialize({
        prefix: 'Test',
        getDebugSettings: () => debugSettings,
      });
    });

    it('should log debug messages when enabled', () => {
      logger.debug('loader', 'Test message', { data: 123 });

      expect(consoleSpy.log).toHaveBeenCalledWith(
        '[Test:loader]',
        'Test message',
        { data: 123 }
      );
    });

    it('should not log debug messages when disabled', () => {
      debugSettings.enabled = false;
      logger.debug('loader', 'Test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should not log when specific module is disabled', () => {
      debugSettings.modules.loader = false;
      logger.debug('loader', 'Test message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('should always log warnings', () => {
      debugSettings.enabled = false;
      logger.warn('loader', 'Warning message');

      expect(consoleSpy.warn).toHaveBeenCalledWith(
        '[Test:loader]',
        'Warning message'
      );
    });

    it('should always log errors', () => {
      debugSettings.enabled = false;
      logger.error('loader', 'Error message');

      expect(consoleSpy.error).toHaveBeenCalledWith(
        '[Test:loader]',
        'Error message'
      );
    });

    it('should log info only when debug is enabled', () => {
      logger.info('parser', 'Parsed');
      debugSettings.enabled = false;
      logger.info('parser', 'Parsed again');

      expect(consoleSpy.info).toHaveBeenCalledTimes(1);
      expect(consoleSpy.info).toHaveBeenCalledWith('[Test:parser]', 'Parsed');
    });

    it('should pick up settings changes without re-initialization', () => {
      debugSettings.modules.trie = false;
      logger.debug('trie', 'hidden');

      debugSettings.modules.trie = true;
      logger.debug('trie', 'shown');

      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
      expect(consoleSpy.log).toHaveBeenCalledWith('[Test:trie]', 'shown');
    });
  });

  describe('without initialization', () => {
    beforeEach(() => {
      Logger.reset();
    });

    it('should drop debug output', () => {
      getLogger('keyHandler').debug('dropped');

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(getLogger('keyHandler').isEnabled()).toBe(false);
    });

    it('should still report warnings and errors', () => {
      getLogger('registry').warn('x is already registered');
      getLogger('dispatch').error('failed', 42);

      expect(consoleSpy.warn).toHaveBeenCalledWith('[keystroke:registry]', 'x is already registered');
      expect(consoleSpy.error).toHaveBeenCalledWith('[keystroke:dispatch]', 'failed', 42);
    });

    it('should still run grouped work', () => {
      const work = jest.fn();

      getLogger('loader').group('load', work);

      expect(work).toHaveBeenCalledTimes(1);
    });
  });

  describe('ModuleLogger', () => {
    beforeEach(() => {
      Logger.initialize({
        prefix: 'Test',
        getDebugSettings: () => ({
          enabled: true,
          modules: { ...DEFAULT_DEBUG_MODULES },
        }),
      });
    });

    it('should create module-specific logger', () => {
      const moduleLogger = getLogger('mapping');
      expect(moduleLogger).toBeInstanceOf(ModuleLogger);
    });

    it('should log with module context', () => {
      const moduleLogger = getLogger('mapping');
      moduleLogger.debug('Mapping test');

      expect(consoleSpy.log).toHaveBeenCalledWith(
        '[Test:mapping]',
        'Mapping test'
      );
    });

    it('should check if enabled', () => {
      const moduleLogger = getLogger('mapping');
      expect(moduleLogger.isEnabled()).toBe(true);
    });
  });

  describe('timing', () => {
    let logger: Logger;

    beforeEach(() => {
      logger = Logger.initialize({
        prefix: 'Test',
        getDebugSettings: () => ({
          enabled: true,
          modules: { ...DEFAULT_DEBUG_MODULES },
        }),
      });
    });

    it('should measure execution time', async () => {
      const endTimer = logger.time('loader', 'operation');

      await new Promise((resolve) => setTimeout(resolve, 10));
      endTimer();

      expect(consoleSpy.log).toHaveBeenCalledWith(
        expect.stringContaining('[Test:loader] operation completed in')
      );
    });
  });
});
