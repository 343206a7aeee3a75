/**
 * Logger Tests
 *
 * Tests for the level-filtered console logger and the silent default.
 */

import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import {
  ConsoleLogger,
  createLogger,
  isLogLevel,
  type Logger,
  SILENT_LOGGER,
} from '../../../src/utils/logger';

describe('Logger', () => {
  let consoleSpy: Record<'warn' | 'error' | 'info' | 'debug', MockInstance>;

  beforeEach(() => {
    consoleSpy = {
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
      info: vi.spyOn(console, 'info').mockImplementation(() => {}),
      debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    Object.values(consoleSpy).forEach((spy) => spy.mockRestore());
  });

  describe('ConsoleLogger', () => {
    it('should default to the info level', () => {
      expect(new ConsoleLogger().level).toBe('info');
    });

    it('should log a message without context', () => {
      const logger = new ConsoleLogger('debug');

      logger.warn('Test warning message');

      expect(consoleSpy.warn).toHaveBeenCalledOnce();
      expect(consoleSpy.warn).toHaveBeenCalledWith('Test warning message');
    });

    it('should pass the context object through', () => {
      const logger = new ConsoleLogger('debug');
      const context = { inputIndex: 2, format: 'bech32' };

      logger.error('Signing failed', context);
      logger.info('Signed', context);
      logger.debug('Derived', context);

      expect(consoleSpy.error).toHaveBeenCalledWith('Signing failed', context);
      expect(consoleSpy.info).toHaveBeenCalledWith('Signed', context);
      expect(consoleSpy.debug).toHaveBeenCalledWith('Derived', context);
    });

    it('should drop messages below the minimum level', () => {
      const logger = new ConsoleLogger('warn');

      logger.debug('hidden');
      logger.info('hidden');
      logger.warn('shown');
      logger.error('shown');

      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.warn).toHaveBeenCalledOnce();
      expect(consoleSpy.error).toHaveBeenCalledOnce();
    });

    it('should keep separate call counts per level', () => {
      const logger = new ConsoleLogger('debug');

      logger.warn('one');
      logger.warn('two');
      logger.info('three');

      expect(consoleSpy.warn).toHaveBeenCalledTimes(2);
      expect(consoleSpy.info).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe('SILENT_LOGGER', () => {
    it('should write nothing at any level', () => {
      SILENT_LOGGER.error('nothing');
      SILENT_LOGGER.warn('nothing');
      SILENT_LOGGER.info('nothing');
      SILENT_LOGGER.debug?.('nothing');

      for (const spy of Object.values(consoleSpy)) {
        expect(spy).not.toHaveBeenCalled();
      }
    });
  });

  describe('createLogger', () => {
    it('should return the silent logger for the silent level', () => {
      expect(createLogger('silent')).toBe(SILENT_LOGGER);
    });

    it('should return a console logger at the requested level', () => {
      const logger = createLogger('error');

      expect(logger).toBeInstanceOf(ConsoleLogger);
      logger.warn('dropped');
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });
  });

  describe('isLogLevel', () => {
    it('should accept the known levels only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('silent')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel(10)).toBe(false);
    });
  });

  describe('Interface compliance', () => {
    it('should accept custom logger implementations', () => {
      const messages: string[] = [];
      const custom: Logger = {
        warn: (message) => messages.push(`warn:${message}`),
        error: (message) => messages.push(`error:${message}`),
        info: (message) => messages.push(`info:${message}`),
      };

      custom.warn('a');
      custom.debug?.('b');
      custom.error('c');

      expect(messages).toEqual(['warn:a', 'error:c']);
    });
  });
});
