import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { Logger, LogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;
  const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(() => {
    Logger.resetInstance();
    logger = Logger.getInstance();
    consoleSpy.mockClear();
  });

  afterAll(() => {
    consoleSpy.mockRestore();
  });

  describe('getInstance', () => {
    it('should return singleton instance', () => {
      const instance1 = Logger.getInstance();
      const instance2 = Logger.getInstance();

      expect(instance1).toBe(instance2);
    });

    it('should hand out a fresh instance after reset', () => {
      const before = Logger.getInstance();
      Logger.resetInstance();

      expect(Logger.getInstance()).not.toBe(before);
    });
  });

  describe('setLogLevel', () => {
    it('should default to INFO', () => {
      expect(logger.getLogLevel()).toBe(LogLevel.INFO);
    });

    it('should only print messages at or above the level', () => {
      logger.setLogLevel(LogLevel.WARN);

      logger.debug('stage skipped');
      logger.info('payload compressed');
      logger.warn('dictionary truncated');
      logger.error('decode aborted');

      expect(consoleSpy).toHaveBeenCalledTimes(2);
      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('WARN: dictionary truncated')
      );
      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('ERROR: decode aborted')
      );
    });
  });

  describe('context', () => {
    it('should append context as JSON', () => {
      logger.setLogLevel(LogLevel.DEBUG);
      logger.debug('stage applied', { stage: 'zero_run', saved: 38 });

      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringContaining('DEBUG: stage applied {"stage":"zero_run","saved":38}')
      );
    });

    it('should keep context on stored entries', () => {
      const context = { dropped: 12 };
      logger.warn('dictionary truncated', context);

      expect(logger.getLogs()[0].context).toEqual(context);
    });
  });

  describe('getLogs', () => {
    it('should return empty array initially', () => {
      expect(logger.getLogs()).toHaveLength(0);
    });

    it('should record entries in order', () => {
      logger.setLogLevel(LogLevel.DEBUG);
      logger.debug('one');
      logger.info('two');
      logger.error('three');

      const logs = logger.getLogs();
      expect(logs.map(entry => entry.level)).toEqual([
        LogLevel.DEBUG,
        LogLevel.INFO,
        LogLevel.ERROR,
      ]);
      expect(logs[1]).toMatchObject({
        message: 'two',
        timestamp: expect.any(Number),
      });
    });

    it('should return copy of logs array', () => {
      logger.info('Test message');

      const logs1 = logger.getLogs();
      const logs2 = logger.getLogs();

      expect(logs1).not.toBe(logs2);
      expect(logs1).toEqual(logs2);
    });
  });

  describe('clearLogs', () => {
    it('should not affect future logging', () => {
      logger.info('First message');
      logger.clearLogs();
      logger.info('Second message');

      const logs = logger.getLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0].message).toBe('Second message');
    });
  });

  describe('log format', () => {
    it('should format log messages correctly', () => {
      logger.info('Test message');

      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringMatching(
          /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO: Test message$/
        )
      );
    });
  });
});
