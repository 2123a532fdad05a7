import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, AppError, ConfigurationError, handleError, errorCode, isLogLevel } from './logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ context: 'test', level: 'debug' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should log info messages to stdout', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.info('Test message');
      expect(consoleSpy).toHaveBeenCalledOnce();
      expect(consoleSpy.mock.calls[0][0]).toContain('INFO  [test] Test message');
    });

    it('should log debug messages', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.debug('Debug message');
      expect(consoleSpy).toHaveBeenCalled();
    });

    it('should log warning messages', () => {
      const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      logger.warn('Warning message');
      expect(consoleSpy).toHaveBeenCalled();
    });

    it('should log error messages with the error', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      logger.error('Error message', new Error('boom'));
      expect(consoleSpy.mock.calls[0][0]).toContain('Error: boom');
    });
  });

  describe('Log Levels', () => {
    it('should drop messages below the minimum level', () => {
      const errorLogger = new Logger({ context: 'test', level: 'error' });
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      errorLogger.info('Info');
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(errorLogger.getLogs()).toHaveLength(0);
    });

    it('should change level at runtime', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logger.setMinLevel('warn');
      logger.info('hidden');
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(logger.getMinLevel()).toBe('warn');
    });

    it('should recognise level names', () => {
      expect(isLogLevel('warn')).toBe(true);
      expect(isLogLevel('WARN')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('Entries', () => {
    it('should keep only the most recent entries', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const small = new Logger({ level: 'info', maxLogs: 2 });
      small.info('one');
      small.info('two');
      small.info('three');
      expect(small.getLogs().map(entry => entry.message)).toEqual(['two', 'three']);
    });

    it('should filter entries by level and clear them', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      logger.info('a');
      logger.warn('b');
      expect(logger.getLogs('warn').map(entry => entry.message)).toEqual(['b']);
      logger.clear();
      expect(logger.getLogs()).toEqual([]);
    });

    it('should create child loggers with extended context', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const child = logger.child('executor');
      child.info('hello');
      expect(child.getLogs()[0].context).toBe('test:executor');
    });

    it('should keep child entries in the root logger', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      logger.info('from root');
      logger.child('executor').child('cleanup').warn('from grandchild');
      expect(logger.getLogs().map(entry => [entry.context, entry.message])).toEqual([
        ['test', 'from root'],
        ['test:executor:cleanup', 'from grandchild'],
      ]);
      logger.child('listing').clear();
      expect(logger.getLogs()).toEqual([]);
    });

    it('should let children follow later level changes of the parent', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const child = logger.child('listing');
      logger.setMinLevel('error');
      child.info('hidden');
      expect(consoleSpy).not.toHaveBeenCalled();
      expect(child.getMinLevel()).toBe('error');
    });

    it('should handle circular references in data', () => {
      const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const obj: Record<string, unknown> = { a: 1 };
      obj.self = obj;
      expect(() => logger.info('Message', obj)).not.toThrow();
      expect(consoleSpy.mock.calls[0][0]).toContain('[Circular]');
    });
  });
});

describe('AppError', () => {
  it('should create custom error with code', () => {
    const error = new AppError('Test error', 'TEST_ERROR');
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_ERROR');
    expect(error.exitCode).toBe(1);
    expect(error instanceof Error).toBe(true);
  });

  it('should serialize to JSON', () => {
    const error = new AppError('Test', 'CODE', 3, { detail: 'info' });
    expect(error.toJSON()).toEqual({
      name: 'AppError',
      message: 'Test',
      code: 'CODE',
      exitCode: 3,
      context: { detail: 'info' }
    });
  });

  it('should mark configuration errors with exit code 2', () => {
    const error = new ConfigurationError('bad separator', 'INVALID_SEPARATOR');
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('INVALID_SEPARATOR');
    expect(error.exitCode).toBe(2);
  });
});

describe('handleError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should pass AppErrors through', () => {
    const original = new ConfigurationError('nope');
    expect(handleError(original)).toBe(original);
  });

  it('should wrap plain errors and values', () => {
    expect(handleError(new Error('disk')).code).toBe('INTERNAL_ERROR');
    const wrapped = handleError('weird');
    expect(wrapped.code).toBe('UNKNOWN_ERROR');
    expect(wrapped.message).toBe('weird');
  });
});

describe('errorCode', () => {
  it('should read system error codes', () => {
    const error = Object.assign(new Error('exists'), { code: 'EEXIST' });
    expect(errorCode(error)).toBe('EEXIST');
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('string')).toBeUndefined();
  });
});
