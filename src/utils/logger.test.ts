import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'fs';
import {
  Logger,
  LogLevel,
  LogTarget,
  LogFormat,
  createSilentLogger,
  isLogLevel,
} from './logger.js';
import { formatEmergencyLine } from './emergencyLog.js';

vi.mock('fs');
const mockedFs = vi.mocked(fs);

describe('logger utils', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockedFs.existsSync.mockReturnValue(false);
    mockedFs.mkdirSync.mockReturnValue(undefined);
  });

  describe('Logger construction', () => {
    it('should default to info level', () => {
      const logger = new Logger({ silent: true });
      expect(logger.level).toBe(LogLevel.INFO);
    });

    it('should accept custom configuration', () => {
      const logger = new Logger({
        level: LogLevel.DEBUG,
        target: LogTarget.CONSOLE,
        format: LogFormat.JSON,
        context: 'test-context',
        silent: true,
      });
      expect(logger.level).toBe(LogLevel.DEBUG);
    });

    it('should allow changing log level dynamically', () => {
      const logger = new Logger({ level: LogLevel.ERROR, silent: true });
      logger.setLevel(LogLevel.DEBUG);
      expect(logger.level).toBe(LogLevel.DEBUG);
    });
  });

  describe('File target', () => {
    it('should create the log directory when it is missing', () => {
      const logger = new Logger({
        target: LogTarget.FILE,
        logDir: './.tmp/test-logs',
        silent: true,
      });

      expect(logger).toBeInstanceOf(Logger);
      expect(mockedFs.mkdirSync).toHaveBeenCalledWith('./.tmp/test-logs', {
        recursive: true,
      });
    });

    it('should not create an existing log directory', () => {
      mockedFs.existsSync.mockReturnValue(true);

      new Logger({
        target: LogTarget.FILE,
        logDir: './.tmp/test-logs',
        silent: true,
      });

      expect(mockedFs.mkdirSync).not.toHaveBeenCalled();
    });

    it('should fall back to stderr when the directory cannot be created', () => {
      const stderrSpy = vi
        .spyOn(process.stderr, 'write')
        .mockImplementation(() => true);
      mockedFs.mkdirSync.mockImplementation(() => {
        throw new Error('Directory creation failed');
      });

      try {
        const logger = new Logger({
          target: LogTarget.FILE,
          logDir: './.tmp/unwritable',
          silent: true,
        });

        expect(logger).toBeInstanceOf(Logger);
        const lines = stderrSpy.mock.calls.map((call) => String(call[0]));
        expect(
          lines.some((line) =>
            line.includes(
              '[WARN] Failed to create file transport: Directory creation failed'
            )
          )
        ).toBe(true);
      } finally {
        stderrSpy.mockRestore();
      }
    });
  });

  describe('Logging methods', () => {
    it('should accept strings, errors and metadata', () => {
      const logger = createSilentLogger();
      const error = new Error('Test error');

      expect(() => logger.debug('debug', { user: 'test' })).not.toThrow();
      expect(() => logger.info('info', { action: 'create' })).not.toThrow();
      expect(() => logger.warn('warn')).not.toThrow();
      expect(() => logger.error(error, { code: 'ERR_001' })).not.toThrow();
    });
  });

  describe('Child loggers', () => {
    it('should create independent child loggers', () => {
      const parent = new Logger({ context: 'parent', silent: true });
      const child1 = parent.child('child1');
      const child2 = parent.child('child2');

      expect(child1).toBeInstanceOf(Logger);
      expect(child1).not.toBe(child2);
      expect(() => child1.info('child message')).not.toThrow();
    });

    it('should inherit the level from the parent', () => {
      const parent = new Logger({ level: LogLevel.WARN, silent: true });
      expect(parent.child('child').level).toBe(LogLevel.WARN);
    });
  });

  describe('isLogLevel', () => {
    it('should accept the four levels', () => {
      expect(['error', 'warn', 'info', 'debug'].every(isLogLevel)).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('INFO')).toBe(false);
    });
  });

  describe('formatEmergencyLine', () => {
    it('should include the error message when given an Error', () => {
      const line = formatEmergencyLine('ERROR', 'Startup failed', new Error('boom'));
      expect(line).toMatch(/^\S+ \[ERROR\] Startup failed: boom\n$/);
    });

    it('should omit the suffix without an error', () => {
      const line = formatEmergencyLine('WARN', 'Shutting down');
      expect(line).toMatch(/^\S+ \[WARN\] Shutting down\n$/);
    });

    it('should not serialise non-string values', () => {
      const line = formatEmergencyLine('WARN', 'Odd failure', { code: 1 });
      expect(line.endsWith('Odd failure: Non-string error occurred\n')).toBe(true);
    });
  });
});
