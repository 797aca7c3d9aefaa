/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tests for Logger class.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Logger,
  LogLevel,
  ModuleLogger,
  parseLogLevel,
  createModuleLogger,
  type LogEntry,
} from './Logger.js';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({
      level: LogLevel.DEBUG,
      console: false, // Disable console for tests
      json: false,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Configuration', () => {
    it('should use default configuration', () => {
      const config = new Logger().getConfig();

      expect(config.level).toBe(LogLevel.INFO);
      expect(config.console).toBe(true);
      expect(config.json).toBe(false);
      expect(config.modules).toEqual([]);
      expect(config.filePath).toBeUndefined();
    });

    it('should accept custom configuration', () => {
      const config = new Logger({
        level: LogLevel.WARN,
        console: false,
        json: true,
        modules: ['TestModule'],
      }).getConfig();

      expect(config.level).toBe(LogLevel.WARN);
      expect(config.console).toBe(false);
      expect(config.json).toBe(true);
      expect(config.modules).toEqual(['TestModule']);
    });

    it('should update configuration at runtime', () => {
      logger.setLevel(LogLevel.ERROR);
      expect(logger.getConfig().level).toBe(LogLevel.ERROR);

      logger.configure({ modules: ['Module1'] });
      expect(logger.getConfig().modules).toEqual(['Module1']);
      expect(logger.getConfig().level).toBe(LogLevel.ERROR);
    });
  });

  describe('Log Levels', () => {
    it('should respect log level filtering', () => {
      const consoleSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

      logger.configure({ console: true, level: LogLevel.INFO });
      logger.debug('TestModule', 'Debug message');

      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should log messages at or above configured level', () => {
      const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

      logger.configure({ console: true, level: LogLevel.INFO });
      logger.warn('TestModule', 'Warn message');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it('should log nothing when silent', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logger.configure({ console: true, level: LogLevel.SILENT });
      logger.error('TestModule', 'Error message');

      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it('should filter by module when modules are specified', () => {
      const consoleSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

      logger.configure({ console: true, modules: ['AllowedModule'] });

      logger.info('AllowedModule', 'Should appear');
      logger.info('BlockedModule', 'Should not appear');
      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('Output Formatting', () => {
    const entry: LogEntry = {
      timestamp: '2026-01-01T00:00:00.000Z',
      level: LogLevel.INFO,
      levelName: 'INFO',
      module: 'TestModule',
      message: 'search:complete',
      data: { count: 2 },
      durationMs: 1.5,
    };

    it('should format entries for human reading', () => {
      logger.configure({ colors: false });
      expect(logger.formatHumanReadable(entry)).toBe(
        '[2026-01-01T00:00:00.000Z] INFO  [TestModule] search:complete (1.5ms) {"count":2}',
      );
    });

    it('should write JSON to the console when configured', () => {
      const consoleSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

      logger.configure({ console: true, json: true });
      logger.info('TestModule', 'search:start', { queryId: 'q_1' });

      const output: unknown = consoleSpy.mock.calls[0][0];
      expect(typeof output).toBe('string');
      expect(JSON.parse(String(output))).toMatchObject({
        levelName: 'INFO',
        module: 'TestModule',
        message: 'search:start',
        data: { queryId: 'q_1' },
      });
    });
  });

  describe('File Output', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'message-search-log-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should append JSON lines in order', async () => {
      const filePath = join(dir, 'nested', 'search.log');
      logger.configure({ filePath });

      logger.info('TestModule', 'first');
      logger.warn('TestModule', 'second', { n: 2 });
      await logger.flush();

      const lines = readFileSync(filePath, 'utf8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(JSON.parse(lines[0])).toMatchObject({ message: 'first' });
      expect(JSON.parse(lines[1])).toMatchObject({
        message: 'second',
        data: { n: 2 },
      });
    });
  });

  describe('Timing Utilities', () => {
    it('should track timer duration', async () => {
      const consoleSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      logger.configure({ console: true });

      logger.startTimer('testOperation');
      await new Promise((resolve) => setTimeout(resolve, 50));
      const duration = logger.endTimer('testOperation', 'TestModule', 'Operation complete');

      expect(duration).toBeGreaterThanOrEqual(40); // Allow some variance
      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it('should return -1 for non-existent timer', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      logger.configure({ console: true });

      expect(logger.endTimer('nonExistent', 'TestModule', 'Should warn')).toBe(-1);
    });
  });
});

describe('ModuleLogger', () => {
  it('should prefix entries with its module', () => {
    const logger = new Logger({ console: true, colors: false });
    const consoleSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    const moduleLogger = logger.child('MessageSearchStore');
    expect(moduleLogger).toBeInstanceOf(ModuleLogger);
    moduleLogger.info('search:start');

    expect(String(consoleSpy.mock.calls[0][0])).toContain(
      '[MessageSearchStore] search:start',
    );
    consoleSpy.mockRestore();
  });

  it('should scope timers by module', () => {
    const logger = new Logger({ console: false });
    const a = logger.child('A');
    const b = logger.child('B');

    a.startTimer('op');
    expect(b.endTimer('op', 'done')).toBe(-1);
    expect(a.endTimer('op', 'done')).toBeGreaterThanOrEqual(0);
  });

  it('should be created from the global logger', () => {
    expect(createModuleLogger('Test')).toBeInstanceOf(ModuleLogger);
  });
});

describe('parseLogLevel', () => {
  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Info')).toBe(LogLevel.INFO);
    expect(parseLogLevel('WARNING')).toBe(LogLevel.WARN);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('off')).toBe(LogLevel.SILENT);
  });

  it('should fall back to INFO', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});
