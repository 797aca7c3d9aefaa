/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Logger for the message search package.
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR, SILENT
 * - Console output, JSON-lines file output, or both
 * - Module-based filtering
 * - Timers for measuring query execution
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// ============================================================================
// Types and Enums
// ============================================================================

/**
 * Log severity levels. Lower number = more verbose.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.SILENT]: '',
};

const RESET_COLOR = '\x1b[0m';

/**
 * A single log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  levelName: string;
  /** Module/component name */
  module: string;
  message: string;
  data?: Record<string, unknown>;
  /** Duration in ms (for timed operations) */
  durationMs?: number;
}

export interface LoggerConfig {
  /** Minimum level to log (default: INFO) */
  level: LogLevel;
  /** Enable console output (default: true) */
  console: boolean;
  /** File path for JSON-lines output (default: undefined = no file) */
  filePath?: string;
  /** Use JSON format on the console (default: false = human readable) */
  json: boolean;
  /** Only log these modules (empty = all modules) */
  modules: string[];
  /** Use colors in console output (default: true) */
  colors: boolean;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  console: true,
  filePath: undefined,
  json: false,
  modules: [],
  colors: true,
};

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
  private config: LoggerConfig;
  private timers: Map<string, number> = new Map();

  // Single-processor write queue so file appends keep their order
  private pendingWrites: string[] = [];
  private isWriting = false;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  // -------------------------------------------------------------------------
  // Configuration
  // -------------------------------------------------------------------------

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  // -------------------------------------------------------------------------
  // Core Logging Methods
  // -------------------------------------------------------------------------

  debug(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, module, message, data);
  }

  info(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, module, message, data);
  }

  warn(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, module, message, data);
  }

  error(module: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, module, message, data);
  }

  private log(
    level: LogLevel,
    module: string,
    message: string,
    data?: Record<string, unknown>,
    durationMs?: number,
  ): void {
    if (level < this.config.level || level === LogLevel.SILENT) return;

    if (
      this.config.modules.length > 0 &&
      !this.config.modules.includes(module)
    ) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LOG_LEVEL_NAMES[level],
      module,
      message,
    };

    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    if (durationMs !== undefined) {
      entry.durationMs = durationMs;
    }

    if (this.config.console) {
      this.writeConsole(entry);
    }
    if (this.config.filePath) {
      this.writeFile(entry);
    }
  }

  // -------------------------------------------------------------------------
  // Timing Utilities
  // -------------------------------------------------------------------------

  startTimer(name: string): void {
    this.timers.set(name, performance.now());
  }

  /**
   * End a timer and log the duration at DEBUG level.
   * @returns Duration in milliseconds, or -1 if the timer was never started
   */
  endTimer(
    name: string,
    module: string,
    message: string,
    data?: Record<string, unknown>,
  ): number {
    const startTime = this.timers.get(name);
    if (startTime === undefined) {
      this.warn('Logger', `Timer '${name}' not found`);
      return -1;
    }

    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    this.timers.delete(name);

    this.log(LogLevel.DEBUG, module, message, { ...data, durationMs }, durationMs);
    return durationMs;
  }

  // -------------------------------------------------------------------------
  // Output Formatting
  // -------------------------------------------------------------------------

  private writeConsole(entry: LogEntry): void {
    const output = this.config.json
      ? JSON.stringify(entry)
      : this.formatHumanReadable(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      default:
        console.error(output);
    }
  }

  /**
   * Format log entry for human reading.
   */
  formatHumanReadable(entry: LogEntry): string {
    const parts: string[] = [`[${entry.timestamp}]`];

    if (this.config.colors) {
      const color = LOG_LEVEL_COLORS[entry.level];
      parts.push(`${color}${entry.levelName.padEnd(5)}${RESET_COLOR}`);
    } else {
      parts.push(entry.levelName.padEnd(5));
    }

    parts.push(`[${entry.module}]`, entry.message);

    if (entry.durationMs !== undefined) {
      parts.push(`(${entry.durationMs}ms)`);
    }
    if (entry.data) {
      parts.push(JSON.stringify(entry.data));
    }

    return parts.join(' ');
  }

  private writeFile(entry: LogEntry): void {
    this.pendingWrites.push(JSON.stringify(entry) + '\n');
    if (!this.isWriting) {
      void this.processWriteQueue();
    }
  }

  private async processWriteQueue(): Promise<void> {
    const filePath = this.config.filePath;
    if (this.isWriting || !filePath) return;

    this.isWriting = true;
    try {
      await mkdir(dirname(filePath), { recursive: true });
      let line = this.pendingWrites.shift();
      while (line !== undefined) {
        await appendFile(filePath, line);
        line = this.pendingWrites.shift();
      }
    } catch (err) {
      console.error('[Logger] Failed to write to file:', err);
      this.pendingWrites = [];
    } finally {
      this.isWriting = false;
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Wait for pending file writes.
   */
  async flush(): Promise<void> {
    while (this.pendingWrites.length > 0 || this.isWriting) {
      if (!this.isWriting) {
        await this.processWriteQueue();
        continue;
      }
      await new Promise((resolve) => setTimeout(resolve, 10));
    }
  }

  child(module: string): ModuleLogger {
    return new ModuleLogger(this, module);
  }
}

// ============================================================================
// Module Logger
// ============================================================================

/**
 * A logger bound to a specific module.
 */
export class ModuleLogger {
  constructor(
    private readonly logger: Logger,
    private readonly module: string,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(this.module, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(this.module, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(this.module, message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.logger.error(this.module, message, data);
  }

  startTimer(name: string): void {
    this.logger.startTimer(`${this.module}:${name}`);
  }

  endTimer(
    name: string,
    message: string,
    data?: Record<string, unknown>,
  ): number {
    return this.logger.endTimer(
      `${this.module}:${name}`,
      this.module,
      message,
      data,
    );
  }
}

// ============================================================================
// Global Logger Instance
// ============================================================================

/**
 * Global logger instance. Configured once by MessageSearchSystem.
 */
export const globalLogger = new Logger();

export function createModuleLogger(module: string): ModuleLogger {
  return globalLogger.child(module);
}

/**
 * Parse log level from string. Unknown names map to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
    case 'OFF':
    case 'NONE':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}
