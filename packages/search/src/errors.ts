/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Error types for message search operations
 */
export enum SearchErrorType {
  ENGINE_UNAVAILABLE = 'ENGINE_UNAVAILABLE',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
  UNSUPPORTED_FIELD = 'UNSUPPORTED_FIELD',
  UNSUPPORTED_CAPABILITY = 'UNSUPPORTED_CAPABILITY',
  INVALID_PAGINATION_TOKEN = 'INVALID_PAGINATION_TOKEN',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Custom error class for message search errors.
 *
 * Query syntax problems never produce one of these: the parser degrades
 * instead. Failures raised by the engine while a query runs are rethrown
 * as they are; only failures to open the engine are wrapped.
 */
export class SearchError extends Error {
  constructor(
    message: string,
    public readonly type: SearchErrorType,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SearchError';
  }

  /**
   * Format error for log records.
   */
  toLogContext(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      ...this.context,
    };
  }
}

export function isSearchError(
  error: unknown,
  type?: SearchErrorType,
): error is SearchError {
  return (
    error instanceof SearchError && (type === undefined || error.type === type)
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
