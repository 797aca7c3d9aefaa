/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Configuration types and defaults for message search.
 */

import { SearchError, SearchErrorType } from './errors.js';
import { EngineCapability } from './query/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type StorageBackend = 'pglite' | 'sqlite';

export interface DatabaseConfig {
  /** Storage backend. Default: 'pglite' */
  backend: StorageBackend;
  /** Database directory; the sqlite backend keeps its file inside it */
  path: string;
  /** Whether to use an in-memory database (for testing). Default: false */
  inMemory: boolean;
}

export interface SearchConfig {
  /** Postgres text search configuration. Default: 'english' */
  textSearchConfig: string;
  /** Event content keys that are indexed for search */
  indexedKeys: string[];
  /** Upper bound on results returned by searchMessages. Default: 500 */
  maxResults: number;
  /** Page size for searchRooms when no limit is given. Default: 10 */
  defaultLimit: number;
  /** MaxFragments passed to ts_headline. Default: 50 */
  maxHighlightFragments: number;
  /**
   * Force a capability tier instead of probing the engine.
   * Only meant for exercising the fallback tiers in tests.
   */
  forceCapability?: EngineCapability;
}

export interface LoggingConfig {
  /** Minimum level name (DEBUG, INFO, WARN, ERROR, SILENT). Default: 'WARN' */
  level: string;
  /** Log to console. Default: true */
  console: boolean;
  /** JSON-lines log file. Default: undefined (no file logging) */
  filePath?: string;
  /** JSON console output. Default: false */
  json: boolean;
}

export interface MessageSearchConfig {
  database: DatabaseConfig;
  search: SearchConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_DATABASE_CONFIG: DatabaseConfig = {
  backend: 'pglite',
  path: '.homeserver/search',
  inMemory: false,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  textSearchConfig: 'english',
  indexedKeys: ['content.body', 'content.name', 'content.topic'],
  maxResults: 500,
  defaultLimit: 10,
  maxHighlightFragments: 50,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'WARN',
  console: true,
  json: false,
};

export const DEFAULT_CONFIG: MessageSearchConfig = {
  database: DEFAULT_DATABASE_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

// ============================================================================
// Configuration Utilities
// ============================================================================

/**
 * Deep partial type for nested partial objects.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

/**
 * Merge one config section over its defaults. Arrays are replaced, not
 * concatenated; undefined values keep the default.
 */
function mergeSection<T extends object>(target: T, source?: Partial<T>): T {
  const result: T = { ...target };
  if (!source) return result;

  for (const key of Object.keys(source) as Array<keyof T>) {
    const value = source[key];
    if (value !== undefined) {
      result[key] = value as T[keyof T];
    }
  }
  return result;
}

/**
 * Create a complete configuration by merging partial config with defaults.
 */
export function createConfig(
  partial?: DeepPartial<MessageSearchConfig>,
): MessageSearchConfig {
  return {
    database: mergeSection(DEFAULT_DATABASE_CONFIG, partial?.database),
    search: mergeSection(DEFAULT_SEARCH_CONFIG, partial?.search),
    logging: mergeSection(DEFAULT_LOGGING_CONFIG, partial?.logging),
  };
}

function invalid(message: string, field: string): SearchError {
  return new SearchError(message, SearchErrorType.INVALID_CONFIG, { field });
}

/**
 * Validate configuration values.
 * Throws a SearchError of type INVALID_CONFIG if configuration is invalid.
 */
export function validateConfig(config: MessageSearchConfig): void {
  if (!config.database.path && !config.database.inMemory) {
    throw invalid(
      'Database path is required when not using in-memory mode',
      'database.path',
    );
  }
  if (!/^[A-Za-z_][A-Za-z0-9_.]*$/.test(config.search.textSearchConfig)) {
    throw invalid(
      'textSearchConfig must be a plain configuration name',
      'search.textSearchConfig',
    );
  }
  if (config.search.indexedKeys.length === 0) {
    throw invalid('indexedKeys cannot be empty', 'search.indexedKeys');
  }
  if (!Number.isInteger(config.search.maxResults) || config.search.maxResults <= 0) {
    throw invalid('maxResults must be a positive integer', 'search.maxResults');
  }
  if (
    !Number.isInteger(config.search.defaultLimit) ||
    config.search.defaultLimit <= 0
  ) {
    throw invalid(
      'defaultLimit must be a positive integer',
      'search.defaultLimit',
    );
  }
  if (
    !Number.isInteger(config.search.maxHighlightFragments) ||
    config.search.maxHighlightFragments <= 0
  ) {
    throw invalid(
      'maxHighlightFragments must be a positive integer',
      'search.maxHighlightFragments',
    );
  }
  if (
    config.search.forceCapability !== undefined &&
    !Object.values(EngineCapability).includes(config.search.forceCapability)
  ) {
    throw invalid(
      `Unknown capability: ${String(config.search.forceCapability)}`,
      'search.forceCapability',
    );
  }
}
