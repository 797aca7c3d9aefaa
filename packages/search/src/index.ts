/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Message search for a federated messaging homeserver.
 *
 * @example
 * ```typescript
 * import { initializeMessageSearch } from '@homeserver/message-search';
 *
 * const system = await initializeMessageSearch({
 *   config: { database: { backend: 'pglite', inMemory: true } },
 * });
 * const store = system.getStore();
 * await store.storeSearchEntries([
 *   {
 *     eventId: '$event1',
 *     roomId: '!room:example.org',
 *     key: 'content.body',
 *     value: 'the quick brown fox',
 *     originServerTs: 1000,
 *     streamOrdering: 1,
 *   },
 * ]);
 * const { count, results, highlights } = await store.searchMessages(
 *   ['!room:example.org'],
 *   '"quick brown" -cat',
 *   ['content.body'],
 * );
 * await system.close();
 * ```
 */

// Core
export {
  MessageSearchSystem,
  initializeMessageSearch,
  type MessageSearchSystemOptions,
} from './core/MessageSearchSystem.js';
export { EventEmitter, type EventHandler } from './core/EventEmitter.js';
export {
  Logger,
  ModuleLogger,
  LogLevel,
  globalLogger,
  createModuleLogger,
  parseLogLevel,
  type LogEntry,
  type LoggerConfig,
} from './core/Logger.js';

// Configuration
export {
  createConfig,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_DATABASE_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  type MessageSearchConfig,
  type DatabaseConfig,
  type SearchConfig,
  type LoggingConfig,
  type StorageBackend,
  type DeepPartial,
} from './config.js';

// Errors
export {
  SearchError,
  SearchErrorType,
  isSearchError,
  errorMessage,
} from './errors.js';

export * from './query/index.js';
export * from './storage/index.js';
export * from './search/index.js';
