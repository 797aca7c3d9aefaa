/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SearchStorageAdapter } from './types.js';
import type { DatabaseConfig, SearchConfig, StorageBackend } from '../config.js';
import { SearchError, SearchErrorType, errorMessage } from '../errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('StorageFactory');

/**
 * Create a storage adapter for the configured backend.
 *
 * Backends are dynamically imported so that only the driver in use has to
 * be installed.
 *
 * @param config - Database configuration including backend type
 * @param search - Text search settings used by the Postgres backend
 */
export async function createSearchStorage(
  config: DatabaseConfig,
  search?: Pick<SearchConfig, 'textSearchConfig' | 'maxHighlightFragments'>,
): Promise<SearchStorageAdapter> {
  log.info('createSearchStorage', {
    backend: config.backend,
    path: config.path,
    inMemory: config.inMemory,
  });

  if (config.backend === 'sqlite') {
    try {
      const { SQLiteSearchStorage } = await import('./SQLiteSearchStorage.js');
      return new SQLiteSearchStorage(config);
    } catch (error) {
      throw new SearchError(
        `SQLite backend requires better-sqlite3. Install it with: npm install better-sqlite3\n` +
          `Original error: ${errorMessage(error)}`,
        SearchErrorType.ENGINE_UNAVAILABLE,
        { backend: config.backend },
        { cause: error },
      );
    }
  }

  try {
    const { PGliteSearchStorage } = await import('./PGliteSearchStorage.js');
    return new PGliteSearchStorage(config, search);
  } catch (error) {
    throw new SearchError(
      `PGlite backend requires @electric-sql/pglite. Install it with: npm install @electric-sql/pglite\n` +
        `Original error: ${errorMessage(error)}`,
      SearchErrorType.ENGINE_UNAVAILABLE,
      { backend: config.backend },
      { cause: error },
    );
  }
}

/**
 * Check if a storage backend's driver can be loaded.
 */
export async function isBackendAvailable(
  backend: StorageBackend,
): Promise<boolean> {
  try {
    if (backend === 'pglite') {
      await import('@electric-sql/pglite');
    } else {
      await import('better-sqlite3');
    }
    return true;
  } catch {
    return false;
  }
}
