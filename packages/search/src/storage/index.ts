/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type {
  EngineFamily,
  SearchEntry,
  StreamPosition,
  SearchOrder,
  SearchScope,
  RawMatch,
  RawSearchPage,
  SearchStorageAdapter,
} from './types.js';
export { CapabilityProbe, type CapabilityProbeOptions } from './capability.js';
export { createSearchStorage, isBackendAvailable } from './StorageFactory.js';
export {
  PGliteSearchStorage,
  type PGliteSearchOptions,
} from './PGliteSearchStorage.js';
export {
  SQLiteSearchStorage,
  SQLITE_DATABASE_FILE,
  buildFtsMatchExpression,
} from './SQLiteSearchStorage.js';
