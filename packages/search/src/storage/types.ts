/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Storage adapter interface for the message search index.
 * Implemented by the PGlite (Postgres) and SQLite backends.
 */

import type { TranslatedQuery } from '../query/types.js';

/**
 * Engine family. Decides the capability ceiling of an adapter.
 */
export type EngineFamily = 'postgres' | 'sqlite';

// ============================================================================
// Input Types
// ============================================================================

/**
 * One searchable value of one event, e.g. the `content.body` of a message.
 */
export interface SearchEntry {
  eventId: string;
  roomId: string;
  /** Content key, e.g. `content.body` */
  key: string;
  value: string;
  originServerTs: number;
  streamOrdering: number;
}

/**
 * Position in a room timeline, used for recency pagination.
 */
export interface StreamPosition {
  originServerTs: number;
  streamOrdering: number;
}

export type SearchOrder = 'rank' | 'recent';

/**
 * Where to look and how many rows to bring back.
 */
export interface SearchScope {
  roomIds: string[];
  keys: string[];
  limit: number;
  orderBy: SearchOrder;
  /** Only rows strictly older than this position (recent ordering) */
  before?: StreamPosition;
}

// ============================================================================
// Output Types
// ============================================================================

export interface RawMatch {
  eventId: string;
  roomId: string;
  key: string;
  value: string;
  /** Engine-specific relevance; only meaningful for ordering */
  rank: number;
  originServerTs: number;
  streamOrdering: number;
}

export interface RawSearchPage {
  /** Matching rows in scope order, at most `scope.limit` */
  matches: RawMatch[];
  /** Distinct matching events in the rooms and keys of the scope */
  total: number;
}

// ============================================================================
// Adapter Interface
// ============================================================================

export interface SearchStorageAdapter {
  readonly family: EngineFamily;

  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;
  isInitialized(): boolean;

  /**
   * Whether the engine has a native web-search query function.
   * Always false for engines without structured syntax.
   */
  supportsWebSearchSyntax(): Promise<boolean>;

  /**
   * Write search entries. Values are expected to be sanitized already.
   * An entry for an (eventId, key) pair that is already indexed is skipped.
   */
  storeEntries(entries: SearchEntry[]): Promise<void>;

  /**
   * Run a translated query against the index, scoped to the given rooms
   * and keys. Engine errors are not caught.
   */
  executeSearch(
    query: TranslatedQuery,
    scope: SearchScope,
  ): Promise<RawSearchPage>;

  /**
   * Lower-cased words the engine highlighted in `text` for `query`.
   * Empty for engines that do not evaluate term boundaries.
   */
  findHighlights(text: string, query: TranslatedQuery): Promise<string[]>;
}
