/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Public result and option types of the message search store.
 */

import type { EngineCapability } from '../query/types.js';

// ============================================================================
// Results
// ============================================================================

/**
 * One matching event.
 */
export interface MatchRecord {
  eventId: string;
  roomId: string;
  /** Key of the best-ranked matching value, e.g. `content.body` */
  key: string;
  /** Engine-specific relevance; only meaningful for ordering */
  rank: number;
  originServerTs: number;
  streamOrdering: number;
  /**
   * Lower-cased words the engine highlighted in this event.
   * Only present when the capability tier supports highlighting.
   */
  highlightedFields?: string[];
}

export interface SearchMessagesResult {
  /** Distinct matching events, independent of any result limit */
  count: number;
  results: MatchRecord[];
  /** Sorted union of every highlighted word */
  highlights: string[];
}

export interface SearchRoomsResult extends SearchMessagesResult {
  /** Token for the next page, or null when this page is the last */
  nextBatch: string | null;
}

// ============================================================================
// Options
// ============================================================================

export interface SearchMessagesOptions {
  signal?: AbortSignal;
}

export interface SearchRoomsOptions {
  /** Page size. Default: search.defaultLimit */
  limit?: number;
  /** `nextBatch` of a previous page */
  paginationToken?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Events emitted by the MessageSearchStore.
 */
export interface MessageSearchEvents {
  [key: string]: unknown;
  'search:started': {
    queryId: string;
    query: string;
    roomCount: number;
  };
  'search:completed': {
    queryId: string;
    capability: EngineCapability;
    count: number;
    resultCount: number;
    duration: number;
  };
  'search:error': {
    queryId: string;
    error: Error;
  };
  'entries:stored': {
    count: number;
  };
}
