/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Message search over a storage adapter.
 *
 * A query goes through: sanitize, parse, resolve the engine capability,
 * translate for that capability, execute scoped to rooms and keys, fetch
 * highlights, normalize.
 */

import type {
  RawSearchPage,
  SearchEntry,
  SearchScope,
  SearchStorageAdapter,
  StreamPosition,
} from '../storage/types.js';
import { CapabilityProbe } from '../storage/capability.js';
import {
  EngineCapability,
  type TranslatedQuery,
} from '../query/types.js';
import { sanitizeSearchText } from '../query/sanitize.js';
import { isEmptyQuery, parseWebSearchQuery } from '../query/web-search-parser.js';
import { isEmptyTranslation, translateQuery } from '../query/translator.js';
import type { SearchConfig } from '../config.js';
import { DEFAULT_SEARCH_CONFIG } from '../config.js';
import { SearchError, SearchErrorType, isSearchError } from '../errors.js';
import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import { normalizeSearchResults, supportsHighlighting } from './normalizer.js';
import type {
  MessageSearchEvents,
  SearchMessagesOptions,
  SearchMessagesResult,
  SearchRoomsOptions,
  SearchRoomsResult,
} from './types.js';

const log = createModuleLogger('MessageSearchStore');

// Shared by every store: timers are keyed by query ID in the global logger
let queryCounter = 0;

// ============================================================================
// Pagination Tokens
// ============================================================================

const TOKEN_PATTERN = /^(-?\d+),(-?\d+)$/;

export function encodePaginationToken(position: StreamPosition): string {
  return `${position.originServerTs},${position.streamOrdering}`;
}

/**
 * @throws SearchError(INVALID_PAGINATION_TOKEN) if the token is malformed
 */
export function decodePaginationToken(token: string): StreamPosition {
  const match = TOKEN_PATTERN.exec(token);
  if (!match) {
    throw new SearchError(
      `Invalid pagination token: ${token}`,
      SearchErrorType.INVALID_PAGINATION_TOKEN,
      { token },
    );
  }
  return {
    originServerTs: Number(match[1]),
    streamOrdering: Number(match[2]),
  };
}

// ============================================================================
// MessageSearchStore
// ============================================================================

export class MessageSearchStore extends EventEmitter<MessageSearchEvents> {
  private readonly storage: SearchStorageAdapter;
  private readonly config: SearchConfig;
  private readonly probe: CapabilityProbe;

  constructor(storage: SearchStorageAdapter, config?: Partial<SearchConfig>) {
    super();
    this.storage = storage;
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.probe = new CapabilityProbe(storage, {
      forceCapability: this.config.forceCapability,
    });
  }

  // -------------------------------------------------------------------------
  // Capability
  // -------------------------------------------------------------------------

  /**
   * Capability the next query will run with.
   */
  getCapability(): Promise<EngineCapability> {
    return this.probe.resolve();
  }

  /**
   * Force a capability tier, or go back to detection with `undefined`.
   */
  setCapabilityOverride(capability: EngineCapability | undefined): void {
    this.probe.setOverride(capability);
  }

  /**
   * Drop the cached capability. Call when the storage connection closes.
   */
  resetCapability(): void {
    this.probe.invalidate();
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Index searchable values. Values are sanitized the same way queries
   * are, so a value and a query containing the same text still match.
   */
  async storeSearchEntries(entries: SearchEntry[]): Promise<void> {
    const sanitized = entries.map((entry) => ({
      ...entry,
      value: sanitizeSearchText(entry.value),
    }));
    await this.storage.storeEntries(sanitized);
    void this.emit('entries:stored', { count: sanitized.length });
  }

  // -------------------------------------------------------------------------
  // Search
  // -------------------------------------------------------------------------

  /**
   * Search the given rooms, best matches first.
   */
  async searchMessages(
    roomIds: Iterable<string>,
    query: string,
    keys: string[],
    options: SearchMessagesOptions = {},
  ): Promise<SearchMessagesResult> {
    const { result } = await this.runSearch(roomIds, query, keys, options.signal, {
      orderBy: 'rank',
      limit: this.config.maxResults,
    });
    return result;
  }

  /**
   * Search the given rooms, newest first, one page at a time.
   */
  async searchRooms(
    roomIds: Iterable<string>,
    query: string,
    keys: string[],
    options: SearchRoomsOptions = {},
  ): Promise<SearchRoomsResult> {
    const before =
      options.paginationToken !== undefined
        ? decodePaginationToken(options.paginationToken)
        : undefined;
    const limit = Math.min(
      Math.max(1, Math.floor(options.limit ?? this.config.defaultLimit)),
      this.config.maxResults,
    );

    const { result, page } = await this.runSearch(
      roomIds,
      query,
      keys,
      options.signal,
      { orderBy: 'recent', limit, before },
    );

    const last = page.matches[page.matches.length - 1];
    const nextBatch =
      last && page.matches.length >= limit
        ? encodePaginationToken(last)
        : null;

    return { ...result, nextBatch };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async runSearch(
    roomIds: Iterable<string>,
    query: string,
    keys: string[],
    signal: AbortSignal | undefined,
    paging: Pick<SearchScope, 'orderBy' | 'limit' | 'before'>,
  ): Promise<{ result: SearchMessagesResult; page: RawSearchPage }> {
    const queryId = this.generateQueryId();
    const timerKey = `search-${queryId}`;
    const rooms = [...new Set(roomIds)];
    const searchKeys = this.filterKeys(keys);

    log.startTimer(timerKey);
    log.debug('search:start', {
      queryId,
      roomCount: rooms.length,
      keys: searchKeys,
      orderBy: paging.orderBy,
      queryLength: query.length,
    });
    void this.emit('search:started', {
      queryId,
      query,
      roomCount: rooms.length,
    });

    try {
      const parsed = parseWebSearchQuery(sanitizeSearchText(query));
      const capability = await this.probe.resolve();
      const translated = translateQuery(parsed, capability);

      let page: RawSearchPage = { matches: [], total: 0 };
      if (
        rooms.length > 0 &&
        searchKeys.length > 0 &&
        !isEmptyQuery(parsed) &&
        !isEmptyTranslation(translated)
      ) {
        signal?.throwIfAborted();
        page = await this.storage.executeSearch(translated, {
          roomIds: rooms,
          keys: searchKeys,
          ...paging,
        });
      }

      const highlights = await this.collectHighlights(page, translated);
      const result = normalizeSearchResults(page, capability, highlights);

      const duration = log.endTimer(timerKey, 'search:complete', {
        queryId,
        capability,
        count: result.count,
        resultCount: result.results.length,
      });
      void this.emit('search:completed', {
        queryId,
        capability,
        count: result.count,
        resultCount: result.results.length,
        duration,
      });

      return { result, page };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const context = isSearchError(error)
        ? error.toLogContext()
        : { error: err.message };
      log.endTimer(timerKey, 'search:error', { queryId, ...context });
      void this.emit('search:error', { queryId, error: err });
      throw error;
    }
  }

  /**
   * Keep only indexed keys. Unknown keys are not an error.
   */
  private filterKeys(keys: string[]): string[] {
    const known: string[] = [];
    for (const key of keys) {
      if (!this.config.indexedKeys.includes(key)) {
        log.debug('search:keyDropped', {
          key,
          type: SearchErrorType.UNSUPPORTED_FIELD,
        });
        continue;
      }
      if (!known.includes(key)) known.push(key);
    }
    return known;
  }

  /**
   * Highlighted words per event, from all of the event's matched values.
   */
  private async collectHighlights(
    page: RawSearchPage,
    query: TranslatedQuery,
  ): Promise<Map<string, string[]>> {
    const byEvent = new Map<string, string[]>();
    if (page.matches.length === 0 || !supportsHighlighting(query.capability)) {
      return byEvent;
    }

    const values = new Map<string, string[]>();
    for (const match of page.matches) {
      const list = values.get(match.eventId);
      if (list) {
        list.push(match.value);
      } else {
        values.set(match.eventId, [match.value]);
      }
    }

    await Promise.all(
      [...values].map(async ([eventId, texts]) => {
        const words = await this.storage.findHighlights(texts.join(' '), query);
        byEvent.set(eventId, words);
      }),
    );
    return byEvent;
  }

  private generateQueryId(): string {
    return `q_${++queryCounter}_${Date.now()}`;
  }
}
