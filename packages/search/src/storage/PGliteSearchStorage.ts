/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * PGlite storage adapter implementation.
 * Embedded PostgreSQL full-text search over the event_search table.
 */

import { PGlite } from '@electric-sql/pglite';
import type {
  RawMatch,
  RawSearchPage,
  SearchEntry,
  SearchScope,
  SearchStorageAdapter,
} from './types.js';
import {
  PG_FTS_INDEX_SQL,
  PG_INSERT_ENTRY_SQL,
  PG_SCHEMA_SQL,
  PG_WEBSEARCH_PROBE_SQL,
} from './schema.js';
import { EngineCapability, type TranslatedQuery } from '../query/types.js';
import type { DatabaseConfig } from '../config.js';
import { DEFAULT_SEARCH_CONFIG } from '../config.js';
import { SearchError, SearchErrorType, errorMessage } from '../errors.js';
import { createModuleLogger } from '../core/Logger.js';
import {
  chooseHeadlineSelectors,
  extractHighlightedWords,
  headlineOptions,
} from '../search/highlights.js';

const log = createModuleLogger('PGliteSearchStorage');

// ============================================================================
// Helper Functions
// ============================================================================

function toNumber(value: string | number | bigint): number {
  return typeof value === 'number' ? value : Number(value);
}

/**
 * Escape LIKE wildcards so a word is matched literally.
 */
function escapeLike(word: string): string {
  return word.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// ============================================================================
// Row Types (database representation)
// ============================================================================

interface MatchRow {
  event_id: string;
  room_id: string;
  key: string;
  value: string;
  origin_server_ts: string | number | bigint;
  stream_ordering: string | number | bigint;
  rank: number;
}

interface CountRow {
  count: string | number | bigint;
}

interface ProbeRow {
  supported: boolean;
}

interface HeadlineRow {
  headline: string;
}

type StructuredQuery = Exclude<
  TranslatedQuery,
  { capability: EngineCapability.NoStructuredSyntax }
>;

/** Appends a query parameter and returns its `$n` placeholder. */
type Placeholder = (value: unknown) => string;

interface MatchClause {
  from: string;
  where: string;
  rank: string;
}

export interface PGliteSearchOptions {
  /** Text search configuration, e.g. 'english'. */
  textSearchConfig: string;
  /** MaxFragments passed to ts_headline */
  maxHighlightFragments: number;
}

// ============================================================================
// PGlite Search Storage
// ============================================================================

export class PGliteSearchStorage implements SearchStorageAdapter {
  readonly family = 'postgres' as const;

  private db: PGlite | null = null;
  private readonly config: DatabaseConfig;
  private readonly options: PGliteSearchOptions;

  constructor(config: DatabaseConfig, options?: Partial<PGliteSearchOptions>) {
    this.config = config;
    this.options = {
      textSearchConfig:
        options?.textSearchConfig ?? DEFAULT_SEARCH_CONFIG.textSearchConfig,
      maxHighlightFragments:
        options?.maxHighlightFragments ??
        DEFAULT_SEARCH_CONFIG.maxHighlightFragments,
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.db) return;

    log.info('initialize:start', {
      path: this.config.path,
      inMemory: this.config.inMemory,
    });

    let db: PGlite;
    try {
      db = await PGlite.create({
        dataDir: this.config.inMemory ? undefined : this.config.path,
      });
      await db.exec(PG_SCHEMA_SQL);
      await db.exec(PG_FTS_INDEX_SQL);
    } catch (error) {
      const failure = new SearchError(
        `Failed to open PGlite database: ${errorMessage(error)}`,
        SearchErrorType.ENGINE_UNAVAILABLE,
        { backend: 'pglite', path: this.config.path },
        { cause: error },
      );
      log.error('initialize:failed', failure.toLogContext());
      throw failure;
    }

    this.db = db;
    log.info('initialize:complete');
  }

  async close(): Promise<void> {
    if (this.db) {
      const db = this.db;
      this.db = null;
      await db.close();
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  private getDb(): PGlite {
    if (!this.db) {
      throw new SearchError(
        'Storage not initialized. Call initialize() first.',
        SearchErrorType.NOT_INITIALIZED,
      );
    }
    return this.db;
  }

  // -------------------------------------------------------------------------
  // Capability
  // -------------------------------------------------------------------------

  async supportsWebSearchSyntax(): Promise<boolean> {
    const result = await this.getDb().query<ProbeRow>(PG_WEBSEARCH_PROBE_SQL);
    return result.rows[0]?.supported === true;
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  async storeEntries(entries: SearchEntry[]): Promise<void> {
    const db = this.getDb();
    if (entries.length === 0) return;

    await db.transaction(async (tx) => {
      for (const entry of entries) {
        await tx.query(PG_INSERT_ENTRY_SQL, [
          entry.eventId,
          entry.roomId,
          entry.key,
          entry.value,
          this.options.textSearchConfig,
          entry.originServerTs,
          entry.streamOrdering,
        ]);
      }
    });

    log.debug('storeEntries', { count: entries.length });
  }

  // -------------------------------------------------------------------------
  // Search
  // -------------------------------------------------------------------------

  async executeSearch(
    query: TranslatedQuery,
    scope: SearchScope,
  ): Promise<RawSearchPage> {
    const db = this.getDb();
    if (scope.roomIds.length === 0 || scope.keys.length === 0) {
      return { matches: [], total: 0 };
    }

    const params: unknown[] = [];
    const placeholder: Placeholder = (value) => {
      params.push(value);
      return `$${params.length}`;
    };
    const match = this.buildMatchClause(query, placeholder);

    const roomList = scope.roomIds.map(placeholder).join(', ');
    const keyList = scope.keys.map(placeholder).join(', ');
    const scopeWhere = `${match.where}
        AND room_id IN (${roomList})
        AND key IN (${keyList})`;

    const countResult = await db.query<CountRow>(
      `SELECT COUNT(DISTINCT event_id) AS count
       FROM ${match.from}
       WHERE ${scopeWhere}`,
      params,
    );

    let pageWhere = scopeWhere;
    let orderBy = `rank DESC, stream_ordering DESC`;
    if (scope.orderBy === 'recent') {
      orderBy = `origin_server_ts DESC, stream_ordering DESC`;
      if (scope.before) {
        const ts = placeholder(scope.before.originServerTs);
        const stream = placeholder(scope.before.streamOrdering);
        pageWhere += `
        AND (origin_server_ts < ${ts}
          OR (origin_server_ts = ${ts} AND stream_ordering < ${stream}))`;
      }
    }
    const limit = placeholder(scope.limit);

    const result = await db.query<MatchRow>(
      `SELECT event_id, room_id, key, value, origin_server_ts, stream_ordering,
         ${match.rank} AS rank
       FROM ${match.from}
       WHERE ${pageWhere}
       ORDER BY ${orderBy}
       LIMIT ${limit}`,
      params,
    );

    const matches = result.rows.map((row) => this.rowToMatch(row));
    const total = toNumber(countResult.rows[0]?.count ?? 0);

    log.debug('executeSearch:complete', {
      capability: query.capability,
      matchCount: matches.length,
      total,
    });
    return { matches, total };
  }

  async findHighlights(
    text: string,
    query: TranslatedQuery,
  ): Promise<string[]> {
    if (query.capability === EngineCapability.NoStructuredSyntax) {
      return [];
    }

    const selectors = chooseHeadlineSelectors(text);
    const params: unknown[] = [];
    const placeholder: Placeholder = (value) => {
      params.push(value);
      return `$${params.length}`;
    };
    const config = placeholder(this.options.textSearchConfig);
    const document = placeholder(text);
    const options = placeholder(
      headlineOptions(selectors, this.options.maxHighlightFragments),
    );
    const tsquery = this.buildTsquery(query, placeholder);
    const result = await this.getDb().query<HeadlineRow>(
      `SELECT ts_headline(${config}::regconfig, ${document}, ${tsquery}, ${options}) AS headline`,
      params,
    );

    const headline = result.rows[0]?.headline ?? '';
    return extractHighlightedWords(headline, selectors);
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /**
   * tsquery expression for a structured query. Each web-search clause is
   * parsed on its own and the results are combined with `&&` and `||`,
   * so an OR group only spans its own alternatives.
   */
  private buildTsquery(
    query: StructuredQuery,
    placeholder: Placeholder,
  ): string {
    const config = placeholder(this.options.textSearchConfig);
    if (query.capability === EngineCapability.PlainBestEffort) {
      return `plainto_tsquery(${config}::regconfig, ${placeholder(query.text)})`;
    }

    const webSearch = (text: string) =>
      `websearch_to_tsquery(${config}::regconfig, ${placeholder(text)})`;
    if (query.clauses.length === 0) {
      return webSearch(query.text);
    }
    return query.clauses
      .map((alternatives) => `(${alternatives.map(webSearch).join(' || ')})`)
      .join(' && ');
  }

  private buildMatchClause(
    query: TranslatedQuery,
    placeholder: Placeholder,
  ): MatchClause {
    if (query.capability === EngineCapability.NoStructuredSyntax) {
      // Case-insensitive substring containment of every word
      const conditions = query.words.map(
        (w) => `value ILIKE ${placeholder(`%${escapeLike(w)}%`)} ESCAPE '\\'`,
      );
      return {
        from: 'event_search',
        where: conditions.length > 0 ? conditions.join(' AND ') : 'FALSE',
        rank: '1.0::real',
      };
    }

    const tsquery = this.buildTsquery(query, placeholder);
    return {
      from: `event_search, (SELECT ${tsquery} AS query) AS q`,
      where: 'vector @@ q.query',
      rank: 'ts_rank_cd(vector, q.query)',
    };
  }

  private rowToMatch(row: MatchRow): RawMatch {
    return {
      eventId: row.event_id,
      roomId: row.room_id,
      key: row.key,
      value: row.value,
      rank: Number(row.rank),
      originServerTs: toNumber(row.origin_server_ts),
      streamOrdering: toNumber(row.stream_ordering),
    };
  }
}
