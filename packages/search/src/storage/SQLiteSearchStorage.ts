/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * SQLite storage adapter implementation.
 * Uses better-sqlite3 with an FTS5 table. FTS5 has no web-search syntax and
 * no headline function, so only NoStructuredSyntax queries are accepted.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type {
  RawMatch,
  RawSearchPage,
  SearchEntry,
  SearchScope,
  SearchStorageAdapter,
} from './types.js';
import {
  SQLITE_ENTRY_EXISTS_SQL,
  SQLITE_INSERT_ENTRY_SQL,
  SQLITE_SCHEMA_SQL,
} from './schema.js';
import { EngineCapability, type TranslatedQuery } from '../query/types.js';
import type { DatabaseConfig } from '../config.js';
import { SearchError, SearchErrorType, errorMessage } from '../errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('SQLiteSearchStorage');

export const SQLITE_DATABASE_FILE = 'search.sqlite';

// ============================================================================
// Row Types (database representation)
// ============================================================================

interface MatchRow {
  event_id: string;
  room_id: string;
  key: string;
  value: string;
  origin_server_ts: number;
  stream_ordering: number;
  search_rank: number;
}

interface CountRow {
  count: number;
}

/**
 * FTS5 MATCH expression requiring every word, each as a token prefix.
 * Words only hold letters, digits and underscores, so quoting is enough.
 */
export function buildFtsMatchExpression(words: string[]): string {
  return words.map((word) => `"${word}"*`).join(' AND ');
}

// ============================================================================
// SQLite Search Storage
// ============================================================================

export class SQLiteSearchStorage implements SearchStorageAdapter {
  readonly family = 'sqlite' as const;

  private db: Database.Database | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
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

    try {
      let dbFilePath = ':memory:';
      if (!this.config.inMemory) {
        mkdirSync(this.config.path, { recursive: true });
        dbFilePath = join(this.config.path, SQLITE_DATABASE_FILE);
      }

      const db = new Database(dbFilePath);
      if (!this.config.inMemory) {
        db.pragma('journal_mode = WAL');
      }
      db.exec(SQLITE_SCHEMA_SQL);
      this.db = db;
      log.info('initialize:database:opened', { dbFilePath });
    } catch (error) {
      const failure = new SearchError(
        `Failed to open SQLite database: ${errorMessage(error)}`,
        SearchErrorType.ENGINE_UNAVAILABLE,
        { backend: 'sqlite', path: this.config.path },
        { cause: error },
      );
      log.error('initialize:failed', failure.toLogContext());
      throw failure;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new SearchError(
        'Storage not initialized. Call initialize() first.',
        SearchErrorType.NOT_INITIALIZED,
      );
    }
    return this.db;
  }

  async supportsWebSearchSyntax(): Promise<boolean> {
    this.getDb();
    return false;
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  async storeEntries(entries: SearchEntry[]): Promise<void> {
    const db = this.getDb();
    if (entries.length === 0) return;

    const existsStmt = db.prepare<[string, string], { found: number }>(
      SQLITE_ENTRY_EXISTS_SQL,
    );
    const insertStmt = db.prepare(SQLITE_INSERT_ENTRY_SQL);

    let inserted = 0;
    const transaction = db.transaction((batch: SearchEntry[]) => {
      for (const entry of batch) {
        if (existsStmt.get(entry.eventId, entry.key)) continue;
        insertStmt.run(
          entry.value,
          entry.eventId,
          entry.roomId,
          entry.key,
          entry.originServerTs,
          entry.streamOrdering,
        );
        inserted++;
      }
    });
    transaction(entries);

    log.debug('storeEntries', { count: entries.length, inserted });
  }

  // -------------------------------------------------------------------------
  // Search
  // -------------------------------------------------------------------------

  async executeSearch(
    query: TranslatedQuery,
    scope: SearchScope,
  ): Promise<RawSearchPage> {
    const db = this.getDb();
    if (query.capability !== EngineCapability.NoStructuredSyntax) {
      throw new SearchError(
        `SQLite cannot execute ${query.capability} queries`,
        SearchErrorType.UNSUPPORTED_CAPABILITY,
        { capability: query.capability },
      );
    }
    if (
      scope.roomIds.length === 0 ||
      scope.keys.length === 0 ||
      query.words.length === 0
    ) {
      return { matches: [], total: 0 };
    }

    const roomList = scope.roomIds.map(() => '?').join(', ');
    const keyList = scope.keys.map(() => '?').join(', ');
    const scopeWhere = `event_search MATCH ?
        AND room_id IN (${roomList})
        AND key IN (${keyList})`;
    const params: unknown[] = [
      buildFtsMatchExpression(query.words),
      ...scope.roomIds,
      ...scope.keys,
    ];

    const countRow = db
      .prepare<unknown[], CountRow>(
        `SELECT COUNT(DISTINCT event_id) AS count
         FROM event_search
         WHERE ${scopeWhere}`,
      )
      .get(...params);

    let pageWhere = scopeWhere;
    let orderBy = 'search_rank DESC, stream_ordering DESC';
    const pageParams = [...params];
    if (scope.orderBy === 'recent') {
      orderBy = 'origin_server_ts DESC, stream_ordering DESC';
      if (scope.before) {
        pageWhere += `
        AND (origin_server_ts < ?
          OR (origin_server_ts = ? AND stream_ordering < ?))`;
        pageParams.push(
          scope.before.originServerTs,
          scope.before.originServerTs,
          scope.before.streamOrdering,
        );
      }
    }
    pageParams.push(scope.limit);

    // bm25() is lower for better matches; negate so higher ranks first
    const rows = db
      .prepare<unknown[], MatchRow>(
        `SELECT event_id, room_id, key, value, origin_server_ts, stream_ordering,
           -bm25(event_search) AS search_rank
         FROM event_search
         WHERE ${pageWhere}
         ORDER BY ${orderBy}
         LIMIT ?`,
      )
      .all(...pageParams);

    const matches = rows.map((row) => this.rowToMatch(row));
    const total = countRow?.count ?? 0;

    log.debug('executeSearch:complete', {
      matchCount: matches.length,
      total,
    });
    return { matches, total };
  }

  async findHighlights(): Promise<string[]> {
    return [];
  }

  private rowToMatch(row: MatchRow): RawMatch {
    return {
      eventId: row.event_id,
      roomId: row.room_id,
      key: row.key,
      value: row.value,
      rank: row.search_rank,
      originServerTs: Number(row.origin_server_ts),
      streamOrdering: Number(row.stream_ordering),
    };
  }
}
