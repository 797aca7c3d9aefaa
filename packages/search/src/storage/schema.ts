/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// ============================================================================
// PostgreSQL (PGlite) Schema Definitions
// ============================================================================

/**
 * Search index table. `vector` holds to_tsvector(config, value); `value`
 * is kept so ts_headline can be run over matched rows.
 */
export const PG_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS event_search (
  event_id TEXT NOT NULL,
  room_id TEXT NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  vector TSVECTOR NOT NULL,
  origin_server_ts BIGINT NOT NULL,
  stream_ordering BIGINT NOT NULL,
  PRIMARY KEY (event_id, key)
);

CREATE INDEX IF NOT EXISTS event_search_room_order_idx
  ON event_search (room_id, origin_server_ts, stream_ordering);
`;

/**
 * GIN index over the tsvector column.
 */
export const PG_FTS_INDEX_SQL = `
CREATE INDEX IF NOT EXISTS event_search_fts_idx
  ON event_search USING GIN (vector);
`;

export const PG_INSERT_ENTRY_SQL = `
INSERT INTO event_search (
  event_id, room_id, key, value, vector, origin_server_ts, stream_ordering
) VALUES ($1, $2, $3, $4, to_tsvector($5::regconfig, $4), $6, $7)
ON CONFLICT (event_id, key) DO NOTHING
`;

/**
 * Whether this server has websearch_to_tsquery (PostgreSQL 11+).
 */
export const PG_WEBSEARCH_PROBE_SQL = `
SELECT EXISTS (
  SELECT 1 FROM pg_catalog.pg_proc WHERE proname = 'websearch_to_tsquery'
) AS supported
`;

// ============================================================================
// SQLite Schema Definitions
// ============================================================================

/**
 * FTS5 virtual table. Only `value` is tokenized; the other columns are
 * stored for scoping and ordering.
 */
export const SQLITE_SCHEMA_SQL = `
CREATE VIRTUAL TABLE IF NOT EXISTS event_search USING fts5(
  value,
  event_id UNINDEXED,
  room_id UNINDEXED,
  key UNINDEXED,
  origin_server_ts UNINDEXED,
  stream_ordering UNINDEXED,
  tokenize='unicode61'
);
`;

export const SQLITE_ENTRY_EXISTS_SQL = `
SELECT 1 AS found FROM event_search WHERE event_id = ? AND key = ? LIMIT 1
`;

export const SQLITE_INSERT_ENTRY_SQL = `
INSERT INTO event_search (
  value, event_id, room_id, key, origin_server_ts, stream_ordering
) VALUES (?, ?, ?, ?, ?, ?)
`;
