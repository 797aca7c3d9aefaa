/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Postgres rejects NUL in text values and SQLite truncates at it.
const NULL_BYTE = /\u0000/g;

/**
 * Replace every null byte with a single space.
 *
 * Applied to stored values and to query strings alike, so a message that
 * contained a null byte is still found by a query for the words around it.
 */
export function sanitizeSearchText(text: string): string {
  return text.replace(NULL_BYTE, ' ');
}
