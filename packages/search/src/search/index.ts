/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Search module.
 * Message search store, result normalization and highlight helpers.
 */

// Types
export type {
  MatchRecord,
  SearchMessagesResult,
  SearchRoomsResult,
  SearchMessagesOptions,
  SearchRoomsOptions,
  MessageSearchEvents,
} from './types.js';

// Store
export {
  MessageSearchStore,
  encodePaginationToken,
  decodePaginationToken,
} from './MessageSearchStore.js';

// Normalization
export { normalizeSearchResults, supportsHighlighting } from './normalizer.js';
export {
  chooseHeadlineSelectors,
  headlineOptions,
  extractHighlightedWords,
  type HeadlineSelectors,
} from './highlights.js';
