/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { sanitizeSearchText } from './sanitize.js';
export {
  tokenize,
  buildSearchQuery,
  parseWebSearchQuery,
  emptySearchQuery,
  isEmptyQuery,
  type Token,
  type TokenType,
} from './web-search-parser.js';
export {
  translateQuery,
  formatSearchQuery,
  formatPlainQuery,
  buildWebSearchClauses,
  extractWords,
  isEmptyTranslation,
} from './translator.js';
export {
  EngineCapability,
  CAPABILITY_ORDER,
  isRicherCapability,
} from './types.js';
export type {
  SearchQuery,
  QueryOperand,
  TermOperand,
  PhraseOperand,
  TranslatedQuery,
} from './types.js';
