/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Web Search Query Parser
 *
 * Parses Google-style search syntax into a structured SearchQuery:
 *   - word1 word2 → both words required (implicit AND)
 *   - "quoted phrase" → words required contiguously, in order
 *   - word1 OR word2 → either word (OR binds adjacent operands only)
 *   - -word → exclude word
 *   - -"phrase" → exclude phrase
 *
 * Parsing never fails. Malformed input degrades towards an AND of literal
 * terms: an unclosed quote is dropped and its words become required terms,
 * a dangling OR becomes the literal term "or".
 */

import type { QueryOperand, SearchQuery } from './types.js';

/**
 * Token types produced by the lexer
 */
export type TokenType =
  | 'PHRASE' // "quoted phrase"
  | 'OR' // OR operator
  | 'TERM'; // regular word

export interface Token {
  type: TokenType;
  value: string;
  /** true if preceded by - */
  negated?: boolean;
  /** true for words recovered from an unclosed quote; never bind to OR */
  literal?: boolean;
}

const WHITESPACE = /\s/;

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && WHITESPACE.test(ch);
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

/**
 * Tokenize a Google-style search query.
 *
 * Handles:
 * - Quoted phrases: "hello world"
 * - Negation: -word, -"phrase"
 * - OR operator (case-insensitive, whole word only)
 * - Regular terms; a `"` inside a word ends the word and opens a quote
 */
export function tokenize(query: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < query.length) {
    while (isWhitespace(query[pos])) pos++;
    if (pos >= query.length) break;

    // Negation must be followed by something other than whitespace
    let negated = false;
    if (
      query[pos] === '-' &&
      pos + 1 < query.length &&
      !isWhitespace(query[pos + 1])
    ) {
      negated = true;
      pos++;
    }

    if (query[pos] === '"') {
      const close = query.indexOf('"', pos + 1);
      if (close === -1) {
        // Unclosed quote: strip it, keep the words as plain required terms
        for (const word of splitWords(query.slice(pos + 1))) {
          tokens.push({ type: 'TERM', value: word, literal: true });
        }
        break;
      }

      const phrase = query.slice(pos + 1, close).trim();
      if (phrase) {
        tokens.push({ type: 'PHRASE', value: phrase, negated });
      }
      pos = close + 1;
      continue;
    }

    let term = '';
    while (
      pos < query.length &&
      !isWhitespace(query[pos]) &&
      query[pos] !== '"'
    ) {
      term += query[pos];
      pos++;
    }
    if (!term) continue;

    if (!negated && term.toUpperCase() === 'OR') {
      tokens.push({ type: 'OR', value: 'OR' });
    } else {
      tokens.push({ type: 'TERM', value: term, negated });
    }
  }

  return tokens;
}

function toOperand(token: Token): QueryOperand {
  if (token.type === 'PHRASE') {
    return { type: 'phrase', terms: splitWords(token.value.toLowerCase()) };
  }
  return { type: 'term', value: token.value.toLowerCase() };
}

function canJoinOr(token: Token | undefined): token is Token {
  return (
    token !== undefined &&
    token.type !== 'OR' &&
    !token.negated &&
    !token.literal
  );
}

/**
 * An empty query with no clauses.
 */
export function emptySearchQuery(): SearchQuery {
  return {
    requiredTerms: [],
    excludedTerms: [],
    orGroups: [],
    phrases: [],
    excludedPhrases: [],
  };
}

/**
 * Whether a parsed query has nothing left to search for.
 */
export function isEmptyQuery(query: SearchQuery): boolean {
  return (
    query.requiredTerms.length === 0 &&
    query.excludedTerms.length === 0 &&
    query.orGroups.length === 0 &&
    query.phrases.length === 0 &&
    query.excludedPhrases.length === 0
  );
}

/**
 * Build a SearchQuery from tokens.
 *
 * OR only binds the two operands immediately around it; `a b OR c d`
 * requires a and d and either b or c.
 */
export function buildSearchQuery(tokens: Token[]): SearchQuery {
  const query = emptySearchQuery();
  const seenExcludedPhrases = new Set<string>();

  const addPositive = (operand: QueryOperand) => {
    if (operand.type === 'term') {
      query.requiredTerms.push(operand.value);
    } else {
      query.phrases.push(operand.terms);
    }
  };

  const addExcluded = (operand: QueryOperand) => {
    if (operand.type === 'term') {
      if (!query.excludedTerms.includes(operand.value)) {
        query.excludedTerms.push(operand.value);
      }
      return;
    }
    const key = operand.terms.join(' ');
    if (!seenExcludedPhrases.has(key)) {
      seenExcludedPhrases.add(key);
      query.excludedPhrases.push(operand.terms);
    }
  };

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    if (token.type === 'OR') {
      // Nothing to bind on the left: plain word
      query.requiredTerms.push('or');
      i++;
      continue;
    }

    if (token.negated) {
      addExcluded(toOperand(token));
      i++;
      continue;
    }

    if (token.literal) {
      query.requiredTerms.push(token.value.toLowerCase());
      i++;
      continue;
    }

    const group: QueryOperand[] = [toOperand(token)];
    let next = i + 1;
    while (tokens[next]?.type === 'OR') {
      const right = tokens[next + 1];
      if (!canJoinOr(right)) break;
      group.push(toOperand(right));
      next += 2;
    }

    if (group.length > 1) {
      query.orGroups.push(group);
    } else {
      addPositive(group[0]);
    }
    i = next;
  }

  return query;
}

/**
 * Parse a web-search style query string into a SearchQuery.
 *
 * @param query - Sanitized query text
 *
 * @example
 * parseWebSearchQuery('"quick brown" fox OR dog -cat')
 * // → { requiredTerms: [], phrases: [['quick', 'brown']],
 * //     orGroups: [[{ type: 'term', value: 'fox' }, { type: 'term', value: 'dog' }]],
 * //     excludedTerms: ['cat'], excludedPhrases: [] }
 */
export function parseWebSearchQuery(query: string): SearchQuery {
  const trimmed = query.trim();
  if (!trimmed) return emptySearchQuery();
  return buildSearchQuery(tokenize(trimmed));
}
