/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Renders a SearchQuery for the capability tier of the target engine.
 *
 * - FullWebSyntax: websearch_to_tsquery inputs, one per clause. Required
 *   terms, phrases and exclusions share one input; every OR group is its
 *   own list of alternatives, since a single websearch_to_tsquery input
 *   binds AND tighter than OR.
 * - PlainBestEffort: plainto_tsquery input. Same words, no syntax: quotes
 *   are dropped and `OR` / `-` are passed through as plain text, so the
 *   engine sees an AND of every word. Phrase order, disjunction and
 *   negation are lost in this tier.
 * - NoStructuredSyntax: the list of words to require, for token or
 *   substring containment matching.
 */

import {
  EngineCapability,
  type QueryOperand,
  type SearchQuery,
  type TranslatedQuery,
} from './types.js';

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

function renderBareTerm(term: string): string {
  // A leading '-' or a bare "or" would be read as an operator
  if (term.startsWith('-') || term === 'or') {
    return `"${term}"`;
  }
  return term;
}

function renderPhrase(terms: string[]): string {
  return `"${terms.join(' ')}"`;
}

function renderOperand(operand: QueryOperand): string {
  return operand.type === 'term'
    ? renderBareTerm(operand.value)
    : renderPhrase(operand.terms);
}

function plainOperand(operand: QueryOperand): string {
  return operand.type === 'term' ? operand.value : operand.terms.join(' ');
}

/**
 * Render a SearchQuery back to web-search syntax.
 */
export function formatSearchQuery(query: SearchQuery): string {
  return [
    ...query.requiredTerms.map(renderBareTerm),
    ...query.phrases.map(renderPhrase),
    ...query.orGroups.map((group) => group.map(renderOperand).join(' OR ')),
    ...query.excludedTerms.map((term) => `-${term}`),
    ...query.excludedPhrases.map((terms) => `-${renderPhrase(terms)}`),
  ].join(' ');
}

/**
 * Split a SearchQuery into websearch_to_tsquery inputs. The result is a
 * conjunction of disjunctions.
 */
export function buildWebSearchClauses(query: SearchQuery): string[][] {
  const conjunction = [
    ...query.requiredTerms.map(renderBareTerm),
    ...query.phrases.map(renderPhrase),
    ...query.excludedTerms.map((term) => `-${term}`),
    ...query.excludedPhrases.map((terms) => `-${renderPhrase(terms)}`),
  ].join(' ');

  return [
    ...(conjunction.length > 0 ? [[conjunction]] : []),
    ...query.orGroups.map((group) => group.map(renderOperand)),
  ];
}

/**
 * Render a SearchQuery as plain text with its syntax flattened to words.
 */
export function formatPlainQuery(query: SearchQuery): string {
  return [
    ...query.requiredTerms,
    ...query.phrases.map((terms) => terms.join(' ')),
    ...query.orGroups.map((group) => group.map(plainOperand).join(' OR ')),
    ...query.excludedTerms.map((term) => `-${term}`),
    ...query.excludedPhrases.map((terms) => `-${terms.join(' ')}`),
  ].join(' ');
}

/**
 * Every word of every clause, in order, without duplicates.
 */
export function extractWords(query: SearchQuery): string[] {
  const texts = [
    ...query.requiredTerms,
    ...query.phrases.flat(),
    ...query.orGroups.flatMap((group) => group.map(plainOperand)),
    ...query.excludedTerms,
    ...query.excludedPhrases.flat(),
  ];

  const words: string[] = [];
  for (const text of texts) {
    for (const match of text.matchAll(WORD_PATTERN)) {
      if (!words.includes(match[0])) {
        words.push(match[0]);
      }
    }
  }
  return words;
}

/**
 * Translate a parsed query for an engine of the given capability.
 * Deterministic: the same pair always yields the same translation.
 */
export function translateQuery(
  query: SearchQuery,
  capability: EngineCapability,
): TranslatedQuery {
  switch (capability) {
    case EngineCapability.FullWebSyntax:
      return {
        capability,
        text: formatSearchQuery(query),
        clauses: buildWebSearchClauses(query),
      };
    case EngineCapability.PlainBestEffort:
      return { capability, text: formatPlainQuery(query) };
    case EngineCapability.NoStructuredSyntax:
      return { capability, words: extractWords(query) };
  }
}

/**
 * Whether a translation would match nothing at all (no words to look for).
 */
export function isEmptyTranslation(translated: TranslatedQuery): boolean {
  if (translated.capability === EngineCapability.NoStructuredSyntax) {
    return translated.words.length === 0;
  }
  return translated.text.trim().length === 0;
}
