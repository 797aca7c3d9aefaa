/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Structured search query types shared by the parser and the translator.
 */

/**
 * Level of structured query support offered by a storage engine instance.
 */
export enum EngineCapability {
  /** Postgres with websearch_to_tsquery: phrases, OR and negation */
  FullWebSyntax = 'full_web_syntax',
  /** Postgres without websearch_to_tsquery: AND of lexemes via plainto_tsquery */
  PlainBestEffort = 'plain_best_effort',
  /** Token or substring containment only (SQLite FTS5, ILIKE) */
  NoStructuredSyntax = 'no_structured_syntax',
}

/**
 * Capabilities ordered from poorest to richest.
 */
export const CAPABILITY_ORDER: readonly EngineCapability[] = [
  EngineCapability.NoStructuredSyntax,
  EngineCapability.PlainBestEffort,
  EngineCapability.FullWebSyntax,
];

export function isRicherCapability(
  candidate: EngineCapability,
  than: EngineCapability,
): boolean {
  return CAPABILITY_ORDER.indexOf(candidate) > CAPABILITY_ORDER.indexOf(than);
}

export interface TermOperand {
  type: 'term';
  value: string;
}

export interface PhraseOperand {
  type: 'phrase';
  terms: string[];
}

/**
 * A member of an OR group. OR binds single terms and quoted phrases.
 */
export type QueryOperand = TermOperand | PhraseOperand;

/**
 * Parsed form of a web-search style query string.
 *
 * Every literal occurrence in the input lands in exactly one clause.
 */
export interface SearchQuery {
  /** Bare terms, all of which must match, in input order */
  requiredTerms: string[];
  /** Terms that must not match (no duplicates) */
  excludedTerms: string[];
  /** Disjunctive groups; each group is satisfied when any member matches */
  orGroups: QueryOperand[][];
  /** Quoted phrases; terms must appear contiguously and in order */
  phrases: string[][];
  /** Negated quoted phrases (`-"a b"`) */
  excludedPhrases: string[][];
}

/**
 * Engine-native rendering of a SearchQuery. Built per call, never reused.
 */
export type TranslatedQuery =
  | {
      capability: EngineCapability.FullWebSyntax;
      /** The whole query in web-search syntax */
      text: string;
      /**
       * websearch_to_tsquery inputs: every inner list must match, through
       * any one of its members
       */
      clauses: string[][];
    }
  | {
      capability: EngineCapability.PlainBestEffort;
      /** Input for plainto_tsquery */
      text: string;
    }
  | {
      capability: EngineCapability.NoStructuredSyntax;
      /** Words that must all be contained in the value */
      words: string[];
    };
