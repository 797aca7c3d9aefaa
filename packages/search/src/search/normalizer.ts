/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RawSearchPage } from '../storage/types.js';
import { EngineCapability } from '../query/types.js';
import type { MatchRecord, SearchMessagesResult } from './types.js';

/**
 * Whether engines at this tier can report which words matched.
 */
export function supportsHighlighting(capability: EngineCapability): boolean {
  return capability !== EngineCapability.NoStructuredSyntax;
}

/**
 * Turn a raw page into the public result shape.
 *
 * Rows are collapsed to one record per event, keeping the first (best
 * ordered) row. Highlights are only reported for tiers that produce them;
 * nothing is made up for the others.
 */
export function normalizeSearchResults(
  page: RawSearchPage,
  capability: EngineCapability,
  highlightsByEvent: ReadonlyMap<string, string[]> = new Map(),
): SearchMessagesResult {
  const highlighting = supportsHighlighting(capability);
  const seen = new Set<string>();
  const results: MatchRecord[] = [];
  const allHighlights = new Set<string>();

  for (const match of page.matches) {
    if (seen.has(match.eventId)) continue;
    seen.add(match.eventId);

    const record: MatchRecord = {
      eventId: match.eventId,
      roomId: match.roomId,
      key: match.key,
      rank: match.rank,
      originServerTs: match.originServerTs,
      streamOrdering: match.streamOrdering,
    };

    if (highlighting) {
      const words = highlightsByEvent.get(match.eventId) ?? [];
      record.highlightedFields = words;
      for (const word of words) allHighlights.add(word);
    }
    results.push(record);
  }

  return {
    count: page.total,
    results,
    highlights: page.total === 0 ? [] : [...allHighlights].sort(),
  };
}
