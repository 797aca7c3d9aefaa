/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Helpers for pulling highlighted words out of ts_headline output.
 */

export interface HeadlineSelectors {
  start: string;
  stop: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pick StartSel/StopSel markers that do not occur in `text`, so every
 * marker in the headline was put there by the engine.
 */
export function chooseHeadlineSelectors(text: string): HeadlineSelectors {
  let start = '<';
  let stop = '>';
  while (text.includes(start)) start += '<';
  while (text.includes(stop)) stop += '>';
  return { start, stop };
}

/**
 * Options string for ts_headline.
 */
export function headlineOptions(
  selectors: HeadlineSelectors,
  maxFragments: number,
): string {
  return `StartSel=${selectors.start}, StopSel=${selectors.stop}, MaxFragments=${maxFragments}`;
}

/**
 * Lower-cased words enclosed by the selectors, without duplicates.
 */
export function extractHighlightedWords(
  headline: string,
  selectors: HeadlineSelectors,
): string[] {
  const pattern = new RegExp(
    `${escapeRegExp(selectors.start)}(.*?)${escapeRegExp(selectors.stop)}`,
    'gs',
  );

  const words = new Set<string>();
  for (const match of headline.matchAll(pattern)) {
    const word = match[1].toLowerCase();
    if (word) words.add(word);
  }
  return [...words];
}
