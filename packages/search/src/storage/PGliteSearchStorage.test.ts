/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { PGliteSearchStorage } from './PGliteSearchStorage.js';
import type { SearchEntry, SearchScope } from './types.js';
import { EngineCapability } from '../query/types.js';
import { parseWebSearchQuery } from '../query/web-search-parser.js';
import { translateQuery } from '../query/translator.js';
import { SearchErrorType } from '../errors.js';

const ROOM = '!room1:example.org';
const OTHER_ROOM = '!room2:example.org';
const FOX = 'the quick brown fox jumps over the lazy dog';

function entry(overrides: Partial<SearchEntry>): SearchEntry {
  return {
    eventId: '$fox',
    roomId: ROOM,
    key: 'content.body',
    value: FOX,
    originServerTs: 1000,
    streamOrdering: 1,
    ...overrides,
  };
}

function scope(overrides: Partial<SearchScope> = {}): SearchScope {
  return {
    roomIds: [ROOM],
    keys: ['content.body'],
    limit: 500,
    orderBy: 'rank',
    ...overrides,
  };
}

describe('PGliteSearchStorage', () => {
  let storage: PGliteSearchStorage;

  const count = async (query: string, capability: EngineCapability) => {
    const translated = translateQuery(parseWebSearchQuery(query), capability);
    const page = await storage.executeSearch(translated, scope());
    return page.total;
  };

  beforeAll(async () => {
    storage = new PGliteSearchStorage({
      backend: 'pglite',
      path: '',
      inMemory: true,
    });
    await storage.initialize();
    await storage.storeEntries([entry({})]);
  });

  afterAll(async () => {
    await storage.close();
  });

  describe('lifecycle', () => {
    it('should initialize successfully', () => {
      expect(storage.isInitialized()).toBe(true);
    });

    it('should not double initialize', async () => {
      await storage.initialize();
      expect(storage.isInitialized()).toBe(true);
    });

    it('should throw when not initialized', async () => {
      const fresh = new PGliteSearchStorage({
        backend: 'pglite',
        path: '',
        inMemory: true,
      });
      await expect(fresh.supportsWebSearchSyntax()).rejects.toMatchObject({
        type: SearchErrorType.NOT_INITIALIZED,
      });
    });

    it('should report websearch_to_tsquery as available', async () => {
      expect(await storage.supportsWebSearchSyntax()).toBe(true);
    });
  });

  describe('FullWebSyntax', () => {
    const full = EngineCapability.FullWebSyntax;

    it('should match a phrase in order', async () => {
      expect(await count('"quick brown"', full)).toBe(1);
    });

    it('should not match a phrase in the wrong order', async () => {
      expect(await count('"brown quick"', full)).toBe(0);
    });

    it('should AND unquoted terms', async () => {
      expect(await count('brown quick', full)).toBe(1);
    });

    it('should match when any OR operand matches', async () => {
      expect(await count('furphy OR fox', full)).toBe(1);
      expect(await count('nope OR doublenope', full)).toBe(0);
    });

    it('should honor negation', async () => {
      expect(await count('-fox', full)).toBe(0);
      expect(await count('-nope', full)).toBe(1);
    });

    it('should require other clauses beside an OR group', async () => {
      expect(await count('nope brown OR fox', full)).toBe(0);
      expect(await count('brown OR fox nope', full)).toBe(0);
      expect(await count('quick brown OR nope', full)).toBe(1);
      expect(await count('"quick brown" OR nope', full)).toBe(1);
      expect(await count('furphy OR fox -lazy', full)).toBe(0);
    });

    it('should require every OR group', async () => {
      expect(await count('quick OR nope lazy OR furphy', full)).toBe(1);
      expect(await count('quick OR nope furphy OR doublenope', full)).toBe(0);
    });
  });

  describe('PlainBestEffort', () => {
    const plain = EngineCapability.PlainBestEffort;

    it('should AND every word', async () => {
      expect(await count('nope', plain)).toBe(0);
      expect(await count('brown', plain)).toBe(1);
      expect(await count('brown nope', plain)).toBe(0);
    });

    it('should lose OR and negation', async () => {
      expect(await count('furphy OR fox', plain)).toBe(0);
      expect(await count('-nope', plain)).toBe(0);
    });

    it('should match phrase words in any order', async () => {
      expect(await count('"quick brown"', plain)).toBe(1);
      expect(await count('"brown quick"', plain)).toBe(1);
    });
  });

  describe('NoStructuredSyntax', () => {
    const none = EngineCapability.NoStructuredSyntax;

    it('should match case-insensitive substrings', async () => {
      expect(await count('QUICK', none)).toBe(1);
      expect(await count('brow', none)).toBe(1);
    });

    it('should require every word, including OR operands', async () => {
      expect(await count('furphy OR fox', none)).toBe(0);
      expect(await count('quick OR fox', none)).toBe(1);
    });

    it('should treat LIKE wildcards literally', async () => {
      expect(await count('qu_ck', none)).toBe(0);
    });

    it('should not highlight', async () => {
      const translated = translateQuery(parseWebSearchQuery('fox'), none);
      expect(await storage.findHighlights(FOX, translated)).toEqual([]);
    });
  });

  describe('scoping', () => {
    beforeAll(async () => {
      await storage.storeEntries([
        entry({ eventId: '$other', roomId: OTHER_ROOM, value: 'a red fox' }),
        entry({ eventId: '$named', key: 'content.name', value: 'fox den' }),
      ]);
    });

    it('should only search the given rooms', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('fox'),
        EngineCapability.FullWebSyntax,
      );
      const page = await storage.executeSearch(translated, scope());
      expect(page.total).toBe(1);
      expect(page.matches.map((m) => m.eventId)).toEqual(['$fox']);

      const both = await storage.executeSearch(
        translated,
        scope({ roomIds: [ROOM, OTHER_ROOM] }),
      );
      expect(both.total).toBe(2);
    });

    it('should only search the given keys', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('den'),
        EngineCapability.FullWebSyntax,
      );
      expect((await storage.executeSearch(translated, scope())).total).toBe(0);
      const named = await storage.executeSearch(
        translated,
        scope({ keys: ['content.name'] }),
      );
      expect(named.matches).toEqual([
        expect.objectContaining({
          eventId: '$named',
          key: 'content.name',
          value: 'fox den',
          originServerTs: 1000,
          streamOrdering: 1,
        }),
      ]);
    });

    it('should return nothing for an empty room set', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('fox'),
        EngineCapability.FullWebSyntax,
      );
      expect(
        await storage.executeSearch(translated, scope({ roomIds: [] })),
      ).toEqual({ matches: [], total: 0 });
    });
  });

  describe('storeEntries', () => {
    it('should skip an entry that is already indexed', async () => {
      await storage.storeEntries([
        entry({ eventId: '$dup', value: 'duplicate marker' }),
        entry({ eventId: '$dup', value: 'duplicate marker again' }),
      ]);
      expect(await count('duplicate', EngineCapability.FullWebSyntax)).toBe(1);
      expect(await count('again', EngineCapability.FullWebSyntax)).toBe(0);
    });
  });

  describe('findHighlights', () => {
    it('should return the matched words in lower case', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('furphy OR FOX'),
        EngineCapability.FullWebSyntax,
      );
      expect(await storage.findHighlights(FOX, translated)).toEqual(['fox']);
    });

    it('should highlight words from every clause', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('quick furphy OR fox'),
        EngineCapability.FullWebSyntax,
      );
      const words = await storage.findHighlights(FOX, translated);
      expect([...words].sort()).toEqual(['fox', 'quick']);
    });

    it('should highlight with the plain tier too', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('"lazy dog"'),
        EngineCapability.PlainBestEffort,
      );
      const words = await storage.findHighlights(FOX, translated);
      expect([...words].sort()).toEqual(['dog', 'lazy']);
    });

    it('should not confuse angle brackets in the text with markers', async () => {
      const translated = translateQuery(
        parseWebSearchQuery('alice'),
        EngineCapability.FullWebSyntax,
      );
      expect(
        await storage.findHighlights('<b> hi alice </b>', translated),
      ).toEqual(['alice']);
    });
  });
});
