/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import {
  createConfig,
  validateConfig,
  DEFAULT_CONFIG,
  DEFAULT_DATABASE_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  type MessageSearchConfig,
} from './config.js';
import { EngineCapability } from './query/types.js';
import { SearchError, SearchErrorType } from './errors.js';

function validationField(config: MessageSearchConfig): unknown {
  try {
    validateConfig(config);
  } catch (error) {
    if (error instanceof SearchError) {
      expect(error.type).toBe(SearchErrorType.INVALID_CONFIG);
      return error.context?.field;
    }
    throw error;
  }
  return undefined;
}

describe('Configuration', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should have all required sections', () => {
      expect(DEFAULT_CONFIG).toHaveProperty('database');
      expect(DEFAULT_CONFIG).toHaveProperty('search');
      expect(DEFAULT_CONFIG).toHaveProperty('logging');
    });

    it('should default to PGlite on disk', () => {
      expect(DEFAULT_DATABASE_CONFIG.backend).toBe('pglite');
      expect(DEFAULT_DATABASE_CONFIG.inMemory).toBe(false);
    });

    it('should have valid default search config', () => {
      expect(DEFAULT_SEARCH_CONFIG.textSearchConfig).toBe('english');
      expect(DEFAULT_SEARCH_CONFIG.indexedKeys).toEqual([
        'content.body',
        'content.name',
        'content.topic',
      ]);
      expect(DEFAULT_SEARCH_CONFIG.maxResults).toBe(500);
      expect(DEFAULT_SEARCH_CONFIG.defaultLimit).toBe(10);
      expect(DEFAULT_SEARCH_CONFIG.forceCapability).toBeUndefined();
    });
  });

  describe('createConfig()', () => {
    it('should return default config when no partial provided', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge partial database config', () => {
      const config = createConfig({ database: { backend: 'sqlite' } });

      expect(config.database.backend).toBe('sqlite');
      expect(config.database.path).toBe(DEFAULT_DATABASE_CONFIG.path);
    });

    it('should replace arrays instead of merging them', () => {
      const config = createConfig({
        search: { indexedKeys: ['content.body'] },
      });

      expect(config.search.indexedKeys).toEqual(['content.body']);
      expect(config.search.maxResults).toBe(DEFAULT_SEARCH_CONFIG.maxResults);
    });

    it('should ignore undefined values', () => {
      const config = createConfig({ logging: { level: undefined } });
      expect(config.logging.level).toBe('WARN');
    });

    it('should not mutate the defaults', () => {
      createConfig({ search: { maxResults: 5 } });
      expect(DEFAULT_SEARCH_CONFIG.maxResults).toBe(500);
    });
  });

  describe('validateConfig()', () => {
    it('should accept the default config', () => {
      expect(() => validateConfig(createConfig())).not.toThrow();
    });

    it('should require a path unless in memory', () => {
      expect(
        validationField(createConfig({ database: { path: '' } })),
      ).toBe('database.path');
      expect(() =>
        validateConfig(createConfig({ database: { path: '', inMemory: true } })),
      ).not.toThrow();
    });

    it('should reject a text search config that is not a plain name', () => {
      expect(
        validationField(
          createConfig({ search: { textSearchConfig: "english'; --" } }),
        ),
      ).toBe('search.textSearchConfig');
      expect(() =>
        validateConfig(
          createConfig({ search: { textSearchConfig: 'pg_catalog.simple' } }),
        ),
      ).not.toThrow();
    });

    it('should reject empty indexed keys', () => {
      expect(
        validationField(createConfig({ search: { indexedKeys: [] } })),
      ).toBe('search.indexedKeys');
    });

    it('should reject non-positive limits', () => {
      expect(
        validationField(createConfig({ search: { maxResults: 0 } })),
      ).toBe('search.maxResults');
      expect(
        validationField(createConfig({ search: { defaultLimit: 2.5 } })),
      ).toBe('search.defaultLimit');
      expect(
        validationField(createConfig({ search: { maxHighlightFragments: -1 } })),
      ).toBe('search.maxHighlightFragments');
    });

    it('should accept a known forced capability', () => {
      expect(() =>
        validateConfig(
          createConfig({
            search: { forceCapability: EngineCapability.PlainBestEffort },
          }),
        ),
      ).not.toThrow();
    });
  });
});
