/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * MessageSearchSystem - wires configuration, logging, storage and the
 * search store together and owns their lifecycle.
 */

import type { DeepPartial, MessageSearchConfig } from '../config.js';
import { createConfig, validateConfig } from '../config.js';
import type { SearchStorageAdapter } from '../storage/types.js';
import { createSearchStorage } from '../storage/StorageFactory.js';
import { MessageSearchStore } from '../search/MessageSearchStore.js';
import { SearchError, SearchErrorType } from '../errors.js';
import { createModuleLogger, globalLogger, parseLogLevel } from './Logger.js';

const log = createModuleLogger('MessageSearchSystem');

export interface MessageSearchSystemOptions {
  /** Configuration overrides */
  config?: DeepPartial<MessageSearchConfig>;
  /** Use this adapter instead of creating one from `config.database` */
  storage?: SearchStorageAdapter;
}

export class MessageSearchSystem {
  private storage: SearchStorageAdapter | null = null;
  private store: MessageSearchStore | null = null;

  private constructor(readonly config: MessageSearchConfig) {}

  /**
   * Create, validate and open a search system.
   */
  static async initialize(
    options: MessageSearchSystemOptions = {},
  ): Promise<MessageSearchSystem> {
    const config = createConfig(options.config);
    validateConfig(config);

    const system = new MessageSearchSystem(config);
    system.configureLogging();
    await system.open(options.storage);
    return system;
  }

  private configureLogging(): void {
    const logging = this.config.logging;
    globalLogger.configure({
      level: parseLogLevel(logging.level),
      console: logging.console,
      filePath: logging.filePath,
      json: logging.json,
    });
  }

  private async open(storage?: SearchStorageAdapter): Promise<void> {
    log.startTimer('open');
    const adapter =
      storage ??
      (await createSearchStorage(this.config.database, this.config.search));
    await adapter.initialize();

    this.storage = adapter;
    this.store = new MessageSearchStore(adapter, this.config.search);
    log.endTimer('open', 'open:complete', {
      backend: this.config.database.backend,
      family: adapter.family,
    });
  }

  /**
   * The search store. Throws once the system is closed.
   */
  getStore(): MessageSearchStore {
    if (!this.store) {
      throw new SearchError(
        'Message search system is closed',
        SearchErrorType.NOT_INITIALIZED,
      );
    }
    return this.store;
  }

  isOpen(): boolean {
    return this.store !== null;
  }

  async close(): Promise<void> {
    const store = this.store;
    const storage = this.storage;
    this.store = null;
    this.storage = null;

    if (store) {
      store.resetCapability();
      store.removeAllListeners();
    }
    if (storage) {
      await storage.close();
    }
    await globalLogger.flush();
    log.info('close:complete');
  }
}

export async function initializeMessageSearch(
  options?: MessageSearchSystemOptions,
): Promise<MessageSearchSystem> {
  return MessageSearchSystem.initialize(options);
}
