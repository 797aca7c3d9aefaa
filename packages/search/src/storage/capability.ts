/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { SearchStorageAdapter } from './types.js';
import { EngineCapability, isRicherCapability } from '../query/types.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('CapabilityProbe');

export interface CapabilityProbeOptions {
  /** Used instead of the detected capability, clamped to it */
  forceCapability?: EngineCapability;
}

/**
 * Works out which query syntax tier a storage engine understands.
 *
 * Detection runs once per connection. Concurrent callers share the same
 * in-flight probe; a failed probe is not cached.
 */
export class CapabilityProbe {
  private detected: EngineCapability | null = null;
  private pending: Promise<EngineCapability> | null = null;
  private override: EngineCapability | undefined;

  constructor(
    private readonly storage: SearchStorageAdapter,
    options: CapabilityProbeOptions = {},
  ) {
    this.override = options.forceCapability;
  }

  /**
   * Capability to use for the next query.
   */
  async resolve(): Promise<EngineCapability> {
    const detected = await this.detect();
    const override = this.override;
    if (override === undefined) {
      return detected;
    }

    if (isRicherCapability(override, detected)) {
      log.warn('resolve:overrideClamped', {
        override,
        detected,
      });
      return detected;
    }
    return override;
  }

  /**
   * Force a tier, or clear the override with `undefined`.
   * Applies from the next resolve().
   */
  setOverride(capability: EngineCapability | undefined): void {
    this.override = capability;
    log.debug('setOverride', { capability });
  }

  getOverride(): EngineCapability | undefined {
    return this.override;
  }

  /**
   * Forget the detected capability. Called when the connection closes.
   */
  invalidate(): void {
    this.detected = null;
    this.pending = null;
  }

  private detect(): Promise<EngineCapability> {
    if (this.detected !== null) {
      return Promise.resolve(this.detected);
    }
    if (!this.pending) {
      const pending = this.probe().then(
        (capability) => {
          if (this.pending === pending) {
            this.detected = capability;
            this.pending = null;
          }
          return capability;
        },
        (error: unknown) => {
          if (this.pending === pending) {
            this.pending = null;
          }
          throw error;
        },
      );
      this.pending = pending;
    }
    return this.pending;
  }

  private async probe(): Promise<EngineCapability> {
    let capability: EngineCapability;
    if (this.storage.family === 'sqlite') {
      capability = EngineCapability.NoStructuredSyntax;
    } else if (await this.storage.supportsWebSearchSyntax()) {
      capability = EngineCapability.FullWebSyntax;
    } else {
      capability = EngineCapability.PlainBestEffort;
    }

    log.info('probe:complete', {
      family: this.storage.family,
      capability,
    });
    return capability;
  }
}
