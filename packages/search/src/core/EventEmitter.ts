/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Type-safe event emitter for search components.
 */

import { createModuleLogger } from './Logger.js';

const log = createModuleLogger('EventEmitter');

// ============================================================================
// Types
// ============================================================================

export type EventHandler<T> = (data: T) => void | Promise<void>;

// ============================================================================
// Generic EventEmitter Class
// ============================================================================

/**
 * Generic type-safe event emitter.
 * Use this as a base class for components that need custom events.
 *
 * @typeParam TEvents - Map of event names to their data types
 */
export class EventEmitter<TEvents extends { [key: string]: unknown }> {
  private handlers: Map<keyof TEvents, Set<EventHandler<unknown>>> = new Map();
  private onceHandlers: Map<keyof TEvents, Set<EventHandler<unknown>>> =
    new Map();

  /**
   * Subscribe to an event.
   */
  on<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): () => void {
    this.handlerSet(this.handlers, event).add(
      handler as EventHandler<unknown>,
    );
    return () => this.off(event, handler);
  }

  /**
   * Subscribe to an event for one-time execution.
   */
  once<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): () => void {
    this.handlerSet(this.onceHandlers, event).add(
      handler as EventHandler<unknown>,
    );
    return () => {
      this.onceHandlers.get(event)?.delete(handler as EventHandler<unknown>);
    };
  }

  off<K extends keyof TEvents>(
    event: K,
    handler: EventHandler<TEvents[K]>,
  ): void {
    this.handlers.get(event)?.delete(handler as EventHandler<unknown>);
    this.onceHandlers.get(event)?.delete(handler as EventHandler<unknown>);
  }

  /**
   * Emit an event to all subscribers. A failing handler is logged and does
   * not stop the others.
   */
  protected async emit<K extends keyof TEvents>(
    event: K,
    data: TEvents[K],
  ): Promise<void> {
    const allHandlers: Array<EventHandler<unknown>> = [
      ...(this.handlers.get(event) ?? []),
    ];

    const once = this.onceHandlers.get(event);
    if (once) {
      allHandlers.push(...once);
      this.onceHandlers.delete(event);
    }

    const promises = allHandlers.map(async (handler) => {
      try {
        await handler(data);
      } catch (error) {
        log.error('handler:failed', {
          event: String(event),
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });

    await Promise.all(promises);
  }

  /**
   * Remove all handlers for a specific event, or for every event.
   */
  removeAllListeners<K extends keyof TEvents>(event?: K): void {
    if (event) {
      this.handlers.delete(event);
      this.onceHandlers.delete(event);
    } else {
      this.handlers.clear();
      this.onceHandlers.clear();
    }
  }

  listenerCount<K extends keyof TEvents>(event: K): number {
    const regular = this.handlers.get(event)?.size ?? 0;
    const once = this.onceHandlers.get(event)?.size ?? 0;
    return regular + once;
  }

  private handlerSet(
    map: Map<keyof TEvents, Set<EventHandler<unknown>>>,
    event: keyof TEvents,
  ): Set<EventHandler<unknown>> {
    let set = map.get(event);
    if (!set) {
      set = new Set();
      map.set(event, set);
    }
    return set;
  }
}
