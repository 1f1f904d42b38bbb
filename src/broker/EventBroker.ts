/**
 * EventBroker
 *
 * Synchronous in-process publish/subscribe router. Every component talks to
 * every other one through here, by event name, and never holds a reference to
 * another component's state.
 *
 * Delivery happens inside the publisher's call stack, in subscription order,
 * to a copy of the subscriber list taken when the dispatch starts. A handler
 * may publish again from inside its own invocation; that nesting is
 * intentional, counted, and capped at `maxPublishDepth`.
 */

import { randomUUID } from "node:crypto";
import type { EventHandler, EventPayload, SupportEvent } from "../types/index.js";
import type { EventPayloadMap } from "../events/index.js";
import { PublishDepthExceededError } from "../utils/errors.js";
import { createLogger, runWithTrace, type LayerLogger, type Logger } from "../utils/logger.js";

/** Default cap on publish-from-handler nesting */
const DEFAULT_MAX_PUBLISH_DEPTH = 32;

export interface BrokerStats {
  published: number;
  delivered: number;
  errors: number;
  /** Publishes that found no subscriber */
  undelivered: number;
}

export interface EventBrokerOptions {
  logger?: Logger;
  maxPublishDepth?: number;
}

export interface PublishOptions {
  /** Reuse an id assigned upstream (e.g. by the gateway) */
  id?: string;
  timestamp?: Date;
}

export class EventBroker {
  private subscribers: Map<string, EventHandler[]> = new Map();
  private stats: BrokerStats = { published: 0, delivered: 0, errors: 0, undelivered: 0 };
  private depth = 0;
  private readonly maxDepth: number;
  private logger: LayerLogger;

  constructor(options: EventBrokerOptions = {}) {
    this.maxDepth = options.maxPublishDepth ?? DEFAULT_MAX_PUBLISH_DEPTH;
    this.logger = (options.logger ?? createLogger()).forLayer("broker");
  }

  /**
   * Register a handler for an event type.
   * Returns a function that removes this registration.
   */
  subscribe(eventType: string, handler: EventHandler): () => void {
    let handlers = this.subscribers.get(eventType);
    if (!handlers) {
      handlers = [];
      this.subscribers.set(eventType, handlers);
    }

    handlers.push(handler);
    this.logger.debug(`Subscribed to '${eventType}'`, { subscribers: handlers.length });

    return () => {
      this.unsubscribe(eventType, handler);
    };
  }

  /**
   * Remove the earliest registration of `handler` for `eventType`.
   */
  unsubscribe(eventType: string, handler: EventHandler): boolean {
    const handlers = this.subscribers.get(eventType);
    const index = handlers?.indexOf(handler) ?? -1;

    if (!handlers || index === -1) {
      this.logger.warn(`Handler not found for '${eventType}'`);
      return false;
    }

    handlers.splice(index, 1);
    if (handlers.length === 0) {
      this.subscribers.delete(eventType);
    }

    this.logger.debug(`Unsubscribed from '${eventType}'`);
    return true;
  }

  /**
   * Build an immutable event and deliver it to every current subscriber.
   *
   * A subscriber that throws is counted and logged; the remaining
   * subscribers still receive the event.
   */
  publish<K extends keyof EventPayloadMap>(eventType: K, payload: EventPayloadMap[K], options?: PublishOptions): SupportEvent;
  publish(eventType: string, payload: EventPayload, options?: PublishOptions): SupportEvent;
  publish(eventType: string, payload: EventPayload, options: PublishOptions = {}): SupportEvent {
    if (this.depth >= this.maxDepth) {
      this.logger.error(`Refusing to publish '${eventType}': nesting depth ${this.depth} reached`, {
        maxDepth: this.maxDepth,
      });
      throw new PublishDepthExceededError(eventType, this.maxDepth);
    }

    const event: SupportEvent = Object.freeze({
      id: options.id ?? randomUUID(),
      type: eventType,
      payload: deepFreeze(structuredClone(payload)),
      timestamp: (options.timestamp ?? new Date()).toISOString(),
    });

    this.stats.published++;

    // Snapshot so (un)subscribe calls made by handlers do not touch this dispatch
    const handlers = [...(this.subscribers.get(eventType) ?? [])];

    if (handlers.length === 0) {
      this.stats.undelivered++;
      this.logger.warn(`Undelivered event '${eventType}': no subscribers`, { eventId: event.id });
      return event;
    }

    this.logger.debug(`Publishing '${eventType}'`, {
      eventId: event.id,
      subscribers: handlers.length,
      depth: this.depth,
    });

    this.depth++;
    try {
      runWithTrace("broker", () => {
        for (const handler of handlers) {
          this.deliver(handler, event);
        }
      });
    } finally {
      this.depth--;
    }

    return event;
  }

  /**
   * Snapshot of delivery counters.
   */
  getStats(): BrokerStats {
    return { ...this.stats };
  }

  /**
   * Subscriber counts per event type, or for a single type.
   */
  getSubscriberCounts(eventType?: string): Record<string, number> {
    if (eventType !== undefined) {
      return { [eventType]: this.subscribers.get(eventType)?.length ?? 0 };
    }

    const counts: Record<string, number> = {};
    for (const [type, handlers] of this.subscribers.entries()) {
      counts[type] = handlers.length;
    }
    return counts;
  }

  hasSubscribers(eventType: string): boolean {
    return (this.subscribers.get(eventType)?.length ?? 0) > 0;
  }

  /**
   * Current publish nesting depth (0 outside any dispatch).
   */
  getDepth(): number {
    return this.depth;
  }

  /**
   * Remove every subscriber.
   */
  clear(): number {
    let removed = 0;
    for (const handlers of this.subscribers.values()) {
      removed += handlers.length;
    }
    this.subscribers.clear();
    this.logger.info(`Cleared all subscribers (removed ${removed})`);
    return removed;
  }

  private deliver(handler: EventHandler, event: SupportEvent): void {
    try {
      const outcome: unknown = handler(event);
      this.stats.delivered++;

      // Async handlers are still counted once; their rejection is logged here
      if (outcome instanceof Promise) {
        outcome.catch((error: unknown) => {
          this.stats.errors++;
          this.logger.error(`Async subscriber for '${event.type}' rejected`, { eventId: event.id, error });
        });
      }
    } catch (error) {
      this.stats.errors++;
      this.logger.error(`Subscriber for '${event.type}' failed`, {
        eventId: event.id,
        error: error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error,
      });
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
