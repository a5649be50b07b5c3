import { EventEmitter } from 'events';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  BaseEvent,
  TaskpoolEvent,
  EventHandler,
  EventSubscription
} from './types';

type Listener = Parameters<EventEmitter['on']>[1];

// Generate unique subscription IDs
function generateSubscriptionId(): string {
  return `subscription:${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Event Stream interface - contract for event bus implementations
 */
export interface IEventStream {
  /**
   * Publish an event to the bus
   */
  publish(event: BaseEvent): void;

  /**
   * Subscribe to events of a specific type
   */
  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: string,
    handler: EventHandler<T>
  ): EventSubscription;

  /**
   * Unsubscribe from events
   */
  unsubscribe(subscriptionId: string): boolean;

  /**
   * Get all active subscriptions
   */
  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * In-memory EventBus built on Node.js EventEmitter.
 *
 * Handlers are started synchronously on publish; async handlers keep running
 * in the background and are tracked so `waitForIdle()` can await them.
 * A handler that throws or rejects is logged and never reaches the publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private listeners: Map<string, Listener>;
  private pendingHandlers: Set<Promise<void>>;
  private logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.listeners = new Map();
    this.pendingHandlers = new Set();
    this.logger = options.logger ?? createLogger('[EventBus] ');

    // Every task of a large run may hold a subscription
    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish an event to all subscribers
   *
   * @throws Error if the event lacks a type, timestamp or source
   */
  publish(event: BaseEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);

    // Wildcard for monitoring
    this.emitter.emit('*', event);
  }

  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: string,
    handler: EventHandler<T>
  ): EventSubscription {
    const subscriptionId = generateSubscriptionId();

    const wrappedHandler = (event: T): void => {
      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Error in event handler for ${eventType}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: subscriptionId,
      eventType,
      metadata: {
        createdAt: Date.now()
      }
    };

    this.emitter.on(eventType, wrappedHandler);
    this.listeners.set(subscriptionId, wrappedHandler);
    this.subscriptions.set(subscriptionId, subscription);

    return subscription;
  }

  /**
   * @returns true if the subscription was found and removed
   */
  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    const listener = this.listeners.get(subscriptionId);
    if (!subscription || !listener) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, listener);
    this.subscriptions.delete(subscriptionId);
    this.listeners.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
    this.listeners.clear();
  }

  getSubscriptionCount(eventType: string): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Event types that currently have at least one listener
   */
  getActiveEventTypes(): string[] {
    return this.emitter.eventNames().filter((name): name is string => typeof name === 'string');
  }

  /**
   * Subscribe to every event (wildcard subscription)
   */
  subscribeToAll(handler: EventHandler<BaseEvent>): EventSubscription {
    return this.subscribe('*', handler);
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @param options.timeout - Maximum time to wait in ms (default: 5000)
   *
   * @example
   * ```typescript
   * await scheduler.runAll();      // publishes run events
   * await eventBus.waitForIdle();  // let async handlers finish
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10))
      ]);
    }
  }
}

/**
 * Type-safe subscriber helper for the known event types
 */
export function subscribeToEvent<K extends TaskpoolEvent['type']>(
  bus: IEventStream,
  eventType: K,
  handler: EventHandler<Extract<TaskpoolEvent, { type: K }>>
): EventSubscription {
  return bus.subscribe(eventType, handler);
}
