import { EventBus, subscribeToEvent } from './event_bus';
import type { Logger } from '../logger';
import type {
  BaseEvent,
  TaskStatusChangedEvent,
  SchedulerRunFinishedEvent,
} from './types';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('EventBus', () => {
  let testEventBus: EventBus;
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    mockLogger = createMockLogger();
    testEventBus = new EventBus({ logger: mockLogger });
  });

  afterEach(() => {
    testEventBus.clearSubscriptions();
  });

  describe('publish and subscribe', () => {
    it('should deliver a published event to its subscriber synchronously', () => {
      const mockHandler = jest.fn();
      const event: BaseEvent = {
        type: 'test.event',
        timestamp: Date.now(),
        payload: { test: 'data' },
        source: 'test-source'
      };

      testEventBus.subscribe('test.event', mockHandler);
      testEventBus.publish(event);

      expect(mockHandler).toHaveBeenCalledWith(event);
      expect(mockHandler).toHaveBeenCalledTimes(1);
    });

    it('should reject events without type, timestamp or source', () => {
      const invalidEvents: BaseEvent[] = [
        { type: '', timestamp: Date.now(), payload: {}, source: 'test' },
        { type: 'test', timestamp: 0, payload: {}, source: 'test' },
        { type: 'test', timestamp: Date.now(), payload: {}, source: '' }
      ];

      invalidEvents.forEach((invalidEvent) => {
        expect(() => testEventBus.publish(invalidEvent)).toThrow();
      });
    });

    it('should create subscriptions with unique ids and metadata', () => {
      const first = testEventBus.subscribe('test.event', jest.fn());
      const second = testEventBus.subscribe('test.event', jest.fn());

      expect(first.id).toMatch(/^subscription:/);
      expect(first.id).not.toBe(second.id);
      expect(first.eventType).toBe('test.event');
      expect(typeof first.metadata?.createdAt).toBe('number');
    });

    it('should deliver to every subscriber of the same type', () => {
      const handler1 = jest.fn();
      const handler2 = jest.fn();
      const event: BaseEvent = { type: 'multi', timestamp: Date.now(), payload: {}, source: 'test' };

      testEventBus.subscribe('multi', handler1);
      testEventBus.subscribe('multi', handler2);
      testEventBus.publish(event);

      expect(handler1).toHaveBeenCalledWith(event);
      expect(handler2).toHaveBeenCalledWith(event);
      expect(testEventBus.getSubscriptionCount('multi')).toBe(2);
    });

    it('should not deliver to other event types', () => {
      const handler = jest.fn();
      testEventBus.subscribe('isolated.test', handler);

      testEventBus.publish({ type: 'different.event', timestamp: Date.now(), payload: {}, source: 'test' });

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('subscription management', () => {
    it('should stop delivering after unsubscribe', () => {
      const handler = jest.fn();
      const subscription = testEventBus.subscribe('test.unsubscribe', handler);

      expect(testEventBus.unsubscribe(subscription.id)).toBe(true);
      expect(testEventBus.getSubscriptionCount('test.unsubscribe')).toBe(0);

      testEventBus.publish({ type: 'test.unsubscribe', timestamp: Date.now(), payload: {}, source: 'test' });
      expect(handler).not.toHaveBeenCalled();
    });

    it('should return false when unsubscribing an unknown id', () => {
      expect(testEventBus.unsubscribe('non-existent-id')).toBe(false);
    });

    it('should clear all subscriptions', () => {
      testEventBus.subscribe('event.one', jest.fn());
      testEventBus.subscribe('event.two', jest.fn());

      expect(testEventBus.getActiveEventTypes()).toEqual(['event.one', 'event.two']);

      testEventBus.clearSubscriptions();

      expect(testEventBus.getSubscriptions()).toHaveLength(0);
      expect(testEventBus.getActiveEventTypes()).toHaveLength(0);
    });

    it('should deliver every event to wildcard subscribers', () => {
      const wildcardHandler = jest.fn();
      const subscription = testEventBus.subscribeToAll(wildcardHandler);
      const event1: BaseEvent = { type: 'any.event', timestamp: Date.now(), payload: {}, source: 'test' };
      const event2: BaseEvent = { type: 'another.event', timestamp: Date.now(), payload: {}, source: 'test' };

      testEventBus.publish(event1);
      testEventBus.publish(event2);

      expect(subscription.eventType).toBe('*');
      expect(wildcardHandler).toHaveBeenNthCalledWith(1, event1);
      expect(wildcardHandler).toHaveBeenNthCalledWith(2, event2);
    });
  });

  describe('handler isolation', () => {
    it('should log a rejecting handler without affecting the others', async () => {
      const successHandler = jest.fn().mockResolvedValue(undefined);
      const handlerError = new Error('Handler error');
      const errorHandler = jest.fn().mockRejectedValue(handlerError);
      const event: BaseEvent = { type: 'async.test', timestamp: Date.now(), payload: {}, source: 'test' };

      testEventBus.subscribe('async.test', errorHandler);
      testEventBus.subscribe('async.test', successHandler);
      testEventBus.publish(event);
      await testEventBus.waitForIdle();

      expect(successHandler).toHaveBeenCalledWith(event);
      expect(mockLogger.error).toHaveBeenCalledWith('Error in event handler for async.test:', handlerError);
    });

    it('should wait for slow async handlers in waitForIdle', async () => {
      const seen: string[] = [];
      testEventBus.subscribe('slow', async () => {
        await new Promise(resolve => setTimeout(resolve, 20));
        seen.push('done');
      });

      testEventBus.publish({ type: 'slow', timestamp: Date.now(), payload: {}, source: 'test' });
      expect(seen).toEqual([]);

      await testEventBus.waitForIdle();
      expect(seen).toEqual(['done']);
    });
  });

  describe('typed events', () => {
    it('should deliver TaskStatusChangedEvent through subscribeToEvent', () => {
      const handler = jest.fn();
      const statusEvent: TaskStatusChangedEvent = {
        type: 'task.status.changed',
        timestamp: Date.now(),
        source: 'task',
        payload: {
          taskId: 7,
          taskName: 'Nightly backup',
          taskType: 'backup',
          oldStatus: 'Pending',
          newStatus: 'Running'
        }
      };

      const subscription = subscribeToEvent(testEventBus, 'task.status.changed', handler);
      testEventBus.publish(statusEvent);

      expect(subscription.eventType).toBe('task.status.changed');
      expect(handler).toHaveBeenCalledWith(statusEvent);
    });

    it('should deliver SchedulerRunFinishedEvent payloads intact', () => {
      const handler = jest.fn();
      const finished: SchedulerRunFinishedEvent = {
        type: 'scheduler.run.finished',
        timestamp: Date.now(),
        source: 'scheduler',
        payload: { completed: 3, failed: 1, durationMs: 3000 }
      };

      subscribeToEvent(testEventBus, 'scheduler.run.finished', handler);
      testEventBus.publish(finished);

      expect(handler).toHaveBeenCalledWith(finished);
    });
  });
});
