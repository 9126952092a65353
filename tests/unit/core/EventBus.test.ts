/**
 * EventBus unit tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, EventTypes } from '../../../src/core/EventBus.js';

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('subscribe', () => {
    it('should return an unsubscribe function', () => {
      const handler = vi.fn();
      const unsubscribe = eventBus.subscribe(EventTypes.CONTAINER_STARTED, handler);

      expect(eventBus.getSubscriberCount(EventTypes.CONTAINER_STARTED)).toBe(1);

      unsubscribe();
      eventBus.publish(EventTypes.CONTAINER_STARTED, { containerId: 'abc123', names: [] });

      expect(eventBus.getSubscriberCount(EventTypes.CONTAINER_STARTED)).toBe(0);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('publish', () => {
    it('should call every subscriber with the payload', () => {
      const handler1 = vi.fn();
      const handler2 = vi.fn();
      eventBus.subscribe(EventTypes.CONTAINER_DIED, handler1);
      eventBus.subscribe(EventTypes.CONTAINER_DIED, handler2);

      const payload = { containerId: 'abc123', names: ['worker.docker'] };
      eventBus.publish(EventTypes.CONTAINER_DIED, payload);

      expect(handler1).toHaveBeenCalledWith(payload);
      expect(handler2).toHaveBeenCalledWith(payload);
    });

    it('should not call handlers for different events', () => {
      const handler = vi.fn();
      eventBus.subscribe(EventTypes.SYSTEM_STARTED, handler);

      eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason: 'test' });

      expect(handler).not.toHaveBeenCalled();
    });

    it('should not let a failing subscriber reach the publisher', () => {
      eventBus.subscribe(EventTypes.RECORDS_SEEDED, () => {
        throw new Error('subscriber failed');
      });

      expect(() => eventBus.publish(EventTypes.RECORDS_SEEDED, { count: 1 })).not.toThrow();
    });
  });
});
