/**
 * Typed Event Bus for application-wide notifications
 * Implements a pub/sub pattern with full TypeScript support
 */
import { EventEmitter } from 'events';
import { logger } from './Logger.js';

/**
 * Event type constants
 */
export const EventTypes = {
  // Container events
  CONTAINER_STARTED: 'container:started',
  CONTAINER_DIED: 'container:died',
  CONTAINER_RENAMED: 'container:renamed',

  // Table events
  RECORDS_SEEDED: 'records:seeded',

  // System events
  SYSTEM_STARTED: 'system:started',
  SYSTEM_SHUTDOWN: 'system:shutdown',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Event payload type mapping
 */
export interface EventPayloadMap {
  [EventTypes.CONTAINER_STARTED]: { containerId: string; names: string[] };
  [EventTypes.CONTAINER_DIED]: { containerId: string; names: string[] };
  [EventTypes.CONTAINER_RENAMED]: { containerId: string; oldName: string; newName: string };
  [EventTypes.RECORDS_SEEDED]: { count: number };
  [EventTypes.SYSTEM_STARTED]: { version: string; domain: string };
  [EventTypes.SYSTEM_SHUTDOWN]: { reason: string };
}

type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void;

export class EventBus {
  private emitter: EventEmitter;
  private debugLogging: boolean;

  constructor() {
    this.emitter = new EventEmitter();
    this.debugLogging = false;
  }

  /**
   * Log every published event at trace level
   */
  enableDebugLogging(): void {
    if (this.debugLogging) return;
    this.debugLogging = true;

    for (const eventType of Object.values(EventTypes)) {
      this.emitter.on(eventType, (data: unknown) => {
        logger.trace({ event: eventType, data }, `Event: ${eventType}`);
      });
    }
    logger.debug('Event debug logging enabled');
  }

  /**
   * Subscribe to an event, returns the unsubscribe function
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    this.emitter.on(eventType, handler);

    return (): void => {
      this.emitter.off(eventType, handler);
    };
  }

  /**
   * Publish an event. A throwing subscriber is logged and does not reach the publisher.
   */
  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    if (this.getSubscriberCount(eventType) === 0) {
      return;
    }

    try {
      this.emitter.emit(eventType, data);
    } catch (error) {
      logger.error({ error, eventType }, 'Event subscriber failed');
    }
  }

  getSubscriberCount(eventType: EventType): number {
    return this.emitter.listenerCount(eventType);
  }
}

export const eventBus = new EventBus();
