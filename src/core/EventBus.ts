/**
 * Typed Event Bus for application-wide event handling
 * Implements a pub/sub pattern with full TypeScript support
 */
import { EventEmitter } from 'events';
import { createSilentLogger, type Logger } from './Logger.js';
import type { DNSRecordType, HostSource } from '../types/index.js';

/**
 * Event type constants
 */
export const EventTypes = {
  // Docker events
  DOCKER_CONTAINER_STARTED: 'docker:container:started',
  DOCKER_SYNC_COMPLETED: 'docker:sync:completed',

  // Proxmox events
  PROXMOX_SYNC_COMPLETED: 'proxmox:sync:completed',

  // DNS events
  DNS_RECORD_WRITTEN: 'dns:record:written',
  DNS_RECORD_FAILED: 'dns:record:failed',

  // System events
  SYSTEM_STARTED: 'system:started',
  SYSTEM_SHUTDOWN: 'system:shutdown',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Event payload type mapping
 */
export interface EventPayloadMap {
  [EventTypes.DOCKER_CONTAINER_STARTED]: { containerId: string; containerName: string; hosts: string[] };
  [EventTypes.DOCKER_SYNC_COMPLETED]: { containerCount: number; hostCount: number };
  [EventTypes.PROXMOX_SYNC_COMPLETED]: { processed: number; skipped: number; failed: number; duration: number };
  [EventTypes.DNS_RECORD_WRITTEN]: { key: string; hostname: string; target: string; type: DNSRecordType; source: HostSource };
  [EventTypes.DNS_RECORD_FAILED]: { hostname: string; source: HostSource; error: string };
  [EventTypes.SYSTEM_STARTED]: { version: string; mode: string };
  [EventTypes.SYSTEM_SHUTDOWN]: { reason: string };
}

type EventHandler<T extends EventType> = (data: EventPayloadMap[T]) => void | Promise<void>;

/**
 * Typed Event Bus implementation
 */
export class EventBus {
  private emitter: EventEmitter;
  private subscriberCounts: Map<EventType, number>;
  private debugLogging: boolean;
  private logger: Logger;

  constructor(logger: Logger = createSilentLogger()) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(50);
    this.subscriberCounts = new Map();
    this.debugLogging = false;
    this.logger = logger;
  }

  /**
   * Enable trace logging for all events
   */
  enableDebugLogging(): void {
    if (this.debugLogging) return;
    this.debugLogging = true;

    for (const eventType of Object.values(EventTypes)) {
      this.emitter.on(eventType, (data: unknown) => {
        this.logger.trace({ event: eventType, data }, `Event: ${eventType}`);
      });
    }
    this.logger.debug('Event debug logging enabled');
  }

  /**
   * Subscribe to an event with type-safe handler
   */
  subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
    const listener = (data: EventPayloadMap[T]): void => this.invoke(eventType, handler, data);
    this.emitter.on(eventType, listener);

    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);
    this.logger.debug({ eventType, subscribers: currentCount + 1 }, 'Subscribed to event');

    return (): void => {
      this.emitter.off(eventType, listener);
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
      this.logger.debug({ eventType, subscribers: count - 1 }, 'Unsubscribed from event');
    };
  }

  /**
   * Subscribe to an event once
   */
  once<T extends EventType>(eventType: T, handler: EventHandler<T>): void {
    const currentCount = this.subscriberCounts.get(eventType) ?? 0;
    this.subscriberCounts.set(eventType, currentCount + 1);

    const wrappedHandler = (data: EventPayloadMap[T]): void => {
      const count = this.subscriberCounts.get(eventType) ?? 1;
      this.subscriberCounts.set(eventType, count - 1);
      this.invoke(eventType, handler, data);
    };

    this.emitter.once(eventType, wrappedHandler);
  }

  /**
   * Publish an event with type-safe payload
   */
  publish<T extends EventType>(eventType: T, data: EventPayloadMap[T]): void {
    const subscriberCount = this.subscriberCounts.get(eventType) ?? 0;
    if (subscriberCount > 0 || this.debugLogging) {
      this.emitter.emit(eventType, data);
    }
  }

  /**
   * Run a handler, logging async failures instead of leaving them unhandled
   */
  private invoke<T extends EventType>(eventType: T, handler: EventHandler<T>, data: EventPayloadMap[T]): void {
    Promise.resolve()
      .then(() => handler(data))
      .catch((error: unknown) => {
        this.logger.error({ eventType, error }, 'Event handler failed');
      });
  }

  getSubscriberCount(eventType: EventType): number {
    return this.subscriberCounts.get(eventType) ?? 0;
  }

  /**
   * Remove all listeners for an event or all events
   */
  removeAllListeners(eventType?: EventType): void {
    if (eventType) {
      this.emitter.removeAllListeners(eventType);
      this.subscriberCounts.set(eventType, 0);
    } else {
      this.emitter.removeAllListeners();
      this.subscriberCounts.clear();
      this.debugLogging = false;
    }
  }
}
