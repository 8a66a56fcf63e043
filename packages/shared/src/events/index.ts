/**
 * @fileoverview Event handling with EventEmitter2 for mcpfleet
 */

import { EventEmitter2 } from 'eventemitter2';
import type { Logger } from '../logger';

export interface EventManagerOptions {
  readonly wildcard?: boolean;
  readonly delimiter?: string;
  readonly maxListeners?: number;
}

/**
 * Event context information
 */
export interface EventContext {
  readonly eventName: string;
  readonly emitterId: string;
  readonly timestamp: Date;
  readonly source?: string;
}

export type EventListener<T> = (data: T, eventName: string, context: EventContext) => void | Promise<void>;

export interface EventSubscriptionOptions<T> {
  readonly once?: boolean;
  readonly filter?: (data: T) => boolean;
}

type RawListener = (data: unknown, context: EventContext) => void;

/**
 * Event subscription handle for managing subscriptions
 */
export class EventSubscription {
  private isActive = true;

  constructor(
    private readonly emitter: EventEmitter2,
    private readonly eventName: string,
    private readonly listener: RawListener
  ) {}

  unsubscribe(): void {
    if (this.isActive) {
      this.emitter.removeListener(this.eventName, this.listener);
      this.isActive = false;
    }
  }

  isSubscribed(): boolean {
    return this.isActive;
  }

  getEventName(): string {
    return this.eventName;
  }
}

/**
 * Event bus shared by the controller and the gateway
 */
export class EventManager extends EventEmitter2 {
  private readonly managerId: string;
  private readonly logger?: Logger;

  constructor(managerId: string, options: EventManagerOptions = {}, logger?: Logger) {
    super({
      wildcard: true,
      delimiter: '.',
      maxListeners: 100,
      verboseMemoryLeak: true,
      ignoreErrors: false,
      ...options
    });

    this.managerId = managerId;
    this.logger = logger;

    this.on('error', (error: Error) => {
      this.logger?.error(error, 'Event manager error', { component: 'event-manager', managerId: this.managerId });
    });
  }

  /**
   * Subscribe to an event. `guard` narrows the payload; events whose payload
   * fails it are ignored.
   */
  subscribe<T>(
    eventName: string,
    guard: (data: unknown) => data is T,
    listener: EventListener<T>,
    options: EventSubscriptionOptions<T> = {}
  ): EventSubscription {
    const wrapped: RawListener = (data, context) => {
      if (!guard(data)) return;
      if (options.filter && !options.filter(data)) return;

      const firedName = context?.eventName ?? eventName;
      Promise.resolve(listener(data, firedName, context)).catch((error: unknown) => {
        this.logger?.error(
          error instanceof Error ? error : new Error(String(error)),
          'Event listener error',
          { component: 'event-manager', managerId: this.managerId, eventName: firedName }
        );
      });
    };

    if (options.once) {
      this.once(eventName, wrapped);
    } else {
      this.on(eventName, wrapped);
    }

    this.logger?.trace('Event subscription created', { component: 'event-manager', eventName });
    return new EventSubscription(this, eventName, wrapped);
  }

  /**
   * Emit an event with context
   */
  emitEvent<T>(eventName: string, data: T, source?: string): boolean {
    const context: EventContext = {
      eventName,
      emitterId: this.managerId,
      timestamp: new Date(),
      source
    };

    this.logger?.trace('Emitting event', { component: 'event-manager', eventName });
    return this.emit(eventName, data, context);
  }

  /**
   * Resolve with the first matching payload, or undefined once `timeoutMs` passes
   */
  waitForEvent<T>(
    eventName: string,
    guard: (data: unknown) => data is T,
    filter: (data: T) => boolean,
    timeoutMs: number
  ): { promise: Promise<T | undefined>; cancel: () => void } {
    let subscription: EventSubscription | undefined;
    let timer: NodeJS.Timeout | undefined;
    let settle: (value: T | undefined) => void = () => undefined;

    const promise = new Promise<T | undefined>((resolve) => {
      settle = (value) => {
        subscription?.unsubscribe();
        if (timer) clearTimeout(timer);
        resolve(value);
      };
      subscription = this.subscribe(eventName, guard, (data) => settle(data), { filter });
      timer = setTimeout(() => settle(undefined), timeoutMs);
    });

    return { promise, cancel: () => settle(undefined) };
  }
}
