/**
 * Event sinks for committed claim calls.
 */

import type { ClaimEvent, ClaimEventType, EventSink } from './types.js';
import { createLogger, type Logger } from './logger.js';

type Subscriber = (event: ClaimEvent) => void;

export type SubscriberErrorHandler = (error: unknown, event: ClaimEvent) => void;

export interface EventBusOptions {
  /** Called for each subscriber that throws. Defaults to an ERROR log line. */
  onError?: SubscriberErrorHandler;
  logger?: Logger;
}

/** Keeps every deposited event in order. Useful in tests and for replay. */
export class RecordingEventSink implements EventSink {
  private events: ClaimEvent[] = [];

  deposit(event: ClaimEvent): void {
    this.events.push(event);
  }

  list(): ClaimEvent[] {
    return [...this.events];
  }

  ofType<K extends ClaimEventType>(type: K): Extract<ClaimEvent, { type: K }>[] {
    return this.events.filter((e): e is Extract<ClaimEvent, { type: K }> => e.type === type);
  }

  clear(): void {
    this.events = [];
  }
}

/**
 * Fans each event out to subscribers in subscription order.
 *
 * Subscribers are isolated from each other and from the call that deposited the
 * event: one that throws is reported to `onError` and the rest still receive the
 * event. A committed call therefore reaches every subscriber, and a call that
 * rolled back reaches none.
 */
export class EventBus implements EventSink {
  private subscribers: Set<Subscriber> = new Set();
  private onError: SubscriberErrorHandler;

  constructor(opts: EventBusOptions = {}) {
    const logger = opts.logger ?? createLogger('EventBus');
    this.onError = opts.onError ?? ((error, event) => {
      logger.error('Subscriber failed', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  subscribe(callback: Subscriber): () => void {
    this.subscribers.add(callback);
    return () => { this.subscribers.delete(callback); };
  }

  deposit(event: ClaimEvent): void {
    for (const cb of [...this.subscribers]) {
      try {
        cb(event);
      } catch (err) {
        this.onError(err, event);
      }
    }
  }

  get size(): number {
    return this.subscribers.size;
  }
}
