/**
 * Session Event Bus - per-session ordered, replayable, multi-subscriber delivery
 *
 * Each TaskSession owns exactly one SessionEventBus.
 * - publish() assigns the next seq, retains the event and fans it out
 * - subscribe() copies the retained backlog and attaches a live queue in one step
 * - close() is called once the session is terminal; live feeds drain and end
 *
 * Usage:
 * ```typescript
 * const bus = new SessionEventBus('session-123', { bufferSize: 1000, queueDepth: 256 });
 *
 * bus.publish({ type: 'log', payload: { level: 'info', message: 'hi', timestamp } });
 *
 * const subscription = bus.subscribe();
 * for (const item of subscription.backlog) send(item);
 * for await (const item of subscription) send(item);
 * ```
 */

import { randomUUID } from 'crypto';
import { logger } from '../../config/logger.js';
import {
  createGapMarker,
  createSessionEvent,
  type AnySessionEvent,
  type SessionEventInput,
  type StreamItem,
} from '../../types/events.js';
import { Subscription } from './subscription.js';

export interface SessionEventBusOptions {
  /** Events retained for late subscribers */
  bufferSize: number;

  /** Per-subscriber undelivered event limit */
  queueDepth: number;
}

export class SessionEventBus {
  /** The session this bus belongs to */
  readonly sessionId: string;

  private readonly options: SessionEventBusOptions;
  private readonly buffer: AnySessionEvent[] = [];
  private readonly subscribers = new Map<string, Subscription>();

  private seq = 0;
  private evictedThrough = 0;
  private closed = false;

  constructor(sessionId: string, options: SessionEventBusOptions) {
    this.sessionId = sessionId;
    this.options = options;
  }

  /**
   * Assign the next sequence number, retain and deliver.
   * Returns undefined once the bus is closed; the event is dropped.
   */
  publish(input: SessionEventInput): AnySessionEvent | undefined {
    if (this.closed) {
      logger.debug({ sessionId: this.sessionId, type: input.type }, 'Dropping event published after close');
      return undefined;
    }

    this.seq += 1;
    const event = createSessionEvent(input, this.seq, this.sessionId);

    this.buffer.push(event);
    if (this.buffer.length > this.options.bufferSize) {
      const evicted = this.buffer.shift();
      if (evicted) this.evictedThrough = evicted.seq;
    }

    for (const subscription of this.subscribers.values()) {
      subscription.push(event);
    }

    return event;
  }

  /**
   * Attach a new subscriber.
   *
   * The backlog is copied out of the buffer here, so the caller can send it
   * without touching bus state. When earlier events were already evicted the
   * backlog starts with a gap marker covering them.
   */
  subscribe(): Subscription {
    const backlog: StreamItem[] = [];
    if (this.evictedThrough > 0) {
      backlog.push(createGapMarker(this.sessionId, 1, this.evictedThrough));
    }
    backlog.push(...this.buffer);

    const subscription = new Subscription({
      id: randomUUID(),
      sessionId: this.sessionId,
      queueDepth: this.options.queueDepth,
      backlog,
      onClose: (closed) => {
        this.subscribers.delete(closed.id);
      },
    });

    if (this.closed) {
      subscription.end();
    } else {
      this.subscribers.set(subscription.id, subscription);
    }

    logger.debug(
      { sessionId: this.sessionId, subscriptionId: subscription.id, backlog: backlog.length },
      'Subscriber attached to session event bus'
    );

    return subscription;
  }

  /**
   * Stop accepting events. Attached subscriptions drain what they hold, then end.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const subscription of this.subscribers.values()) {
      subscription.end();
    }
    this.subscribers.clear();
  }

  /** Seq of the most recently published event (0 before the first) */
  get lastSeq(): number {
    return this.seq;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Copy of the retained events, oldest first */
  getRetained(): AnySessionEvent[] {
    return [...this.buffer];
  }
}
