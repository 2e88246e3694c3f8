/**
 * Subscription - one observer's view of a SessionEventBus
 *
 * Holds the backlog copied at subscribe time plus a bounded queue for live
 * events. The publisher never waits on it: when the queue is full the oldest
 * undelivered event is dropped and folded into a pending gap marker, which is
 * handed out before anything still queued.
 *
 * Single consumer: read either with `next()` or `for await`.
 */

import type { AnySessionEvent, StreamItem } from '../../types/events.js';
import { createGapMarker } from '../../types/events.js';

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

export interface SubscriptionInit {
  id: string;
  sessionId: string;
  queueDepth: number;
  backlog: readonly StreamItem[];
  onClose: (subscription: Subscription) => void;
}

export class Subscription implements AsyncIterable<StreamItem> {
  readonly id: string;
  readonly sessionId: string;

  /** Retained events at subscribe time, oldest first */
  readonly backlog: readonly StreamItem[];

  private readonly queueDepth: number;
  private readonly queue: AnySessionEvent[] = [];
  private pendingGap: { fromSeq: number; toSeq: number } | null = null;
  private waiter: ((result: IteratorResult<StreamItem>) => void) | null = null;
  private readonly onClose: (subscription: Subscription) => void;

  private ended = false;
  private closed = false;
  private dropped = 0;

  constructor(init: SubscriptionInit) {
    this.id = init.id;
    this.sessionId = init.sessionId;
    this.backlog = init.backlog;
    this.queueDepth = init.queueDepth;
    this.onClose = init.onClose;
  }

  // =========================================================================
  // Producer side (called by the bus)
  // =========================================================================

  push(event: AnySessionEvent): void {
    if (this.closed || this.ended) return;

    if (this.waiter && this.queue.length === 0 && !this.pendingGap) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return;
    }

    if (this.queue.length >= this.queueDepth) {
      const oldest = this.queue.shift();
      if (oldest) this.recordDrop(oldest.seq);
    }
    this.queue.push(event);
  }

  /**
   * No more live events will arrive; queued items are still delivered
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    if (this.waiter && this.pending === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(DONE);
    }
  }

  // =========================================================================
  // Consumer side
  // =========================================================================

  next(): Promise<IteratorResult<StreamItem>> {
    if (this.closed) {
      return Promise.resolve(DONE);
    }

    const item = this.take();
    if (item) {
      const result: IteratorYieldResult<StreamItem> = { value: item, done: false };
      return Promise.resolve(result);
    }

    if (this.ended) {
      return Promise.resolve(DONE);
    }

    if (this.waiter) {
      return Promise.reject(new Error(`Subscription ${this.id} already has a pending read`));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Unsubscribe. Idempotent; releases the queue and ends any pending read.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.pendingGap = null;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(DONE);
    }

    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamItem> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve(DONE);
      },
    };
  }

  // =========================================================================
  // Introspection
  // =========================================================================

  /** Undelivered items, counting a pending gap marker as one */
  get pending(): number {
    return this.queue.length + (this.pendingGap ? 1 : 0);
  }

  /** Events dropped from this subscriber's queue since it was created */
  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private recordDrop(seq: number): void {
    this.dropped++;
    if (this.pendingGap) {
      this.pendingGap.toSeq = seq;
    } else {
      this.pendingGap = { fromSeq: seq, toSeq: seq };
    }
  }

  private take(): StreamItem | undefined {
    if (this.pendingGap) {
      const { fromSeq, toSeq } = this.pendingGap;
      this.pendingGap = null;
      return createGapMarker(this.sessionId, fromSeq, toSeq);
    }
    return this.queue.shift();
  }
}
