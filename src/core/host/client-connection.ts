/**
 * Client Connection - what a transport provides to receive one session stream
 *
 * Abstracts the delivery mechanism (Socket.IO socket, SSE response, ...) so
 * the StreamingGateway can relay events without knowing the transport.
 *
 * Implementations:
 * - SocketIOClientConnection: emits on a Socket.IO socket
 * - SSE stream in the REST sessions route
 * - MockClientConnection: for testing
 */

import type { SessionState } from '../../types/session.js';
import type { StreamItem } from '../../types/events.js';

export interface StreamEndInfo {
  sessionId: string;

  /** Terminal state the session ended in (last status_changed seen) */
  state: SessionState;
}

export interface ClientConnection {
  /** Stable id used to detach everything a connection holds */
  readonly id: string;

  /**
   * Deliver one item. A returned promise applies backpressure to this
   * connection only; a rejection ends the attachment.
   */
  send(item: StreamItem): void | Promise<void>;

  /**
   * The session's stream finished naturally. Not called on detach.
   */
  end(info: StreamEndInfo): void | Promise<void>;
}

// ============================================================================
// Mock Implementation (for testing)
// ============================================================================

export interface MockClientConnectionOptions {
  /** Delay every send by this long */
  sendDelayMs?: number;

  /** Reject the Nth send (1-based) */
  failOnSend?: number;
}

/**
 * Mock ClientConnection for testing
 *
 * Records every item and end notification for assertions.
 */
export class MockClientConnection implements ClientConnection {
  readonly items: StreamItem[] = [];
  readonly ends: StreamEndInfo[] = [];

  private sendCount = 0;

  constructor(
    readonly id: string = 'mock-connection',
    private readonly options: MockClientConnectionOptions = {}
  ) {}

  async send(item: StreamItem): Promise<void> {
    this.sendCount++;

    if (this.options.sendDelayMs) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.options.sendDelayMs));
    }

    if (this.options.failOnSend === this.sendCount) {
      throw new Error(`Send ${this.sendCount} failed`);
    }

    this.items.push(item);
  }

  end(info: StreamEndInfo): void {
    this.ends.push(info);
  }

  // Test helpers

  /** Sequence numbers received, in order */
  get seqs(): number[] {
    return this.items.map((item) => item.seq);
  }

  /** Items of one type */
  itemsOfType<K extends StreamItem['type']>(type: K): Array<Extract<StreamItem, { type: K }>> {
    return this.items.filter((item): item is Extract<StreamItem, { type: K }> => item.type === type);
  }

  clear(): void {
    this.items.length = 0;
    this.ends.length = 0;
  }
}
