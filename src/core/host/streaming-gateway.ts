/**
 * StreamingGateway - relays a session's event bus to client connections
 *
 * Each attachment owns one bus subscription and one relay loop:
 *   backlog → live items → connection.end()
 *
 * The relay awaits the connection between items, so a slow connection only
 * backs up its own subscription queue (and eventually sees a gap marker).
 * Attachments never touch session lifecycle; detaching just unsubscribes.
 */

import { randomUUID } from 'crypto';
import { logger } from '../../config/logger.js';
import { getErrorMessage } from '../errors.js';
import type { Subscription } from '../session/subscription.js';
import type { StreamItem } from '../../types/events.js';
import type { SessionState } from '../../types/session.js';
import type { ClientConnection } from './client-connection.js';
import type { SessionRegistry } from './session-registry.js';

export interface Attachment {
  readonly id: string;
  readonly sessionId: string;
  readonly connectionId: string;

  /** Unsubscribe; idempotent */
  detach(): void;

  /** Settles when the relay loop has exited, for any reason */
  readonly done: Promise<void>;
}

interface ActiveAttachment {
  id: string;
  sessionId: string;
  connection: ClientConnection;
  subscription: Subscription;
  detached: boolean;
  lastSentSeq: number;
  lastState: SessionState;
}

export class StreamingGateway {
  private readonly attachments = new Map<string, ActiveAttachment>();

  constructor(private readonly registry: SessionRegistry) {}

  /**
   * Subscribe a connection to a session. Throws NotFoundError synchronously.
   */
  attach(sessionId: string, connection: ClientConnection): Attachment {
    const view = this.registry.get(sessionId);
    const subscription = this.registry.getEventBus(sessionId).subscribe();

    const active: ActiveAttachment = {
      id: randomUUID(),
      sessionId,
      connection,
      subscription,
      detached: false,
      lastSentSeq: 0,
      lastState: view.state,
    };
    this.attachments.set(active.id, active);

    logger.info(
      { sessionId, attachmentId: active.id, connectionId: connection.id, backlog: subscription.backlog.length },
      'Connection attached to session stream'
    );

    const done = this.relay(active);

    return {
      id: active.id,
      sessionId,
      connectionId: connection.id,
      detach: () => this.detach(active.id),
      done,
    };
  }

  /**
   * Detach a single attachment. Returns false if it was already gone.
   */
  detach(attachmentId: string): boolean {
    const active = this.attachments.get(attachmentId);
    if (!active) return false;

    active.detached = true;
    active.subscription.close();
    this.attachments.delete(attachmentId);

    logger.info(
      { sessionId: active.sessionId, attachmentId, connectionId: active.connection.id },
      'Connection detached from session stream'
    );
    return true;
  }

  /**
   * Detach everything a connection holds (connection closed)
   */
  detachConnection(connectionId: string): number {
    let detached = 0;
    for (const active of [...this.attachments.values()]) {
      if (active.connection.id === connectionId && this.detach(active.id)) {
        detached++;
      }
    }
    return detached;
  }

  detachAll(): void {
    for (const attachmentId of [...this.attachments.keys()]) {
      this.detach(attachmentId);
    }
  }

  getAttachmentCount(sessionId?: string): number {
    if (sessionId === undefined) return this.attachments.size;

    let count = 0;
    for (const active of this.attachments.values()) {
      if (active.sessionId === sessionId) count++;
    }
    return count;
  }

  // ==========================================================================
  // Relay Loop
  // ==========================================================================

  private async relay(active: ActiveAttachment): Promise<void> {
    // Let the caller hold the Attachment before the first send
    await Promise.resolve();

    const { subscription, connection } = active;

    try {
      for (const item of subscription.backlog) {
        if (active.detached) return;
        await this.deliver(active, item);
      }

      for await (const item of subscription) {
        if (active.detached) return;
        await this.deliver(active, item);
      }

      if (!active.detached) {
        await connection.end({ sessionId: active.sessionId, state: active.lastState });
        logger.debug(
          { sessionId: active.sessionId, attachmentId: active.id, state: active.lastState },
          'Session stream ended'
        );
      }
    } catch (error) {
      logger.warn(
        { error: getErrorMessage(error), sessionId: active.sessionId, attachmentId: active.id },
        'Stream delivery failed, detaching'
      );
    } finally {
      subscription.close();
      this.attachments.delete(active.id);
    }
  }

  private async deliver(active: ActiveAttachment, item: StreamItem): Promise<void> {
    if (item.seq <= active.lastSentSeq) return;

    if (item.type === 'status_changed') {
      active.lastState = item.payload.state;
    }

    await active.connection.send(item);
    active.lastSentSeq = item.seq;
  }
}
