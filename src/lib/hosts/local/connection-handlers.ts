/**
 * Connection Handlers
 *
 * WebSocket handlers for attaching to and detaching from session streams
 */

import { z } from 'zod';
import type { Attachment, StreamingGateway } from '../../../core/host/streaming-gateway.js';
import { getErrorMessage, isSessionRuntimeError } from '../../../core/errors.js';
import { logger } from '../../../config/logger.js';
import type { AttachResponse } from '../../../types/events.js';
import { SocketIOClientConnection, type TypedSocket } from './socket-io-connection.js';

const sessionIdSchema = z.string().min(1);

type Ack<T> = (response: T) => void;

/**
 * Clients may omit the ack or send any payload; the typed event map
 * describes well-behaved clients only.
 */
function toAck<T>(callback: unknown): Ack<T> {
  if (typeof callback !== 'function') {
    return () => undefined;
  }
  return (response) => {
    callback(response);
  };
}

/**
 * Setup session stream handlers on a socket.
 * Returns a cleanup that detaches every stream the socket still holds.
 */
export function setupSessionStreamHandlers(
  socket: TypedSocket,
  gateway: StreamingGateway
): () => void {
  const connection = new SocketIOClientConnection(socket);

  // sessionId → attachment, one per session per socket
  const attachments = new Map<string, Attachment>();

  const attach = (sessionId: string): AttachResponse => {
    if (attachments.has(sessionId)) {
      return { success: true };
    }

    try {
      logger.debug({ socketId: socket.id, sessionId }, 'Client attaching to session');

      const attachment = gateway.attach(sessionId, connection);
      attachments.set(sessionId, attachment);

      attachment.done.then(
        () => {
          if (attachments.get(sessionId) === attachment) {
            attachments.delete(sessionId);
          }
        },
        (error: unknown) => {
          logger.error({ error: getErrorMessage(error), socketId: socket.id, sessionId }, 'Attachment ended unexpectedly');
        }
      );

      return { success: true };
    } catch (error) {
      if (isSessionRuntimeError(error)) {
        logger.warn({ socketId: socket.id, sessionId, code: error.code }, 'Attach rejected');
        return { success: false, error: error.message, code: error.code };
      }

      logger.error({ error, socketId: socket.id, sessionId }, 'Failed to attach to session');
      return { success: false, error: getErrorMessage(error), code: 'INTERNAL_ERROR' };
    }
  };

  /**
   * Attach to a session's stream (backlog first, then live events)
   */
  socket.on('session:attach', (payload: unknown, callback: unknown) => {
    const ack = toAck<AttachResponse>(callback);
    const parsed = sessionIdSchema.safeParse(payload);

    if (!parsed.success) {
      logger.warn({ socketId: socket.id }, 'Attach rejected, invalid session id');
      ack({ success: false, error: 'Invalid session id', code: 'INVALID_REQUEST' });
      return;
    }

    ack(attach(parsed.data));
  });

  /**
   * Detach from a session's stream
   */
  socket.on('session:detach', (payload: unknown, callback: unknown) => {
    const ack = toAck<{ success: boolean }>(callback);
    const parsed = sessionIdSchema.safeParse(payload);

    if (parsed.success) {
      const attachment = attachments.get(parsed.data);
      attachments.delete(parsed.data);
      attachment?.detach();

      logger.debug(
        { socketId: socket.id, sessionId: parsed.data, wasAttached: attachment !== undefined },
        'Client detached from session'
      );
    }

    // Detach always succeeds
    ack({ success: true });
  });

  return () => {
    attachments.clear();
    const detached = gateway.detachConnection(connection.id);
    if (detached > 0) {
      logger.debug({ socketId: socket.id, detached }, 'Detached socket streams');
    }
  };
}
