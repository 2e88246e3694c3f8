/**
 * Socket.IO Client Connection - ClientConnection over one Socket.IO socket
 *
 * Items are sent as a single 'session:event' carrying the full stream item;
 * 'session:end' follows once the session's stream has drained.
 * One instance serves every session the socket attaches to.
 *
 * Backpressure: engine.io emits 'drain' each time its write buffer is handed
 * to the transport. Once more than `highWaterMark` sends are waiting for that,
 * send() resolves only on the next drain, so a slow client backs up its own
 * subscription queue instead of the engine's unbounded write buffer.
 */

import type { Socket } from 'socket.io';
import type { ClientConnection, StreamEndInfo } from '../../../core/host/client-connection.js';
import type {
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
  StreamItem,
} from '../../../types/events.js';
import { logger } from '../../../config/logger.js';

export type TypedSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export interface SocketIOClientConnectionOptions {
  /** Sends allowed to wait on the engine's write buffer before send() blocks */
  highWaterMark?: number;
}

const DEFAULT_HIGH_WATER_MARK = 64;

export class SocketIOClientConnection implements ClientConnection {
  private readonly socket: TypedSocket;
  private readonly highWaterMark: number;

  // Sends emitted since the engine last flushed its write buffer
  private unflushed = 0;

  constructor(socket: TypedSocket, options: SocketIOClientConnectionOptions = {}) {
    this.socket = socket;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    socket.conn.on('drain', () => {
      this.unflushed = 0;
    });
  }

  get id(): string {
    return this.socket.id;
  }

  async send(item: StreamItem): Promise<void> {
    if (!this.socket.connected) {
      throw new Error(`Socket ${this.socket.id} is disconnected`);
    }

    // Counted before emitting: a writable transport drains synchronously
    this.unflushed++;
    this.socket.emit('session:event', item);

    if (this.unflushed > this.highWaterMark) {
      await this.waitForDrain();
    }
  }

  end(info: StreamEndInfo): void {
    logger.debug({ socketId: this.socket.id, ...info }, 'Sending session:end');
    this.socket.emit('session:end', info);
  }

  private waitForDrain(): Promise<void> {
    const conn = this.socket.conn;
    logger.debug({ socketId: this.socket.id, unflushed: this.unflushed }, 'Waiting for socket to drain');

    return new Promise<void>((resolve, reject) => {
      const onDrain = () => {
        cleanup();
        resolve();
      };
      const onClose = () => {
        cleanup();
        reject(new Error(`Socket ${this.socket.id} closed before draining`));
      };
      const cleanup = () => {
        conn.off('drain', onDrain);
        conn.off('close', onClose);
      };

      conn.on('drain', onDrain);
      conn.on('close', onClose);
    });
  }
}
