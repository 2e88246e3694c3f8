/**
 * Local Host - in-memory session registry with Socket.IO transport
 *
 * This is the default host for single-server deployments.
 * Sessions live in process memory and clients stream them over Socket.IO
 * (or SSE from the REST server).
 *
 * @example
 * ```typescript
 * const runtime = createSessionRuntime({ createWorker });
 * const httpServer = createServer(getRequestListener(runtime.createRestServer().fetch));
 * runtime.attachTransport(httpServer);
 * ```
 */

import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type { StreamingGateway } from '../../../core/host/streaming-gateway.js';
import type { TransportOptions } from '../../../types/runtime.js';
import type {
  ServerToClientEvents,
  ClientToServerEvents,
  InterServerEvents,
  SocketData,
} from '../../../types/events.js';
import { logger } from '../../../config/logger.js';
import { setupSessionStreamHandlers } from './connection-handlers.js';

/**
 * Socket.IO server type alias for convenience
 */
export type SocketIOServerInstance = SocketIOServer<
  ClientToServerEvents,
  ServerToClientEvents,
  InterServerEvents,
  SocketData
>;

/**
 * Attach the Socket.IO transport to an HTTP server
 *
 * @returns Socket.IO server instance
 */
export function attachLocalTransport(
  gateway: StreamingGateway,
  httpServer: HTTPServer,
  options?: TransportOptions
): SocketIOServerInstance {
  const io = new SocketIOServer<
    ClientToServerEvents,
    ServerToClientEvents,
    InterServerEvents,
    SocketData
  >(httpServer, {
    cors: options?.cors ?? { origin: '*' },
    path: options?.path ?? '/socket.io',
  });

  logger.info('Initializing Socket.IO transport...');

  io.on('connection', (socket) => {
    logger.info(
      {
        socketId: socket.id,
        transport: socket.conn.transport.name,
      },
      'Client connected to WebSocket'
    );

    // Store connection metadata
    socket.data.joinedAt = Date.now();

    const cleanup = setupSessionStreamHandlers(socket, gateway);

    socket.on('disconnect', (reason) => {
      logger.info({ socketId: socket.id, reason }, 'Client disconnected from WebSocket');
      cleanup();
    });
  });

  logger.info('Socket.IO transport initialized successfully');

  return io;
}

export { LocalSessionRegistry } from './local-session-registry.js';
export type { LocalSessionRegistryDeps } from './local-session-registry.js';
export { SocketIOClientConnection, type SocketIOClientConnectionOptions } from './socket-io-connection.js';
export { setupSessionStreamHandlers } from './connection-handlers.js';
