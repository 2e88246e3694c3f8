/**
 * Runtime factory - creates and wires the session runtime
 *
 * This is the main entry point for applications embedding the runtime.
 *
 * @example
 * ```typescript
 * import { createServer } from 'http';
 * import { getRequestListener } from '@hono/node-server';
 * import { createSessionRuntime, createScriptedWorkerFactory } from 'session-stream-runtime';
 *
 * const runtime = createSessionRuntime({
 *   createWorker: createScriptedWorkerFactory(),
 *   registry: { maxConcurrentSessions: 4 },
 * });
 *
 * await runtime.start();
 *
 * const app = runtime.createRestServer();
 * const httpServer = createServer(getRequestListener(app.fetch));
 * runtime.attachTransport(httpServer);
 * httpServer.listen(3003);
 * ```
 */

import type { Server as HTTPServer } from 'http';
import type { Hono } from 'hono';
import { logger } from './config/logger.js';
import type { SessionRegistry } from './core/host/session-registry.js';
import { StreamingGateway } from './core/host/streaming-gateway.js';
import { InMemoryArtifactStore, type ArtifactStore } from './lib/artifacts/artifact-store.js';
import {
  LocalSessionRegistry,
  attachLocalTransport,
  type SocketIOServerInstance,
} from './lib/hosts/local/index.js';
import { createRestServer } from './transport/rest/server.js';
import type { RuntimeConfig } from './types/runtime.js';

/**
 * Session runtime instance returned by createSessionRuntime
 */
export type SessionRuntime = {
  /** The session registry instance */
  registry: SessionRegistry;

  /** Relays session streams to client connections */
  gateway: StreamingGateway;

  /** Screenshot storage shared by all sessions */
  artifacts: ArtifactStore;

  /** Create a Hono REST API server */
  createRestServer: () => Hono;

  /**
   * Attach the Socket.IO transport to an HTTP server.
   * Returns the Socket.IO server instance.
   */
  attachTransport: (httpServer: HTTPServer) => SocketIOServerInstance;

  /** Start background timeout enforcement and sweeping */
  start: () => Promise<void>;

  /** Cancel active sessions and stop background work */
  shutdown: () => Promise<void>;

  /** Check if the runtime is healthy */
  isHealthy: () => boolean;
};

/**
 * Create the session runtime
 */
export function createSessionRuntime(config: RuntimeConfig): SessionRuntime {
  logger.info('Creating session runtime...');

  const now = config.now ?? Date.now;
  const artifacts = config.artifacts ?? new InMemoryArtifactStore({ now });
  const registry = new LocalSessionRegistry({
    createWorker: config.createWorker,
    config: config.registry,
    artifacts,
    now,
  });
  const gateway = new StreamingGateway(registry);
  const corsOrigin = config.corsOrigin ?? '*';

  const transports: SocketIOServerInstance[] = [];

  const runtime: SessionRuntime = {
    registry,
    gateway,
    artifacts,

    createRestServer() {
      const restServer = createRestServer({ registry, gateway, corsOrigin });
      logger.info('REST server created');
      return restServer;
    },

    attachTransport(httpServer: HTTPServer) {
      const io = attachLocalTransport(gateway, httpServer, {
        cors: config.transport?.cors ?? { origin: corsOrigin },
        path: config.transport?.path,
      });
      transports.push(io);
      return io;
    },

    async start(): Promise<void> {
      logger.info('Starting session runtime...');
      registry.initialize();
      logger.info('Session runtime started successfully');
    },

    async shutdown(): Promise<void> {
      logger.info('Shutting down session runtime...');

      await registry.shutdown();
      gateway.detachAll();

      // The HTTP server itself belongs to the caller
      for (const io of transports.splice(0)) {
        io.disconnectSockets(true);
      }

      logger.info('Session runtime shutdown complete');
    },

    isHealthy(): boolean {
      return registry.isHealthy();
    },
  };

  logger.info('Session runtime created successfully');

  return runtime;
}

export type { RuntimeConfig } from './types/runtime.js';
