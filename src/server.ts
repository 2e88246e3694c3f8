/**
 * Server entry point
 *
 * Runs the session runtime with the scripted demo worker:
 * REST + SSE on /api, Socket.IO on /socket.io, health on /health.
 */

import { createServer } from 'http';
import { getRequestListener } from '@hono/node-server';
import { env, registryConfigFromEnv } from './config/env.js';
import { logger } from './config/logger.js';
import { getErrorMessage } from './core/errors.js';
import { InMemoryArtifactStore } from './lib/artifacts/artifact-store.js';
import { createScriptedWorkerFactory } from './lib/workers/scripted/index.js';
import { createSessionRuntime } from './runtime.js';

async function main(): Promise<void> {
  logger.level = env.LOG_LEVEL;

  const runtime = createSessionRuntime({
    createWorker: createScriptedWorkerFactory({ screenshotIntervalMs: env.SCREENSHOT_INTERVAL_MS }),
    registry: registryConfigFromEnv(env),
    artifacts: new InMemoryArtifactStore({ retentionMs: env.ARTIFACT_RETENTION_MS }),
    corsOrigin: env.CORS_ORIGIN,
  });

  await runtime.start();

  const app = runtime.createRestServer();
  const httpServer = createServer(getRequestListener(app.fetch));
  const io = runtime.attachTransport(httpServer);

  httpServer.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, maxConcurrentSessions: env.MAX_CONCURRENT_SESSIONS },
      `Session runtime listening on http://localhost:${env.PORT}`
    );
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Shutting down gracefully...');

    await runtime.shutdown();
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: getErrorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error: unknown) => {
  logger.fatal({ error: getErrorMessage(error) }, 'Failed to start server');
  process.exit(1);
});
