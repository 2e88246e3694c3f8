import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../../config/logger.js';
import type { SessionRegistry } from '../../core/host/session-registry.js';
import type { StreamingGateway } from '../../core/host/streaming-gateway.js';
import { errorResponse, errorResponseSchema, type ErrorResponseBody } from './errors.js';
import { createSessionRoutes } from './routes/sessions.js';
import { createArtifactRoutes } from './routes/artifacts.js';

export { errorResponse } from './errors.js';

const startedAt = Date.now();

function parseErrorBody(message: string): ErrorResponseBody {
  let parsed: unknown;
  try {
    // Message is JSON when it came from our errorResponse helper
    parsed = JSON.parse(message);
  } catch {
    return errorResponse(message);
  }

  const result = errorResponseSchema.safeParse(parsed);
  return result.success ? result.data : errorResponse(message);
}

export const createRestServer = ({
  registry,
  gateway,
  corsOrigin = '*',
}: {
  registry: SessionRegistry;
  gateway: StreamingGateway;
  corsOrigin?: string | string[];
}): Hono => {
  const app = new Hono()

  // Middleware
  .use('*', cors({ origin: corsOrigin }))
  .use('*', requestLogger((message, ...rest) => logger.info(rest.length > 0 ? `${message} ${rest.join(' ')}` : message)))

  // Global error handler
  .onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(parseErrorBody(err.message), err.status);
    }

    // Unexpected errors
    logger.error({ error: err.message, stack: err.stack, path: c.req.path }, 'Unexpected error');
    return c.json(errorResponse('Internal server error', 'INTERNAL_ERROR'), 500);
  })

  .get('/health', (c) => {
    const healthy = registry.isHealthy();
    return c.json(
      {
        status: healthy ? 'ok' : 'shutting_down',
        activeSessions: registry.getActiveCount(),
        totalSessions: registry.getSessionCount(),
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      },
      healthy ? 200 : 503
    );
  })

  .route('/api/sessions', createSessionRoutes(registry, gateway))
  .route('/api/artifacts', createArtifactRoutes(registry));

  return app;
};
