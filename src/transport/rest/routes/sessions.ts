import { randomUUID } from 'crypto';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { logger } from '../../../config/logger.js';
import { getErrorMessage } from '../../../core/errors.js';
import type { ClientConnection } from '../../../core/host/client-connection.js';
import type { SessionRegistry } from '../../../core/host/session-registry.js';
import type { StreamingGateway } from '../../../core/host/streaming-gateway.js';
import { errorResponse, toHttpException } from '../errors.js';

const createSessionSchema = z.object({
  task: z.string().trim().min(1, 'Task is required'),
});

export function createSessionRoutes(
  registry: SessionRegistry,
  gateway: StreamingGateway
): Hono {
  const app = new Hono()

  /**
   * POST /api/sessions
   * Admit a new session in `created`
   */
  .post(
    '/',
    zValidator('json', createSessionSchema, (result) => {
      if (!result.success) {
        throw new HTTPException(400, {
          message: JSON.stringify(
            errorResponse(
              result.error.issues[0]?.message ?? 'Invalid request body',
              'INVALID_REQUEST',
              { issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) }
            )
          ),
        });
      }
    }),
    (c) => {
      const { task } = c.req.valid('json');

      try {
        const view = registry.create(task);
        return c.json(
          {
            sessionId: view.sessionId,
            state: view.state,
            createdAt: view.createdAt,
          },
          201
        );
      } catch (error) {
        throw toHttpException(error, 'Failed to create session');
      }
    }
  )

  /**
   * GET /api/sessions
   * List all sessions in creation order
   */
  .get('/', (c) => {
    const sessions = [...registry.list()];
    return c.json({ sessions, total: sessions.length });
  })

  /**
   * GET /api/sessions/:id
   */
  .get('/:id', (c) => {
    try {
      return c.json(registry.get(c.req.param('id')));
    } catch (error) {
      throw toHttpException(error, 'Failed to get session');
    }
  })

  /**
   * POST /api/sessions/:id/start
   * Spawn the worker; returns without waiting on it
   */
  .post('/:id/start', (c) => {
    try {
      return c.json(registry.start(c.req.param('id')));
    } catch (error) {
      throw toHttpException(error, 'Failed to start session');
    }
  })

  /**
   * POST /api/sessions/:id/cancel
   * Resolves once the worker acknowledged or the grace period forced it
   */
  .post('/:id/cancel', async (c) => {
    try {
      const view = await registry.cancel(c.req.param('id'));
      return c.json(view);
    } catch (error) {
      throw toHttpException(error, 'Failed to cancel session');
    }
  })

  /**
   * DELETE /api/sessions/:id
   * Stop if still active, then forget the session
   */
  .delete('/:id', async (c) => {
    const sessionId = c.req.param('id');

    try {
      await registry.remove(sessionId);
      return c.json({ success: true, sessionId });
    } catch (error) {
      throw toHttpException(error, 'Failed to delete session');
    }
  })

  /**
   * GET /api/sessions/:id/events
   * Server-sent events: backlog then live items, `id` = seq, `event` = type
   */
  .get('/:id/events', (c) => {
    const sessionId = c.req.param('id');

    try {
      registry.get(sessionId);
    } catch (error) {
      throw toHttpException(error);
    }

    return streamSSE(
      c,
      async (stream) => {
        const connection: ClientConnection = {
          id: `sse:${randomUUID()}`,
          send: (item) =>
            stream.writeSSE({ id: String(item.seq), event: item.type, data: JSON.stringify(item) }),
          end: (info) => stream.writeSSE({ event: 'end', data: JSON.stringify(info) }),
        };

        const attachment = gateway.attach(sessionId, connection);
        stream.onAbort(() => {
          attachment.detach();
        });

        await attachment.done;
      },
      async (error, stream) => {
        logger.warn({ error: getErrorMessage(error), sessionId }, 'SSE stream failed');
        await stream.writeSSE({
          event: 'error',
          data: JSON.stringify(errorResponse(getErrorMessage(error))),
        });
      }
    );
  });

  return app;
}
