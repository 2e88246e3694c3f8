import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { SessionRegistry } from '../../../core/host/session-registry.js';
import { errorResponse } from '../errors.js';

export function createArtifactRoutes(registry: SessionRegistry): Hono {
  const app = new Hono()

  /**
   * GET /api/artifacts/:ref
   * Raw screenshot bytes referenced by a screenshot event
   */
  .get('/:ref', (c) => {
    const ref = c.req.param('ref');
    const artifact = registry.getArtifact(ref);

    if (!artifact) {
      throw new HTTPException(404, {
        message: JSON.stringify(errorResponse('Artifact not found', 'ARTIFACT_NOT_FOUND', { ref })),
      });
    }

    const body = new ArrayBuffer(artifact.data.byteLength);
    new Uint8Array(body).set(artifact.data);

    return c.body(body, 200, {
      'Content-Type': artifact.mimeType,
      'Cache-Control': 'private, max-age=86400, immutable',
    });
  });

  return app;
}
