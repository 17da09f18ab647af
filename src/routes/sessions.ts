import { Hono } from 'hono';
import { handleApiError, jsonSuccessData } from '../lib/error-handler';
import { NotFoundError } from '../lib/errors';
import type { SessionStore } from '../services/session/session-store';

export function createSessionsRouter(sessions: SessionStore): Hono {
  const router = new Hono();

  /**
   * GET /sessions/:id - Conversation turns of a live session
   */
  router.get('/:id', async (c) => {
    try {
      const session = await sessions.get(c.req.param('id'));
      if (!session) {
        throw new NotFoundError('Session');
      }
      return jsonSuccessData(c, {
        id: session.id,
        turns: session.turns,
        created_at: session.created_at,
        updated_at: session.updated_at,
      });
    } catch (error) {
      return handleApiError(c, error, 'Sessions');
    }
  });

  return router;
}
