/**
 * Chat Routes
 *
 * POST /chat - One agent turn. Body: `{ input, mode?, sessionId? }`.
 * POST /supervisor - Plain chat without tools or a caller session. Body: `{ input }`.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { handleApiError, jsonSuccess } from '../lib/error-handler';
import type { AgentLoop } from '../services/ai-sdk/agent-loop';
import { ChatRequestSchema, readJsonBody, SupervisorRequestSchema } from './schemas';

export function createChatRouter(agent: Pick<AgentLoop, 'run'>): Hono {
  const router = new Hono();

  router.post('/', async (c: Context) => {
    try {
      const request = await readJsonBody(c, ChatRequestSchema);
      const response = await agent.run(request);
      return jsonSuccess(c, { ...response });
    } catch (error) {
      return handleApiError(c, error, 'Chat');
    }
  });

  return router;
}

export function createSupervisorRouter(agent: Pick<AgentLoop, 'run'>): Hono {
  const router = new Hono();

  router.post('/', async (c: Context) => {
    try {
      const { input } = await readJsonBody(c, SupervisorRequestSchema);
      const response = await agent.run({ input, mode: 'chat', sessionId: null });
      return jsonSuccess(c, { intent: 'chat', text: response.text, used_model: response.used_model });
    } catch (error) {
      return handleApiError(c, error, 'Supervisor');
    }
  });

  return router;
}
