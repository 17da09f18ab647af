/**
 * Model Routes
 *
 * GET /models - Narrative providers in fallback order, with key presence
 * and circuit state. Keys themselves are never returned.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import type { EngineConfig } from '../lib/config-parser';
import { jsonSuccess } from '../lib/error-handler';
import { listConfiguredModels } from '../services/ai-sdk/model-provider';

export function createModelsRouter(getNarrativeConfig: () => EngineConfig['narrative']): Hono {
  const router = new Hono();

  router.get('/', (c: Context) => {
    const models = listConfiguredModels(getNarrativeConfig());
    return jsonSuccess(c, {
      models,
      available: models.some((model) => model.configured && model.circuit !== 'OPEN'),
    });
  });

  return router;
}
