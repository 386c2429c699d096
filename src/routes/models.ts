import { Router } from 'express';

import type { AppServices } from '../services';
import { AVAILABLE_MODELS, MODEL_NAMES } from '../llm/models';
import type { ModelsResponse } from '../types';

export const createModelsRouter = ({ llm, config }: AppServices): Router => {
  const router = Router();

  router.get('/', (_req, res) => {
    const body: ModelsResponse = {
      default: config.llm.defaultModel,
      models: MODEL_NAMES.map((name) => ({
        name,
        provider: AVAILABLE_MODELS[name].provider,
        model: AVAILABLE_MODELS[name].model,
        available: llm.isConfigured(AVAILABLE_MODELS[name].provider),
      })),
    };

    return res.json(body);
  });

  return router;
};
