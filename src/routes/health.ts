import { Router } from 'express';

import type { AppServices } from '../services';

/** Diagnostics for the voice stack; mounted only when VOICE_DEBUG is on. */
export const createHealthRouter = ({ synthesizer, router: taskRouter, sessions }: AppServices): Router => {
  const router = Router();

  router.get('/voice', (_req, res) => {
    res.json({
      ...synthesizer.report(),
      routerBackend: taskRouter.backend,
      activeSessions: sessions.size,
    });
  });

  return router;
};
