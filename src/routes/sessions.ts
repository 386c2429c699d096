import { Router } from 'express';

import type { SessionStore } from '../store/sessions';
import type { SessionCreated } from '../types';

export const createSessionsRouter = (sessions: SessionStore): Router => {
  const router = Router();

  router.post('/', (_req, res) => {
    const body: SessionCreated = { id: sessions.create().id };
    return res.status(201).json(body);
  });

  router.delete('/:id', (req, res) => {
    if (!sessions.end(req.params.id)) {
      return res.status(404).json({ error: 'Session not found' });
    }

    return res.status(204).end();
  });

  router.post('/:id/cache/clear', (req, res) => {
    if (!sessions.clearCache(req.params.id)) {
      return res.status(404).json({ error: 'Session not found' });
    }

    return res.json({ id: req.params.id, cleared: true });
  });

  return router;
};
