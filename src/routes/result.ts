import { Router } from 'express';

import { getJob } from '../store/jobs';
import type { ResultResponse } from '../types';

export const createResultRouter = (): Router => {
  const router = Router();

  router.get('/:id', (req, res) => {
    const { id } = req.params;
    const job = getJob(id);

    if (!job) {
      return res.status(404).json({ error: 'Job not found' });
    }

    if ((job.status === 'completed' || job.status === 'failed') && job.result) {
      const body: ResultResponse = { id: job.id, status: job.status, result: job.result, error: job.error };
      return res.json(body);
    }

    if (job.status === 'failed') {
      return res.json({ id: job.id, status: job.status, error: job.error });
    }

    const body: ResultResponse = { id: job.id, status: job.status === 'processing' ? 'processing' : 'queued' };
    return res.json(body);
  });

  return router;
};
