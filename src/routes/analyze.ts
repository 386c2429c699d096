import fs from 'node:fs/promises';
import { Router } from 'express';
import { z } from 'zod';

import { STAGE_MESSAGES } from '../errors';
import type { PipelineRequest } from '../pipeline/orchestrator';
import type { AppServices } from '../services';
import { getFileById } from '../store/files';
import { completeJob, createJob, updateJob } from '../store/jobs';
import type { Session } from '../store/sessions';
import type { AnalyzeQueued } from '../types';

const analyzeSchema = z
  .object({
    session_id: z.string().min(1).optional(),
    resume_file_id: z.string().min(1).optional(),
    resume_text: z.string().optional(),
    job_description: z.string().trim().min(1, 'job_description is required'),
    query: z.string().max(2000, 'query is too long').default(''),
    model: z.string().min(1).optional(),
    voice: z.boolean().default(true),
    narration_style: z.enum(['plain', 'script']).default('plain'),
    user_name: z.string().trim().max(60, 'user_name is too long').optional(),
  })
  .refine((body) => Boolean(body.resume_file_id) || Boolean(body.resume_text?.trim()), {
    message: 'resume_file_id or resume_text is required',
    path: ['resume_file_id'],
  });

type AnalyzePayload = z.infer<typeof analyzeSchema>;

export const createAnalyzeRouter = ({ sessions, orchestrator, config }: AppServices): Router => {
  const router = Router();

  const toPipelineRequest = async (payload: AnalyzePayload, resumePath?: string): Promise<PipelineRequest> => ({
    resumeFile: resumePath ? await fs.readFile(resumePath) : undefined,
    resumeText: payload.resume_text,
    jobDescription: payload.job_description,
    query: payload.query,
    modelId: payload.model ?? config.llm.defaultModel,
    voice: payload.voice,
    narrationStyle: payload.narration_style,
    userName: payload.user_name || undefined,
  });

  const enqueueJob = (jobId: string, session: Session, payload: AnalyzePayload, resumePath?: string): void => {
    setImmediate(() => {
      updateJob(jobId, { status: 'processing' });

      toPipelineRequest(payload, resumePath)
        .then((request) => orchestrator.run(session, request))
        .then((outcome) => {
          completeJob(jobId, outcome);
        })
        .catch((error: unknown) => {
          session.logger.error({ err: error, jobId }, 'Analysis job failed before the pipeline ran.');
          updateJob(jobId, { status: 'failed', error: STAGE_MESSAGES.ingest });
        });
    });
  };

  router.post('/', (req, res) => {
    const validation = analyzeSchema.safeParse(req.body);

    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => ({
        path: issue.path.join('.') || undefined,
        message: issue.message,
      }));

      return res.status(400).json({ errors: issues });
    }

    const payload = validation.data;
    const resumeFile = payload.resume_file_id ? getFileById(payload.resume_file_id) : undefined;

    if (payload.resume_file_id && !resumeFile) {
      return res.status(404).json({ error: 'Resume file not found' });
    }

    const session = sessions.resolve(payload.session_id);
    const job = createJob(session.id, config.sessionTtlSeconds);

    enqueueJob(job.id, session, payload, resumeFile?.path);

    const body: AnalyzeQueued = { id: job.id, session_id: session.id, status: 'queued' };
    return res.status(202).json(body);
  });

  return router;
};
