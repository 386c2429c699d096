import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import type { PipelineOutcome } from '../pipeline/orchestrator';
import { createComponentLogger } from '../util/logger';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

export type JobRecord = {
  id: string;
  sessionId: string;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  result?: PipelineOutcome;
  error?: string;
};

const dataDir = path.resolve('.data');
const storePath = path.join(dataDir, 'jobs.json');

const jobsById = new Map<string, JobRecord>();

const log = createComponentLogger('jobs');

let loaded = false;

const ensureDataDir = (): void => {
  fs.mkdirSync(dataDir, { recursive: true });
};

const isJobRecord = (value: unknown): value is JobRecord =>
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  typeof value.id === 'string' &&
  'status' in value &&
  typeof value.status === 'string';

const loadStoreFromDisk = (): void => {
  if (loaded) {
    return;
  }
  loaded = true;

  if (!fs.existsSync(storePath)) {
    return;
  }

  try {
    const raw = fs.readFileSync(storePath, 'utf-8');
    if (!raw.trim()) {
      return;
    }

    const parsed: unknown = JSON.parse(raw);
    const entriesArray: unknown[] = Array.isArray(parsed)
      ? parsed
      : typeof parsed === 'object' && parsed !== null
        ? Object.values(parsed)
        : [];

    entriesArray.forEach((entry) => {
      if (isJobRecord(entry)) {
        jobsById.set(entry.id, entry);
      }
    });
  } catch (error) {
    log.error({ err: error, storePath }, 'Failed to load job store from disk.');
  }
};

const persistStore = (): void => {
  ensureDataDir();
  const payload = JSON.stringify(Array.from(jobsById.values()), null, 2);
  fs.writeFileSync(storePath, payload);
};

const persistSafely = (): void => {
  try {
    persistStore();
  } catch (error) {
    log.error({ err: error, storePath }, 'Failed to persist job store.');
  }
};

const isFinished = (job: JobRecord): boolean => job.status === 'completed' || job.status === 'failed';

/** Drops completed and failed jobs last updated more than `maxAgeSeconds` ago. */
export const pruneFinishedJobs = (maxAgeSeconds: number, now: number = Date.now()): number => {
  loadStoreFromDisk();

  if (maxAgeSeconds <= 0) {
    return 0;
  }

  let removed = 0;

  for (const job of Array.from(jobsById.values())) {
    if (isFinished(job) && now - Date.parse(job.updatedAt) > maxAgeSeconds * 1000) {
      jobsById.delete(job.id);
      removed += 1;
    }
  }

  return removed;
};

export const createJob = (sessionId: string, retentionSeconds = 0): JobRecord => {
  const removed = pruneFinishedJobs(retentionSeconds);
  if (removed > 0) {
    log.info({ removed }, 'Pruned finished jobs.');
  }

  const now = new Date().toISOString();
  const job: JobRecord = {
    id: uuidv4(),
    sessionId,
    status: 'queued',
    createdAt: now,
    updatedAt: now,
  };

  jobsById.set(job.id, job);
  persistSafely();

  return job;
};

export const updateJob = (id: string, patch: Partial<Omit<JobRecord, 'id' | 'createdAt'>>): JobRecord | undefined => {
  loadStoreFromDisk();

  const existing = jobsById.get(id);
  if (!existing) {
    return undefined;
  }

  const updated: JobRecord = {
    ...existing,
    ...patch,
    updatedAt: new Date().toISOString(),
  };

  jobsById.set(id, updated);
  persistSafely();

  return updated;
};

/** Records a pipeline outcome: delivered runs complete the job, errored runs fail it. */
export const completeJob = (id: string, outcome: PipelineOutcome): JobRecord | undefined =>
  outcome.status === 'delivered'
    ? updateJob(id, { status: 'completed', result: outcome })
    : updateJob(id, { status: 'failed', result: outcome, error: outcome.message });

export const getJob = (id: string): JobRecord | undefined => {
  loadStoreFromDisk();
  return jobsById.get(id);
};
