import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createJob, getJob, pruneFinishedJobs, updateJob } from '../store/jobs';

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  const stubbed = {
    ...actual,
    existsSync: vi.fn(() => false),
    mkdirSync: vi.fn(),
    writeFileSync: vi.fn(),
  };
  return { ...stubbed, default: stubbed };
});

const TWO_HOURS_SECONDS = 7200;

describe('job store', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('drops finished jobs older than the retention when a job is created', () => {
    const finished = createJob('session-a');
    updateJob(finished.id, { status: 'failed', error: 'The model could not produce an answer.' });
    const running = createJob('session-a');
    updateJob(running.id, { status: 'processing' });

    vi.setSystemTime(new Date('2026-01-01T02:00:01.000Z'));
    const next = createJob('session-b', TWO_HOURS_SECONDS);

    expect(getJob(finished.id)).toBeUndefined();
    expect(getJob(running.id)?.status).toBe('processing');
    expect(getJob(next.id)?.status).toBe('queued');
  });

  it('keeps finished jobs inside the retention window', () => {
    const job = createJob('session-c');
    updateJob(job.id, { status: 'failed', error: 'x' });

    const removed = pruneFinishedJobs(TWO_HOURS_SECONDS, Date.parse('2026-01-01T01:59:59.000Z'));

    expect(removed).toBe(0);
    expect(getJob(job.id)?.status).toBe('failed');
  });

  it('never prunes when retention is disabled', () => {
    const job = createJob('session-d');
    updateJob(job.id, { status: 'failed', error: 'x' });

    expect(pruneFinishedJobs(0, Date.parse('2030-01-01T00:00:00.000Z'))).toBe(0);
    expect(getJob(job.id)).toBeDefined();
  });
});
