import { createHash } from 'node:crypto';

import type { TaskLabel } from '../tasks/labels';

export type CacheKey = {
  task: TaskLabel;
  modelId: string;
  /** Fingerprint of the inputs the answer is computed from; defaults to the bound inputs. */
  fingerprint?: string;
};

export type CacheEntry = {
  text: string;
  createdAt: number;
};

export type CacheLookup = {
  text: string;
  cached: boolean;
};

export const fingerprintInputs = (resume: string, jobDescription: string): string =>
  createHash('sha256').update(resume).update('\u0000').update(jobDescription).digest('hex');

/**
 * Per-session memo of generated analyses keyed by (task, model, inputs).
 * Only answers for the bound resume/job-description pair are kept; binding different inputs empties the cache.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();

  private readonly inFlight = new Map<string, Promise<string>>();

  private fingerprint: string | null = null;

  private generation = 0;

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  /** Returns true when the inputs differ from the bound ones (the cache is then cleared). */
  bindInputs(resume: string, jobDescription: string): boolean {
    const next = fingerprintInputs(resume, jobDescription);

    if (next === this.fingerprint) {
      return false;
    }

    this.fingerprint = next;
    this.clear();

    return true;
  }

  private keyOf({ task, modelId, fingerprint }: CacheKey): string {
    return `${task}::${modelId}::${fingerprint ?? this.fingerprint ?? ''}`;
  }

  private isBound(key: CacheKey): boolean {
    return key.fingerprint === undefined || key.fingerprint === this.fingerprint;
  }

  get(key: CacheKey): CacheEntry | undefined {
    return this.entries.get(this.keyOf(key));
  }

  has(key: CacheKey): boolean {
    return this.entries.has(this.keyOf(key));
  }

  async getOrCompute(key: CacheKey, compute: () => Promise<string>): Promise<CacheLookup> {
    const id = this.keyOf(key);
    const hit = this.entries.get(id);

    if (hit) {
      return { text: hit.text, cached: true };
    }

    const pending = this.inFlight.get(id);
    if (pending) {
      return { text: await pending, cached: true };
    }

    const generation = this.generation;
    const promise = compute();
    this.inFlight.set(id, promise);

    try {
      const text = await promise;

      // Results computed against inputs that are no longer bound are returned but not stored.
      if (text && generation === this.generation && this.isBound(key)) {
        this.entries.set(id, { text, createdAt: this.now() });
      }

      return { text, cached: false };
    } finally {
      if (this.inFlight.get(id) === promise) {
        this.inFlight.delete(id);
      }
    }
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.generation += 1;
  }
}
