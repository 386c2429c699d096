import { TASK_BLURBS, TASK_LABELS, type TaskLabel } from './labels';

export type HistoryEntry = {
  query: string;
  task: TaskLabel;
  at: number;
};

export const DEFAULT_HISTORY_LIMIT = 50;

export class RoutingCorpus {
  private resumeText = '';

  private jobDescriptionText = '';

  private history: HistoryEntry[] = [];

  private readonly historyLimit: number;

  constructor({ historyLimit = DEFAULT_HISTORY_LIMIT }: { historyLimit?: number } = {}) {
    this.historyLimit = Math.max(0, historyLimit);
  }

  get resume(): string {
    return this.resumeText;
  }

  get jobDescription(): string {
    return this.jobDescriptionText;
  }

  ingest({ resume, jobDescription }: { resume?: string; jobDescription?: string }): void {
    if (resume !== undefined) {
      this.resumeText = resume;
    }

    if (jobDescription !== undefined) {
      this.jobDescriptionText = jobDescription;
    }
  }

  recordQuery(query: string, task: TaskLabel, at: number = Date.now()): void {
    if (this.historyLimit === 0) {
      return;
    }

    this.history.push({ query, task, at });

    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }

  queryHistory(): readonly HistoryEntry[] {
    return this.history;
  }

  /**
   * Snapshot of every routing document keyed by identifier:
   * `task:<label>`, `resume`, `job_description` and `query:<n>`.
   */
  documents(): Map<string, string> {
    const docs = new Map<string, string>();

    TASK_LABELS.forEach((task) => docs.set(`task:${task}`, TASK_BLURBS[task]));

    if (this.resumeText) {
      docs.set('resume', this.resumeText);
    }

    if (this.jobDescriptionText) {
      docs.set('job_description', this.jobDescriptionText);
    }

    this.history.forEach((entry, index) => docs.set(`query:${index}`, entry.query));

    return docs;
  }

  reset(): void {
    this.resumeText = '';
    this.jobDescriptionText = '';
    this.history = [];
  }
}
