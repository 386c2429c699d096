export const TASK_LABELS = ['analysis', 'interview', 'suggestions', 'job_fit'] as const;

export type TaskLabel = (typeof TASK_LABELS)[number];

export const DEFAULT_TASK: TaskLabel = 'analysis';

/** Tie-break order for keyword routing, highest priority first. */
export const TASK_PRIORITY: readonly TaskLabel[] = ['interview', 'job_fit', 'suggestions', 'analysis'];

// Embedding anchors for vector routing.
export const TASK_BLURBS: Record<TaskLabel, string> = {
  analysis: 'Comprehensive resume vs job description analysis with strengths, gaps, and recommendations',
  interview:
    'In-depth technical interview questions strictly derived from the candidate resume technologies and implementations',
  suggestions: 'Actionable resume improvement suggestions and optimization guidance',
  job_fit: 'Job fit scoring and suitability assessment with a quantified score and reasoning',
};

export const isTaskLabel = (value: unknown): value is TaskLabel =>
  TASK_LABELS.some((label) => label === value);

export const priorityOf = (task: TaskLabel): number => TASK_PRIORITY.indexOf(task);
