import { DEFAULT_TASK, TASK_LABELS, type TaskLabel, priorityOf } from './labels';

export type KeywordRule = {
  pattern: RegExp;
  weight: number;
};

export type ScoredTask = {
  task: TaskLabel;
  score: number;
};

const MAX_WEIGHT = 3;

// Interview indicators carry the top weight; ties resolve through TASK_PRIORITY.
export const KEYWORD_RULES: Record<TaskLabel, KeywordRule[]> = {
  interview: [
    { pattern: /\binterview\w*/, weight: 3 },
    { pattern: /\bquestions?\b/, weight: 3 },
    { pattern: /\bmock\b/, weight: 3 },
    { pattern: /\btechnical\b/, weight: 3 },
  ],
  job_fit: [
    { pattern: /\bfit\s+score\b/, weight: 3 },
    { pattern: /\bjob\s+fit\b/, weight: 3 },
    { pattern: /\bsuitab\w*/, weight: 2 },
    { pattern: /\bfit\b/, weight: 2 },
    { pattern: /\bscore\b/, weight: 2 },
    { pattern: /\bmatch\w*/, weight: 2 },
    { pattern: /\bqualif\w*/, weight: 1 },
  ],
  suggestions: [
    { pattern: /\bimprov\w*/, weight: 2 },
    { pattern: /\bsuggest\w*/, weight: 2 },
    { pattern: /\boptimi[sz]\w*/, weight: 2 },
    { pattern: /\benhanc\w*/, weight: 2 },
    { pattern: /\brewrite\b/, weight: 1 },
    { pattern: /\btips?\b/, weight: 1 },
  ],
  analysis: [
    { pattern: /\banaly[sz]\w*/, weight: 1 },
    { pattern: /\breview\w*/, weight: 1 },
    { pattern: /\bstrengths?\b/, weight: 1 },
    { pattern: /\bgaps?\b/, weight: 1 },
    { pattern: /\boverview\b/, weight: 1 },
  ],
};

const scoreTask = (query: string, rules: KeywordRule[]): number =>
  rules.reduce((best, rule) => (rule.pattern.test(query) ? Math.max(best, rule.weight) : best), 0);

export const compareScored = (left: ScoredTask, right: ScoredTask): number =>
  right.score - left.score || priorityOf(left.task) - priorityOf(right.task);

/**
 * Scores every label by its highest matching keyword weight, normalized to 0..1,
 * and returns them best first. A query with no match puts the default label first.
 */
export const rankByKeywords = (query: string): ScoredTask[] => {
  const normalized = query.toLowerCase();

  const ranked = TASK_LABELS.map<ScoredTask>((task) => ({
    task,
    score: scoreTask(normalized, KEYWORD_RULES[task]) / MAX_WEIGHT,
  })).sort(compareScored);

  if (ranked[0].score > 0) {
    return ranked;
  }

  return [
    ...ranked.filter((entry) => entry.task === DEFAULT_TASK),
    ...ranked.filter((entry) => entry.task !== DEFAULT_TASK),
  ];
};
