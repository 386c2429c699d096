const FIT_SCORE_RE = /job\s*fit\s*score\W{0,6}?(\d{1,3}(?:\.\d+)?)\s*(%|\/\s*(?:10|100)\b)?/i;

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

const toTwoDecimals = (value: number): number => Math.round(value * 100) / 100;

/**
 * Reads the "Job Fit Score: N" line of a job-fit report as a 0-100 number.
 * Scores written out of 10 are scaled. Returns null when no score is present.
 */
export const extractFitScore = (markdown: string): number | null => {
  const match = FIT_SCORE_RE.exec(markdown);

  if (!match) {
    return null;
  }

  const raw = Number.parseFloat(match[1]);
  if (!Number.isFinite(raw)) {
    return null;
  }

  const outOfTen = match[2] !== undefined && /\/\s*10$/.test(match[2]);

  return toTwoDecimals(clamp(outOfTen ? raw * 10 : raw, 0, 100));
};
