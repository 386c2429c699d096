import type { RoutingCorpus } from '../tasks/corpus';
import { type ScoredTask, compareScored } from '../tasks/keywords';
import { TASK_BLURBS, TASK_LABELS, type TaskLabel, isTaskLabel } from '../tasks/labels';
import type { EmbeddingBackend } from './embeddings';

export interface TaskIndex {
  readonly name: string;
  /** Scores for every task label, best first. */
  rank(query: string, corpus: RoutingCorpus): Promise<ScoredTask[]>;
}

export const HISTORY_WEIGHT = 0.9;

const MAX_CACHED_EMBEDDINGS = 512;

const TASK_DOCUMENT_PREFIX = 'task:';

type Anchor = {
  task: TaskLabel;
  text: string;
  weight: number;
};

/** `task:<label>` documents of the corpus; the resume and job description are not anchors. */
const taskAnchors = (corpus: RoutingCorpus): Anchor[] =>
  Array.from(corpus.documents()).flatMap(([id, text]) => {
    const task = id.startsWith(TASK_DOCUMENT_PREFIX) ? id.slice(TASK_DOCUMENT_PREFIX.length) : null;
    return isTaskLabel(task) ? [{ task, text, weight: 1 }] : [];
  });

export const cosineSimilarity = (left: number[], right: number[]): number => {
  if (left.length !== right.length || left.length === 0) {
    throw new Error(`Cannot compare vectors of length ${left.length} and ${right.length}.`);
  }

  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < left.length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] ** 2;
    rightNorm += right[index] ** 2;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
};

/**
 * In-process vector index: cosine similarity between the query and each task document of the corpus,
 * with previously routed queries acting as extra (down-weighted) anchors for their label.
 */
export class EmbeddingTaskIndex implements TaskIndex {
  readonly name = 'embedding';

  private readonly vectors = new Map<string, number[]>();

  constructor(private readonly backend: EmbeddingBackend) {}

  private async vectorsFor(texts: string[]): Promise<Map<string, number[]>> {
    const missing = Array.from(new Set(texts.filter((text) => !this.vectors.has(text))));

    if (missing.length) {
      const embedded = await this.backend.embedMany(missing);

      if (embedded.length !== missing.length) {
        throw new Error(`Embedding backend returned ${embedded.length} vectors for ${missing.length} texts.`);
      }

      missing.forEach((text, index) => this.remember(text, embedded[index]));
    }

    const result = new Map<string, number[]>();
    texts.forEach((text) => {
      const vector = this.vectors.get(text);
      if (vector) {
        result.set(text, vector);
      }
    });

    return result;
  }

  private remember(text: string, vector: number[]): void {
    const isBlurb = TASK_LABELS.some((task) => TASK_BLURBS[task] === text);

    if (!isBlurb && this.vectors.size >= MAX_CACHED_EMBEDDINGS) {
      const evictable = Array.from(this.vectors.keys()).find(
        (key) => !TASK_LABELS.some((task) => TASK_BLURBS[task] === key),
      );
      if (evictable !== undefined) {
        this.vectors.delete(evictable);
      }
    }

    this.vectors.set(text, vector);
  }

  async rank(query: string, corpus: RoutingCorpus): Promise<ScoredTask[]> {
    const anchors: Anchor[] = [
      ...taskAnchors(corpus),
      ...corpus.queryHistory().map((entry) => ({ task: entry.task, text: entry.query, weight: HISTORY_WEIGHT })),
    ];
    const vectors = await this.vectorsFor([query, ...anchors.map((anchor) => anchor.text)]);

    const queryVector = vectors.get(query);
    if (!queryVector) {
      throw new Error('Query embedding missing from backend response.');
    }

    const scores = new Map<TaskLabel, number>();

    anchors.forEach(({ task, text, weight }) => {
      const vector = vectors.get(text);
      if (!vector) {
        return;
      }
      const score = weight * cosineSimilarity(queryVector, vector);
      if (score > (scores.get(task) ?? Number.NEGATIVE_INFINITY)) {
        scores.set(task, score);
      }
    });

    return Array.from(scores, ([task, score]): ScoredTask => ({ task, score })).sort(compareScored);
  }
}
