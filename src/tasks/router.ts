import type { TaskIndex } from '../rag/taskIndex';
import { RoutingBackendUnavailable, describeError } from '../errors';
import { createComponentLogger } from '../util/logger';
import type { RoutingCorpus } from './corpus';
import { type ScoredTask, rankByKeywords } from './keywords';
import { DEFAULT_TASK, type TaskLabel, isTaskLabel } from './labels';

export type RoutingProvenance = 'vector' | 'keyword_fallback';

export type RoutingResult = {
  task: TaskLabel;
  score: number;
  alternatives: ScoredTask[];
  provenance: RoutingProvenance;
};

type TaskRouterOptions = {
  topK?: number;
};

const log = createComponentLogger('router');

const roundScore = (score: number): number => Math.round(score * 1000) / 1000;

export class TaskRouter {
  private readonly topK: number;

  /**
   * @param index vector index for the primary path; `null` when the backend could not be built.
   */
  constructor(private readonly index: TaskIndex | null, { topK = 3 }: TaskRouterOptions = {}) {
    this.topK = Math.max(0, topK);
  }

  get backend(): string {
    return this.index?.name ?? 'keyword';
  }

  private toResult(ranked: ScoredTask[], provenance: RoutingProvenance): RoutingResult {
    const [best, ...rest] = ranked;

    return {
      task: best.task,
      score: roundScore(best.score),
      alternatives: rest.slice(0, this.topK).map((entry) => ({ task: entry.task, score: roundScore(entry.score) })),
      provenance,
    };
  }

  private async rankWithIndex(index: TaskIndex, query: string, corpus: RoutingCorpus): Promise<ScoredTask[]> {
    let ranked: ScoredTask[];

    try {
      ranked = await index.rank(query, corpus);
    } catch (error) {
      throw new RoutingBackendUnavailable(`Task index "${index.name}" failed: ${describeError(error)}`, { cause: error });
    }

    const valid = ranked.filter((entry) => isTaskLabel(entry.task) && Number.isFinite(entry.score));

    if (!valid.length) {
      throw new RoutingBackendUnavailable(`Task index "${index.name}" returned no usable labels.`);
    }

    return valid;
  }

  /**
   * Maps a free-form query to a task label. Never throws: any index failure
   * falls back to keyword matching, and an empty query routes to the default label.
   */
  async route(query: string, corpus: RoutingCorpus): Promise<RoutingResult> {
    const trimmed = query.trim();

    if (!trimmed) {
      return { task: DEFAULT_TASK, score: 0, alternatives: [], provenance: 'keyword_fallback' };
    }

    let result: RoutingResult | undefined;

    if (this.index) {
      try {
        result = this.toResult(await this.rankWithIndex(this.index, trimmed, corpus), 'vector');
      } catch (error) {
        log.warn({ err: error, backend: this.index.name }, 'Vector routing unavailable, using keyword fallback.');
      }
    }

    if (!result) {
      result = this.toResult(rankByKeywords(trimmed), 'keyword_fallback');
    }

    corpus.recordQuery(trimmed, result.task);
    log.debug({ task: result.task, score: result.score, provenance: result.provenance }, 'Query routed.');

    return result;
  }
}
