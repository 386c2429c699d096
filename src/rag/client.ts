import { ChromaClient } from 'chromadb';
import { OllamaEmbeddingFunction } from '@chroma-core/ollama';

import type { RoutingCorpus } from '../tasks/corpus';
import { type ScoredTask, compareScored } from '../tasks/keywords';
import { TASK_BLURBS, TASK_LABELS, isTaskLabel } from '../tasks/labels';
import type { TaskIndex } from './taskIndex';

type ChromaTaskIndexOptions = {
  chromaUrl: string;
  collectionName: string;
  ollamaUrl: string;
  ollamaModel: string;
};

type TaskCollection = Awaited<ReturnType<ChromaClient['getOrCreateCollection']>>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

export const normalizeScore = (distance: unknown): number => {
  if (typeof distance !== 'number' || Number.isNaN(distance)) {
    return 0;
  }

  return 1 / (1 + Math.max(distance, 0));
};

const toClientArgs = (chromaUrl: string): { host: string; port: number; ssl: boolean } => {
  const url = new URL(chromaUrl);
  const ssl = url.protocol === 'https:';
  const port = url.port ? Number.parseInt(url.port, 10) : ssl ? 443 : 8000;

  return { host: url.hostname, port, ssl };
};

/**
 * Task index backed by a Chroma collection seeded with the task blurbs.
 * The collection is shared by every session, so per-session query history is not indexed.
 */
export class ChromaTaskIndex implements TaskIndex {
  readonly name = 'chroma';

  private readonly client: ChromaClient;

  private collectionPromise: Promise<TaskCollection> | null = null;

  constructor(private readonly options: ChromaTaskIndexOptions) {
    this.client = new ChromaClient(toClientArgs(options.chromaUrl));
  }

  private buildEmbeddingFunction(): OllamaEmbeddingFunction {
    return new OllamaEmbeddingFunction({
      url: this.options.ollamaUrl,
      model: this.options.ollamaModel,
    });
  }

  private async seed(): Promise<TaskCollection> {
    const collection = await this.client.getOrCreateCollection({
      name: this.options.collectionName,
      embeddingFunction: this.buildEmbeddingFunction(),
    });

    await collection.upsert({
      ids: TASK_LABELS.map((task) => `task_${task}`),
      documents: TASK_LABELS.map((task) => TASK_BLURBS[task]),
      metadatas: TASK_LABELS.map((task) => ({ label: task })),
    });

    return collection;
  }

  private getCollection(): Promise<TaskCollection> {
    if (!this.collectionPromise) {
      this.collectionPromise = this.seed().catch((error: unknown) => {
        this.collectionPromise = null;
        throw error;
      });
    }

    return this.collectionPromise;
  }

  async rank(query: string, _corpus: RoutingCorpus): Promise<ScoredTask[]> {
    const collection = await this.getCollection();
    const result = await collection.query({
      queryTexts: [query],
      nResults: TASK_LABELS.length,
    });

    const metadatas: unknown[] = result.metadatas?.[0] ?? [];
    const distances: unknown[] = result.distances?.[0] ?? [];
    const ranked: ScoredTask[] = [];

    metadatas.forEach((metadata, index) => {
      const label = isPlainObject(metadata) ? metadata.label : undefined;
      if (isTaskLabel(label) && !ranked.some((entry) => entry.task === label)) {
        ranked.push({ task: label, score: normalizeScore(distances[index]) });
      }
    });

    return ranked.sort(compareScored);
  }
}
