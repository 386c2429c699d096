import { describeError } from '../errors';
import { createComponentLogger } from '../util/logger';
import { exponentialBackoff } from '../util/retry';

export interface EmbeddingBackend {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

type OllamaEmbeddingOptions = {
  baseUrl: string;
  model: string;
  batchSize?: number;
  maxAttempts?: number;
  initialDelayMs?: number;
};

type RequestError = Error & { status?: number; detail?: string };

const log = createComponentLogger('embeddings');

export const buildEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new Error(`Invalid embedding service URL "${baseUrl}": ${describeError(error)}`);
  }
};

const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

const getDetail = (error: unknown): string | undefined => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (error && typeof error === 'object' && 'detail' in error) {
    const { detail } = error;
    if (typeof detail === 'string') {
      return detail;
    }
  }

  return undefined;
};

export const normalizeEmbeddingVector = (values: unknown): number[] => {
  if (!Array.isArray(values) || values.length === 0) {
    throw new Error('Embedding response did not include an array of numbers.');
  }

  return values.map((value, index) => {
    const numeric = typeof value === 'number' ? value : Number(value);
    if (Number.isNaN(numeric)) {
      throw new Error(`Embedding value at index ${index} is not a valid number.`);
    }
    return numeric;
  });
};

/**
 * Embedding backend for an Ollama-compatible `/api/embeddings` endpoint.
 * Client errors (4xx other than 429) fail immediately; everything else is retried.
 */
export class OllamaEmbeddingBackend implements EmbeddingBackend {
  readonly model: string;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  private readonly initialDelayMs: number;

  private readonly endpoint: string;

  constructor({ baseUrl, model, batchSize = 16, maxAttempts = 3, initialDelayMs = 500 }: OllamaEmbeddingOptions) {
    this.model = model;
    this.batchSize = Math.max(1, batchSize);
    this.maxAttempts = Math.max(1, maxAttempts);
    this.initialDelayMs = initialDelayMs;
    this.endpoint = buildEndpoint(baseUrl);
  }

  private chunkTexts(texts: string[]): string[][] {
    const batches: string[][] = [];

    for (let index = 0; index < texts.length; index += this.batchSize) {
      batches.push(texts.slice(index, index + this.batchSize));
    }

    return batches;
  }

  private shouldRetry(error: unknown): boolean {
    const status = getStatus(error);

    if (typeof status === 'number' && status >= 400 && status < 500 && status !== 429) {
      return false;
    }

    return true;
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    log.warn(
      { status: getStatus(error), detail: getDetail(error) ?? 'Unknown error', attempt, delay },
      'Embedding request failed, retrying.',
    );
  }

  private buildEmbeddingError(error: unknown): Error {
    const status = getStatus(error);
    const detail = getDetail(error) ?? 'Unknown error';
    const message = typeof status === 'number'
      ? `Embedding request failed (status ${status}): ${detail}`
      : `Embedding request failed: ${detail}`;

    return new Error(message, { cause: error });
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];

    for (const text of batch) {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
      });

      if (!response.ok) {
        const detailText = await response.text();
        const error: RequestError = new Error(detailText || response.statusText);
        error.status = response.status;
        error.detail = detailText || response.statusText;
        throw error;
      }

      let data: unknown;

      try {
        data = await response.json();
      } catch (error) {
        throw new Error(`Failed to parse embedding response JSON: ${describeError(error)}`);
      }

      const embedding = data && typeof data === 'object' && 'embedding' in data ? data.embedding : undefined;

      embeddings.push(normalizeEmbeddingVector(embedding));
    }

    return embeddings;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings: number[][] = [];

    for (const batch of this.chunkTexts(texts)) {
      let batchEmbeddings: number[][];

      try {
        batchEmbeddings = await exponentialBackoff(
          () => this.requestBatch(batch),
          {
            label: 'embedding',
            maxAttempts: this.maxAttempts,
            initialDelayMs: this.initialDelayMs,
            onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
            shouldRetry: (error) => this.shouldRetry(error),
          },
        );
      } catch (error) {
        throw this.buildEmbeddingError(error);
      }

      embeddings.push(...batchEmbeddings);
    }

    return embeddings;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }
}
