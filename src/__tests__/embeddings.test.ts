import { afterEach, describe, expect, it, vi } from 'vitest';

import { OllamaEmbeddingBackend, buildEndpoint, normalizeEmbeddingVector } from '../rag/embeddings';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('OllamaEmbeddingBackend', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts each text to the embeddings endpoint', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    vi.stubGlobal('fetch', fetchMock);

    const backend = new OllamaEmbeddingBackend({ baseUrl: 'http://localhost:11434/', model: 'nomic-embed-text' });
    const vector = await backend.embed('senior python developer');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(fetchMock).toHaveBeenCalledWith('http://localhost:11434/api/embeddings', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: 'nomic-embed-text', prompt: 'senior python developer' }),
    });
  });

  it('does not retry client errors', async () => {
    const fetchMock = vi.fn(async () => new Response('model not found', { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    const backend = new OllamaEmbeddingBackend({ baseUrl: 'http://localhost:11434', model: 'missing' });

    await expect(backend.embed('text')).rejects.toThrow('Embedding request failed (status 404): model not found');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries server errors', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [1, 2] }));
    vi.stubGlobal('fetch', fetchMock);

    const backend = new OllamaEmbeddingBackend({ baseUrl: 'http://localhost:11434', model: 'm', initialDelayMs: 1 });

    await expect(backend.embed('text')).resolves.toEqual([1, 2]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('embedding helpers', () => {
  it('builds the endpoint from a base URL', () => {
    expect(buildEndpoint('http://ollama:11434/some/path?x=1')).toBe('http://ollama:11434/api/embeddings');
  });

  it('rejects invalid base URLs', () => {
    expect(() => buildEndpoint('not a url')).toThrow('Invalid embedding service URL "not a url"');
  });

  it('rejects empty or non-numeric vectors', () => {
    expect(() => normalizeEmbeddingVector([])).toThrow('Embedding response did not include an array of numbers.');
    expect(() => normalizeEmbeddingVector([1, 'x'])).toThrow('Embedding value at index 1 is not a valid number.');
  });
});
