import { describe, expect, it } from 'vitest';

import { SessionStore } from '../store/sessions';

describe('SessionStore', () => {
  it('gives each session its own corpus and cache', () => {
    const store = new SessionStore({ ttlSeconds: 60 });

    const first = store.create();
    const second = store.create();

    expect(first.id).not.toBe(second.id);
    expect(first.corpus).not.toBe(second.corpus);
    expect(first.cache).not.toBe(second.cache);
  });

  it('expires sessions that sat idle past the TTL', () => {
    let now = 0;
    const store = new SessionStore({ ttlSeconds: 60, now: () => now });
    const session = store.create();

    now = 30_000;
    expect(store.get(session.id)).toBe(session);

    now = 85_000;
    expect(store.get(session.id)).toBe(session);

    now = 146_000;
    expect(store.get(session.id)).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('resolves unknown ids to a new session', () => {
    const store = new SessionStore({ ttlSeconds: 60 });
    const existing = store.create();

    expect(store.resolve(existing.id)).toBe(existing);
    expect(store.resolve('unknown').id).not.toBe(existing.id);
    expect(store.size).toBe(2);
  });

  it('ends a session and clears its state', () => {
    const store = new SessionStore({ ttlSeconds: 60, historyLimit: 5 });
    const session = store.create();
    session.corpus.recordQuery('question', 'analysis');

    expect(store.end(session.id)).toBe(true);
    expect(session.corpus.queryHistory()).toHaveLength(0);
    expect(store.get(session.id)).toBeUndefined();
    expect(store.end(session.id)).toBe(false);
  });

  it('clears the response cache on request', async () => {
    const store = new SessionStore({ ttlSeconds: 60 });
    const session = store.create();
    await session.cache.getOrCompute({ task: 'analysis', modelId: 'm' }, async () => 'text');

    expect(store.clearCache(session.id)).toBe(true);
    expect(session.cache.size).toBe(0);
    expect(store.clearCache('unknown')).toBe(false);
  });
});
