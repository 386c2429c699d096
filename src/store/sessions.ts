import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';

import { RoutingCorpus } from '../tasks/corpus';
import { createSessionLogger } from '../util/logger';
import { ResponseCache } from './responseCache';

export type Session = {
  id: string;
  corpus: RoutingCorpus;
  cache: ResponseCache;
  logger: Logger;
  createdAt: number;
  lastSeenAt: number;
};

type SessionStoreOptions = {
  ttlSeconds: number;
  historyLimit?: number;
  now?: () => number;
};

/**
 * In-memory session registry. Each session owns its routing corpus and response cache;
 * sessions idle for longer than the TTL are dropped on the next access.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  private readonly ttlMs: number;

  private readonly historyLimit: number | undefined;

  private readonly now: () => number;

  constructor({ ttlSeconds, historyLimit, now = Date.now }: SessionStoreOptions) {
    this.ttlMs = ttlSeconds * 1000;
    this.historyLimit = historyLimit;
    this.now = now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): Session {
    this.pruneExpired();

    const id = uuidv4();
    const at = this.now();
    const session: Session = {
      id,
      corpus: new RoutingCorpus({ historyLimit: this.historyLimit }),
      cache: new ResponseCache(this.now),
      logger: createSessionLogger(id),
      createdAt: at,
      lastSeenAt: at,
    };

    this.sessions.set(id, session);
    session.logger.info('Session started.');

    return session;
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);

    if (!session) {
      return undefined;
    }

    if (this.isExpired(session)) {
      this.end(id);
      return undefined;
    }

    session.lastSeenAt = this.now();
    return session;
  }

  /** Returns the session for `id`, or a fresh one when the id is missing or unknown. */
  resolve(id?: string): Session {
    return (id ? this.get(id) : undefined) ?? this.create();
  }

  end(id: string): boolean {
    const session = this.sessions.get(id);

    if (!session) {
      return false;
    }

    session.cache.clear();
    session.corpus.reset();
    this.sessions.delete(id);
    session.logger.info('Session ended.');

    return true;
  }

  clearCache(id: string): boolean {
    const session = this.get(id);

    if (!session) {
      return false;
    }

    session.cache.clear();
    session.logger.info('Response cache cleared.');

    return true;
  }

  pruneExpired(): number {
    let removed = 0;

    for (const session of Array.from(this.sessions.values())) {
      if (this.isExpired(session)) {
        this.end(session.id);
        removed += 1;
      }
    }

    return removed;
  }

  private isExpired(session: Session): boolean {
    return this.ttlMs > 0 && this.now() - session.lastSeenAt > this.ttlMs;
  }
}
