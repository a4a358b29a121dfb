import { LRUCache } from "lru-cache";
import { BillSession, type BillSessionOptions } from "./billSession.js";

export interface SessionStoreOptions {
  maxSessions: number;
  /** Idle time before a session is dropped */
  ttlMs: number;
}

/**
 * In-memory session registry. Sessions live only as long as the process and
 * expire after `ttlMs` without access.
 */
export class SessionStore {
  private readonly sessions: LRUCache<string, BillSession>;

  constructor(
    private readonly sessionOptions: BillSessionOptions,
    options: SessionStoreOptions
  ) {
    this.sessions = new LRUCache<string, BillSession>({
      max: options.maxSessions,
      ttl: options.ttlMs,
      updateAgeOnGet: true,
    });
  }

  create(): BillSession {
    const session = new BillSession(crypto.randomUUID(), this.sessionOptions);
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): BillSession | undefined {
    return this.sessions.get(id);
  }

  /** Returns the existing session for `id`, or a fresh one. */
  getOrCreate(id: string | undefined): BillSession {
    return (id && this.sessions.get(id)) || this.create();
  }

  get size(): number {
    return this.sessions.size;
  }
}
