import type { ConversationTurn } from '../types';
import type { SessionConfig } from '../config';
import { KeyedMutex } from '../utils/concurrency';
import { debugLogger } from '../utils/debug-logger';

const MAX_CONTENT_LENGTH = 4000;

export interface SessionMemory {
  sessionId: string;
  turns: ConversationTurn[];
  createdAt: Date;
  lastAccessedAt: Date;
}

export interface SessionSummary {
  sessionId: string;
  turnCount: number;
  lastQuestion: string | null;
  createdAt: Date;
  lastAccessedAt: Date;
}

const DEFAULT_LIMITS: SessionConfig = {
  maxSessions: 1000,
  maxTurnsPerSession: 20,
  sessionTtlMs: 24 * 60 * 60 * 1000,
};

function snapshot(session: SessionMemory): SessionMemory {
  return { ...session, turns: session.turns.map(turn => ({ ...turn })) };
}

/**
 * In-process conversation memory keyed by session id.
 *
 * Map insertion order doubles as recency order: every access moves the
 * session to the end, so the first entry is always the least recently used.
 * Sessions past the idle TTL or beyond `maxSessions` are evicted unless they
 * currently hold (or wait for) their lock.
 */
export class SessionMemoryStore {
  private readonly sessions = new Map<string, SessionMemory>();
  private readonly locks = new KeyedMutex();
  private readonly limits: SessionConfig;

  constructor(limits: Partial<SessionConfig> = {}, private readonly clock: () => number = Date.now) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: SessionMemory, now: number): boolean {
    return this.limits.sessionTtlMs > 0 && now - session.lastAccessedAt.getTime() > this.limits.sessionTtlMs;
  }

  private touch(session: SessionMemory, now: number): void {
    session.lastAccessedAt = new Date(now);
    this.sessions.delete(session.sessionId);
    this.sessions.set(session.sessionId, session);
  }

  /**
   * Live entry for the id, or undefined when missing or expired
   */
  private lookup(sessionId: string, now: number): SessionMemory | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;

    if (this.isExpired(session, now) && !this.locks.isLocked(sessionId)) {
      this.sessions.delete(sessionId);
      debugLogger.info('SESSION', 'Session expired', { sessionId });
      return undefined;
    }
    return session;
  }

  private evict(now: number, keep: string): void {
    for (const session of this.sessions.values()) {
      if (session.sessionId === keep) continue;
      if (this.isExpired(session, now) && !this.locks.isLocked(session.sessionId)) {
        this.sessions.delete(session.sessionId);
      }
    }

    if (this.sessions.size <= this.limits.maxSessions) return;

    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= this.limits.maxSessions) break;
      if (sessionId === keep || this.locks.isLocked(sessionId)) continue;
      this.sessions.delete(sessionId);
      debugLogger.info('SESSION', 'Evicted least recently used session', { sessionId });
    }
  }

  /**
   * Existing session or a fresh empty one. Runs synchronously, so two callers
   * with the same id always end up with the same session.
   */
  getOrCreate(sessionId: string): SessionMemory {
    const now = this.clock();
    let session = this.lookup(sessionId, now);

    if (!session) {
      session = { sessionId, turns: [], createdAt: new Date(now), lastAccessedAt: new Date(now) };
      this.sessions.set(sessionId, session);
      debugLogger.info('SESSION', 'Session created', { sessionId });
    }

    this.touch(session, now);
    this.evict(now, sessionId);
    return snapshot(session);
  }

  get(sessionId: string): SessionMemory | undefined {
    const session = this.lookup(sessionId, this.clock());
    return session ? snapshot(session) : undefined;
  }

  history(sessionId: string): ConversationTurn[] {
    return this.get(sessionId)?.turns ?? [];
  }

  /**
   * Serialize work on one session. Callers queue in arrival order.
   */
  acquire(sessionId: string): Promise<() => void> {
    return this.locks.acquire(sessionId);
  }

  isLocked(sessionId: string): boolean {
    return this.locks.isLocked(sessionId);
  }

  appendTurn(sessionId: string, question: string, answer: string): void {
    const now = this.clock();
    this.getOrCreate(sessionId);
    const session = this.sessions.get(sessionId);
    if (!session) return;

    session.turns.push({
      question: question.substring(0, MAX_CONTENT_LENGTH),
      answer: answer.substring(0, MAX_CONTENT_LENGTH),
      createdAt: new Date(now),
    });

    const overflow = session.turns.length - this.limits.maxTurnsPerSession;
    if (overflow > 0) {
      session.turns.splice(0, overflow);
    }
  }

  list(): SessionSummary[] {
    const now = this.clock();
    return Array.from(this.sessions.values())
      .filter(session => !this.isExpired(session, now))
      .map(session => ({
        sessionId: session.sessionId,
        turnCount: session.turns.length,
        lastQuestion: session.turns.at(-1)?.question ?? null,
        createdAt: session.createdAt,
        lastAccessedAt: session.lastAccessedAt,
      }))
      .reverse();
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
