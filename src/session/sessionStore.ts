import { InvalidInputError } from '../errors';
import type { Session, SessionContext, Turn } from '../types';
import { KeyedLock } from './keyedLock';

export interface SessionStoreOptions {
  /** Most recent turns kept per session. */
  maxTurns: number;
  /** Inactivity after which a session is forgotten. */
  ttlMs: number;
  now?: () => number;
}

interface SessionRecord {
  id: string;
  turns: Turn[];
  context: SessionContext;
  createdAt: number;
  lastActiveAt: number;
}

function cloneContext(context: SessionContext): SessionContext {
  const copy: SessionContext = { ...context };
  if (context.lastTeams) copy.lastTeams = [...context.lastTeams];
  if (context.preferredBetTypes) copy.preferredBetTypes = [...context.preferredBetTypes];
  return copy;
}

function snapshot(record: SessionRecord): Session {
  return {
    id: record.id,
    turns: record.turns.map((turn) => ({ ...turn })),
    context: cloneContext(record.context),
    createdAt: record.createdAt,
    lastActiveAt: record.lastActiveAt,
  };
}

export function assertSessionId(sessionId: string): void {
  if (!sessionId.trim()) {
    throw new InvalidInputError('session_id must not be empty');
  }
}

/**
 * In-memory conversation state keyed by session id. Nothing survives a
 * restart. Callers that read and then write a session should do so inside
 * `withSession` so overlapping requests on one id are applied in order.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly lock = new KeyedLock();
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    if (!Number.isInteger(options.maxTurns) || options.maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer, got ${options.maxTurns}`);
    }
    this.now = options.now ?? Date.now;
  }

  get maxTurns(): number {
    return this.options.maxTurns;
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Reading a session counts as activity. */
  getOrCreate(sessionId: string): Session {
    const record = this.record(sessionId);
    record.lastActiveAt = this.now();
    return snapshot(record);
  }

  appendTurn(sessionId: string, userText: string, botText: string): void {
    const record = this.record(sessionId);
    const at = this.now();
    record.turns.push({ user: userText, assistant: botText, at });
    if (record.turns.length > this.options.maxTurns) {
      record.turns.splice(0, record.turns.length - this.options.maxTurns);
    }
    record.lastActiveAt = at;
  }

  updateContext(sessionId: string, patch: SessionContext): void {
    const record = this.record(sessionId);
    record.context = cloneContext({ ...record.context, ...patch });
    record.lastActiveAt = this.now();
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Clear once any in-flight work on the session has finished. */
  reset(sessionId: string): Promise<boolean> {
    return this.withSession(sessionId, async () => this.clear(sessionId));
  }

  /** Drop every expired session. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (this.isExpired(record, now) && !this.lock.isLocked(id)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  withSession<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    assertSessionId(sessionId);
    return this.lock.runExclusive(sessionId, fn);
  }

  private isExpired(record: SessionRecord, now: number): boolean {
    return now - record.lastActiveAt > this.options.ttlMs;
  }

  private record(sessionId: string): SessionRecord {
    assertSessionId(sessionId);
    const now = this.now();
    const existing = this.sessions.get(sessionId);
    // a session held by withSession is in use, whatever its clock says
    if (existing && (!this.isExpired(existing, now) || this.lock.isLocked(sessionId))) {
      return existing;
    }

    const created: SessionRecord = {
      id: sessionId,
      turns: [],
      context: {},
      createdAt: now,
      lastActiveAt: now,
    };
    this.sessions.set(sessionId, created);
    return created;
  }
}
