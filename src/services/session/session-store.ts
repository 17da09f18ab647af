/**
 * Session Store
 *
 * Process-local conversation state keyed by session id. Mutations of one
 * session are serialized through a per-id lock; different ids never wait
 * on each other. Callers only ever see copies, never the stored records.
 *
 * Retention:
 * - idle sessions expire after `ttlMinutes` (purged lazily on access)
 * - each session keeps at most `maxTurnPairs * 2` turns, oldest dropped first
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { UnifiedHealthReport } from '../health/types';
import type { MetricsSeries } from '../metrics/metrics-synthesizer';
import { KeyedLock } from './keyed-lock';

// ============================================================================
// Types
// ============================================================================

export type ToolName = 'health' | 'metrics' | 'report';

export interface Turn {
  role: 'user' | 'agent';
  text: string;
  tools: ToolName[];
  at: string;
}

export interface Session {
  id: string;
  turns: Turn[];
  created_at: string;
  updated_at: string;
  last_health?: UnifiedHealthReport;
  last_metrics?: MetricsSeries;
  last_report?: string;
}

/** Last tool outputs, reused when a follow-up runs no tools */
export type SessionPatch = Partial<Pick<Session, 'last_health' | 'last_metrics' | 'last_report'>>;

/** Exclusive view of one session, valid only inside `withSession` */
export interface SessionHandle {
  readonly id: string;
  snapshot(): Session;
  append(...turns: Turn[]): void;
  update(patch: SessionPatch): void;
}

export interface SessionStore {
  getOrCreate(id?: string | null): Promise<Session>;
  get(id: string): Promise<Session | null>;
  append(id: string, ...turns: Turn[]): Promise<void>;
  history(id: string): Promise<Turn[]>;
  update(id: string, patch: SessionPatch): Promise<void>;
  withSession<T>(id: string, fn: (handle: SessionHandle) => T | Promise<T>): Promise<T>;
  size(): number;
}

// ============================================================================
// Validation
// ============================================================================

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

export function assertValidSessionId(id: string): void {
  if (!isValidSessionId(id)) {
    throw new ValidationError('Invalid session id format');
  }
}

// ============================================================================
// In-memory implementation
// ============================================================================

export interface InMemorySessionStoreOptions {
  ttlMinutes: number;
  maxTurnPairs: number;
  now?: () => number;
}

interface SessionRecord {
  session: Session;
  touchedAt: number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly locks = new KeyedLock();
  private readonly ttlMs: number;
  private readonly maxTurns: number;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions) {
    this.ttlMs = options.ttlMinutes * 60_000;
    this.maxTurns = options.maxTurnPairs * 2;
    this.now = options.now ?? Date.now;
  }

  async getOrCreate(id?: string | null): Promise<Session> {
    const sessionId = id && id.trim() ? id : randomUUID();
    assertValidSessionId(sessionId);
    return structuredClone(this.touch(sessionId).session);
  }

  async get(id: string): Promise<Session | null> {
    assertValidSessionId(id);
    this.purgeExpired();
    const record = this.sessions.get(id);
    return record ? structuredClone(record.session) : null;
  }

  async append(id: string, ...turns: Turn[]): Promise<void> {
    await this.withSession(id, (handle) => handle.append(...turns));
  }

  async history(id: string): Promise<Turn[]> {
    assertValidSessionId(id);
    return this.locks.run(id, () => {
      this.purgeExpired();
      const record = this.sessions.get(id);
      return record ? structuredClone(record.session.turns) : [];
    });
  }

  async update(id: string, patch: SessionPatch): Promise<void> {
    await this.withSession(id, (handle) => handle.update(patch));
  }

  async withSession<T>(id: string, fn: (handle: SessionHandle) => T | Promise<T>): Promise<T> {
    assertValidSessionId(id);

    return this.locks.run(id, async () => {
      const record = this.touch(id);
      const handle: SessionHandle = {
        id,
        snapshot: () => structuredClone(record.session),
        append: (...turns) => {
          record.session.turns.push(...structuredClone(turns));
          this.trim(record.session);
          this.markUpdated(record);
        },
        update: (patch) => {
          Object.assign(record.session, structuredClone(patch));
          this.markUpdated(record);
        },
      };
      return fn(handle);
    });
  }

  size(): number {
    this.purgeExpired();
    return this.sessions.size;
  }

  // --------------------------------------------------------------------------

  /** Returns the live record for `id`, creating it when absent or expired */
  private touch(id: string): SessionRecord {
    this.purgeExpired();
    const now = this.now();
    let record = this.sessions.get(id);

    if (!record) {
      const at = new Date(now).toISOString();
      record = { session: { id, turns: [], created_at: at, updated_at: at }, touchedAt: now };
      this.sessions.set(id, record);
      logger.debug(`[SessionStore] created ${id}`);
    }

    record.touchedAt = now;
    return record;
  }

  private markUpdated(record: SessionRecord): void {
    const now = this.now();
    record.touchedAt = now;
    record.session.updated_at = new Date(now).toISOString();
  }

  private trim(session: Session): void {
    if (session.turns.length > this.maxTurns) {
      session.turns.splice(0, session.turns.length - this.maxTurns);
    }
  }

  private purgeExpired(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [id, record] of this.sessions) {
      if (record.touchedAt < cutoff) {
        this.sessions.delete(id);
        logger.debug(`[SessionStore] expired ${id}`);
      }
    }
  }
}
