import crypto from 'node:crypto';
import { UnknownSessionError } from '../../domain/errors/DashboardErrors.js';
import type { BillUpload } from './BillIngestionService.js';
import type { DashboardLoadResult, DashboardSession } from './DashboardSession.js';

export type DashboardSessionFactory = (sessionId: string) => DashboardSession;

export interface DashboardSessionRegistryOptions {
  generateId?: () => string;
  /** Oldest-used sessions are closed once this many are open. */
  maxSessions?: number;
  /** Sessions untouched for longer than this are closed. */
  idleTtlMs?: number;
  now?: () => number;
}

interface SessionEntry {
  session: DashboardSession;
  lastUsedAt: number;
}

export class DashboardSessionRegistry {
  // Map order doubles as recency order: a touched entry is moved to the end.
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly generateId: () => string;
  private readonly maxSessions: number;
  private readonly idleTtlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly createSession: DashboardSessionFactory,
    options: DashboardSessionRegistryOptions = {},
  ) {
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.maxSessions = options.maxSessions ?? 50;
    this.idleTtlMs = options.idleTtlMs ?? 30 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async open(upload: BillUpload): Promise<{ session: DashboardSession; load: DashboardLoadResult }> {
    await this.evictIdle();

    const session = this.createSession(this.generateId());

    try {
      const load = await session.load(upload);
      await this.makeRoom();
      this.sessions.set(session.id, { session, lastUsedAt: this.now() });
      return { session, load };
    } catch (error) {
      await session.dispose();
      throw error;
    }
  }

  get(sessionId: string): DashboardSession {
    const entry = this.sessions.get(sessionId);

    if (!entry) {
      throw new UnknownSessionError(sessionId);
    }

    if (this.isIdle(entry)) {
      this.sessions.delete(sessionId);
      entry.session.dispose().catch((error: unknown) => {
        console.error(`Failed to dispose expired session ${sessionId}:`, error);
      });
      throw new UnknownSessionError(sessionId);
    }

    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, { session: entry.session, lastUsedAt: this.now() });
    return entry.session;
  }

  async close(sessionId: string): Promise<void> {
    const session = this.get(sessionId);
    this.sessions.delete(sessionId);
    await session.dispose();
  }

  get size(): number {
    return this.sessions.size;
  }

  private isIdle(entry: SessionEntry): boolean {
    return this.now() - entry.lastUsedAt > this.idleTtlMs;
  }

  private async evictIdle(): Promise<void> {
    const idle = Array.from(this.sessions.entries()).filter(([, entry]) => this.isIdle(entry));

    for (const [sessionId, entry] of idle) {
      await this.evict(sessionId, entry, 'idle');
    }
  }

  private async makeRoom(): Promise<void> {
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.entries().next();
      if (oldest.done) {
        return;
      }

      const [sessionId, entry] = oldest.value;
      await this.evict(sessionId, entry, 'capacity');
    }
  }

  private async evict(sessionId: string, entry: SessionEntry, reason: 'idle' | 'capacity'): Promise<void> {
    this.sessions.delete(sessionId);
    console.log(`🧹 Session ${sessionId} closed (${reason})`);
    await entry.session.dispose();
  }
}
