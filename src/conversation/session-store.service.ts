import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AGENT_RUNTIME, AgentRuntime } from '../agent-runtime/agent-runtime.interface';
import { ConversationSession } from './conversation-session';

export const SESSION_IDLE_TTL_MS = 30 * 60 * 1000;
export const MAX_SESSIONS = 1000;

export interface SessionHandle {
  sessionId: string;
  createdAt: Date;
  lastActiveAt: number;
  session: ConversationSession;
}

// Ephemeral, in-memory; each web visitor gets its own turn list.
// Map order doubles as recency order: a touched session is re-inserted at the end.
@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions: Map<string, SessionHandle> = new Map();

  constructor(@Inject(AGENT_RUNTIME) private readonly runtime: AgentRuntime) {}

  create(): SessionHandle {
    const now = Date.now();
    this.evictIdle(now);
    while (this.sessions.size >= MAX_SESSIONS) {
      const oldest = this.sessions.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      this.discard(oldest, 'capacity');
    }

    const handle: SessionHandle = {
      sessionId: uuidv4(),
      createdAt: new Date(now),
      lastActiveAt: now,
      session: new ConversationSession(this.runtime),
    };
    this.sessions.set(handle.sessionId, handle);
    this.logger.log(
      `Session ${handle.sessionId} opened (runtime: ${this.runtime.name}, active: ${this.getSessionCount()})`,
    );
    return handle;
  }

  /** @throws NotFoundException for unknown, closed or expired ids */
  get(sessionId: string): ConversationSession {
    const now = Date.now();
    this.evictIdle(now);

    const handle = this.sessions.get(sessionId);
    if (!handle) {
      throw new NotFoundException(`Chat session "${sessionId}" not found`);
    }
    handle.lastActiveAt = now;
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, handle);
    return handle.session;
  }

  /** Ends a session and drops its history. */
  remove(sessionId: string): void {
    if (!this.sessions.has(sessionId)) {
      throw new NotFoundException(`Chat session "${sessionId}" not found`);
    }
    this.discard(sessionId, 'closed');
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  private evictIdle(now: number): void {
    for (const [sessionId, handle] of this.sessions) {
      if (now - handle.lastActiveAt < SESSION_IDLE_TTL_MS) {
        break;      // the rest are more recent
      }
      this.discard(sessionId, 'idle');
    }
  }

  private discard(sessionId: string, reason: string): void {
    this.sessions.delete(sessionId);
    this.logger.log(`Session ${sessionId} discarded (${reason})`);
  }
}
