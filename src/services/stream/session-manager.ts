/**
 * Stream Session Manager
 *
 * Owns every live stream session: creation, resume lookups, heartbeats to
 * attached transports and expiry of sessions left idle and detached for
 * longer than the idle window.
 */

import { v4 as uuidv4 } from 'uuid';
import { StreamSession, type StreamError } from './stream-session.js';
import { createLogger } from '../logging/index.js';
import { err, ok, type Result } from '../../types/result.js';

const logger = createLogger({ module: 'StreamSessionManager' });

export interface SessionManagerOptions {
  /** Idle window for detached sessions */
  idleMs: number;
  /** Heartbeat interval; 0 disables */
  heartbeatMs: number;
  /** Expiry sweep interval; 0 disables */
  sweepIntervalMs: number;
  now?: () => number;
}

export class StreamSessionManager {
  private readonly sessions: Map<string, StreamSession> = new Map();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly options: SessionManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  create(correlationId: string): StreamSession {
    const session = new StreamSession(uuidv4(), correlationId, this.now);
    this.sessions.set(session.sessionId, session);
    logger.info({ sessionId: session.sessionId, correlationId, totalSessions: this.sessions.size }, 'Stream session created');
    return session;
  }

  get(sessionId: string): StreamSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Resolve a session for (re)connection and validate the resume point.
   * Unknown and expired sessions both yield session_expired.
   */
  resolve(sessionId: string, lastAckedSeq: number): Result<StreamSession, StreamError> {
    const session = this.sessions.get(sessionId);
    if (!session || session.isExpired) {
      return err({ code: 'session_expired', message: `Session ${sessionId} is unknown or has expired` });
    }
    const valid = session.validateAck(lastAckedSeq);
    if (!valid.ok) {
      return valid;
    }
    return ok(session);
  }

  /**
   * Expire detached sessions idle for at least the idle window
   * @returns ids of the expired sessions
   */
  sweep(): string[] {
    const now = this.now();
    const expired: string[] = [];
    for (const [sessionId, session] of this.sessions.entries()) {
      if (!session.isAttached && now - session.lastActivityAt >= this.options.idleMs) {
        session.expire();
        this.sessions.delete(sessionId);
        expired.push(sessionId);
      }
    }
    if (expired.length > 0) {
      logger.info({ expired: expired.length, remaining: this.sessions.size }, 'Expired idle stream sessions');
    }
    return expired;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getAttachedCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.isAttached) count++;
    }
    return count;
  }

  start(): void {
    if (this.options.heartbeatMs > 0 && !this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => {
        for (const session of this.sessions.values()) {
          session.heartbeat();
        }
      }, this.options.heartbeatMs);
      this.heartbeatTimer.unref();
      logger.info({ interval: this.options.heartbeatMs }, 'Heartbeat started');
    }
    if (this.options.sweepIntervalMs > 0 && !this.sweepTimer) {
      this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /**
   * Stop timers and close every session
   */
  shutdown(): void {
    logger.info({ sessionCount: this.sessions.size }, 'Shutting down stream session manager');
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const session of this.sessions.values()) {
      session.expire();
    }
    this.sessions.clear();
  }
}
