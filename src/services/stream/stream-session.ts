/**
 * Stream Session
 *
 * Holds every envelope of one request in sequence order and delivers them to
 * at most one attached transport. Delivery is cursor-based: a transport
 * attached with lastAckedSeq = k receives exactly the envelopes with seq > k,
 * followed by new envelopes as they are appended.
 */

import { formatSseComment, formatSseFrame } from './sse-format.js';
import { createLogger, loggers } from '../logging/index.js';
import { err, ok, type Result } from '../../types/result.js';
import {
  TERMINAL_EVENT_TYPES,
  type SseTransport,
  type StreamEnvelope,
  type StreamEvent,
} from '../../types/stream.js';

const logger = createLogger({ module: 'stream-session' });

export type StreamErrorCode = 'session_expired' | 'invalid_ack';

export interface StreamError {
  code: StreamErrorCode;
  message: string;
}

export interface StreamSessionSnapshot {
  sessionId: string;
  correlationId: string;
  createdAt: string;
  lastEventSeq: number;
  lastAckedSeq: number;
  lastDeliveredSeq: number;
  attached: boolean;
  terminal: boolean;
}

export class StreamSession {
  readonly createdAt: Date;
  private readonly envelopes: StreamEnvelope[] = [];
  private transport: SseTransport | null = null;
  /** Highest seq written to the current transport */
  private cursor = 0;
  private ackedSeq = 0;
  private awaitingDrain = false;
  private drainWaiters: Array<() => void> = [];
  private terminal = false;
  private expired = false;
  private lastActivity: number;

  constructor(
    readonly sessionId: string,
    readonly correlationId: string,
    private readonly now: () => number = Date.now
  ) {
    this.createdAt = new Date(this.now());
    this.lastActivity = this.now();
  }

  get lastEventSeq(): number {
    return this.envelopes.length;
  }

  get lastAckedSeq(): number {
    return this.ackedSeq;
  }

  get isAttached(): boolean {
    return this.transport !== null;
  }

  get isTerminal(): boolean {
    return this.terminal;
  }

  get isExpired(): boolean {
    return this.expired;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /**
   * Sequence an event, buffer it and push it to the attached transport
   */
  append(event: StreamEvent): StreamEnvelope {
    const envelope: StreamEnvelope = {
      ...event,
      sessionId: this.sessionId,
      correlationId: this.correlationId,
      seq: this.envelopes.length + 1,
      ts: new Date(this.now()).toISOString(),
    };
    this.envelopes.push(envelope);
    if (TERMINAL_EVENT_TYPES.has(envelope.type)) {
      this.terminal = true;
    }
    this.touch();
    this.pump();
    loggers.streamEvent(this.sessionId, envelope.type, envelope.seq, this.cursor >= envelope.seq);
    return envelope;
  }

  /**
   * Check that a resume point is valid for this session
   */
  validateAck(lastAckedSeq: number): Result<number, StreamError> {
    if (this.expired) {
      return err({ code: 'session_expired', message: `Session ${this.sessionId} has expired` });
    }
    if (!Number.isInteger(lastAckedSeq) || lastAckedSeq < 0 || lastAckedSeq > this.lastEventSeq) {
      return err({
        code: 'invalid_ack',
        message: `lastAckedSeq ${lastAckedSeq} is outside 0..${this.lastEventSeq}`,
      });
    }
    return ok(lastAckedSeq);
  }

  /**
   * Attach a transport and replay everything after lastAckedSeq.
   * A previously attached transport is detached first.
   */
  attach(transport: SseTransport, lastAckedSeq: number = 0): Result<StreamSessionSnapshot, StreamError> {
    const valid = this.validateAck(lastAckedSeq);
    if (!valid.ok) {
      return valid;
    }

    if (this.transport && this.transport !== transport) {
      logger.info({ sessionId: this.sessionId }, 'Replacing attached transport');
      this.releaseTransport(false);
    }

    this.transport = transport;
    this.cursor = lastAckedSeq;
    this.ackedSeq = Math.max(this.ackedSeq, lastAckedSeq);
    this.awaitingDrain = false;
    this.touch();

    logger.info({
      sessionId: this.sessionId,
      correlationId: this.correlationId,
      lastAckedSeq,
      replay: this.lastEventSeq - lastAckedSeq,
    }, 'Transport attached');

    transport.write(formatSseComment('connected'));
    this.pump();

    // Nothing left to deliver for a finished request
    if (this.terminal && this.transport === transport && this.cursor >= this.envelopes.length) {
      transport.end();
      this.releaseTransport(false);
    }
    return ok(this.snapshot());
  }

  /**
   * Detach a transport (client went away). Only the currently attached transport is detached.
   */
  detach(transport: SseTransport): void {
    if (this.transport !== transport) return;
    this.releaseTransport(false);
    logger.info({ sessionId: this.sessionId, lastDeliveredSeq: this.cursor }, 'Transport detached');
  }

  /**
   * Resolves once the attached transport can take more data (or nothing is attached)
   */
  drained(): Promise<void> {
    if (!this.awaitingDrain) return Promise.resolve();
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }

  heartbeat(): void {
    if (this.transport && !this.awaitingDrain && !this.transport.writableEnded) {
      this.transport.write(formatSseComment('heartbeat'));
    }
  }

  /**
   * Mark expired and drop the transport. Buffered envelopes are released.
   */
  expire(): void {
    this.expired = true;
    this.releaseTransport(true);
    this.envelopes.length = 0;
  }

  snapshot(): StreamSessionSnapshot {
    return {
      sessionId: this.sessionId,
      correlationId: this.correlationId,
      createdAt: this.createdAt.toISOString(),
      lastEventSeq: this.lastEventSeq,
      lastAckedSeq: this.ackedSeq,
      lastDeliveredSeq: this.cursor,
      attached: this.isAttached,
      terminal: this.terminal,
    };
  }

  private pump(): void {
    const transport = this.transport;
    if (!transport || this.awaitingDrain) return;

    while (this.transport === transport && this.cursor < this.envelopes.length) {
      if (transport.writableEnded) {
        this.releaseTransport(false);
        return;
      }

      const envelope = this.envelopes[this.cursor];
      if (!envelope) return;
      const writable = transport.write(formatSseFrame(envelope));
      this.cursor = envelope.seq;

      if (TERMINAL_EVENT_TYPES.has(envelope.type)) {
        transport.end();
        this.releaseTransport(false);
        return;
      }

      if (!writable) {
        this.awaitingDrain = true;
        transport.once('drain', () => {
          if (this.transport !== transport) return;
          this.awaitingDrain = false;
          this.pump();
          if (!this.awaitingDrain) this.releaseDrainWaiters();
        });
        return;
      }
    }
  }

  private releaseTransport(end: boolean): void {
    const transport = this.transport;
    this.transport = null;
    this.awaitingDrain = false;
    this.touch();
    if (end && transport && !transport.writableEnded) {
      transport.end();
    }
    this.releaseDrainWaiters();
  }

  private releaseDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private touch(): void {
    this.lastActivity = this.now();
  }
}
