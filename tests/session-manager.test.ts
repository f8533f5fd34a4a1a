/**
 * Stream Session Manager Unit Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { StreamSessionManager } from '../src/services/stream/session-manager.js';
import { OrchestratorState } from '../src/types/decision.js';
import { FakeTransport } from './helpers/fake-transport.js';

function managerAt(clock: { now: number }, idleMs = 5000): StreamSessionManager {
  return new StreamSessionManager({ idleMs, heartbeatMs: 0, sweepIntervalMs: 0, now: () => clock.now });
}

describe('StreamSessionManager', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create and look up sessions', () => {
    const manager = managerAt({ now: 1000 });

    const session = manager.create('corr-1');

    expect(manager.get(session.sessionId)).toBe(session);
    expect(session.correlationId).toBe('corr-1');
    expect(manager.getSessionCount()).toBe(1);
  });

  it('should report unknown sessions as expired', () => {
    const manager = managerAt({ now: 1000 });

    const result = manager.resolve('missing', 0);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toEqual({ code: 'session_expired', message: 'Session missing is unknown or has expired' });
    }
  });

  it('should validate the resume point on resolve', () => {
    const manager = managerAt({ now: 1000 });
    const session = manager.create('corr-1');
    session.append({ type: 'status', payload: { state: OrchestratorState.CLASSIFYING, message: 'Classifying question' } });

    const good = manager.resolve(session.sessionId, 1);
    const bad = manager.resolve(session.sessionId, 2);

    expect(good.ok).toBe(true);
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.code).toBe('invalid_ack');
  });

  it('should expire detached sessions once the idle window has passed', () => {
    const clock = { now: 1000 };
    const manager = managerAt(clock, 5000);
    const session = manager.create('corr-1');

    clock.now = 5999;
    expect(manager.sweep()).toEqual([]);

    clock.now = 6000;
    expect(manager.sweep()).toEqual([session.sessionId]);
    expect(session.isExpired).toBe(true);
    expect(manager.getSessionCount()).toBe(0);

    const result = manager.resolve(session.sessionId, 0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('session_expired');
  });

  it('should measure idleness from the last activity', () => {
    const clock = { now: 1000 };
    const manager = managerAt(clock, 5000);
    const session = manager.create('corr-1');

    clock.now = 4000;
    session.append({ type: 'status', payload: { state: OrchestratorState.GATHERING, message: 'Consulting specialists' } });
    clock.now = 8999;

    expect(manager.sweep()).toEqual([]);
  });

  it('should never expire an attached session', () => {
    const clock = { now: 1000 };
    const manager = managerAt(clock, 5000);
    const session = manager.create('corr-1');
    session.attach(new FakeTransport(), 0);

    clock.now = 1000000;

    expect(manager.sweep()).toEqual([]);
    expect(manager.getAttachedCount()).toBe(1);
  });

  it('should send heartbeats on the configured interval', () => {
    vi.useFakeTimers();
    const manager = new StreamSessionManager({ idleMs: 5000, heartbeatMs: 1000, sweepIntervalMs: 0 });
    const transport = new FakeTransport();
    manager.create('corr-1').attach(transport, 0);

    manager.start();
    vi.advanceTimersByTime(1000);

    expect(transport.chunks).toEqual([': connected\n\n', ': heartbeat\n\n']);
    manager.shutdown();
  });

  it('should close every session on shutdown', () => {
    const manager = managerAt({ now: 1000 });
    const transport = new FakeTransport();
    const session = manager.create('corr-1');
    session.attach(transport, 0);

    manager.shutdown();

    expect(transport.writableEnded).toBe(true);
    expect(session.isExpired).toBe(true);
    expect(manager.getSessionCount()).toBe(0);
  });
});
