/**
 * Advisory Store, Orchestrator Registry and configuration tests
 */

import { describe, it, expect, vi } from 'vitest';
import { AdvisoryStore } from '../src/services/advisory/advisory-store.js';
import { OrchestratorRegistry } from '../src/services/advisory/orchestrator-registry.js';
import {
  DEFAULT_CONFIDENCE_CONFIG,
  DEFAULT_ORCHESTRATION_CONFIG,
  DEFAULT_ROUTER_CONFIG,
  advisoryConfig,
  validateAdvisoryConfig,
} from '../src/config/advisory.js';

const NOW = 1700000000000;

describe('AdvisoryStore', () => {
  it('should create running records', () => {
    const store = new AdvisoryStore();

    const record = store.create({ correlationId: 'a', sessionId: 's-a', query: 'q' }, NOW);

    expect(record).toEqual({
      correlationId: 'a',
      sessionId: 's-a',
      query: 'q',
      status: 'running',
      createdAt: '2023-11-14T22:13:20.000Z',
    });
  });

  it('should close records with a failure', () => {
    const store = new AdvisoryStore();
    store.create({ correlationId: 'a', sessionId: 's-a', query: 'q' }, NOW);

    store.close('a', 'aborted', { reason: 'client_abort' }, NOW + 1000);

    expect(store.get('a')).toMatchObject({
      status: 'aborted',
      failure: { reason: 'client_abort' },
      completedAt: '2023-11-14T22:13:21.000Z',
    });
  });

  it('should evict the oldest record past capacity', () => {
    const store = new AdvisoryStore(2);
    store.create({ correlationId: 'a', sessionId: 's-a', query: 'q' }, NOW);
    store.create({ correlationId: 'b', sessionId: 's-b', query: 'q' }, NOW);
    store.create({ correlationId: 'c', sessionId: 's-c', query: 'q' }, NOW);

    expect(store.size()).toBe(2);
    expect(store.get('a')).toBeUndefined();
    expect(store.get('c')?.status).toBe('running');
  });
});

describe('OrchestratorRegistry', () => {
  function stub(stopped = false) {
    return { stop: vi.fn(), isStopped: () => stopped };
  }

  it('should report the count and the age of the oldest running advisory', () => {
    let now = 1000;
    const registry = new OrchestratorRegistry(() => now);
    registry.register('a', stub());
    now = 1500;
    registry.register('b', stub());
    now = 1800;

    expect(registry.summary()).toEqual({ count: 2, oldestRunningMs: 800 });

    registry.release('a');
    expect(registry.summary()).toEqual({ count: 1, oldestRunningMs: 300 });

    registry.release('b');
    expect(registry.summary()).toEqual({ count: 0, oldestRunningMs: 0 });
  });

  it('should refuse a second registration under the same id', () => {
    const registry = new OrchestratorRegistry();
    registry.register('a', stub());

    expect(() => registry.register('a', stub())).toThrow('Advisory a is already running');
  });

  it('should stop one advisory only while it runs', () => {
    const registry = new OrchestratorRegistry();
    const running = stub();
    registry.register('a', running);
    registry.register('b', stub(true));

    expect(registry.stop('a', 'client_abort')).toBe(true);
    expect(running.stop).toHaveBeenCalledWith('client_abort');
    expect(registry.stop('b', 'client_abort')).toBe(false);
    expect(registry.stop('missing', 'client_abort')).toBe(false);
    registry.release('a');
    expect(registry.stop('a', 'client_abort')).toBe(false);
  });

  it('should stop only orchestrators still running', () => {
    const registry = new OrchestratorRegistry();
    const running = stub();
    const finished = stub(true);
    registry.register('a', running);
    registry.register('b', finished);

    expect(registry.stopAll('shutdown')).toBe(1);
    expect(running.stop).toHaveBeenCalledWith('shutdown');
    expect(finished.stop).not.toHaveBeenCalled();
  });
});

describe('validateAdvisoryConfig', () => {
  const valid = {
    ...advisoryConfig,
    orchestration: DEFAULT_ORCHESTRATION_CONFIG,
    router: DEFAULT_ROUTER_CONFIG,
    confidence: DEFAULT_CONFIDENCE_CONFIG,
  };

  it('should accept the defaults', () => {
    expect(() => validateAdvisoryConfig(valid)).not.toThrow();
  });

  it('should list every invalid setting', () => {
    expect(() =>
      validateAdvisoryConfig({
        ...valid,
        orchestration: { ...DEFAULT_ORCHESTRATION_CONFIG, maxDebateTurns: 0 },
        router: { ...DEFAULT_ROUTER_CONFIG, entropyThreshold: 1.5 },
      })
    ).toThrow(
      'Advisory configuration validation failed:\nADVISORY_MAX_DEBATE_TURNS must be >= 1\nROUTER_ENTROPY_THRESHOLD must be within [0, 1]'
    );
  });

  it('should reject weights that sum to zero', () => {
    expect(() =>
      validateAdvisoryConfig({
        ...valid,
        confidence: { ...DEFAULT_CONFIDENCE_CONFIG, weights: { agreement: 0, stability: 0, router: 0 } },
      })
    ).toThrow('Confidence weights must sum to a positive value');
  });
});
