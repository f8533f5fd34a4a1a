/**
 * Advisory Service Tests
 * Background runs, session resume, abort and challenge
 */

import { describe, it, expect, afterEach } from 'vitest';
import { AdvisoryService } from '../src/services/advisory/advisory-service.js';
import { AdvisoryStore } from '../src/services/advisory/advisory-store.js';
import { OrchestratorRegistry } from '../src/services/advisory/orchestrator-registry.js';
import { StreamSessionManager } from '../src/services/stream/session-manager.js';
import { MemoryTraceStore } from '../src/services/telemetry/memory-trace-store.js';
import { buildStack, type Stack, type StackOptions } from './helpers/advisory-stack.js';
import { FakeTransport } from './helpers/fake-transport.js';

const QUERY = 'How exposed is my portfolio to rate cuts?';

interface Harness {
  service: AdvisoryService;
  sessions: StreamSessionManager;
  stack: Stack;
}

const harnesses: Harness[] = [];

function createHarness(options: StackOptions = {}): Harness {
  const stack = buildStack(options);
  const sessions = new StreamSessionManager({ idleMs: 60000, heartbeatMs: 0, sweepIntervalMs: 0 });
  const service = new AdvisoryService({
    sessions,
    traceStore: new MemoryTraceStore(),
    store: new AdvisoryStore(),
    registry: new OrchestratorRegistry(),
    orchestrator: stack.deps,
  });
  const harness = { service, sessions, stack };
  harnesses.push(harness);
  return harness;
}

describe('AdvisoryService', () => {
  afterEach(() => {
    for (const harness of harnesses.splice(0)) harness.sessions.shutdown();
  });

  describe('start', () => {
    it('should run the advisory in the background and store the outcome', async () => {
      const { service } = createHarness();

      const started = service.start({ query: QUERY, accountScope: 'acct-1' });
      expect(service.get(started.correlationId)?.status).toBe('running');
      expect(service.getRunning().count).toBe(1);

      const outcome = await started.completion;

      expect(outcome.status).toBe('done');
      const record = service.get(started.correlationId);
      expect(record?.status).toBe('done');
      expect(record?.accountScope).toBe('acct-1');
      expect(record?.context?.confidence.score).toBe(0.975);
      expect(service.getRunning().count).toBe(0);
    });

    it('should persist the trace before completion settles', async () => {
      const { service } = createHarness();

      const started = service.start({ query: QUERY });
      await started.completion;

      const trace = await service.getTrace(started.correlationId);
      expect(trace).toHaveLength(7);
      expect(trace.every((r) => r.correlationId === started.correlationId)).toBe(true);
    });

    it('should store failures', async () => {
      const { service } = createHarness({
        specialists: { quant: { kind: 'fail' }, sentiment: { kind: 'fail' }, research: { kind: 'fail' } },
      });

      const started = service.start({ query: QUERY });
      await started.completion;

      expect(service.get(started.correlationId)?.failure).toEqual({
        reason: 'all_specialists_failed',
        message: 'Every selected specialist failed; no evidence to advise on',
      });
      expect(service.get(started.correlationId)?.status).toBe('failed');
    });
  });

  describe('stream resume', () => {
    it('should replay every event to a late subscriber', async () => {
      const { service, sessions } = createHarness();
      const started = service.start({ query: QUERY });
      await started.completion;

      const transport = new FakeTransport();
      sessions.get(started.sessionId)?.attach(transport, 0);

      expect(transport.seqs()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
      expect(transport.writableEnded).toBe(true);
    });

    it('should resume after the acknowledged event without gaps', async () => {
      const { service, sessions } = createHarness();
      const started = service.start({ query: QUERY });
      await started.completion;

      const transport = new FakeTransport();
      const attached = sessions.get(started.sessionId)?.attach(transport, 2);

      expect(attached?.ok).toBe(true);
      const envelopes = transport.envelopes();
      expect(envelopes.map((e) => e.seq)).toEqual([3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
      expect(envelopes[envelopes.length - 1]?.type).toBe('final');
      expect(envelopes.every((e) => e.correlationId === started.correlationId)).toBe(true);
      expect(transport.writableEnded).toBe(true);
    });

    it('should stream live to a subscriber attached at the start', async () => {
      const { service, sessions } = createHarness();
      const started = service.start({ query: QUERY });
      const transport = new FakeTransport();
      sessions.get(started.sessionId)?.attach(transport, 0);

      await started.completion;

      expect(transport.seqs()).toHaveLength(13);
      expect(transport.envelopes()[0]?.type).toBe('status');
    });
  });

  describe('abort', () => {
    it('should abort a running advisory', async () => {
      const { service } = createHarness();
      const started = service.start({ query: QUERY });

      expect(service.abort(started.correlationId)).toBe(true);
      const outcome = await started.completion;

      expect(outcome).toEqual({ status: 'aborted', reason: 'client_abort' });
      expect(service.get(started.correlationId)?.status).toBe('aborted');
      expect(service.abort(started.correlationId)).toBe(false);
    });

    it('should refuse to abort an unknown advisory', () => {
      const { service } = createHarness();

      expect(service.abort('missing')).toBe(false);
    });
  });

  describe('challenge', () => {
    it('should revise a completed advisory with the challenge in the draft prompt', async () => {
      const { service, stack } = createHarness();
      const parent = service.start({ query: QUERY, accountScope: 'acct-1' });
      await parent.completion;

      const result = service.challenge(parent.correlationId, 'You ignored my bond ladder.');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const outcome = await result.value.completion;
      expect(outcome.status).toBe('done');

      const record = service.get(result.value.correlationId);
      expect(record?.parentCorrelationId).toBe(parent.correlationId);
      expect(record?.query).toBe(QUERY);
      expect(record?.accountScope).toBe('acct-1');

      const drafts = stack.small.calls.filter((call) => call.purpose === 'draft');
      const lastPrompt = drafts[drafts.length - 1]?.messages.map((m) => m.content).join('\n') ?? '';
      expect(lastPrompt).toContain('The user challenged the earlier thesis:\nYou ignored my bond ladder.');
    });

    it('should not challenge an unknown advisory', () => {
      const { service } = createHarness();

      const result = service.challenge('missing', 'Why?');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toEqual({ code: 'not_found', message: 'Advisory missing not found' });
    });

    it('should not challenge an advisory that is still running', async () => {
      const { service } = createHarness();
      const started = service.start({ query: QUERY });

      const result = service.challenge(started.correlationId, 'Why?');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('not_completed');
      await started.completion;
    });
  });
});
