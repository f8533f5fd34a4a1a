/**
 * HTTP API Tests
 * Exercises the express app with a scripted orchestration stack
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../src/app.js';
import { AdvisoryService } from '../src/services/advisory/advisory-service.js';
import { AdvisoryStore } from '../src/services/advisory/advisory-store.js';
import { OrchestratorRegistry } from '../src/services/advisory/orchestrator-registry.js';
import { StreamSessionManager } from '../src/services/stream/session-manager.js';
import { MemoryTraceStore } from '../src/services/telemetry/memory-trace-store.js';
import type { StreamEnvelope } from '../src/types/stream.js';
import { buildStack, type Stack, type StackOptions } from './helpers/advisory-stack.js';
import { parseFrame } from './helpers/fake-transport.js';

interface TestApp {
  app: ReturnType<typeof createApp>;
  advisories: AdvisoryService;
  sessions: StreamSessionManager;
  stack: Stack;
}

const opened: TestApp[] = [];

function createTestApp(options: StackOptions = {}): TestApp {
  const stack = buildStack(options);
  const sessions = new StreamSessionManager({ idleMs: 60000, heartbeatMs: 0, sweepIntervalMs: 0 });
  const traceStore = new MemoryTraceStore();
  const advisories = new AdvisoryService({
    sessions,
    traceStore,
    store: new AdvisoryStore(),
    registry: new OrchestratorRegistry(),
    orchestrator: stack.deps,
  });
  const app = createApp({ advisories, sessions, traceStore, actionGate: stack.actionGate });
  const testApp = { app, advisories, sessions, stack };
  opened.push(testApp);
  return testApp;
}

function framesOf(text: string): StreamEnvelope[] {
  return text
    .split('\n\n')
    .filter((frame) => frame.startsWith('id: '))
    .map(parseFrame);
}

async function startAndFinish(testApp: TestApp, query: string = 'Is the semiconductor rally sustainable?') {
  const res = await request(testApp.app).post('/api/advisories').send({ query });
  expect(res.status).toBe(202);
  const correlationId: string = res.body.correlationId;
  const sessionId: string = res.body.sessionId;
  await vi.waitFor(() => {
    expect(testApp.advisories.get(correlationId)?.status).not.toBe('running');
  });
  // the trace is flushed just after the record settles
  await vi.waitFor(async () => {
    expect(await testApp.advisories.getTrace(correlationId)).not.toHaveLength(0);
  });
  return { correlationId, sessionId, body: res.body };
}

describe('Advisory API', () => {
  afterEach(() => {
    for (const testApp of opened.splice(0)) testApp.sessions.shutdown();
  });

  describe('POST /api/advisories', () => {
    it('should accept a question and return the stream location', async () => {
      const testApp = createTestApp();

      const { correlationId, sessionId, body } = await startAndFinish(testApp);

      expect(body).toEqual({
        correlationId,
        sessionId,
        streamUrl: `/api/advisories/sessions/${sessionId}/stream`,
      });
    });

    it('should reject an empty query', async () => {
      const { app } = createTestApp();

      const res = await request(app).post('/api/advisories').send({ query: '   ' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Invalid request body', details: ['query is required'] });
    });
  });

  describe('GET /api/advisories/sessions/:sessionId/stream', () => {
    it('should replay the stream after lastAckedSeq and end after the final event', async () => {
      const testApp = createTestApp();
      const { sessionId } = await startAndFinish(testApp);

      const res = await request(testApp.app).get(`/api/advisories/sessions/${sessionId}/stream?lastAckedSeq=10`);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toContain('text/event-stream');
      const frames = framesOf(res.text);
      expect(frames.map((f) => f.seq)).toEqual([11, 12, 13]);
      expect(frames.map((f) => f.type)).toEqual(['debate_turn', 'status', 'final']);
    });

    it('should resume from the Last-Event-ID header', async () => {
      const testApp = createTestApp();
      const { sessionId } = await startAndFinish(testApp);

      const res = await request(testApp.app)
        .get(`/api/advisories/sessions/${sessionId}/stream`)
        .set('Last-Event-ID', '12');

      expect(framesOf(res.text).map((f) => f.seq)).toEqual([13]);
    });

    it('should answer 410 for an unknown session', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/advisories/sessions/missing/stream');

      expect(res.status).toBe(410);
      expect(res.body).toEqual({ error: 'session_expired', message: 'Session missing is unknown or has expired' });
    });

    it('should answer 400 for a malformed resume point', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/advisories/sessions/missing/stream?lastAckedSeq=abc');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('invalid_ack');
    });

    it('should answer 400 for a resume point beyond the last event', async () => {
      const testApp = createTestApp();
      const { sessionId } = await startAndFinish(testApp);

      const res = await request(testApp.app).get(`/api/advisories/sessions/${sessionId}/stream?lastAckedSeq=99`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'invalid_ack', message: 'lastAckedSeq 99 is outside 0..13' });
    });
  });

  describe('GET /api/advisories/:correlationId', () => {
    it('should return the stored outcome', async () => {
      const testApp = createTestApp();
      const { correlationId } = await startAndFinish(testApp);

      const res = await request(testApp.app).get(`/api/advisories/${correlationId}`);

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('done');
      expect(res.body.context.thesis).toBe('Thesis point one holds. Thesis point two holds. Thesis point three holds.');
    });

    it('should answer 404 for an unknown advisory', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/advisories/missing');

      expect(res.status).toBe(404);
    });
  });

  describe('POST /api/advisories/:correlationId/abort', () => {
    it('should answer 409 for a finished advisory', async () => {
      const testApp = createTestApp();
      const { correlationId } = await startAndFinish(testApp);

      const res = await request(testApp.app).post(`/api/advisories/${correlationId}/abort`);

      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'Advisory is not running', correlationId, status: 'done' });
    });

    it('should answer 404 for an unknown advisory', async () => {
      const { app } = createTestApp();

      const res = await request(app).post('/api/advisories/missing/abort');

      expect(res.status).toBe(404);
    });
  });

  describe('POST /api/advisories/:correlationId/challenge', () => {
    it('should start a revision of a completed advisory', async () => {
      const testApp = createTestApp();
      const { correlationId } = await startAndFinish(testApp);

      const res = await request(testApp.app)
        .post(`/api/advisories/${correlationId}/challenge`)
        .send({ challenge: 'What about export controls?' });

      expect(res.status).toBe(202);
      expect(res.body.parentCorrelationId).toBe(correlationId);
      const childId: string = res.body.correlationId;
      await vi.waitFor(() => {
        expect(testApp.advisories.get(childId)?.status).toBe('done');
      });
    });

    it('should answer 404 for an unknown advisory', async () => {
      const { app } = createTestApp();

      const res = await request(app).post('/api/advisories/missing/challenge').send({ challenge: 'Why?' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Advisory missing not found', correlationId: 'missing' });
    });

    it('should reject an empty challenge', async () => {
      const { app } = createTestApp();

      const res = await request(app).post('/api/advisories/missing/challenge').send({});

      expect(res.status).toBe(400);
    });
  });

  describe('GET /api/traces/:correlationId', () => {
    it('should return the ordered hops', async () => {
      const testApp = createTestApp();
      const { correlationId } = await startAndFinish(testApp);
      await vi.waitFor(async () => {
        expect(await testApp.advisories.getTrace(correlationId)).toHaveLength(7);
      });

      const res = await request(testApp.app).get(`/api/traces/${correlationId}`);

      expect(res.status).toBe(200);
      expect(res.body.hops).toBe(7);
      expect(res.body.records.map((r: { hopIndex: number }) => r.hopIndex)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    });

    it('should answer 404 when nothing was recorded', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/traces/missing');

      expect(res.status).toBe(404);
    });

    it('should answer 404 for an id that was never issued without reading the store', async () => {
      const testApp = createTestApp();
      const traceStore = new MemoryTraceStore();
      const getTrace = vi.spyOn(traceStore, 'getTrace').mockRejectedValue(new Error('invalid input syntax for type uuid'));
      const app = createApp({
        advisories: testApp.advisories,
        sessions: testApp.sessions,
        traceStore,
        actionGate: testApp.stack.actionGate,
      });

      const res = await request(app).get('/api/traces/not-a-uuid');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'No trace recorded', correlationId: 'not-a-uuid' });
      expect(getTrace).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/traces', () => {
    it('should list finished requests with their hop counts', async () => {
      const testApp = createTestApp();
      const { correlationId } = await startAndFinish(testApp);
      await vi.waitFor(async () => {
        expect(await testApp.advisories.getTrace(correlationId)).toHaveLength(7);
      });

      const res = await request(testApp.app).get('/api/traces?limit=5');

      expect(res.status).toBe(200);
      expect(res.body.traces).toHaveLength(1);
      expect(res.body.traces[0].correlationId).toBe(correlationId);
      expect(res.body.traces[0].hops).toBe(7);
    });

    it('should reject a limit out of range', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/traces?limit=0');

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid query');
    });
  });

  describe('actions', () => {
    it('should authorize a proposed trade with a valid token', async () => {
      const testApp = createTestApp({
        intent: { intent: 'trade_idea', specialists: ['quant'], ticker: 'NVDA' },
        specialists: { quant: { kind: 'succeed' } },
        draft: () => ({ segments: [{ text: 'Trim NVDA into strength.', entropy: 0.1 }] }),
      });
      const { correlationId } = await startAndFinish(testApp, 'Should I trim NVDA?');
      const proposalId: string = testApp.advisories.get(correlationId)?.context?.actionProposal?.proposalId ?? '';
      expect(proposalId).not.toBe('');

      const pending = await request(testApp.app).get(`/api/actions/${proposalId}`);
      expect(pending.body.status).toBe('pending_authorization');

      const refused = await request(testApp.app)
        .post(`/api/actions/${proposalId}/authorize`)
        .send({ token: 'not-a-token' });
      expect(refused.status).toBe(401);

      const token = testApp.stack.actionGate.issueToken(proposalId, 'advisor-7');
      const authorized = await request(testApp.app).post(`/api/actions/${proposalId}/authorize`).send({ token });
      expect(authorized.status).toBe(200);
      expect(authorized.body.status).toBe('forwarded');

      const again = await request(testApp.app).post(`/api/actions/${proposalId}/authorize`).send({ token });
      expect(again.status).toBe(409);
    });

    it('should answer 404 for an unknown proposal', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/api/actions/missing');

      expect(res.status).toBe(404);
    });
  });

  describe('service endpoints', () => {
    it('should report health', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', streamSessions: 0, attachedStreams: 0, runningAdvisories: 0, oldestRunningMs: 0 });
    });

    it('should answer 404 for unknown routes', async () => {
      const { app } = createTestApp();

      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found', path: '/nope' });
    });
  });
});
