/**
 * Advisory Routes
 * Start advisories, stream and resume their events, abort, fetch outcomes
 * and challenge a completed thesis.
 */

import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { openSseResponse } from '../services/stream/sse-format.js';
import { createLogger } from '../services/logging/index.js';
import type { AdvisoryService, StartedAdvisory } from '../services/advisory/advisory-service.js';
import type { StreamSessionManager } from '../services/stream/session-manager.js';

const logger = createLogger({ module: 'AdvisoryRoutes' });

const startSchema = z.object({
  query: z.string().trim().min(1, 'query is required').max(4000),
  accountScope: z.string().trim().min(1).max(200).optional(),
});

const challengeSchema = z.object({
  challenge: z.string().trim().min(1, 'challenge is required').max(4000),
});

export interface AdvisoryRouteDependencies {
  advisories: AdvisoryService;
  sessions: StreamSessionManager;
}

/**
 * Parse the resume point from ?lastAckedSeq or the Last-Event-ID header.
 * Returns undefined for anything that is not a non-negative integer.
 */
export function parseLastAckedSeq(req: Request): number | undefined {
  const fromQuery = req.query.lastAckedSeq;
  const raw = typeof fromQuery === 'string' ? fromQuery : req.get('last-event-id') ?? '0';
  if (!/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  return Number(raw.trim());
}

function startedBody(started: StartedAdvisory) {
  return {
    correlationId: started.correlationId,
    sessionId: started.sessionId,
    streamUrl: `/api/advisories/sessions/${started.sessionId}/stream`,
  };
}

export function createAdvisoryRouter(deps: AdvisoryRouteDependencies): express.Router {
  const router = express.Router();
  const { advisories, sessions } = deps;

  /**
   * POST /advisories
   * Start an advisory; orchestration continues in the background
   */
  router.post('/advisories', (req: Request, res: Response) => {
    const parsed = startSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    const started = advisories.start(parsed.data);
    res.status(202).json(startedBody(started));
  });

  /**
   * GET /advisories/sessions/:sessionId/stream
   * SSE stream; reconnect with lastAckedSeq (or Last-Event-ID) to resume
   */
  router.get('/advisories/sessions/:sessionId/stream', (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const lastAckedSeq = parseLastAckedSeq(req);

    if (lastAckedSeq === undefined) {
      res.status(400).json({ error: 'invalid_ack', message: 'lastAckedSeq must be a non-negative integer' });
      return;
    }

    const resolved = sessions.resolve(sessionId, lastAckedSeq);
    if (!resolved.ok) {
      const status = resolved.error.code === 'session_expired' ? 410 : 400;
      logger.info({ sessionId, lastAckedSeq, code: resolved.error.code }, 'Stream request rejected');
      res.status(status).json({ error: resolved.error.code, message: resolved.error.message });
      return;
    }

    const session = resolved.value;
    openSseResponse(res);
    const attached = session.attach(res, lastAckedSeq);
    if (!attached.ok) {
      res.end();
      return;
    }

    logger.info({ sessionId, lastAckedSeq, correlationId: session.correlationId }, 'SSE client connected');

    req.on('close', () => {
      logger.debug({ sessionId }, 'SSE client disconnected');
      session.detach(res);
    });

    res.on('error', (error) => {
      logger.error({ sessionId, error }, 'SSE stream error');
      session.detach(res);
    });
  });

  /**
   * POST /advisories/:correlationId/abort
   */
  router.post('/advisories/:correlationId/abort', (req: Request, res: Response) => {
    const { correlationId } = req.params;
    const record = advisories.get(correlationId);
    if (!record) {
      res.status(404).json({ error: 'Advisory not found', correlationId });
      return;
    }
    if (!advisories.abort(correlationId)) {
      res.status(409).json({ error: 'Advisory is not running', correlationId, status: record.status });
      return;
    }
    res.status(202).json({ correlationId, aborting: true });
  });

  /**
   * GET /advisories/:correlationId
   * Stored outcome of an advisory
   */
  router.get('/advisories/:correlationId', (req: Request, res: Response) => {
    const { correlationId } = req.params;
    const record = advisories.get(correlationId);
    if (!record) {
      res.status(404).json({ error: 'Advisory not found', correlationId });
      return;
    }
    res.json(record);
  });

  /**
   * POST /advisories/:correlationId/challenge
   * Re-run a completed advisory against the user's challenge
   */
  router.post('/advisories/:correlationId/challenge', (req: Request, res: Response) => {
    const { correlationId } = req.params;
    const parsed = challengeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    const started = advisories.challenge(correlationId, parsed.data.challenge);
    if (!started.ok) {
      const status = started.error.code === 'not_found' ? 404 : 409;
      res.status(status).json({ error: started.error.message, correlationId });
      return;
    }
    res.status(202).json({ ...startedBody(started.value), parentCorrelationId: correlationId });
  });

  return router;
}
