/**
 * Trace Routes
 * Read the hop-by-hop trace of an advisory
 */

import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { createLogger } from '../services/logging/index.js';
import type { TraceStore } from '../types/trace.js';

const logger = createLogger({ module: 'TraceRoutes' });

const correlationIdSchema = z.string().uuid();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export function createTraceRouter(traceStore: TraceStore): express.Router {
  const router = express.Router();

  /**
   * GET /traces
   * Recently started requests, newest first
   */
  router.get('/traces', async (req: Request, res: Response) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid query',
        details: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }
    try {
      const traces = await traceStore.listRecent(parsed.data.limit);
      res.json({ traces });
    } catch (error) {
      logger.error({ error }, 'Failed to list traces');
      res.status(500).json({
        error: 'Failed to list traces',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  /**
   * GET /traces/:correlationId
   * Trace records ordered by hop index
   */
  router.get('/traces/:correlationId', async (req: Request, res: Response) => {
    const { correlationId } = req.params;
    // correlation ids are always issued as uuids; anything else was never recorded
    if (!correlationIdSchema.safeParse(correlationId).success) {
      res.status(404).json({ error: 'No trace recorded', correlationId });
      return;
    }
    try {
      const records = await traceStore.getTrace(correlationId);
      if (records.length === 0) {
        res.status(404).json({ error: 'No trace recorded', correlationId });
        return;
      }
      res.json({ correlationId, hops: records.length, records });
    } catch (error) {
      logger.error({ correlationId, error }, 'Failed to read trace');
      res.status(500).json({
        error: 'Failed to read trace',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return router;
}
