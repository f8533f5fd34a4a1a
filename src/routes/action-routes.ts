/**
 * Action Routes
 * Inspect proposed actions and authorize them with a signed token
 */

import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import { createLogger } from '../services/logging/index.js';
import type { ActionGate, ActionGateErrorCode } from '../services/decision/action-gate.js';

const logger = createLogger({ module: 'ActionRoutes' });

const authorizeSchema = z.object({
  token: z.string().min(1, 'token is required'),
});

const STATUS_BY_CODE: Record<ActionGateErrorCode, number> = {
  not_found: 404,
  invalid_token: 401,
  already_processed: 409,
  sink_failed: 502,
};

export function createActionRouter(gate: ActionGate): express.Router {
  const router = express.Router();

  /**
   * GET /actions/:proposalId
   */
  router.get('/actions/:proposalId', (req: Request, res: Response) => {
    const record = gate.get(req.params.proposalId);
    if (!record) {
      res.status(404).json({ error: 'Proposal not found', proposalId: req.params.proposalId });
      return;
    }
    res.json(record);
  });

  /**
   * POST /actions/:proposalId/authorize
   * Forward a proposal to the action sink once a valid token is presented
   */
  router.post('/actions/:proposalId/authorize', async (req: Request, res: Response) => {
    const { proposalId } = req.params;
    const parsed = authorizeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    const result = await gate.authorize(proposalId, parsed.data.token);
    if (!result.ok) {
      logger.info({ proposalId, code: result.error.code }, 'Authorization refused');
      res.status(STATUS_BY_CODE[result.error.code]).json({ error: result.error.code, message: result.error.message });
      return;
    }
    res.json(result.value);
  });

  return router;
}
