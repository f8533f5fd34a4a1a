/**
 * Express application factory
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createAdvisoryRouter } from './routes/advisory-routes.js';
import { createTraceRouter } from './routes/trace-routes.js';
import { createActionRouter } from './routes/action-routes.js';
import { requestLogger, errorLogger } from './middleware/request-logger.js';
import type { AdvisoryService } from './services/advisory/advisory-service.js';
import type { StreamSessionManager } from './services/stream/session-manager.js';
import type { ActionGate } from './services/decision/action-gate.js';
import type { TraceStore } from './types/trace.js';

export interface AppDependencies {
  advisories: AdvisoryService;
  sessions: StreamSessionManager;
  traceStore: TraceStore;
  actionGate: ActionGate;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // CORS: restrict to the frontend URL when configured
  app.use((req, res, next) => {
    const allowedOrigin = process.env.FRONTEND_URL || '*';
    res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Last-Event-ID');
    res.setHeader('Access-Control-Expose-Headers', 'Content-Type, Last-Event-ID');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  app.get('/health', (_req: Request, res: Response) => {
    const running = deps.advisories.getRunning();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      streamSessions: deps.sessions.getSessionCount(),
      attachedStreams: deps.sessions.getAttachedCount(),
      runningAdvisories: running.count,
      oldestRunningMs: running.oldestRunningMs,
    });
  });

  app.use('/api', createAdvisoryRouter({ advisories: deps.advisories, sessions: deps.sessions }));
  app.use('/api', createTraceRouter(deps.traceStore));
  app.use('/api', createActionRouter(deps.actionGate));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorLogger);

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' ? err.message : undefined,
    });
  });

  return app;
}
