/**
 * HTTP request logging middleware
 * Logs incoming requests and completed responses with duration
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logging/logger.js';

/**
 * Request logger middleware. The request id is kept in res.locals.requestId.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const requestId = `req_${uuidv4()}`;
  res.locals.requestId = requestId;

  logger.info({
    category: 'http',
    event: 'request_received',
    requestId,
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  }, `${req.method} ${req.path}`);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = getLogLevel(res.statusCode);

    logger[level]({
      category: 'http',
      event: 'request_completed',
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration_ms: duration,
    }, `${req.method} ${req.path} ${res.statusCode} (${duration}ms)`);
  });

  next();
}

function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * Error logging middleware. Logs and passes the error on.
 */
export function errorLogger(err: Error, req: Request, res: Response, next: NextFunction): void {
  const requestId: unknown = res.locals.requestId;

  logger.error({
    category: 'http',
    event: 'unhandled_error',
    requestId: typeof requestId === 'string' ? requestId : 'unknown',
    method: req.method,
    path: req.path,
    error: {
      message: err.message,
      stack: err.stack,
      name: err.name,
    },
  }, `Unhandled error: ${err.message}`);

  next(err);
}
