/**
 * Structured logging helpers for common event types
 */

import { logger } from './logger.js';

/**
 * Category-based logging helpers
 * Each helper logs one kind of event with a consistent shape
 */
export const loggers = {
  /**
   * Log orchestrator state machine transitions
   */
  stateTransition(correlationId: string, from: string, to: string, duration?: number) {
    logger.info({
      category: 'state_machine',
      correlationId,
      from,
      to,
      duration_ms: duration,
      event: 'transition',
    }, `State transition: ${from} -> ${to}`);
  },

  /**
   * Log model and agent calls with latency
   */
  agentCall(params: {
    correlationId?: string;
    agent: string;
    tier?: string;
    model: string;
    latency_ms: number;
    tokens?: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'info' : 'error';
    logger[level]({
      category: 'agent_call',
      event: 'llm_request',
      ...params,
    }, `Agent ${params.agent} ${params.success ? 'completed' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log structured-output validation results
   */
  schemaValidation(correlationId: string | undefined, type: string, valid: boolean, errors?: string[]) {
    if (valid) {
      logger.debug({
        category: 'validation',
        event: 'schema_valid',
        correlationId,
        type,
      }, `Schema validation passed: ${type}`);
    } else {
      logger.warn({
        category: 'validation',
        event: 'schema_invalid',
        correlationId,
        type,
        errors,
        error_count: errors?.length ?? 0,
      }, `Schema validation failed: ${type}`);
    }
  },

  /**
   * Log a routing decision of the entropy router
   */
  routing(params: {
    correlationId?: string;
    segmentIndex: number;
    entropy: number;
    threshold: number;
    routedTo: 'small' | 'large';
  }) {
    logger.debug({
      category: 'router',
      event: 'segment_routed',
      ...params,
    }, `Segment ${params.segmentIndex} -> ${params.routedTo} (H=${params.entropy.toFixed(3)})`);
  },

  /**
   * Log stream envelopes as they are written
   */
  streamEvent(sessionId: string, eventType: string, seq: number, delivered: boolean) {
    logger.debug({
      category: 'streaming',
      event: 'sse_publish',
      sessionId,
      eventType,
      seq,
      delivered,
    }, `Publishing ${eventType} #${seq}${delivered ? '' : ' (buffered)'}`);
  },

  /**
   * Log database operations
   */
  dbOperation(
    operation: string,
    table: string,
    latency_ms: number,
    success: boolean,
    rowCount?: number
  ) {
    logger.debug({
      category: 'database',
      event: 'db_query',
      operation,
      table,
      latency_ms,
      success,
      rowCount,
    }, `DB ${operation} on ${table}: ${latency_ms}ms`);
  },

  /**
   * Log errors with stack and context
   */
  error(message: string, error: unknown, context?: Record<string, unknown>) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({
      category: 'error',
      error: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      ...context,
    }, message);
  },

  /**
   * Log advisory lifecycle events
   */
  advisoryLifecycle(
    correlationId: string,
    event: 'started' | 'completed' | 'aborted' | 'failed',
    metadata?: Record<string, unknown>
  ) {
    logger.info({
      category: 'advisory_lifecycle',
      event: `advisory_${event}`,
      correlationId,
      ...metadata,
    }, `Advisory ${event}`);
  },

  /**
   * Log security-related events
   */
  security(event: string, details: Record<string, unknown>) {
    logger.warn({
      category: 'security',
      event: `security_${event}`,
      ...details,
    }, `Security event: ${event}`);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs and returns the elapsed time
 *
 * @example
 * const endTimer = startTimer();
 * await someOperation();
 * endTimer('operation_name', { correlationId });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}
