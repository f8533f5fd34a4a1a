/**
 * Structured logging using Pino.
 * JSON output in production, pretty-printed in development.
 */

import pino from 'pino';

const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * Production configuration (JSON for log aggregation)
 */
const productionConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

// Tests run without a transport so no worker thread outlives the run
const testConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'silent',
};

function selectConfig(): pino.LoggerOptions {
  if (process.env.NODE_ENV === 'production') return productionConfig;
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) return testConfig;
  return developmentConfig;
}

export const logger = pino(selectConfig());

export type Logger = pino.Logger;

/**
 * Create a child logger bound to one advisory request
 * @param correlationId - Correlation id shared by the stream and the trace
 */
export function createRequestLogger(correlationId: string): Logger {
  return logger.child({ correlationId, context: 'advisory' });
}

/**
 * Create a child logger with custom context
 * @param context - Arbitrary context object to attach to all logs
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function logStartup(port: number | string): void {
  logger.info(
    {
      port,
      nodeEnv: process.env.NODE_ENV,
      nodeVersion: process.version,
      logLevel: logger.level,
    },
    'Server starting'
  );
}

export function logShutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down gracefully');
}
