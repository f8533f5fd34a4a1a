/**
 * Logging service exports
 */

export {
  logger,
  createLogger,
  createRequestLogger,
  logStartup,
  logShutdown,
  type Logger,
} from './logger.js';

export { loggers, startTimer } from './log-helpers.js';
