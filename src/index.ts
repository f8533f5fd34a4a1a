/**
 * Advisory orchestrator server
 * Main entry point
 */

// Environment is loaded by config/env.js; LLM config is validated when it loads
import { llmConfig } from './config/llm.js';
import { advisoryConfig, validateAdvisoryConfig } from './config/advisory.js';
import { createApp } from './app.js';
import { createModelGateway } from './services/llm/index.js';
import { createDefaultRegistry } from './services/specialists/index.js';
import { RStitchRouter } from './services/router/rstitch-router.js';
import { IntentClassifier, ProposerAgent, CriticAgent } from './services/agents/index.js';
import { ActionGate, LoggingActionSink } from './services/decision/action-gate.js';
import { StreamSessionManager } from './services/stream/index.js';
import { MemoryTraceStore, PgTraceStore } from './services/telemetry/index.js';
import { AdvisoryService } from './services/advisory/advisory-service.js';
import { AdvisoryStore } from './services/advisory/advisory-store.js';
import { OrchestratorRegistry } from './services/advisory/orchestrator-registry.js';
import { closePool, runMigrationsOnStartup } from './db/index.js';
import { logger, logShutdown, logStartup } from './services/logging/index.js';
import type { TraceStore } from './types/trace.js';

const PORT = process.env.PORT || 3001;
const usePostgres = (process.env.TRACE_STORE || 'postgres') === 'postgres';

validateAdvisoryConfig(advisoryConfig);

const gateway = createModelGateway(llmConfig);
const traceStore: TraceStore = usePostgres ? new PgTraceStore() : new MemoryTraceStore();
const sessions = new StreamSessionManager({
  idleMs: advisoryConfig.stream.sessionIdleMs,
  heartbeatMs: advisoryConfig.stream.heartbeatMs,
  sweepIntervalMs: advisoryConfig.stream.sweepIntervalMs,
});
const actionGate = new ActionGate(new LoggingActionSink(), advisoryConfig.actions);
const registry = new OrchestratorRegistry();

const advisories = new AdvisoryService({
  sessions,
  traceStore,
  registry,
  store: new AdvisoryStore(),
  orchestrator: {
    classifier: new IntentClassifier(gateway),
    specialists: createDefaultRegistry(gateway),
    proposer: new ProposerAgent(new RStitchRouter(gateway, advisoryConfig.router)),
    critic: new CriticAgent(gateway),
    actionGate,
    orchestration: advisoryConfig.orchestration,
    confidence: advisoryConfig.confidence,
  },
});

const app = createApp({ advisories, sessions, traceStore, actionGate });

let server: ReturnType<typeof app.listen> | null = null;

/**
 * Start the server. Runs database migrations first when traces go to Postgres.
 */
async function start(): Promise<void> {
  try {
    if (usePostgres) {
      const migrationResult = await runMigrationsOnStartup();
      if (!migrationResult.success) {
        logger.error({ error: migrationResult.error }, 'Database migration failed - server not started');
        process.exit(1);
      }
      if (migrationResult.applied.length > 0) {
        logger.info({ applied: migrationResult.applied }, 'Database migrations applied successfully');
      }
    }

    sessions.start();

    server = app.listen(PORT, () => {
      logStartup(PORT);
      logger.info({ small: gateway.describe('small'), large: gateway.describe('large'), traceStore: usePostgres ? 'postgres' : 'memory' }, 'Advisory services ready');
    });

    server.on('error', (error: Error) => {
      logger.error({ error }, 'Server error');
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown: stop running advisories, close streams, then the pool
 */
async function shutdown(signal: string): Promise<void> {
  logShutdown(signal);

  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');
    });
  }

  try {
    const stopped = registry.stopAll('server_shutdown');
    logger.info({ stopped }, 'Running advisories stopped');
    sessions.shutdown();
    await gateway.shutdown();
    if (usePostgres) {
      await closePool();
    }
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

void start();
