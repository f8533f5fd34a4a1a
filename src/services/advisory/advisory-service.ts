/**
 * Advisory Service
 *
 * Wires one advisory request together: a correlation id, a stream session
 * with its event channel and publisher, a trace recorder, and the
 * orchestrator running in the background.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger, createRequestLogger, loggers } from '../logging/index.js';
import { AdvisoryOrchestrator, type OrchestrationOutcome, type OrchestratorDependencies } from '../decision/advisory-orchestrator.js';
import { EventChannel } from '../stream/event-channel.js';
import { StreamPublisher } from '../stream/stream-publisher.js';
import { TraceRecorder } from '../telemetry/trace-recorder.js';
import { err, ok, type Result } from '../../types/result.js';
import type { StreamSessionManager } from '../stream/session-manager.js';
import type { AdvisoryStore, AdvisoryRecord } from './advisory-store.js';
import type { OrchestratorRegistry, RunningSummary } from './orchestrator-registry.js';
import type { StreamEvent } from '../../types/stream.js';
import type { TraceRecord, TraceStore } from '../../types/trace.js';

const logger = createLogger({ module: 'AdvisoryService' });

export interface StartAdvisoryInput {
  query: string;
  accountScope?: string;
}

export interface StartedAdvisory {
  correlationId: string;
  sessionId: string;
  /** Settles when the orchestration and its trace writes are finished */
  completion: Promise<OrchestrationOutcome>;
}

export type ChallengeErrorCode = 'not_found' | 'not_completed';

export interface ChallengeError {
  code: ChallengeErrorCode;
  message: string;
}

export interface AdvisoryServiceDependencies {
  sessions: StreamSessionManager;
  traceStore: TraceStore;
  store: AdvisoryStore;
  registry: OrchestratorRegistry;
  orchestrator: OrchestratorDependencies;
  now?: () => number;
}

export class AdvisoryService {
  private readonly now: () => number;

  constructor(private readonly deps: AdvisoryServiceDependencies) {
    this.now = deps.now ?? Date.now;
  }

  start(input: StartAdvisoryInput): StartedAdvisory {
    return this.launch({ query: input.query, accountScope: input.accountScope });
  }

  /**
   * Start a revision of a completed advisory carrying the user's challenge
   */
  challenge(correlationId: string, challenge: string): Result<StartedAdvisory, ChallengeError> {
    const parent = this.deps.store.get(correlationId);
    if (!parent) {
      return err({ code: 'not_found', message: `Advisory ${correlationId} not found` });
    }
    if (parent.status !== 'done' || !parent.context) {
      return err({ code: 'not_completed', message: `Advisory ${correlationId} is ${parent.status}` });
    }
    return ok(
      this.launch({
        query: parent.query,
        accountScope: parent.accountScope,
        priorThesis: parent.context.thesis,
        challenge,
        parentCorrelationId: correlationId,
      })
    );
  }

  /**
   * Request cancellation of a running advisory
   * @returns false when nothing is running under that id
   */
  abort(correlationId: string): boolean {
    return this.deps.registry.stop(correlationId, 'client_abort');
  }

  get(correlationId: string): AdvisoryRecord | undefined {
    return this.deps.store.get(correlationId);
  }

  async getTrace(correlationId: string): Promise<TraceRecord[]> {
    return this.deps.traceStore.getTrace(correlationId);
  }

  getRunning(): RunningSummary {
    return this.deps.registry.summary();
  }

  private launch(request: {
    query: string;
    accountScope?: string;
    priorThesis?: string;
    challenge?: string;
    parentCorrelationId?: string;
  }): StartedAdvisory {
    const correlationId = uuidv4();
    const session = this.deps.sessions.create(correlationId);
    const channel = new EventChannel<StreamEvent>();
    const publisher = new StreamPublisher(session, channel);
    const recorder = new TraceRecorder(correlationId, this.deps.traceStore, this.now);

    const orchestrator = new AdvisoryOrchestrator(
      {
        correlationId,
        query: request.query,
        accountScope: request.accountScope,
        priorThesis: request.priorThesis,
        challenge: request.challenge,
      },
      this.deps.orchestrator,
      (event) => {
        if (!channel.push(event)) {
          logger.debug({ correlationId, type: event.type }, 'Channel closed, event dropped');
        }
      },
      recorder
    );

    this.deps.registry.register(correlationId, orchestrator);
    this.deps.store.create(
      {
        correlationId,
        sessionId: session.sessionId,
        query: request.query,
        accountScope: request.accountScope,
        parentCorrelationId: request.parentCorrelationId,
      },
      this.now()
    );

    const publishing = publisher.run().catch((error: unknown) => {
      loggers.error('Stream publisher failed', error, { correlationId, sessionId: session.sessionId });
      return 0;
    });

    const completion = orchestrator
      .run()
      .then((outcome) => {
        this.settle(correlationId, outcome);
        return outcome;
      })
      .finally(async () => {
        this.deps.registry.release(correlationId);
        channel.close();
        await Promise.all([publishing, recorder.flush()]);
      });

    // Observed here so an unexpected rejection is logged even when no caller awaits completion
    completion.catch((error: unknown) => {
      loggers.error('Advisory run rejected', error, { correlationId });
    });

    createRequestLogger(correlationId).info({ sessionId: session.sessionId, challenge: Boolean(request.challenge) }, 'Advisory started');
    return { correlationId, sessionId: session.sessionId, completion };
  }

  private settle(correlationId: string, outcome: OrchestrationOutcome): void {
    switch (outcome.status) {
      case 'done':
        this.deps.store.complete(correlationId, outcome.context, this.now());
        return;
      case 'failed':
        this.deps.store.close(correlationId, 'failed', { reason: outcome.reason, message: outcome.message }, this.now());
        return;
      case 'aborted':
        this.deps.store.close(correlationId, 'aborted', { reason: outcome.reason }, this.now());
        return;
    }
  }
}
