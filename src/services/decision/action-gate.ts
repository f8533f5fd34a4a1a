/**
 * Sensitive-action gate.
 *
 * The advisory core only ever proposes side-effecting actions. A proposal is
 * forwarded to the external ActionSink only after a signed authorization
 * token bound to that proposal has been verified.
 *
 * Records live in memory. Past the capacity, decided records go first,
 * oldest first; a pending proposal is dropped only when nothing decided is left.
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger, loggers } from '../logging/index.js';
import { advisoryConfig, type ActionConfig } from '../../config/advisory.js';
import { err, ok, type Result } from '../../types/result.js';
import type { ActionProposal, ActionStatus } from '../../types/decision.js';
import type { Intent } from '../../types/specialist.js';

const logger = createLogger({ module: 'action-gate' });

export const AUTHORIZE_SCOPE = 'action:authorize';

const TRADE_PATTERN = /\b(buy|sell|short|add to|trim|exit|rebalance|accumulate|reduce)\b/i;

const claimsSchema = z.object({
  sub: z.string(),
  scope: z.literal(AUTHORIZE_SCOPE),
  approver: z.string().min(1),
});

export interface ActionAuthorization {
  proposalId: string;
  approver: string;
  authorizedAt: string;
}

/**
 * External boundary that performs the real-world side effect
 */
export interface ActionSink {
  submit(proposal: ActionProposal, authorization: ActionAuthorization): Promise<void>;
}

/**
 * Default sink: records the hand-off and performs nothing
 */
export class LoggingActionSink implements ActionSink {
  async submit(proposal: ActionProposal, authorization: ActionAuthorization): Promise<void> {
    logger.info({ proposalId: proposal.proposalId, correlationId: proposal.correlationId, approver: authorization.approver }, 'Action handed to external sink');
  }
}

export interface ActionRecord {
  proposal: ActionProposal;
  status: ActionStatus;
  authorization?: ActionAuthorization;
}

export type ActionGateErrorCode = 'not_found' | 'invalid_token' | 'already_processed' | 'sink_failed';

export interface ActionGateError {
  code: ActionGateErrorCode;
  message: string;
}

export interface ProposalInput {
  correlationId: string;
  intent: Intent;
  ticker?: string;
  thesis: string;
  confidence: number;
  /** A refutation left standing blocks any proposal */
  unresolvedObjection?: string;
}

/**
 * Whether a thesis recommends a trade and so needs a human decision
 */
export function requiresHumanApproval(intent: Intent, thesis: string): boolean {
  return intent === 'trade_idea' || TRADE_PATTERN.test(thesis);
}

export class ActionGate {
  private readonly records = new Map<string, ActionRecord>();

  constructor(
    private readonly sink: ActionSink = new LoggingActionSink(),
    private readonly config: ActionConfig = advisoryConfig.actions,
    private readonly capacity: number = 1000
  ) {}

  propose(input: ProposalInput): ActionProposal | undefined {
    if (input.intent !== 'trade_idea' || input.unresolvedObjection) {
      return undefined;
    }
    if (!TRADE_PATTERN.test(input.thesis)) {
      return undefined;
    }

    const proposal: ActionProposal = {
      proposalId: uuidv4(),
      correlationId: input.correlationId,
      kind: 'trade',
      ticker: input.ticker,
      summary: input.thesis.length > 280 ? `${input.thesis.slice(0, 277)}...` : input.thesis,
      confidence: input.confidence,
      createdAt: new Date().toISOString(),
    };
    Object.freeze(proposal);
    this.records.set(proposal.proposalId, { proposal, status: 'pending_authorization' });
    this.evict();
    logger.info({ proposalId: proposal.proposalId, correlationId: input.correlationId }, 'Action proposed');
    return proposal;
  }

  get(proposalId: string): ActionRecord | undefined {
    return this.records.get(proposalId);
  }

  /**
   * Issue a signed approval token for a proposal.
   * Meant for the external authorizer; the core never calls it on its own.
   */
  issueToken(proposalId: string, approver: string, expiresInSeconds: number = 600): string {
    return jwt.sign({ scope: AUTHORIZE_SCOPE, approver }, this.config.tokenSecret, {
      subject: proposalId,
      issuer: this.config.issuer,
      audience: this.config.audience,
      expiresIn: expiresInSeconds,
    });
  }

  async authorize(proposalId: string, token: string): Promise<Result<ActionRecord, ActionGateError>> {
    const record = this.records.get(proposalId);
    if (!record) {
      return err({ code: 'not_found', message: `Proposal ${proposalId} not found` });
    }
    if (record.status !== 'pending_authorization') {
      return err({ code: 'already_processed', message: `Proposal is ${record.status}` });
    }

    const claims = this.verify(token, proposalId);
    if (!claims) {
      loggers.security('action_token_rejected', { proposalId, correlationId: record.proposal.correlationId });
      return err({ code: 'invalid_token', message: 'Authorization token is invalid for this proposal' });
    }

    const authorization: ActionAuthorization = {
      proposalId,
      approver: claims.approver,
      authorizedAt: new Date().toISOString(),
    };
    record.status = 'authorized';
    record.authorization = authorization;

    try {
      await this.sink.submit(record.proposal, authorization);
      record.status = 'forwarded';
      return ok(record);
    } catch (error) {
      record.status = 'rejected';
      loggers.error('Action sink failed', error, { proposalId });
      return err({ code: 'sink_failed', message: error instanceof Error ? error.message : String(error) });
    }
  }

  private evict(): void {
    for (const [proposalId, record] of this.records) {
      if (this.records.size <= this.capacity) return;
      if (record.status !== 'pending_authorization') this.records.delete(proposalId);
    }
    for (const proposalId of this.records.keys()) {
      if (this.records.size <= this.capacity) return;
      this.records.delete(proposalId);
      logger.warn({ proposalId, capacity: this.capacity }, 'Pending proposal evicted unanswered');
    }
  }

  private verify(token: string, proposalId: string): z.infer<typeof claimsSchema> | undefined {
    try {
      const decoded = jwt.verify(token, this.config.tokenSecret, {
        issuer: this.config.issuer,
        audience: this.config.audience,
        subject: proposalId,
        algorithms: ['HS256'],
      });
      const parsed = claimsSchema.safeParse(decoded);
      return parsed.success ? parsed.data : undefined;
    } catch (error) {
      logger.debug({ proposalId, reason: error instanceof Error ? error.name : 'unknown' }, 'Token verification failed');
      return undefined;
    }
  }
}
