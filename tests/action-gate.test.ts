/**
 * Action Gate Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import {
  ActionGate,
  AUTHORIZE_SCOPE,
  requiresHumanApproval,
  type ActionSink,
  type ProposalInput,
} from '../src/services/decision/action-gate.js';
import { createDecisionContext } from '../src/services/decision/decision-context.js';
import type { ActionProposal } from '../src/types/decision.js';

const config = { tokenSecret: 'test-secret', issuer: 'advisory-orchestrator', audience: 'advisory-actions' };

const tradeInput: ProposalInput = {
  correlationId: 'corr-1',
  intent: 'trade_idea',
  ticker: 'NVDA',
  thesis: 'Trim NVDA into strength and rebalance toward cash.',
  confidence: 0.8,
};

function recordingSink(): ActionSink & { submitted: ActionProposal[] } {
  const submitted: ActionProposal[] = [];
  return {
    submitted,
    async submit(proposal) {
      submitted.push(proposal);
    },
  };
}

function proposeOrFail(gate: ActionGate, input: ProposalInput = tradeInput): ActionProposal {
  const proposal = gate.propose(input);
  if (!proposal) throw new Error('expected a proposal');
  return proposal;
}

describe('requiresHumanApproval', () => {
  it('should require approval for trade ideas and trade language', () => {
    expect(requiresHumanApproval('trade_idea', 'Hold steady.')).toBe(true);
    expect(requiresHumanApproval('market_analysis', 'Consider whether to sell covered calls.')).toBe(true);
    expect(requiresHumanApproval('educational', 'A bond pays a coupon.')).toBe(false);
  });
});

describe('ActionGate', () => {
  describe('propose', () => {
    it('should propose a trade for a trade idea with trade language', () => {
      const gate = new ActionGate(recordingSink(), config);

      const proposal = proposeOrFail(gate);

      expect(proposal).toMatchObject({
        correlationId: 'corr-1',
        kind: 'trade',
        ticker: 'NVDA',
        summary: 'Trim NVDA into strength and rebalance toward cash.',
        confidence: 0.8,
      });
      expect(Object.isFrozen(proposal)).toBe(true);
      expect(gate.get(proposal.proposalId)?.status).toBe('pending_authorization');
    });

    it('should not propose outside trade ideas', () => {
      const gate = new ActionGate(recordingSink(), config);

      expect(gate.propose({ ...tradeInput, intent: 'market_analysis' })).toBeUndefined();
    });

    it('should not propose when the thesis names no trade', () => {
      const gate = new ActionGate(recordingSink(), config);

      expect(gate.propose({ ...tradeInput, thesis: 'Valuation looks stretched.' })).toBeUndefined();
    });

    it('should not propose while an objection stands', () => {
      const gate = new ActionGate(recordingSink(), config);

      expect(gate.propose({ ...tradeInput, unresolvedObjection: 'Guidance was cut.' })).toBeUndefined();
    });

    it('should shorten long theses in the summary', () => {
      const gate = new ActionGate(recordingSink(), config);

      const proposal = proposeOrFail(gate, { ...tradeInput, thesis: `Buy ${'x'.repeat(400)}` });

      expect(proposal.summary).toHaveLength(280);
      expect(proposal.summary.endsWith('...')).toBe(true);
    });
  });

  describe('authorize', () => {
    it('should forward a proposal with a valid token', async () => {
      const sink = recordingSink();
      const gate = new ActionGate(sink, config);
      const proposal = proposeOrFail(gate);
      const token = gate.issueToken(proposal.proposalId, 'advisor-7');

      const result = await gate.authorize(proposal.proposalId, token);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.status).toBe('forwarded');
        expect(result.value.authorization?.approver).toBe('advisor-7');
      }
      expect(sink.submitted).toEqual([proposal]);
    });

    it('should reject a token signed with another secret', async () => {
      const sink = recordingSink();
      const gate = new ActionGate(sink, config);
      const proposal = proposeOrFail(gate);
      const forged = new ActionGate(sink, { ...config, tokenSecret: 'other-secret' }).issueToken(proposal.proposalId, 'advisor-7');

      const result = await gate.authorize(proposal.proposalId, forged);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('invalid_token');
      expect(sink.submitted).toEqual([]);
      expect(gate.get(proposal.proposalId)?.status).toBe('pending_authorization');
    });

    it('should reject a token bound to another proposal', async () => {
      const gate = new ActionGate(recordingSink(), config);
      const first = proposeOrFail(gate);
      const second = proposeOrFail(gate);

      const result = await gate.authorize(first.proposalId, gate.issueToken(second.proposalId, 'advisor-7'));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('invalid_token');
    });

    it('should reject a token without the authorize scope', async () => {
      const gate = new ActionGate(recordingSink(), config);
      const proposal = proposeOrFail(gate);
      const token = jwt.sign({ scope: 'action:read', approver: 'advisor-7' }, 'test-secret', {
        subject: proposal.proposalId,
        issuer: config.issuer,
        audience: config.audience,
      });

      const result = await gate.authorize(proposal.proposalId, token);

      expect(result.ok).toBe(false);
      expect(AUTHORIZE_SCOPE).toBe('action:authorize');
    });

    it('should process a proposal only once', async () => {
      const sink = recordingSink();
      const gate = new ActionGate(sink, config);
      const proposal = proposeOrFail(gate);
      const token = gate.issueToken(proposal.proposalId, 'advisor-7');

      await gate.authorize(proposal.proposalId, token);
      const second = await gate.authorize(proposal.proposalId, token);

      expect(second.ok).toBe(false);
      if (!second.ok) expect(second.error.code).toBe('already_processed');
      expect(sink.submitted).toHaveLength(1);
    });

    it('should report an unknown proposal', async () => {
      const gate = new ActionGate(recordingSink(), config);

      const result = await gate.authorize('missing', 'token');

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('not_found');
    });

    it('should mark the proposal rejected when the sink fails', async () => {
      const sink: ActionSink = { submit: vi.fn().mockRejectedValue(new Error('broker offline')) };
      const gate = new ActionGate(sink, config);
      const proposal = proposeOrFail(gate);

      const result = await gate.authorize(proposal.proposalId, gate.issueToken(proposal.proposalId, 'advisor-7'));

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toEqual({ code: 'sink_failed', message: 'broker offline' });
      expect(gate.get(proposal.proposalId)?.status).toBe('rejected');
    });
  });

  describe('capacity', () => {
    it('should evict decided proposals before pending ones', async () => {
      const gate = new ActionGate(recordingSink(), config, 2);
      const decided = proposeOrFail(gate);
      await gate.authorize(decided.proposalId, gate.issueToken(decided.proposalId, 'advisor-7'));
      const pending = proposeOrFail(gate);

      const latest = proposeOrFail(gate);

      expect(gate.get(decided.proposalId)).toBeUndefined();
      expect(gate.get(pending.proposalId)?.status).toBe('pending_authorization');
      expect(gate.get(latest.proposalId)?.status).toBe('pending_authorization');
    });

    it('should drop the oldest pending proposal when nothing decided is left', () => {
      const gate = new ActionGate(recordingSink(), config, 2);
      const oldest = proposeOrFail(gate);
      const middle = proposeOrFail(gate);

      const latest = proposeOrFail(gate);

      expect(gate.get(oldest.proposalId)).toBeUndefined();
      expect(gate.get(middle.proposalId)).toBeDefined();
      expect(gate.get(latest.proposalId)).toBeDefined();
    });
  });
});

describe('createDecisionContext', () => {
  it('should freeze the context and dedupe degradations', () => {
    const context = createDecisionContext({
      correlationId: 'corr-1',
      query: 'q',
      intent: 'educational',
      specialistResults: [],
      thesis: 'T',
      segments: [],
      debate: [{ turnIndex: 0, speaker: 'critic', verdict: 'approve', rationale: '' }],
      confidence: {
        score: 0.7,
        breakdown: { specialistAgreement: 0.5, debateStability: 1, routerConfidence: 0.5 },
        capped: false,
        capReasons: [],
        label: 'verified',
      },
      degradations: ['draft_fallback', 'draft_fallback'],
      reservations: [],
      requiresHumanApproval: false,
    });

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.debate)).toBe(true);
    expect(Object.isFrozen(context.debate[0])).toBe(true);
    expect(context.degradations).toEqual(['draft_fallback']);
  });
});
