import { PortfolioDecision, RiskAssessment, StateRecord, StrategyProposal } from '../core/types';
import { portfolioJudgmentSchema } from '../core/schema';
import { recordError } from '../core/state';
import { errorMessage } from '../core/utils';
import { tryParseReasoningPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';
import { PortfolioSnapshot } from './riskRules';

export interface PortfolioGateDeps {
  reasoning: ReasoningClient;
  portfolio: PortfolioSnapshot;
}

export const RISK_VETO_PREFIX = 'Risk Manager rejected trade.';

const rejection = (symbol: string, rationale: string, upstreamRiskApproved: boolean): PortfolioDecision => ({
  symbol,
  approved: false,
  rationale,
  monitoringRequirements: [],
  exitTriggers: [],
  upstreamRiskApproved
});

/**
 * Final approval. The risk outcome is an explicit input: a risk veto is
 * final and no generation call is made. Otherwise the portfolio judgment
 * decides, and an unreadable judgment rejects.
 */
export const decidePortfolio = async (
  symbol: string,
  proposal: StrategyProposal | null,
  risk: RiskAssessment | null,
  deps: PortfolioGateDeps
): Promise<PortfolioDecision> => {
  if (!risk || !risk.approved) {
    const reason = risk ? risk.recommendation : 'No risk assessment available.';
    return rejection(symbol, `${RISK_VETO_PREFIX} ${reason}`.trim(), false);
  }
  if (!proposal) {
    return rejection(symbol, 'No strategy proposal to approve.', true);
  }
  const raw = await deps.reasoning.generate({
    role: 'portfolio_manager',
    instruction: instructionFor('portfolio_manager'),
    context: {
      symbol,
      proposal,
      riskScore: risk.riskScore,
      riskWarnings: risk.warnings,
      portfolioImpact: risk.portfolioImpact,
      portfolioValue: deps.portfolio.totalValue
    }
  });
  const judgment = tryParseReasoningPayload(raw, portfolioJudgmentSchema, 'portfolio_manager');
  if (!judgment) {
    return rejection(symbol, 'Portfolio decision could not be read; rejecting.', true);
  }
  return {
    symbol,
    approved: judgment.approved && risk.approved,
    rationale: judgment.rationale,
    monitoringRequirements: judgment.monitoringRequirements,
    exitTriggers: judgment.exitTriggers,
    upstreamRiskApproved: risk.approved
  };
};

export const runPortfolioDecisionPhase = async (state: StateRecord, deps: PortfolioGateDeps): Promise<StateRecord> => {
  let decision: PortfolioDecision;
  try {
    decision = await decidePortfolio(state.symbol, state.strategyProposal, state.riskAssessment, deps);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[portfolio] ${message}`);
    recordError(state, `Portfolio decision error: ${message}`);
    decision = rejection(state.symbol, `Portfolio decision failed: ${message}`, state.riskApproved);
  }
  state.portfolioDecision = decision;
  state.finalApproval = decision.approved && state.riskApproved;
  console.log(`[portfolio] ${state.symbol}: ${state.finalApproval ? 'approved' : 'rejected'}.`);
  return state;
};
