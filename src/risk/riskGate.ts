import { RiskAssessment, StateRecord, StrategyProposal } from '../core/types';
import { riskJudgmentSchema } from '../core/schema';
import { recordError } from '../core/state';
import { clamp, errorMessage } from '../core/utils';
import { MarketDataService } from '../data/marketData.types';
import { tryParseReasoningPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';
import { PortfolioSnapshot, RiskLimits, evaluateHardChecks, qualitativeWarnings } from './riskRules';

export interface RiskGateDeps {
  reasoning: ReasoningClient;
  marketData: MarketDataService;
  limits: RiskLimits;
  portfolio: PortfolioSnapshot;
}

const EMPTY_IMPACT: RiskAssessment['portfolioImpact'] = {
  positionValue: 0,
  positionFraction: 0,
  riskIncrease: 0,
  projectedRisk: 0,
  sectorConcentration: 0
};

export const rejectedAssessment = (symbol: string, recommendation: string, source: 'fallback' | 'error'): RiskAssessment => ({
  symbol,
  approved: false,
  hardChecks: [],
  hardChecksPassed: false,
  softJudgment: { approved: false, source },
  riskScore: 1,
  warnings: [recommendation],
  recommendation,
  portfolioImpact: EMPTY_IMPACT
});

/**
 * Deterministic limit checks plus a qualitative judgment. The trade passes
 * only when every hard check passes and the judgment approves; an unusable
 * judgment rejects. A generation failure propagates to the caller.
 */
export const assessRisk = async (
  symbol: string,
  proposal: StrategyProposal,
  deps: RiskGateDeps
): Promise<RiskAssessment> => {
  const sector = await deps.marketData.getSector(proposal.symbol);
  const hard = evaluateHardChecks(proposal, sector, deps.portfolio, deps.limits);
  const warnings = [...hard.checks.filter((c) => !c.passed).map((c) => c.message), ...qualitativeWarnings(proposal)];

  const raw = await deps.reasoning.generate({
    role: 'risk_manager',
    instruction: instructionFor('risk_manager'),
    context: {
      symbol,
      sector,
      proposal,
      hardChecks: hard.checks,
      portfolioImpact: hard.impact,
      warnings
    }
  });
  const judgment = tryParseReasoningPayload(raw, riskJudgmentSchema, 'risk_manager');
  if (!judgment) {
    const recommendation = 'Risk judgment could not be read; rejecting.';
    return {
      symbol,
      approved: false,
      hardChecks: hard.checks,
      hardChecksPassed: hard.passed,
      softJudgment: { approved: false, source: 'fallback' },
      riskScore: 1,
      warnings: [...warnings, recommendation],
      recommendation,
      portfolioImpact: hard.impact
    };
  }

  const approved = hard.passed && judgment.approved;
  const breached = hard.checks.filter((c) => !c.passed).map((c) => c.name);
  // A hard breach overrides whatever the judgment recommended.
  const recommendation = breached.length
    ? `Rejected: hard limit breached (${breached.join(', ')}).`
    : judgment.recommendation || (approved ? 'Proceed.' : 'Rejected on qualitative review.');
  return {
    symbol,
    approved,
    hardChecks: hard.checks,
    hardChecksPassed: hard.passed,
    softJudgment: { approved: judgment.approved, source: 'reasoning' },
    riskScore: clamp(judgment.riskScore, 0, 1),
    warnings: [...warnings, ...judgment.additionalWarnings],
    recommendation,
    portfolioImpact: hard.impact
  };
};

const assessOrReject = async (state: StateRecord, deps: RiskGateDeps): Promise<RiskAssessment> => {
  const proposal = state.strategyProposal;
  if (!proposal) {
    return rejectedAssessment(state.symbol, 'No strategy proposal to assess; rejecting.', 'fallback');
  }
  try {
    return await assessRisk(state.symbol, proposal, deps);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[risk] ${message}`);
    recordError(state, `Risk assessment error: ${message}`);
    return rejectedAssessment(state.symbol, `Risk assessment failed: ${message}`, 'error');
  }
};

export const runRiskAssessmentPhase = async (state: StateRecord, deps: RiskGateDeps): Promise<StateRecord> => {
  const assessment = await assessOrReject(state, deps);
  state.riskAssessment = assessment;
  state.riskApproved = assessment.approved;
  const failed = assessment.hardChecks.filter((c) => !c.passed).map((c) => c.name);
  console.log(
    `[risk] ${state.symbol}: ${assessment.approved ? 'approved' : 'rejected'}` +
      (failed.length ? ` (failed: ${failed.join(', ')})` : '') +
      `, score ${assessment.riskScore}.`
  );
  return state;
};
