import { HardCheckResult, RiskAssessment, StrategyProposal } from '../core/types';
import { round } from '../core/utils';

export interface RiskLimits {
  maxPositionSize: number;
  maxPortfolioRisk: number;
  maxSectorConcentration: number;
}

export interface PortfolioSnapshot {
  totalValue: number;
  currentVar: number;
  // Dollar exposure already held per sector.
  sectorExposures: Record<string, number>;
}

// Absorbs float noise such as 100000 * 0.05 landing a hair above 5000.
const EPSILON = 1e-9;

export const positionValueOf = (proposal: StrategyProposal, portfolio: PortfolioSnapshot): number =>
  portfolio.totalValue * proposal.positionSizeFraction;

export const riskIncreaseOf = (proposal: StrategyProposal, positionValue: number): number =>
  (Math.abs(proposal.maxLossPct) / 100) * positionValue;

export const checkPositionSize = (positionValue: number, portfolio: PortfolioSnapshot, limits: RiskLimits): HardCheckResult => {
  const limit = portfolio.totalValue * limits.maxPositionSize;
  const passed = positionValue <= limit + EPSILON;
  return {
    name: 'position_size',
    passed,
    observed: round(positionValue, 2),
    limit: round(limit, 2),
    message: passed
      ? `Position ${round(positionValue, 2)} within limit ${round(limit, 2)}`
      : `Position size ${round(positionValue, 2)} exceeds limit ${round(limit, 2)}`
  };
};

export const checkProjectedRisk = (riskIncrease: number, portfolio: PortfolioSnapshot, limits: RiskLimits): HardCheckResult => {
  const projected = portfolio.currentVar + riskIncrease;
  const limit = portfolio.totalValue * limits.maxPortfolioRisk;
  const passed = projected <= limit + EPSILON;
  return {
    name: 'projected_risk',
    passed,
    observed: round(projected, 2),
    limit: round(limit, 2),
    message: passed
      ? `Projected risk ${round(projected, 2)} within limit ${round(limit, 2)}`
      : `Projected portfolio risk ${round(projected, 2)} exceeds limit ${round(limit, 2)}`
  };
};

export const checkSectorConcentration = (
  sector: string,
  positionValue: number,
  portfolio: PortfolioSnapshot,
  limits: RiskLimits
): HardCheckResult => {
  const existing = portfolio.sectorExposures[sector] ?? 0;
  const concentration = (existing + positionValue) / portfolio.totalValue;
  const passed = concentration <= limits.maxSectorConcentration + EPSILON;
  return {
    name: 'sector_concentration',
    passed,
    observed: round(concentration, 4),
    limit: limits.maxSectorConcentration,
    message: passed
      ? `${sector} concentration ${(concentration * 100).toFixed(2)}% within limit`
      : `${sector} concentration ${(concentration * 100).toFixed(2)}% exceeds ${(limits.maxSectorConcentration * 100).toFixed(2)}%`
  };
};

export interface HardCheckOutcome {
  checks: HardCheckResult[];
  passed: boolean;
  impact: RiskAssessment['portfolioImpact'];
}

export const evaluateHardChecks = (
  proposal: StrategyProposal,
  sector: string,
  portfolio: PortfolioSnapshot,
  limits: RiskLimits
): HardCheckOutcome => {
  const positionValue = positionValueOf(proposal, portfolio);
  const riskIncrease = riskIncreaseOf(proposal, positionValue);
  const checks = [
    checkPositionSize(positionValue, portfolio, limits),
    checkProjectedRisk(riskIncrease, portfolio, limits),
    checkSectorConcentration(sector, positionValue, portfolio, limits)
  ];
  const sectorExisting = portfolio.sectorExposures[sector] ?? 0;
  return {
    checks,
    passed: checks.every((c) => c.passed),
    impact: {
      positionValue: round(positionValue, 2),
      positionFraction: proposal.positionSizeFraction,
      riskIncrease: round(riskIncrease, 2),
      projectedRisk: round(portfolio.currentVar + riskIncrease, 2),
      sectorConcentration: round((sectorExisting + positionValue) / portfolio.totalValue, 4)
    }
  };
};

export const qualitativeWarnings = (proposal: StrategyProposal): string[] => {
  const warnings: string[] = [];
  if (proposal.confidence < 0.5) {
    warnings.push(`Low strategy confidence (${proposal.confidence.toFixed(2)})`);
  }
  if (Math.abs(proposal.maxLossPct) > 10) {
    warnings.push(`High potential loss (${Math.abs(proposal.maxLossPct).toFixed(1)}%)`);
  }
  return warnings;
};
