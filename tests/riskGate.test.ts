import { createInitialState } from '../src/core/state';
import { StubMarketDataService } from '../src/data/marketData.stub';
import { StubReasoningClient } from '../src/llm/stubReasoningClient';
import { assessRisk, runRiskAssessmentPhase } from '../src/risk/riskGate';
import { PortfolioSnapshot, RiskLimits, evaluateHardChecks, qualitativeWarnings } from '../src/risk/riskRules';
import { ScriptedReasoningClient, makeProposal, silenceConsole } from './helpers/fakes';

const limits: RiskLimits = { maxPositionSize: 0.05, maxPortfolioRisk: 0.02, maxSectorConcentration: 0.25 };
const portfolio: PortfolioSnapshot = { totalValue: 100000, currentVar: 0, sectorExposures: {} };

describe('hard checks', () => {
  it('fails the position size check above the limit', () => {
    const outcome = evaluateHardChecks(makeProposal({ positionSizeFraction: 0.1 }), 'Technology', portfolio, limits);
    const [size, projected, sector] = outcome.checks;
    expect(size).toMatchObject({ name: 'position_size', passed: false, observed: 10000, limit: 5000 });
    expect(size.message).toBe('Position size 10000 exceeds limit 5000');
    expect(projected).toMatchObject({ name: 'projected_risk', passed: true, observed: 500, limit: 2000 });
    expect(sector).toMatchObject({ name: 'sector_concentration', passed: true, observed: 0.1 });
    expect(outcome.passed).toBe(false);
  });

  it('passes a position exactly at the limit', () => {
    const outcome = evaluateHardChecks(makeProposal({ positionSizeFraction: 0.05 }), 'Technology', portfolio, limits);
    expect(outcome.checks[0].passed).toBe(true);
    expect(outcome.passed).toBe(true);
  });

  it('adds existing sector exposure to the concentration check', () => {
    const atLimit = evaluateHardChecks(
      makeProposal({ positionSizeFraction: 0.05 }),
      'Technology',
      { ...portfolio, sectorExposures: { Technology: 20000 } },
      limits
    );
    expect(atLimit.checks[2].passed).toBe(true);

    const over = evaluateHardChecks(
      makeProposal({ positionSizeFraction: 0.05 }),
      'Technology',
      { ...portfolio, sectorExposures: { Technology: 21000 } },
      limits
    );
    expect(over.checks[2].passed).toBe(false);
    expect(over.checks[2].message).toBe('Technology concentration 26.00% exceeds 25.00%');
  });

  it('fails projected risk when the loss budget is used up', () => {
    const outcome = evaluateHardChecks(
      makeProposal({ positionSizeFraction: 0.05, maxLossPct: -10 }),
      'Energy',
      { ...portfolio, currentVar: 1600 },
      limits
    );
    expect(outcome.checks[1]).toMatchObject({ passed: false, observed: 2100, limit: 2000 });
    expect(outcome.impact.riskIncrease).toBe(500);
  });

  it('warns on low confidence and large potential loss', () => {
    expect(qualitativeWarnings(makeProposal({ confidence: 0.4, maxLossPct: -12 }))).toEqual([
      'Low strategy confidence (0.40)',
      'High potential loss (12.0%)'
    ]);
    expect(qualitativeWarnings(makeProposal())).toEqual([]);
  });
});

describe('risk gate', () => {
  const marketData = new StubMarketDataService();

  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('rejects a hard breach even when the judgment approves', async () => {
    const assessment = await assessRisk('AAPL', makeProposal({ positionSizeFraction: 0.1 }), {
      reasoning: new StubReasoningClient(),
      marketData,
      limits,
      portfolio
    });
    expect(assessment.softJudgment).toEqual({ approved: true, source: 'reasoning' });
    expect(assessment.hardChecksPassed).toBe(false);
    expect(assessment.approved).toBe(false);
    expect(assessment.recommendation).toBe('Rejected: hard limit breached (position_size).');
    expect(assessment.warnings[0]).toBe('Position size 10000 exceeds limit 5000');
  });

  it('approves when every check passes and the judgment approves', async () => {
    const assessment = await assessRisk('AAPL', makeProposal(), {
      reasoning: new StubReasoningClient(),
      marketData,
      limits,
      portfolio
    });
    expect(assessment.approved).toBe(true);
    expect(assessment.recommendation).toBe('Proceed with standard monitoring.');
    expect(assessment.portfolioImpact.positionValue).toBe(2000);
  });

  it('rejects an unreadable judgment', async () => {
    const assessment = await assessRisk('AAPL', makeProposal(), {
      reasoning: new ScriptedReasoningClient({ risk_manager: () => 'Looks fine to me.' }),
      marketData,
      limits,
      portfolio
    });
    expect(assessment.approved).toBe(false);
    expect(assessment.softJudgment).toEqual({ approved: false, source: 'fallback' });
    expect(assessment.riskScore).toBe(1);
    expect(assessment.hardChecksPassed).toBe(true);
  });

  it('records a failed call and rejects', async () => {
    const state = createInitialState('AAPL', { runId: 'run-1' });
    state.strategyProposal = makeProposal();
    await runRiskAssessmentPhase(state, {
      reasoning: new ScriptedReasoningClient({
        risk_manager: () => {
          throw new Error('model down');
        }
      }),
      marketData,
      limits,
      portfolio
    });
    expect(state.riskApproved).toBe(false);
    expect(state.riskAssessment?.softJudgment.source).toBe('error');
    expect(state.errors).toEqual(['Risk assessment error: model down']);
  });

  it('rejects without an error when there is no proposal', async () => {
    const reasoning = new ScriptedReasoningClient();
    const state = createInitialState('AAPL', { runId: 'run-2' });
    await runRiskAssessmentPhase(state, { reasoning, marketData, limits, portfolio });
    expect(state.riskApproved).toBe(false);
    expect(state.errors).toEqual([]);
    expect(reasoning.requests).toHaveLength(0);
  });
});
