import fs from 'fs';
import os from 'os';
import path from 'path';
import { AgentRole, DebateArgument, DebatePosition, RiskAssessment, StrategyProposal } from '../../src/core/types';
import { ReasoningClient, ReasoningRequest } from '../../src/llm/reasoningClient';
import { StubReasoningClient } from '../../src/llm/stubReasoningClient';

type Handler = (request: ReasoningRequest) => string | Promise<string>;

/** Answers selected roles from a script and defers everything else to the stub. */
export class ScriptedReasoningClient implements ReasoningClient {
  readonly requests: ReasoningRequest[] = [];
  private fallback = new StubReasoningClient();

  constructor(private handlers: Partial<Record<AgentRole, Handler>> = {}) {}

  async generate(request: ReasoningRequest): Promise<string> {
    this.requests.push(request);
    const handler = this.handlers[request.role];
    return handler ? handler(request) : this.fallback.generate(request);
  }

  rolesCalled(): AgentRole[] {
    return this.requests.map((r) => r.role);
  }
}

export const tmpDir = (prefix: string) => fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));

export const silenceConsole = () => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};

export const makeArgument = (position: DebatePosition, confidence: number, failed = false, round = 1): DebateArgument => ({
  role: position === 'bullish' ? 'bullish_researcher' : 'bearish_researcher',
  round,
  position,
  argument: `${position} view`,
  evidence: [],
  counterpoints: [],
  confidence,
  failed,
  timestamp: '2024-03-15T15:00:00.000Z'
});

export const makeProposal = (overrides: Partial<StrategyProposal> = {}): StrategyProposal => ({
  symbol: 'AAPL',
  kind: 'long_equity',
  direction: 'long',
  rationale: 'Test proposal',
  expectedReturnPct: 8,
  maxLossPct: -5,
  positionSizeFraction: 0.02,
  confidence: 0.7,
  holdingPeriodDays: 30,
  entryConditions: [],
  exitConditions: [],
  debateSummary: '',
  ...overrides
});

export const makeAssessment = (overrides: Partial<RiskAssessment> = {}): RiskAssessment => ({
  symbol: 'AAPL',
  approved: true,
  hardChecks: [],
  hardChecksPassed: true,
  softJudgment: { approved: true, source: 'reasoning' },
  riskScore: 0.3,
  warnings: [],
  recommendation: 'Proceed.',
  portfolioImpact: { positionValue: 2000, positionFraction: 0.02, riskIncrease: 100, projectedRisk: 100, sectorConcentration: 0.02 },
  ...overrides
});
