import { PhaseName, StateRecord } from './types';
import { makeRunId } from './time';

export interface InitialStateOptions {
  runId?: string;
  startDate?: string;
  endDate?: string;
  now?: Date;
}

export const createInitialState = (symbol: string, options: InitialStateOptions = {}): StateRecord => {
  const now = options.now ?? new Date();
  return {
    runId: options.runId ?? makeRunId(symbol, now),
    symbol: symbol.toUpperCase(),
    startDate: options.startDate,
    endDate: options.endDate,
    analystReports: {},
    analysisComplete: false,
    debateArguments: [],
    debateRounds: 0,
    debateComplete: false,
    strategyProposal: null,
    strategyComplete: false,
    executionPlan: null,
    executionPlanComplete: false,
    riskAssessment: null,
    riskApproved: false,
    portfolioDecision: null,
    finalApproval: false,
    ordersSubmitted: false,
    executionComplete: false,
    fills: [],
    learningComplete: false,
    startedAt: now.toISOString(),
    currentPhase: 'initialization',
    completedPhases: [],
    errors: []
  };
};

// The error list is append-only; entries are never removed once recorded.
export const recordError = (state: StateRecord, message: string): StateRecord => {
  state.errors.push(message);
  return state;
};

export const enterPhase = (state: StateRecord, phase: PhaseName): StateRecord => {
  state.currentPhase = phase;
  return state;
};

export const markPhaseVisited = (state: StateRecord, phase: PhaseName): StateRecord => {
  if (!state.completedPhases.includes(phase)) {
    state.completedPhases.push(phase);
  }
  return state;
};

export const missingAnalysts = (state: StateRecord): string[] =>
  Object.entries(state.analystReports)
    .filter(([, slot]) => slot?.status === 'missing')
    .map(([id]) => id);
