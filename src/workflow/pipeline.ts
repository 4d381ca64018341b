import { PipelineConfig } from '../config/settings';
import { PhaseName, StateRecord } from '../core/types';
import { createInitialState } from '../core/state';
import { assertDateOrder, parseDateBound } from '../core/time';
import { AnyAnalyst, defaultAnalysts } from '../analysis/analysts';
import { runAnalysisPhase } from '../analysis/analysisPhase';
import { Broker } from '../broker/broker.types';
import { StubBroker } from '../broker/broker.stub';
import { getMarketDataService, getNewsService } from '../data/marketData';
import { MarketDataService } from '../data/marketData.types';
import { NewsService } from '../data/news.types';
import { runDebatePhase } from '../debate/debateProtocol';
import { ExecutionAdvisor } from '../execution/executionAdvisor';
import { runExecutionPlanningPhase } from '../execution/executionPlanner';
import { runExecutionPhase } from '../execution/executionSimulator';
import { createReasoningClient } from '../llm';
import { ReasoningClient } from '../llm/reasoningClient';
import { EpisodicStore } from '../memory/episodicStore';
import { runLearningPhase } from '../memory/learningPhase';
import { runPortfolioDecisionPhase } from '../risk/portfolioGate';
import { runRiskAssessmentPhase } from '../risk/riskGate';
import { runStrategyPhase } from '../strategy/strategist';
import { PhaseGraph, TERMINATE, conditional, direct } from './phaseGraph';
import { PhaseObserver, RunControls, WorkflowEngine, WorkflowResult } from './workflowEngine';

export interface PipelineDeps {
  config: PipelineConfig;
  reasoning: ReasoningClient;
  marketData: MarketDataService;
  news: NewsService;
  broker: Broker;
  advisor: ExecutionAdvisor;
  store: EpisodicStore;
  analysts: AnyAnalyst[];
  now: () => Date;
}

export type PipelineDepOverrides = Partial<Omit<PipelineDeps, 'config'>>;

export const buildPipelineDeps = (config: PipelineConfig, overrides: PipelineDepOverrides = {}): PipelineDeps => {
  const marketData = overrides.marketData ?? getMarketDataService(config);
  return {
    config,
    reasoning: overrides.reasoning ?? createReasoningClient(config),
    marketData,
    news: overrides.news ?? getNewsService(),
    broker: overrides.broker ?? new StubBroker(config.broker, marketData),
    advisor: overrides.advisor ?? new ExecutionAdvisor(config.executionAdvisor),
    store: overrides.store ?? new EpisodicStore(config.storage.episodicStoreFile),
    analysts: overrides.analysts ?? defaultAnalysts(),
    now: overrides.now ?? (() => new Date())
  };
};

export const PIPELINE_PHASES: readonly PhaseName[] = [
  'analysis',
  'debate',
  'strategy',
  'execution_planning',
  'risk_assessment',
  'portfolio_decision',
  'execution',
  'learning'
];

export const buildPipelineGraph = (deps: PipelineDeps): PhaseGraph<PhaseName, StateRecord> => {
  const { config } = deps;
  return {
    entry: 'analysis',
    phases: PIPELINE_PHASES,
    nodes: {
      analysis: (s) =>
        runAnalysisPhase(s, {
          analysts: deps.analysts,
          marketData: deps.marketData,
          news: deps.news,
          reasoning: deps.reasoning,
          mode: config.analysis.concurrent ? 'concurrent' : 'sequential',
          headlineLimit: config.analysis.headlineLimit,
          now: deps.now
        }),
      debate: (s) => runDebatePhase(s, { reasoning: deps.reasoning, rounds: config.debate.rounds, now: deps.now }),
      strategy: (s) => runStrategyPhase(s, { reasoning: deps.reasoning, sizing: config.sizing }),
      execution_planning: (s) =>
        runExecutionPlanningPhase(s, {
          marketData: deps.marketData,
          reasoning: deps.reasoning,
          advisor: deps.advisor,
          totalValue: config.portfolio.totalValue,
          now: deps.now
        }),
      risk_assessment: (s) =>
        runRiskAssessmentPhase(s, {
          reasoning: deps.reasoning,
          marketData: deps.marketData,
          limits: config.risk,
          portfolio: config.portfolio
        }),
      portfolio_decision: (s) =>
        runPortfolioDecisionPhase(s, { reasoning: deps.reasoning, portfolio: config.portfolio }),
      execution: (s) => runExecutionPhase(s, { broker: deps.broker, now: deps.now }),
      learning: (s) => runLearningPhase(s, { store: deps.store, now: deps.now })
    },
    edges: {
      analysis: direct('debate'),
      debate: direct('strategy'),
      strategy: direct('execution_planning'),
      execution_planning: direct('risk_assessment'),
      risk_assessment: conditional((s: StateRecord) => (s.riskApproved ? 'proceed' : 'reject'), {
        proceed: 'portfolio_decision',
        reject: TERMINATE
      }),
      portfolio_decision: conditional((s: StateRecord) => (s.finalApproval ? 'execute' : 'reject'), {
        execute: 'execution',
        reject: TERMINATE
      }),
      execution: direct('learning'),
      learning: direct(TERMINATE)
    }
  };
};

export interface RunOptions {
  symbol: string;
  startDate?: string;
  endDate?: string;
  runId?: string;
  observer?: PhaseObserver;
  signal?: AbortSignal;
}

/**
 * Validates the run inputs, then drives one symbol through the full graph.
 * Input problems throw before any phase runs; after that the run always
 * resolves with a final state.
 */
export const runPipeline = async (options: RunOptions, deps: PipelineDeps): Promise<WorkflowResult> => {
  const symbol = options.symbol.trim();
  if (!symbol) throw new Error('symbol is required');
  const startDate = parseDateBound(options.startDate);
  const endDate = parseDateBound(options.endDate);
  assertDateOrder(startDate, endDate);

  const state = createInitialState(symbol, { runId: options.runId, startDate, endDate, now: deps.now() });
  const engine = new WorkflowEngine(buildPipelineGraph(deps), options.observer);
  const controls: RunControls = { signal: options.signal };
  console.log(`[workflow] run ${state.runId} started for ${state.symbol}.`);
  const result = await engine.run(state, controls);
  console.log(`[workflow] run ${state.runId} finished (${result.reason}); visited ${result.visited.join(' -> ')}.`);
  return result;
};
