import path from 'path';
import { ConfigOverrides, loadConfig } from '../src/config/settings';
import { createInitialState } from '../src/core/state';
import { PhaseName, StateRecord } from '../src/core/types';
import { ReasoningClient } from '../src/llm/reasoningClient';
import { TERMINATE, direct, PhaseGraph } from '../src/workflow/phaseGraph';
import { PIPELINE_PHASES, buildPipelineDeps, runPipeline } from '../src/workflow/pipeline';
import { PhaseEvent, WorkflowEngine } from '../src/workflow/workflowEngine';
import { ScriptedReasoningClient, silenceConsole, tmpDir } from './helpers/fakes';

const fixedNow = () => new Date('2024-03-15T15:00:00Z');

const depsFor = (overrides: ConfigOverrides = {}, reasoning?: ReasoningClient) => {
  const dir = tmpDir('workflow');
  const config = loadConfig({
    overrides: {
      ...overrides,
      storage: { episodicStoreFile: path.join(dir, 'memory.jsonl'), ledgerFile: path.join(dir, 'events.jsonl') }
    }
  });
  return buildPipelineDeps(config, { now: fixedNow, reasoning });
};

describe('pipeline', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('approves and executes a conservative trade end to end', async () => {
    const deps = depsFor({ debate: { rounds: 3 } });
    const result = await runPipeline({ symbol: 'AAPL', endDate: '2024-03-15', runId: 'AAPL-e2e' }, deps);
    const { state } = result;

    expect(result.reason).toBe('completed');
    expect(result.visited).toEqual(PIPELINE_PHASES);
    expect(state.completedPhases).toEqual(PIPELINE_PHASES);
    expect(Object.keys(state.analystReports)).toHaveLength(6);
    expect(state.debateArguments).toHaveLength(6);
    expect(state.riskApproved).toBe(true);
    expect(state.finalApproval).toBe(true);
    expect(state.executionPlan?.orders.length).toBeGreaterThanOrEqual(1);
    expect(state.ordersSubmitted).toBe(true);
    expect(state.fills).toHaveLength(state.executionPlan?.orders.length ?? -1);
    expect(state.errors).toEqual([]);
    expect(deps.store.getTrade('AAPL-e2e-T1')?.outcome).toBe('pending');
  });

  it('stops at the risk gate when the position breaches the size limit', async () => {
    const reasoning = new ScriptedReasoningClient({
      strategist: () =>
        JSON.stringify({
          kind: 'long_equity',
          rationale: 'Size up',
          positionSizeFraction: 0.1,
          expectedReturnPct: 15,
          maxLossPct: -5,
          holdingPeriodDays: 30,
          confidence: 0.8,
          entryConditions: [],
          exitConditions: []
        })
    });
    const deps = depsFor({ sizing: { maxPositionFraction: 0.2 } }, reasoning);
    const result = await runPipeline({ symbol: 'AAPL', endDate: '2024-03-15', runId: 'AAPL-big' }, deps);
    const { state } = result;

    expect(state.strategyProposal?.positionSizeFraction).toBe(0.1);
    expect(state.riskApproved).toBe(false);
    expect(state.finalApproval).toBe(false);
    expect(state.riskAssessment?.hardChecks.find((c) => c.name === 'position_size')?.passed).toBe(false);
    expect(result.reason).toBe('risk_rejected');
    expect(result.visited).toEqual(['analysis', 'debate', 'strategy', 'execution_planning', 'risk_assessment']);
    expect(reasoning.rolesCalled()).not.toContain('portfolio_manager');
    expect(state.ordersSubmitted).toBe(false);
    expect(state.errors).toEqual([]);
  });

  it('replays to the same final state for the same inputs', async () => {
    const first = await runPipeline({ symbol: 'MSFT', endDate: '2024-03-15', runId: 'MSFT-replay' }, depsFor());
    const second = await runPipeline({ symbol: 'MSFT', endDate: '2024-03-15', runId: 'MSFT-replay' }, depsFor());
    expect(second.state).toEqual(first.state);
    expect(second.visited).toEqual(first.visited);
  });

  it('runs to a rejection on prose-only answers without recording errors', async () => {
    const prose: ReasoningClient = { generate: async () => 'I would rather not answer in JSON.' };
    const result = await runPipeline({ symbol: 'AAPL', endDate: '2024-03-15', runId: 'AAPL-prose' }, depsFor({}, prose));
    const { state } = result;

    expect(state.debateArguments.every((a) => a.confidence === 0.5)).toBe(true);
    expect(state.strategyProposal?.kind).toBe('iron_condor');
    expect(state.strategyProposal?.positionSizeFraction).toBe(0.02);
    expect(state.riskAssessment?.softJudgment.source).toBe('fallback');
    expect(state.finalApproval).toBe(false);
    expect(result.reason).toBe('risk_rejected');
    expect(state.errors).toEqual([]);
  });

  it('keeps running when a dependency throws and lists every error', async () => {
    const reasoning = new ScriptedReasoningClient({
      fundamentals_analyst: () => {
        throw new Error('fundamentals unavailable');
      },
      portfolio_manager: () => {
        throw new Error('portfolio model offline');
      }
    });
    const result = await runPipeline({ symbol: 'AAPL', endDate: '2024-03-15', runId: 'AAPL-errs' }, depsFor({}, reasoning));

    expect(result.state.errors).toEqual([
      'fundamentals analysis failed: fundamentals unavailable',
      'Portfolio decision error: portfolio model offline'
    ]);
    expect(result.reason).toBe('portfolio_rejected');
    expect(result.state.finalApproval).toBe(false);
  });

  it('stops between phases when interrupted', async () => {
    const controller = new AbortController();
    const events: PhaseEvent[] = [];
    const result = await runPipeline(
      {
        symbol: 'AAPL',
        endDate: '2024-03-15',
        runId: 'AAPL-int',
        signal: controller.signal,
        observer: (event) => {
          events.push(event);
          if (event.type === 'PHASE_COMPLETED' && event.phase === 'debate') controller.abort();
        }
      },
      depsFor()
    );

    expect(result.reason).toBe('interrupted');
    expect(result.visited).toEqual(['analysis', 'debate']);
    expect(events.map((e) => e.type)).toEqual([
      'PHASE_STARTED',
      'PHASE_COMPLETED',
      'PHASE_STARTED',
      'PHASE_COMPLETED',
      'RUN_TERMINATED'
    ]);
  });

  it('rejects bad run inputs before any phase runs', async () => {
    const deps = depsFor();
    await expect(runPipeline({ symbol: '  ' }, deps)).rejects.toThrow('symbol is required');
    await expect(runPipeline({ symbol: 'AAPL', startDate: '2024-03-20', endDate: '2024-03-01' }, deps)).rejects.toThrow(
      'start date 2024-03-20 is after end date 2024-03-01'
    );
    await expect(runPipeline({ symbol: 'AAPL', endDate: '2024-02-30' }, deps)).rejects.toThrow('Invalid date bound');
  });
});

describe('WorkflowEngine', () => {
  const passthrough = async (s: StateRecord) => s;

  const graphWith = (overrides: Partial<PhaseGraph<PhaseName, StateRecord>['nodes']>): PhaseGraph<PhaseName, StateRecord> => ({
    entry: 'analysis',
    phases: ['analysis', 'debate', 'strategy', 'execution_planning', 'risk_assessment', 'portfolio_decision', 'execution', 'learning'],
    nodes: {
      analysis: passthrough,
      debate: passthrough,
      strategy: passthrough,
      execution_planning: passthrough,
      risk_assessment: passthrough,
      portfolio_decision: passthrough,
      execution: passthrough,
      learning: passthrough,
      ...overrides
    },
    edges: {
      analysis: direct('debate'),
      debate: direct(TERMINATE),
      strategy: direct(TERMINATE),
      execution_planning: direct(TERMINATE),
      risk_assessment: direct(TERMINATE),
      portfolio_decision: direct(TERMINATE),
      execution: direct(TERMINATE),
      learning: direct(TERMINATE)
    }
  });

  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  it('records a throwing phase and carries on to the next one', async () => {
    const engine = new WorkflowEngine(
      graphWith({
        analysis: async () => {
          throw new Error('exploded');
        }
      })
    );
    const result = await engine.run(createInitialState('AAPL', { runId: 'engine-1' }));
    expect(result.state.errors).toEqual(['Analysis error: exploded']);
    expect(result.visited).toEqual(['analysis', 'debate']);
    expect(result.reason).toBe('completed');
  });

  it('refuses a graph that routes to an unknown phase', () => {
    const graph = graphWith({});
    expect(() => new WorkflowEngine({ ...graph, phases: ['analysis'] })).toThrow(
      'Invalid phase graph: analysis routes to unknown node debate'
    );
  });

  it('survives an observer that throws', async () => {
    const engine = new WorkflowEngine(graphWith({}), () => {
      throw new Error('observer broke');
    });
    const result = await engine.run(createInitialState('AAPL', { runId: 'engine-2' }));
    expect(result.visited).toEqual(['analysis', 'debate']);
    expect(console.warn).toHaveBeenCalledWith('[workflow] observer failed on PHASE_STARTED: observer broke');
  });
});
