import { createInitialState } from '../src/core/state';
import { runStrategyPhase, tallyDebate } from '../src/strategy/strategist';
import { ScriptedReasoningClient, makeArgument, silenceConsole } from './helpers/fakes';

const sizing = { minPositionFraction: 0.001, maxPositionFraction: 0.05 };

describe('tallyDebate', () => {
  it('leans long when bulls are clearly more confident, ignoring failed arguments', () => {
    const tally = tallyDebate([
      makeArgument('bullish', 0.8),
      makeArgument('bearish', 0.6),
      makeArgument('bullish', 0.7),
      makeArgument('bearish', 0.1, true)
    ]);
    expect(tally.direction).toBe('long');
    expect(tally.bullConfidence).toBe(0.75);
    expect(tally.bearConfidence).toBe(0.6);
    expect(tally.failedCount).toBe(1);
  });

  it('stays neutral inside the margin', () => {
    expect(tallyDebate([makeArgument('bullish', 0.62), makeArgument('bearish', 0.6)]).direction).toBe('neutral');
  });

  it('leans short when bears are clearly more confident', () => {
    expect(tallyDebate([makeArgument('bullish', 0.5), makeArgument('bearish', 0.7)]).direction).toBe('short');
  });
});

describe('strategy phase', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  const payload = (fields: Record<string, unknown>) =>
    JSON.stringify({
      rationale: 'Momentum with a hedge',
      positionSizeFraction: 0.02,
      expectedReturnPct: 12,
      maxLossPct: -4,
      holdingPeriodDays: 20,
      confidence: 0.7,
      entryConditions: ['Break above resistance'],
      exitConditions: ['Close below support'],
      ...fields
    });

  it('normalises the kind, clamps the size and forces a negative max loss', async () => {
    const reasoning = new ScriptedReasoningClient({
      strategist: () => payload({ kind: 'Covered Call', positionSizeFraction: 0.5, maxLossPct: 8 })
    });
    const state = createInitialState('AAPL', { runId: 'run-1' });
    state.debateArguments.push(makeArgument('bullish', 0.8), makeArgument('bearish', 0.6));
    await runStrategyPhase(state, { reasoning, sizing });

    const proposal = state.strategyProposal;
    expect(proposal?.kind).toBe('covered_call');
    expect(proposal?.direction).toBe('long');
    expect(proposal?.positionSizeFraction).toBe(0.05);
    expect(proposal?.maxLossPct).toBe(-8);
    expect(proposal?.holdingPeriodDays).toBe(20);
    expect(state.strategyComplete).toBe(true);
  });

  it('picks a kind from the debate direction when the suggested kind is unknown', async () => {
    const reasoning = new ScriptedReasoningClient({ strategist: () => payload({ kind: 'moonshot' }) });
    const state = createInitialState('AAPL', { runId: 'run-2' });
    state.debateArguments.push(makeArgument('bullish', 0.4), makeArgument('bearish', 0.8));
    await runStrategyPhase(state, { reasoning, sizing });

    expect(state.strategyProposal?.kind).toBe('short_equity');
    expect(state.strategyProposal?.direction).toBe('short');
  });

  it('applies conservative defaults to an unusable answer', async () => {
    const reasoning = new ScriptedReasoningClient({ strategist: () => 'Buy it, trust me.' });
    const state = createInitialState('AAPL', { runId: 'run-3' });
    await runStrategyPhase(state, { reasoning, sizing });

    expect(state.strategyProposal).toMatchObject({
      kind: 'iron_condor',
      direction: 'neutral',
      positionSizeFraction: 0.02,
      expectedReturnPct: 10,
      maxLossPct: -5,
      holdingPeriodDays: 30,
      confidence: 0.6
    });
    expect(state.errors).toEqual([]);
  });

  it('records a failed call and leaves no proposal', async () => {
    const reasoning = new ScriptedReasoningClient({
      strategist: () => {
        throw new Error('boom');
      }
    });
    const state = createInitialState('AAPL', { runId: 'run-4' });
    await runStrategyPhase(state, { reasoning, sizing });

    expect(state.strategyProposal).toBeNull();
    expect(state.errors).toEqual(['Strategy error: boom']);
    expect(state.strategyComplete).toBe(true);
  });
});
