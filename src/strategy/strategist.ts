import { DebateArgument, StateRecord, StrategyKind, StrategyProposal, TradeDirection } from '../core/types';
import { StrategyPayload, strategyPayloadSchema } from '../core/schema';
import { recordError } from '../core/state';
import { clamp, errorMessage, round, sum } from '../core/utils';
import { summarizeReports } from '../debate/debateProtocol';
import { parseReasoningPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';

export interface SizingBounds {
  minPositionFraction: number;
  maxPositionFraction: number;
}

export interface StrategyDeps {
  reasoning: ReasoningClient;
  sizing: SizingBounds;
}

export const DIRECTION_MARGIN = 0.05;

export const STRATEGY_DEFAULTS: StrategyPayload = {
  kind: undefined,
  rationale: 'Strategist response unusable; conservative defaults applied.',
  positionSizeFraction: 0.02,
  expectedReturnPct: 10,
  maxLossPct: -5,
  holdingPeriodDays: 30,
  confidence: 0.6,
  entryConditions: [],
  exitConditions: []
};

const mean = (values: number[]) => (values.length ? sum(values) / values.length : 0);

export interface DebateTally {
  direction: TradeDirection;
  bullConfidence: number;
  bearConfidence: number;
  bullCount: number;
  bearCount: number;
  failedCount: number;
}

// Mean confidence per side over arguments that were actually generated.
export const tallyDebate = (args: DebateArgument[], margin = DIRECTION_MARGIN): DebateTally => {
  const live = args.filter((a) => !a.failed);
  const bull = live.filter((a) => a.position === 'bullish').map((a) => a.confidence);
  const bear = live.filter((a) => a.position === 'bearish').map((a) => a.confidence);
  const bullConfidence = mean(bull);
  const bearConfidence = mean(bear);
  const edge = bullConfidence - bearConfidence;
  let direction: TradeDirection = 'neutral';
  if (edge > margin) direction = 'long';
  else if (edge < -margin) direction = 'short';
  return {
    direction,
    bullConfidence: round(bullConfidence, 3),
    bearConfidence: round(bearConfidence, 3),
    bullCount: bull.length,
    bearCount: bear.length,
    failedCount: args.length - live.length
  };
};

export const defaultKindFor = (direction: TradeDirection): StrategyKind => {
  if (direction === 'long') return 'long_equity';
  if (direction === 'short') return 'short_equity';
  return 'iron_condor';
};

const describeTally = (t: DebateTally) =>
  `${t.bullCount} bullish (avg conf ${t.bullConfidence}) vs ${t.bearCount} bearish (avg conf ${t.bearConfidence})` +
  (t.failedCount ? `, ${t.failedCount} failed` : '') +
  `; leaning ${t.direction}.`;

export const buildProposal = (
  symbol: string,
  payload: StrategyPayload,
  tally: DebateTally,
  sizing: SizingBounds
): StrategyProposal => ({
  symbol,
  kind: payload.kind ?? defaultKindFor(tally.direction),
  direction: tally.direction,
  rationale: payload.rationale,
  expectedReturnPct: payload.expectedReturnPct,
  maxLossPct: -Math.abs(payload.maxLossPct),
  positionSizeFraction: clamp(payload.positionSizeFraction, sizing.minPositionFraction, sizing.maxPositionFraction),
  confidence: clamp(payload.confidence, 0, 1),
  holdingPeriodDays: Math.max(1, payload.holdingPeriodDays),
  entryConditions: payload.entryConditions,
  exitConditions: payload.exitConditions,
  debateSummary: describeTally(tally)
});

export const runStrategyPhase = async (state: StateRecord, deps: StrategyDeps): Promise<StateRecord> => {
  try {
    const tally = tallyDebate(state.debateArguments);
    const raw = await deps.reasoning.generate({
      role: 'strategist',
      instruction: instructionFor('strategist'),
      context: {
        symbol: state.symbol,
        direction: tally.direction,
        debateSummary: describeTally(tally),
        arguments: state.debateArguments.map((a) => ({ position: a.position, round: a.round, argument: a.argument })),
        reports: summarizeReports(state.analystReports),
        sizing: deps.sizing
      }
    });
    const payload = parseReasoningPayload(raw, strategyPayloadSchema, STRATEGY_DEFAULTS, 'strategist');
    state.strategyProposal = buildProposal(state.symbol, payload, tally, deps.sizing);
    const p = state.strategyProposal;
    console.log(`[strategy] ${state.symbol}: ${p.kind} (${p.direction}), size ${(p.positionSizeFraction * 100).toFixed(2)}%.`);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[strategy] ${message}`);
    recordError(state, `Strategy error: ${message}`);
  }
  state.strategyComplete = true;
  return state;
};
