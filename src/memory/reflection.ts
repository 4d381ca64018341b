import { Reflection, TradeOutcome, TradeOutcomeStatus } from '../core/types';
import { round } from '../core/utils';
import { EpisodicStore } from './episodicStore';

export type ReflectionResult =
  | { ok: true; outcome: TradeOutcome; reflection: Reflection }
  | { ok: false; error: string };

// Returns inside +/- this many percent count as breakeven.
const BREAKEVEN_BAND_PCT = 0.01;

export const closeTrade = (trade: TradeOutcome, exitPrice: number, exitDate: string): TradeOutcome => {
  const direction = trade.side === 'BUY' ? 1 : -1;
  const move = exitPrice - trade.entryPrice;
  const returnPct = trade.entryPrice > 0 ? round(((direction * move) / trade.entryPrice) * 100, 4) : 0;
  let outcome: TradeOutcomeStatus = 'breakeven';
  if (returnPct > BREAKEVEN_BAND_PCT) outcome = 'win';
  else if (returnPct < -BREAKEVEN_BAND_PCT) outcome = 'loss';
  return {
    ...trade,
    exitDate,
    exitPrice,
    realizedPnl: round(direction * move * trade.quantity, 2),
    returnPct,
    outcome
  };
};

export const buildReflection = (closed: TradeOutcome, createdAt: string): Reflection => {
  const returnPct = closed.returnPct ?? 0;
  const success = closed.outcome === 'win';
  return {
    tradeId: closed.tradeId,
    symbol: closed.symbol,
    outcomeSummary: `Trade ${success ? 'succeeded' : 'failed'} with ${returnPct.toFixed(1)}% return`,
    whatWorked: success ? [`${closed.strategyKind} thesis played out`] : [],
    whatFailed: success ? [] : ['Strategy did not achieve expected returns'],
    lessons: [success ? 'Market conditions evolved as expected' : 'Market behaved differently than anticipated'],
    adjustments: success
      ? ['Continue monitoring similar opportunities']
      : ['Review entry/exit conditions', 'Re-evaluate confidence scoring'],
    createdAt
  };
};

/**
 * Closes a pending trade at the given exit and records a reflection on it.
 * Runs outside the pipeline; nothing is written for an unknown or closed trade.
 */
export const reflectOnTrade = (
  store: EpisodicStore,
  tradeId: string,
  exitPrice: number,
  exitDate: string,
  now: Date = new Date()
): ReflectionResult => {
  if (!Number.isFinite(exitPrice) || exitPrice <= 0) {
    return { ok: false, error: `Invalid exit price: ${exitPrice}` };
  }
  const trade = store.getTrade(tradeId);
  if (!trade) {
    return { ok: false, error: `Unknown trade id: ${tradeId}` };
  }
  if (trade.outcome !== 'pending') {
    return { ok: false, error: `Trade ${tradeId} is already closed (${trade.outcome})` };
  }
  const outcome = closeTrade(trade, exitPrice, exitDate);
  const reflection = buildReflection(outcome, now.toISOString());
  store.recordTrade(outcome);
  store.recordReflection(reflection);
  return { ok: true, outcome, reflection };
};
