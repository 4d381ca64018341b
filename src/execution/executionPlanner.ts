import {
  AnalystReports,
  ExecutionPlan,
  OptionRight,
  OrderType,
  StateRecord,
  StrategyKind,
  StrategyProposal,
  TradeOrder,
  TradeSide
} from '../core/types';
import { TradingPayload, tradingPayloadSchema } from '../core/schema';
import { recordError } from '../core/state';
import { formatISODate } from '../core/time';
import { errorMessage, round, sum } from '../core/utils';
import { MarketDataService, Quote } from '../data/marketData.types';
import { parseReasoningPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';
import { AdvisorDecision, ExecutionAdvisor, buildStateVector } from './executionAdvisor';
import { CONTRACT_MULTIPLIER, daysBetween, estimatePremium } from './optionPricing';

export const DEFAULT_EXPIRY_DAYS = 30;

interface OptionLeg {
  side: TradeSide;
  right: OptionRight;
  strikeFactor: number;
  expiryDays?: number;
}

interface LegTemplate {
  // Equity leg sized in whole contracts so the options stay covered.
  stockSide?: TradeSide;
  options: OptionLeg[];
}

export const LEG_TABLE: Record<Exclude<StrategyKind, 'long_equity' | 'short_equity'>, LegTemplate> = {
  covered_call: { stockSide: 'BUY', options: [{ side: 'SELL', right: 'call', strikeFactor: 1.05 }] },
  protective_put: { stockSide: 'BUY', options: [{ side: 'BUY', right: 'put', strikeFactor: 0.95 }] },
  bull_call_spread: {
    options: [
      { side: 'BUY', right: 'call', strikeFactor: 1.0 },
      { side: 'SELL', right: 'call', strikeFactor: 1.05 }
    ]
  },
  bear_put_spread: {
    options: [
      { side: 'BUY', right: 'put', strikeFactor: 1.0 },
      { side: 'SELL', right: 'put', strikeFactor: 0.95 }
    ]
  },
  straddle: {
    options: [
      { side: 'BUY', right: 'call', strikeFactor: 1.0 },
      { side: 'BUY', right: 'put', strikeFactor: 1.0 }
    ]
  },
  strangle: {
    options: [
      { side: 'BUY', right: 'call', strikeFactor: 1.05 },
      { side: 'BUY', right: 'put', strikeFactor: 0.95 }
    ]
  },
  iron_condor: {
    options: [
      { side: 'SELL', right: 'call', strikeFactor: 1.025 },
      { side: 'BUY', right: 'call', strikeFactor: 1.05 },
      { side: 'SELL', right: 'put', strikeFactor: 0.975 },
      { side: 'BUY', right: 'put', strikeFactor: 0.95 }
    ]
  },
  calendar_spread: {
    options: [
      { side: 'SELL', right: 'call', strikeFactor: 1.0 },
      { side: 'BUY', right: 'call', strikeFactor: 1.0, expiryDays: 60 }
    ]
  }
};

export const TRADING_DEFAULTS: TradingPayload = {
  orderType: 'LIMIT',
  limitOffsetBps: 0,
  slippageTolerancePct: 0.1,
  timing: undefined,
  contingencies: ['Cancel unfilled orders at market close']
};

export interface SizedPosition {
  positionValue: number;
  shares: number;
  contracts: number;
}

export const sizePosition = (totalValue: number, fraction: number, price: number): SizedPosition => {
  const positionValue = round(totalValue * fraction, 2);
  const shares = price > 0 ? Math.max(1, Math.floor(positionValue / price)) : 1;
  return { positionValue, shares, contracts: Math.max(1, Math.floor(shares / CONTRACT_MULTIPLIER)) };
};

const addDays = (asOf: string, days: number): string => {
  const d = new Date(`${asOf}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return formatISODate(d);
};

const limitFor = (side: TradeSide, quote: Quote, offsetBps: number): number =>
  side === 'BUY' ? round(quote.ask * (1 + offsetBps / 10000), 2) : round(quote.bid * (1 - offsetBps / 10000), 2);

const equityOrder = (
  symbol: string,
  side: TradeSide,
  quantity: number,
  quote: Quote,
  trading: TradingPayload
): TradeOrder => {
  const orderType: OrderType = trading.orderType;
  const needsLimit = orderType === 'LIMIT' || orderType === 'STOP_LIMIT';
  return {
    symbol,
    side,
    orderType,
    quantity,
    instrument: 'equity',
    limitPrice: needsLimit ? limitFor(side, quote, trading.limitOffsetBps ?? 0) : undefined,
    timeInForce: 'DAY'
  };
};

/**
 * Turns a proposal into concrete orders. Equity kinds give a single share
 * order; option kinds give one order per leg of the fixed template.
 */
export const planOrders = (
  proposal: StrategyProposal,
  quote: Quote,
  totalValue: number,
  asOf: string,
  trading: TradingPayload = TRADING_DEFAULTS
): TradeOrder[] => {
  const { shares, contracts } = sizePosition(totalValue, proposal.positionSizeFraction, quote.price);
  if (proposal.kind === 'long_equity') return [equityOrder(proposal.symbol, 'BUY', shares, quote, trading)];
  if (proposal.kind === 'short_equity') return [equityOrder(proposal.symbol, 'SELL', shares, quote, trading)];

  const template = LEG_TABLE[proposal.kind];
  const orders: TradeOrder[] = [];
  if (template.stockSide) {
    orders.push(equityOrder(proposal.symbol, template.stockSide, contracts * CONTRACT_MULTIPLIER, quote, trading));
  }
  for (const leg of template.options) {
    orders.push({
      symbol: proposal.symbol,
      side: leg.side,
      orderType: 'MARKET',
      quantity: contracts,
      instrument: 'option',
      option: {
        right: leg.right,
        strike: round(quote.price * leg.strikeFactor, 2),
        expiry: addDays(asOf, leg.expiryDays ?? DEFAULT_EXPIRY_DAYS)
      },
      timeInForce: 'DAY'
    });
  }
  return orders;
};

// Net cash out: purchases positive, sales and written premium negative.
export const estimateCost = (orders: TradeOrder[], quote: Quote): number =>
  round(
    sum(
      orders.map((o) => {
        const sign = o.side === 'BUY' ? 1 : -1;
        if (o.instrument === 'option' && o.option) {
          const days = Math.max(1, daysBetween(quote.asOf, o.option.expiry));
          return sign * estimatePremium(quote.price, o.option.strike, o.option.right, days) * o.quantity * CONTRACT_MULTIPLIER;
        }
        return sign * (o.limitPrice ?? quote.price) * o.quantity;
      })
    ),
    2
  );

const scoreOf = (reports: AnalystReports): number => {
  const scores: number[] = [];
  const sentiment = reports.sentiment;
  if (sentiment?.status === 'ok' && sentiment.report.kind === 'sentiment') scores.push(sentiment.report.sentimentScore);
  const news = reports.news_sentiment;
  if (news?.status === 'ok' && news.report.kind === 'news_sentiment') scores.push(news.report.sentimentScore);
  return scores.length ? sum(scores) / scores.length : 0;
};

const patternConfidenceOf = (reports: AnalystReports): number => {
  const technical = reports.technical;
  return technical?.status === 'ok' ? technical.report.confidence : 0.5;
};

export interface ExecutionPlanningDeps {
  marketData: MarketDataService;
  reasoning: ReasoningClient;
  advisor: ExecutionAdvisor;
  totalValue: number;
  now?: () => Date;
}

export const buildExecutionPlan = async (
  state: StateRecord,
  proposal: StrategyProposal,
  deps: ExecutionPlanningDeps,
  asOf: string
): Promise<ExecutionPlan> => {
  const quote = await deps.marketData.getQuote(proposal.symbol, asOf);
  const vector = buildStateVector(
    quote,
    proposal.direction,
    scoreOf(state.analystReports),
    patternConfidenceOf(state.analystReports)
  );
  const advice: AdvisorDecision = await deps.advisor.advise(vector);
  const raw = await deps.reasoning.generate({
    role: 'trader',
    instruction: instructionFor('trader'),
    context: {
      symbol: proposal.symbol,
      strategy: proposal.kind,
      direction: proposal.direction,
      positionSizeFraction: proposal.positionSizeFraction,
      quote,
      advisor: advice
    }
  });
  const trading = parseReasoningPayload(raw, tradingPayloadSchema, TRADING_DEFAULTS, 'trader');
  const orders = planOrders(proposal, quote, deps.totalValue, asOf, trading);
  const contingencies = trading.contingencies.length ? trading.contingencies : TRADING_DEFAULTS.contingencies;
  return {
    symbol: proposal.symbol,
    strategyKind: proposal.kind,
    orders,
    estimatedCost: estimateCost(orders, quote),
    estimatedSlippagePct: Math.max(advice.slippageEstimatePct, 0),
    timing: trading.timing ?? advice.timing,
    contingencies,
    advisorSource: advice.source,
    rationale: `Advisor (${advice.source}) suggests ${advice.action} at ${round(advice.confidence, 2)} confidence; ${orders.length} order(s) for ${proposal.kind}.`
  };
};

export const runExecutionPlanningPhase = async (
  state: StateRecord,
  deps: ExecutionPlanningDeps
): Promise<StateRecord> => {
  const now = deps.now ?? (() => new Date());
  try {
    const proposal = state.strategyProposal;
    if (!proposal) {
      console.warn(`[planning] ${state.symbol}: no strategy proposal; nothing to plan.`);
    } else {
      const asOf = state.endDate ?? formatISODate(now());
      state.executionPlan = await buildExecutionPlan(state, proposal, deps, asOf);
      console.log(
        `[planning] ${state.symbol}: ${state.executionPlan.orders.length} order(s), est. cost ${state.executionPlan.estimatedCost}.`
      );
    }
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[planning] ${message}`);
    recordError(state, `Execution planning error: ${message}`);
  }
  state.executionPlanComplete = true;
  return state;
};
