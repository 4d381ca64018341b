import { advisorResponseSchema } from '../core/schema';
import { Quote } from '../data/marketData.types';
import { clamp, errorMessage, round } from '../core/utils';
import { TradeDirection } from '../core/types';

export interface AdvisorStateVector {
  symbol: string;
  price: number;
  bid: number;
  ask: number;
  spread: number;
  sentimentSignal: number;
  patternConfidence: number;
  strategyDirection: number;
  combinedSignal: number;
}

export type AdvisorAction = 'buy' | 'sell' | 'hold';

export interface AdvisorDecision {
  action: AdvisorAction;
  confidence: number;
  timing: string;
  slippageEstimatePct: number;
  source: 'service' | 'rule';
}

export interface ExecutionAdvisorOptions {
  enabled: boolean;
  endpoint: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export const BUY_THRESHOLD = 0.3;
export const SELL_THRESHOLD = -0.3;

const directionValue = (direction: TradeDirection): number => {
  if (direction === 'long') return 1;
  if (direction === 'short') return -1;
  return 0;
};

export const buildStateVector = (
  quote: Quote,
  direction: TradeDirection,
  sentimentSignal: number,
  patternConfidence: number
): AdvisorStateVector => {
  const strategyDirection = directionValue(direction);
  const sentiment = clamp(sentimentSignal, -1, 1);
  const pattern = clamp(patternConfidence, 0, 1);
  return {
    symbol: quote.symbol,
    price: quote.price,
    bid: quote.bid,
    ask: quote.ask,
    spread: round(quote.ask - quote.bid, 4),
    sentimentSignal: sentiment,
    patternConfidence: pattern,
    strategyDirection,
    combinedSignal: round(sentiment * 0.3 + pattern * strategyDirection * 0.3 + strategyDirection * 0.4, 4)
  };
};

export const ruleBasedDecision = (state: AdvisorStateVector): AdvisorDecision => {
  let action: AdvisorAction = 'hold';
  let confidence = 0.5;
  if (state.combinedSignal > BUY_THRESHOLD) {
    action = 'buy';
    confidence = Math.min(1, (state.combinedSignal - BUY_THRESHOLD) / 0.7 + 0.5);
  } else if (state.combinedSignal < SELL_THRESHOLD) {
    action = 'sell';
    confidence = Math.min(1, (SELL_THRESHOLD - state.combinedSignal) / 0.7 + 0.5);
  }
  if (state.sentimentSignal * state.strategyDirection > 0) confidence *= 1.1;
  if (state.patternConfidence > 0.7) confidence *= 1.05;
  const slippageEstimatePct = state.price > 0 ? round((state.spread / state.price) * 100, 4) : 0.1;
  return {
    action,
    confidence: round(Math.min(1, confidence), 4),
    timing: 'immediate',
    slippageEstimatePct,
    source: 'rule'
  };
};

/**
 * Asks the external execution service for timing and slippage. The call is
 * bounded by `timeoutMs`; any timeout, HTTP error, network error or unusable
 * body falls back to the local rule.
 */
export class ExecutionAdvisor {
  private options: ExecutionAdvisorOptions;
  private fetchImpl: typeof fetch;

  constructor(options: ExecutionAdvisorOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async advise(state: AdvisorStateVector): Promise<AdvisorDecision> {
    if (!this.options.enabled) return ruleBasedDecision(state);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const url = `${this.options.endpoint.replace(/\/+$/, '')}/predict`;
    try {
      const resp = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ symbol: state.symbol, state }),
        signal: controller.signal
      });
      if (!resp.ok) {
        console.warn(`[advisor] service returned ${resp.status}; using rule-based fallback.`);
        return ruleBasedDecision(state);
      }
      const parsed = advisorResponseSchema.safeParse(await resp.json());
      if (!parsed.success) {
        console.warn('[advisor] unusable service response; using rule-based fallback.');
        return ruleBasedDecision(state);
      }
      const fallback = ruleBasedDecision(state);
      return {
        action: parsed.data.action,
        confidence: parsed.data.confidence ?? fallback.confidence,
        timing: parsed.data.timing ?? fallback.timing,
        slippageEstimatePct: parsed.data.slippageEstimatePct ?? fallback.slippageEstimatePct,
        source: 'service'
      };
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${this.options.timeoutMs}ms` : errorMessage(err);
      console.warn(`[advisor] service call failed (${reason}); using rule-based fallback.`);
      return ruleBasedDecision(state);
    } finally {
      clearTimeout(timer);
    }
  }
}
