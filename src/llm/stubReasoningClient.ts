import { AgentRole, Sentiment } from '../core/types';
import { hashString, mulberry32, round } from '../core/utils';
import { ReasoningClient, ReasoningRequest } from './reasoningClient';

const SENTIMENTS: Sentiment[] = ['bearish', 'neutral', 'bullish'];

const contextString = (context: Record<string, unknown>, key: string, fallback: string): string => {
  const value = context[key];
  return typeof value === 'string' ? value : fallback;
};

const contextNumber = (context: Record<string, unknown>, key: string, fallback: number): number => {
  const value = context[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
};

/**
 * Offline reasoning backend. Answers are JSON, keyed by role and seeded by
 * symbol and round so identical inputs always produce identical output.
 */
export class StubReasoningClient implements ReasoningClient {
  private calls: { role: AgentRole; symbol: string }[] = [];

  getCalls() {
    return this.calls.slice();
  }

  async generate(request: ReasoningRequest): Promise<string> {
    const symbol = contextString(request.context, 'symbol', 'UNKNOWN');
    const roundNo = contextNumber(request.context, 'round', 0);
    this.calls.push({ role: request.role, symbol });
    const rng = mulberry32(hashString(`${request.role}-${symbol}-${roundNo}`));
    const pick = <T>(items: T[]): T => items[Math.floor(rng() * items.length)];
    const confidence = round(0.55 + rng() * 0.2, 2);

    switch (request.role) {
      case 'fundamentals_analyst':
        return JSON.stringify({
          summary: `${symbol} trades near its estimated fair value with stable margins.`,
          thesis: pick(SENTIMENTS),
          keyPoints: ['Revenue growth in line with sector', 'Balance sheet carries modest leverage'],
          confidence
        });
      case 'macro_news_analyst':
        return JSON.stringify({
          summary: 'Rates steady; growth data mixed.',
          marketSentiment: pick(SENTIMENTS),
          keyEvents: ['Central bank holds policy rate'],
          themes: ['rates', 'earnings season'],
          confidence
        });
      case 'sentiment_analyst':
        return JSON.stringify({
          summary: `Social chatter on ${symbol} is moderate.`,
          socialSentiment: pick(SENTIMENTS),
          sentimentScore: round(rng() * 0.8 - 0.4, 2),
          trendingTopics: [`${symbol} earnings`],
          confidence
        });
      case 'technical_analyst':
        return JSON.stringify({
          summary: `${symbol} holds above its recent range midpoint.`,
          trend: pick(['downtrend', 'sideways', 'uptrend']),
          patterns: ['range consolidation'],
          confidence
        });
      case 'news_sentiment_analyst':
        return JSON.stringify({
          summary: `Headline tone for ${symbol} is balanced.`,
          sentiment: pick(SENTIMENTS),
          sentimentScore: round(rng() * 0.6 - 0.3, 2),
          confidence
        });
      case 'generative_analyst':
        return JSON.stringify({
          summary: `Combined read on ${symbol}: no dominant catalyst.`,
          keyInsights: ['Signals are mixed across analysts'],
          risks: ['Macro surprise'],
          opportunities: ['Range breakout'],
          confidence
        });
      case 'bullish_researcher':
        return JSON.stringify({
          argument: `Round ${roundNo}: ${symbol} has room to rerate on steady execution.`,
          evidence: ['Stable margins', 'Constructive trend'],
          counterpoints: roundNo > 1 ? ['Bear case overweights macro risk'] : [],
          confidence
        });
      case 'bearish_researcher':
        return JSON.stringify({
          argument: `Round ${roundNo}: ${symbol} upside is priced in.`,
          evidence: ['Valuation near fair value'],
          counterpoints: ['Bull case assumes margins hold'],
          confidence
        });
      case 'strategist': {
        const direction = contextString(request.context, 'direction', 'long');
        const kind = direction === 'short' ? 'short_equity' : direction === 'neutral' ? 'iron_condor' : 'long_equity';
        return JSON.stringify({
          kind,
          rationale: `Debate leaned ${direction}; sized conservatively.`,
          positionSizeFraction: 0.02,
          expectedReturnPct: 8,
          maxLossPct: -5,
          holdingPeriodDays: 30,
          confidence,
          entryConditions: ['Enter at next session open'],
          exitConditions: ['Stop at max loss', 'Take profit at target']
        });
      }
      case 'trader':
        return JSON.stringify({
          orderType: 'LIMIT',
          limitOffsetBps: 5,
          slippageTolerancePct: 0.1,
          timing: 'Work the order over the first hour',
          contingencies: ['Cancel if not filled by close']
        });
      case 'risk_manager':
        return JSON.stringify({
          approved: true,
          riskScore: round(0.2 + rng() * 0.2, 2),
          recommendation: 'Proceed with standard monitoring.',
          rationale: 'Size and loss budget within limits.',
          additionalWarnings: []
        });
      case 'portfolio_manager':
        return JSON.stringify({
          approved: true,
          rationale: 'Fits portfolio objectives at the proposed size.',
          monitoringRequirements: ['Review daily P&L'],
          exitTriggers: ['Max loss reached']
        });
      case 'reflective_agent':
        return JSON.stringify({ summary: `No further notes on ${symbol}.` });
    }
  }
}
