import { z } from 'zod';
import {
  AgentRole,
  AnalystId,
  FundamentalsReport,
  GenerativeInsightReport,
  MacroNewsReport,
  NewsSentimentReport,
  ReportFor,
  SentimentReport,
  TechnicalReport
} from '../core/types';
import {
  fundamentalsPayloadSchema,
  generativeInsightPayloadSchema,
  macroNewsPayloadSchema,
  newsSentimentPayloadSchema,
  sentimentPayloadSchema,
  technicalPayloadSchema
} from '../core/schema';
import { clamp, round, truncate } from '../core/utils';
import { MarketDataService } from '../data/marketData.types';
import { Headline, NewsService } from '../data/news.types';
import { parseReasoningPayload } from '../llm/extractPayload';
import { instructionFor } from '../llm/prompts';
import { ReasoningClient } from '../llm/reasoningClient';
import { annualizedVolatility, detectPatterns, supportResistance } from './indicators';

export interface AnalysisContext {
  symbol: string;
  asOf: string;
  startDate?: string;
  endDate?: string;
  headlines: Headline[];
  marketData: MarketDataService;
  news: NewsService;
  reasoning: ReasoningClient;
  now: () => Date;
}

export interface Analyst<K extends AnalystId = AnalystId> {
  id: K;
  role: AgentRole;
  analyze(ctx: AnalysisContext): Promise<ReportFor<K>>;
}

// One member per analyst id.
export type AnyAnalyst = { [K in AnalystId]: Analyst<K> }[AnalystId];

const HISTORY_LOOKBACK_DAYS = 120;
const DEGRADED_CONFIDENCE = 0.3;

const base = (role: AgentRole, ctx: AnalysisContext, summary: string, confidence: number, metadata: Record<string, unknown> = {}) => ({
  role,
  symbol: ctx.symbol,
  summary,
  confidence: clamp(confidence, 0, 1),
  timestamp: ctx.now().toISOString(),
  metadata
});

const ask = async <T>(
  ctx: AnalysisContext,
  role: AgentRole,
  context: Record<string, unknown>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: (raw: string) => T
): Promise<T> => {
  const raw = await ctx.reasoning.generate({
    role,
    instruction: instructionFor(role),
    context: { symbol: ctx.symbol, asOf: ctx.asOf, startDate: ctx.startDate, endDate: ctx.endDate, ...context }
  });
  return parseReasoningPayload(raw, schema, fallback(raw), role);
};

const headlineTitles = (ctx: AnalysisContext) => ctx.headlines.map((h) => h.title);

export const fundamentalsAnalyst: Analyst<'fundamentals'> = {
  id: 'fundamentals',
  role: 'fundamentals_analyst',
  async analyze(ctx): Promise<FundamentalsReport> {
    const [fundamentals, quote] = await Promise.all([
      ctx.marketData.getFundamentals(ctx.symbol),
      ctx.marketData.getQuote(ctx.symbol, ctx.asOf)
    ]);
    const payload = await ask(ctx, this.role, { fundamentals, price: quote.price }, fundamentalsPayloadSchema, (raw) => ({
      summary: truncate(raw, 200),
      thesis: 'neutral' as const,
      keyPoints: [],
      intrinsicValue: undefined,
      confidence: DEGRADED_CONFIDENCE
    }));
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence, { fundamentals }),
      kind: 'fundamentals',
      thesis: payload.thesis,
      keyPoints: payload.keyPoints,
      peRatio: fundamentals.peRatio,
      intrinsicValue: payload.intrinsicValue,
      currentPrice: quote.price
    };
  }
};

export const macroNewsAnalyst: Analyst<'macro_news'> = {
  id: 'macro_news',
  role: 'macro_news_analyst',
  async analyze(ctx): Promise<MacroNewsReport> {
    const payload = await ask(ctx, this.role, { headlines: headlineTitles(ctx) }, macroNewsPayloadSchema, (raw) => ({
      summary: truncate(raw, 200),
      marketSentiment: 'neutral' as const,
      keyEvents: [],
      themes: [],
      confidence: DEGRADED_CONFIDENCE
    }));
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence, { headlineCount: ctx.headlines.length }),
      kind: 'macro_news',
      marketSentiment: payload.marketSentiment,
      keyEvents: payload.keyEvents,
      themes: payload.themes
    };
  }
};

export const sentimentAnalyst: Analyst<'sentiment'> = {
  id: 'sentiment',
  role: 'sentiment_analyst',
  async analyze(ctx): Promise<SentimentReport> {
    const payload = await ask(ctx, this.role, { headlines: headlineTitles(ctx) }, sentimentPayloadSchema, (raw) => ({
      summary: truncate(raw, 200),
      socialSentiment: 'neutral' as const,
      sentimentScore: 0,
      trendingTopics: [],
      confidence: DEGRADED_CONFIDENCE
    }));
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence),
      kind: 'sentiment',
      socialSentiment: payload.socialSentiment,
      sentimentScore: clamp(payload.sentimentScore, -1, 1),
      trendingTopics: payload.trendingTopics
    };
  }
};

export const technicalAnalyst: Analyst<'technical'> = {
  id: 'technical',
  role: 'technical_analyst',
  async analyze(ctx): Promise<TechnicalReport> {
    const bars = await ctx.marketData.getHistory(ctx.symbol, ctx.asOf, HISTORY_LOOKBACK_DAYS);
    const closes = bars.map((b) => b.close);
    const levels = supportResistance(closes);
    const computedPatterns = detectPatterns(closes);
    const volatility = annualizedVolatility(closes);
    const payload = await ask(
      ctx,
      this.role,
      {
        lastClose: closes[closes.length - 1],
        supportLevels: levels.support,
        resistanceLevels: levels.resistance,
        patterns: computedPatterns,
        volatility
      },
      technicalPayloadSchema,
      (raw) => ({ summary: truncate(raw, 200), trend: 'sideways' as const, patterns: [], confidence: DEGRADED_CONFIDENCE })
    );
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence, { bars: bars.length }),
      kind: 'technical',
      trend: payload.trend,
      supportLevels: levels.support,
      resistanceLevels: levels.resistance,
      patterns: Array.from(new Set([...computedPatterns, ...payload.patterns])),
      volatility: volatility === undefined ? undefined : round(volatility, 4)
    };
  }
};

export const newsSentimentAnalyst: Analyst<'news_sentiment'> = {
  id: 'news_sentiment',
  role: 'news_sentiment_analyst',
  async analyze(ctx): Promise<NewsSentimentReport> {
    if (!ctx.headlines.length) {
      return {
        ...base(this.role, ctx, 'No headlines available to score.', DEGRADED_CONFIDENCE),
        kind: 'news_sentiment',
        sentiment: 'neutral',
        sentimentScore: 0,
        textsAnalyzed: 0
      };
    }
    const payload = await ask(ctx, this.role, { headlines: headlineTitles(ctx) }, newsSentimentPayloadSchema, (raw) => ({
      summary: truncate(raw, 200),
      sentiment: 'neutral' as const,
      sentimentScore: 0,
      confidence: DEGRADED_CONFIDENCE
    }));
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence),
      kind: 'news_sentiment',
      sentiment: payload.sentiment,
      sentimentScore: clamp(payload.sentimentScore, -1, 1),
      textsAnalyzed: ctx.headlines.length
    };
  }
};

export const generativeInsightAnalyst: Analyst<'generative_insight'> = {
  id: 'generative_insight',
  role: 'generative_analyst',
  async analyze(ctx): Promise<GenerativeInsightReport> {
    const [quote, sector] = await Promise.all([
      ctx.marketData.getQuote(ctx.symbol, ctx.asOf),
      ctx.marketData.getSector(ctx.symbol)
    ]);
    const payload = await ask(
      ctx,
      this.role,
      { price: quote.price, sector, headlines: headlineTitles(ctx) },
      generativeInsightPayloadSchema,
      (raw) => ({ summary: truncate(raw, 200), keyInsights: [], risks: [], opportunities: [], confidence: DEGRADED_CONFIDENCE })
    );
    return {
      ...base(this.role, ctx, payload.summary, payload.confidence, { sector }),
      kind: 'generative_insight',
      keyInsights: payload.keyInsights,
      risks: payload.risks,
      opportunities: payload.opportunities
    };
  }
};

export const defaultAnalysts = (): AnyAnalyst[] => [
  fundamentalsAnalyst,
  macroNewsAnalyst,
  sentimentAnalyst,
  technicalAnalyst,
  newsSentimentAnalyst,
  generativeInsightAnalyst
];
