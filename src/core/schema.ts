import { z } from 'zod';
import { STRATEGY_KINDS, StrategyKind } from './types';

const sentimentSchema = z
  .enum(['very_bearish', 'bearish', 'neutral', 'bullish', 'very_bullish'])
  .catch('neutral');

const trendSchema = z
  .enum(['strong_downtrend', 'downtrend', 'sideways', 'uptrend', 'strong_uptrend'])
  .catch('sideways');

const textList = z.array(z.string()).catch([]);

// Models often answer 0..100 for a confidence; anything above 1 is read as a percentage.
const unitScore = z.coerce
  .number()
  .catch(0.5)
  .transform((v) => (v > 1 ? v / 100 : v));

export const fundamentalsPayloadSchema = z.object({
  summary: z.string(),
  thesis: sentimentSchema,
  keyPoints: textList,
  intrinsicValue: z.number().positive().optional(),
  confidence: unitScore
});

export const macroNewsPayloadSchema = z.object({
  summary: z.string(),
  marketSentiment: sentimentSchema,
  keyEvents: textList,
  themes: textList,
  confidence: unitScore
});

export const sentimentPayloadSchema = z.object({
  summary: z.string(),
  socialSentiment: sentimentSchema,
  sentimentScore: z.number().min(-1).max(1).catch(0),
  trendingTopics: textList,
  confidence: unitScore
});

export const technicalPayloadSchema = z.object({
  summary: z.string(),
  trend: trendSchema,
  patterns: textList,
  confidence: unitScore
});

export const newsSentimentPayloadSchema = z.object({
  summary: z.string(),
  sentiment: sentimentSchema,
  sentimentScore: z.number().min(-1).max(1).catch(0),
  confidence: unitScore
});

export const generativeInsightPayloadSchema = z.object({
  summary: z.string(),
  keyInsights: textList,
  risks: textList,
  opportunities: textList,
  confidence: unitScore
});

export const debatePayloadSchema = z.object({
  argument: z.string().min(1),
  evidence: textList,
  counterpoints: textList,
  confidence: unitScore
});

export type DebatePayload = z.infer<typeof debatePayloadSchema>;

const isStrategyKind = (value: string): value is StrategyKind =>
  STRATEGY_KINDS.some((kind) => kind === value);

// Unknown kinds stay undefined so the strategist can pick one by direction.
const strategyKindSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase().replace(/[\s-]+/g, '_'))
  .transform((v): StrategyKind | undefined => (isStrategyKind(v) ? v : undefined))
  .optional()
  .catch(undefined);

export const strategyPayloadSchema = z.object({
  kind: strategyKindSchema,
  rationale: z.string(),
  positionSizeFraction: z.number(),
  expectedReturnPct: z.number(),
  maxLossPct: z.number(),
  holdingPeriodDays: z.number().int().positive(),
  confidence: unitScore,
  entryConditions: textList,
  exitConditions: textList
});

export type StrategyPayload = z.infer<typeof strategyPayloadSchema>;

export const tradingPayloadSchema = z.object({
  orderType: z.enum(['MARKET', 'LIMIT', 'STOP', 'STOP_LIMIT']),
  limitOffsetBps: z.number().min(0).max(500).optional(),
  slippageTolerancePct: z.number().min(0).max(5),
  timing: z.string().optional(),
  contingencies: textList
});

export type TradingPayload = z.infer<typeof tradingPayloadSchema>;

export const riskJudgmentSchema = z.object({
  approved: z.boolean(),
  riskScore: unitScore,
  recommendation: z.string().catch(''),
  rationale: z.string().catch(''),
  additionalWarnings: textList
});

export type RiskJudgment = z.infer<typeof riskJudgmentSchema>;

export const portfolioJudgmentSchema = z.object({
  approved: z.boolean(),
  rationale: z.string(),
  monitoringRequirements: textList,
  exitTriggers: textList
});

export type PortfolioJudgment = z.infer<typeof portfolioJudgmentSchema>;

export const advisorResponseSchema = z.object({
  action: z.enum(['buy', 'sell', 'hold']),
  timing: z.string().optional(),
  slippageEstimatePct: z.number().min(0).optional(),
  confidence: z.number().min(0).max(1).optional()
});

export type AdvisorResponse = z.infer<typeof advisorResponseSchema>;

export const runRequestSchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .max(10)
    .regex(/^[A-Za-z.\-]+$/, 'symbol must be letters, dots or dashes'),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  rounds: z.number().int().min(1).max(10).optional(),
  sequential: z.boolean().optional()
});

export type RunRequest = z.infer<typeof runRequestSchema>;

export const validateRunRequest = (
  input: unknown
): { success: true; value: RunRequest } | { success: false; errors: string[] } => {
  const result = runRequestSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
  return { success: false, errors };
};
