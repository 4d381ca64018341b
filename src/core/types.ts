export type AnalystId =
  | 'fundamentals'
  | 'macro_news'
  | 'sentiment'
  | 'technical'
  | 'news_sentiment'
  | 'generative_insight';

// Launch order for sequential mode; reports are keyed by id regardless of mode.
export const ANALYST_IDS: readonly AnalystId[] = [
  'fundamentals',
  'macro_news',
  'sentiment',
  'technical',
  'news_sentiment',
  'generative_insight'
];

export type AgentRole =
  | 'fundamentals_analyst'
  | 'macro_news_analyst'
  | 'sentiment_analyst'
  | 'technical_analyst'
  | 'news_sentiment_analyst'
  | 'generative_analyst'
  | 'bullish_researcher'
  | 'bearish_researcher'
  | 'strategist'
  | 'trader'
  | 'risk_manager'
  | 'portfolio_manager'
  | 'reflective_agent';

export type Sentiment = 'very_bearish' | 'bearish' | 'neutral' | 'bullish' | 'very_bullish';
export type TrendDirection = 'strong_downtrend' | 'downtrend' | 'sideways' | 'uptrend' | 'strong_uptrend';

interface ReportBase {
  role: AgentRole;
  symbol: string;
  summary: string;
  confidence: number; // 0..1, clamped on construction
  timestamp: string;
  metadata: Record<string, unknown>;
}

export interface FundamentalsReport extends ReportBase {
  kind: 'fundamentals';
  thesis: Sentiment;
  keyPoints: string[];
  peRatio?: number;
  intrinsicValue?: number;
  currentPrice?: number;
}

export interface MacroNewsReport extends ReportBase {
  kind: 'macro_news';
  marketSentiment: Sentiment;
  keyEvents: string[];
  themes: string[];
}

export interface SentimentReport extends ReportBase {
  kind: 'sentiment';
  socialSentiment: Sentiment;
  sentimentScore: number; // -1..1
  trendingTopics: string[];
}

export interface TechnicalReport extends ReportBase {
  kind: 'technical';
  trend: TrendDirection;
  supportLevels: number[];
  resistanceLevels: number[];
  patterns: string[];
  volatility?: number;
}

export interface NewsSentimentReport extends ReportBase {
  kind: 'news_sentiment';
  sentiment: Sentiment;
  sentimentScore: number; // -1..1
  textsAnalyzed: number;
}

export interface GenerativeInsightReport extends ReportBase {
  kind: 'generative_insight';
  keyInsights: string[];
  risks: string[];
  opportunities: string[];
}

export type AgentReport =
  | FundamentalsReport
  | MacroNewsReport
  | SentimentReport
  | TechnicalReport
  | NewsSentimentReport
  | GenerativeInsightReport;

export type ReportFor<K extends AnalystId> = Extract<AgentReport, { kind: K }>;

export type ReportSlot =
  | { status: 'ok'; report: AgentReport }
  | { status: 'missing'; analyst: AnalystId; error: string };

export type AnalystReports = Partial<Record<AnalystId, ReportSlot>>;

export type DebatePosition = 'bullish' | 'bearish';
export type DebateRole = 'bullish_researcher' | 'bearish_researcher';

export interface DebateArgument {
  role: DebateRole;
  round: number;
  position: DebatePosition;
  argument: string;
  evidence: string[];
  counterpoints: string[];
  confidence: number;
  failed: boolean;
  timestamp: string;
}

export const STRATEGY_KINDS = [
  'long_equity',
  'short_equity',
  'covered_call',
  'protective_put',
  'bull_call_spread',
  'bear_put_spread',
  'iron_condor',
  'straddle',
  'strangle',
  'calendar_spread'
] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export type TradeDirection = 'long' | 'short' | 'neutral';

export interface StrategyProposal {
  symbol: string;
  kind: StrategyKind;
  direction: TradeDirection;
  rationale: string;
  expectedReturnPct: number;
  maxLossPct: number; // negative for a loss
  positionSizeFraction: number; // bounded to the configured range
  confidence: number;
  holdingPeriodDays: number;
  entryConditions: string[];
  exitConditions: string[];
  debateSummary: string;
}

export type TradeSide = 'BUY' | 'SELL';
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP' | 'STOP_LIMIT';
export type OptionRight = 'call' | 'put';

export interface TradeOrder {
  symbol: string;
  side: TradeSide;
  orderType: OrderType;
  quantity: number;
  instrument: 'equity' | 'option';
  limitPrice?: number;
  option?: { right: OptionRight; strike: number; expiry: string };
  timeInForce: 'DAY' | 'GTC';
}

export interface ExecutionPlan {
  symbol: string;
  strategyKind: StrategyKind;
  orders: TradeOrder[];
  estimatedCost: number;
  estimatedSlippagePct: number;
  timing: string;
  contingencies: string[];
  advisorSource: 'service' | 'rule';
  rationale: string;
}

export type HardCheckName = 'position_size' | 'projected_risk' | 'sector_concentration';

export interface HardCheckResult {
  name: HardCheckName;
  passed: boolean;
  observed: number;
  limit: number;
  message: string;
}

export interface RiskAssessment {
  symbol: string;
  approved: boolean;
  hardChecks: HardCheckResult[];
  hardChecksPassed: boolean;
  softJudgment: { approved: boolean; source: 'reasoning' | 'fallback' | 'error' };
  riskScore: number;
  warnings: string[];
  recommendation: string;
  portfolioImpact: {
    positionValue: number;
    positionFraction: number;
    riskIncrease: number;
    projectedRisk: number;
    sectorConcentration: number;
  };
}

export interface PortfolioDecision {
  symbol: string;
  approved: boolean;
  rationale: string;
  monitoringRequirements: string[];
  exitTriggers: string[];
  upstreamRiskApproved: boolean;
}

export interface OrderPreview {
  symbol: string;
  quantity: number;
  estimatedCost: number;
  fees: number;
}

export interface OrderPlacement extends OrderPreview {
  orderId: string;
}

export interface Fill {
  orderId: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  price: number;
  notional: number;
  timestamp: string;
}

export type PhaseName =
  | 'analysis'
  | 'debate'
  | 'strategy'
  | 'execution_planning'
  | 'risk_assessment'
  | 'portfolio_decision'
  | 'execution'
  | 'learning';

export interface StateRecord {
  runId: string;
  symbol: string;
  startDate?: string;
  endDate?: string;

  analystReports: AnalystReports;
  analysisComplete: boolean;

  debateArguments: DebateArgument[];
  debateRounds: number;
  debateComplete: boolean;

  strategyProposal: StrategyProposal | null;
  strategyComplete: boolean;

  executionPlan: ExecutionPlan | null;
  executionPlanComplete: boolean;

  riskAssessment: RiskAssessment | null;
  riskApproved: boolean;

  portfolioDecision: PortfolioDecision | null;
  finalApproval: boolean;

  ordersSubmitted: boolean;
  executionComplete: boolean;
  fills: Fill[];

  learningComplete: boolean;

  startedAt: string;
  currentPhase: PhaseName | 'initialization';
  completedPhases: PhaseName[];
  errors: string[];
}

export type TradeOutcomeStatus = 'pending' | 'win' | 'loss' | 'breakeven';

export interface TradeOutcome {
  tradeId: string;
  runId: string;
  symbol: string;
  strategyKind: StrategyKind;
  side: TradeSide;
  entryDate: string;
  entryPrice: number;
  quantity: number;
  exitDate?: string;
  exitPrice?: number;
  realizedPnl?: number;
  returnPct?: number;
  outcome: TradeOutcomeStatus;
  notes?: string;
}

export interface Reflection {
  tradeId: string;
  symbol: string;
  outcomeSummary: string;
  whatWorked: string[];
  whatFailed: string[];
  lessons: string[];
  adjustments: string[];
  createdAt: string;
}

export type LedgerEventType =
  | 'RUN_STARTED'
  | 'PHASE_STARTED'
  | 'PHASE_COMPLETED'
  | 'RUN_REJECTED'
  | 'RUN_COMPLETED'
  | 'RUN_FAILED';

export interface LedgerEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
