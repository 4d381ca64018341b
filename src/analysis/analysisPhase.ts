import { AgentReport, AnalystId, StateRecord } from '../core/types';
import { FanOutMode, settleAll } from '../core/fanout';
import { recordError } from '../core/state';
import { formatISODate } from '../core/time';
import { errorMessage } from '../core/utils';
import { MarketDataService } from '../data/marketData.types';
import { Headline, NewsService } from '../data/news.types';
import { ReasoningClient } from '../llm/reasoningClient';
import { AnalysisContext, AnyAnalyst } from './analysts';

export interface AnalysisPhaseDeps {
  analysts: AnyAnalyst[];
  marketData: MarketDataService;
  news: NewsService;
  reasoning: ReasoningClient;
  mode: FanOutMode;
  headlineLimit: number;
  now?: () => Date;
}

const fetchHeadlines = async (state: StateRecord, deps: AnalysisPhaseDeps, asOf: string): Promise<Headline[]> => {
  if (deps.headlineLimit <= 0) return [];
  try {
    return await deps.news.getHeadlines(state.symbol, deps.headlineLimit, asOf);
  } catch (err) {
    const message = `Headline fetch failed: ${errorMessage(err)}`;
    console.warn(`[analysis] ${message}`);
    recordError(state, message);
    return [];
  }
};

/**
 * Runs every analyst against the same read-only context and keys the reports
 * by analyst id. A failing analyst leaves a missing marker in its slot and
 * never affects the others; the phase always completes.
 */
export const runAnalysisPhase = async (state: StateRecord, deps: AnalysisPhaseDeps): Promise<StateRecord> => {
  const now = deps.now ?? (() => new Date());
  try {
    const asOf = state.endDate ?? formatISODate(now());
    const headlines = await fetchHeadlines(state, deps, asOf);
    const ctx: AnalysisContext = {
      symbol: state.symbol,
      asOf,
      startDate: state.startDate,
      endDate: state.endDate,
      headlines,
      marketData: deps.marketData,
      news: deps.news,
      reasoning: deps.reasoning,
      now
    };
    const byId = new Map<AnalystId, AnyAnalyst>(deps.analysts.map((a) => [a.id, a]));
    const entries = await settleAll(
      deps.analysts.map((a) => a.id),
      async (id): Promise<AgentReport> => {
        const analyst = byId.get(id);
        if (!analyst) throw new Error(`no analyst registered for ${id}`);
        return analyst.analyze(ctx);
      },
      deps.mode
    );

    for (const { key, result } of entries) {
      if (result.ok) {
        state.analystReports[key] = { status: 'ok', report: result.value };
        continue;
      }
      const message = errorMessage(result.error);
      console.warn(`[analysis] ${key} failed: ${message}`);
      state.analystReports[key] = { status: 'missing', analyst: key, error: message };
      recordError(state, `${key} analysis failed: ${message}`);
    }
    const ok = entries.filter((e) => e.result.ok).length;
    console.log(`[analysis] ${state.symbol}: ${ok}/${entries.length} analysts reported (${deps.mode}).`);
  } catch (err) {
    const message = errorMessage(err);
    console.error(`[analysis] ${message}`);
    recordError(state, `Analysis error: ${message}`);
  }
  state.analysisComplete = true;
  return state;
};
