import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Reflection, STRATEGY_KINDS, TradeOutcome } from '../core/types';
import { ensureDir, round, sum } from '../core/utils';

const tradeOutcomeSchema = z.object({
  tradeId: z.string(),
  runId: z.string(),
  symbol: z.string(),
  strategyKind: z.enum(STRATEGY_KINDS),
  side: z.enum(['BUY', 'SELL']),
  entryDate: z.string(),
  entryPrice: z.number(),
  quantity: z.number(),
  exitDate: z.string().optional(),
  exitPrice: z.number().optional(),
  realizedPnl: z.number().optional(),
  returnPct: z.number().optional(),
  outcome: z.enum(['pending', 'win', 'loss', 'breakeven']),
  notes: z.string().optional()
});

const reflectionSchema = z.object({
  tradeId: z.string(),
  symbol: z.string(),
  outcomeSummary: z.string(),
  whatWorked: z.array(z.string()),
  whatFailed: z.array(z.string()),
  lessons: z.array(z.string()),
  adjustments: z.array(z.string()),
  createdAt: z.string()
});

const entrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('trade'), record: tradeOutcomeSchema }),
  z.object({ type: z.literal('reflection'), record: reflectionSchema })
]);

type StoreEntry = z.infer<typeof entrySchema>;

export interface PerformanceSummary {
  totalTrades: number;
  closedTrades: number;
  winRate: number;
  avgPnl: number;
  totalPnl: number;
}

/**
 * Append-only JSONL memory of trades and reflections. A trade may be written
 * several times as it moves from pending to closed; reads see the latest
 * record for each trade id.
 */
export class EpisodicStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath() {
    return this.filePath;
  }

  private append(entry: StoreEntry) {
    ensureDir(path.dirname(this.filePath));
    fs.appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`);
  }

  private readEntries(): StoreEntry[] {
    if (!fs.existsSync(this.filePath)) return [];
    const content = fs.readFileSync(this.filePath, 'utf-8').trim();
    if (!content.length) return [];
    const entries: StoreEntry[] = [];
    content.split('\n').forEach((line, idx) => {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        console.warn(`[memory] skipping unreadable line ${idx + 1} in ${this.filePath}`);
        return;
      }
      const parsed = entrySchema.safeParse(raw);
      if (parsed.success) entries.push(parsed.data);
      else console.warn(`[memory] skipping malformed record on line ${idx + 1} in ${this.filePath}`);
    });
    return entries;
  }

  private latestTrades(): TradeOutcome[] {
    const latest = new Map<string, TradeOutcome>();
    for (const entry of this.readEntries()) {
      if (entry.type === 'trade') latest.set(entry.record.tradeId, entry.record);
    }
    return Array.from(latest.values());
  }

  recordTrade(outcome: TradeOutcome) {
    this.append({ type: 'trade', record: outcome });
  }

  recordReflection(reflection: Reflection) {
    this.append({ type: 'reflection', record: reflection });
  }

  getTrade(tradeId: string): TradeOutcome | undefined {
    return this.latestTrades().find((t) => t.tradeId === tradeId);
  }

  findTradesBySymbol(symbol: string, limit = 10): TradeOutcome[] {
    const wanted = symbol.toUpperCase();
    return this.latestTrades()
      .filter((t) => t.symbol === wanted)
      .sort((a, b) => b.entryDate.localeCompare(a.entryDate))
      .slice(0, limit);
  }

  getReflections(tradeId?: string): Reflection[] {
    const out: Reflection[] = [];
    for (const entry of this.readEntries()) {
      if (entry.type === 'reflection' && (!tradeId || entry.record.tradeId === tradeId)) out.push(entry.record);
    }
    return out;
  }

  getPerformanceSummary(): PerformanceSummary {
    const trades = this.latestTrades();
    const closed = trades.filter((t) => t.outcome !== 'pending');
    const pnls = closed.map((t) => t.realizedPnl ?? 0);
    const totalPnl = sum(pnls);
    return {
      totalTrades: trades.length,
      closedTrades: closed.length,
      winRate: closed.length ? round(pnls.filter((p) => p > 0).length / closed.length, 4) : 0,
      avgPnl: closed.length ? round(totalPnl / closed.length, 2) : 0,
      totalPnl: round(totalPnl, 2)
    };
  }
}
