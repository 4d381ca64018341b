import { Fundamentals, MarketDataService, PriceBar, Quote } from './marketData.types';
import { hashString, mulberry32, round } from '../core/utils';

// Static anchors so stub runs on familiar tickers look plausible.
const priceOverrides: Record<string, number> = {
  AAPL: 190,
  MSFT: 410,
  NVDA: 880,
  AMZN: 180,
  JPM: 195,
  XOM: 115,
  SPY: 475
};

const sectorOverrides: Record<string, string> = {
  AAPL: 'Technology',
  MSFT: 'Technology',
  NVDA: 'Technology',
  AMZN: 'Consumer Discretionary',
  JPM: 'Financials',
  XOM: 'Energy',
  SPY: 'Broad Market'
};

const SECTORS = ['Technology', 'Healthcare', 'Financials', 'Industrials', 'Energy', 'Consumer Staples'];

const SPREAD_BPS = 5;

const basePriceForSymbol = (symbol: string): number => {
  if (priceOverrides[symbol] !== undefined) return priceOverrides[symbol];
  const rng = mulberry32(hashString(symbol));
  return 50 + rng() * 150;
};

const drift = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol + 'drift'));
  return rng() * 0.06 - 0.03; // -3% to +3% drift
};

const priceForDate = (symbol: string, asOf: string): number => {
  const base = basePriceForSymbol(symbol);
  const rng = mulberry32(hashString(`${symbol}-${asOf}`));
  const noise = (rng() - 0.5) * 0.02; // +/-1% noise
  return Math.max(1, base * (1 + drift(symbol) + noise));
};

export class StubMarketDataService implements MarketDataService {
  async getQuote(symbol: string, asOf: string): Promise<Quote> {
    const price = round(priceForDate(symbol, asOf), 2);
    const halfSpread = (price * SPREAD_BPS) / 2 / 10000;
    return { symbol, price, bid: round(price - halfSpread, 2), ask: round(price + halfSpread, 2), asOf };
  }

  async getHistory(symbol: string, asOf: string, lookbackDays: number): Promise<PriceBar[]> {
    const bars: PriceBar[] = [];
    for (let i = lookbackDays; i >= 0; i -= 1) {
      const date = new Date(`${asOf}T00:00:00Z`);
      date.setUTCDate(date.getUTCDate() - i);
      const day = date.toISOString().slice(0, 10);
      bars.push({ date: day, close: round(priceForDate(symbol, day), 2) });
    }
    return bars;
  }

  async getFundamentals(symbol: string): Promise<Fundamentals> {
    const rng = mulberry32(hashString(`${symbol}-fundamentals`));
    const price = basePriceForSymbol(symbol);
    const peRatio = round(12 + rng() * 23, 1);
    return {
      symbol,
      peRatio,
      eps: round(price / peRatio, 2),
      revenueGrowthPct: round(rng() * 20 - 4, 1),
      profitMarginPct: round(5 + rng() * 25, 1),
      debtToEquity: round(rng() * 2, 2),
      marketCapUSD: Math.round(price * (1e8 + rng() * 1e10))
    };
  }

  async getSector(symbol: string): Promise<string> {
    if (sectorOverrides[symbol]) return sectorOverrides[symbol];
    return SECTORS[hashString(`${symbol}-sector`) % SECTORS.length];
  }
}
