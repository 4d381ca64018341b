export interface PriceBar {
  date: string;
  close: number;
}

export interface Quote {
  symbol: string;
  price: number;
  bid: number;
  ask: number;
  asOf: string;
}

export interface Fundamentals {
  symbol: string;
  peRatio: number;
  eps: number;
  revenueGrowthPct: number;
  profitMarginPct: number;
  debtToEquity: number;
  marketCapUSD: number;
}

export interface MarketDataService {
  getQuote(symbol: string, asOf: string): Promise<Quote>;
  getHistory(symbol: string, asOf: string, lookbackDays: number): Promise<PriceBar[]>;
  getFundamentals(symbol: string): Promise<Fundamentals>;
  getSector(symbol: string): Promise<string>;
}
