import { Fundamentals, MarketDataService, PriceBar, Quote } from './marketData.types';

export type Clock = () => number;

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(private ttlMs: number, private clock: Clock = Date.now) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T) {
    const now = this.clock();
    for (const [k, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(k);
    }
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const hit = this.get(key);
    if (hit !== undefined) return hit;
    const value = await load();
    this.set(key, value);
    return value;
  }

  size() {
    return this.entries.size;
  }
}

/**
 * Read-through cache in front of a market data service. Entries are keyed by
 * method and symbol and live for a fixed TTL; only successful reads are kept.
 */
export class CachedMarketDataService implements MarketDataService {
  private quotes: TtlCache<Quote>;
  private history: TtlCache<PriceBar[]>;
  private fundamentals: TtlCache<Fundamentals>;
  private sectors: TtlCache<string>;

  constructor(private inner: MarketDataService, ttlSeconds: number, clock: Clock = Date.now) {
    const ttlMs = ttlSeconds * 1000;
    this.quotes = new TtlCache<Quote>(ttlMs, clock);
    this.history = new TtlCache<PriceBar[]>(ttlMs, clock);
    this.fundamentals = new TtlCache<Fundamentals>(ttlMs, clock);
    this.sectors = new TtlCache<string>(ttlMs, clock);
  }

  getQuote(symbol: string, asOf: string): Promise<Quote> {
    return this.quotes.getOrLoad(`quote:${symbol}:${asOf}`, () => this.inner.getQuote(symbol, asOf));
  }

  getHistory(symbol: string, asOf: string, lookbackDays: number): Promise<PriceBar[]> {
    return this.history.getOrLoad(`history:${symbol}:${asOf}:${lookbackDays}`, () =>
      this.inner.getHistory(symbol, asOf, lookbackDays)
    );
  }

  getFundamentals(symbol: string): Promise<Fundamentals> {
    return this.fundamentals.getOrLoad(`fundamentals:${symbol}`, () => this.inner.getFundamentals(symbol));
  }

  getSector(symbol: string): Promise<string> {
    return this.sectors.getOrLoad(`sector:${symbol}`, () => this.inner.getSector(symbol));
  }
}
