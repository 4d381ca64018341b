import { CachedMarketDataService, TtlCache } from '../src/data/marketData.cache';
import { StubMarketDataService } from '../src/data/marketData.stub';
import { Fundamentals, MarketDataService, PriceBar, Quote } from '../src/data/marketData.types';

class CountingMarketData implements MarketDataService {
  calls: string[] = [];
  failNextQuote = false;
  private inner = new StubMarketDataService();

  async getQuote(symbol: string, asOf: string): Promise<Quote> {
    this.calls.push(`quote:${symbol}:${asOf}`);
    if (this.failNextQuote) {
      this.failNextQuote = false;
      throw new Error('quote feed down');
    }
    return this.inner.getQuote(symbol, asOf);
  }

  async getHistory(symbol: string, asOf: string, lookbackDays: number): Promise<PriceBar[]> {
    this.calls.push(`history:${symbol}:${lookbackDays}`);
    return this.inner.getHistory(symbol, asOf, lookbackDays);
  }

  async getFundamentals(symbol: string): Promise<Fundamentals> {
    this.calls.push(`fundamentals:${symbol}`);
    return this.inner.getFundamentals(symbol);
  }

  async getSector(symbol: string): Promise<string> {
    this.calls.push(`sector:${symbol}`);
    return this.inner.getSector(symbol);
  }
}

describe('market data cache', () => {
  let now = 0;
  const clock = () => now;

  beforeEach(() => {
    now = 0;
  });

  it('serves repeat reads from cache until the TTL runs out', async () => {
    const inner = new CountingMarketData();
    const cached = new CachedMarketDataService(inner, 300, clock);

    const first = await cached.getQuote('AAPL', '2024-03-15');
    now = 299_999;
    const second = await cached.getQuote('AAPL', '2024-03-15');
    expect(second).toEqual(first);
    expect(inner.calls).toEqual(['quote:AAPL:2024-03-15']);

    now = 300_000;
    await cached.getQuote('AAPL', '2024-03-15');
    expect(inner.calls).toHaveLength(2);
  });

  it('keys entries by their arguments', async () => {
    const inner = new CountingMarketData();
    const cached = new CachedMarketDataService(inner, 300, clock);

    await cached.getQuote('AAPL', '2024-03-14');
    await cached.getQuote('AAPL', '2024-03-15');
    await cached.getHistory('AAPL', '2024-03-15', 30);
    await cached.getHistory('AAPL', '2024-03-15', 60);
    await cached.getHistory('AAPL', '2024-03-15', 30);
    await cached.getSector('AAPL');
    await cached.getSector('AAPL');

    expect(inner.calls).toEqual([
      'quote:AAPL:2024-03-14',
      'quote:AAPL:2024-03-15',
      'history:AAPL:30',
      'history:AAPL:60',
      'sector:AAPL'
    ]);
  });

  it('does not cache a failed read', async () => {
    const inner = new CountingMarketData();
    inner.failNextQuote = true;
    const cached = new CachedMarketDataService(inner, 300, clock);

    await expect(cached.getQuote('MSFT', '2024-03-15')).rejects.toThrow('quote feed down');
    const quote = await cached.getQuote('MSFT', '2024-03-15');
    expect(quote.symbol).toBe('MSFT');
    expect(inner.calls).toHaveLength(2);
  });

  it('evicts expired entries on read', () => {
    const cache = new TtlCache<number>(1000, clock);
    cache.set('a', 1);
    expect(cache.get('a')).toBe(1);
    now = 1000;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('sweeps expired entries on write', () => {
    const cache = new TtlCache<number>(1000, clock);
    cache.set('a', 1);
    now = 500;
    cache.set('b', 2);
    now = 1200;
    cache.set('c', 3);
    expect(cache.size()).toBe(2);
    expect(cache.get('b')).toBe(2);
    expect(cache.get('a')).toBeUndefined();
  });
});

describe('stub market data', () => {
  it('is deterministic per symbol and date', async () => {
    const a = new StubMarketDataService();
    const b = new StubMarketDataService();
    expect(await a.getQuote('NVDA', '2024-03-15')).toEqual(await b.getQuote('NVDA', '2024-03-15'));
    expect(await a.getSector('AAPL')).toBe('Technology');
    const bars = await a.getHistory('NVDA', '2024-03-15', 10);
    expect(bars).toHaveLength(11);
    expect(bars[10].date).toBe('2024-03-15');
    expect(bars[0].date).toBe('2024-03-05');
  });

  it('quotes a bid below and an ask above the price', async () => {
    const quote = await new StubMarketDataService().getQuote('AAPL', '2024-03-15');
    expect(quote.bid).toBeLessThan(quote.ask);
    expect(quote.bid).toBeLessThanOrEqual(quote.price);
    expect(quote.ask).toBeGreaterThanOrEqual(quote.price);
  });
});
