import { hashString, mulberry32 } from '../core/utils';
import { Headline, NewsService } from './news.types';

const TEMPLATES = [
  '{symbol} shares move as investors weigh quarterly guidance',
  'Analysts revisit price targets on {symbol}',
  '{symbol} announces product update at industry conference',
  'Options activity in {symbol} picks up ahead of earnings',
  'Sector rotation puts {symbol} in focus',
  '{symbol} management comments on margin outlook',
  'Fund filings show shifting positions in {symbol}',
  'Supply chain checks point to steady demand for {symbol}'
];

const SOURCES = ['Newswire', 'Market Desk', 'Daily Ledger'];

export class StubNewsService implements NewsService {
  async getHeadlines(symbol: string, limit: number, asOf?: string): Promise<Headline[]> {
    const day = asOf ?? new Date().toISOString().slice(0, 10);
    const rng = mulberry32(hashString(`${symbol}-${day}-news`));
    const count = Math.min(limit, TEMPLATES.length);
    const offset = Math.floor(rng() * TEMPLATES.length);
    const headlines: Headline[] = [];
    for (let i = 0; i < count; i++) {
      headlines.push({
        title: TEMPLATES[(offset + i) % TEMPLATES.length].replace('{symbol}', symbol),
        source: SOURCES[i % SOURCES.length],
        publishedAt: `${day}T${String(13 + (i % 8)).padStart(2, '0')}:00:00Z`
      });
    }
    return headlines;
  }
}
