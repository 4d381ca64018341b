export interface Headline {
  title: string;
  source: string;
  publishedAt: string;
}

export interface NewsService {
  getHeadlines(symbol: string, limit: number, asOf?: string): Promise<Headline[]>;
}
