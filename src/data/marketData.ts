import { PipelineConfig } from '../config/settings';
import { CachedMarketDataService } from './marketData.cache';
import { StubMarketDataService } from './marketData.stub';
import { MarketDataService } from './marketData.types';
import { StubNewsService } from './news.stub';
import { NewsService } from './news.types';

export const getMarketDataService = (config: PipelineConfig, inner?: MarketDataService): MarketDataService =>
  new CachedMarketDataService(inner ?? new StubMarketDataService(), config.marketData.cacheTtlSeconds);

export const getNewsService = (): NewsService => new StubNewsService();

export { StubMarketDataService, CachedMarketDataService, StubNewsService };
