import { YahooChartClient, type MarketDataClient } from '@workspace/market-data';
import { createLogger, createMarketClock, type Clock } from '@workspace/shared-utils';
import { env } from './config/env.js';
import { GlobalMarketFetcher } from './global/global-market-fetcher.js';
import { MarketSentimentMeter } from './sentiment/market-sentiment-meter.js';
import { MacroCalendarFetcher } from './calendar/macro-calendar.js';
import { PassiveFundTracker } from './passive/passive-fund-tracker.js';
import { SectorEventMonitor } from './sector/sector-event-monitor.js';
import { CouplingAnalyzer } from './coupling/coupling-analyzer.js';
import { DataIntegrityManager } from './integrity/data-integrity-manager.js';

const logger = createLogger('market-context');

export type MarketContext = {
  client: MarketDataClient;
  globalMarket: GlobalMarketFetcher;
  sentiment: MarketSentimentMeter;
  calendar: MacroCalendarFetcher;
  passiveFund: PassiveFundTracker;
  sectorEvents: SectorEventMonitor;
  coupling: CouplingAnalyzer;
  integrity: DataIntegrityManager;
};

export type MarketContextOptions = {
  /** 기본: env.YAHOO_BASE_URL 로 만든 YahooChartClient */
  client?: MarketDataClient;
  clock?: Clock;
};

/**
 * 시장 컨텍스트 컴포넌트 일괄 생성
 * - 글로벌 스냅샷 수집기 하나를 심리 측정기와 커플링 분석기가 공유한다
 */
export function createMarketContext(opts: MarketContextOptions = {}): MarketContext {
  const client = opts.client ?? new YahooChartClient({ baseUrl: env.YAHOO_BASE_URL });
  const clock = opts.clock ?? createMarketClock(env.MARKET_TZ);

  const globalMarket = new GlobalMarketFetcher({ client, clock });

  logger.info('시장 컨텍스트 초기화', {
    marketTz: env.MARKET_TZ,
    concurrency: env.MARKET_DATA_CONCURRENCY,
  });

  return {
    client,
    globalMarket,
    sentiment: new MarketSentimentMeter({ globalSource: globalMarket, client, clock }),
    calendar: new MacroCalendarFetcher({ clock }),
    passiveFund: new PassiveFundTracker({ clock }),
    sectorEvents: new SectorEventMonitor({ clock }),
    coupling: new CouplingAnalyzer({ globalSource: globalMarket, clock }),
    integrity: new DataIntegrityManager({ client, clock }),
  };
}
