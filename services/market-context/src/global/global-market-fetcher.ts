import type { DateTime } from 'luxon';
import {
  createLogger,
  createConcurrencyLimiter,
  createMarketClock,
  toErrorMessage,
  toIsoString,
  TtlCache,
  type Clock,
  type ConcurrencyLimiter,
} from '@workspace/shared-utils';
import { toQuoteSnapshot, type MarketDataClient, type QuoteSnapshot } from '@workspace/market-data';
import { env } from '../config/env.js';
import type {
  GlobalMarketData,
  GlobalMarketSource,
  GlobalSector,
  MarketSentiment,
  MarketSession,
} from '../types.js';
import {
  INDEX_FUTURES,
  KEY_US_STOCKS,
  OVERALL_SENTIMENT_INDICES,
  SECTOR_SYMBOLS,
  US_INDICES,
  USD_KRW_SYMBOL,
} from './symbols.js';

const logger = createLogger('global-market-fetcher');

const CACHE_KEY = 'global';

/**
 * 평균 등락률 → 시장 심리
 * - ±0.5%, ±2.0% 기준. 데이터가 없으면 neutral
 */
export function classifySentiment(changePcts: number[]): MarketSentiment {
  if (changePcts.length === 0) return 'neutral';

  const avg = changePcts.reduce((s, c) => s + c, 0) / changePcts.length;

  if (avg >= 2.0) return 'strong_bullish';
  if (avg >= 0.5) return 'bullish';
  if (avg <= -2.0) return 'strong_bearish';
  if (avg <= -0.5) return 'bearish';
  return 'neutral';
}

/**
 * 미국 시장 세션 (한국 시간 기준, 휴장일 미반영)
 * - 프리마켓 18-22시, 정규장 22-05시, 애프터마켓 05-07시
 */
export function marketSessionAt(now: DateTime): MarketSession {
  const hour = now.hour;
  if (hour >= 18 && hour < 22) return 'pre_market';
  if (hour >= 22 || hour < 5) return 'regular';
  if (hour >= 5 && hour < 7) return 'after_hours';
  return 'closed';
}

function changesOf(snapshots: Record<string, QuoteSnapshot>, symbols: readonly string[]): number[] {
  const out: number[] = [];
  for (const symbol of symbols) {
    const snap = snapshots[symbol];
    if (snap) out.push(snap.changePct);
  }
  return out;
}

export type GlobalMarketFetcherOptions = {
  client: MarketDataClient;
  clock?: Clock;
  cacheTtlMs?: number;
  concurrency?: number;
};

/**
 * 글로벌 시장 데이터 수집기
 * - 미국 지수, 커플링 종목, 환율, 지수 선물 스냅샷
 * - 종목 단위 실패는 로그만 남기고 결과에서 제외한다
 */
export class GlobalMarketFetcher implements GlobalMarketSource {
  private readonly client: MarketDataClient;
  private readonly clock: Clock;
  private readonly cache: TtlCache<GlobalMarketData>;
  private readonly limiter: ConcurrencyLimiter;

  constructor(opts: GlobalMarketFetcherOptions) {
    this.client = opts.client;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.cache = new TtlCache<GlobalMarketData>({
      ttlMs: opts.cacheTtlMs ?? env.GLOBAL_CACHE_TTL_SEC * 1000,
      now: () => this.clock().toMillis(),
    });
    this.limiter = createConcurrencyLimiter(opts.concurrency ?? env.MARKET_DATA_CONCURRENCY);
  }

  async fetch(forceRefresh = false): Promise<GlobalMarketData> {
    return this.cache.getOrRefresh(CACHE_KEY, () => this.load(), { force: forceRefresh });
  }

  clearCache(): void {
    this.cache.clear();
    logger.info('글로벌 시장 캐시 초기화');
  }

  private async load(): Promise<GlobalMarketData> {
    logger.info('글로벌 시장 데이터 수집 시작');

    const [indices, stocks, forex, futures] = await Promise.all([
      this.fetchGroup(US_INDICES),
      this.fetchGroup(KEY_US_STOCKS),
      this.fetchGroup({ [USD_KRW_SYMBOL]: 'USD/KRW' }),
      this.fetchGroup(INDEX_FUTURES),
    ]);

    const usdKrw = forex[USD_KRW_SYMBOL];

    const sectorOf = (sector: GlobalSector) => classifySentiment(changesOf(stocks, SECTOR_SYMBOLS[sector]));
    const sectorSentiments: Record<GlobalSector, MarketSentiment> = {
      semiconductor: sectorOf('semiconductor'),
      ev_battery: sectorOf('ev_battery'),
      tech: sectorOf('tech'),
      energy: sectorOf('energy'),
    };

    const now = this.clock();
    const result: GlobalMarketData = {
      indices,
      stocks,
      futures,
      usdKrw: usdKrw?.price ?? 0,
      usdKrwChange: usdKrw?.changePct ?? 0,
      nasdaqFutures: futures['NQ=F'] ?? null,
      overallSentiment: classifySentiment(changesOf(indices, OVERALL_SENTIMENT_INDICES)),
      sectorSentiments,
      fetchedAt: toIsoString(now),
      marketSession: marketSessionAt(now),
    };

    logger.info('글로벌 시장 데이터 수집 완료', {
      indices: Object.keys(indices).length,
      stocks: Object.keys(stocks).length,
      futures: Object.keys(futures).length,
      overallSentiment: result.overallSentiment,
    });

    return result;
  }

  private async fetchGroup(symbols: Record<string, string>): Promise<Record<string, QuoteSnapshot>> {
    const entries = await Promise.all(
      Object.entries(symbols).map(([symbol, name]) =>
        this.limiter.run(() => this.fetchSnapshot(symbol, name)),
      ),
    );

    const out: Record<string, QuoteSnapshot> = {};
    for (const snap of entries) {
      if (snap) out[snap.symbol] = snap;
    }
    return out;
  }

  private async fetchSnapshot(symbol: string, name: string): Promise<QuoteSnapshot | null> {
    try {
      const series = await this.client.getChart(symbol, { range: '5d', interval: '1d' });
      const snap = toQuoteSnapshot(symbol, name, series.bars, toIsoString(this.clock()));
      if (!snap) logger.warn('시세 없음', { symbol });
      return snap;
    } catch (error) {
      logger.warn('시세 조회 실패', {
        symbol,
        error: toErrorMessage(error),
      });
      return null;
    }
  }
}
