import {
  createLogger,
  createMarketClock,
  isWithinTime,
  toErrorMessage,
  toIsoString,
  TtlCache,
  type Clock,
} from '@workspace/shared-utils';
import type { MarketDataClient } from '@workspace/market-data';
import { env } from '../config/env.js';
import type {
  DataFreshness,
  DataHealthReport,
  FuturesCode,
  GlobexData,
  PremarketBias,
  PremarketSignal,
  PremarketSignalLabel,
  SourceHealth,
} from '../types.js';

const logger = createLogger('data-integrity');

export const FUTURES_SYMBOLS: Record<FuturesCode, string> = {
  NQ: 'NQ=F', // Nasdaq 100 E-mini
  ES: 'ES=F', // S&P 500 E-mini
  YM: 'YM=F', // Dow Jones E-mini
  RTY: 'RTY=F', // Russell 2000 E-mini
};

const FRESH_MAX_SEC = 300;
const STALE_MAX_SEC = 3600;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function classifyFreshness(ageSeconds: number): DataFreshness {
  if (ageSeconds <= FRESH_MAX_SEC) return 'fresh';
  if (ageSeconds <= STALE_MAX_SEC) return 'stale';
  return 'outdated';
}

function premarketLabel(changePct: number): PremarketSignalLabel {
  if (changePct >= 1.5) return 'strong_gap_up';
  if (changePct >= 0.5) return 'gap_up';
  if (changePct <= -1.5) return 'strong_gap_down';
  if (changePct <= -0.5) return 'gap_down';
  return 'flat';
}

function premarketProfile(label: PremarketSignalLabel): {
  bias: PremarketBias;
  weightAdjustment: number;
  recommendation: string;
} {
  switch (label) {
    case 'strong_gap_up':
      return { bias: 'bullish', weightAdjustment: 1.2, recommendation: '강한 갭상승 예상. 추격매수 주의, 눌림목 대기 권장' };
    case 'gap_up':
      return { bias: 'bullish', weightAdjustment: 1.1, recommendation: '갭상승 예상. 시초가 매수 검토 가능' };
    case 'flat':
      return { bias: 'neutral', weightAdjustment: 1.0, recommendation: '보합 출발 예상. 기존 전략 유지' };
    case 'gap_down':
      return { bias: 'bearish', weightAdjustment: 0.9, recommendation: '갭하락 예상. 저가 매수 기회 모색' };
    case 'strong_gap_down':
      return { bias: 'bearish', weightAdjustment: 0.8, recommendation: '강한 갭하락 예상. 신규 매수 자제, 손절 라인 점검' };
    case 'unknown':
      return { bias: 'neutral', weightAdjustment: 1.0, recommendation: '선물 데이터 없음. 기존 전략 유지' };
    default: {
      const _exhaustive: never = label;
      return _exhaustive;
    }
  }
}

/**
 * NQ 선물 등락률 → 장 시작 전 갭 신호 (08:50 ~ 09:00 사용)
 * - 선물 데이터가 없으면 unknown / 1.0
 */
export function getPremarketSignal(nq: GlobexData | null): PremarketSignal {
  if (!nq) {
    const profile = premarketProfile('unknown');
    return { signal: 'unknown', nqChangePct: null, ...profile };
  }

  const signal = premarketLabel(nq.changePct);
  return {
    signal,
    nqChangePct: nq.changePct,
    ...premarketProfile(signal),
    nqPrice: nq.price,
    timestamp: nq.timestamp,
  };
}

export type DataIntegrityManagerOptions = {
  client: MarketDataClient;
  clock?: Clock;
  cacheTtlMs?: number;
};

/**
 * 데이터 무결성 관리자
 * - 지수 선물(Globex) 스냅샷 조회, 데이터 소스 상태 점검
 * - 국내 장 시간대 판정 (시장 시간대 기준, 양끝 포함)
 */
export class DataIntegrityManager {
  private readonly client: MarketDataClient;
  private readonly clock: Clock;
  private readonly cache: TtlCache<GlobexData | null>;

  constructor(opts: DataIntegrityManagerOptions) {
    this.client = opts.client;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.cache = new TtlCache<GlobexData | null>({
      ttlMs: opts.cacheTtlMs ?? env.FUTURES_CACHE_TTL_SEC * 1000,
      now: () => this.clock().toMillis(),
    });
  }

  async getFutures(code: FuturesCode): Promise<GlobexData | null> {
    const data = await this.cache.getOrRefresh(code, () => this.loadFutures(code));
    // 실패 결과는 캐시하지 않는다
    if (!data) this.cache.delete(code);
    return data;
  }

  getNqFutures(): Promise<GlobexData | null> {
    return this.getFutures('NQ');
  }

  getEsFutures(): Promise<GlobexData | null> {
    return this.getFutures('ES');
  }

  /** NQ / ES / YM 동시 조회. 실패한 선물은 결과에서 제외 */
  async getAllFutures(): Promise<Partial<Record<FuturesCode, GlobexData>>> {
    const codes: FuturesCode[] = ['NQ', 'ES', 'YM'];
    const results = await Promise.all(codes.map((code) => this.getFutures(code)));

    const out: Partial<Record<FuturesCode, GlobexData>> = {};
    codes.forEach((code, i) => {
      const data = results[i];
      if (data) out[code] = data;
    });
    return out;
  }

  getPremarketSignal(nq: GlobexData | null): PremarketSignal {
    return getPremarketSignal(nq);
  }

  async checkDataHealth(): Promise<DataHealthReport> {
    const warnings: string[] = [];
    const sources: Record<string, SourceHealth> = {};

    const startedAt = this.clock().toMillis();
    const nq = await this.getNqFutures();
    const latencyMs = this.clock().toMillis() - startedAt;

    if (nq) {
      sources['NQ_futures'] = { status: 'fresh', latencyMs, lastUpdate: nq.timestamp };
    } else {
      sources['NQ_futures'] = { status: 'unavailable' };
      warnings.push('NQ futures data unavailable');
    }

    const allFresh = Object.values(sources).every((s) => s.status === 'fresh');
    const overallStatus = allFresh ? 'OK' : 'STALE';

    if (overallStatus === 'STALE') {
      logger.warn('데이터 소스 상태 이상', { warnings });
    }

    return {
      overallStatus,
      sources,
      warnings,
      generatedAt: toIsoString(this.clock()),
    };
  }

  /** 08:30 ~ 09:00 */
  isPremarketTime(): boolean {
    return isWithinTime(this.clock(), '08:30', '09:00');
  }

  /** 09:00 ~ 15:30 */
  isMarketOpen(): boolean {
    return isWithinTime(this.clock(), '09:00', '15:30');
  }

  /** 시간외 단일가 15:40 ~ 18:00 */
  isAfterHours(): boolean {
    return isWithinTime(this.clock(), '15:40', '18:00');
  }

  private async loadFutures(code: FuturesCode): Promise<GlobexData | null> {
    const symbol = FUTURES_SYMBOLS[code];

    try {
      const series = await this.client.getChart(symbol, { range: '1d', interval: '1m' });
      const last = series.bars[series.bars.length - 1];
      if (!last) {
        logger.warn('선물 분봉 없음', { symbol });
        return null;
      }

      const prevClose = series.previousClose ?? last.open;
      const change = last.close - prevClose;
      const changePct = prevClose ? (change / prevClose) * 100 : 0;

      return {
        symbol: code,
        price: round2(last.close),
        change: round2(change),
        changePct: round2(changePct),
        volume: Math.trunc(last.volume),
        timestamp: toIsoString(this.clock()),
        source: 'yfinance',
        status: 'fresh',
      };
    } catch (error) {
      logger.warn('선물 조회 실패', { symbol, error: toErrorMessage(error) });
      return null;
    }
  }
}
