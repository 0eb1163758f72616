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
import {
  advanceDeclineRatio,
  calculateRSI,
  periodReturnPct,
  type PriceBar,
  type RsiSignal,
} from '@workspace/trading-utils';
import { toQuoteSnapshot, type MarketDataClient } from '@workspace/market-data';
import { env } from '../config/env.js';
import { loadBreadthBasket } from '../config/calendar-data.js';
import type {
  CreditSignal,
  GlobalMarketSource,
  MarketCondition,
  SentimentLevel,
  SentimentResult,
  VixLevel,
} from '../types.js';

const logger = createLogger('market-sentiment');

export const KOSPI_INDEX_SYMBOL = '^KS11';

const CACHE_KEY = 'sentiment';
const RSI_PERIOD = 14;
const RSI_WINDOW_DAYS = 60;
const CREDIT_WINDOW_DAYS = 30;

/** 지표 조회 실패 시 중립 기본값 */
export const SENTIMENT_DEFAULTS = {
  vix: 20,
  rsi: 50,
  creditRatio: 3.0,
  adr: 1.0,
} as const;

export type SentimentAdjustment = {
  multiplier: number;
  riskWarning: boolean;
  message: string | null;
};

export function classifyVix(vix: number): VixLevel {
  if (vix < 12) return 'low';
  if (vix < 20) return 'normal';
  if (vix < 25) return 'elevated';
  if (vix < 35) return 'high';
  return 'extreme';
}

/**
 * 30일 지수 수익률로 신용잔고율 추정 (%)
 * - 실데이터 소스가 없어 상승장일수록 높게 잡는다
 */
export function estimateCreditRatio(returnPct: number): number {
  if (returnPct > 10) return 5.5;
  if (returnPct > 5) return 4.5;
  if (returnPct > 0) return 3.5;
  if (returnPct > -5) return 3.0;
  return 2.5;
}

export function classifyCredit(ratio: number): CreditSignal {
  if (ratio < 2) return 'low';
  if (ratio < 4) return 'normal';
  if (ratio < 6) return 'high';
  return 'warning';
}

/**
 * 종합 심리 점수 (0 = Extreme Fear, 100 = Extreme Greed)
 * - VIX 35%, RSI 25%, 신용잔고 20%, ADR 20%
 */
export function calculateSentimentScore(vix: number, rsi: number, creditRatio: number, adr: number): number {
  let vixScore: number;
  if (vix < 12) vixScore = 90;
  else if (vix < 20) vixScore = 70;
  else if (vix < 25) vixScore = 50;
  else if (vix < 35) vixScore = 30;
  else vixScore = 10;

  let creditScore: number;
  if (creditRatio < 2) creditScore = 30;
  else if (creditRatio < 4) creditScore = 50;
  else if (creditRatio < 6) creditScore = 70;
  else creditScore = 85;

  let adrScore: number;
  if (adr < 0.5) adrScore = 15;
  else if (adr < 0.8) adrScore = 35;
  else if (adr < 1.2) adrScore = 50;
  else if (adr < 1.5) adrScore = 65;
  else adrScore = 80;

  const total = vixScore * 0.35 + rsi * 0.25 + creditScore * 0.2 + adrScore * 0.2;
  return Math.max(0, Math.min(100, Math.trunc(total)));
}

export function classifySentimentLevel(score: number): SentimentLevel {
  if (score <= 20) return 'extreme_fear';
  if (score <= 40) return 'fear';
  if (score <= 60) return 'neutral';
  if (score <= 80) return 'greed';
  return 'extreme_greed';
}

/**
 * 시장 상태 판정 (위에서부터 먼저 맞는 규칙 적용)
 */
export function determineMarketCondition(
  vixLevel: VixLevel,
  rsiSignal: RsiSignal,
  creditSignal: CreditSignal,
  score: number,
): MarketCondition {
  const creditHot = creditSignal === 'high' || creditSignal === 'warning';

  if (vixLevel === 'extreme') return 'panic';
  if (vixLevel === 'high' && score < 30) return 'fear';
  if (vixLevel === 'low' && rsiSignal === 'overbought' && creditHot) return 'euphoria';
  if (rsiSignal === 'overbought' && creditHot) return 'overheated';
  if (rsiSignal === 'oversold' && (vixLevel === 'elevated' || vixLevel === 'high')) return 'fear';

  if (score >= 70) return 'bullish';
  if (score >= 45) return 'neutral';
  if (score >= 30) return 'cautious';
  return 'fear';
}

function conditionAdjustment(condition: MarketCondition): SentimentAdjustment {
  switch (condition) {
    case 'panic':
      return { multiplier: 0.3, riskWarning: true, message: '패닉 상태 - 현금 비중 확대 권고' };
    case 'fear':
      return { multiplier: 0.6, riskWarning: true, message: '공포 심리 확산 - 신규 매수 자제' };
    case 'cautious':
      return { multiplier: 0.8, riskWarning: false, message: null };
    case 'neutral':
      return { multiplier: 1.0, riskWarning: false, message: null };
    case 'bullish':
      return { multiplier: 1.1, riskWarning: false, message: null };
    case 'overheated':
      return { multiplier: 0.7, riskWarning: true, message: '시장 과열 - 차익실현 고려' };
    case 'euphoria':
      return { multiplier: 0.5, riskWarning: true, message: '버블 경고 - 신규 매수 금지' };
    default: {
      const _exhaustive: never = condition;
      return _exhaustive;
    }
  }
}

export function calculateSentimentAdjustments(
  condition: MarketCondition,
  creditSignal: CreditSignal,
): SentimentAdjustment {
  const adj = conditionAdjustment(condition);

  if (creditSignal === 'warning' && !adj.message) {
    return { ...adj, riskWarning: true, message: '신용잔고 과다 - 반대매매 리스크' };
  }
  return adj;
}

export type MarketSentimentMeterOptions = {
  globalSource: GlobalMarketSource;
  client: MarketDataClient;
  clock?: Clock;
  cacheTtlMs?: number;
  /** ADR 계산용 구성종목 심볼 (기본: data/breadth-basket.json) */
  breadthSymbols?: string[];
  concurrency?: number;
};

/**
 * 시장 심리 측정기
 * - VIX, KOSPI RSI, 신용잔고율(추정), ADR 기반 공포/탐욕 진단
 * - 개별 지표 실패는 중립 기본값으로 대체한다
 */
export class MarketSentimentMeter {
  private readonly globalSource: GlobalMarketSource;
  private readonly client: MarketDataClient;
  private readonly clock: Clock;
  private readonly cache: TtlCache<SentimentResult>;
  private readonly breadthSymbols: string[];
  private readonly limiter: ConcurrencyLimiter;

  constructor(opts: MarketSentimentMeterOptions) {
    this.globalSource = opts.globalSource;
    this.client = opts.client;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.cache = new TtlCache<SentimentResult>({
      ttlMs: opts.cacheTtlMs ?? env.SENTIMENT_CACHE_TTL_SEC * 1000,
      now: () => this.clock().toMillis(),
    });
    this.breadthSymbols = opts.breadthSymbols ?? loadBreadthBasket();
    this.limiter = createConcurrencyLimiter(opts.concurrency ?? env.MARKET_DATA_CONCURRENCY);
  }

  async analyze(forceRefresh = false): Promise<SentimentResult> {
    return this.cache.getOrRefresh(CACHE_KEY, () => this.compute(), { force: forceRefresh });
  }

  clearCache(): void {
    this.cache.clear();
    logger.info('심리 캐시 초기화');
  }

  private async compute(): Promise<SentimentResult> {
    logger.info('시장 심리 분석 시작');

    const [vixValue, kospiBars, adr] = await Promise.all([
      this.getVix(),
      this.getKospiBars(),
      this.getAdvanceDeclineRatio(),
    ]);

    const rsi = this.marketRsi(kospiBars);
    const creditBalanceRatio = this.creditRatio(kospiBars);

    const vixLevel = classifyVix(vixValue);
    const creditSignal = classifyCredit(creditBalanceRatio);
    const sentimentScore = calculateSentimentScore(vixValue, rsi.value, creditBalanceRatio, adr);
    const condition = determineMarketCondition(vixLevel, rsi.signal, creditSignal, sentimentScore);
    const adj = calculateSentimentAdjustments(condition, creditSignal);

    const result: SentimentResult = {
      condition,
      sentimentLevel: classifySentimentLevel(sentimentScore),
      sentimentScore,
      vixValue,
      vixLevel,
      marketRsi: rsi.value,
      marketRsiSignal: rsi.signal,
      creditBalanceRatio,
      creditSignal,
      advanceDeclineRatio: adr,
      putCallRatio: null,
      positionMultiplier: adj.multiplier,
      riskWarning: adj.riskWarning,
      warningMessage: adj.message,
      analyzedAt: toIsoString(this.clock()),
    };

    logger.info('시장 심리 분석 완료', {
      condition,
      sentimentScore,
      vixValue,
      marketRsi: rsi.value,
    });

    return result;
  }

  private async getVix(): Promise<number> {
    try {
      const data = await this.globalSource.fetch();
      return data.indices['^VIX']?.price ?? SENTIMENT_DEFAULTS.vix;
    } catch (error) {
      logger.warn('VIX 조회 실패 - 기본값 사용', { error: toErrorMessage(error) });
      return SENTIMENT_DEFAULTS.vix;
    }
  }

  /** KOSPI 일봉. 실패 시 빈 배열 */
  private async getKospiBars(): Promise<PriceBar[]> {
    try {
      const series = await this.client.getChart(KOSPI_INDEX_SYMBOL, { range: '3mo', interval: '1d' });
      return series.bars;
    } catch (error) {
      logger.warn('KOSPI 지수 조회 실패 - 기본값 사용', { error: toErrorMessage(error) });
      return [];
    }
  }

  private barsWithin(bars: PriceBar[], days: number): PriceBar[] {
    const from = this.clock().minus({ days }).toMillis();
    return bars.filter((b) => Date.parse(b.time) >= from);
  }

  private marketRsi(bars: PriceBar[]): { value: number; signal: RsiSignal } {
    const closes = this.barsWithin(bars, RSI_WINDOW_DAYS).map((b) => b.close);
    if (closes.length < RSI_PERIOD + 1) {
      return { value: SENTIMENT_DEFAULTS.rsi, signal: 'neutral' };
    }
    return calculateRSI(closes, RSI_PERIOD);
  }

  private creditRatio(bars: PriceBar[]): number {
    const closes = this.barsWithin(bars, CREDIT_WINDOW_DAYS).map((b) => b.close);
    if (closes.length === 0) return SENTIMENT_DEFAULTS.creditRatio;
    return estimateCreditRatio(periodReturnPct(closes));
  }

  private async getAdvanceDeclineRatio(): Promise<number> {
    const timestamp = toIsoString(this.clock());
    const changes = await Promise.all(
      this.breadthSymbols.map((symbol) =>
        this.limiter.run(async () => {
          try {
            const series = await this.client.getChart(symbol, { range: '5d', interval: '1d' });
            return toQuoteSnapshot(symbol, symbol, series.bars, timestamp)?.changePct ?? null;
          } catch (error) {
            logger.debug('구성종목 조회 실패', { symbol, error: toErrorMessage(error) });
            return null;
          }
        }),
      ),
    );

    const valid = changes.filter((c): c is number => c !== null);
    if (valid.length === 0) {
      logger.warn('ADR 데이터 없음 - 기본값 사용', { basket: this.breadthSymbols.length });
      return SENTIMENT_DEFAULTS.adr;
    }
    return advanceDeclineRatio(valid);
  }
}
