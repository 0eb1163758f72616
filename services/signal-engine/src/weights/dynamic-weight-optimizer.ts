import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger, createMarketClock, toErrorMessage, toIsoString, type Clock } from '@workspace/shared-utils';
import { measureVolatility } from '@workspace/trading-utils';
import type { MarketDataClient } from '@workspace/market-data';
import { KOSPI_INDEX_SYMBOL } from '@workspace/market-context';
import { env } from '../config/env.js';
import {
  REGIMES,
  WEIGHT_CATEGORIES,
  type CategoryWeights,
  type MarketVolatility,
  type PerformanceRecord,
  type PerformanceStats,
  type Regime,
  type RegimeStats,
  type TradeSignal,
  type VolatilityInput,
  type WeightAdjustment,
  type WeightCategory,
} from '../types.js';

const logger = createLogger('dynamic-weight-optimizer');

const MIN_VOLATILITY_BARS = 10;
const MAX_HISTORY = 100;
const SAVED_HISTORY = 50;

/** 국면별 기본 가중치 (합계 1.0) */
export const BASE_WEIGHTS: Readonly<Record<Regime, Readonly<CategoryWeights>>> = {
  BULL: {
    technical: 0.2,
    disclosure: 0.1,
    supply: 0.25,
    fundamental: 0.1,
    market_context: 0.1,
    news_sentiment: 0.15,
    consensus: 0.1,
  },
  BEAR: {
    technical: 0.15,
    disclosure: 0.15,
    supply: 0.15,
    fundamental: 0.2,
    market_context: 0.1,
    news_sentiment: 0.15,
    consensus: 0.1,
  },
  SIDEWAY: {
    technical: 0.25,
    disclosure: 0.1,
    supply: 0.2,
    fundamental: 0.1,
    market_context: 0.1,
    news_sentiment: 0.15,
    consensus: 0.1,
  },
};

/** 변동성 구간별 조정 계수. 없는 항목은 ×1.0 */
export const VOLATILITY_MULTIPLIERS: Readonly<Record<MarketVolatility, Partial<CategoryWeights>>> = {
  low: { technical: 1.1, supply: 1.1, fundamental: 0.9, news_sentiment: 0.9 },
  normal: { technical: 1.0, supply: 1.0, fundamental: 1.0, news_sentiment: 1.0 },
  high: { technical: 0.8, supply: 0.9, fundamental: 1.2, news_sentiment: 1.1 },
  extreme: { technical: 0.6, supply: 0.7, fundamental: 1.4, disclosure: 1.3, news_sentiment: 1.2 },
};

export function toRegime(value: string): Regime {
  return REGIMES.find((r) => r === value) ?? 'SIDEWAY';
}

/**
 * 연환산 변동성과 최근 5일 변동폭으로 구간 판정
 */
export function classifyVolatility(annualizedVolatility: number, recentRangePct: number): MarketVolatility {
  if (annualizedVolatility < 12 && recentRangePct < 3) return 'low';
  if (annualizedVolatility < 20 && recentRangePct < 5) return 'normal';
  if (annualizedVolatility < 30 && recentRangePct < 8) return 'high';
  return 'extreme';
}

export function applyVolatilityAdjustment(weights: CategoryWeights, volatility: MarketVolatility): CategoryWeights {
  const multipliers = VOLATILITY_MULTIPLIERS[volatility];
  return mapWeights(weights, (key, value) => value * (multipliers[key] ?? 1.0));
}

/** 합계 1.0으로 정규화 (합계 0이면 그대로) */
export function normalizeWeights(weights: CategoryWeights): CategoryWeights {
  const total = WEIGHT_CATEGORIES.reduce((s, key) => s + weights[key], 0);
  if (total === 0) return { ...weights };
  return mapWeights(weights, (_key, value) => value / total);
}

export function adjustmentReason(regime: Regime, volatility: MarketVolatility): string {
  switch (volatility) {
    case 'low':
      return `낮은 변동성(${regime}) - 기술적/수급 신호 강화`;
    case 'normal':
      return `정상 변동성(${regime}) - 기본 가중치 유지`;
    case 'high':
      return `높은 변동성(${regime}) - 펀더멘털/뉴스 신호 강화`;
    case 'extreme':
      return `극심한 변동성(${regime}) - 방어적 가중치 적용`;
    default: {
      const _exhaustive: never = volatility;
      return _exhaustive;
    }
  }
}

export function volatilityConfidence(volatility: MarketVolatility): number {
  switch (volatility) {
    case 'low':
      return 0.9;
    case 'normal':
      return 0.85;
    case 'high':
      return 0.7;
    case 'extreme':
      return 0.5;
    default: {
      const _exhaustive: never = volatility;
      return _exhaustive;
    }
  }
}

/** BUY는 상승, SELL은 하락이면 성공. HOLD는 항상 성공 */
export function isSuccessfulTrade(signal: TradeSignal, actualReturn: number): boolean {
  switch (signal) {
    case 'BUY':
      return actualReturn > 0;
    case 'SELL':
      return actualReturn < 0;
    case 'HOLD':
      return true;
    default: {
      const _exhaustive: never = signal;
      return _exhaustive;
    }
  }
}

function mapWeights(
  weights: CategoryWeights,
  fn: (key: WeightCategory, value: number) => number,
): CategoryWeights {
  const out = { ...weights };
  for (const key of WEIGHT_CATEGORIES) {
    out[key] = fn(key, weights[key]);
  }
  return out;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// =============================================================================
// 저장 파일 (snake_case JSON)
// =============================================================================

const partialWeightsSchema = z.record(z.number());

const storedRecordSchema = z.object({
  timestamp: z.string(),
  regime: z.enum(['BULL', 'BEAR', 'SIDEWAY']),
  volatility: z.enum(['low', 'normal', 'high', 'extreme', 'unknown']),
  weights: partialWeightsSchema,
  signal: z.enum(['BUY', 'SELL', 'HOLD']),
  actual_return: z.number(),
  success: z.boolean(),
});

const weightsFileSchema = z.object({
  base_weights: z.record(partialWeightsSchema).optional(),
  cached_weights: z.record(partialWeightsSchema).default({}),
  performance_history: z.array(storedRecordSchema).default([]),
  updated_at: z.string().optional(),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;

function pickCategories(weights: Record<string, number>): Partial<CategoryWeights> {
  const out: Partial<CategoryWeights> = {};
  for (const key of WEIGHT_CATEGORIES) {
    const value = weights[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function fromStored(record: StoredRecord): PerformanceRecord {
  return {
    timestamp: record.timestamp,
    regime: record.regime,
    volatility: record.volatility,
    weights: pickCategories(record.weights),
    signal: record.signal,
    actualReturn: record.actual_return,
    success: record.success,
  };
}

function toStored(record: PerformanceRecord): StoredRecord {
  return {
    timestamp: record.timestamp,
    regime: record.regime,
    volatility: record.volatility,
    weights: record.weights,
    signal: record.signal,
    actual_return: record.actualReturn,
    success: record.success,
  };
}

export type DynamicWeightOptimizerOptions = {
  client: MarketDataClient;
  clock?: Clock;
  /** 기본: env.WEIGHTS_FILE */
  weightsFile?: string;
};

/**
 * 동적 가중치 최적화기
 * - 국면별 기본 가중치에 KOSPI 변동성 구간별 계수를 곱해 재정규화
 * - 성과 이력은 기록/요약만 하고 가중치 선택에는 쓰지 않는다
 */
export class DynamicWeightOptimizer {
  private readonly client: MarketDataClient;
  private readonly clock: Clock;
  private readonly weightsFile: string;
  private currentVolatility: MarketVolatility | null = null;
  private cachedWeights: Partial<Record<Regime, CategoryWeights>> = {};
  private performanceHistory: PerformanceRecord[] = [];

  constructor(opts: DynamicWeightOptimizerOptions) {
    this.client = opts.client;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.weightsFile = opts.weightsFile ?? env.WEIGHTS_FILE;
    this.loadWeights();
  }

  async getOptimizedWeights(regime: string, marketData?: VolatilityInput): Promise<WeightAdjustment> {
    const resolved = toRegime(regime);
    const baseWeights: CategoryWeights = { ...BASE_WEIGHTS[resolved] };

    const volatility = await this.measureMarketVolatility(marketData);
    this.currentVolatility = volatility;

    const adjustedWeights = normalizeWeights(applyVolatilityAdjustment(baseWeights, volatility));
    this.cachedWeights[resolved] = adjustedWeights;

    return {
      regime: resolved,
      volatility,
      baseWeights,
      adjustedWeights,
      adjustmentReason: adjustmentReason(resolved, volatility),
      confidence: volatilityConfidence(volatility),
      timestamp: toIsoString(this.clock()),
    };
  }

  getCurrentVolatility(): MarketVolatility | null {
    return this.currentVolatility;
  }

  recordPerformance(
    weightsUsed: Partial<CategoryWeights>,
    regime: string,
    signal: TradeSignal,
    actualReturn: number,
  ): PerformanceRecord {
    const record: PerformanceRecord = {
      timestamp: toIsoString(this.clock()),
      regime: toRegime(regime),
      volatility: this.currentVolatility ?? 'unknown',
      weights: { ...weightsUsed },
      signal,
      actualReturn,
      success: isSuccessfulTrade(signal, actualReturn),
    };

    this.performanceHistory.push(record);
    if (this.performanceHistory.length > MAX_HISTORY) {
      this.performanceHistory = this.performanceHistory.slice(-MAX_HISTORY);
    }

    logger.info('성과 기록', { signal, actualReturn: round2(actualReturn), regime: record.regime });
    return record;
  }

  getPerformanceHistory(): readonly PerformanceRecord[] {
    return this.performanceHistory;
  }

  getPerformanceStats(): PerformanceStats {
    const history = this.performanceHistory;
    if (history.length === 0) {
      return { hasData: false, message: 'No performance data' };
    }

    const successes = history.filter((r) => r.success).length;
    const avgReturn = history.reduce((s, r) => s + r.actualReturn, 0) / history.length;

    const regimeStats: Partial<Record<Regime, RegimeStats>> = {};
    for (const regime of REGIMES) {
      const records = history.filter((r) => r.regime === regime);
      if (records.length === 0) continue;
      regimeStats[regime] = {
        count: records.length,
        successRate: records.filter((r) => r.success).length / records.length,
        avgReturn: records.reduce((s, r) => s + r.actualReturn, 0) / records.length,
      };
    }

    return {
      hasData: true,
      totalTrades: history.length,
      successRate: successes / history.length,
      averageReturn: round2(avgReturn),
      regimeStats,
    };
  }

  /**
   * 기본/최근 조정 가중치와 최근 50건 성과를 JSON으로 저장
   */
  saveWeights(): void {
    const data = {
      base_weights: BASE_WEIGHTS,
      cached_weights: this.cachedWeights,
      performance_history: this.performanceHistory.slice(-SAVED_HISTORY).map(toStored),
      updated_at: toIsoString(this.clock()),
    };

    mkdirSync(dirname(this.weightsFile), { recursive: true });
    writeFileSync(this.weightsFile, JSON.stringify(data, null, 2), 'utf8');
    logger.info('가중치 저장 완료', { file: this.weightsFile, records: data.performance_history.length });
  }

  private loadWeights(): void {
    if (!existsSync(this.weightsFile)) return;

    try {
      const parsed = weightsFileSchema.parse(JSON.parse(readFileSync(this.weightsFile, 'utf8')));

      const cached: Partial<Record<Regime, CategoryWeights>> = {};
      for (const regime of REGIMES) {
        const stored = parsed.cached_weights[regime];
        if (!stored) continue;
        cached[regime] = { ...BASE_WEIGHTS[regime], ...pickCategories(stored) };
      }

      this.cachedWeights = cached;
      this.performanceHistory = parsed.performance_history.map(fromStored);
      logger.info('가중치 로드 완료', { file: this.weightsFile, records: this.performanceHistory.length });
    } catch (error) {
      logger.warn('가중치 파일 로드 실패 - 빈 이력으로 시작', {
        file: this.weightsFile,
        error: toErrorMessage(error),
      });
    }
  }

  private async measureMarketVolatility(marketData?: VolatilityInput): Promise<MarketVolatility> {
    if (marketData) {
      return classifyVolatility(marketData.annualizedVolatility, marketData.recentRangePct);
    }

    try {
      const series = await this.client.getChart(KOSPI_INDEX_SYMBOL, { range: '1mo', interval: '1d' });
      if (series.bars.length < MIN_VOLATILITY_BARS) {
        logger.warn('KOSPI 일봉 부족 - 정상 변동성 사용', { bars: series.bars.length });
        return 'normal';
      }

      const snapshot = measureVolatility(series.bars);
      logger.info('시장 변동성 측정', {
        annualizedVolatility: round2(snapshot.annualizedVolatility),
        recentRangePct: round2(snapshot.recentRangePct),
      });
      return classifyVolatility(snapshot.annualizedVolatility, snapshot.recentRangePct);
    } catch (error) {
      logger.warn('변동성 측정 실패 - 정상 변동성 사용', { error: toErrorMessage(error) });
      return 'normal';
    }
  }
}
