import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger, createMarketClock, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import {
  STRATEGY_REGIMES,
  type BacktestRecord,
  type OptimizationMetric,
  type OptimizationResult,
  type StrategyRegime,
  type StrategyWeights,
} from '../types.js';

const logger = createLogger('weight-optimizer');

export const DEFAULT_STRATEGIES: readonly string[] = ['swing', 'mean_reversion', 'trend_following'];

const SUM_TOLERANCE = 0.01;

/**
 * 국면별 기본 전략 가중치
 * - bull: 추세추종 중심, sideways: 평균회귀 중심, bear: 방어형
 */
export function defaultStrategyWeights(regime: StrategyRegime): StrategyWeights {
  switch (regime) {
    case 'bull':
      return { swing: 0.3, mean_reversion: 0.2, trend_following: 0.5 };
    case 'sideways':
      return { swing: 0.3, mean_reversion: 0.6, trend_following: 0.1 };
    case 'bear':
      return { swing: 0.2, mean_reversion: 0.5, trend_following: 0.3 };
    default: {
      const _exhaustive: never = regime;
      return _exhaustive;
    }
  }
}

export function metricValue(record: BacktestRecord, metric: OptimizationMetric): number | undefined {
  switch (metric) {
    case 'sharpe_ratio':
      return record.sharpeRatio;
    case 'profit_factor':
      return record.profitFactor;
    case 'win_rate':
      return record.winRate;
    case 'total_return':
      return record.totalReturn;
    default: {
      const _exhaustive: never = metric;
      return _exhaustive;
    }
  }
}

function sumWeights(weights: StrategyWeights): number {
  return Object.values(weights).reduce((s, v) => s + v, 0);
}

/**
 * 0 ~ 1 격자 위에서 합계가 1.0(±0.01)인 가중치 조합 전체
 * - 격자 값은 소수 둘째 자리로 반올림
 */
export function generateWeightCombinations(
  strategies: readonly string[] = DEFAULT_STRATEGIES,
  step = 0.1,
): StrategyWeights[] {
  if (strategies.length === 0 || step <= 0) return [];

  const steps: number[] = [];
  const count = Math.floor(1 / step + 1e-9);
  for (let i = 0; i <= count; i++) {
    steps.push(Math.round(i * step * 100) / 100);
  }

  const combinations: StrategyWeights[] = [];
  const combo: number[] = [];

  const walk = (depth: number, partial: number): void => {
    if (depth === strategies.length) {
      if (Math.abs(partial - 1.0) < SUM_TOLERANCE) {
        const weights: StrategyWeights = {};
        strategies.forEach((name, i) => {
          weights[name] = combo[i];
        });
        combinations.push(weights);
      }
      return;
    }
    for (const value of steps) {
      // 이미 1.0을 넘은 가지는 합계 조건을 만족할 수 없다
      if (partial + value > 1.0 + SUM_TOLERANCE) break;
      combo[depth] = value;
      walk(depth + 1, partial + value);
    }
  };
  walk(0, 0);

  logger.info('가중치 조합 생성', { strategies: strategies.length, step, combinations: combinations.length });
  return combinations;
}

const savedWeightsSchema = z.record(z.enum(['bull', 'bear', 'sideways']), z.record(z.number()));

export type WeightOptimizerOptions = {
  strategies?: readonly string[];
  clock?: Clock;
};

/**
 * 전략 가중치 최적화기 (오프라인)
 * - 백테스트 결과 중 지표 최댓값 조합을 국면별 최적 가중치로 채택
 */
export class WeightOptimizer {
  readonly strategies: readonly string[];
  private readonly clock: Clock;
  private readonly optimalWeights = new Map<StrategyRegime, StrategyWeights>();

  constructor(opts: WeightOptimizerOptions = {}) {
    this.strategies = opts.strategies ?? DEFAULT_STRATEGIES;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
  }

  generateWeightCombinations(strategies?: readonly string[], step = 0.1): StrategyWeights[] {
    return generateWeightCombinations(strategies ?? this.strategies, step);
  }

  optimizeForRegime(
    regime: StrategyRegime,
    backtestResults: BacktestRecord[],
    metric: OptimizationMetric = 'sharpe_ratio',
  ): OptimizationResult {
    let best: BacktestRecord | null = null;
    let bestValue = Number.NEGATIVE_INFINITY;

    for (const result of backtestResults) {
      const value = metricValue(result, metric) ?? 0;
      if (value > bestValue) {
        bestValue = value;
        best = result;
      }
    }

    if (!best) {
      logger.warn('백테스트 결과 없음 - 기본 가중치 사용', { regime });
      return {
        regime,
        weights: defaultStrategyWeights(regime),
        sharpeRatio: 0,
        profitFactor: 0,
        winRate: 0,
        totalReturn: 0,
        iterations: 0,
        optimizedAt: toIsoString(this.clock()),
      };
    }

    this.optimalWeights.set(regime, { ...best.weights });
    logger.info('국면별 최적 가중치 선택', { regime, metric, value: bestValue, weights: best.weights });

    return {
      regime,
      weights: { ...best.weights },
      sharpeRatio: best.sharpeRatio ?? 0,
      profitFactor: best.profitFactor ?? 0,
      winRate: best.winRate ?? 0,
      totalReturn: best.totalReturn ?? 0,
      iterations: backtestResults.length,
      optimizedAt: toIsoString(this.clock()),
    };
  }

  getOptimalWeights(regime: StrategyRegime): StrategyWeights {
    const weights = this.optimalWeights.get(regime);
    return weights ? { ...weights } : defaultStrategyWeights(regime);
  }

  getAllOptimalWeights(): Record<StrategyRegime, StrategyWeights> {
    return {
      bull: this.getOptimalWeights('bull'),
      bear: this.getOptimalWeights('bear'),
      sideways: this.getOptimalWeights('sideways'),
    };
  }

  /**
   * 수동 설정. 합계가 1.0에서 0.01 넘게 벗어나면 정규화
   */
  setOptimalWeights(regime: StrategyRegime, weights: StrategyWeights): void {
    const total = sumWeights(weights);
    let next = { ...weights };

    if (Math.abs(total - 1.0) > SUM_TOLERANCE && total !== 0) {
      logger.warn('가중치 합계가 1.0이 아님 - 정규화', { regime, total });
      next = Object.fromEntries(Object.entries(weights).map(([k, v]) => [k, v / total]));
    }

    this.optimalWeights.set(regime, next);
    logger.info('최적 가중치 설정', { regime, weights: next });
  }

  /** 최적화/설정된 국면만 저장 */
  saveWeights(filePath: string): void {
    const data: Partial<Record<StrategyRegime, StrategyWeights>> = {};
    for (const regime of STRATEGY_REGIMES) {
      const weights = this.optimalWeights.get(regime);
      if (weights) data[regime] = weights;
    }

    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf8');
    logger.info('전략 가중치 저장', { file: filePath, regimes: Object.keys(data) });
  }

  /** 형식이 맞지 않으면 ZodError를 던진다 */
  loadWeights(filePath: string): void {
    const parsed = savedWeightsSchema.parse(JSON.parse(readFileSync(filePath, 'utf8')));

    for (const regime of STRATEGY_REGIMES) {
      const weights = parsed[regime];
      if (weights) this.optimalWeights.set(regime, weights);
    }
    logger.info('전략 가중치 로드', { file: filePath, regimes: Object.keys(parsed) });
  }
}
