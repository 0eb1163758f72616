import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DateTime } from 'luxon';
import { fixedClock } from '@workspace/shared-utils';
import { WeightOptimizer, defaultStrategyWeights, generateWeightCombinations } from './weight-optimizer.js';
import type { BacktestRecord } from '../types.js';

const clock = fixedClock(DateTime.fromISO('2025-03-14T18:30:00', { zone: 'Asia/Seoul' }));

function sum(weights: Record<string, number>): number {
  return Object.values(weights).reduce((s, v) => s + v, 0);
}

describe('generateWeightCombinations', () => {
  it('3개 전략 10% 격자는 합계 1인 조합 66개', () => {
    const combos = generateWeightCombinations();

    expect(combos).toHaveLength(66);
    expect(combos[0]).toEqual({ swing: 0, mean_reversion: 0, trend_following: 1 });
    expect(combos[combos.length - 1]).toEqual({ swing: 1, mean_reversion: 0, trend_following: 0 });
    for (const combo of combos) {
      expect(Math.abs(sum(combo) - 1)).toBeLessThan(0.01);
    }
  });

  it('격자 간격과 전략 목록을 지정할 수 있어야 함', () => {
    expect(generateWeightCombinations(['a', 'b'], 0.5)).toEqual([
      { a: 0, b: 1 },
      { a: 0.5, b: 0.5 },
      { a: 1, b: 0 },
    ]);
    expect(generateWeightCombinations([])).toEqual([]);
  });
});

describe('WeightOptimizer', () => {
  const results: BacktestRecord[] = [
    { weights: { swing: 0.5, mean_reversion: 0.5, trend_following: 0 }, sharpeRatio: 1.2, profitFactor: 2.0 },
    { weights: { swing: 0, mean_reversion: 1, trend_following: 0 } },
    { weights: { swing: 0.2, mean_reversion: 0.2, trend_following: 0.6 }, sharpeRatio: -0.5 },
    {
      weights: { swing: 0.1, mean_reversion: 0.3, trend_following: 0.6 },
      sharpeRatio: 1.5,
      profitFactor: 1.1,
      winRate: 54,
      totalReturn: 12.5,
    },
  ];

  it('지표 최댓값 조합을 국면 최적 가중치로 채택', () => {
    const optimizer = new WeightOptimizer({ clock });

    const result = optimizer.optimizeForRegime('bull', results);

    expect(result).toEqual({
      regime: 'bull',
      weights: { swing: 0.1, mean_reversion: 0.3, trend_following: 0.6 },
      sharpeRatio: 1.5,
      profitFactor: 1.1,
      winRate: 54,
      totalReturn: 12.5,
      iterations: 4,
      optimizedAt: '2025-03-14T09:30:00.000Z',
    });
    expect(optimizer.getOptimalWeights('bull')).toEqual({ swing: 0.1, mean_reversion: 0.3, trend_following: 0.6 });
  });

  it('다른 지표로 최적화하고 없는 지표는 0으로 본다', () => {
    const optimizer = new WeightOptimizer({ clock });

    expect(optimizer.optimizeForRegime('bear', results, 'profit_factor').weights).toEqual(results[0].weights);
    expect(optimizer.optimizeForRegime('sideways', [results[2], results[1]]).weights).toEqual(results[1].weights);
  });

  it('결과가 없으면 국면 기본 가중치와 반복 0', () => {
    const optimizer = new WeightOptimizer({ clock });

    const result = optimizer.optimizeForRegime('sideways', []);

    expect(result.weights).toEqual({ swing: 0.3, mean_reversion: 0.6, trend_following: 0.1 });
    expect(result.iterations).toBe(0);
    expect(result.sharpeRatio).toBe(0);
    expect(optimizer.getAllOptimalWeights()).toEqual({
      bull: defaultStrategyWeights('bull'),
      bear: defaultStrategyWeights('bear'),
      sideways: defaultStrategyWeights('sideways'),
    });
  });

  it('수동 설정은 합계가 1에서 벗어나면 정규화', () => {
    const optimizer = new WeightOptimizer({ clock });

    optimizer.setOptimalWeights('bull', { swing: 2, trend_following: 2 });
    optimizer.setOptimalWeights('bear', { swing: 0.5, trend_following: 0.505 });

    expect(optimizer.getOptimalWeights('bull')).toEqual({ swing: 0.5, trend_following: 0.5 });
    expect(optimizer.getOptimalWeights('bear')).toEqual({ swing: 0.5, trend_following: 0.505 });
  });

  describe('파일 저장/로드', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'strategy-weights-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('설정된 국면만 저장하고 다시 읽어야 함', () => {
      const file = join(dir, 'nested', 'weights.json');
      const source = new WeightOptimizer({ clock });
      source.setOptimalWeights('bull', { swing: 0.4, mean_reversion: 0.1, trend_following: 0.5 });

      source.saveWeights(file);

      expect(JSON.parse(readFileSync(file, 'utf8'))).toEqual({
        bull: { swing: 0.4, mean_reversion: 0.1, trend_following: 0.5 },
      });

      const target = new WeightOptimizer({ clock });
      target.loadWeights(file);
      expect(target.getOptimalWeights('bull')).toEqual({ swing: 0.4, mean_reversion: 0.1, trend_following: 0.5 });
      expect(target.getOptimalWeights('bear')).toEqual(defaultStrategyWeights('bear'));
    });

    it('알 수 없는 국면 키는 로드 실패', () => {
      const file = join(dir, 'weights.json');
      writeFileSync(file, JSON.stringify({ crash: { swing: 1 } }));

      expect(() => new WeightOptimizer({ clock }).loadWeights(file)).toThrow();
    });
  });
});
