import { describe, it, expect } from 'vitest';
import {
  annualizedVolatilityPct,
  dailyReturns,
  highLowRangePct,
  measureVolatility,
  periodReturnPct,
  sampleStdDev,
} from '../../indicators/volatility.js';
import { advanceDeclineRatio } from '../../indicators/breadth.js';
import type { PriceBar } from '../../types.js';

function bar(close: number, high = close, low = close): PriceBar {
  return { time: '2025-03-03T06:30:00.000Z', open: close, high, low, close, volume: 1000 };
}

describe('volatility', () => {
  it('dailyReturns는 전일 대비 비율을 반환해야 함', () => {
    const r = dailyReturns([100, 110, 99]);
    expect(r[0]).toBeCloseTo(0.1, 10);
    expect(r[1]).toBeCloseTo(-0.1, 10);
  });

  it('sampleStdDev는 값이 2개 미만이면 0', () => {
    expect(sampleStdDev([0.01])).toBe(0);
  });

  it('연환산 변동성 = 표본표준편차 × √252 × 100', () => {
    // 수익률 +10%, -10% → 표본분산 0.02
    expect(annualizedVolatilityPct([100, 110, 99])).toBeCloseTo(Math.sqrt(0.02 * 252) * 100, 6);
  });

  it('highLowRangePct는 최근 5개 봉만 사용해야 함', () => {
    const bars = [
      bar(100, 300, 10), // 창 밖
      bar(100, 110, 95),
      bar(100, 105, 90),
      bar(100, 101, 99),
      bar(100, 102, 98),
      bar(100, 103, 97),
    ];

    // (110 - 90) / 100 × 100
    expect(highLowRangePct(bars)).toBe(20);
  });

  it('measureVolatility는 두 값을 함께 반환해야 함', () => {
    const snapshot = measureVolatility([bar(100), bar(100), bar(100)]);
    expect(snapshot).toEqual({ annualizedVolatility: 0, recentRangePct: 0 });
  });

  it('periodReturnPct는 첫/마지막 종가로 계산해야 함', () => {
    expect(periodReturnPct([200, 150, 210])).toBeCloseTo(5, 10);
    expect(periodReturnPct([200])).toBe(0);
  });
});

describe('advanceDeclineRatio', () => {
  it('상승/하락 종목 수 비율을 반환해야 함', () => {
    expect(advanceDeclineRatio([1.2, 0.5, -0.3, 0, 2.1, -1])).toBe(1.5);
  });

  it('하락 종목이 없으면 2.0, 등락 모두 없으면 1.0', () => {
    expect(advanceDeclineRatio([0.4, 0])).toBe(2.0);
    expect(advanceDeclineRatio([0, 0])).toBe(1.0);
    expect(advanceDeclineRatio([])).toBe(1.0);
  });

  it('소수 2자리로 반올림해야 함', () => {
    expect(advanceDeclineRatio([1, 1, -1, -1, -1])).toBe(0.67);
  });
});
