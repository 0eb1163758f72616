import type { PriceBar, VolatilitySnapshot } from '../types.js';

const TRADING_DAYS_PER_YEAR = 252;

/** 일간 수익률 (비율) */
export function dailyReturns(closes: number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    if (prev === 0) continue;
    out.push(closes[i] / prev - 1);
  }
  return out;
}

/** 표본표준편차 (n - 1) */
export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * 연환산 실현 변동성 (%)
 */
export function annualizedVolatilityPct(closes: number[]): number {
  return sampleStdDev(dailyReturns(closes)) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
}

/**
 * 최근 N일 고저 변동폭 (%)
 * - (최근 N일 최고가 - 최저가) / 최근 N일 평균 종가 × 100
 */
export function highLowRangePct(bars: PriceBar[], window = 5): number {
  const recent = bars.slice(-window);
  if (recent.length === 0) return 0;

  const high = Math.max(...recent.map((b) => b.high));
  const low = Math.min(...recent.map((b) => b.low));
  const meanClose = recent.reduce((s, b) => s + b.close, 0) / recent.length;
  if (meanClose === 0) return 0;

  return ((high - low) / meanClose) * 100;
}

export function measureVolatility(bars: PriceBar[], rangeWindow = 5): VolatilitySnapshot {
  return {
    annualizedVolatility: annualizedVolatilityPct(bars.map((b) => b.close)),
    recentRangePct: highLowRangePct(bars, rangeWindow),
  };
}

/**
 * 구간 수익률 (%) = (마지막 종가 / 첫 종가 - 1) × 100
 */
export function periodReturnPct(closes: number[]): number {
  if (closes.length < 2 || closes[0] === 0) return 0;
  return (closes[closes.length - 1] / closes[0] - 1) * 100;
}
