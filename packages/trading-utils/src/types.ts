// =============================================================================
// Price Data
// =============================================================================

/**
 * 일봉/분봉 OHLCV (null 제거 후)
 */
export interface PriceBar {
  /** ISO-8601 UTC */
  time: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// =============================================================================
// Indicators
// =============================================================================

export type RsiSignal = 'oversold' | 'neutral' | 'overbought';

/**
 * RSI result
 */
export interface RSIResult {
  value: number;
  signal: RsiSignal;
}

/**
 * 변동성 측정 결과 (%)
 */
export interface VolatilitySnapshot {
  /** 일간 수익률 표본표준편차 × √252 × 100 */
  annualizedVolatility: number;
  /** (최근 N일 최고가 - 최저가) / 최근 N일 평균 종가 × 100 */
  recentRangePct: number;
}
