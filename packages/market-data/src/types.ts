import type { PriceBar } from '@workspace/trading-utils';

export type ChartRange = '1d' | '2d' | '5d' | '1mo' | '3mo' | '6mo' | '1y';
export type ChartInterval = '1m' | '5m' | '15m' | '1h' | '1d';

export type ChartQuery = {
  range: ChartRange;
  interval: ChartInterval;
};

export type ChartSeries = {
  symbol: string;
  bars: PriceBar[];
  /** 차트 구간 직전 종가 (응답 meta에 있을 때만) */
  previousClose: number | null;
};

/**
 * 시세 조회 클라이언트
 * - 구현체는 실패 시 MarketDataError를 던진다. 기본값 대체는 호출 측 책임.
 */
export interface MarketDataClient {
  getChart(symbol: string, query: ChartQuery): Promise<ChartSeries>;
}

/**
 * 1일 등락 스냅샷 (지수/종목/환율/선물 공통)
 */
export type QuoteSnapshot = {
  symbol: string;
  name: string;
  price: number;
  change: number;
  changePct: number;
  volume: number;
  timestamp: string;
};
