import type { PriceBar } from '@workspace/trading-utils';
import type { QuoteSnapshot } from './types.js';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * 최근 2개 봉으로 1일 등락 스냅샷 생성
 * - 봉이 1개뿐이면 변화량 0
 * - 봉이 없으면 null
 */
export function toQuoteSnapshot(
  symbol: string,
  name: string,
  bars: PriceBar[],
  timestamp: string,
): QuoteSnapshot | null {
  const last = bars[bars.length - 1];
  if (!last) return null;

  const prevClose = bars.length > 1 ? bars[bars.length - 2].close : last.close;
  const change = last.close - prevClose;
  const changePct = prevClose > 0 ? (change / prevClose) * 100 : 0;

  return {
    symbol,
    name,
    price: round2(last.close),
    change: round2(change),
    changePct: round2(changePct),
    volume: Math.trunc(last.volume),
    timestamp,
  };
}
