import Big from 'big.js';
import type { RSIResult, RsiSignal } from '../types.js';

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;

/**
 * RSI (Relative Strength Index) 계산 - 단순 평균 방식
 *
 * 마지막 period개의 종가 변화에서 평균 상승폭 / 평균 하락폭으로 RS를 구한다.
 * - RSI > 70: 과매수 (Overbought)
 * - RSI < 30: 과매도 (Oversold)
 * - 변화가 전혀 없으면 50
 *
 * @param closes - 종가 배열 (오래된 순, 최소 period + 1개)
 * @param period - RSI 기간 (기본값: 14)
 * @returns 소수 2자리로 반올림된 RSI
 *
 * @example
 * ```typescript
 * const rsi = calculateRSI(kospiCloses, 14);
 * if (rsi.signal === 'overbought') {
 *   console.log('과매수 구간');
 * }
 * ```
 */
export function calculateRSI(closes: number[], period = 14): RSIResult {
  if (closes.length < period + 1) {
    throw new Error(`RSI 계산에 최소 ${period + 1}개의 종가가 필요합니다. 현재: ${closes.length}개`);
  }

  const window = closes.slice(-(period + 1)).map((c) => new Big(c));

  let gains = new Big(0);
  let losses = new Big(0);

  for (let i = 1; i < window.length; i++) {
    const change = window[i].minus(window[i - 1]);
    if (change.gt(0)) {
      gains = gains.plus(change);
    } else {
      losses = losses.plus(change.abs());
    }
  }

  let rsi: Big;

  if (gains.eq(0) && losses.eq(0)) {
    rsi = new Big(50);
  } else if (losses.eq(0)) {
    // 모두 상승 -> RSI = 100
    rsi = new Big(100);
  } else {
    const avgGain = gains.div(period);
    const avgLoss = losses.div(period);
    const rs = avgGain.div(avgLoss);
    rsi = new Big(100).minus(new Big(100).div(new Big(1).plus(rs)));
  }

  const value = Number(rsi.round(2).toString());
  return { value, signal: classifyRSI(value) };
}

export function classifyRSI(value: number): RsiSignal {
  if (value < RSI_OVERSOLD) return 'oversold';
  if (value > RSI_OVERBOUGHT) return 'overbought';
  return 'neutral';
}
