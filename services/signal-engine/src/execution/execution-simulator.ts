import Big from 'big.js';
import type { DateTime } from 'luxon';
import {
  createLogger,
  createMarketClock,
  minutesOfDay,
  parseHhmm,
  toIsoString,
  type Clock,
} from '@workspace/shared-utils';
import { env } from '../config/env.js';
import type {
  BreakevenEstimate,
  ExecutionResult,
  OrderSide,
  PnLSimulation,
  TimeSegment,
  TimedStrategy,
} from '../types.js';

const logger = createLogger('execution-simulator');

/**
 * 거래 비용 (비율)
 * - 매수: 수수료 0.015%
 * - 매도: 거래세 0.18% + 수수료 등 합계 0.23%
 */
export const TRADING_COSTS = {
  buy: 0.00015,
  sell: 0.0023,
} as const;

/** 가격 상한(미만) → 호가 단위 */
const TICK_BANDS: ReadonlyArray<readonly [number, number]> = [
  [2_000, 1],
  [5_000, 5],
  [20_000, 10],
  [50_000, 50],
  [200_000, 100],
  [500_000, 500],
];
const MAX_TICK = 1_000;

/** [시작, 끝) 구간. 14:30~15:20 이후 동시호가 10분은 closed */
const SEGMENT_WINDOWS: ReadonlyArray<readonly [TimeSegment, string, string]> = [
  ['premarket', '08:30', '09:00'],
  ['opening', '09:00', '09:30'],
  ['morning', '09:30', '11:30'],
  ['lunch', '11:30', '13:00'],
  ['afternoon', '13:00', '14:30'],
  ['closing', '14:30', '15:20'],
  ['after_hours', '15:30', '18:00'],
];

function mustPositivePrice(price: number): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new RangeError(`가격은 0보다 커야 합니다: ${price}`);
  }
  return price;
}

export function getTickSize(price: number): number {
  for (const [upper, tick] of TICK_BANDS) {
    if (price < upper) return tick;
  }
  return MAX_TICK;
}

export function timeSegmentAt(dt: DateTime): TimeSegment {
  const m = minutesOfDay(dt);
  for (const [segment, start, end] of SEGMENT_WINDOWS) {
    if (m >= parseHhmm(start) && m < parseHhmm(end)) return segment;
  }
  return 'closed';
}

/**
 * 시간대별 전략 가중치. 장외 시간은 null
 * - 시초가: 변동성 돌파, 오후: 추세추종/수급, 종가: 종가 베팅
 */
export function segmentWeights(segment: TimeSegment): Readonly<Record<TimedStrategy, number>> | null {
  switch (segment) {
    case 'premarket':
      return { volatility_breakout: 0.8, trend_following: 0.5, supply_demand: 0.6 };
    case 'opening':
      return { volatility_breakout: 1.5, trend_following: 0.7, supply_demand: 0.8 };
    case 'morning':
      return { volatility_breakout: 1.0, trend_following: 1.2, supply_demand: 1.1 };
    case 'lunch':
      return { volatility_breakout: 0.6, trend_following: 0.8, supply_demand: 0.7 };
    case 'afternoon':
      return { volatility_breakout: 0.8, trend_following: 1.3, supply_demand: 1.4 };
    case 'closing':
      return { volatility_breakout: 0.5, trend_following: 1.0, supply_demand: 1.5 };
    case 'after_hours':
    case 'closed':
      return null;
    default: {
      const _exhaustive: never = segment;
      return _exhaustive;
    }
  }
}

export function timeWeightFor(segment: TimeSegment, strategy: TimedStrategy): number {
  return segmentWeights(segment)?.[strategy] ?? 1.0;
}

/**
 * 슬리피지 적용 체결가
 * - 매수는 호가 단위 × 틱 수만큼 위, 매도는 아래
 */
export function applyTickSlippage(price: number, side: OrderSide, ticks = 1): { expectedPrice: Big; slippage: Big } {
  const slippage = new Big(getTickSize(mustPositivePrice(price))).times(ticks);
  const base = new Big(price);
  const expectedPrice = side === 'BUY' ? base.plus(slippage) : base.minus(slippage);
  return { expectedPrice, slippage };
}

function costRate(side: OrderSide): number {
  return side === 'BUY' ? TRADING_COSTS.buy : TRADING_COSTS.sell;
}

function toFixedNumber(value: Big, dp: number): number {
  return Number(value.round(dp, Big.roundHalfUp).toFixed(dp));
}

/**
 * 왕복 손익분기 상승률 (%)
 * = (매수 비용 + 매도 비용 + 매수 슬리피지/매수가 + 매도 슬리피지/매도가) × 100
 */
export function breakevenPct(buyPrice: number, sellPrice: number, buySlippage: Big, sellSlippage: Big): Big {
  return new Big(TRADING_COSTS.buy)
    .plus(TRADING_COSTS.sell)
    .plus(buySlippage.div(buyPrice))
    .plus(sellSlippage.div(sellPrice))
    .times(100);
}

export type ExecutionSimulatorOptions = {
  clock?: Clock;
};

/**
 * 실행 시뮬레이터
 * - 호가 단위 슬리피지, 거래세/수수료, 시간대별 가중치 반영
 * - 상태 없음 (시계만 주입)
 */
export class ExecutionSimulator {
  private readonly clock: Clock;

  constructor(opts: ExecutionSimulatorOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
  }

  getCurrentTimeSegment(): TimeSegment {
    return timeSegmentAt(this.clock());
  }

  getTimeBasedWeightAdjustment(strategy: TimedStrategy = 'trend_following'): number {
    return timeWeightFor(this.getCurrentTimeSegment(), strategy);
  }

  simulateBuy(ticker: string, price: number, quantity: number, slippageTicks = 1): ExecutionResult {
    return this.simulate('BUY', ticker, price, quantity, slippageTicks);
  }

  simulateSell(ticker: string, price: number, quantity: number, slippageTicks = 1): ExecutionResult {
    return this.simulate('SELL', ticker, price, quantity, slippageTicks);
  }

  /**
   * 왕복 거래 손익
   * - 손익은 원 단위, 비율은 소수 둘째 자리 반올림
   */
  simulateRoundTrip(
    ticker: string,
    buyPrice: number,
    sellPrice: number,
    quantity: number,
    slippageTicks = 1,
  ): PnLSimulation {
    const buy = applyTickSlippage(buyPrice, 'BUY', slippageTicks);
    const buyAmount = buy.expectedPrice.times(quantity);
    const buyCost = buyAmount.times(TRADING_COSTS.buy);

    const sell = applyTickSlippage(sellPrice, 'SELL', slippageTicks);
    const sellAmount = sell.expectedPrice.times(quantity);
    const sellCost = sellAmount.times(TRADING_COSTS.sell);

    const grossProfit = sellAmount.minus(buyAmount);
    const totalCost = buyCost.plus(sellCost);
    const netProfit = grossProfit.minus(totalCost);
    // 수량 0이면 매수금액도 0
    const netProfitPct = buyAmount.eq(0) ? new Big(0) : netProfit.div(buyAmount).times(100);

    const result: PnLSimulation = {
      ticker,
      quantity,
      buyPrice: buy.expectedPrice.toNumber(),
      buySlippage: buy.slippage.toNumber(),
      buyCost: toFixedNumber(buyCost, 2),
      sellPrice: sell.expectedPrice.toNumber(),
      sellSlippage: sell.slippage.toNumber(),
      sellCost: toFixedNumber(sellCost, 2),
      grossProfit: toFixedNumber(grossProfit, 0),
      totalCost: toFixedNumber(totalCost, 0),
      netProfit: toFixedNumber(netProfit, 0),
      netProfitPct: toFixedNumber(netProfitPct, 2),
      breakevenPct: toFixedNumber(breakevenPct(buyPrice, sellPrice, buy.slippage, sell.slippage), 2),
    };

    logger.debug('왕복 손익 시뮬레이션', {
      ticker,
      netProfit: result.netProfit,
      netProfitPct: result.netProfitPct,
      breakevenPct: result.breakevenPct,
    });
    return result;
  }

  /**
   * 1호가 슬리피지 기준 손익분기 상승률 추정 (소수 셋째 자리)
   */
  estimateBreakeven(price: number): BreakevenEstimate {
    const tickSize = getTickSize(mustPositivePrice(price));
    const slippagePct = new Big(tickSize).div(price).times(100);
    const buyCostPct = new Big(TRADING_COSTS.buy).times(100);
    const sellCostPct = new Big(TRADING_COSTS.sell).times(100);
    const total = slippagePct.times(2).plus(buyCostPct).plus(sellCostPct);

    return {
      price,
      tickSize,
      buySlippagePct: toFixedNumber(slippagePct, 3),
      sellSlippagePct: toFixedNumber(slippagePct, 3),
      buyCostPct: toFixedNumber(buyCostPct, 3),
      sellCostPct: toFixedNumber(sellCostPct, 3),
      totalBreakevenPct: toFixedNumber(total, 3),
      note: `최소 ${total.round(2, Big.roundHalfUp).toFixed(2)}% 상승해야 본전`,
    };
  }

  private simulate(
    side: OrderSide,
    ticker: string,
    price: number,
    quantity: number,
    slippageTicks: number,
  ): ExecutionResult {
    const now = this.clock();
    const segment = timeSegmentAt(now);
    const rate = costRate(side);

    const { expectedPrice, slippage } = applyTickSlippage(price, side, slippageTicks);
    const grossAmount = expectedPrice.times(quantity);
    const taxFee = grossAmount.times(rate);
    const netAmount = side === 'BUY' ? grossAmount.plus(taxFee) : grossAmount.minus(taxFee);

    return {
      ticker,
      orderType: side,
      signalPrice: price,
      expectedPrice: expectedPrice.toNumber(),
      slippage: slippage.toNumber(),
      slippagePct: toFixedNumber(slippage.div(price).times(100), 3),
      taxFee: toFixedNumber(taxFee, 2),
      taxFeePct: toFixedNumber(new Big(rate).times(100), 3),
      quantity,
      grossAmount: toFixedNumber(grossAmount, 2),
      netAmount: toFixedNumber(netAmount, 2),
      timeSegment: segment,
      weightAdjustment: timeWeightFor(segment, 'trend_following'),
      simulatedAt: toIsoString(now),
    };
  }
}
