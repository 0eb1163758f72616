import { createLogger, createMarketClock, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import type {
  BacktestFn,
  BacktestSummary,
  RobustnessResult,
  StockTestResult,
  StrategyWeights,
  TestStock,
} from '../types.js';

const logger = createLogger('robustness-tester');

/** MDD가 이 값(%)을 넘는 종목이 하나라도 있으면 실패 */
export const MAX_MDD_THRESHOLD = 10;

/** bull / bear / sideways */
const PERIODS_TESTED = 3;

export const DEFAULT_TEST_STOCKS: readonly TestStock[] = [
  { ticker: '015760', name: 'KEPCO', profile: 'stable' },
  { ticker: '005930', name: 'Samsung', profile: 'large_cap' },
  { ticker: '035720', name: 'Kakao', profile: 'volatile' },
  { ticker: '000660', name: 'SK Hynix', profile: 'cyclical' },
  { ticker: '051910', name: 'LG Chem', profile: 'growth' },
];

type BaseOutcome = { winRate: number; mdd: number; cagr: number };

function baseOutcome(profile: TestStock['profile']): BaseOutcome {
  switch (profile) {
    case 'stable':
      return { winRate: 55, mdd: 5, cagr: 8 };
    case 'large_cap':
      return { winRate: 52, mdd: 8, cagr: 12 };
    case 'volatile':
      return { winRate: 48, mdd: 15, cagr: 18 };
    case 'cyclical':
      return { winRate: 50, mdd: 12, cagr: 15 };
    case 'growth':
      return { winRate: 51, mdd: 10, cagr: 14 };
    case 'other':
      return { winRate: 50, mdd: 10, cagr: 10 };
    default: {
      const _exhaustive: never = profile;
      return _exhaustive;
    }
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export type RobustnessTesterOptions = {
  clock?: Clock;
  /** [0, 1) 난수. 시뮬레이션 백테스트 전용 */
  random?: () => number;
  stocks?: readonly TestStock[];
};

/**
 * 전략 강건성 테스터
 * - 성격이 다른 종목 패널에 같은 가중치를 돌려 MDD 한도를 검증
 * - 백테스트 함수가 없으면 종목 성격별 기대 성과로 시뮬레이션
 */
export class RobustnessTester {
  private readonly clock: Clock;
  private readonly random: () => number;
  private testStocks: TestStock[];

  constructor(opts: RobustnessTesterOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.random = opts.random ?? Math.random;
    this.testStocks = [...(opts.stocks ?? DEFAULT_TEST_STOCKS)];
  }

  async runRobustnessTest(
    weights: StrategyWeights,
    backtestFn?: BacktestFn,
    stocks?: readonly TestStock[],
  ): Promise<RobustnessResult> {
    const panel = stocks ?? this.testStocks;
    const individualResults: StockTestResult[] = [];

    let passed = true;
    let failReason: string | null = null;
    let maxMdd = 0;

    for (const stock of panel) {
      logger.info('강건성 테스트 진행', { ticker: stock.ticker, name: stock.name });

      const summary = backtestFn ? await backtestFn(stock, weights) : this.simulateBacktest(stock, weights);
      individualResults.push({ ...summary, ticker: stock.ticker, name: stock.name, profile: stock.profile });

      const mdd = Math.abs(summary.mdd);
      maxMdd = Math.max(maxMdd, mdd);

      if (mdd > MAX_MDD_THRESHOLD) {
        passed = false;
        failReason = `${stock.name}(${stock.ticker}) MDD ${mdd.toFixed(1)}% > ${MAX_MDD_THRESHOLD}%`;
        logger.warn('강건성 테스트 실패', { reason: failReason });
      }
    }

    return {
      passed,
      failReason,
      stocksTested: panel.length,
      periodsTested: PERIODS_TESTED,
      avgWinRate: round2(mean(individualResults.map((r) => r.winRate))),
      avgMdd: round2(mean(individualResults.map((r) => Math.abs(r.mdd)))),
      maxMdd: round2(maxMdd),
      avgCagr: round2(mean(individualResults.map((r) => r.cagr))),
      individualResults,
      testedAt: toIsoString(this.clock()),
    };
  }

  /**
   * 종목 성격별 기대 성과 + 균등 노이즈
   * - 변동성 종목은 swing, 안정 종목은 mean_reversion 비중이 승률에 유리
   */
  simulateBacktest(stock: TestStock, weights: StrategyWeights): BacktestSummary {
    const base = baseOutcome(stock.profile);
    const swing = weights.swing ?? 0.3;
    const meanReversion = weights.mean_reversion ?? 0.3;

    let winRateAdj = 0;
    if (stock.profile === 'volatile') winRateAdj = swing * 5 - meanReversion * 3;
    else if (stock.profile === 'stable') winRateAdj = meanReversion * 5 - swing * 2;

    return {
      winRate: base.winRate + winRateAdj + this.uniform(-3, 3),
      mdd: base.mdd + this.uniform(-2, 2),
      cagr: base.cagr + this.uniform(-3, 3),
      sharpeRatio: 0.8 + this.uniform(-0.3, 0.3),
      profitFactor: 1.2 + this.uniform(-0.2, 0.2),
      totalTrades: Math.trunc(50 + this.uniform(-10, 10)),
    };
  }

  addTestStock(stock: TestStock): void {
    this.testStocks.push(stock);
    logger.info('테스트 종목 추가', { ticker: stock.ticker, name: stock.name });
  }

  setTestStocks(stocks: readonly TestStock[]): void {
    this.testStocks = [...stocks];
    logger.info('테스트 종목 설정', { count: stocks.length });
  }

  getTestStocks(): TestStock[] {
    return [...this.testStocks];
  }

  private uniform(low: number, high: number): number {
    return low + (high - low) * this.random();
  }
}
