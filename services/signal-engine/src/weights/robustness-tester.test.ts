import { describe, it, expect, vi } from 'vitest';
import { DateTime } from 'luxon';
import { fixedClock } from '@workspace/shared-utils';
import { DEFAULT_TEST_STOCKS, RobustnessTester } from './robustness-tester.js';
import type { BacktestFn, BacktestSummary } from '../types.js';

const clock = fixedClock(DateTime.fromISO('2025-03-14T20:00:00', { zone: 'Asia/Seoul' }));

// 0.5 → 균등 노이즈 구간의 중앙값 (노이즈 0)
const midpoint = () => 0.5;

const WEIGHTS = { swing: 0.3, mean_reversion: 0.5, trend_following: 0.2 };

function summary(mdd: number, overrides: Partial<BacktestSummary> = {}): BacktestSummary {
  return { winRate: 50, mdd, cagr: 10, sharpeRatio: 1, profitFactor: 1.3, totalTrades: 40, ...overrides };
}

describe('RobustnessTester', () => {
  it('시뮬레이션은 종목 성격별 기대 성과를 쓰고 MDD 10% 초과 시 실패', async () => {
    const tester = new RobustnessTester({ clock, random: midpoint });

    const result = await tester.runRobustnessTest(WEIGHTS);

    expect(result.passed).toBe(false);
    // 마지막으로 한도를 넘은 종목이 실패 사유로 남는다
    expect(result.failReason).toBe('SK Hynix(000660) MDD 12.0% > 10%');
    expect(result.stocksTested).toBe(5);
    expect(result.periodsTested).toBe(3);
    expect(result.avgWinRate).toBe(51.58);
    expect(result.avgMdd).toBe(10);
    expect(result.maxMdd).toBe(15);
    expect(result.avgCagr).toBe(13.4);
    expect(result.testedAt).toBe('2025-03-14T11:00:00.000Z');
    expect(result.individualResults[0]).toMatchObject({
      ticker: '015760',
      profile: 'stable',
      winRate: 56.9,
      mdd: 5,
      sharpeRatio: 0.8,
      profitFactor: 1.2,
      totalTrades: 50,
    });
  });

  it('백테스트 함수가 주어지면 종목마다 호출하고 MDD 절댓값으로 판정', async () => {
    const backtest = vi.fn<Parameters<BacktestFn>, ReturnType<BacktestFn>>(async (stock) =>
      summary(stock.ticker === '005930' ? -10 : -7.5),
    );
    const tester = new RobustnessTester({ clock });

    const result = await tester.runRobustnessTest(WEIGHTS, backtest);

    expect(backtest).toHaveBeenCalledTimes(5);
    expect(backtest.mock.calls[0]).toEqual([DEFAULT_TEST_STOCKS[0], WEIGHTS]);
    expect(result.passed).toBe(true);
    expect(result.failReason).toBeNull();
    expect(result.maxMdd).toBe(10);
    expect(result.avgMdd).toBe(8);
  });

  it('지정한 종목 패널만 테스트', async () => {
    const tester = new RobustnessTester({ clock, random: midpoint });

    const result = await tester.runRobustnessTest(WEIGHTS, undefined, [
      { ticker: '999999', name: 'Other', profile: 'other' },
    ]);

    expect(result.stocksTested).toBe(1);
    expect(result.passed).toBe(true);
    expect(result.individualResults[0]).toMatchObject({ winRate: 50, mdd: 10, cagr: 10 });
  });

  it('변동성 종목은 swing 비중이 높을수록 승률이 오른다', () => {
    const tester = new RobustnessTester({ clock, random: midpoint });
    const kakao = DEFAULT_TEST_STOCKS[2];

    const swingHeavy = tester.simulateBacktest(kakao, { swing: 1, mean_reversion: 0 });
    const meanHeavy = tester.simulateBacktest(kakao, { swing: 0, mean_reversion: 1 });

    expect(swingHeavy.winRate).toBe(53);
    expect(meanHeavy.winRate).toBe(45);
  });

  it('테스트 종목 목록은 인스턴스 안에서만 바뀐다', () => {
    const tester = new RobustnessTester({ clock });
    const other = new RobustnessTester({ clock });

    tester.addTestStock({ ticker: '123456', name: 'Extra', profile: 'growth' });
    const snapshot = tester.getTestStocks();
    snapshot.pop();

    expect(tester.getTestStocks()).toHaveLength(6);
    expect(other.getTestStocks()).toHaveLength(5);
    expect(DEFAULT_TEST_STOCKS).toHaveLength(5);

    tester.setTestStocks([DEFAULT_TEST_STOCKS[1]]);
    expect(tester.getTestStocks()).toEqual([DEFAULT_TEST_STOCKS[1]]);
  });
});
