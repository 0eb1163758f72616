import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { fixedClock } from '@workspace/shared-utils';
import {
  FinalSignalValidator,
  determineDecision,
  getLiquidityGrade,
  shouldReducePosition,
} from './final-signal-validator.js';
import type { BlockReason, FusionResult, FusionSignal } from '../types.js';

const clock = fixedClock(DateTime.fromISO('2025-03-14T09:05:00', { zone: 'Asia/Seoul' }));
const validator = new FinalSignalValidator({ clock });

const AMPLE_LIQUIDITY = 20_000_000_000;

function fusion(overrides: Partial<FusionResult> = {}): FusionResult {
  return {
    signal: 'buy',
    finalScore: 3.2,
    tradingHalt: false,
    haltReason: null,
    fundamentalScore: 1.0,
    marketContextScore: 0.5,
    details: {},
    ...overrides,
  };
}

describe('FinalSignalValidator', () => {
  it('거래정지는 다른 모든 값과 무관하게 FORCE_SELL', () => {
    const result = validator.validate(
      '123450',
      fusion({
        tradingHalt: true,
        haltReason: '감사의견 거절',
        fundamentalScore: -5,
        marketContextScore: -5,
        details: { calendar_risk_level: 'critical', market_condition: 'panic' },
      }),
      1,
      99,
    );

    expect(result).toEqual({
      ticker: '123450',
      decision: 'FORCE_SELL',
      reasons: ['DISCLOSURE_HALT'],
      originalScore: 3.2,
      originalSignal: 'buy',
      adjusted: { score: -999, signal: 'force_sell' },
      warnings: ['Trading Halt detected - Force Sell required'],
      details: { halt_reason: '감사의견 거절' },
      validatedAt: '2025-03-14T00:05:00.000Z',
    });
  });

  it('펀더멘털 -2.5는 매수 차단하고 신호를 hold / 0으로 바꾼다', () => {
    const result = validator.validate('005930', fusion({ fundamentalScore: -2.5 }), AMPLE_LIQUIDITY);

    expect(result.decision).toBe('BLOCK_BUY');
    expect(result.reasons).toEqual(['FUNDAMENTAL_RISK']);
    expect(result.adjusted).toEqual({ score: 0, signal: 'hold' });
    expect(result.warnings).toEqual(['Fundamental score (-2.50) below threshold (-2.0)']);
    expect(result.details).toEqual({ fundamental_score: -2.5 });
  });

  it('점수가 좋아도 거래대금 100억 미만이면 유동성 트랩으로 차단', () => {
    const result = validator.validate(
      '222220',
      fusion({ signal: 'strong_buy', finalScore: 8.7, fundamentalScore: 4, marketContextScore: 3 }),
      5_000_000_000,
    );

    expect(result.decision).toBe('BLOCK_BUY');
    expect(result.reasons).toEqual(['LIQUIDITY_TRAP']);
    expect(result.adjusted).toEqual({ score: 0, signal: 'hold' });
    expect(result.warnings).toEqual(['Low liquidity: 50.0억 (min: 100억)']);
    expect(result.details).toEqual({ avg_traded_value_5d: 5_000_000_000, min_required: 10_000_000_000 });
  });

  it('매수 차단이어도 매도 신호는 그대로 둔다', () => {
    const result = validator.validate('333330', fusion({ signal: 'sell', finalScore: -3 }), 1_000_000);

    expect(result.decision).toBe('BLOCK_BUY');
    expect(result.adjusted).toEqual({ score: -3, signal: 'sell' });
  });

  it('Critical 이벤트는 매수 신호를 HOLD_ONLY로, 매도 신호는 PASS', () => {
    const details = { calendar_risk_level: 'critical', calendar_warning: 'FOMC 당일' } as const;

    const buy = validator.validate('005930', fusion({ details }), AMPLE_LIQUIDITY);
    const sell = validator.validate('005930', fusion({ signal: 'sell', finalScore: -2, details }), AMPLE_LIQUIDITY);

    expect(buy.decision).toBe('HOLD_ONLY');
    expect(buy.adjusted).toEqual({ score: 0, signal: 'hold' });
    expect(buy.warnings).toEqual(['Critical calendar event: FOMC 당일']);
    expect(buy.details).toEqual({ calendar_risk: 'critical', calendar_warning: 'FOMC 당일' });
    expect(sell.decision).toBe('PASS');
    expect(sell.reasons).toEqual(['CALENDAR_CRITICAL']);
    expect(sell.adjusted).toBeNull();
  });

  it('시장 폭락 점수와 공포 심리, 고변동성은 소프트 차단', () => {
    const result = validator.validate(
      '005930',
      fusion({ marketContextScore: -2.1, details: { market_condition: 'fear', fear_greed_score: 25 } }),
      AMPLE_LIQUIDITY,
      16.24,
    );

    expect(result.decision).toBe('HOLD_ONLY');
    expect(result.reasons).toEqual(['MARKET_PANIC', 'OVERHEATED_MARKET', 'HIGH_VOLATILITY']);
    expect(result.warnings).toEqual([
      'Market in panic mode (score: -2.10)',
      'Market in fear mode (F&G: 25)',
      'High volatility: 16.2% (max: 15.0%)',
    ]);
  });

  it('details 키가 없으면 low / 50 / neutral 로 본다', () => {
    const nominal = validator.validate('005930', fusion({ details: undefined }), AMPLE_LIQUIDITY, 0);
    const panic = validator.validate('005930', fusion({ details: { market_condition: 'panic' } }), AMPLE_LIQUIDITY);

    expect(nominal.decision).toBe('PASS');
    expect(nominal.reasons).toEqual([]);
    expect(nominal.adjusted).toBeNull();
    expect(panic.warnings).toEqual(['Market in panic mode (F&G: 50)']);
  });

  it('모든 사유가 겹치면 정해진 순서로 수집하고 하드 차단이 우선', () => {
    const result = validator.validate(
      '005930',
      fusion({
        fundamentalScore: -3,
        marketContextScore: -3,
        details: { calendar_risk_level: 'critical', market_condition: 'panic' },
      }),
      1,
      20,
    );

    expect(result.reasons).toEqual([
      'FUNDAMENTAL_RISK',
      'MARKET_PANIC',
      'LIQUIDITY_TRAP',
      'CALENDAR_CRITICAL',
      'OVERHEATED_MARKET',
      'HIGH_VOLATILITY',
    ]);
    expect(result.decision).toBe('BLOCK_BUY');
  });

  it('임계값은 인스턴스별로 바꿀 수 있어야 함', () => {
    const strict = new FinalSignalValidator({ clock, thresholds: { liquidityMinKrw: 50_000_000_000 } });

    expect(strict.validate('005930', fusion(), AMPLE_LIQUIDITY).decision).toBe('BLOCK_BUY');
    expect(validator.validate('005930', fusion(), AMPLE_LIQUIDITY).decision).toBe('PASS');
  });
});

describe('determineDecision', () => {
  const ALL_REASONS: BlockReason[] = [
    'FUNDAMENTAL_RISK',
    'MARKET_PANIC',
    'LIQUIDITY_TRAP',
    'DISCLOSURE_HALT',
    'CALENDAR_CRITICAL',
    'OVERHEATED_MARKET',
    'HIGH_VOLATILITY',
  ];
  const SIGNALS: FusionSignal[] = ['strong_buy', 'buy', 'hold', 'sell', 'strong_sell'];

  it('거래정지 사유가 있으면 신호와 무관하게 FORCE_SELL', () => {
    for (const signal of SIGNALS) {
      for (const other of ALL_REASONS) {
        expect(determineDecision([other, 'DISCLOSURE_HALT'], signal)).toBe('FORCE_SELL');
      }
    }
  });

  it('소프트 사유만 있으면 매수 신호일 때만 HOLD_ONLY', () => {
    expect(determineDecision(['HIGH_VOLATILITY'], 'strong_buy')).toBe('HOLD_ONLY');
    expect(determineDecision(['HIGH_VOLATILITY'], 'hold')).toBe('PASS');
    expect(determineDecision(['MARKET_PANIC', 'LIQUIDITY_TRAP'], 'hold')).toBe('BLOCK_BUY');
  });
});

describe('liquidity and position helpers', () => {
  it('거래대금 등급 경계', () => {
    expect(getLiquidityGrade(100_000_000_000)).toBe('A');
    expect(getLiquidityGrade(99_999_999_999)).toBe('B');
    expect(getLiquidityGrade(50_000_000_000)).toBe('B');
    expect(getLiquidityGrade(10_000_000_000)).toBe('C');
    expect(getLiquidityGrade(5_000_000_000)).toBe('D');
    expect(getLiquidityGrade(4_999_999_999)).toBe('F');
  });

  it('시장 폭락, Critical 이벤트, 고변동성이면 포지션 축소', () => {
    expect(shouldReducePosition({ reasons: ['CALENDAR_CRITICAL'] })).toBe(true);
    expect(shouldReducePosition({ reasons: ['OVERHEATED_MARKET', 'LIQUIDITY_TRAP'] })).toBe(false);
    expect(shouldReducePosition({ reasons: [] })).toBe(false);
  });
});
