import { createLogger, createMarketClock, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import type {
  AdjustedSignal,
  BlockReason,
  FusionResult,
  FusionSignal,
  LiquidityGrade,
  ValidationDecision,
  ValidationResult,
} from '../types.js';

const logger = createLogger('signal-validator');

export type ValidationThresholds = {
  /** 펀더멘털 과락 기준 */
  fundamentalMin: number;
  /** 시장 폭락 기준 */
  marketPanic: number;
  /** 5일 평균 거래대금 하한 (원) */
  liquidityMinKrw: number;
  /** 일일 변동성 상한 (%) */
  volatilityMaxPct: number;
};

export const DEFAULT_THRESHOLDS: Readonly<ValidationThresholds> = {
  fundamentalMin: -2.0,
  marketPanic: -2.0,
  liquidityMinKrw: env.LIQUIDITY_MIN_KRW,
  volatilityMaxPct: env.VOLATILITY_MAX_PCT,
};

export const FORCE_SELL_SCORE = -999;

type ReasonSeverity = 'halt' | 'hard' | 'soft';

/**
 * halt: 강제 매도, hard: 매수 차단, soft: 신규 매수만 보류
 */
export function reasonSeverity(reason: BlockReason): ReasonSeverity {
  switch (reason) {
    case 'DISCLOSURE_HALT':
      return 'halt';
    case 'FUNDAMENTAL_RISK':
    case 'LIQUIDITY_TRAP':
      return 'hard';
    case 'MARKET_PANIC':
    case 'CALENDAR_CRITICAL':
    case 'OVERHEATED_MARKET':
    case 'HIGH_VOLATILITY':
      return 'soft';
    default: {
      const _exhaustive: never = reason;
      return _exhaustive;
    }
  }
}

export function isBuySignal(signal: FusionSignal): boolean {
  return signal === 'buy' || signal === 'strong_buy';
}

export function determineDecision(reasons: readonly BlockReason[], originalSignal: FusionSignal): ValidationDecision {
  if (reasons.length === 0) return 'PASS';

  const severities = new Set(reasons.map(reasonSeverity));
  if (severities.has('halt')) return 'FORCE_SELL';
  if (severities.has('hard')) return 'BLOCK_BUY';
  if (severities.has('soft') && isBuySignal(originalSignal)) return 'HOLD_ONLY';
  return 'PASS';
}

/**
 * 결정에 따른 점수/신호 조정. PASS는 null (원래 값 유지)
 */
export function adjustSignal(
  decision: ValidationDecision,
  originalScore: number,
  originalSignal: FusionSignal,
): { score: number; signal: AdjustedSignal } | null {
  switch (decision) {
    case 'PASS':
      return null;
    case 'FORCE_SELL':
      return { score: FORCE_SELL_SCORE, signal: 'force_sell' };
    case 'BLOCK_BUY':
    case 'HOLD_ONLY':
      if (isBuySignal(originalSignal)) return { score: 0, signal: 'hold' };
      return { score: originalScore, signal: originalSignal };
    case 'BLOCK_SELL':
      return { score: originalScore, signal: originalSignal };
    default: {
      const _exhaustive: never = decision;
      return _exhaustive;
    }
  }
}

/**
 * 5일 평균 거래대금 등급
 * - A: 1000억+, B: 500억+, C: 100억+, D: 50억+, F: 거래 불가
 */
export function getLiquidityGrade(avgTradedValue: number): LiquidityGrade {
  if (avgTradedValue >= 100_000_000_000) return 'A';
  if (avgTradedValue >= 50_000_000_000) return 'B';
  if (avgTradedValue >= 10_000_000_000) return 'C';
  if (avgTradedValue >= 5_000_000_000) return 'D';
  return 'F';
}

/** 시장 폭락, Critical 이벤트, 고변동성이면 포지션 축소 권고 */
export function shouldReducePosition(result: Pick<ValidationResult, 'reasons'>): boolean {
  return result.reasons.some(
    (r) => r === 'MARKET_PANIC' || r === 'CALENDAR_CRITICAL' || r === 'HIGH_VOLATILITY',
  );
}

export type FinalSignalValidatorOptions = {
  clock?: Clock;
  thresholds?: Partial<ValidationThresholds>;
};

/**
 * 최종 신호 검증기
 *
 * 모든 점수 계산 뒤 마지막에 호출되는 Veto 단계입니다.
 *
 * 검증 순서:
 * 1. 거래정지 → 즉시 FORCE_SELL
 * 2. 펀더멘털 과락
 * 3. 시장 폭락 (market context 점수)
 * 4. 유동성 트랩 (5일 평균 거래대금)
 * 5. Critical 경제 이벤트
 * 6. 시장 심리 panic / fear
 * 7. 일일 변동성
 *
 * 차단 사유는 예외가 아니라 결정 값으로 돌려준다.
 */
export class FinalSignalValidator {
  private readonly clock: Clock;
  readonly thresholds: Readonly<ValidationThresholds>;

  constructor(opts: FinalSignalValidatorOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...opts.thresholds };
  }

  validate(
    ticker: string,
    fusion: FusionResult,
    avgTradedValue5d: number,
    dailyVolatility?: number | null,
  ): ValidationResult {
    const t = this.thresholds;
    const originalSignal = fusion.signal;
    const originalScore = fusion.finalScore;
    const validatedAt = toIsoString(this.clock());

    if (fusion.tradingHalt) {
      logger.warn('거래정지 감지 - 강제 매도', { ticker, haltReason: fusion.haltReason ?? null });
      return {
        ticker,
        decision: 'FORCE_SELL',
        reasons: ['DISCLOSURE_HALT'],
        originalScore,
        originalSignal,
        adjusted: adjustSignal('FORCE_SELL', originalScore, originalSignal),
        warnings: ['Trading Halt detected - Force Sell required'],
        details: { halt_reason: fusion.haltReason ?? null },
        validatedAt,
      };
    }

    const reasons: BlockReason[] = [];
    const warnings: string[] = [];
    const details: ValidationResult['details'] = {};
    const fusionDetails = fusion.details ?? {};

    const fundamental = fusion.fundamentalScore;
    if (fundamental != null && fundamental < t.fundamentalMin) {
      reasons.push('FUNDAMENTAL_RISK');
      details.fundamental_score = fundamental;
      warnings.push(`Fundamental score (${fundamental.toFixed(2)}) below threshold (${t.fundamentalMin.toFixed(1)})`);
    }

    const marketContext = fusion.marketContextScore;
    if (marketContext != null && marketContext < t.marketPanic) {
      reasons.push('MARKET_PANIC');
      details.market_context_score = marketContext;
      warnings.push(`Market in panic mode (score: ${marketContext.toFixed(2)})`);
    }

    if (avgTradedValue5d < t.liquidityMinKrw) {
      reasons.push('LIQUIDITY_TRAP');
      details.avg_traded_value_5d = avgTradedValue5d;
      details.min_required = t.liquidityMinKrw;
      warnings.push(
        `Low liquidity: ${(avgTradedValue5d / 1e8).toFixed(1)}억 (min: ${(t.liquidityMinKrw / 1e8).toFixed(0)}억)`,
      );
    }

    const calendarRisk = fusionDetails.calendar_risk_level ?? 'low';
    if (calendarRisk === 'critical') {
      const calendarWarning = fusionDetails.calendar_warning ?? null;
      reasons.push('CALENDAR_CRITICAL');
      details.calendar_risk = calendarRisk;
      details.calendar_warning = calendarWarning;
      warnings.push(`Critical calendar event: ${calendarWarning ?? 'None'}`);
    }

    const marketCondition = fusionDetails.market_condition ?? 'neutral';
    if (marketCondition === 'panic' || marketCondition === 'fear') {
      const fearGreed = fusionDetails.fear_greed_score ?? 50;
      reasons.push('OVERHEATED_MARKET');
      details.market_condition = marketCondition;
      details.fear_greed_score = fearGreed;
      warnings.push(`Market in ${marketCondition} mode (F&G: ${fearGreed})`);
    }

    if (dailyVolatility && dailyVolatility > t.volatilityMaxPct) {
      reasons.push('HIGH_VOLATILITY');
      details.daily_volatility = dailyVolatility;
      warnings.push(`High volatility: ${dailyVolatility.toFixed(1)}% (max: ${t.volatilityMaxPct.toFixed(1)}%)`);
    }

    const decision = determineDecision(reasons, originalSignal);
    const result: ValidationResult = {
      ticker,
      decision,
      reasons,
      originalScore,
      originalSignal,
      adjusted: adjustSignal(decision, originalScore, originalSignal),
      warnings,
      details,
      validatedAt,
    };

    if (decision === 'PASS') {
      logger.debug('최종 검증 통과', { ticker, reasons });
    } else {
      logger.info('최종 검증 차단', { ticker, decision, reasons });
    }
    return result;
  }
}
