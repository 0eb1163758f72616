import type { CalendarResult, CouplingResult, SentimentResult } from '@workspace/market-context';
import type { FusionDetails } from '../types.js';

export type FusionContext = {
  sentiment?: SentimentResult | null;
  calendar?: CalendarResult | null;
  coupling?: CouplingResult | null;
};

/**
 * 시장 맥락 분석 결과를 최종 검증용 details 맵으로 변환
 * - 빠진 분석의 키는 넣지 않는다 (검증기가 low / 50 / neutral 로 본다)
 */
export function buildFusionDetails({ sentiment, calendar, coupling }: FusionContext): FusionDetails {
  const details: FusionDetails = {};

  if (sentiment) {
    details.fear_greed_score = sentiment.sentimentScore;
    details.market_condition = sentiment.condition;
    details.position_multiplier = sentiment.positionMultiplier;
  }

  if (calendar) {
    details.calendar_risk_level = calendar.riskLevel;
    details.calendar_warning = calendar.warningMessage;
    details.calendar_position_adjustment = calendar.positionAdjustment;
  }

  if (coupling) {
    details.coupling_score = coupling.couplingScore;
    details.coupling_factor = coupling.adjustmentFactor;
    details.sector_sentiment = coupling.sectorSentiment;
  }

  return details;
}
