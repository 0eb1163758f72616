import type { QuoteSnapshot } from '@workspace/market-data';
import type { RsiSignal } from '@workspace/trading-utils';

/** ===== 글로벌 시장 ===== */

export type MarketSentiment = 'strong_bullish' | 'bullish' | 'neutral' | 'bearish' | 'strong_bearish';

export const GLOBAL_SECTORS = ['semiconductor', 'ev_battery', 'tech', 'energy'] as const;
export type GlobalSector = (typeof GLOBAL_SECTORS)[number];

export type MarketSession = 'pre_market' | 'regular' | 'after_hours' | 'closed';

export type GlobalMarketData = {
  indices: Record<string, QuoteSnapshot>;
  stocks: Record<string, QuoteSnapshot>;
  futures: Record<string, QuoteSnapshot>;
  usdKrw: number;
  /** 원/달러 1일 변화율 (%) */
  usdKrwChange: number;
  nasdaqFutures: QuoteSnapshot | null;
  overallSentiment: MarketSentiment;
  sectorSentiments: Record<GlobalSector, MarketSentiment>;
  fetchedAt: string;
  marketSession: MarketSession;
};

/**
 * 글로벌 스냅샷 공급자
 * - 심리 측정기와 커플링 분석기는 구체 클래스 대신 이 인터페이스에 의존한다.
 */
export interface GlobalMarketSource {
  fetch(forceRefresh?: boolean): Promise<GlobalMarketData>;
}

/** ===== 시장 심리 ===== */

export type MarketCondition =
  | 'euphoria'
  | 'overheated'
  | 'bullish'
  | 'neutral'
  | 'cautious'
  | 'fear'
  | 'panic';

export type SentimentLevel = 'extreme_fear' | 'fear' | 'neutral' | 'greed' | 'extreme_greed';

export type VixLevel = 'low' | 'normal' | 'elevated' | 'high' | 'extreme';

export type CreditSignal = 'low' | 'normal' | 'high' | 'warning';

export type SentimentResult = {
  condition: MarketCondition;
  sentimentLevel: SentimentLevel;
  /** 0-100 (Fear & Greed) */
  sentimentScore: number;

  vixValue: number;
  vixLevel: VixLevel;
  marketRsi: number;
  marketRsiSignal: RsiSignal;
  /** 신용잔고율 추정치 (%) */
  creditBalanceRatio: number;
  creditSignal: CreditSignal;
  advanceDeclineRatio: number;
  /** 데이터 소스 미연결 */
  putCallRatio: number | null;

  /** 포지션 사이즈 조정 (0.3 ~ 1.1) */
  positionMultiplier: number;
  riskWarning: boolean;
  warningMessage: string | null;

  analyzedAt: string;
};

/** ===== 경제 캘린더 ===== */

export type EventImpact = 'low' | 'medium' | 'high' | 'critical';

export type EventCategory =
  | 'fomc'
  | 'inflation'
  | 'employment'
  | 'earnings'
  | 'options'
  | 'korea_macro'
  | 'other';

export type EventCountry = 'US' | 'KR' | 'GLOBAL';

export type EconomicEvent = Readonly<{
  name: string;
  /** YYYY-MM-DD */
  date: string;
  category: EventCategory;
  impact: EventImpact;
  country: EventCountry;
  description: string;
}>;

/** 조회 시점 기준 D-Day가 붙은 이벤트 (0=오늘, -1=어제, 1=내일) */
export type ScheduledEvent = EconomicEvent & { readonly dDay: number };

export type CalendarRiskLevel = 'low' | 'medium' | 'high' | 'critical';

export type CalendarResult = {
  upcomingEvents: ScheduledEvent[];
  todayEvents: ScheduledEvent[];
  pastWeekEvents: ScheduledEvent[];

  riskLevel: CalendarRiskLevel;
  /** 0.0 ~ 1.0 */
  riskScore: number;

  /** 0.5 ~ 1.0 */
  positionAdjustment: number;
  shouldReduceExposure: boolean;
  warningMessage: string | null;

  analyzedAt: string;
};

/** ===== 패시브 자금 ===== */

export type IndexType = 'msci_korea' | 'kospi200' | 'kospi100' | 'krx300' | 'kosdaq150';

export type RebalanceAction = 'add' | 'delete' | 'weight_up' | 'weight_down';

export type RebalanceEvent = Readonly<{
  indexType: IndexType;
  stockCode: string;
  stockName: string;
  action: RebalanceAction;
  /** YYYY-MM-DD */
  announcementDate: string;
  /** YYYY-MM-DD */
  effectiveDate: string;
  /** 예상 자금 유입/유출 (억원) */
  estimatedFlow: number | null;
  /** 0-1 */
  confidence: number;
  source: string;
}>;

export type PassiveFlowResult = {
  upcomingAdditions: RebalanceEvent[];
  upcomingDeletions: RebalanceEvent[];
  recentChanges: RebalanceEvent[];

  stockInMajorIndex: boolean;
  /** 예상 패시브 비중 (%) */
  estimatedPassiveWeight: number;

  nextRebalanceDate: string | null;
  daysUntilRebalance: number | null;

  analyzedAt: string;
};

/** ===== 섹터 이벤트 ===== */

export type SectorType =
  | 'tech'
  | 'semiconductor'
  | 'bio_pharma'
  | 'auto_ev'
  | 'battery'
  | 'energy'
  | 'defense'
  | 'entertainment'
  | 'finance'
  | 'retail';

export type SectorEventType =
  | 'conference'
  | 'exhibition'
  | 'earnings'
  | 'product'
  | 'regulatory'
  | 'seasonal';

export type ImpactLevel = 'low' | 'medium' | 'high';

export type SectorEvent = Readonly<{
  name: string;
  eventType: SectorEventType;
  sectors: readonly SectorType[];
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD */
  endDate: string;
  location: string;
  impactLevel: ImpactLevel;
  relatedStocks: readonly string[];
  description: string;
  tradingStrategy: string;
}>;

export type SectorAnalysisResult = {
  upcomingEvents: SectorEvent[];
  activeEvents: SectorEvent[];
  recentEvents: SectorEvent[];

  hotSectors: SectorType[];
  /** 섹터별 관심도 (0-100) */
  sectorScores: Partial<Record<SectorType, number>>;

  buyCandidates: string[];

  analyzedAt: string;
};

/** ===== 커플링 ===== */

export type CouplingStrength = 'strong' | 'moderate' | 'weak' | 'none';

export type CouplingSector = GlobalSector | 'financial' | 'default';

export type CouplingMapping = Readonly<{
  stockCode: string;
  stockName: string;
  usSymbols: readonly string[];
  usIndices: readonly string[];
  sector: CouplingSector;
  strength: CouplingStrength;
  description: string;
}>;

export type CouplingResult = {
  stockCode: string;
  stockName: string;
  sector: CouplingSector;
  strength: CouplingStrength;

  relatedUsStocks: Record<string, QuoteSnapshot>;
  relatedUsIndices: Record<string, QuoteSnapshot>;

  usMarketSentiment: MarketSentiment;
  sectorSentiment: MarketSentiment;

  /** -100 ~ +100 */
  couplingScore: number;
  adjustmentFactor: number;

  analysisReason: string;
  analyzedAt: string;
};

/** ===== 선물/데이터 무결성 ===== */

export type FuturesCode = 'NQ' | 'ES' | 'YM' | 'RTY';

export type DataFreshness = 'fresh' | 'stale' | 'outdated' | 'unavailable';

export type GlobexData = {
  symbol: FuturesCode;
  price: number;
  change: number;
  changePct: number;
  volume: number;
  timestamp: string;
  source: string;
  status: DataFreshness;
};

export type PremarketSignalLabel =
  | 'strong_gap_up'
  | 'gap_up'
  | 'flat'
  | 'gap_down'
  | 'strong_gap_down'
  | 'unknown';

export type PremarketBias = 'bullish' | 'bearish' | 'neutral';

export type PremarketSignal = {
  signal: PremarketSignalLabel;
  bias: PremarketBias;
  nqChangePct: number | null;
  weightAdjustment: number;
  recommendation: string;
  nqPrice?: number;
  timestamp?: string;
};

export type SourceHealth = {
  status: DataFreshness;
  latencyMs?: number;
  lastUpdate?: string;
};

export type DataHealthReport = {
  overallStatus: 'OK' | 'STALE';
  sources: Record<string, SourceHealth>;
  warnings: string[];
  generatedAt: string;
};
