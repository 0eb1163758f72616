import { createLogger, createMarketClock, toErrorMessage, toIsoString, type Clock } from '@workspace/shared-utils';
import type { QuoteSnapshot } from '@workspace/market-data';
import { env } from '../config/env.js';
import { loadCouplingMap, type CouplingMapData, type SectorDefault } from '../config/calendar-data.js';
import type {
  CouplingMapping,
  CouplingResult,
  CouplingSector,
  CouplingStrength,
  GlobalMarketData,
  GlobalMarketSource,
  MarketSentiment,
} from '../types.js';

const logger = createLogger('coupling-analyzer');

const SENTIMENT_KR: Record<MarketSentiment, string> = {
  strong_bullish: '강한 상승',
  bullish: '상승',
  neutral: '중립',
  bearish: '하락',
  strong_bearish: '강한 하락',
};

/** 강도별 종목/지수 가중치 */
function blendWeights(strength: Exclude<CouplingStrength, 'none'>): { stock: number; index: number } {
  switch (strength) {
    case 'strong':
      return { stock: 0.7, index: 0.3 };
    case 'moderate':
      return { stock: 0.5, index: 0.5 };
    case 'weak':
      return { stock: 0.3, index: 0.7 };
    default: {
      const _exhaustive: never = strength;
      return _exhaustive;
    }
  }
}

/** 강도별 최대 조정폭 (strong 0.8~1.2, moderate 0.85~1.15, weak 0.9~1.1) */
export function maxAdjustment(strength: CouplingStrength): number {
  switch (strength) {
    case 'strong':
      return 0.2;
    case 'moderate':
      return 0.15;
    case 'weak':
      return 0.1;
    case 'none':
      return 0;
    default: {
      const _exhaustive: never = strength;
      return _exhaustive;
    }
  }
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((s, v) => s + v, 0) / values.length : 0;
}

/**
 * 커플링 점수 (-100 ~ +100)
 * - 연관 종목/지수 평균 등락률을 강도별 가중 평균 후 ×10
 */
export function calculateCouplingScore(
  stockChanges: number[],
  indexChanges: number[],
  strength: CouplingStrength,
): number {
  if (strength === 'none') return 0;

  const w = blendWeights(strength);
  const weighted = average(stockChanges) * w.stock + average(indexChanges) * w.index;
  const score = Math.max(-100, Math.min(100, weighted * 10));
  return Math.round(score * 100) / 100;
}

export function calculateAdjustmentFactor(score: number, strength: CouplingStrength): number {
  if (strength === 'none') return 1.0;
  const factor = 1 + (score / 100) * maxAdjustment(strength);
  return Math.round(factor * 1000) / 1000;
}

function formatScore(score: number): string {
  return `${score >= 0 ? '+' : ''}${score.toFixed(1)}`;
}

export function buildAnalysisReason(
  mapping: CouplingMapping,
  usSentiment: MarketSentiment,
  sectorSentiment: MarketSentiment,
  score: number,
): string {
  const direction = score > 0 ? '긍정적' : score < 0 ? '부정적' : '중립';
  return (
    `[${mapping.strength}] ${mapping.description} | ` +
    `미국시장 ${SENTIMENT_KR[usSentiment]}, 섹터(${mapping.sector}) ${SENTIMENT_KR[sectorSentiment]} | ` +
    `커플링 점수 ${formatScore(score)} (${direction})`
  );
}

function pick(source: Record<string, QuoteSnapshot>, symbols: readonly string[]): Record<string, QuoteSnapshot> {
  const out: Record<string, QuoteSnapshot> = {};
  for (const symbol of symbols) {
    const snap = source[symbol];
    if (snap) out[symbol] = snap;
  }
  return out;
}

function sectorSentimentOf(data: GlobalMarketData, sector: CouplingSector): MarketSentiment {
  switch (sector) {
    case 'semiconductor':
    case 'ev_battery':
    case 'tech':
    case 'energy':
      return data.sectorSentiments[sector];
    case 'financial':
    case 'default':
      return 'neutral';
    default: {
      const _exhaustive: never = sector;
      return _exhaustive;
    }
  }
}

function isCouplingSector(value: string, defaults: CouplingMapData['sectorDefaults']): value is CouplingSector {
  return Object.prototype.hasOwnProperty.call(defaults, value);
}

export type BatchItem = {
  stockCode: string;
  stockName: string;
  sector?: string;
};

export type CouplingAnalyzerOptions = {
  globalSource: GlobalMarketSource;
  clock?: Clock;
  couplingMap?: CouplingMapData;
};

/**
 * 미국-한국 종목 커플링 분석기
 * - 종목별 매핑이 없으면 섹터 기본 매핑 사용
 * - 커스텀 매핑은 인스턴스 단위로만 추가된다
 */
export class CouplingAnalyzer {
  private readonly globalSource: GlobalMarketSource;
  private readonly clock: Clock;
  private readonly mappings: Map<string, CouplingMapping>;
  private readonly sectorDefaults: CouplingMapData['sectorDefaults'];

  constructor(opts: CouplingAnalyzerOptions) {
    this.globalSource = opts.globalSource;
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);

    const data = opts.couplingMap ?? loadCouplingMap();
    this.mappings = new Map(data.mappings.map((m) => [m.stockCode, Object.freeze({ ...m })]));
    this.sectorDefaults = data.sectorDefaults;
  }

  async analyze(stockCode: string, stockName: string, sector?: string): Promise<CouplingResult> {
    const data = await this.globalSource.fetch();
    return this.analyzeWith(data, stockCode, stockName, sector);
  }

  /**
   * 여러 종목 일괄 분석
   * - 글로벌 스냅샷은 한 번만 조회해 모든 종목에 재사용
   * - 개별 실패 종목은 결과에서 제외
   */
  async analyzeBatch(items: BatchItem[]): Promise<Record<string, CouplingResult>> {
    const data = await this.globalSource.fetch();

    const results: Record<string, CouplingResult> = {};
    for (const item of items) {
      try {
        results[item.stockCode] = this.analyzeWith(data, item.stockCode, item.stockName, item.sector);
      } catch (error) {
        logger.warn('커플링 분석 실패', { stockCode: item.stockCode, error: toErrorMessage(error) });
      }
    }
    return results;
  }

  getSupportedMappings(): string[] {
    return [...this.mappings.keys()];
  }

  addCustomMapping(mapping: CouplingMapping): void {
    this.mappings.set(mapping.stockCode, Object.freeze({ ...mapping }));
    logger.info('커스텀 매핑 추가', { stockCode: mapping.stockCode, stockName: mapping.stockName });
  }

  resolveMapping(stockCode: string, stockName: string, sector?: string): CouplingMapping {
    const direct = this.mappings.get(stockCode);
    if (direct) return direct;

    const key: CouplingSector = sector && isCouplingSector(sector, this.sectorDefaults) ? sector : 'default';
    const config: SectorDefault = this.sectorDefaults[key];

    return {
      stockCode,
      stockName,
      usSymbols: config.usSymbols,
      usIndices: config.usIndices,
      sector: key,
      strength: config.strength,
      description: `${key} 섹터 기본 커플링`,
    };
  }

  private analyzeWith(data: GlobalMarketData, stockCode: string, stockName: string, sector?: string): CouplingResult {
    const mapping = this.resolveMapping(stockCode, stockName, sector);

    const relatedUsStocks = pick(data.stocks, mapping.usSymbols);
    const relatedUsIndices = pick(data.indices, mapping.usIndices);

    const sectorSentiment = sectorSentimentOf(data, mapping.sector);
    const couplingScore = calculateCouplingScore(
      Object.values(relatedUsStocks).map((s) => s.changePct),
      Object.values(relatedUsIndices).map((s) => s.changePct),
      mapping.strength,
    );

    return {
      stockCode,
      stockName,
      sector: mapping.sector,
      strength: mapping.strength,
      relatedUsStocks,
      relatedUsIndices,
      usMarketSentiment: data.overallSentiment,
      sectorSentiment,
      couplingScore,
      adjustmentFactor: calculateAdjustmentFactor(couplingScore, mapping.strength),
      analysisReason: buildAnalysisReason(mapping, data.overallSentiment, sectorSentiment, couplingScore),
      analyzedAt: toIsoString(this.clock()),
    };
  }
}
