import { DateTime } from 'luxon';
import { createLogger, createMarketClock, daysBetween, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import { loadIndexRebalance, type IndexRebalanceData, type RebalanceWindow } from '../config/calendar-data.js';
import type { IndexType, PassiveFlowResult, RebalanceEvent } from '../types.js';

const logger = createLogger('passive-fund-tracker');

const RECENT_DAYS = 30;

export type PassiveFundTrackerOptions = {
  clock?: Clock;
  data?: IndexRebalanceData;
};

/**
 * 패시브 자금 추적기
 * - MSCI Korea(분기) / KOSPI200(반기) 정기변경 일정
 * - 편입/편출 예상 이벤트는 인스턴스 메모리에만 보관한다
 */
export class PassiveFundTracker {
  private readonly clock: Clock;
  private readonly data: IndexRebalanceData;
  private readonly members: ReadonlySet<string>;
  private readonly predictedChanges: RebalanceEvent[];

  constructor(opts: PassiveFundTrackerOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.data = opts.data ?? loadIndexRebalance();
    this.members = new Set(this.data.majorIndexMembers);
    this.predictedChanges = [...this.data.predictedChanges];
  }

  analyze(stockCode?: string): PassiveFlowResult {
    logger.debug('패시브 자금 흐름 분석', { stockCode: stockCode ?? 'all' });

    const today = this.clock();
    const events = this.predictedChanges.map((e) => ({ event: e, days: this.daysUntil(e.effectiveDate, today) }));

    const upcomingAdditions = events.filter(({ event, days }) => event.action === 'add' && days > 0).map((x) => x.event);
    const upcomingDeletions = events
      .filter(({ event, days }) => event.action === 'delete' && days > 0)
      .map((x) => x.event);
    const recentChanges = events.filter(({ days }) => days <= 0 && days >= -RECENT_DAYS).map((x) => x.event);

    const next = this.nextRebalance(today);

    return {
      upcomingAdditions,
      upcomingDeletions,
      recentChanges,
      stockInMajorIndex: stockCode ? this.isInMajorIndex(stockCode) : false,
      estimatedPassiveWeight: stockCode ? this.passiveWeight(stockCode) : 0,
      nextRebalanceDate: next?.date ?? null,
      daysUntilRebalance: next?.days ?? null,
      analyzedAt: toIsoString(today),
    };
  }

  addPredictedChange(event: RebalanceEvent): void {
    this.predictedChanges.push(Object.freeze({ ...event }));
    logger.info('편입/편출 예상 추가', { stockName: event.stockName, action: event.action });
  }

  /** 편입 예정 종목 중 시행일 daysBefore일 전부터 시행일 전날까지 */
  getBuyCandidates(daysBefore = 14): RebalanceEvent[] {
    return this.candidates('add', daysBefore);
  }

  /** 편출 예정 종목 중 시행일 daysBefore일 전부터 시행일 전날까지 */
  getSellCandidates(daysBefore = 7): RebalanceEvent[] {
    return this.candidates('delete', daysBefore);
  }

  isInMajorIndex(stockCode: string): boolean {
    return this.members.has(stockCode);
  }

  passiveWeight(stockCode: string): number {
    return this.data.passiveWeights[stockCode] ?? 0;
  }

  /**
   * 편입 시 예상 패시브 자금 (억원)
   * - 시가총액 1조원당 추정치 × 시가총액(조원). 추정치가 없는 지수는 null
   */
  estimatePassiveFlow(indexType: IndexType, marketCapTrillion = 1): number | null {
    switch (indexType) {
      case 'kospi200':
        return this.data.flowEstimatePerTrillion.kospi200 * marketCapTrillion;
      case 'msci_korea':
        return this.data.flowEstimatePerTrillion.msci_korea * marketCapTrillion;
      case 'kospi100':
      case 'krx300':
      case 'kosdaq150':
        return null;
      default: {
        const _exhaustive: never = indexType;
        return _exhaustive;
      }
    }
  }

  private candidates(action: 'add' | 'delete', daysBefore: number): RebalanceEvent[] {
    const today = this.clock();
    return this.predictedChanges.filter((e) => {
      if (e.action !== action) return false;
      const days = this.daysUntil(e.effectiveDate, today);
      return days > 0 && days <= daysBefore;
    });
  }

  private nextRebalance(today: DateTime): { date: string; days: number } | null {
    const windows: RebalanceWindow[] = [
      ...Object.values(this.data.schedules.kospi200).flat(),
      ...Object.values(this.data.schedules.msci_korea).flat(),
    ];

    let best: { date: string; days: number } | null = null;
    for (const w of windows) {
      const days = this.daysUntil(w.effective, today);
      if (days <= 0) continue;
      if (!best || days < best.days) best = { date: w.effective, days };
    }

    if (!best) logger.warn('향후 정기변경 일정 없음', { today: today.toISODate() });
    return best;
  }

  private daysUntil(isoDate: string, today: DateTime): number {
    return daysBetween(today, DateTime.fromISO(isoDate, { zone: today.zone }));
  }
}
