import { DateTime } from 'luxon';
import { createLogger, createMarketClock, daysBetween, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import { loadSectorEvents, type SectorEventTemplate } from '../config/calendar-data.js';
import type { ImpactLevel, SectorAnalysisResult, SectorEvent, SectorType } from '../types.js';

const logger = createLogger('sector-event-monitor');

const UPCOMING_WINDOW_DAYS = 60;
const RECENT_WINDOW_DAYS = 14;
const SCORING_WINDOW_DAYS = 30;
const BUY_WINDOW_DAYS = 14;
const HOT_SECTOR_SCORE = 50;

function impactWeight(level: ImpactLevel): number {
  switch (level) {
    case 'high':
      return 3;
    case 'medium':
      return 2;
    case 'low':
      return 1;
    default: {
      const _exhaustive: never = level;
      return _exhaustive;
    }
  }
}

/** MM-DD 템플릿을 해당 연도 이벤트로 변환 */
export function materializeSectorEvents(templates: SectorEventTemplate[], year: number): SectorEvent[] {
  return templates.map((t) =>
    Object.freeze({
      name: t.name.replace('{year}', String(year)),
      eventType: t.eventType,
      sectors: Object.freeze([...t.sectors]),
      startDate: `${year}-${t.start}`,
      endDate: `${year}-${t.end}`,
      location: t.location,
      impactLevel: t.impactLevel,
      relatedStocks: Object.freeze([...t.relatedStocks]),
      description: t.description,
      tradingStrategy: t.tradingStrategy,
    }),
  );
}

export type SectorEventMonitorOptions = {
  clock?: Clock;
  templates?: SectorEventTemplate[];
};

/**
 * 섹터 이벤트 모니터
 * - 글로벌 산업 행사(전시회, 컨퍼런스, 시즌) 기준 Hot 섹터와 관련주 선별
 */
export class SectorEventMonitor {
  private readonly clock: Clock;
  private readonly templates: SectorEventTemplate[];

  constructor(opts: SectorEventMonitorOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.templates = opts.templates ?? loadSectorEvents();
  }

  analyze(targetSector?: SectorType): SectorAnalysisResult {
    logger.debug('섹터 이벤트 분석', { targetSector: targetSector ?? 'all' });

    const today = this.clock();
    let events = this.eventsFor(today.year);
    if (targetSector) {
      events = events.filter((e) => e.sectors.includes(targetSector));
    }

    const upcoming: Array<{ event: SectorEvent; daysUntil: number }> = [];
    const activeEvents: SectorEvent[] = [];
    const recentEvents: SectorEvent[] = [];

    for (const event of events) {
      const daysUntil = this.daysFromToday(event.startDate, today);
      const daysSinceEnd = -this.daysFromToday(event.endDate, today);

      if (daysUntil > 0) {
        if (daysUntil <= UPCOMING_WINDOW_DAYS) upcoming.push({ event, daysUntil });
      } else if (daysSinceEnd <= 0) {
        activeEvents.push(event);
      } else if (daysSinceEnd <= RECENT_WINDOW_DAYS) {
        recentEvents.push(event);
      }
    }

    upcoming.sort((a, b) => a.event.startDate.localeCompare(b.event.startDate));

    const sectorScores: Partial<Record<SectorType, number>> = {};
    const hotSectors: SectorType[] = [];
    for (const [sector, score] of this.scoreSectors(upcoming, activeEvents)) {
      sectorScores[sector] = score;
      if (score >= HOT_SECTOR_SCORE) hotSectors.push(sector);
    }

    return {
      upcomingEvents: upcoming.map((u) => u.event),
      activeEvents,
      recentEvents,
      hotSectors,
      sectorScores,
      buyCandidates: this.buyCandidates(upcoming, activeEvents),
      analyzedAt: toIsoString(today),
    };
  }

  getEventsForStock(stockCode: string): SectorEvent[] {
    return this.eventsFor(this.clock().year).filter((e) => e.relatedStocks.includes(stockCode));
  }

  private scoreSectors(
    upcoming: Array<{ event: SectorEvent; daysUntil: number }>,
    active: SectorEvent[],
  ): Map<SectorType, number> {
    const raw = new Map<SectorType, number>();
    const add = (sector: SectorType, value: number) => raw.set(sector, (raw.get(sector) ?? 0) + value);

    // 진행 중 이벤트 ×2
    for (const event of active) {
      for (const sector of event.sectors) add(sector, impactWeight(event.impactLevel) * 2);
    }

    // 30일 내 이벤트는 가까울수록 가중
    for (const { event, daysUntil } of upcoming) {
      if (daysUntil > SCORING_WINDOW_DAYS) continue;
      const timeWeight = 1 + (SCORING_WINDOW_DAYS - daysUntil) / SCORING_WINDOW_DAYS;
      for (const sector of event.sectors) add(sector, impactWeight(event.impactLevel) * timeWeight);
    }

    // 최댓값 기준 0-100 정규화 (소수 1자리)
    const max = Math.max(0, ...raw.values());
    const scores = new Map<SectorType, number>();
    for (const [sector, value] of raw) {
      scores.set(sector, max > 0 ? Math.round((value / max) * 1000) / 10 : value);
    }
    return scores;
  }

  private buyCandidates(
    upcoming: Array<{ event: SectorEvent; daysUntil: number }>,
    active: SectorEvent[],
  ): string[] {
    const codes = new Set<string>();

    for (const event of active) {
      if (event.impactLevel === 'high' || event.impactLevel === 'medium') {
        event.relatedStocks.forEach((c) => codes.add(c));
      }
    }

    for (const { event, daysUntil } of upcoming) {
      if (daysUntil <= BUY_WINDOW_DAYS && event.impactLevel === 'high') {
        event.relatedStocks.forEach((c) => codes.add(c));
      }
    }

    return [...codes].sort();
  }

  private eventsFor(year: number): SectorEvent[] {
    return materializeSectorEvents(this.templates, year);
  }

  private daysFromToday(isoDate: string, today: DateTime): number {
    return daysBetween(today, DateTime.fromISO(isoDate, { zone: today.zone }));
  }
}
