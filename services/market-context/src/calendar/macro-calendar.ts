import { DateTime } from 'luxon';
import { createLogger, createMarketClock, daysBetween, toDateKey, toIsoString, type Clock } from '@workspace/shared-utils';
import { env } from '../config/env.js';
import { loadFomcDates, type FomcDates } from '../config/calendar-data.js';
import type {
  CalendarResult,
  CalendarRiskLevel,
  EconomicEvent,
  EventCategory,
  ScheduledEvent,
} from '../types.js';

const logger = createLogger('macro-calendar');

const PAST_WEEK_DAYS = 7;
const NEAR_TERM_DAYS = 2;
const FRIDAY = 5;

/** 실적시즌 (시작월, 시작일, 종료월, 종료일, 이름) */
const EARNINGS_SEASONS = [
  { start: [1, 15], end: [2, 15], name: 'Q4 실적시즌' },
  { start: [4, 15], end: [5, 15], name: 'Q1 실적시즌' },
  { start: [7, 15], end: [8, 15], name: 'Q2 실적시즌' },
  { start: [10, 15], end: [11, 15], name: 'Q3 실적시즌' },
] as const;

function dateOf(year: number, month: number, day: number): string {
  return toDateKey(DateTime.fromObject({ year, month, day }));
}

/** 해당 월의 n번째 금요일 (1부터) */
function nthFriday(year: number, month: number, n: number): number {
  const first = DateTime.fromObject({ year, month, day: 1 });
  const offset = (FRIDAY - first.weekday + 7) % 7;
  return 1 + offset + (n - 1) * 7;
}

/**
 * 연간 경제 일정 생성
 * - FOMC는 연도별 데이터, 나머지는 규칙 기반 추정일
 */
export function buildYearlyEvents(year: number, fomcDates: FomcDates): EconomicEvent[] {
  const events: EconomicEvent[] = [];

  // ===== FOMC =====
  const fomc = fomcDates.years[String(year)];
  if (!fomc) {
    logger.warn('FOMC 일정 없음', { year, version: fomcDates.version });
  }
  for (const md of fomc ?? []) {
    events.push({
      name: 'FOMC 금리결정',
      date: `${year}-${md}`,
      category: 'fomc',
      impact: 'critical',
      country: 'US',
      description: '연준 기준금리 결정 및 경제전망 발표',
    });
  }

  for (let month = 1; month <= 12; month++) {
    // ===== CPI (둘째 주 화/수 추정) =====
    events.push({
      name: `미국 CPI (${month}월)`,
      date: dateOf(year, month, month % 2 === 0 ? 12 : 13),
      category: 'inflation',
      impact: 'high',
      country: 'US',
      description: '소비자물가지수 발표',
    });

    // ===== 고용보고서 (첫째 금요일) =====
    events.push({
      name: `미국 고용보고서 (${month}월)`,
      date: dateOf(year, month, nthFriday(year, month, 1)),
      category: 'employment',
      impact: 'high',
      country: 'US',
      description: '비농업 고용 및 실업률 발표',
    });

    // ===== 금통위 =====
    events.push({
      name: `한국 금통위 (${month}월)`,
      date: dateOf(year, month, month % 2 === 1 ? 11 : 13),
      category: 'korea_macro',
      impact: 'medium',
      country: 'KR',
      description: '한국은행 기준금리 결정',
    });
  }

  // ===== 네 마녀의 날 (분기 셋째 금요일) =====
  for (const month of [3, 6, 9, 12]) {
    events.push({
      name: `네 마녀의 날 (Q${month / 3})`,
      date: dateOf(year, month, nthFriday(year, month, 3)),
      category: 'options',
      impact: 'high',
      country: 'GLOBAL',
      description: '주가지수 선물/옵션, 개별주식 선물/옵션 동시 만기',
    });
  }

  // ===== 실적시즌 =====
  for (const season of EARNINGS_SEASONS) {
    events.push({
      name: season.name,
      date: dateOf(year, season.start[0], season.start[1]),
      category: 'earnings',
      impact: 'medium',
      country: 'US',
      description: '미국 주요 기업 실적발표 시즌',
    });
  }

  return events.map((e) => Object.freeze(e));
}

export function evaluateRisk(
  todayEvents: ScheduledEvent[],
  upcomingEvents: ScheduledEvent[],
): { level: CalendarRiskLevel; score: number } {
  let score = 0;

  for (const event of todayEvents) {
    if (event.impact === 'critical') score += 0.5;
    else if (event.impact === 'high') score += 0.3;
    else if (event.impact === 'medium') score += 0.1;
  }

  for (const event of upcomingEvents) {
    if (event.dDay > NEAR_TERM_DAYS) continue;
    if (event.impact === 'critical') score += 0.3;
    else if (event.impact === 'high') score += 0.15;
  }

  score = Math.min(1, score);

  let level: CalendarRiskLevel;
  if (score >= 0.7) level = 'critical';
  else if (score >= 0.4) level = 'high';
  else if (score >= 0.2) level = 'medium';
  else level = 'low';

  return { level, score: Math.round(score * 100) / 100 };
}

function baseAdjustment(level: CalendarRiskLevel): { adjustment: number; reduce: boolean } {
  switch (level) {
    case 'critical':
      return { adjustment: 0.5, reduce: true };
    case 'high':
      return { adjustment: 0.7, reduce: true };
    case 'medium':
      return { adjustment: 0.9, reduce: false };
    case 'low':
      return { adjustment: 1.0, reduce: false };
    default: {
      const _exhaustive: never = level;
      return _exhaustive;
    }
  }
}

export function calculateCalendarAdjustments(
  level: CalendarRiskLevel,
  todayEvents: ScheduledEvent[],
  upcomingEvents: ScheduledEvent[],
): { positionAdjustment: number; shouldReduceExposure: boolean; warningMessage: string | null } {
  let { adjustment, reduce } = baseAdjustment(level);
  let warning: string | null = null;

  // 당일 이벤트: critical이 있으면 우선, 없으면 마지막 high
  for (const event of todayEvents) {
    if (event.impact === 'critical') {
      warning = `⚠️ ${event.name} 발표 당일 - 변동성 주의`;
      break;
    }
    if (event.impact === 'high') {
      warning = `📅 ${event.name} 발표 당일`;
    }
  }

  if (!warning) {
    const tomorrowCritical = upcomingEvents.find((e) => e.dDay === 1 && e.impact === 'critical');
    if (tomorrowCritical) {
      warning = `⚠️ 내일 ${tomorrowCritical.name} - 신규 매수 자제 권고`;
      reduce = true;
      adjustment = Math.min(adjustment, 0.7);
    }
  }

  return { positionAdjustment: adjustment, shouldReduceExposure: reduce, warningMessage: warning };
}

export type MacroCalendarFetcherOptions = {
  clock?: Clock;
  fomcDates?: FomcDates;
};

/**
 * 경제 일정 추적기
 * - D-Day 기준 당일/임박 고영향 이벤트 리스크 경고
 * - 이벤트 객체는 불변이며 D-Day는 조회마다 새 뷰 객체에 붙인다
 */
export class MacroCalendarFetcher {
  private readonly clock: Clock;
  private readonly fomcDates: FomcDates;
  private readonly yearCache = new Map<number, EconomicEvent[]>();

  constructor(opts: MacroCalendarFetcherOptions = {}) {
    this.clock = opts.clock ?? createMarketClock(env.MARKET_TZ);
    this.fomcDates = opts.fomcDates ?? loadFomcDates();
  }

  analyze(daysAhead = 14): CalendarResult {
    const horizon = Math.max(0, daysAhead);
    const today = this.clock();

    logger.debug('경제 일정 분석', { daysAhead: horizon });

    const upcomingEvents: ScheduledEvent[] = [];
    const todayEvents: ScheduledEvent[] = [];
    const pastWeekEvents: ScheduledEvent[] = [];

    for (const event of this.eventsFor(today.year)) {
      const scheduled = this.withDDay(event, today);
      const d = scheduled.dDay;

      if (d === 0) todayEvents.push(scheduled);
      else if (d > 0 && d <= horizon) upcomingEvents.push(scheduled);
      else if (d >= -PAST_WEEK_DAYS && d < 0) pastWeekEvents.push(scheduled);
    }

    upcomingEvents.sort((a, b) => a.date.localeCompare(b.date));

    const risk = evaluateRisk(todayEvents, upcomingEvents);
    const adj = calculateCalendarAdjustments(risk.level, todayEvents, upcomingEvents);

    return {
      upcomingEvents,
      todayEvents,
      pastWeekEvents,
      riskLevel: risk.level,
      riskScore: risk.score,
      ...adj,
      analyzedAt: toIsoString(today),
    };
  }

  /** 오늘 이후(오늘 포함) 가장 가까운 critical 이벤트 */
  getNextCriticalEvent(): ScheduledEvent | null {
    return this.nextEvent((e) => e.impact === 'critical');
  }

  daysUntilEvent(category: EventCategory): number | null {
    return this.nextEvent((e) => e.category === category)?.dDay ?? null;
  }

  /** 실적시즌: 1/15~2/15, 4/15~5/15, 7/15~8/15, 10/15~11/15 (양끝 포함) */
  isEarningsSeason(): boolean {
    const today = this.clock();
    const md = today.month * 100 + today.day;
    return EARNINGS_SEASONS.some((s) => {
      const start = s.start[0] * 100 + s.start[1];
      const end = s.end[0] * 100 + s.end[1];
      return md >= start && md <= end;
    });
  }

  private nextEvent(predicate: (e: EconomicEvent) => boolean): ScheduledEvent | null {
    const today = this.clock();
    const candidates = this.eventsFor(today.year)
      .filter(predicate)
      .map((e) => this.withDDay(e, today))
      .filter((e) => e.dDay >= 0)
      .sort((a, b) => a.date.localeCompare(b.date));
    return candidates[0] ?? null;
  }

  private withDDay(event: EconomicEvent, today: DateTime): ScheduledEvent {
    const date = DateTime.fromISO(event.date, { zone: today.zone });
    return { ...event, dDay: daysBetween(today, date) };
  }

  private eventsFor(year: number): EconomicEvent[] {
    let events = this.yearCache.get(year);
    if (!events) {
      events = buildYearlyEvents(year, this.fomcDates);
      this.yearCache.set(year, events);
    }
    return events;
  }
}
