import { DateTime } from 'luxon';

export const MARKET_TZ_DEFAULT = 'Asia/Seoul';

/**
 * 현재 시각 공급자
 * - 컴포넌트는 DateTime.now()를 직접 호출하지 않고 Clock을 주입받는다.
 */
export type Clock = () => DateTime;

export function createMarketClock(zone = MARKET_TZ_DEFAULT): Clock {
  return () => DateTime.now().setZone(zone);
}

export function fixedClock(at: DateTime): Clock {
  return () => at;
}

export function nowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) throw new Error('현재 시각 ISO 변환 실패');
  return iso;
}

export function toIsoString(value: string | DateTime): string {
  const dt = typeof value === 'string' ? DateTime.fromISO(value, { setZone: true }) : value;

  if (!dt.isValid) throw new Error('ISO 변환 실패');

  const iso = dt.toUTC().toISO();
  if (!iso) throw new Error('ISO 변환 실패');
  return iso;
}

/** YYYY-MM-DD (해당 DateTime의 존 기준) */
export function toDateKey(dt: DateTime): string {
  const key = dt.toISODate();
  if (!key) throw new Error('날짜 변환 실패');
  return key;
}

/**
 * 달력 기준 일수 차이 (to - from)
 * - 시각은 무시하고 날짜만 비교한다.
 */
export function daysBetween(from: DateTime, to: DateTime): number {
  const a = from.startOf('day');
  const b = to.setZone(from.zone).startOf('day');
  return Math.round(b.diff(a, 'days').days);
}

/** 'HH:mm' → 자정 기준 분 */
export function parseHhmm(hhmm: string): number {
  const m = /^(\d{2}):(\d{2})$/.exec(hhmm);
  if (!m) throw new Error(`시각 형식 오류 (HH:mm): ${hhmm}`);
  return Number(m[1]) * 60 + Number(m[2]);
}

export function minutesOfDay(dt: DateTime): number {
  return dt.hour * 60 + dt.minute + dt.second / 60;
}

/** start <= dt <= end (분 단위, 양끝 포함) */
export function isWithinTime(dt: DateTime, start: string, end: string): boolean {
  const m = minutesOfDay(dt);
  return m >= parseHhmm(start) && m <= parseHhmm(end);
}
