import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { daysBetween, isWithinTime, parseHhmm, toDateKey } from '../date.js';

const kst = (iso: string) => DateTime.fromISO(iso, { zone: 'Asia/Seoul' });

describe('date utils', () => {
  it('daysBetween은 시각을 무시하고 날짜 차이를 반환해야 함', () => {
    expect(daysBetween(kst('2025-03-01T23:59'), kst('2025-03-02T00:01'))).toBe(1);
    expect(daysBetween(kst('2025-03-10T09:00'), kst('2025-03-03T18:00'))).toBe(-7);
    expect(daysBetween(kst('2025-12-31T10:00'), kst('2026-01-01T10:00'))).toBe(1);
  });

  it('parseHhmm은 잘못된 형식에 에러를 던져야 함', () => {
    expect(parseHhmm('08:30')).toBe(510);
    expect(() => parseHhmm('8:30')).toThrow('시각 형식 오류');
  });

  it('isWithinTime은 양끝을 포함해야 함', () => {
    expect(isWithinTime(kst('2025-03-03T08:30'), '08:30', '09:00')).toBe(true);
    expect(isWithinTime(kst('2025-03-03T09:00'), '08:30', '09:00')).toBe(true);
    expect(isWithinTime(kst('2025-03-03T09:01'), '08:30', '09:00')).toBe(false);
  });

  it('toDateKey는 YYYY-MM-DD를 반환해야 함', () => {
    expect(toDateKey(kst('2025-07-04T12:00'))).toBe('2025-07-04');
  });
});
