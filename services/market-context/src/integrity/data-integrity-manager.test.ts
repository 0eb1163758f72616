import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { fixedClock } from '@workspace/shared-utils';
import type { PriceBar } from '@workspace/trading-utils';
import { DataIntegrityManager, classifyFreshness, getPremarketSignal } from './data-integrity-manager.js';
import { FakeMarketDataClient } from '../testing/fake-market-data.js';
import type { GlobexData } from '../types.js';

const at = (hhmm: string) => fixedClock(DateTime.fromISO(`2025-03-14T${hhmm}:00`, { zone: 'Asia/Seoul' }));

function minuteBar(open: number, close: number, volume = 100): PriceBar {
  return { time: '2025-03-13T23:40:00.000Z', open, high: Math.max(open, close), low: Math.min(open, close), close, volume };
}

function seededClient(): FakeMarketDataClient {
  return new FakeMarketDataClient()
    .setBars('NQ=F', [minuteBar(20000, 20050), minuteBar(20050, 20300, 1234.7)], 20000)
    .setBars('ES=F', [minuteBar(5000, 4950)]);
}

function globex(changePct: number): GlobexData {
  return {
    symbol: 'NQ',
    price: 20000,
    change: 0,
    changePct,
    volume: 0,
    timestamp: '2025-03-13T23:45:00.000Z',
    source: 'yfinance',
    status: 'fresh',
  };
}

describe('DataIntegrityManager', () => {
  it('마지막 분봉과 직전 종가로 선물 스냅샷을 만들어야 함', async () => {
    const client = seededClient();
    const manager = new DataIntegrityManager({ client, clock: at('08:45') });

    const nq = await manager.getNqFutures();

    expect(nq).toEqual({
      symbol: 'NQ',
      price: 20300,
      change: 300,
      changePct: 1.5,
      volume: 1234,
      timestamp: '2025-03-13T23:45:00.000Z',
      source: 'yfinance',
      status: 'fresh',
    });
    expect(client.calls[0]).toEqual({ symbol: 'NQ=F', query: { range: '1d', interval: '1m' } });
  });

  it('직전 종가가 없으면 마지막 봉 시가를 기준으로 삼아야 함', async () => {
    const manager = new DataIntegrityManager({ client: seededClient(), clock: at('08:45') });

    const es = await manager.getEsFutures();

    expect(es).toMatchObject({ symbol: 'ES', price: 4950, change: -50, changePct: -1 });
  });

  it('TTL 내 재조회는 캐시를 쓰고 실패는 캐시하지 않아야 함', async () => {
    const client = seededClient();
    const manager = new DataIntegrityManager({ client, clock: at('08:45') });

    const first = await manager.getNqFutures();
    const second = await manager.getNqFutures();
    await manager.getFutures('YM');
    await manager.getFutures('YM');

    expect(second).toBe(first);
    expect(client.callsFor('NQ=F')).toBe(1);
    expect(client.callsFor('YM=F')).toBe(2);
  });

  it('전체 선물 조회는 실패한 선물을 제외해야 함', async () => {
    const manager = new DataIntegrityManager({ client: seededClient(), clock: at('08:45') });

    const all = await manager.getAllFutures();

    expect(Object.keys(all)).toEqual(['NQ', 'ES']);
    expect(await manager.getFutures('YM')).toBeNull();
  });

  it('NQ 데이터가 있으면 OK, 없으면 STALE과 경고', async () => {
    const healthy = await new DataIntegrityManager({ client: seededClient(), clock: at('08:45') }).checkDataHealth();
    const broken = await new DataIntegrityManager({ client: new FakeMarketDataClient(), clock: at('08:45') }).checkDataHealth();

    expect(healthy).toEqual({
      overallStatus: 'OK',
      sources: { NQ_futures: { status: 'fresh', latencyMs: 0, lastUpdate: '2025-03-13T23:45:00.000Z' } },
      warnings: [],
      generatedAt: '2025-03-13T23:45:00.000Z',
    });
    expect(broken.overallStatus).toBe('STALE');
    expect(broken.sources).toEqual({ NQ_futures: { status: 'unavailable' } });
    expect(broken.warnings).toEqual(['NQ futures data unavailable']);
  });

  it('장 시간대 판정은 양끝을 포함해야 함', () => {
    const windows = (hhmm: string) => {
      const m = new DataIntegrityManager({ client: new FakeMarketDataClient(), clock: at(hhmm) });
      return [m.isPremarketTime(), m.isMarketOpen(), m.isAfterHours()];
    };

    expect(windows('08:29')).toEqual([false, false, false]);
    expect(windows('08:30')).toEqual([true, false, false]);
    expect(windows('09:00')).toEqual([true, true, false]);
    expect(windows('15:30')).toEqual([false, true, false]);
    expect(windows('15:35')).toEqual([false, false, false]);
    expect(windows('15:40')).toEqual([false, false, true]);
    expect(windows('18:00')).toEqual([false, false, true]);
    expect(windows('18:01')).toEqual([false, false, false]);
  });
});

describe('getPremarketSignal', () => {
  it('NQ 등락률 구간별 신호와 가중치', () => {
    expect(getPremarketSignal(globex(1.5))).toMatchObject({ signal: 'strong_gap_up', bias: 'bullish', weightAdjustment: 1.2 });
    expect(getPremarketSignal(globex(0.5))).toMatchObject({ signal: 'gap_up', weightAdjustment: 1.1 });
    expect(getPremarketSignal(globex(0.49))).toMatchObject({ signal: 'flat', bias: 'neutral', weightAdjustment: 1.0 });
    expect(getPremarketSignal(globex(-0.5))).toMatchObject({ signal: 'gap_down', weightAdjustment: 0.9 });
    expect(getPremarketSignal(globex(-1.5))).toMatchObject({ signal: 'strong_gap_down', bias: 'bearish', weightAdjustment: 0.8 });
  });

  it('권고 문구와 NQ 가격을 함께 반환해야 함', () => {
    const signal = getPremarketSignal(globex(-2));

    expect(signal.recommendation).toBe('강한 갭하락 예상. 신규 매수 자제, 손절 라인 점검');
    expect(signal.nqChangePct).toBe(-2);
    expect(signal.nqPrice).toBe(20000);
    expect(signal.timestamp).toBe('2025-03-13T23:45:00.000Z');
  });

  it('선물 데이터가 없으면 unknown / 1.0', () => {
    expect(getPremarketSignal(null)).toEqual({
      signal: 'unknown',
      bias: 'neutral',
      nqChangePct: null,
      weightAdjustment: 1.0,
      recommendation: '선물 데이터 없음. 기존 전략 유지',
    });
  });
});

describe('classifyFreshness', () => {
  it('5분 이내 fresh, 1시간 이내 stale, 그 이상 outdated', () => {
    expect(classifyFreshness(300)).toBe('fresh');
    expect(classifyFreshness(301)).toBe('stale');
    expect(classifyFreshness(3600)).toBe('stale');
    expect(classifyFreshness(3601)).toBe('outdated');
  });
});
