import { describe, it, expect } from 'vitest';
import { calculateRSI, classifyRSI } from '../../indicators/rsi.js';

describe('calculateRSI', () => {
  it('계속 상승하면 100을 반환해야 함', () => {
    const closes = Array.from({ length: 15 }, (_, i) => 100 + i);

    const result = calculateRSI(closes, 14);

    expect(result.value).toBe(100);
    expect(result.signal).toBe('overbought');
  });

  it('계속 하락하면 0을 반환해야 함', () => {
    const closes = Array.from({ length: 15 }, (_, i) => 200 - i * 2);

    const result = calculateRSI(closes, 14);

    expect(result.value).toBe(0);
    expect(result.signal).toBe('oversold');
  });

  it('상승폭 합이 하락폭 합의 2배면 66.67이어야 함', () => {
    // +2, -1 반복 → 상승 14, 하락 7
    const closes = [100, 102, 101, 103, 102, 104, 103, 105, 104, 106, 105, 107, 106, 108, 107];

    const result = calculateRSI(closes, 14);

    expect(result.value).toBe(66.67);
    expect(result.signal).toBe('neutral');
  });

  it('마지막 period개의 변화만 사용해야 함', () => {
    // 앞쪽의 급락은 창 밖으로 밀려난다
    const closes = [500, 100, ...Array.from({ length: 14 }, (_, i) => 101 + i)];

    expect(calculateRSI(closes, 14).value).toBe(100);
  });

  it('변화가 없으면 50을 반환해야 함', () => {
    const closes = Array.from({ length: 15 }, () => 100);

    expect(calculateRSI(closes, 14).value).toBe(50);
  });

  it('종가 수가 부족하면 에러를 던져야 함', () => {
    expect(() => calculateRSI([100, 101], 14)).toThrow('RSI 계산에 최소 15개의 종가가 필요');
  });
});

describe('classifyRSI', () => {
  it('경계값은 neutral이어야 함', () => {
    expect(classifyRSI(30)).toBe('neutral');
    expect(classifyRSI(70)).toBe('neutral');
    expect(classifyRSI(29.99)).toBe('oversold');
    expect(classifyRSI(70.01)).toBe('overbought');
  });
});
