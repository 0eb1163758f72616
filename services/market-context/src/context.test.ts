import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { fixedClock } from '@workspace/shared-utils';
import { createMarketContext } from './context.js';
import { FakeMarketDataClient } from './testing/fake-market-data.js';
import { GlobalMarketFetcher } from './global/global-market-fetcher.js';
import { DataIntegrityManager } from './integrity/data-integrity-manager.js';

describe('createMarketContext', () => {
  it('주입한 시세 클라이언트로 모든 컴포넌트를 구성', () => {
    const client = new FakeMarketDataClient();
    const clock = fixedClock(DateTime.fromISO('2025-03-14T09:00:00', { zone: 'Asia/Seoul' }));

    const ctx = createMarketContext({ client, clock });

    expect(ctx.client).toBe(client);
    expect(ctx.globalMarket).toBeInstanceOf(GlobalMarketFetcher);
    expect(ctx.integrity).toBeInstanceOf(DataIntegrityManager);
    expect(client.calls).toHaveLength(0);
  });

  it('호출마다 독립된 인스턴스를 만든다', () => {
    const client = new FakeMarketDataClient();

    const a = createMarketContext({ client });
    const b = createMarketContext({ client });

    expect(a.globalMarket).not.toBe(b.globalMarket);
    expect(a.passiveFund).not.toBe(b.passiveFund);
  });
});
