/**
 * Yahoo Chart API 클라이언트
 * - 비공식 API → 최소 검증만 수행
 * - null 캔들은 제거한다
 */

import { z } from 'zod';
import { createLogger } from '@workspace/shared-utils';
import type { PriceBar } from '@workspace/trading-utils';
import { MarketDataError } from './errors.js';
import type { ChartQuery, ChartSeries, MarketDataClient } from './types.js';

const logger = createLogger('yahoo-chart-client');

export const YAHOO_BASE_URL_DEFAULT = 'https://query1.finance.yahoo.com';

const QuoteSchema = z.object({
  open: z.array(z.number().nullable()),
  high: z.array(z.number().nullable()),
  low: z.array(z.number().nullable()),
  close: z.array(z.number().nullable()),
  volume: z.array(z.number().nullable()),
});

const ResultSchema = z.object({
  meta: z
    .object({
      chartPreviousClose: z.number().nullish(),
      previousClose: z.number().nullish(),
    })
    .passthrough()
    .optional(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(QuoteSchema),
  }),
});

const ChartSchema = z.object({
  chart: z.object({
    result: z.array(ResultSchema).nullable(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().optional(),
      })
      .nullish(),
  }),
});

export type YahooChartClientOptions = {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
};

export class YahooChartClient implements MarketDataClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: YahooChartClientOptions = {}) {
    this.baseUrl = opts.baseUrl ?? YAHOO_BASE_URL_DEFAULT;
    // 테스트에서 global.fetch를 교체할 수 있도록 호출 시점에 조회
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async getChart(symbol: string, query: ChartQuery): Promise<ChartSeries> {
    const url = new URL(`${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`);
    url.searchParams.set('interval', query.interval);
    url.searchParams.set('range', query.range);

    const res = await this.fetchImpl(url);
    if (!res.ok) {
      throw new MarketDataError(symbol, `Yahoo API failed: ${res.status}`, res.status);
    }

    const json: unknown = await res.json();
    const parsed = ChartSchema.safeParse(json);

    if (!parsed.success) {
      logger.warn('Yahoo 응답 스키마 불일치', { symbol, issues: parsed.error.issues.length });
      throw new MarketDataError(symbol, '응답 스키마 불일치');
    }

    const { result, error } = parsed.data.chart;
    const r = result?.[0];
    if (!r) {
      throw new MarketDataError(symbol, error?.description ?? '빈 응답');
    }

    const q = r.indicators.quote[0];
    const timestamps = r.timestamp ?? [];
    const bars: PriceBar[] = [];

    if (q) {
      timestamps.forEach((ts, i) => {
        const open = q.open[i];
        const high = q.high[i];
        const low = q.low[i];
        const close = q.close[i];
        if (open == null || high == null || low == null || close == null) return;

        bars.push({
          time: new Date(ts * 1000).toISOString(),
          open,
          high,
          low,
          close,
          volume: q.volume[i] ?? 0,
        });
      });
    }

    const previousClose = r.meta?.chartPreviousClose ?? r.meta?.previousClose ?? null;

    return { symbol, bars, previousClose };
  }
}
