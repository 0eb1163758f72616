import '@workspace/shared-utils/env-loader';
import { fileURLToPath } from 'node:url';
import {
  env as readEnv,
  envNumber,
  mustPositiveInt,
  MARKET_TZ_DEFAULT,
} from '@workspace/shared-utils';
import { YAHOO_BASE_URL_DEFAULT } from '@workspace/market-data';

const BUNDLED_DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

export const env = {
  /** ===============================
   * 시장 시간대
   * =============================== */
  MARKET_TZ: readEnv('MARKET_TZ') ?? MARKET_TZ_DEFAULT,

  /** ===============================
   * 시세 조회
   * =============================== */
  YAHOO_BASE_URL: readEnv('YAHOO_BASE_URL') ?? YAHOO_BASE_URL_DEFAULT,
  MARKET_DATA_CONCURRENCY: mustPositiveInt('MARKET_DATA_CONCURRENCY', envNumber('MARKET_DATA_CONCURRENCY', 4)),

  /** ===============================
   * 캐시 TTL (초)
   * =============================== */
  GLOBAL_CACHE_TTL_SEC: mustPositiveInt('GLOBAL_CACHE_TTL_SEC', envNumber('GLOBAL_CACHE_TTL_SEC', 300)),
  SENTIMENT_CACHE_TTL_SEC: mustPositiveInt('SENTIMENT_CACHE_TTL_SEC', envNumber('SENTIMENT_CACHE_TTL_SEC', 600)),
  FUTURES_CACHE_TTL_SEC: mustPositiveInt('FUTURES_CACHE_TTL_SEC', envNumber('FUTURES_CACHE_TTL_SEC', 60)),

  /** ===============================
   * 캘린더 데이터 (연도별 JSON)
   * =============================== */
  CALENDAR_DATA_DIR: readEnv('CALENDAR_DATA_DIR') ?? BUNDLED_DATA_DIR,
} as const;

export type Env = typeof env;
