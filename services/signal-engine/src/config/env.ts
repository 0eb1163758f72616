import '@workspace/shared-utils/env-loader';
import { fileURLToPath } from 'node:url';
import { env as readEnv, envNumber, mustRange, MARKET_TZ_DEFAULT } from '@workspace/shared-utils';

const DEFAULT_WEIGHTS_FILE = fileURLToPath(new URL('../../data/optimized_weights.json', import.meta.url));

export const env = {
  /** ===============================
   * 시장 시간대
   * =============================== */
  MARKET_TZ: readEnv('MARKET_TZ') ?? MARKET_TZ_DEFAULT,

  /** ===============================
   * 가중치 저장 파일
   * =============================== */
  WEIGHTS_FILE: readEnv('WEIGHTS_FILE') ?? DEFAULT_WEIGHTS_FILE,

  /** ===============================
   * 최종 검증 임계값
   * =============================== */
  // 5일 평균 거래대금 하한 (원)
  LIQUIDITY_MIN_KRW: mustRange(
    'LIQUIDITY_MIN_KRW',
    envNumber('LIQUIDITY_MIN_KRW', 10_000_000_000),
    0,
    Number.MAX_SAFE_INTEGER,
  ),
  // 일간 변동성 상한 (%)
  VOLATILITY_MAX_PCT: mustRange('VOLATILITY_MAX_PCT', envNumber('VOLATILITY_MAX_PCT', 15), 0, 100),
} as const;

export type Env = typeof env;
