import type { GlobalSector } from '../types.js';

/** 주요 지수 */
export const US_INDICES: Record<string, string> = {
  '^IXIC': '나스닥 종합',
  '^NDX': '나스닥 100',
  '^SOX': '필라델피아 반도체',
  '^GSPC': 'S&P 500',
  '^DJI': '다우 존스',
  '^VIX': 'VIX (공포지수)',
};

/** 핵심 종목 (한국 커플링용) */
export const KEY_US_STOCKS: Record<string, string> = {
  // 반도체
  NVDA: 'NVIDIA',
  MU: 'Micron',
  AMD: 'AMD',
  INTC: 'Intel',
  ASML: 'ASML',
  // 2차전지/EV
  TSLA: 'Tesla',
  RIVN: 'Rivian',
  ALB: 'Albemarle (리튬)',
  // 테크
  META: 'Meta',
  GOOGL: 'Google',
  AAPL: 'Apple',
  // 에너지/유틸리티
  FSLR: 'First Solar',
  ENPH: 'Enphase',
  NEE: 'NextEra Energy',
};

export const INDEX_FUTURES: Record<string, string> = {
  'NQ=F': '나스닥100 선물',
  'ES=F': 'S&P500 선물',
};

export const USD_KRW_SYMBOL = 'KRW=X';

/** 전체 심리 판단에 쓰는 지수 */
export const OVERALL_SENTIMENT_INDICES = ['^IXIC', '^NDX', '^GSPC'] as const;

export const SECTOR_SYMBOLS: Record<GlobalSector, readonly string[]> = {
  semiconductor: ['NVDA', 'MU', 'AMD', 'INTC', 'ASML'],
  ev_battery: ['TSLA', 'RIVN', 'ALB'],
  tech: ['META', 'GOOGL', 'AAPL'],
  energy: ['FSLR', 'ENPH', 'NEE'],
};
