/**
 * 시세 조회 실패 (HTTP 오류, 응답 스키마 불일치, 빈 데이터)
 */
export class MarketDataError extends Error {
  symbol: string;
  status: number | null;

  constructor(symbol: string, message: string, status: number | null = null) {
    super(`[market-data] ${symbol}: ${message}`);
    this.name = 'MarketDataError';
    this.symbol = symbol;
    this.status = status;
  }
}
