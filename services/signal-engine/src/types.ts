import type { CalendarRiskLevel, MarketCondition, MarketSentiment } from '@workspace/market-context';

// =============================================================================
// Weights
// =============================================================================

export type Regime = 'BULL' | 'BEAR' | 'SIDEWAY';

export const REGIMES: readonly Regime[] = ['BULL', 'BEAR', 'SIDEWAY'];

export const WEIGHT_CATEGORIES = [
  'technical',
  'disclosure',
  'supply',
  'fundamental',
  'market_context',
  'news_sentiment',
  'consensus',
] as const;

export type WeightCategory = (typeof WEIGHT_CATEGORIES)[number];

export type CategoryWeights = Record<WeightCategory, number>;

export type MarketVolatility = 'low' | 'normal' | 'high' | 'extreme';

/**
 * 변동성 측정값 (%)
 * - 주어지면 지수 조회를 건너뛴다
 */
export type VolatilityInput = {
  annualizedVolatility: number;
  recentRangePct: number;
};

export type WeightAdjustment = {
  regime: Regime;
  volatility: MarketVolatility;
  baseWeights: CategoryWeights;
  adjustedWeights: CategoryWeights;
  adjustmentReason: string;
  confidence: number;
  timestamp: string;
};

export type TradeSignal = 'BUY' | 'SELL' | 'HOLD';

export type PerformanceRecord = {
  timestamp: string;
  regime: Regime;
  volatility: MarketVolatility | 'unknown';
  weights: Partial<CategoryWeights>;
  signal: TradeSignal;
  actualReturn: number;
  success: boolean;
};

export type RegimeStats = {
  count: number;
  successRate: number;
  avgReturn: number;
};

export type PerformanceStats =
  | { hasData: false; message: 'No performance data' }
  | {
      hasData: true;
      totalTrades: number;
      successRate: number;
      averageReturn: number;
      regimeStats: Partial<Record<Regime, RegimeStats>>;
    };

// =============================================================================
// Strategy weight optimization (offline)
// =============================================================================

export type StrategyRegime = 'bull' | 'bear' | 'sideways';

export const STRATEGY_REGIMES: readonly StrategyRegime[] = ['bull', 'bear', 'sideways'];

export type StrategyWeights = Record<string, number>;

export type OptimizationMetric = 'sharpe_ratio' | 'profit_factor' | 'win_rate' | 'total_return';

/**
 * 가중치 조합 하나로 돌린 백테스트 결과
 */
export type BacktestRecord = {
  weights: StrategyWeights;
  sharpeRatio?: number;
  profitFactor?: number;
  winRate?: number;
  totalReturn?: number;
  maxDrawdown?: number;
};

export type OptimizationResult = {
  regime: StrategyRegime;
  weights: StrategyWeights;
  sharpeRatio: number;
  profitFactor: number;
  winRate: number;
  totalReturn: number;
  iterations: number;
  optimizedAt: string;
};

export type StockProfile = 'stable' | 'large_cap' | 'volatile' | 'cyclical' | 'growth';

export type TestStock = {
  ticker: string;
  name: string;
  profile: StockProfile | 'other';
};

export type BacktestSummary = {
  winRate: number;
  mdd: number;
  cagr: number;
  sharpeRatio: number;
  profitFactor: number;
  totalTrades: number;
};

export type StockTestResult = BacktestSummary & {
  ticker: string;
  name: string;
  profile: TestStock['profile'];
};

export type BacktestFn = (stock: TestStock, weights: StrategyWeights) => Promise<BacktestSummary>;

export type RobustnessResult = {
  passed: boolean;
  failReason: string | null;
  stocksTested: number;
  periodsTested: number;
  avgWinRate: number;
  avgMdd: number;
  maxMdd: number;
  avgCagr: number;
  individualResults: StockTestResult[];
  testedAt: string;
};

// =============================================================================
// Final validation
// =============================================================================

export type ValidationDecision = 'PASS' | 'BLOCK_BUY' | 'BLOCK_SELL' | 'FORCE_SELL' | 'HOLD_ONLY';

export type BlockReason =
  | 'FUNDAMENTAL_RISK'
  | 'MARKET_PANIC'
  | 'LIQUIDITY_TRAP'
  | 'DISCLOSURE_HALT'
  | 'CALENDAR_CRITICAL'
  | 'OVERHEATED_MARKET'
  | 'HIGH_VOLATILITY';

export type FusionSignal = 'strong_buy' | 'buy' | 'hold' | 'sell' | 'strong_sell';

export type AdjustedSignal = FusionSignal | 'force_sell';

/**
 * 최종 검증에 넘기는 부가 정보
 * - 없는 키는 low / 50 / neutral 로 본다
 */
export type FusionDetails = {
  calendar_risk_level?: CalendarRiskLevel;
  calendar_warning?: string | null;
  fear_greed_score?: number;
  market_condition?: MarketCondition;
  position_multiplier?: number;
  coupling_score?: number;
  coupling_factor?: number;
  sector_sentiment?: MarketSentiment;
  calendar_position_adjustment?: number;
};

export type FusionResult = {
  signal: FusionSignal;
  finalScore: number;
  tradingHalt?: boolean;
  haltReason?: string | null;
  fundamentalScore?: number | null;
  marketContextScore?: number | null;
  details?: FusionDetails;
};

export type ValidationResult = {
  ticker: string;
  decision: ValidationDecision;
  reasons: BlockReason[];
  originalScore: number;
  originalSignal: FusionSignal;
  /** PASS면 null (원래 점수/신호 유지) */
  adjusted: { score: number; signal: AdjustedSignal } | null;
  warnings: string[];
  details: Record<string, string | number | null>;
  validatedAt: string;
};

export type LiquidityGrade = 'A' | 'B' | 'C' | 'D' | 'F';

// =============================================================================
// Execution
// =============================================================================

export type OrderSide = 'BUY' | 'SELL';

export type TimeSegment =
  | 'premarket'
  | 'opening'
  | 'morning'
  | 'lunch'
  | 'afternoon'
  | 'closing'
  | 'after_hours'
  | 'closed';

export type TimedStrategy = 'volatility_breakout' | 'trend_following' | 'supply_demand';

export type ExecutionResult = {
  ticker: string;
  orderType: OrderSide;
  signalPrice: number;
  expectedPrice: number;
  slippage: number;
  slippagePct: number;
  taxFee: number;
  taxFeePct: number;
  quantity: number;
  grossAmount: number;
  netAmount: number;
  timeSegment: TimeSegment;
  weightAdjustment: number;
  simulatedAt: string;
};

export type PnLSimulation = {
  ticker: string;
  quantity: number;
  /** 슬리피지 반영 체결가 */
  buyPrice: number;
  buySlippage: number;
  buyCost: number;
  sellPrice: number;
  sellSlippage: number;
  sellCost: number;
  /** 슬리피지만 반영한 손익 (원) */
  grossProfit: number;
  totalCost: number;
  netProfit: number;
  netProfitPct: number;
  breakevenPct: number;
};

export type BreakevenEstimate = {
  price: number;
  tickSize: number;
  buySlippagePct: number;
  sellSlippagePct: number;
  buyCostPct: number;
  sellCostPct: number;
  totalBreakevenPct: number;
  note: string;
};
