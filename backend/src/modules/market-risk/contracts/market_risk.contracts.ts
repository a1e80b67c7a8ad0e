/**
 * MARKET RISK CONTRACTS
 *
 * Types for the five-dimension market risk engine:
 *   indicators → dimension scores → weighted overall score + tier
 *   + confidence axis + composite warning rules
 *
 * Indicator keys are stable snake_case strings shared with the indicator
 * provider. Absence is always `null` (or a missing key), never 0.
 */

// ═══════════════════════════════════════════════════════════════
// DIMENSIONS
// ═══════════════════════════════════════════════════════════════

export const DIMENSIONS = ['recession', 'credit', 'valuation', 'liquidity', 'positioning'] as const;

export type Dimension = typeof DIMENSIONS[number];

export type IndicatorValue = number | null;

// ═══════════════════════════════════════════════════════════════
// INDICATOR SET
// ═══════════════════════════════════════════════════════════════

export interface RecessionIndicators {
  unemployment_claims_velocity_yoy?: IndicatorValue;  // % YoY, 4-week avg claims
  ism_pmi?: IndicatorValue;
  ism_pmi_prev?: IndicatorValue;                      // previous period, for regime cross
  yield_curve_10y2y?: IndicatorValue;                 // pp
  yield_curve_10y3m?: IndicatorValue;                 // pp
  consumer_sentiment?: IndicatorValue;
}

export interface CreditIndicators {
  hy_spread?: IndicatorValue;                // pp
  hy_spread_velocity_20d?: IndicatorValue;   // pp change over 20 periods
  ig_spread_bbb?: IndicatorValue;            // pp
  ted_spread?: IndicatorValue;               // pp
  bank_lending_standards?: IndicatorValue;   // net % tightening
}

export interface ValuationIndicators {
  shiller_cape?: IndicatorValue;
  market_cap_to_gdp?: IndicatorValue;            // %
  sp500_forward_pe?: IndicatorValue;
  shiller_trailing_earnings?: IndicatorValue;    // trailing 12m EPS
  new_home_sales?: IndicatorValue;               // thousands, SAAR
  mortgage_rate_30y?: IndicatorValue;            // %
}

export interface LiquidityIndicators {
  fed_funds_rate?: IndicatorValue;           // %
  fed_funds_velocity_6m?: IndicatorValue;    // pp change over 6 periods
  cpi_inflation_yoy?: IndicatorValue;        // %
  m2_velocity_yoy?: IndicatorValue;          // % YoY
  vix?: IndicatorValue;
}

export interface PositioningIndicators {
  vix_proxy?: IndicatorValue;
  sp500_net_speculative?: IndicatorValue;
  treasury_net_speculative?: IndicatorValue;
}

export interface IndicatorSet {
  recession?: RecessionIndicators;
  credit?: CreditIndicators;
  valuation?: ValuationIndicators;
  liquidity?: LiquidityIndicators;
  positioning?: PositioningIndicators;
}

/**
 * One period of raw indicators in a trailing window (oldest → newest).
 * The last entry of a window is the current period.
 */
export type IndicatorWindow = ReadonlyArray<IndicatorSet>;

// ═══════════════════════════════════════════════════════════════
// SIGNALS
// ═══════════════════════════════════════════════════════════════

export type SignalSeverity = 'NOTE' | 'WATCH' | 'WARNING' | 'CRITICAL';

export const SEVERITY_RANK: Record<SignalSeverity, number> = {
  NOTE: 0,
  WATCH: 1,
  WARNING: 2,
  CRITICAL: 3,
};

// ═══════════════════════════════════════════════════════════════
// DIMENSION RESULT
// ═══════════════════════════════════════════════════════════════

export interface DimensionResult {
  dimension: Dimension;
  score: number;                                  // 0..10, 2dp
  components: Record<string, number | null>;      // null = no input data
  signals: string[];
}

export interface DimensionScorer<D extends Dimension = Dimension> {
  readonly dimension: D;
  readonly componentCaps: Readonly<Record<string, number>>;
  calculateScore(indicators: IndicatorSet[D] | undefined): DimensionResult;
}

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export type DimensionWeights = Record<Dimension, number>;

export interface TierThresholds {
  yellowThreshold: number;
  redThreshold: number;
}

export interface AlertThresholds {
  rapidChangeThreshold: number;        // points
  rapidChangePeriods: number;          // lookback in snapshots
  extremeDimensionThreshold: number;   // dimension score
  extremeDimensionCount: number;
}

export interface RiskEngineConfig {
  weights: DimensionWeights;
  tiers: TierThresholds;
  alerts: AlertThresholds;
}

// ═══════════════════════════════════════════════════════════════
// CONFIDENCE
// ═══════════════════════════════════════════════════════════════

export type ConfidenceLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface ConfidenceBreakdown {
  dimensionCoverage: number;       // 0..40
  componentCompleteness: number;   // 0..40
  keyIndicators: number;           // 0..20
  validDimensions: number;
  totalDimensions: number;
  availableComponents: number;
  totalComponents: number;
  keyIndicatorsPresent: number;
  keyIndicatorsTotal: number;
  missingKeyIndicators: string[];
}

export interface ConfidenceResult {
  score: number;   // 0..100, 1dp
  level: ConfidenceLevel;
  breakdown: ConfidenceBreakdown;
}

// ═══════════════════════════════════════════════════════════════
// WARNINGS
// ═══════════════════════════════════════════════════════════════

export type WarningLevel = 'EXTREME' | 'SEVERE' | 'HIGH';

export interface InactiveWarning {
  active: false;
  level: null;
  message: null;
}

export interface ValuationExtremeWarning {
  active: true;
  level: 'EXTREME';
  message: string;
  cape: number;
  marketCapToGdp: number;
}

export interface DoubleInversionWarning {
  active: true;
  level: 'SEVERE';
  message: string;
  yieldCurve: number;
  hySpread: number;
}

export interface RealRateWarning {
  active: true;
  level: 'HIGH';
  message: string;
  realRate: number;
  fedFunds: number;
  inflation: number;
  velocity6m: number;
}

export interface EarningsRecessionWarning {
  active: true;
  level: 'HIGH';
  message: string;
  currentEarnings: number;
  earnings12mAgo: number;
  earningsChangePct: number;
}

export interface HousingBubbleWarning {
  active: true;
  level: 'HIGH';
  message: string;
  newHomeSales: number;
  sales6mAgo: number;
  salesChangePct: number;
  mortgageRate: number;
}

export type WarningResult<T> = T | InactiveWarning;

export interface WarningSet {
  valuationExtreme: WarningResult<ValuationExtremeWarning>;
  doubleInversion: WarningResult<DoubleInversionWarning>;
  realRate: WarningResult<RealRateWarning>;
  earningsRecession: WarningResult<EarningsRecessionWarning>;
  housingBubble: WarningResult<HousingBubbleWarning>;
}

export type WarningKey = keyof WarningSet;

// ═══════════════════════════════════════════════════════════════
// OVERALL RESULT
// ═══════════════════════════════════════════════════════════════

export type RiskTier = 'GREEN' | 'YELLOW' | 'RED';

export const TIER_RANK: Record<RiskTier, number> = {
  GREEN: 0,
  YELLOW: 1,
  RED: 2,
};

export interface OverallRiskResult {
  overallScore: number;                                  // 0..10, 2dp
  tier: RiskTier;
  confidence: ConfidenceResult;
  dimensionScores: Record<Dimension, number | null>;     // null = excluded
  dimensionDetails: Record<Dimension, DimensionResult>;
  excludedDimensions: Dimension[];
  normalizedWeights: Partial<Record<Dimension, number>>;
  warnings: WarningSet;
  allSignals: Record<Dimension, string[]>;
  computedAt: string;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════

/**
 * One recorded assessment. `asOf` (YYYY-MM-DD) is the period key;
 * re-recording the same period replaces it.
 */
export interface RiskSnapshot {
  asOf: string;
  overallScore: number;
  tier: RiskTier;
  dimensionScores: Record<Dimension, number | null>;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  excludedDimensions: Dimension[];
  activeWarnings: WarningKey[];
  allSignals: Record<Dimension, string[]>;
  indicators: IndicatorSet;
  alerted: boolean;        // alert decision fired when recorded
  computedAt: string;
}

export interface RiskHistoryStats {
  count: number;
  alertsCount: number;
  dateRange: { start: string; end: string } | null;
}
