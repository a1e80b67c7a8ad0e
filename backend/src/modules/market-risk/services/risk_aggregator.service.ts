/**
 * RISK AGGREGATOR
 *
 * Runs the five dimension scorers and combines them:
 *   - dimensions without a single scored component are excluded
 *   - configured weights are re-normalised over the remaining dimensions
 *   - overall = Σ normalisedWeight × score, tier from two cutoffs
 *
 * Confidence and composite warnings ride along and never change score or tier.
 */

import { NoDataError } from '../../../common/errors.js';
import { createConsoleLogger, type Logger } from '../../../common/logger.js';
import { DEFAULT_RISK_CONFIG, validateRiskConfig } from '../config/market_risk.config.js';
import {
  DIMENSIONS,
  type Dimension,
  type DimensionResult,
  type IndicatorSet,
  type IndicatorWindow,
  type OverallRiskResult,
  type RiskEngineConfig,
  type RiskTier,
  type TierThresholds,
} from '../contracts/market_risk.contracts.js';
import { CreditScorer } from '../scoring/credit.scorer.js';
import { hasData, mapDimensions, round2 } from '../scoring/dimension.scorer.js';
import { LiquidityScorer } from '../scoring/liquidity.scorer.js';
import { PositioningScorer } from '../scoring/positioning.scorer.js';
import { RecessionScorer } from '../scoring/recession.scorer.js';
import { ValuationScorer } from '../scoring/valuation.scorer.js';
import { evaluateWarnings, activeWarningKeys } from '../warnings/warning_rules.js';
import { estimateConfidence } from './confidence.service.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface RiskAggregatorOptions {
  config?: RiskEngineConfig;
  logger?: Logger;
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function classifyTier(score: number, tiers: TierThresholds): RiskTier {
  if (score >= tiers.redThreshold) return 'RED';
  if (score >= tiers.yellowThreshold) return 'YELLOW';
  return 'GREEN';
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATOR
// ═══════════════════════════════════════════════════════════════

export class RiskAggregator {
  readonly config: RiskEngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly recession: RecessionScorer;
  private readonly credit: CreditScorer;
  private readonly valuation: ValuationScorer;
  private readonly liquidity: LiquidityScorer;
  private readonly positioning: PositioningScorer;

  /**
   * @throws ConfigError when weights or tier cutoffs are invalid
   */
  constructor(options?: RiskAggregatorOptions) {
    this.config = validateRiskConfig(options?.config ?? DEFAULT_RISK_CONFIG);
    this.logger = options?.logger ?? createConsoleLogger('MarketRisk');
    this.now = options?.now ?? (() => new Date());

    const scorerConfig = { logger: this.logger };
    this.recession = new RecessionScorer(scorerConfig);
    this.credit = new CreditScorer(scorerConfig);
    this.valuation = new ValuationScorer(scorerConfig);
    this.liquidity = new LiquidityScorer(scorerConfig);
    this.positioning = new PositioningScorer(scorerConfig);
  }

  scoreDimensions(indicators: IndicatorSet): Record<Dimension, DimensionResult> {
    return {
      recession: this.recession.calculateScore(indicators.recession),
      credit: this.credit.calculateScore(indicators.credit),
      valuation: this.valuation.calculateScore(indicators.valuation),
      liquidity: this.liquidity.calculateScore(indicators.liquidity),
      positioning: this.positioning.calculateScore(indicators.positioning),
    };
  }

  /**
   * Full assessment for one period.
   *
   * @param window trailing raw indicator sets, oldest first, last entry = current period
   * @throws NoDataError when no dimension has data
   */
  calculateOverallRisk(indicators: IndicatorSet, window?: IndicatorWindow): OverallRiskResult {
    const details = this.scoreDimensions(indicators);

    const valid = DIMENSIONS.filter(d => hasData(details[d]));
    const excluded = DIMENSIONS.filter(d => !hasData(details[d]));

    if (valid.length === 0) {
      this.logger.error({ excluded }, 'No indicator data for any dimension');
      throw new NoDataError();
    }

    const validWeightSum = valid.reduce((acc, d) => acc + this.config.weights[d], 0);
    if (validWeightSum <= 0) {
      this.logger.error({ valid }, 'Dimensions with data all carry zero weight');
      throw new NoDataError('Only zero-weighted dimensions have indicator data', { valid });
    }

    const normalizedWeights: Partial<Record<Dimension, number>> = {};
    let weighted = 0;
    for (const d of valid) {
      const w = this.config.weights[d] / validWeightSum;
      normalizedWeights[d] = w;
      weighted += w * details[d].score;
    }

    const overallScore = round2(weighted);
    const tier = classifyTier(overallScore, this.config.tiers);

    if (excluded.length > 0) {
      this.logger.warn({ excluded, normalizedWeights }, 'Dimensions excluded, weights re-normalised');
    }

    const confidence = estimateConfidence(details);
    const warnings = evaluateWarnings(indicators, window);

    this.logger.info(
      { overallScore, tier, confidence: confidence.score, activeWarnings: activeWarningKeys(warnings) },
      `Overall risk ${overallScore.toFixed(2)}/10 (${tier})`,
    );

    return {
      overallScore,
      tier,
      confidence,
      dimensionScores: mapDimensions(d => (valid.includes(d) ? details[d].score : null)),
      dimensionDetails: details,
      excludedDimensions: excluded,
      normalizedWeights,
      warnings,
      allSignals: mapDimensions(d => [...details[d].signals]),
      computedAt: this.now().toISOString(),
    };
  }
}
