/**
 * CONFIDENCE ESTIMATOR
 *
 * Separates "low risk" from "not enough data to tell":
 *   coverage (0-40) + completeness (0-40) + key indicators (0-20)
 */

import {
  DIMENSIONS,
  type ConfidenceLevel,
  type ConfidenceResult,
  type Dimension,
  type DimensionResult,
} from '../contracts/market_risk.contracts.js';
import { hasData, round1 } from '../scoring/dimension.scorer.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

const COVERAGE_WEIGHT = 40;
const COMPLETENESS_WEIGHT = 40;
const KEY_INDICATOR_WEIGHT = 20;

export const KEY_INDICATORS: ReadonlyArray<{ dimension: Dimension; component: string }> = [
  { dimension: 'recession', component: 'yield_curve' },
  { dimension: 'recession', component: 'unemployment_velocity' },
  { dimension: 'credit', component: 'hy_spread_combined' },
  { dimension: 'valuation', component: 'cape' },
  { dimension: 'liquidity', component: 'fed_trajectory' },
];

const HIGH_CONFIDENCE = 80;
const MEDIUM_CONFIDENCE = 60;

// ═══════════════════════════════════════════════════════════════
// ESTIMATOR
// ═══════════════════════════════════════════════════════════════

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= HIGH_CONFIDENCE) return 'HIGH';
  if (score >= MEDIUM_CONFIDENCE) return 'MEDIUM';
  return 'LOW';
}

export function estimateConfidence(results: Record<Dimension, DimensionResult>): ConfidenceResult {
  const totalDimensions = DIMENSIONS.length;
  const validDimensions = DIMENSIONS.filter(d => hasData(results[d])).length;

  let totalComponents = 0;
  let availableComponents = 0;
  for (const d of DIMENSIONS) {
    for (const value of Object.values(results[d].components)) {
      totalComponents++;
      if (value !== null) availableComponents++;
    }
  }

  const missingKeyIndicators = KEY_INDICATORS
    .filter(k => (results[k.dimension].components[k.component] ?? null) === null)
    .map(k => `${k.dimension}.${k.component}`);
  const keyIndicatorsTotal = KEY_INDICATORS.length;
  const keyIndicatorsPresent = keyIndicatorsTotal - missingKeyIndicators.length;

  const dimensionCoverage = (validDimensions / totalDimensions) * COVERAGE_WEIGHT;
  const componentCompleteness = totalComponents > 0
    ? (availableComponents / totalComponents) * COMPLETENESS_WEIGHT
    : 0;
  const keyIndicators = (keyIndicatorsPresent / keyIndicatorsTotal) * KEY_INDICATOR_WEIGHT;

  const score = round1(dimensionCoverage + componentCompleteness + keyIndicators);

  return {
    score,
    level: confidenceLevel(score),
    breakdown: {
      dimensionCoverage: round1(dimensionCoverage),
      componentCompleteness: round1(componentCompleteness),
      keyIndicators: round1(keyIndicators),
      validDimensions,
      totalDimensions,
      availableComponents,
      totalComponents,
      keyIndicatorsPresent,
      keyIndicatorsTotal,
      missingKeyIndicators,
    },
  };
}
