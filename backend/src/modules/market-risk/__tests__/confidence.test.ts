/**
 * Confidence Estimator Tests
 */

import { describe, it, expect } from 'vitest';
import { RiskAggregator } from '../services/risk_aggregator.service.js';
import { confidenceLevel, estimateConfidence } from '../services/confidence.service.js';
import type { IndicatorSet } from '../contracts/market_risk.contracts.js';
import { createMockLogger, NORMAL, withoutPositioning } from './fixtures.js';

const aggregator = new RiskAggregator({ logger: createMockLogger() });
const confidenceFor = (set: IndicatorSet) => estimateConfidence(aggregator.scoreDimensions(set));

describe('estimateConfidence', () => {
  it('should give 100 / HIGH when every component is present', () => {
    const result = confidenceFor(NORMAL);

    expect(result.score).toBe(100);
    expect(result.level).toBe('HIGH');
    expect(result.breakdown.totalComponents).toBe(15);
    expect(result.breakdown.availableComponents).toBe(15);
    expect(result.breakdown.missingKeyIndicators).toEqual([]);
  });

  it('should drop coverage and completeness for an excluded dimension', () => {
    const result = confidenceFor(withoutPositioning(NORMAL));

    // 32 + 14/15 × 40 + 20
    expect(result.score).toBe(89.3);
    expect(result.level).toBe('HIGH');
    expect(result.breakdown.dimensionCoverage).toBe(32);
    expect(result.breakdown.componentCompleteness).toBe(37.3);
    expect(result.breakdown.keyIndicators).toBe(20);
    expect(result.breakdown.validDimensions).toBe(4);
  });

  it('should be MEDIUM with three dimensions', () => {
    const result = confidenceFor({
      recession: NORMAL.recession,
      credit: NORMAL.credit,
      valuation: NORMAL.valuation,
    });

    // 24 + 11/15 × 40 + 16
    expect(result.score).toBe(69.3);
    expect(result.level).toBe('MEDIUM');
    expect(result.breakdown.missingKeyIndicators).toEqual(['liquidity.fed_trajectory']);
  });

  it('should be LOW and list the missing key indicators with one dimension', () => {
    const result = confidenceFor({ recession: NORMAL.recession });

    // 8 + 4/15 × 40 + 8
    expect(result.score).toBe(26.7);
    expect(result.level).toBe('LOW');
    expect(result.breakdown.keyIndicatorsPresent).toBe(2);
    expect(result.breakdown.missingKeyIndicators).toEqual([
      'credit.hy_spread_combined',
      'valuation.cape',
      'liquidity.fed_trajectory',
    ]);
  });

  it('should count a missing key component inside a valid dimension', () => {
    const result = confidenceFor({
      ...NORMAL,
      valuation: { market_cap_to_gdp: 90, sp500_forward_pe: 16 },
    });

    // 40 + 14/15 × 40 + 16
    expect(result.score).toBe(93.3);
    expect(result.breakdown.missingKeyIndicators).toEqual(['valuation.cape']);
  });
});

describe('confidenceLevel', () => {
  it('should map score bands', () => {
    expect(confidenceLevel(80)).toBe('HIGH');
    expect(confidenceLevel(79.9)).toBe('MEDIUM');
    expect(confidenceLevel(60)).toBe('MEDIUM');
    expect(confidenceLevel(59.9)).toBe('LOW');
  });
});
