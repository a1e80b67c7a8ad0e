/**
 * LIQUIDITY SCORER
 *
 * Components (max 10):
 *   fed_trajectory  0-4   6-period change in fed funds (pp)
 *   m2_growth       0-3   M2 YoY growth (%)
 *   vix             0-3   volatility stress
 */

import type { DimensionResult, LiquidityIndicators } from '../contracts/market_risk.contracts.js';
import { BaseDimensionScorer } from './dimension.scorer.js';
import { fixed, signed, type ThresholdLadder } from './threshold_ladder.js';

const FED_TRAJECTORY_LADDER: ThresholdLadder = {
  name: 'fed_trajectory',
  cap: 4,
  bands: [
    { op: 'gt', cutoff: 2, points: 4, severity: 'CRITICAL', message: v => `Fed rapidly tightening (${signed(v)}pp in 6 periods)` },
    { op: 'gt', cutoff: 1, points: 2, severity: 'WARNING', message: v => `Fed tightening policy (${signed(v)}pp in 6 periods)` },
    { op: 'gt', cutoff: 0.5, points: 1, severity: 'WATCH', message: v => `Fed gradually tightening (${signed(v)}pp)` },
  ],
};

const M2_LADDER: ThresholdLadder = {
  name: 'm2_growth',
  cap: 3,
  bands: [
    { op: 'lt', cutoff: 0, points: 3, severity: 'CRITICAL', message: v => `M2 contracting (${fixed(v)}% YoY)` },
    { op: 'lt', cutoff: 2, points: 2, severity: 'WARNING', message: v => `M2 growth very low (${fixed(v)}% YoY)` },
    { op: 'lt', cutoff: 4, points: 1, severity: 'WATCH', message: v => `M2 growth below normal (${fixed(v)}% YoY)` },
  ],
};

const VIX_LADDER: ThresholdLadder = {
  name: 'vix',
  cap: 3,
  bands: [
    { op: 'gt', cutoff: 40, points: 3, severity: 'CRITICAL', message: v => `VIX at panic levels (${fixed(v)})` },
    { op: 'gt', cutoff: 30, points: 2, severity: 'WARNING', message: v => `VIX elevated, market stress (${fixed(v)})` },
    { op: 'gt', cutoff: 20, points: 1, severity: 'WATCH', message: v => `VIX moderately elevated (${fixed(v)})` },
    { op: 'lt', cutoff: 12, points: 0, severity: 'NOTE', message: v => `VIX very low, potential complacency (${fixed(v)})` },
  ],
};

export class LiquidityScorer extends BaseDimensionScorer<'liquidity'> {
  readonly dimension = 'liquidity' as const;
  readonly componentCaps = {
    fed_trajectory: 4,
    m2_growth: 3,
    vix: 3,
  };

  calculateScore(indicators: LiquidityIndicators | undefined): DimensionResult {
    const i = indicators ?? {};

    return this.buildResult({
      fed_trajectory: this.ladderComponent(FED_TRAJECTORY_LADDER, i.fed_funds_velocity_6m),
      m2_growth: this.ladderComponent(M2_LADDER, i.m2_velocity_yoy),
      vix: this.ladderComponent(VIX_LADDER, i.vix),
    });
  }
}
