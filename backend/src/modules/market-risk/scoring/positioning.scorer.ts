/**
 * POSITIONING SCORER
 *
 * Single component (max 10): VIX as a sentiment proxy. Very low VIX means
 * complacent positioning; a spike above 40 scores as a possible panic washout.
 *
 * CFTC net speculative inputs are carried on the indicator set but have no
 * calibrated ladder and are not scored.
 */

import type { DimensionResult, PositioningIndicators } from '../contracts/market_risk.contracts.js';
import { BaseDimensionScorer } from './dimension.scorer.js';
import { fixed, type ThresholdLadder } from './threshold_ladder.js';

const VIX_POSITIONING_LADDER: ThresholdLadder = {
  name: 'vix_positioning',
  cap: 10,
  bands: [
    { op: 'lt', cutoff: 11, points: 10, severity: 'CRITICAL', message: v => `VIX at extreme lows, market complacency (${fixed(v)})` },
    { op: 'lt', cutoff: 13, points: 5, severity: 'WARNING', message: v => `VIX very low, complacency risk (${fixed(v)})` },
    { op: 'lt', cutoff: 15, points: 2, severity: 'WATCH', message: v => `VIX low, some complacency (${fixed(v)})` },
    { op: 'gt', cutoff: 40, points: 3, severity: 'NOTE', message: v => `VIX extreme, panic selling possible (${fixed(v)})` },
  ],
};

export class PositioningScorer extends BaseDimensionScorer<'positioning'> {
  readonly dimension = 'positioning' as const;
  readonly componentCaps = {
    vix_positioning: 10,
  };

  calculateScore(indicators: PositioningIndicators | undefined): DimensionResult {
    return this.buildResult({
      vix_positioning: this.ladderComponent(VIX_POSITIONING_LADDER, indicators?.vix_proxy),
    });
  }
}
