/**
 * VALUATION SCORER
 *
 * Components (max 10):
 *   cape               0-4   Shiller CAPE
 *   buffett_indicator  0-4   market cap / GDP (%)
 *   forward_pe         0-2   S&P 500 forward P/E
 */

import type { DimensionResult, ValuationIndicators } from '../contracts/market_risk.contracts.js';
import { BaseDimensionScorer } from './dimension.scorer.js';
import { fixed, type ThresholdLadder } from './threshold_ladder.js';

const CAPE_LADDER: ThresholdLadder = {
  name: 'cape',
  cap: 4,
  bands: [
    { op: 'gt', cutoff: 40, points: 4, severity: 'CRITICAL', message: v => `CAPE at bubble levels (${fixed(v)}, historical avg ~17)` },
    { op: 'gt', cutoff: 35, points: 3.5, severity: 'WARNING', message: v => `CAPE very elevated (${fixed(v)})` },
    { op: 'gt', cutoff: 30, points: 2.5, severity: 'WATCH', message: v => `CAPE elevated (${fixed(v)})` },
    { op: 'gt', cutoff: 25, points: 1 },
  ],
};

const BUFFETT_LADDER: ThresholdLadder = {
  name: 'buffett_indicator',
  cap: 4,
  bands: [
    { op: 'gt', cutoff: 200, points: 4, severity: 'CRITICAL', message: v => `Market Cap/GDP at extreme levels (${fixed(v, 0)}%, 'fair' = 100%)` },
    { op: 'gt', cutoff: 150, points: 3, severity: 'WARNING', message: v => `Market Cap/GDP very elevated (${fixed(v, 0)}%)` },
    { op: 'gt', cutoff: 120, points: 2, severity: 'WATCH', message: v => `Market Cap/GDP elevated (${fixed(v, 0)}%)` },
    { op: 'gt', cutoff: 100, points: 1 },
  ],
};

const FORWARD_PE_LADDER: ThresholdLadder = {
  name: 'forward_pe',
  cap: 2,
  bands: [
    { op: 'gt', cutoff: 25, points: 2, severity: 'WARNING', message: v => `Forward P/E very high (${fixed(v)}, historical avg ~18)` },
    { op: 'gt', cutoff: 22, points: 1.5, severity: 'WATCH', message: v => `Forward P/E elevated (${fixed(v)})` },
    { op: 'gt', cutoff: 18, points: 0.5 },
  ],
};

export class ValuationScorer extends BaseDimensionScorer<'valuation'> {
  readonly dimension = 'valuation' as const;
  readonly componentCaps = {
    cape: 4,
    buffett_indicator: 4,
    forward_pe: 2,
  };

  calculateScore(indicators: ValuationIndicators | undefined): DimensionResult {
    const i = indicators ?? {};

    return this.buildResult({
      cape: this.ladderComponent(CAPE_LADDER, i.shiller_cape),
      buffett_indicator: this.ladderComponent(BUFFETT_LADDER, i.market_cap_to_gdp),
      forward_pe: this.ladderComponent(FORWARD_PE_LADDER, i.sp500_forward_pe),
    });
  }
}
