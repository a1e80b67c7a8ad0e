/**
 * CREDIT SCORER
 *
 * Components (max 10):
 *   hy_spread_combined  0-6   max(velocity ladder, level ladder)
 *   ig_spread           0-2   BBB spread
 *   ted_spread          0-1
 *   lending_standards   0-1   SLOOS net tightening
 *
 * All spreads in percentage points. HY velocity is the pp change over
 * 20 periods.
 */

import {
  SEVERITY_RANK,
  type CreditIndicators,
  type DimensionResult,
  type IndicatorValue,
} from '../contracts/market_risk.contracts.js';
import { BaseDimensionScorer, NO_DATA, readValue, type ComponentOutcome } from './dimension.scorer.js';
import { evaluateLadder, fixed, signed, type LadderHit, type ThresholdLadder } from './threshold_ladder.js';

// ═══════════════════════════════════════════════════════════════
// LADDERS
// ═══════════════════════════════════════════════════════════════

const HY_VELOCITY_LADDER: ThresholdLadder = {
  name: 'hy_spread_velocity',
  cap: 6,
  bands: [
    { op: 'gt', cutoff: 2.0, points: 6, severity: 'CRITICAL', message: v => `HY spreads widening rapidly (${signed(v, 2)}pp over 20 periods)` },
    { op: 'gt', cutoff: 1.0, points: 3, severity: 'WARNING', message: v => `HY spreads widening (${signed(v, 2)}pp over 20 periods)` },
    { op: 'gt', cutoff: 0.4, points: 1.5, severity: 'WATCH', message: v => `HY spreads trending wider (${signed(v, 2)}pp over 20 periods)` },
  ],
};

const HY_LEVEL_LADDER: ThresholdLadder = {
  name: 'hy_spread_level',
  cap: 6,
  bands: [
    { op: 'gt', cutoff: 8.0, points: 6, severity: 'CRITICAL', message: v => `HY spreads at crisis levels (${fixed(v, 2)}%)` },
    { op: 'gt', cutoff: 6.0, points: 4, severity: 'WARNING', message: v => `HY spreads elevated (${fixed(v, 2)}%)` },
    { op: 'gt', cutoff: 4.0, points: 2, severity: 'WATCH', message: v => `HY spreads moderately wide (${fixed(v, 2)}%)` },
  ],
};

const IG_LADDER: ThresholdLadder = {
  name: 'ig_spread',
  cap: 2,
  bands: [
    { op: 'gt', cutoff: 4.0, points: 2, severity: 'CRITICAL', message: v => `IG spreads at stress levels (${fixed(v, 2)}%)` },
    { op: 'gt', cutoff: 2.5, points: 1.5, severity: 'WARNING', message: v => `IG spreads elevated (${fixed(v, 2)}%)` },
    { op: 'gt', cutoff: 1.5, points: 0.5 },
  ],
};

const TED_LADDER: ThresholdLadder = {
  name: 'ted_spread',
  cap: 1,
  bands: [
    { op: 'gt', cutoff: 2.0, points: 1, severity: 'CRITICAL', message: v => `TED spread at crisis levels (${fixed(v, 2)}%)` },
    { op: 'gt', cutoff: 1.0, points: 0.5, severity: 'WARNING', message: v => `TED spread elevated (${fixed(v, 2)}%)` },
  ],
};

const LENDING_LADDER: ThresholdLadder = {
  name: 'lending_standards',
  cap: 1,
  bands: [
    { op: 'gt', cutoff: 30, points: 1, severity: 'WARNING', message: v => `Banks severely tightening lending (${fixed(v, 0)}% net)` },
    { op: 'gt', cutoff: 15, points: 0.5, severity: 'WATCH', message: v => `Banks tightening lending standards (${fixed(v, 0)}% net)` },
  ],
};

// ═══════════════════════════════════════════════════════════════
// SCORER
// ═══════════════════════════════════════════════════════════════

function severityRank(hit: LadderHit | null): number {
  return hit?.severity ? SEVERITY_RANK[hit.severity] : -1;
}

export class CreditScorer extends BaseDimensionScorer<'credit'> {
  readonly dimension = 'credit' as const;
  readonly componentCaps = {
    hy_spread_combined: 6,
    ig_spread: 2,
    ted_spread: 1,
    lending_standards: 1,
  };

  calculateScore(indicators: CreditIndicators | undefined): DimensionResult {
    const i = indicators ?? {};

    return this.buildResult({
      hy_spread_combined: this.scoreHighYield(i.hy_spread, i.hy_spread_velocity_20d),
      ig_spread: this.ladderComponent(IG_LADDER, i.ig_spread_bbb),
      ted_spread: this.ladderComponent(TED_LADDER, i.ted_spread),
      lending_standards: this.ladderComponent(LENDING_LADDER, i.bank_lending_standards),
    });
  }

  /**
   * Either a fast widening or a high level alone can drive the full 6 points.
   * The signal follows the more severe band; velocity wins ties.
   */
  private scoreHighYield(rawLevel: IndicatorValue | undefined, rawVelocity: IndicatorValue | undefined): ComponentOutcome {
    const level = readValue(rawLevel);
    const velocity = readValue(rawVelocity);
    if (level === null && velocity === null) {
      this.missing('hy_spread_combined');
      return NO_DATA;
    }

    const velocityHit = velocity === null ? null : evaluateLadder(HY_VELOCITY_LADDER, velocity);
    const levelHit = level === null ? null : evaluateLadder(HY_LEVEL_LADDER, level);

    const score = Math.max(velocityHit?.points ?? 0, levelHit?.points ?? 0);
    const lead = severityRank(levelHit) > severityRank(velocityHit) ? levelHit : velocityHit;

    return { score, signal: lead?.signal ?? null };
  }
}
