/**
 * RECESSION SCORER
 *
 * Components (max 10):
 *   unemployment_velocity  0-4   claims YoY velocity
 *   pmi_regime             0-3   ISM PMI, regime cross into contraction
 *   yield_curve            0-2   10Y-2Y + 10Y-3M inversions
 *   consumer_sentiment     0-1
 */

import type { DimensionResult, IndicatorValue, RecessionIndicators } from '../contracts/market_risk.contracts.js';
import { BaseDimensionScorer, NO_DATA, readValue, type ComponentOutcome } from './dimension.scorer.js';
import { evaluateLadder, fixed, formatSignal, signed, type ThresholdLadder } from './threshold_ladder.js';

// ═══════════════════════════════════════════════════════════════
// LADDERS
// ═══════════════════════════════════════════════════════════════

const UNEMPLOYMENT_LADDER: ThresholdLadder = {
  name: 'unemployment_velocity',
  cap: 4,
  bands: [
    { op: 'gt', cutoff: 15, points: 4, severity: 'CRITICAL', message: v => `Unemployment claims spiking ${signed(v)}% YoY` },
    { op: 'gt', cutoff: 8, points: 2, severity: 'WARNING', message: v => `Unemployment claims rising ${signed(v)}% YoY` },
    { op: 'gt', cutoff: 3, points: 1, severity: 'WATCH', message: v => `Unemployment claims trending up ${signed(v)}% YoY` },
  ],
};

const PMI_LADDER: ThresholdLadder = {
  name: 'pmi_regime',
  cap: 3,
  bands: [
    { op: 'lt', cutoff: 45, points: 2.5, severity: 'WARNING', message: v => `PMI in deep contraction (${fixed(v)})` },
    { op: 'lt', cutoff: 50, points: 1.5, severity: 'WATCH', message: v => `PMI in contraction zone (${fixed(v)})` },
    { op: 'lt', cutoff: 52, points: 1, severity: 'WATCH', message: v => `PMI slowing, approaching contraction (${fixed(v)})` },
  ],
};

const PMI_EXPANSION_LINE = 50;
const PMI_CROSS_POINTS = 3;

const CURVE_10Y2Y_LADDER: ThresholdLadder = {
  name: 'yield_curve_10y2y',
  cap: 1.5,
  bands: [
    { op: 'lt', cutoff: -0.5, points: 1.5, message: v => `10Y-2Y deeply inverted (${fixed(v, 2)}%)` },
    { op: 'lt', cutoff: 0, points: 0.75, message: v => `10Y-2Y inverted (${fixed(v, 2)}%)` },
  ],
};

const CURVE_10Y3M_LADDER: ThresholdLadder = {
  name: 'yield_curve_10y3m',
  cap: 1,
  bands: [
    { op: 'lt', cutoff: -0.3, points: 1, message: v => `10Y-3M deeply inverted (${fixed(v, 2)}%)` },
    { op: 'lt', cutoff: 0, points: 0.5, message: v => `10Y-3M inverted (${fixed(v, 2)}%)` },
  ],
};

const DUAL_INVERSION_BONUS = 0.5;

const SENTIMENT_LADDER: ThresholdLadder = {
  name: 'consumer_sentiment',
  cap: 1,
  bands: [
    { op: 'lt', cutoff: 70, points: 1, severity: 'WATCH', message: v => `Consumer sentiment very low (${fixed(v)})` },
    { op: 'lt', cutoff: 80, points: 0.5, severity: 'WATCH', message: v => `Consumer sentiment weak (${fixed(v)})` },
  ],
};

// ═══════════════════════════════════════════════════════════════
// SCORER
// ═══════════════════════════════════════════════════════════════

export class RecessionScorer extends BaseDimensionScorer<'recession'> {
  readonly dimension = 'recession' as const;
  readonly componentCaps = {
    unemployment_velocity: 4,
    pmi_regime: 3,
    yield_curve: 2,
    consumer_sentiment: 1,
  };

  calculateScore(indicators: RecessionIndicators | undefined): DimensionResult {
    const i = indicators ?? {};

    return this.buildResult({
      unemployment_velocity: this.ladderComponent(UNEMPLOYMENT_LADDER, i.unemployment_claims_velocity_yoy),
      pmi_regime: this.scorePmi(i.ism_pmi, i.ism_pmi_prev),
      yield_curve: this.scoreYieldCurve(i.yield_curve_10y2y, i.yield_curve_10y3m),
      consumer_sentiment: this.ladderComponent(SENTIMENT_LADDER, i.consumer_sentiment),
    });
  }

  /**
   * A cross from expansion (prev >= 50) into contraction (now < 50) outranks
   * the plain level ladder.
   */
  private scorePmi(rawCurrent: IndicatorValue | undefined, rawPrev: IndicatorValue | undefined): ComponentOutcome {
    const current = readValue(rawCurrent);
    if (current === null) {
      this.missing('pmi_regime');
      return NO_DATA;
    }

    const prev = readValue(rawPrev);
    if (prev !== null && prev >= PMI_EXPANSION_LINE && current < PMI_EXPANSION_LINE) {
      return {
        score: PMI_CROSS_POINTS,
        signal: formatSignal('CRITICAL', `PMI crossed into contraction (was ${fixed(prev)}, now ${fixed(current)})`),
      };
    }

    return this.ladderComponent(PMI_LADDER, current);
  }

  private scoreYieldCurve(raw10y2y: IndicatorValue | undefined, raw10y3m: IndicatorValue | undefined): ComponentOutcome {
    const s2y = readValue(raw10y2y);
    const s3m = readValue(raw10y3m);
    if (s2y === null && s3m === null) {
      this.missing('yield_curve');
      return NO_DATA;
    }

    const hits = [
      s2y === null ? null : evaluateLadder(CURVE_10Y2Y_LADDER, s2y),
      s3m === null ? null : evaluateLadder(CURVE_10Y3M_LADDER, s3m),
    ];

    let score = 0;
    const inversions: string[] = [];
    for (const hit of hits) {
      if (!hit) continue;
      score += hit.points;
      if (hit.text) inversions.push(hit.text);
    }

    let signal: string | null = null;
    if (s2y !== null && s3m !== null && s2y < 0 && s3m < 0) {
      score += DUAL_INVERSION_BONUS;
      signal = formatSignal('CRITICAL', `Dual yield curve inversion - ${inversions.join(', ')}`);
    } else if (inversions.length > 0) {
      signal = formatSignal('WARNING', inversions.join(', '));
    }

    return { score: Math.min(this.componentCaps.yield_curve, score), signal };
  }
}
