/**
 * ALERT LOGIC
 *
 * Decides whether an assessment warrants an alert, given prior history
 * (newest first):
 *   1. score >= red                         → RED
 *   2. score >= yellow (+ RAPID_RISE check) → YELLOW
 *   3. N dimensions >= extreme cutoff        → MULTIPLE_EXTREMES
 *   4. otherwise no alert
 *
 * The summary adds score trends and the key evidence lines for a report.
 */

import {
  DIMENSIONS,
  type AlertThresholds,
  type Dimension,
  type RiskTier,
  type TierThresholds,
} from '../contracts/market_risk.contracts.js';
import { round2 } from '../scoring/dimension.scorer.js';
import { fixed, signed } from '../scoring/threshold_ladder.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface ScoredPeriod {
  overallScore: number;
  tier: RiskTier;
  dimensionScores: Record<Dimension, number | null>;
}

export interface AssessedPeriod extends ScoredPeriod {
  allSignals: Record<Dimension, string[]>;
}

export type AlertTrigger = 'RED_THRESHOLD' | 'YELLOW_THRESHOLD' | 'RAPID_RISE' | 'MULTIPLE_EXTREMES';

export interface AlertDecision {
  shouldAlert: boolean;
  tier: RiskTier;
  reason: string;
  triggers: AlertTrigger[];
  currentScore: number;
  recentChange?: number;             // vs `rapidChangePeriods` snapshots back
  extremeDimensions?: Dimension[];
}

export type TrendDirection = 'UP_SHARP' | 'UP' | 'STABLE' | 'DOWN' | 'DOWN_SHARP';

export interface TrendPoint {
  change: number;
  direction: TrendDirection;
}

export interface PeriodTrend extends TrendPoint {
  periods: number;
}

export interface RiskTrends {
  overall: PeriodTrend[];
  dimensions: Partial<Record<Dimension, TrendPoint>>;
}

export interface AlertSummary {
  decision: AlertDecision;
  currentScore: number;
  dimensionScores: Record<Dimension, number | null>;
  allSignals: Record<Dimension, string[]>;
  trends: RiskTrends;
  keyEvidence: string[];
}

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const TREND_PERIODS = [1, 4, 12] as const;

const MAX_CRITICAL_EVIDENCE = 5;
const MAX_WARNING_EVIDENCE = 3;
const MIN_EVIDENCE_BEFORE_WARNINGS = 3;
const HIGH_DIMENSION_SCORE = 7.0;
const MAX_EVIDENCE = 8;

// ═══════════════════════════════════════════════════════════════
// DECISION
// ═══════════════════════════════════════════════════════════════

export function evaluateAlert(
  current: ScoredPeriod,
  history: ReadonlyArray<ScoredPeriod>,
  alerts: AlertThresholds,
  tiers: TierThresholds,
): AlertDecision {
  const score = current.overallScore;
  const shown = fixed(score);

  if (score >= tiers.redThreshold) {
    return {
      shouldAlert: true,
      tier: 'RED',
      reason: `Risk score ${shown}/10 exceeds RED threshold (${fixed(tiers.redThreshold)}). Severe risk.`,
      triggers: ['RED_THRESHOLD'],
      currentScore: score,
    };
  }

  if (score >= tiers.yellowThreshold) {
    const n = alerts.rapidChangePeriods;
    const recentChange = history.length >= n ? round2(score - history[n - 1].overallScore) : undefined;

    if (recentChange !== undefined && recentChange > alerts.rapidChangeThreshold) {
      return {
        shouldAlert: true,
        tier: 'YELLOW',
        reason: `Risk score ${shown}/10 at YELLOW level and rising rapidly (${signed(recentChange)} points in ${n} periods).`,
        triggers: ['YELLOW_THRESHOLD', 'RAPID_RISE'],
        currentScore: score,
        recentChange,
      };
    }

    return {
      shouldAlert: true,
      tier: 'YELLOW',
      reason: `Risk score ${shown}/10 exceeds YELLOW threshold (${fixed(tiers.yellowThreshold)}). Elevated risk, monitor closely.`,
      triggers: ['YELLOW_THRESHOLD'],
      currentScore: score,
      recentChange,
    };
  }

  const extremeDimensions = DIMENSIONS.filter(d => {
    const s = current.dimensionScores[d];
    return s !== null && s >= alerts.extremeDimensionThreshold;
  });

  if (extremeDimensions.length >= alerts.extremeDimensionCount) {
    return {
      shouldAlert: true,
      tier: 'GREEN',
      reason: `${extremeDimensions.length} dimensions in extreme risk (${extremeDimensions.join(', ')}). Multiple risk factors aligning.`,
      triggers: ['MULTIPLE_EXTREMES'],
      currentScore: score,
      extremeDimensions,
    };
  }

  return {
    shouldAlert: false,
    tier: current.tier,
    reason: 'Risk within normal range',
    triggers: [],
    currentScore: score,
  };
}

// ═══════════════════════════════════════════════════════════════
// TRENDS
// ═══════════════════════════════════════════════════════════════

export function trendDirection(change: number): TrendDirection {
  if (change > 0.5) return 'UP_SHARP';
  if (change > 0.1) return 'UP';
  if (change < -0.5) return 'DOWN_SHARP';
  if (change < -0.1) return 'DOWN';
  return 'STABLE';
}

function trendPoint(change: number): TrendPoint {
  const rounded = round2(change);
  return { change: rounded, direction: trendDirection(rounded) };
}

export function calculateTrends(current: ScoredPeriod, history: ReadonlyArray<ScoredPeriod>): RiskTrends {
  const overall: PeriodTrend[] = [];
  for (const periods of TREND_PERIODS) {
    if (history.length < periods) continue;
    overall.push({ periods, ...trendPoint(current.overallScore - history[periods - 1].overallScore) });
  }

  const dimensions: Partial<Record<Dimension, TrendPoint>> = {};
  const previous = history[0];
  if (previous) {
    for (const d of DIMENSIONS) {
      const now = current.dimensionScores[d];
      const before = previous.dimensionScores[d];
      if (now === null || before === null) continue;
      dimensions[d] = trendPoint(now - before);
    }
  }

  return { overall, dimensions };
}

// ═══════════════════════════════════════════════════════════════
// KEY EVIDENCE
// ═══════════════════════════════════════════════════════════════

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

export function extractKeyEvidence(current: AssessedPeriod): string[] {
  const critical: string[] = [];
  const warning: string[] = [];

  for (const d of DIMENSIONS) {
    for (const signal of current.allSignals[d]) {
      const tagged = `[${d.toUpperCase()}] ${signal}`;
      if (signal.startsWith('CRITICAL:')) critical.push(tagged);
      else if (signal.startsWith('WARNING:')) warning.push(tagged);
    }
  }

  const evidence = critical.slice(0, MAX_CRITICAL_EVIDENCE);
  if (evidence.length < MIN_EVIDENCE_BEFORE_WARNINGS) {
    evidence.push(...warning.slice(0, MAX_WARNING_EVIDENCE));
  }

  const highDimensions = DIMENSIONS
    .map(d => ({ d, score: current.dimensionScores[d] }))
    .filter((x): x is { d: Dimension; score: number } => x.score !== null && x.score >= HIGH_DIMENSION_SCORE)
    .sort((a, b) => b.score - a.score);

  for (const { d, score } of highDimensions) {
    if (evidence.length >= MAX_EVIDENCE) break;
    evidence.push(`${capitalize(d)} risk: ${fixed(score)}/10`);
  }

  return evidence;
}

// ═══════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════

export function buildAlertSummary(
  current: AssessedPeriod,
  history: ReadonlyArray<ScoredPeriod>,
  alerts: AlertThresholds,
  tiers: TierThresholds,
): AlertSummary {
  return {
    decision: evaluateAlert(current, history, alerts, tiers),
    currentScore: current.overallScore,
    dimensionScores: current.dimensionScores,
    allSignals: current.allSignals,
    trends: calculateTrends(current, history),
    keyEvidence: extractKeyEvidence(current),
  };
}
