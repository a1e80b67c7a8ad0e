/**
 * THRESHOLD LADDER
 *
 * Shared interpreter behind every dimension scorer. A ladder is an ordered
 * list of bands; the first band whose predicate holds wins.
 *
 *   { op: 'gt', cutoff: 40, points: 4, severity: 'CRITICAL', message }
 *
 * Signals are rendered as `SEVERITY: text`.
 */

import type { SignalSeverity } from '../contracts/market_risk.contracts.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type BandOp = 'gt' | 'lt';

export interface LadderBand {
  op: BandOp;
  cutoff: number;
  points: number;
  severity?: SignalSeverity;
  message?: (value: number) => string;
}

export interface ThresholdLadder {
  name: string;
  cap: number;
  bands: ReadonlyArray<LadderBand>;
}

export interface LadderHit {
  points: number;
  severity: SignalSeverity | null;
  text: string | null;      // band message without severity prefix
  signal: string | null;    // `SEVERITY: text`, only when the band has both
}

// ═══════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════

function matches(band: LadderBand, value: number): boolean {
  return band.op === 'gt' ? value > band.cutoff : value < band.cutoff;
}

/**
 * First matching band, or null when the value sits in the neutral zone.
 * Points are clamped to the ladder cap.
 */
export function evaluateLadder(ladder: ThresholdLadder, value: number): LadderHit | null {
  for (const band of ladder.bands) {
    if (!matches(band, value)) continue;

    const severity = band.severity ?? null;
    const text = band.message ? band.message(value) : null;

    return {
      points: Math.min(ladder.cap, Math.max(0, band.points)),
      severity,
      text,
      signal: severity && text ? formatSignal(severity, text) : null,
    };
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// FORMATTING HELPERS
// ═══════════════════════════════════════════════════════════════

export function formatSignal(severity: SignalSeverity, text: string): string {
  return `${severity}: ${text}`;
}

/** `+16.0`, `-0.4`, `+0.0` */
export function signed(value: number, digits = 1): string {
  const s = value.toFixed(digits);
  return value >= 0 ? `+${s}` : s;
}

export function fixed(value: number, digits = 1): string {
  return value.toFixed(digits);
}
