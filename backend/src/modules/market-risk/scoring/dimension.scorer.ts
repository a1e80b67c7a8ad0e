/**
 * DIMENSION SCORER BASE
 *
 * Components are bounded [0, cap] or null (no input). The dimension score is
 * the sum of non-null components, capped at 10 and rounded to 2dp.
 */

import type {
  Dimension,
  DimensionResult,
  DimensionScorer,
  IndicatorSet,
  IndicatorValue,
} from '../contracts/market_risk.contracts.js';
import { createConsoleLogger, type Logger } from '../../../common/logger.js';
import { evaluateLadder, type LadderHit, type ThresholdLadder } from './threshold_ladder.js';

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export const MAX_DIMENSION_SCORE = 10;

export function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

export function round1(x: number): number {
  return Math.round(x * 10) / 10;
}

/**
 * Missing key, null and non-finite numbers all read as "unavailable".
 */
export function readValue(value: IndicatorValue | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function sumComponents(components: Record<string, number | null>): number {
  let total = 0;
  for (const v of Object.values(components)) {
    if (v !== null) total += v;
  }
  return total;
}

/**
 * Build a per-dimension record in canonical order.
 */
export function mapDimensions<T>(fn: (dimension: Dimension) => T): Record<Dimension, T> {
  return {
    recession: fn('recession'),
    credit: fn('credit'),
    valuation: fn('valuation'),
    liquidity: fn('liquidity'),
    positioning: fn('positioning'),
  };
}

export function hasData(result: DimensionResult): boolean {
  return Object.values(result.components).some(v => v !== null);
}

// ═══════════════════════════════════════════════════════════════
// BASE CLASS
// ═══════════════════════════════════════════════════════════════

export interface ScorerConfig {
  logger?: Logger;
}

export interface ComponentOutcome {
  score: number | null;
  signal: string | null;
}

export const NO_DATA: ComponentOutcome = { score: null, signal: null };

export abstract class BaseDimensionScorer<D extends Dimension> implements DimensionScorer<D> {
  abstract readonly dimension: D;
  abstract readonly componentCaps: Readonly<Record<string, number>>;

  protected readonly logger: Logger;

  constructor(config?: ScorerConfig) {
    this.logger = config?.logger ?? createConsoleLogger('MarketRisk');
  }

  abstract calculateScore(indicators: IndicatorSet[D] | undefined): DimensionResult;

  /**
   * Single-input component scored on one ladder.
   */
  protected ladderComponent(ladder: ThresholdLadder, raw: IndicatorValue | undefined): ComponentOutcome {
    const value = readValue(raw);
    if (value === null) {
      this.missing(ladder.name);
      return NO_DATA;
    }
    return this.fromHit(evaluateLadder(ladder, value));
  }

  protected fromHit(hit: LadderHit | null): ComponentOutcome {
    return hit ? { score: hit.points, signal: hit.signal } : { score: 0, signal: null };
  }

  protected missing(component: string): void {
    this.logger.debug?.({ dimension: this.dimension, component }, 'Input unavailable');
  }

  /**
   * Assemble the dimension result from per-component outcomes
   * (in component order).
   */
  protected buildResult(outcomes: Record<string, ComponentOutcome>): DimensionResult {
    const components: Record<string, number | null> = {};
    const signals: string[] = [];

    for (const [name, outcome] of Object.entries(outcomes)) {
      const cap = this.componentCaps[name] ?? MAX_DIMENSION_SCORE;
      components[name] = outcome.score === null ? null : Math.min(cap, Math.max(0, outcome.score));
      if (outcome.signal) signals.push(outcome.signal);
    }

    const score = round2(Math.min(MAX_DIMENSION_SCORE, sumComponents(components)));

    this.logger.info({ dimension: this.dimension, score }, `${this.dimension} score: ${score.toFixed(2)}/10`);

    return { dimension: this.dimension, score, components, signals };
  }
}
