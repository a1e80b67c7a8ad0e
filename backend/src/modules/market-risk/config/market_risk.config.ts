/**
 * MARKET RISK ENGINE CONFIG
 *
 * Defaults, env mapping and validation. Validation runs once, when the
 * aggregator is constructed or the app boots, never per assessment.
 */

import { z } from 'zod';
import { ConfigError } from '../../../common/errors.js';
import type { Env } from '../../../config/env.js';
import { DIMENSIONS, type RiskEngineConfig } from '../contracts/market_risk.contracts.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_RISK_CONFIG: RiskEngineConfig = {
  weights: {
    recession: 0.30,
    credit: 0.25,
    valuation: 0.20,
    liquidity: 0.15,
    positioning: 0.10,
  },
  tiers: {
    yellowThreshold: 6.5,
    redThreshold: 8.0,
  },
  alerts: {
    rapidChangeThreshold: 1.0,
    rapidChangePeriods: 4,
    extremeDimensionThreshold: 8.0,
    extremeDimensionCount: 2,
  },
};

const WEIGHT_SUM_TOLERANCE = 0.01;

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const weight = z.number().finite().min(0);

const RiskEngineConfigSchema = z
  .object({
    weights: z.object({
      recession: weight,
      credit: weight,
      valuation: weight,
      liquidity: weight,
      positioning: weight,
    }).strict(),
    tiers: z.object({
      yellowThreshold: z.number().finite().min(0).max(10),
      redThreshold: z.number().finite().min(0).max(10),
    }),
    alerts: z.object({
      rapidChangeThreshold: z.number().finite().positive(),
      rapidChangePeriods: z.number().int().positive(),
      extremeDimensionThreshold: z.number().finite().min(0).max(10),
      extremeDimensionCount: z.number().int().positive().max(DIMENSIONS.length),
    }),
  })
  .superRefine((cfg, ctx) => {
    const sum = DIMENSIONS.reduce((acc, d) => acc + cfg.weights[d], 0);
    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights'],
        message: `Dimension weights must sum to 1.0 (±${WEIGHT_SUM_TOLERANCE}), got ${sum.toFixed(3)}`,
      });
    }
    if (cfg.tiers.redThreshold <= cfg.tiers.yellowThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tiers', 'redThreshold'],
        message: `redThreshold (${cfg.tiers.redThreshold}) must be greater than yellowThreshold (${cfg.tiers.yellowThreshold})`,
      });
    }
  });

// ═══════════════════════════════════════════════════════════════
// API
// ═══════════════════════════════════════════════════════════════

/**
 * Returns a validated copy; throws ConfigError listing every violation.
 */
export function validateRiskConfig(config: unknown): RiskEngineConfig {
  const parsed = RiskEngineConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigError(`Invalid risk engine config: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function buildRiskConfigFromEnv(env: Env): RiskEngineConfig {
  return validateRiskConfig({
    weights: {
      recession: env.RISK_WEIGHT_RECESSION,
      credit: env.RISK_WEIGHT_CREDIT,
      valuation: env.RISK_WEIGHT_VALUATION,
      liquidity: env.RISK_WEIGHT_LIQUIDITY,
      positioning: env.RISK_WEIGHT_POSITIONING,
    },
    tiers: {
      yellowThreshold: env.RISK_YELLOW_THRESHOLD,
      redThreshold: env.RISK_RED_THRESHOLD,
    },
    alerts: {
      rapidChangeThreshold: env.RISK_RAPID_CHANGE_THRESHOLD,
      rapidChangePeriods: env.RISK_RAPID_CHANGE_PERIODS,
      extremeDimensionThreshold: env.RISK_EXTREME_DIMENSION_THRESHOLD,
      extremeDimensionCount: env.RISK_EXTREME_DIMENSION_COUNT,
    },
  });
}
