/**
 * Environment configuration
 *
 * Loaded once from process.env (and .env via dotenv), validated with zod.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),
  MONGO_URL: z.string().min(1).optional(),

  // Dimension weights (must sum to 1.0)
  RISK_WEIGHT_RECESSION: z.coerce.number().min(0).default(0.30),
  RISK_WEIGHT_CREDIT: z.coerce.number().min(0).default(0.25),
  RISK_WEIGHT_VALUATION: z.coerce.number().min(0).default(0.20),
  RISK_WEIGHT_LIQUIDITY: z.coerce.number().min(0).default(0.15),
  RISK_WEIGHT_POSITIONING: z.coerce.number().min(0).default(0.10),

  // Tier cutoffs
  RISK_YELLOW_THRESHOLD: z.coerce.number().min(0).max(10).default(6.5),
  RISK_RED_THRESHOLD: z.coerce.number().min(0).max(10).default(8.0),

  // Alert triggers
  RISK_RAPID_CHANGE_THRESHOLD: z.coerce.number().positive().default(1.0),
  RISK_RAPID_CHANGE_PERIODS: z.coerce.number().int().positive().default(4),
  RISK_EXTREME_DIMENSION_THRESHOLD: z.coerce.number().min(0).max(10).default(8.0),
  RISK_EXTREME_DIMENSION_COUNT: z.coerce.number().int().positive().default(2),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export const env: Env = parseEnv(process.env);
