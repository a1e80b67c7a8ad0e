/**
 * Request schemas for the market risk API.
 */

import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';

const value = z.number().finite().nullable().optional();

export const IndicatorSetSchema = z.object({
  recession: z.object({
    unemployment_claims_velocity_yoy: value,
    ism_pmi: value,
    ism_pmi_prev: value,
    yield_curve_10y2y: value,
    yield_curve_10y3m: value,
    consumer_sentiment: value,
  }).strict().optional(),
  credit: z.object({
    hy_spread: value,
    hy_spread_velocity_20d: value,
    ig_spread_bbb: value,
    ted_spread: value,
    bank_lending_standards: value,
  }).strict().optional(),
  valuation: z.object({
    shiller_cape: value,
    market_cap_to_gdp: value,
    sp500_forward_pe: value,
    shiller_trailing_earnings: value,
    new_home_sales: value,
    mortgage_rate_30y: value,
  }).strict().optional(),
  liquidity: z.object({
    fed_funds_rate: value,
    fed_funds_velocity_6m: value,
    cpi_inflation_yoy: value,
    m2_velocity_yoy: value,
    vix: value,
  }).strict().optional(),
  positioning: z.object({
    vix_proxy: value,
    sp500_net_speculative: value,
    treasury_net_speculative: value,
  }).strict().optional(),
}).strict();

export const MAX_WINDOW_LENGTH = 60;

export const AssessBodySchema = z.object({
  indicators: IndicatorSetSchema,
  window: z.array(IndicatorSetSchema).max(MAX_WINDOW_LENGTH).optional(),
});

const period = (name: string) => z.string().regex(/^\d{4}-\d{2}-\d{2}$/, `${name} must be YYYY-MM-DD`);

export const RecordBodySchema = z.object({
  asOf: period('asOf'),
  indicators: IndicatorSetSchema,
});

export const HistoryQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(500).default(52),
    start: period('start').optional(),
    end: period('end').optional(),
  })
  .refine(q => q.end === undefined || q.start !== undefined, {
    message: 'end requires start',
    path: ['end'],
  })
  .refine(q => q.start === undefined || q.end === undefined || q.start <= q.end, {
    message: 'start must not be after end',
    path: ['start'],
  });

export const AlertHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(10),
});

export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError(`Invalid request: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
