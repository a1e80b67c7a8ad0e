/**
 * Shared indicator fixtures for market risk tests.
 */

import { vi } from 'vitest';
import type { IndicatorSet } from '../contracts/market_risk.contracts.js';

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Every component present, every ladder in its neutral zone. */
export const NORMAL: IndicatorSet = {
  recession: {
    unemployment_claims_velocity_yoy: 2.0,
    ism_pmi: 54,
    ism_pmi_prev: 53.5,
    yield_curve_10y2y: 0.3,
    yield_curve_10y3m: 0.5,
    consumer_sentiment: 95,
  },
  credit: {
    hy_spread: 3.5,
    hy_spread_velocity_20d: 0.1,
    ig_spread_bbb: 1.2,
    ted_spread: 0.3,
    bank_lending_standards: 5,
  },
  valuation: {
    shiller_cape: 22,
    market_cap_to_gdp: 90,
    sp500_forward_pe: 16,
    shiller_trailing_earnings: 180,
    new_home_sales: 700,
    mortgage_rate_30y: 5.0,
  },
  liquidity: {
    fed_funds_rate: 2.0,
    fed_funds_velocity_6m: 0.25,
    cpi_inflation_yoy: 2.5,
    m2_velocity_yoy: 6,
    vix: 16,
  },
  positioning: {
    vix_proxy: 16,
  },
};

/** Recession score 7.5: velocity 2 + PMI cross 3 + curve 2 (capped) + sentiment 0.5 */
export const RECESSION_WARNING: IndicatorSet['recession'] = {
  unemployment_claims_velocity_yoy: 12.0,
  ism_pmi: 48.5,
  ism_pmi_prev: 51.0,
  yield_curve_10y2y: -0.6,
  yield_curve_10y3m: -0.4,
  consumer_sentiment: 72,
};

/**
 * recession 9.5, credit 10, valuation 10, liquidity 10, positioning 3
 * overall = 2.85 + 2.5 + 2 + 1.5 + 0.3 = 9.15
 */
export const STRESSED: IndicatorSet = {
  recession: {
    unemployment_claims_velocity_yoy: 16,
    ism_pmi: 44,
    ism_pmi_prev: 46,
    yield_curve_10y2y: -0.6,
    yield_curve_10y3m: -0.4,
    consumer_sentiment: 65,
  },
  credit: {
    hy_spread: 8.5,
    hy_spread_velocity_20d: 2.5,
    ig_spread_bbb: 4.5,
    ted_spread: 2.5,
    bank_lending_standards: 35,
  },
  valuation: {
    shiller_cape: 42,
    market_cap_to_gdp: 210,
    sp500_forward_pe: 26,
  },
  liquidity: {
    fed_funds_velocity_6m: 2.5,
    m2_velocity_yoy: -1,
    vix: 45,
  },
  positioning: {
    vix_proxy: 45,
  },
};

export function withoutPositioning(set: IndicatorSet): IndicatorSet {
  const { positioning: _omit, ...rest } = set;
  return rest;
}
