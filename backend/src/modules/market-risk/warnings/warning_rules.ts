/**
 * COMPOSITE WARNING RULES
 *
 * Cross-indicator patterns evaluated on raw indicators, outside the additive
 * dimension scores. Informational only: they never move score or tier.
 *
 * Window-based rules read `window[len - N]`, where the last window entry is
 * the current period. Missing inputs, a short window or a non-positive base
 * value give `{ active: false }`.
 */

import type {
  DoubleInversionWarning,
  EarningsRecessionWarning,
  HousingBubbleWarning,
  InactiveWarning,
  IndicatorSet,
  IndicatorWindow,
  RealRateWarning,
  ValuationExtremeWarning,
  WarningKey,
  WarningResult,
  WarningSet,
} from '../contracts/market_risk.contracts.js';
import { readValue, round2 } from '../scoring/dimension.scorer.js';
import { fixed, signed } from '../scoring/threshold_ladder.js';

// ═══════════════════════════════════════════════════════════════
// CUTOFFS
// ═══════════════════════════════════════════════════════════════

export const WARNING_CUTOFFS = {
  valuationExtreme: { cape: 30, marketCapToGdp: 120 },
  doubleInversion: { yieldCurve: 0, hySpread: 6.0 },
  realRate: { realRate: 1.0, velocity6m: 1.0 },
  earningsRecession: { changePct: -10, lookback: 12 },
  housingBubble: { salesChangePct: -20, mortgageRate: 6.0, lookback: 6 },
} as const;

export const WARNING_KEYS: ReadonlyArray<WarningKey> = [
  'valuationExtreme',
  'doubleInversion',
  'realRate',
  'earningsRecession',
  'housingBubble',
];

function inactive(): InactiveWarning {
  return { active: false, level: null, message: null };
}

/**
 * Value `periodsAgo` periods before the current (last) window entry.
 */
function lookback<T>(
  window: IndicatorWindow | undefined,
  periodsAgo: number,
  pick: (set: IndicatorSet) => T,
): T | null {
  if (!window || window.length < periodsAgo + 1) return null;
  return pick(window[window.length - 1 - periodsAgo]);
}

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

export function checkValuationExtreme(indicators: IndicatorSet): WarningResult<ValuationExtremeWarning> {
  const cape = readValue(indicators.valuation?.shiller_cape);
  const ratio = readValue(indicators.valuation?.market_cap_to_gdp);
  if (cape === null || ratio === null) return inactive();

  const cut = WARNING_CUTOFFS.valuationExtreme;
  if (!(cape > cut.cape && ratio > cut.marketCapToGdp)) return inactive();

  return {
    active: true,
    level: 'EXTREME',
    message:
      `Extreme valuations: CAPE ${fixed(cape)} (>${cut.cape}) with Market Cap/GDP ${fixed(ratio, 0)}% (>${cut.marketCapToGdp}%). ` +
      'Comparable only to 1929, the 2000 dot-com peak and 2021.',
    cape,
    marketCapToGdp: ratio,
  };
}

export function checkDoubleInversion(indicators: IndicatorSet): WarningResult<DoubleInversionWarning> {
  const curve = readValue(indicators.recession?.yield_curve_10y2y);
  const hy = readValue(indicators.credit?.hy_spread);
  if (curve === null || hy === null) return inactive();

  const cut = WARNING_CUTOFFS.doubleInversion;
  if (!(curve < cut.yieldCurve && hy > cut.hySpread)) return inactive();

  return {
    active: true,
    level: 'SEVERE',
    message:
      `Double inversion: 10Y-2Y curve inverted (${fixed(curve, 2)}%) while HY spreads are at stress levels (${fixed(hy, 2)}%). ` +
      'Seen ahead of the 2001 and 2008 recessions.',
    yieldCurve: curve,
    hySpread: hy,
  };
}

export function checkRealRate(indicators: IndicatorSet): WarningResult<RealRateWarning> {
  const fedFunds = readValue(indicators.liquidity?.fed_funds_rate);
  const inflation = readValue(indicators.liquidity?.cpi_inflation_yoy);
  const velocity = readValue(indicators.liquidity?.fed_funds_velocity_6m);
  if (fedFunds === null || inflation === null || velocity === null) return inactive();

  const rawRealRate = fedFunds - inflation;
  const cut = WARNING_CUTOFFS.realRate;
  if (!(rawRealRate > cut.realRate && velocity > cut.velocity6m)) return inactive();

  const realRate = round2(rawRealRate);

  return {
    active: true,
    level: 'HIGH',
    message:
      `Restrictive real rates: fed funds ${fixed(fedFunds, 2)}% vs inflation ${fixed(inflation, 2)}% ` +
      `(real rate ${signed(realRate, 2)}%) after ${signed(velocity, 2)}pp of hikes in 6 periods. ` +
      'Similar tightening preceded the 1981, 2000 and 2007 downturns.',
    realRate,
    fedFunds,
    inflation,
    velocity6m: velocity,
  };
}

export function checkEarningsRecession(
  indicators: IndicatorSet,
  window?: IndicatorWindow,
): WarningResult<EarningsRecessionWarning> {
  const cut = WARNING_CUTOFFS.earningsRecession;
  const current = readValue(indicators.valuation?.shiller_trailing_earnings);
  const base = lookback(window, cut.lookback, s => readValue(s.valuation?.shiller_trailing_earnings));
  if (current === null || base === null || base <= 0) return inactive();

  const rawChange = ((current - base) / base) * 100;
  if (!(rawChange < cut.changePct)) return inactive();

  const changePct = round2(rawChange);

  return {
    active: true,
    level: 'HIGH',
    message:
      `Earnings recession: trailing earnings ${fixed(current, 2)} vs ${fixed(base, 2)} ${cut.lookback} periods ago ` +
      `(${signed(changePct)}%). Comparable declines: 2001, 2008-2009, 2020.`,
    currentEarnings: current,
    earnings12mAgo: base,
    earningsChangePct: changePct,
  };
}

export function checkHousingBubble(
  indicators: IndicatorSet,
  window?: IndicatorWindow,
): WarningResult<HousingBubbleWarning> {
  const cut = WARNING_CUTOFFS.housingBubble;
  const sales = readValue(indicators.valuation?.new_home_sales);
  const mortgage = readValue(indicators.valuation?.mortgage_rate_30y);
  const base = lookback(window, cut.lookback, s => readValue(s.valuation?.new_home_sales));
  if (sales === null || mortgage === null || base === null || base <= 0) return inactive();

  const rawChange = ((sales - base) / base) * 100;
  if (!(rawChange < cut.salesChangePct && mortgage > cut.mortgageRate)) return inactive();

  const changePct = round2(rawChange);

  return {
    active: true,
    level: 'HIGH',
    message:
      `Housing downturn: new home sales ${fixed(sales, 0)}k vs ${fixed(base, 0)}k ${cut.lookback} periods ago ` +
      `(${signed(changePct)}%) with 30Y mortgage at ${fixed(mortgage, 2)}%. Pattern of the 2006-2007 housing peak.`,
    newHomeSales: sales,
    sales6mAgo: base,
    salesChangePct: changePct,
    mortgageRate: mortgage,
  };
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export function evaluateWarnings(indicators: IndicatorSet, window?: IndicatorWindow): WarningSet {
  return {
    valuationExtreme: checkValuationExtreme(indicators),
    doubleInversion: checkDoubleInversion(indicators),
    realRate: checkRealRate(indicators),
    earningsRecession: checkEarningsRecession(indicators, window),
    housingBubble: checkHousingBubble(indicators, window),
  };
}

export function activeWarningKeys(warnings: WarningSet): WarningKey[] {
  return WARNING_KEYS.filter(k => warnings[k].active);
}
