/**
 * MARKET RISK SERVICE
 *
 * Orchestrates the engine around the snapshot history:
 *   assess          → pure assessment
 *   assessAndRecord → window from stored history, assess, store, alert
 *   history / range / alert history / stats / latest / alert summary reads
 */

import { NotFoundError } from '../../../common/errors.js';
import { createConsoleLogger, type Logger } from '../../../common/logger.js';
import type {
  IndicatorSet,
  IndicatorWindow,
  OverallRiskResult,
  RiskHistoryStats,
  RiskSnapshot,
} from '../contracts/market_risk.contracts.js';
import type { RiskSnapshotRepo } from '../storage/risk_snapshot.repo.js';
import { activeWarningKeys } from '../warnings/warning_rules.js';
import { buildAlertSummary, evaluateAlert, type AlertDecision, type AlertSummary } from './alert_logic.service.js';
import type { RiskAggregator } from './risk_aggregator.service.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface MarketRiskServiceDeps {
  aggregator: RiskAggregator;
  repo: RiskSnapshotRepo;
  logger?: Logger;
}

export interface RecordedAssessment {
  snapshot: RiskSnapshot;
  result: OverallRiskResult;
  alert: AlertDecision;
}

/** Enough history for the longest window rule (12 periods back) and trends. */
export const HISTORY_WINDOW = 12;

export function buildSnapshot(
  asOf: string,
  indicators: IndicatorSet,
  result: OverallRiskResult,
  alerted = false,
): RiskSnapshot {
  return {
    asOf,
    overallScore: result.overallScore,
    tier: result.tier,
    dimensionScores: result.dimensionScores,
    confidenceScore: result.confidence.score,
    confidenceLevel: result.confidence.level,
    excludedDimensions: result.excludedDimensions,
    activeWarnings: activeWarningKeys(result.warnings),
    allSignals: result.allSignals,
    indicators,
    alerted,
    computedAt: result.computedAt,
  };
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class MarketRiskService {
  private readonly aggregator: RiskAggregator;
  private readonly repo: RiskSnapshotRepo;
  private readonly logger: Logger;

  constructor(deps: MarketRiskServiceDeps) {
    this.aggregator = deps.aggregator;
    this.repo = deps.repo;
    this.logger = deps.logger ?? createConsoleLogger('MarketRisk');
  }

  get config() {
    return this.aggregator.config;
  }

  assess(indicators: IndicatorSet, window?: IndicatorWindow): OverallRiskResult {
    return this.aggregator.calculateOverallRisk(indicators, window);
  }

  /**
   * Assess one period against stored history and record it.
   * Snapshots of strictly earlier periods feed the warning window and the
   * alert decision.
   */
  async assessAndRecord(indicators: IndicatorSet, asOf: string): Promise<RecordedAssessment> {
    const prior = await this.repo.getBefore(asOf, HISTORY_WINDOW);

    const window: IndicatorSet[] = [...prior].reverse().map(s => s.indicators);
    window.push(indicators);

    const result = this.aggregator.calculateOverallRisk(indicators, window);

    const { alerts, tiers } = this.aggregator.config;
    const alert = evaluateAlert(result, prior, alerts, tiers);

    const snapshot = await this.repo.save(buildSnapshot(asOf, indicators, result, alert.shouldAlert));

    this.logger.info(
      { asOf, overallScore: result.overallScore, tier: result.tier, shouldAlert: alert.shouldAlert, triggers: alert.triggers },
      `Recorded risk snapshot ${asOf}`,
    );

    return { snapshot, result, alert };
  }

  async getHistory(limit: number): Promise<RiskSnapshot[]> {
    return this.repo.getRecent(limit);
  }

  /** Inclusive range, oldest first. */
  async getRange(start: string, end?: string): Promise<RiskSnapshot[]> {
    return this.repo.getRange(start, end);
  }

  async getAlertHistory(limit: number): Promise<RiskSnapshot[]> {
    return this.repo.getAlertHistory(limit);
  }

  async getStats(): Promise<RiskHistoryStats> {
    return this.repo.getStats();
  }

  async getLatest(): Promise<RiskSnapshot> {
    const latest = await this.repo.getLatest();
    if (!latest) throw new NotFoundError('No risk snapshot recorded yet');
    return latest;
  }

  /**
   * Alert decision, trends and key evidence for the latest recorded period.
   */
  async getAlertSummary(): Promise<AlertSummary & { asOf: string }> {
    const [latest, ...history] = await this.repo.getRecent(HISTORY_WINDOW + 1);
    if (!latest) throw new NotFoundError('No risk snapshot recorded yet');

    const { alerts, tiers } = this.aggregator.config;
    return { asOf: latest.asOf, ...buildAlertSummary(latest, history, alerts, tiers) };
  }
}
