/**
 * Market Risk Module
 *
 * Five-dimension market risk engine:
 *   recession · credit · valuation · liquidity · positioning
 *   → weighted score 0-10 + GREEN/YELLOW/RED tier
 *   + confidence axis + composite warnings + alert decision
 *
 * The engine is pure and synchronous; the service adds snapshot history.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../common/logger.js';
import type { RiskEngineConfig } from './contracts/market_risk.contracts.js';
import { marketRiskRoutes } from './api/market_risk.routes.js';
import { RiskAggregator } from './services/risk_aggregator.service.js';
import { MarketRiskService } from './services/market_risk.service.js';
import type { RiskSnapshotRepo } from './storage/risk_snapshot.repo.js';

export interface MarketRiskModuleOptions {
  config: RiskEngineConfig;
  repo: RiskSnapshotRepo;
  logger?: Logger;
}

export async function registerMarketRiskModule(
  app: FastifyInstance,
  options: MarketRiskModuleOptions,
): Promise<MarketRiskService> {
  const logger = options.logger ?? app.log;
  const aggregator = new RiskAggregator({ config: options.config, logger });
  const service = new MarketRiskService({ aggregator, repo: options.repo, logger });

  console.log('[MarketRisk] Registering routes...');
  await app.register(marketRiskRoutes, { prefix: '/api/market-risk', service });
  console.log('[MarketRisk] ✅ Routes registered at /api/market-risk/*');

  return service;
}

// Re-export types
export * from './contracts/market_risk.contracts.js';

// Re-export engine
export { RiskAggregator, classifyTier } from './services/risk_aggregator.service.js';
export { estimateConfidence, KEY_INDICATORS } from './services/confidence.service.js';
export { evaluateWarnings, activeWarningKeys, WARNING_CUTOFFS } from './warnings/warning_rules.js';
export { evaluateLadder, type ThresholdLadder, type LadderBand } from './scoring/threshold_ladder.js';
export { RecessionScorer } from './scoring/recession.scorer.js';
export { CreditScorer } from './scoring/credit.scorer.js';
export { ValuationScorer } from './scoring/valuation.scorer.js';
export { LiquidityScorer } from './scoring/liquidity.scorer.js';
export { PositioningScorer } from './scoring/positioning.scorer.js';
export { DEFAULT_RISK_CONFIG, validateRiskConfig, buildRiskConfigFromEnv } from './config/market_risk.config.js';
export { evaluateAlert, buildAlertSummary, calculateTrends, extractKeyEvidence } from './services/alert_logic.service.js';
export type { AlertDecision, AlertSummary, AlertTrigger, RiskTrends } from './services/alert_logic.service.js';

// Re-export service + storage
export { MarketRiskService } from './services/market_risk.service.js';
export type { RiskSnapshotRepo } from './storage/risk_snapshot.repo.js';
export { mongoRiskSnapshotRepo, createMemoryRiskSnapshotRepo } from './storage/risk_snapshot.repo.js';
