/**
 * Market Risk API Routes
 *
 * Prefix: /api/market-risk
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { MarketRiskService } from '../services/market_risk.service.js';
import { KEY_INDICATORS } from '../services/confidence.service.js';
import {
  AlertHistoryQuerySchema,
  AssessBodySchema,
  HistoryQuerySchema,
  RecordBodySchema,
  parseInput,
} from './market_risk.schemas.js';

export interface MarketRiskRoutesOptions {
  service: MarketRiskService;
}

export async function marketRiskRoutes(fastify: FastifyInstance, opts: MarketRiskRoutesOptions): Promise<void> {
  const { service } = opts;

  /**
   * GET /api/market-risk/health
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      module: 'market-risk',
      version: 'v1.0',
    });
  });

  /**
   * GET /api/market-risk/config
   * Active weights, tier cutoffs and alert triggers
   */
  fastify.get('/config', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      data: {
        ...service.config,
        keyIndicators: KEY_INDICATORS.map(k => `${k.dimension}.${k.component}`),
      },
    });
  });

  /**
   * POST /api/market-risk/assess
   * Body: { indicators, window? }; window oldest first, last entry = current period
   */
  fastify.post('/assess', async (request: FastifyRequest, reply: FastifyReply) => {
    const { indicators, window } = parseInput(AssessBodySchema, request.body);
    const result = service.assess(indicators, window);

    return reply.send({ ok: true, data: result });
  });

  /**
   * POST /api/market-risk/record
   * Body: { asOf: 'YYYY-MM-DD', indicators }
   */
  fastify.post('/record', async (request: FastifyRequest, reply: FastifyReply) => {
    const { asOf, indicators } = parseInput(RecordBodySchema, request.body);
    const recorded = await service.assessAndRecord(indicators, asOf);

    return reply.status(201).send({ ok: true, data: recorded });
  });

  /**
   * GET /api/market-risk/latest
   */
  fastify.get('/latest', async (_request: FastifyRequest, reply: FastifyReply) => {
    const latest = await service.getLatest();
    return reply.send({ ok: true, data: latest });
  });

  /**
   * GET /api/market-risk/history?limit=52
   * GET /api/market-risk/history?start=YYYY-MM-DD&end=YYYY-MM-DD
   * Newest first by limit; oldest first for a date range (end inclusive, optional)
   */
  fastify.get('/history', async (request: FastifyRequest, reply: FastifyReply) => {
    const { limit, start, end } = parseInput(HistoryQuerySchema, request.query);
    const history = start !== undefined
      ? await service.getRange(start, end)
      : await service.getHistory(limit);

    return reply.send({ ok: true, data: history, count: history.length });
  });

  /**
   * GET /api/market-risk/alerts?limit=10
   * Periods that raised an alert, newest first
   */
  fastify.get('/alerts', async (request: FastifyRequest, reply: FastifyReply) => {
    const { limit } = parseInput(AlertHistoryQuerySchema, request.query);
    const alerts = await service.getAlertHistory(limit);

    return reply.send({ ok: true, data: alerts, count: alerts.length });
  });

  /**
   * GET /api/market-risk/stats
   */
  fastify.get('/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
    const stats = await service.getStats();
    return reply.send({ ok: true, data: stats });
  });

  /**
   * GET /api/market-risk/alert
   * Alert decision, trends and key evidence for the latest recorded period
   */
  fastify.get('/alert', async (_request: FastifyRequest, reply: FastifyReply) => {
    const summary = await service.getAlertSummary();
    return reply.send({ ok: true, data: summary });
  });
}
