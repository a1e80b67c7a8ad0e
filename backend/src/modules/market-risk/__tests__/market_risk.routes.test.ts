/**
 * Market Risk API Tests (Fastify inject, in-memory store)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import type { OverallRiskResult, RiskHistoryStats, RiskSnapshot } from '../contracts/market_risk.contracts.js';
import type { AlertSummary } from '../services/alert_logic.service.js';
import type { RecordedAssessment } from '../services/market_risk.service.js';
import { createMemoryRiskSnapshotRepo } from '../storage/risk_snapshot.repo.js';
import { NORMAL, STRESSED } from './fixtures.js';

interface OkBody<T> {
  ok: true;
  data: T;
  count?: number;
}

interface ErrorBody {
  ok: false;
  error: string;
  message: string;
}

describe('Market Risk routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({ logLevel: 'silent', repo: createMemoryRiskSnapshotRepo() });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market-risk/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, module: 'market-risk', version: 'v1.0' });
  });

  it('GET /config exposes weights and key indicators', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market-risk/config' });
    const body = res.json<OkBody<{ weights: Record<string, number>; keyIndicators: string[] }>>();

    expect(res.statusCode).toBe(200);
    expect(body.data.weights.recession).toBe(0.3);
    expect(body.data.keyIndicators).toHaveLength(5);
  });

  describe('POST /assess', () => {
    it('should assess an indicator set', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/market-risk/assess', payload: { indicators: NORMAL } });
      const body = res.json<OkBody<OverallRiskResult>>();

      expect(res.statusCode).toBe(200);
      expect(body.data.overallScore).toBe(0);
      expect(body.data.tier).toBe('GREEN');
      expect(body.data.confidence.level).toBe('HIGH');
    });

    it('should use a supplied window for the earnings rule', async () => {
      const window = Array.from({ length: 12 }, () => ({ valuation: { shiller_trailing_earnings: 200 } }));
      const current = { ...NORMAL, valuation: { ...NORMAL.valuation, shiller_trailing_earnings: 170 } };

      const res = await app.inject({
        method: 'POST',
        url: '/api/market-risk/assess',
        payload: { indicators: current, window: [...window, current] },
      });
      const body = res.json<OkBody<OverallRiskResult>>();

      expect(res.statusCode).toBe(200);
      expect(body.data.warnings.earningsRecession.active).toBe(true);
    });

    it('should answer 422 NO_DATA when nothing can be scored', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/market-risk/assess', payload: { indicators: {} } });

      expect(res.statusCode).toBe(422);
      expect(res.json<ErrorBody>().error).toBe('NO_DATA');
    });

    it('should reject non-numeric values', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/market-risk/assess',
        payload: { indicators: { credit: { hy_spread: 'wide' } } },
      });
      const body = res.json<ErrorBody>();

      expect(res.statusCode).toBe(400);
      expect(body.error).toBe('VALIDATION_ERROR');
      expect(body.message).toContain('indicators.credit.hy_spread');
    });

    it('should reject unknown indicator keys', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/market-risk/assess',
        payload: { indicators: { credit: { hy_spred: 4.0 } } },
      });

      expect(res.statusCode).toBe(400);
    });

    it('should accept explicit nulls', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/market-risk/assess',
        payload: { indicators: { credit: { hy_spread: null, ted_spread: 0.3 } } },
      });
      const body = res.json<OkBody<OverallRiskResult>>();

      expect(res.statusCode).toBe(200);
      expect(body.data.excludedDimensions).toEqual(['recession', 'valuation', 'liquidity', 'positioning']);
    });
  });

  describe('recorded history', () => {
    it('should 404 before anything is recorded', async () => {
      const latest = await app.inject({ method: 'GET', url: '/api/market-risk/latest' });
      const alert = await app.inject({ method: 'GET', url: '/api/market-risk/alert' });

      expect(latest.statusCode).toBe(404);
      expect(latest.json<ErrorBody>().error).toBe('NOT_FOUND');
      expect(alert.statusCode).toBe(404);
    });

    it('should record, then serve latest, history and alert', async () => {
      const first = await app.inject({
        method: 'POST',
        url: '/api/market-risk/record',
        payload: { asOf: '2024-01-01', indicators: NORMAL },
      });
      expect(first.statusCode).toBe(201);

      const second = await app.inject({
        method: 'POST',
        url: '/api/market-risk/record',
        payload: { asOf: '2024-01-08', indicators: STRESSED },
      });
      const recorded = second.json<OkBody<RecordedAssessment>>();
      expect(recorded.data.alert.triggers).toEqual(['RED_THRESHOLD']);

      const latest = (await app.inject({ method: 'GET', url: '/api/market-risk/latest' })).json<OkBody<RiskSnapshot>>();
      expect(latest.data.asOf).toBe('2024-01-08');

      const history = (await app.inject({ method: 'GET', url: '/api/market-risk/history?limit=1' })).json<OkBody<RiskSnapshot[]>>();
      expect(history.count).toBe(1);
      expect(history.data[0].asOf).toBe('2024-01-08');

      const alert = (await app.inject({ method: 'GET', url: '/api/market-risk/alert' })).json<OkBody<AlertSummary>>();
      expect(alert.data.decision.shouldAlert).toBe(true);
      expect(alert.data.decision.tier).toBe('RED');
    });

    it('should reject a malformed asOf', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/market-risk/record',
        payload: { asOf: '01/08/2024', indicators: NORMAL },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().message).toContain('asOf must be YYYY-MM-DD');
    });

    it('should serve date ranges, alert history and stats', async () => {
      for (const [asOf, indicators] of [
        ['2024-01-01', NORMAL],
        ['2024-01-08', STRESSED],
        ['2024-01-15', NORMAL],
      ] as const) {
        await app.inject({ method: 'POST', url: '/api/market-risk/record', payload: { asOf, indicators } });
      }

      const range = (await app.inject({
        method: 'GET',
        url: '/api/market-risk/history?start=2024-01-05&end=2024-01-15',
      })).json<OkBody<RiskSnapshot[]>>();
      expect(range.data.map(s => s.asOf)).toEqual(['2024-01-08', '2024-01-15']);
      expect(range.count).toBe(2);

      const alerts = (await app.inject({ method: 'GET', url: '/api/market-risk/alerts' })).json<OkBody<RiskSnapshot[]>>();
      expect(alerts.data.map(s => s.asOf)).toEqual(['2024-01-08']);
      expect(alerts.data[0].alerted).toBe(true);

      const stats = await app.inject({ method: 'GET', url: '/api/market-risk/stats' });
      expect(stats.json<OkBody<RiskHistoryStats>>().data).toEqual({
        count: 3,
        alertsCount: 1,
        dateRange: { start: '2024-01-01', end: '2024-01-15' },
      });
    });

    it('should reject an end date without a start', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/market-risk/history?end=2024-01-15' });

      expect(res.statusCode).toBe(400);
      expect(res.json<ErrorBody>().message).toContain('end requires start');
    });

    it('should reject a range that starts after it ends', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/market-risk/history?start=2024-02-01&end=2024-01-01',
      });
      expect(res.statusCode).toBe(400);
    });

    it('should reject an out-of-range history limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/market-risk/history?limit=0' });
      expect(res.statusCode).toBe(400);
    });
  });

  it('should answer unknown routes with the not-found body', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/market-risk/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });
});
