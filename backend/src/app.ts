import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { buildRiskConfigFromEnv } from './modules/market-risk/config/market_risk.config.js';
import type { RiskEngineConfig } from './modules/market-risk/contracts/market_risk.contracts.js';
import { registerMarketRiskModule } from './modules/market-risk/index.js';
import {
  createMemoryRiskSnapshotRepo,
  type RiskSnapshotRepo,
} from './modules/market-risk/storage/risk_snapshot.repo.js';

export interface BuildAppOptions {
  logLevel?: string;
  riskConfig?: RiskEngineConfig;
  repo?: RiskSnapshotRepo;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.warn({ code: err.code, details: err.details }, err.message);

      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : (err.code ?? 'REQUEST_ERROR'),
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: new Date().toISOString(),
  }));

  app.register(async (instance) => {
    await registerMarketRiskModule(instance, {
      config: options.riskConfig ?? buildRiskConfigFromEnv(env),
      repo: options.repo ?? createMemoryRiskSnapshotRepo(),
      logger: app.log,
    });
  });

  return app;
}
