/**
 * Market Risk Backend entry point
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { buildRiskConfigFromEnv } from './modules/market-risk/config/market_risk.config.js';
import {
  createMemoryRiskSnapshotRepo,
  mongoRiskSnapshotRepo,
} from './modules/market-risk/storage/risk_snapshot.repo.js';

async function main(): Promise<void> {
  const riskConfig = buildRiskConfigFromEnv(env);

  if (env.MONGO_URL) {
    await connectMongo(env.MONGO_URL);
  } else {
    console.log('[Boot] MONGO_URL not set, using in-memory snapshot store');
  }

  const app = buildApp({
    riskConfig,
    repo: env.MONGO_URL ? mongoRiskSnapshotRepo : createMemoryRiskSnapshotRepo(),
  });

  const shutdown = async (signal: string) => {
    console.log(`[Boot] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Boot] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Boot] ✅ Market risk backend started on ${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[Boot] Fatal:', err);
  process.exit(1);
});
