import { RedisAvailabilityCache } from './availability-cache.js';
import { redis } from './cache.js';
import { config } from './config.js';
import { pool } from './db.js';
import { createEngine } from './engine.js';
import { logger } from './logger.js';
import { PgStore } from './pg-store.js';
import { buildServer } from './server.js';

const start = async () => {
  const store = new PgStore(pool, {
    logger,
    lockTimeoutMs: config.lockTimeoutMs,
    statementTimeoutMs: config.statementTimeoutMs
  });
  const engine = createEngine({
    store,
    cache: new RedisAvailabilityCache(redis, config.availabilityCacheTtlSeconds),
    logger,
    businessSurcharge: config.businessSurcharge,
    referenceMaxAttempts: config.referenceMaxAttempts
  });
  const app = buildServer(engine, {
    logLevel: config.logLevel,
    burstGuard: config.burstGuard,
    readiness: async () => {
      await pool.query('SELECT 1');
      await redis.ping();
    }
  });

  const shutdown = async (signal: string) => {
    app.log.info(`Received ${signal}, shutting down`);
    await app.close();
    await Promise.all([pool.end(), redis.quit()]);
    process.exit(0);
  };
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: config.apiPort, host: config.apiHost });
    app.log.info(`Server listening on ${config.apiHost}:${config.apiPort}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
