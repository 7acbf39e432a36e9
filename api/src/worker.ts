import { RedisAvailabilityCache } from './availability-cache.js';
import { redis } from './cache.js';
import { startReconciler } from './cache-reconcile.js';
import { config } from './config.js';
import { pool } from './db.js';
import { createEngine } from './engine.js';
import { logger } from './logger.js';
import { PgStore } from './pg-store.js';

const log = logger.child({ component: 'worker' });

function loop(fn: () => Promise<unknown>, name: string, interval: number) {
  const run = async () => {
    try {
      const res = await fn();
      if (typeof res === 'number') {
        log.info({ job: name, processed: res }, `${name} processed ${res}`);
      }
    } catch (err) {
      log.error({ err, job: name }, `${name} error`);
    } finally {
      setTimeout(() => void run(), interval);
    }
  };
  void run();
}

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

loop(() => engine.reservations.completeArrivedFlights(), 'completeArrivedFlights', config.completionIntervalMs);
startReconciler(store, engine.ledger, config.reconcileIntervalMs, log);
