import { config } from './config.js';
import { pool } from './db.js';
import { logger } from './logger.js';
import { runMigrations } from './migrator.js';

const log = logger.child({ component: 'migrate' });

try {
  const applied = await runMigrations(pool, config.migrationsDir, log);
  log.info({ applied: applied.length }, applied.length > 0 ? 'migrations complete' : 'schema up to date');
} catch (err) {
  log.error({ err }, 'Migration failed');
  process.exitCode = 1;
} finally {
  await pool.end();
}
