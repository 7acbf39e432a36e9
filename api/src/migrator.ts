import fs from 'fs';
import path from 'path';
import type { Logger } from './logger.js';
import type { PgPool } from './pg-store.js';

const MIGRATION_LOCK = 'schema_migrations';

/** .sql files in `dir` not yet recorded in schema_migrations, in name order. */
export function pendingMigrations(dir: string, applied: ReadonlySet<string>): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

/**
 * Applies pending migrations, each in its own transaction, while holding a
 * session advisory lock so concurrent runners wait their turn. Returns the
 * versions applied.
 */
export async function runMigrations(pool: PgPool, dir: string, log: Logger): Promise<string[]> {
  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock(hashtext($1))', [MIGRATION_LOCK]);
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
        version TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`
    );
    const { rows } = await client.query<{ version: string }>('SELECT version FROM schema_migrations');
    const pending = pendingMigrations(dir, new Set(rows.map((r) => r.version)));

    for (const version of pending) {
      const sql = fs.readFileSync(path.join(dir, version), 'utf8');
      try {
        await client.query('BEGIN');
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations(version) VALUES ($1)', [version]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        log.error({ err, version }, 'migration failed');
        throw err;
      }
      log.info({ version }, `Applied migration ${version}`);
    }
    return pending;
  } finally {
    try {
      await client.query('SELECT pg_advisory_unlock(hashtext($1))', [MIGRATION_LOCK]);
    } finally {
      client.release();
    }
  }
}
