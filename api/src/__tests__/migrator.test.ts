import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { pendingMigrations, runMigrations } from '../migrator.js';
import { fakePool } from './helpers/fake-pg.js';
import { silentLogger } from './helpers/memory-store.js';

describe('migrator', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'migrations-'));
    fs.writeFileSync(path.join(dir, '002_widgets.sql'), 'CREATE TABLE widgets (id TEXT PRIMARY KEY);');
    fs.writeFileSync(path.join(dir, '001_init.sql'), 'CREATE TABLE gadgets (id TEXT PRIMARY KEY);');
    fs.writeFileSync(path.join(dir, 'README.txt'), 'not a migration');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists unapplied .sql files in name order', () => {
    expect(pendingMigrations(dir, new Set())).toEqual(['001_init.sql', '002_widgets.sql']);
    expect(pendingMigrations(dir, new Set(['001_init.sql']))).toEqual(['002_widgets.sql']);
  });

  it('applies each migration in its own transaction under the advisory lock', async () => {
    const pool = fakePool();

    const applied = await runMigrations(pool, dir, silentLogger);

    expect(applied).toEqual(['001_init.sql', '002_widgets.sql']);
    const texts = pool.client.texts();
    expect(texts[0]).toBe('SELECT pg_advisory_lock(hashtext($1))');
    expect(texts.slice(3, 7)).toEqual([
      'BEGIN',
      'CREATE TABLE gadgets (id TEXT PRIMARY KEY);',
      'INSERT INTO schema_migrations(version) VALUES ($1)',
      'COMMIT'
    ]);
    expect(texts.at(-1)).toBe('SELECT pg_advisory_unlock(hashtext($1))');
    expect(pool.client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back a failing migration and stops', async () => {
    const pool = fakePool();
    pool.client.failOn('CREATE TABLE widgets', new Error('syntax error'));

    await expect(runMigrations(pool, dir, silentLogger)).rejects.toThrow('syntax error');

    const texts = pool.client.texts();
    expect(texts.slice(-3)).toEqual([
      'CREATE TABLE widgets (id TEXT PRIMARY KEY);',
      'ROLLBACK',
      'SELECT pg_advisory_unlock(hashtext($1))'
    ]);
    expect(pool.client.release).toHaveBeenCalledTimes(1);
  });
});
