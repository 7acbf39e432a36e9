import { Pool } from 'pg';
import { config } from './config.js';
import { logger } from './logger.js';

export const pool = new Pool({ connectionString: config.databaseUrl });

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected PG pool error');
});
