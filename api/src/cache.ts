import { Redis } from 'ioredis';
import { config } from './config.js';
import { logger } from './logger.js';

export const redis = new Redis(config.redisUrl, { maxRetriesPerRequest: 2 });

redis.on('error', (err) => {
  logger.error({ err }, 'Redis connection error');
});
