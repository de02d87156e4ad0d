import { createClient } from 'redis';
import { CacheConfig } from './env';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(config: CacheConfig): RedisClient {
  const redis = createClient({
    socket: { host: config.host, port: config.port },
    database: config.db,
  });

  redis.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });

  redis.on('connect', () => {
    logger.info('Redis connected', { host: config.host, db: config.db });
  });

  return redis;
}

export async function connectRedis(redis: RedisClient): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function checkRedisHealth(redis: RedisClient): Promise<{ status: string; error?: string }> {
  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: toError(error).message };
  }
}
