import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

export function getRedis(): RedisClient | null {
  if (!env.REDIS_URL) return null;

  if (!client) {
    client = createClient({ url: env.REDIS_URL });

    client.on('error', (err: Error) => {
      logger.error('Redis error', { error: err.message });
    });

    client.on('connect', () => {
      logger.info('Redis connected');
    });
  }
  return client;
}

export async function connectRedis(): Promise<void> {
  const redis = getRedis();
  if (redis && !redis.isOpen) {
    await redis.connect();
  }
}

export async function checkRedisHealth(): Promise<{ status: string; error?: string }> {
  const redis = getRedis();
  if (!redis) return { status: 'disabled' };

  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error: unknown) {
    return { status: 'unhealthy', error: errorMessage(error) };
  }
}
