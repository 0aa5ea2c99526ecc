import { createClient } from 'redis';
import { redisConfig } from '../config';
import { createLogger } from './logger';

const log = createLogger('cache');

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Create the Redis client used by the cache health probe
 */
export const createRedisClient = (): RedisClient => {
  const client = createClient({
    socket: {
      host: redisConfig.host,
      port: redisConfig.port,
      reconnectStrategy: (retries) => {
        if (retries > 5) {
          return new Error('Too many retries on Redis. Connection Terminated');
        }
        return Math.min(retries * 100, 5000);
      },
    },
    password: redisConfig.password,
  });

  client.on('error', (error: unknown) => {
    log.error('Redis client error', { error: error instanceof Error ? error.message : String(error) });
  });

  return client;
};

export const connectRedis = async (client: RedisClient): Promise<void> => {
  await client.connect();
  log.info(`Connected to Redis at ${redisConfig.host}:${redisConfig.port}`);
};

export const disconnectRedis = async (client: RedisClient): Promise<void> => {
  if (client.isOpen) {
    await client.quit();
  }
};

/**
 * Write and read back a probe key; rejects when Redis does not answer as expected
 */
export const pingCache = async (client: RedisClient): Promise<void> => {
  const key = `${redisConfig.keyPrefix}:health_check`;
  await client.set(key, 'ok', { EX: 10 });
  const value = await client.get(key);
  if (value !== 'ok') {
    throw new Error('cache read-back mismatch');
  }
};
