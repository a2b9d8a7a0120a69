import { Redis, RedisOptions } from 'ioredis';
import logger from '@/lib/logger';

const redisConfig: RedisOptions = {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
    retryStrategy: (times) => Math.min(times * 50, 2000)
};

export const createRedisClient = (url: string): Redis => {
    const client = new Redis(url, redisConfig);

    client.on('connect', () => logger.info('✓ Connected to Redis'));
    client.on('error', (err: Error) => logger.error('✗ Redis error', { error: err.message }));
    client.on('reconnecting', () => logger.warn('Reconnecting to Redis...'));

    return client;
};

export const connectRedis = async (client: Redis): Promise<void> => {
    await client.connect();
    await client.ping();
    logger.info('✓ Redis ping successful');
};

export const closeRedisConnection = async (client: Redis): Promise<void> => {
    try {
        await client.quit();
        logger.info('✓ Redis connection closed');
    } catch (error) {
        logger.error('Error closing Redis', { error: error instanceof Error ? error.message : String(error) });
    }
};
