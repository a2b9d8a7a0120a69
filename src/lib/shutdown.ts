import { Server } from 'http';
import type { Redis } from 'ioredis';
import { closeRedisConnection } from '@/lib/redis';
import logger from '@/lib/logger';
import type { RedisPathRegistry } from '@/store/redis-path-registry';

const FORCED_SHUTDOWN_MS = 30_000;

export const setupGracefulShutdown = (server: Server, redis?: Redis, registry?: RedisPathRegistry): void => {
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);

        server.close(async () => {
            logger.info('✓ HTTP server closed');
            if (registry) await registry.close();
            if (redis) await closeRedisConnection(redis);

            logger.info('✓ Shutdown complete');
            process.exit(0);
        });

        setTimeout(() => {
            logger.error('✗ Forced shutdown after timeout');
            process.exit(1);
        }, FORCED_SHUTDOWN_MS).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};
