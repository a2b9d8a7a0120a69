import type { Redis } from 'ioredis';
import { createApp } from '@/app';
import { applyBootstrapPaths } from '@/lib/bootstrap';
import { systemClock } from '@/lib/clock';
import { loadConfig } from '@/lib/env';
import logger from '@/lib/logger';
import { connectRedis, createRedisClient } from '@/lib/redis';
import { setupGracefulShutdown } from '@/lib/shutdown';
import { PathService } from '@/services/path.service';
import { InMemoryPathRegistry } from '@/store/memory-path-registry';
import type { PathRegistry } from '@/store/path-registry';
import { RedisPathRegistry } from '@/store/redis-path-registry';

const startServer = async () => {
    try {
        const config = loadConfig();

        let redis: Redis | undefined;
        let redisRegistry: RedisPathRegistry | undefined;
        let registry: PathRegistry;
        if (config.registryDriver === 'redis' && config.redisUrl) {
            redis = createRedisClient(config.redisUrl);
            await connectRedis(redis);
            redisRegistry = new RedisPathRegistry(redis, { keyPrefix: config.registryKeyPrefix });
            registry = redisRegistry;
        } else {
            logger.warn('Using in-memory registry; rate limit state will not survive a restart');
            registry = new InMemoryPathRegistry();
        }

        if (config.bootstrapPathsFile) {
            await applyBootstrapPaths(config.bootstrapPathsFile, new PathService(registry), systemClock());
        }

        const app = createApp({ registry, clock: systemClock });
        const server = app.listen(config.port, () => {
            logger.info(`✓ Path velocity limiter listening on :${config.port}`);
        });

        setupGracefulShutdown(server, redis, redisRegistry);
    } catch (error) {
        logger.error('✗ Failed to start server', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
};

void startServer();
