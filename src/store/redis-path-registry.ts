import { ConcurrentUpdateError } from '@/errors/app-error';
import { REGISTRY } from '@/constants';
import logger from '@/lib/logger';
import { pathKey, type Path } from '@/models/path';
import type { RateLimit } from '@/models/rate-limit';
import type { PathRegistry, RateLimitUpdater } from '@/store/path-registry';
import { decodeRateLimits, encodeRateLimits } from '@/store/codec';
import { withRetry } from '@/utils/retry';

type ExecResult = Array<[error: Error | null, result: unknown]> | null;

/** The subset of ioredis commands the registry relies on. */
export interface RegistryRedisClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<unknown>;
    del(key: string): Promise<number>;
    watch(key: string): Promise<unknown>;
    unwatch(): Promise<unknown>;
    multi(): {
        set(key: string, value: string): unknown;
        exec(): Promise<ExecResult>;
    };
    duplicate(): RegistryRedisClient;
    quit(): Promise<unknown>;
}

export interface RedisPathRegistryOptions {
    keyPrefix?: string;
    maxUpdateAttempts?: number;
    /** Upper bound on connections held open for concurrent updates. */
    maxTransactionConnections?: number;
}

/**
 * Stores each path's list as one JSON string. Updates are optimistic:
 * WATCH the key, compute the new list, then write it in MULTI/EXEC, retrying
 * when another writer got there first.
 *
 * WATCH state belongs to a connection, so every update runs on a connection
 * of its own, duplicated from the shared client and pooled between updates.
 */
export class RedisPathRegistry implements PathRegistry {
    private readonly keyPrefix: string;
    private readonly maxUpdateAttempts: number;
    private readonly maxTransactionConnections: number;
    private readonly connections: RegistryRedisClient[] = [];
    private readonly idle: RegistryRedisClient[] = [];
    private readonly waiting: Array<(connection: RegistryRedisClient) => void> = [];

    constructor(
        private readonly redis: RegistryRedisClient,
        options: RedisPathRegistryOptions = {}
    ) {
        this.keyPrefix = options.keyPrefix ?? REGISTRY.KEY_PREFIX;
        this.maxUpdateAttempts = options.maxUpdateAttempts ?? REGISTRY.MAX_UPDATE_ATTEMPTS;
        this.maxTransactionConnections = Math.max(
            1,
            options.maxTransactionConnections ?? REGISTRY.MAX_TRANSACTION_CONNECTIONS
        );
    }

    async load(path: Path): Promise<RateLimit[] | undefined> {
        const key = this.keyFor(path);
        const raw = await this.redis.get(key);
        return raw === null ? undefined : decodeRateLimits(key, raw);
    }

    async save(path: Path, limits: RateLimit[]): Promise<void> {
        await this.redis.set(this.keyFor(path), encodeRateLimits(limits));
    }

    async remove(path: Path): Promise<void> {
        await this.redis.del(this.keyFor(path));
    }

    async update(path: Path, updater: RateLimitUpdater): Promise<RateLimit[] | undefined> {
        const key = this.keyFor(path);
        return withRetry(() => this.updateOnce(key, updater), {
            maxAttempts: this.maxUpdateAttempts,
            isRetryable: (error) => error instanceof ConcurrentUpdateError
        });
    }

    keyFor(path: Path): string {
        return `${this.keyPrefix}:${pathKey(path)}`;
    }

    /**
     * Quits the idle update connections; ones still in use are quit as their
     * update finishes. The shared client is left to its owner.
     */
    async close(): Promise<void> {
        this.connections.length = 0;
        const idle = this.idle.splice(0);
        await Promise.all(idle.map((connection) => connection.quit()));
    }

    private async updateOnce(key: string, updater: RateLimitUpdater): Promise<RateLimit[] | undefined> {
        const connection = await this.acquire();
        try {
            return await this.transact(connection, key, updater);
        } finally {
            this.release(connection);
        }
    }

    private async transact(
        redis: RegistryRedisClient,
        key: string,
        updater: RateLimitUpdater
    ): Promise<RateLimit[] | undefined> {
        await redis.watch(key);

        let next: RateLimit[] | undefined;
        try {
            const raw = await redis.get(key);
            next = updater(raw === null ? undefined : decodeRateLimits(key, raw));
        } catch (error) {
            await redis.unwatch();
            throw error;
        }

        if (next === undefined) {
            await redis.unwatch();
            return undefined;
        }

        const tx = redis.multi();
        tx.set(key, encodeRateLimits(next));
        const results = await tx.exec();
        if (results === null) {
            logger.debug('Registry write conflict', { key });
            throw new ConcurrentUpdateError(key);
        }
        for (const [error] of results) {
            if (error) throw error;
        }
        return next;
    }

    private acquire(): Promise<RegistryRedisClient> {
        const connection = this.idle.pop();
        if (connection) return Promise.resolve(connection);

        if (this.connections.length < this.maxTransactionConnections) {
            const created = this.redis.duplicate();
            this.connections.push(created);
            return Promise.resolve(created);
        }

        return new Promise((resolve) => this.waiting.push(resolve));
    }

    private release(connection: RegistryRedisClient): void {
        if (!this.connections.includes(connection)) {
            void connection.quit().catch((error: unknown) => {
                logger.warn('Failed to quit registry connection', {
                    error: error instanceof Error ? error.message : String(error)
                });
            });
            return;
        }

        const next = this.waiting.shift();
        if (next) next(connection);
        else this.idle.push(connection);
    }
}
