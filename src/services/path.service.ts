import { PathNotFoundError, QuotaNotFoundError } from '@/errors/app-error';
import logger from '@/lib/logger';
import type { Path } from '@/models/path';
import { Quota, type QuotaConfig } from '@/models/quota';
import { RateLimit } from '@/models/rate-limit';
import type { PathRegistry } from '@/store/path-registry';

export interface PathRegistration {
    path: Path;
    quotas: QuotaConfig[];
}

export class PathService {
    constructor(private readonly registry: PathRegistry) {}

    /**
     * Replaces whatever is configured on the path with fresh windows starting
     * at `now`. An empty quota list leaves the path unrestricted.
     */
    async registerPath(path: Path, quotas: QuotaConfig[], now: number): Promise<RateLimit[]> {
        const limits = quotas.map((config) => RateLimit.create(new Quota(config), now));
        await this.registry.save(path, limits);

        logger.info('Path registered', { ...path, quotas: quotas.map((q) => q.name) });
        return limits;
    }

    async registerPaths(registrations: PathRegistration[], now: number): Promise<void> {
        for (const { path, quotas } of registrations) {
            await this.registerPath(path, quotas, now);
        }
    }

    async removePath(path: Path): Promise<void> {
        await this.registry.remove(path);
        logger.info('Path removed', { ...path });
    }

    /** Starts a new window for the first quota named `quotaName`; other quotas keep their state. */
    async resetPathQuota(path: Path, quotaName: string, now: number): Promise<RateLimit[]> {
        const saved = await this.registry.update(path, (limits) => {
            const index = limits ? limits.findIndex((limit) => limit.quota.name === quotaName) : -1;
            if (!limits || index === -1) throw new QuotaNotFoundError(path, quotaName);

            return limits.map((limit, i) => {
                if (i !== index) return limit;
                const next = limit.clone();
                next.flow.expire(now, next.quota.duration);
                return next;
            });
        });
        if (!saved) throw new QuotaNotFoundError(path, quotaName);

        logger.info('Quota reset', { ...path, quotaName });
        return saved;
    }

    async getQuotas(path: Path): Promise<RateLimit[]> {
        const limits = await this.registry.load(path);
        if (!limits) throw new PathNotFoundError(path);
        return limits;
    }
}
