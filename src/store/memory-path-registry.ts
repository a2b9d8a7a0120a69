import { pathKey, type Path } from '@/models/path';
import type { RateLimit } from '@/models/rate-limit';
import type { PathRegistry, RateLimitUpdater } from '@/store/path-registry';
import { decodeRateLimits, encodeRateLimits } from '@/store/codec';

// Values are kept encoded so callers never share mutable objects with the store.
export class InMemoryPathRegistry implements PathRegistry {
    private readonly entries = new Map<string, string>();

    async load(path: Path): Promise<RateLimit[] | undefined> {
        return this.read(pathKey(path));
    }

    async save(path: Path, limits: RateLimit[]): Promise<void> {
        this.entries.set(pathKey(path), encodeRateLimits(limits));
    }

    async remove(path: Path): Promise<void> {
        this.entries.delete(pathKey(path));
    }

    async update(path: Path, updater: RateLimitUpdater): Promise<RateLimit[] | undefined> {
        const key = pathKey(path);
        const next = updater(this.read(key));
        if (next === undefined) return undefined;

        this.entries.set(key, encodeRateLimits(next));
        return next;
    }

    get size(): number {
        return this.entries.size;
    }

    private read(key: string): RateLimit[] | undefined {
        const raw = this.entries.get(key);
        return raw === undefined ? undefined : decodeRateLimits(key, raw);
    }
}
