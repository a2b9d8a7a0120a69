import type { Path } from '@/models/path';
import type { RateLimit } from '@/models/rate-limit';

/**
 * Computes the next list for a path from the current one (`undefined` when the
 * path is not registered). Returning `undefined` writes nothing; throwing
 * aborts the update and leaves the stored list as it was.
 */
export type RateLimitUpdater = (current: RateLimit[] | undefined) => RateLimit[] | undefined;

/** Durable Path -> RateLimit[] mapping. The list is always read and written whole. */
export interface PathRegistry {
    load(path: Path): Promise<RateLimit[] | undefined>;
    save(path: Path, limits: RateLimit[]): Promise<void>;
    remove(path: Path): Promise<void>;
    /** Atomic read-modify-write of one path's list. Resolves to what was written. */
    update(path: Path, updater: RateLimitUpdater): Promise<RateLimit[] | undefined>;
}
