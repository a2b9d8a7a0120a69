import { readFile } from 'fs/promises';
import logger from '@/lib/logger';
import { createPath } from '@/models/path';
import type { PathRegistration, PathService } from '@/services/path.service';
import { bootstrapPathsSchema } from '@/validators/rate-limit.validator';

export const parseBootstrapPaths = (raw: string, source: string): PathRegistration[] => {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Bootstrap paths in ${source} are not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = bootstrapPathsSchema.safeParse(json);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
        throw new Error(`Invalid bootstrap paths in ${source}: ${problems.join('; ')}`);
    }

    return parsed.data.map(({ owner, channel, asset, quotas }) => ({
        path: createPath(owner, channel, asset),
        quotas
    }));
};

/** Registers the paths listed in a JSON file, all starting their windows at `now`. */
export const applyBootstrapPaths = async (file: string, paths: PathService, now: number): Promise<number> => {
    const registrations = parseBootstrapPaths(await readFile(file, 'utf8'), file);
    await paths.registerPaths(registrations, now);

    logger.info('✓ Bootstrap paths registered', { file, count: registrations.length });
    return registrations.length;
};
