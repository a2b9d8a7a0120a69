import { FlowDirection } from '@/types/enums';
import { RateLimitExceededError } from '@/errors/app-error';
import logger from '@/lib/logger';
import type { Path } from '@/models/path';
import type { QuotaUsage, RateLimit } from '@/models/rate-limit';
import type { PathRegistry } from '@/store/path-registry';

export interface TransferOutcome {
    path: Path;
    direction: FlowDirection;
    amount: string;
    /** False when the path has no quotas configured and the transfer was let through untracked. */
    limited: boolean;
    usage: QuotaUsage[];
}

/**
 * Runs transfers against every rate limit configured on a path and commits
 * the result all-or-nothing. Paths without quotas are not rate limited.
 */
export class TransferService {
    constructor(private readonly registry: PathRegistry) {}

    async tryTransfer(path: Path, amount: bigint, direction: FlowDirection, now: number): Promise<TransferOutcome> {
        // Each limit is evaluated on a copy; the first rejection aborts the
        // update before anything is written.
        let saved: RateLimit[] | undefined;
        try {
            saved = await this.registry.update(path, (limits) => {
                if (!limits || limits.length === 0) return undefined;
                return limits.map((limit) => limit.allowTransfer(path, direction, amount, now));
            });
        } catch (error) {
            if (error instanceof RateLimitExceededError) {
                logger.warn('Transfer rejected', { ...path, direction, ...error.context });
            }
            throw error;
        }

        if (saved === undefined) {
            logger.debug('Path not rate limited', { ...path, direction, amount: amount.toString() });
            return this.outcome(path, direction, amount, undefined);
        }

        logger.debug('Transfer recorded', { ...path, direction, amount: amount.toString(), quotas: saved.length });
        return this.outcome(path, direction, amount, saved);
    }

    /**
     * Takes a previously recorded outbound transfer back out of every window.
     * No limits are checked and no window is moved; a transfer whose window
     * has since rolled over subtracts from the fresh counters and saturates at
     * zero.
     */
    async undoSend(path: Path, amount: bigint): Promise<TransferOutcome> {
        const saved = await this.registry.update(path, (limits) => {
            if (!limits || limits.length === 0) return undefined;
            return limits.map((limit) => {
                const next = limit.clone();
                next.flow.undoFlow(FlowDirection.OUT, amount);
                return next;
            });
        });

        logger.debug('Outbound transfer reversed', { ...path, amount: amount.toString(), limited: saved !== undefined });
        return this.outcome(path, FlowDirection.OUT, amount, saved);
    }

    private outcome(
        path: Path,
        direction: FlowDirection,
        amount: bigint,
        limits: RateLimit[] | undefined
    ): TransferOutcome {
        return {
            path,
            direction,
            amount: amount.toString(),
            limited: limits !== undefined,
            usage: limits ? limits.map((limit) => limit.usage()) : []
        };
    }
}
