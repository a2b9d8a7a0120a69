import { FlowDirection } from '@/types/enums';
import { RateLimitExceededError } from '@/errors/app-error';
import { Flow } from '@/models/flow';
import { Quota } from '@/models/quota';
import type { Path } from '@/models/path';

/** Persisted and API shape of a rate limit; uint128 values are decimal strings. */
export interface RateLimitRecord {
    quota: {
        name: string;
        maxSend: string;
        maxReceive: string;
        duration: number;
    };
    flow: {
        inflow: string;
        outflow: string;
        periodEnd: number;
    };
}

export interface QuotaUsage {
    quota: string;
    usedIn: string;
    usedOut: string;
    maxIn: string;
    maxOut: string;
    periodEnd: number;
}

/**
 * One quota and the flow it is tracking on a path. A path carries a list of
 * these, one per window size.
 */
export class RateLimit {
    constructor(
        public readonly quota: Quota,
        public readonly flow: Flow
    ) {}

    static create(quota: Quota, now: number): RateLimit {
        return new RateLimit(quota, Flow.open(now, quota.duration));
    }

    static fromRecord(record: RateLimitRecord): RateLimit {
        return new RateLimit(
            new Quota({
                name: record.quota.name,
                maxSend: BigInt(record.quota.maxSend),
                maxReceive: BigInt(record.quota.maxReceive),
                duration: record.quota.duration
            }),
            new Flow(BigInt(record.flow.inflow), BigInt(record.flow.outflow), record.flow.periodEnd)
        );
    }

    /**
     * Evaluates a transfer against this quota without mutating the receiver.
     *
     * The transfer is applied to a copy of the flow, rolling the window first
     * if it has ended. Returns the updated copy, or throws
     * RateLimitExceededError reporting the balance as it was before the
     * attempt.
     */
    allowTransfer(path: Path, direction: FlowDirection, amount: bigint, now: number): RateLimit {
        const used = this.flow.balanceOn(direction);
        const next = this.clone();

        next.flow.applyTransfer(direction, amount, now, next.quota);

        const { maxIn, maxOut } = next.quota.capacity();
        if (next.flow.exceeds(direction, maxIn, maxOut)) {
            throw new RateLimitExceededError({
                path,
                amount,
                quotaName: next.quota.name,
                used,
                max: next.quota.capacityOn(direction),
                periodEnd: next.flow.periodEnd
            });
        }
        return next;
    }

    clone(): RateLimit {
        return new RateLimit(this.quota, this.flow.clone());
    }

    usage(): QuotaUsage {
        const { balanceIn, balanceOut } = this.flow.balance();
        const { maxIn, maxOut } = this.quota.capacity();
        return {
            quota: this.quota.name,
            usedIn: balanceIn.toString(),
            usedOut: balanceOut.toString(),
            maxIn: maxIn.toString(),
            maxOut: maxOut.toString(),
            periodEnd: this.flow.periodEnd
        };
    }

    toRecord(): RateLimitRecord {
        return {
            quota: {
                name: this.quota.name,
                maxSend: this.quota.maxSend.toString(),
                maxReceive: this.quota.maxReceive.toString(),
                duration: this.quota.duration
            },
            flow: {
                inflow: this.flow.inflow.toString(),
                outflow: this.flow.outflow.toString(),
                periodEnd: this.flow.periodEnd
            }
        };
    }
}
