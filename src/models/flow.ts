import { FlowDirection } from '@/types/enums';
import { saturatingAdd, saturatingSub } from '@/lib/uint128';
import type { Quota } from '@/models/quota';

export interface FlowBalance {
    balanceIn: bigint;
    balanceOut: bigint;
}

/**
 * Value moved through a path during one window, ending at `periodEnd`
 * (seconds, inclusive).
 *
 * Windows are not aligned to a grid. A window only starts when a transfer
 * observes that the previous one has ended, so after a long idle period the
 * next call opens a single fresh window at its own timestamp instead of
 * stepping through the empty ones in between.
 */
export class Flow {
    constructor(
        public inflow: bigint,
        public outflow: bigint,
        public periodEnd: number
    ) {}

    static open(now: number, duration: number): Flow {
        return new Flow(0n, 0n, now + duration);
    }

    /**
     * Net movement in each direction. Opposite flows cancel, so at most one
     * side is non-zero.
     */
    balance(): FlowBalance {
        return {
            balanceIn: saturatingSub(this.inflow, this.outflow),
            balanceOut: saturatingSub(this.outflow, this.inflow)
        };
    }

    balanceOn(direction: FlowDirection): bigint {
        const { balanceIn, balanceOut } = this.balance();
        return direction === FlowDirection.IN ? balanceIn : balanceOut;
    }

    exceeds(direction: FlowDirection, maxIn: bigint, maxOut: bigint): boolean {
        const { balanceIn, balanceOut } = this.balance();
        return direction === FlowDirection.IN ? balanceIn > maxIn : balanceOut > maxOut;
    }

    // A transfer at exactly periodEnd still belongs to the current window.
    isExpired(now: number): boolean {
        return this.periodEnd < now;
    }

    expire(now: number, duration: number): void {
        this.inflow = 0n;
        this.outflow = 0n;
        this.periodEnd = now + duration;
    }

    addFlow(direction: FlowDirection, amount: bigint): void {
        if (direction === FlowDirection.IN) {
            this.inflow = saturatingAdd(this.inflow, amount);
        } else {
            this.outflow = saturatingAdd(this.outflow, amount);
        }
    }

    /** Removes a previously counted transfer. Never touches the window. */
    undoFlow(direction: FlowDirection, amount: bigint): void {
        if (direction === FlowDirection.IN) {
            this.inflow = saturatingSub(this.inflow, amount);
        } else {
            this.outflow = saturatingSub(this.outflow, amount);
        }
    }

    /**
     * Rolls the window over if it has ended, then counts the transfer.
     * Returns true when the window was rolled over.
     */
    applyTransfer(direction: FlowDirection, amount: bigint, now: number, quota: Quota): boolean {
        let expired = false;
        if (this.isExpired(now)) {
            this.expire(now, quota.duration);
            expired = true;
        }
        this.addFlow(direction, amount);
        return expired;
    }

    clone(): Flow {
        return new Flow(this.inflow, this.outflow, this.periodEnd);
    }
}
