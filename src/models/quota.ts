import { FlowDirection } from '@/types/enums';

export interface QuotaConfig {
    name: string;
    maxSend: bigint;
    maxReceive: bigint;
    /** Window length in seconds. */
    duration: number;
}

export interface Capacity {
    maxIn: bigint;
    maxOut: bigint;
}

/**
 * Caps for one window. The name is expected to describe the window
 * ("daily", "weekly", ...) and is how targeted resets find it.
 */
export class Quota {
    readonly name: string;
    readonly maxSend: bigint;
    readonly maxReceive: bigint;
    readonly duration: number;

    constructor(config: QuotaConfig) {
        this.name = config.name;
        this.maxSend = config.maxSend;
        this.maxReceive = config.maxReceive;
        this.duration = config.duration;
    }

    // The receive cap bounds inbound flow, the send cap bounds outbound flow.
    capacity(): Capacity {
        return { maxIn: this.maxReceive, maxOut: this.maxSend };
    }

    capacityOn(direction: FlowDirection): bigint {
        const { maxIn, maxOut } = this.capacity();
        return direction === FlowDirection.IN ? maxIn : maxOut;
    }
}
