import { describe, it, expect } from 'vitest';
import { QUOTA_DURATIONS } from '@/constants';
import { UINT128_MAX } from '@/lib/uint128';
import { Flow } from '@/models/flow';
import { Quota } from '@/models/quota';
import { FlowDirection } from '@/types/enums';

const { DAILY, WEEKLY } = QUOTA_DURATIONS;

describe('Flow', () => {
    it('tracks expiry and netted balances across a window', () => {
        const flow = Flow.open(0, WEEKLY);

        expect(flow.isExpired(0)).toBe(false);
        expect(flow.isExpired(DAILY)).toBe(false);
        expect(flow.isExpired(WEEKLY)).toBe(false);
        expect(flow.isExpired(WEEKLY + 1)).toBe(true);

        expect(flow.balance()).toEqual({ balanceIn: 0n, balanceOut: 0n });
        flow.addFlow(FlowDirection.IN, 5n);
        expect(flow.balance()).toEqual({ balanceIn: 5n, balanceOut: 0n });
        flow.addFlow(FlowDirection.OUT, 2n);
        expect(flow.balance()).toEqual({ balanceIn: 3n, balanceOut: 0n });
        // Adding flow doesn't move the window
        expect(flow.isExpired(DAILY)).toBe(false);

        flow.expire(WEEKLY, WEEKLY);
        expect(flow.inflow).toBe(0n);
        expect(flow.outflow).toBe(0n);
        expect(flow.periodEnd).toBe(WEEKLY * 2);

        expect(flow.isExpired(WEEKLY + 1)).toBe(false);
        expect(flow.isExpired(WEEKLY * 2)).toBe(false);
        expect(flow.isExpired(WEEKLY * 2 + 1)).toBe(true);
    });

    it('nets large gross flows in both directions down to zero', () => {
        const flow = new Flow(1_000_000n, 1_000_000n, 100);
        expect(flow.balance()).toEqual({ balanceIn: 0n, balanceOut: 0n });
        expect(flow.balanceOn(FlowDirection.IN)).toBe(0n);
        expect(flow.balanceOn(FlowDirection.OUT)).toBe(0n);
    });

    it('compares each direction against its own cap', () => {
        const flow = new Flow(0n, 150n, 100);
        expect(flow.exceeds(FlowDirection.OUT, 10n, 100n)).toBe(true);
        expect(flow.exceeds(FlowDirection.OUT, 10n, 150n)).toBe(false);
        expect(flow.exceeds(FlowDirection.IN, 10n, 100n)).toBe(false);
    });

    it('saturates counters instead of wrapping', () => {
        const flow = Flow.open(0, DAILY);
        flow.addFlow(FlowDirection.IN, UINT128_MAX);
        flow.addFlow(FlowDirection.IN, 5n);
        expect(flow.inflow).toBe(UINT128_MAX);

        flow.undoFlow(FlowDirection.OUT, 25n);
        expect(flow.outflow).toBe(0n);
    });

    it('undoes flow without checking or moving the window', () => {
        const flow = new Flow(0n, 40n, 10);
        flow.undoFlow(FlowDirection.OUT, 15n);
        expect(flow.outflow).toBe(25n);
        expect(flow.periodEnd).toBe(10);

        // Even long after the window ended
        flow.undoFlow(FlowDirection.OUT, 5n);
        expect(flow.periodEnd).toBe(10);
        expect(flow.isExpired(1_000)).toBe(true);
    });

    describe('applyTransfer', () => {
        const quota = new Quota({ name: 'short', maxSend: 1000n, maxReceive: 1000n, duration: 100 });

        it('counts a transfer at exactly periodEnd in the current window', () => {
            const flow = new Flow(0n, 50n, 100);
            expect(flow.applyTransfer(FlowDirection.OUT, 10n, 100, quota)).toBe(false);
            expect(flow.outflow).toBe(60n);
            expect(flow.periodEnd).toBe(100);
        });

        it('anchors the next window on the call that observes expiry', () => {
            const flow = new Flow(30n, 50n, 100);
            expect(flow.applyTransfer(FlowDirection.OUT, 10n, 101, quota)).toBe(true);
            expect(flow.inflow).toBe(0n);
            expect(flow.outflow).toBe(10n);
            expect(flow.periodEnd).toBe(201);
        });

        it('opens a single fresh window after a long idle period', () => {
            const flow = new Flow(0n, 50n, 100);
            flow.applyTransfer(FlowDirection.IN, 7n, 10_000, quota);
            expect(flow.inflow).toBe(7n);
            expect(flow.outflow).toBe(0n);
            expect(flow.periodEnd).toBe(10_100);
        });
    });

    it('treats a zero-length window as expiring right after it opens', () => {
        const flow = Flow.open(10, 0);
        expect(flow.periodEnd).toBe(10);
        expect(flow.isExpired(10)).toBe(false);
        expect(flow.isExpired(11)).toBe(true);
    });
});
