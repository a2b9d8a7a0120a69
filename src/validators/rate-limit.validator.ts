import { z } from 'zod';
import { FlowDirection } from '@/types/enums';
import { LIMITS } from '@/constants';
import { parseUint128 } from '@/lib/uint128';

// Identifiers are compared verbatim, so surrounding whitespace is rejected rather than stripped.
const identifier = (field: string, maxLength: number = LIMITS.MAX_ID_LENGTH) =>
    z
        .string()
        .min(1, `${field} is required`)
        .max(maxLength, `${field} must be at most ${maxLength} characters`)
        .refine((value) => value.trim() === value, `${field} must not have leading or trailing whitespace`);

const uint128 = (field: string) =>
    z.union([z.string(), z.number()]).transform((value, ctx) => {
        try {
            return parseUint128(value, field);
        } catch (error) {
            ctx.addIssue({ code: 'custom', message: error instanceof Error ? error.message : `invalid ${field}` });
            return z.NEVER;
        }
    });

export const pathSchema = z.object({
    owner: identifier('owner'),
    channel: identifier('channel'),
    asset: identifier('asset')
});

export const quotaSchema = z.object({
    name: identifier('quota name', LIMITS.MAX_QUOTA_NAME_LENGTH),
    duration: z
        .number()
        .int('duration must be whole seconds')
        .nonnegative('duration must not be negative')
        .max(LIMITS.MAX_QUOTA_DURATION, `duration must be at most ${LIMITS.MAX_QUOTA_DURATION} seconds`),
    maxSend: uint128('maxSend'),
    maxReceive: uint128('maxReceive')
});

export const registerPathSchema = pathSchema.extend({
    quotas: z
        .array(quotaSchema)
        .max(LIMITS.MAX_QUOTAS_PER_PATH, `at most ${LIMITS.MAX_QUOTAS_PER_PATH} quotas per path`)
        .refine(
            (quotas) => new Set(quotas.map((q) => q.name)).size === quotas.length,
            'quota names must be unique within a path'
        )
});

export const bootstrapPathsSchema = z.array(registerPathSchema);

export const transferSchema = pathSchema.extend({
    direction: z.enum(FlowDirection),
    amount: uint128('amount')
});

export const reversalSchema = pathSchema.extend({
    amount: uint128('amount')
});

export const resetQuotaParamsSchema = pathSchema.extend({
    quotaName: identifier('quotaName', LIMITS.MAX_QUOTA_NAME_LENGTH)
});

export type RegisterPathPayload = z.infer<typeof registerPathSchema>;
export type TransferPayload = z.infer<typeof transferSchema>;
export type ReversalPayload = z.infer<typeof reversalSchema>;
