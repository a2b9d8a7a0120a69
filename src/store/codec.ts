import { z } from 'zod';
import { RegistryEncodingError } from '@/errors/app-error';
import { isUint128 } from '@/lib/uint128';
import { RateLimit } from '@/models/rate-limit';

const DECIMAL = /^\d+$/;

const uint128String = z
    .string()
    .regex(DECIMAL, 'expected a decimal string')
    .refine((value) => !DECIMAL.test(value) || isUint128(BigInt(value)), 'exceeds the 128-bit maximum');

const seconds = z.number().int().nonnegative();

const rateLimitRecordSchema = z.object({
    quota: z.object({
        name: z.string(),
        maxSend: uint128String,
        maxReceive: uint128String,
        duration: seconds
    }),
    flow: z.object({
        inflow: uint128String,
        outflow: uint128String,
        periodEnd: seconds
    })
});

const storedRateLimitsSchema = z.array(rateLimitRecordSchema);

export const encodeRateLimits = (limits: RateLimit[]): string =>
    JSON.stringify(limits.map((limit) => limit.toRecord()));

export const decodeRateLimits = (key: string, raw: string): RateLimit[] => {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new RegistryEncodingError(key, error instanceof Error ? error.message : 'invalid JSON');
    }

    const parsed = storedRateLimitsSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new RegistryEncodingError(key, issue ? `${issue.path.map(String).join('.')}: ${issue.message}` : 'invalid shape');
    }
    return parsed.data.map((record) => RateLimit.fromRecord(record));
};
