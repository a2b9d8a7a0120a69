import { ValidationError } from '@/errors/app-error';

export const UINT128_MAX = (1n << 128n) - 1n;

const DECIMAL = /^\d+$/;

export const isUint128 = (value: bigint): boolean => value >= 0n && value <= UINT128_MAX;

export const saturatingAdd = (a: bigint, b: bigint): bigint => {
    const sum = a + b;
    return sum > UINT128_MAX ? UINT128_MAX : sum;
};

export const saturatingSub = (a: bigint, b: bigint): bigint => (a > b ? a - b : 0n);

/**
 * Parses a decimal string or a safe non-negative integer into a uint128.
 * Numbers beyond Number.MAX_SAFE_INTEGER are rejected; send them as strings.
 */
export const parseUint128 = (value: string | number, field = 'amount'): bigint => {
    let parsed: bigint;
    if (typeof value === 'number') {
        if (!Number.isSafeInteger(value) || value < 0) {
            throw new ValidationError(`${field} must be a non-negative safe integer`, { [field]: value });
        }
        parsed = BigInt(value);
    } else {
        if (!DECIMAL.test(value)) {
            throw new ValidationError(`${field} must be a decimal string`, { [field]: value });
        }
        parsed = BigInt(value);
    }

    if (!isUint128(parsed)) {
        throw new ValidationError(`${field} exceeds the 128-bit maximum`, { [field]: value.toString() });
    }
    return parsed;
};
