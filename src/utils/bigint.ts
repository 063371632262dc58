import config from '../config.js';

// Maximum expected length for any stored BigInt value. Reward-per-weight is scaled
// by 1e24 on top of the reward units, so the default leaves generous headroom.
const MAX_INTEGER_LENGTH = config.dbStringLength;

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value)); // Convert numbers safely
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to BigInt and then to a zero-padded string suitable for database storage
 * Ensures correct lexicographical sorting in MongoDB
 * @param padLength Optional custom pad length
 */
export function toDbString(value: number | string | bigint, padLength = MAX_INTEGER_LENGTH): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}
