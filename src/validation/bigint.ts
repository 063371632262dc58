import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';

const defaultMaxValue: bigint = toBigInt(config.maxValue);

/**
 * Validates a BigInt value, or its decimal string form, against specified constraints
 * @param allowZero - Whether to allow zero value
 * @param allowNegative - Whether to allow negative values
 * @param minValue - Optional minimum value
 * @param maxValue - Optional maximum value
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    allowNegative = false,
    minValue?: bigint,
    maxValue: bigint = defaultMaxValue
): value is string | bigint {
    let numValue: bigint;
    if (typeof value === 'bigint') {
        numValue = value;
    } else if (typeof value === 'string' && /^-?\d+$/.test(value)) {
        numValue = BigInt(value);
    } else {
        return false;
    }

    if (!allowZero && numValue === toBigInt(0)) return false;
    if (!allowNegative && numValue < toBigInt(0)) return false;
    if (numValue > maxValue) return false;
    if (minValue !== undefined && numValue < minValue) return false;

    return true;
}
