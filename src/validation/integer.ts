/**
 * Validates integer values like timestamps, round counts and basis points
 * @param canBeZero Whether the value can be zero
 * @param canBeNegative Whether the value can be negative
 * @param max Maximum allowed value
 */
const validateInteger = (
    value: unknown,
    canBeZero = false,
    canBeNegative = false,
    max: number = Number.MAX_SAFE_INTEGER
): value is number => {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) return false;
    if (!canBeZero && value === 0) return false;
    if (!canBeNegative && value < 0) return false;
    return value <= max;
};

export default validateInteger;
