/**
 * Validates names: accounts, token ids, collections.
 * @param maxLength Maximum length (optional)
 * @param minLength Minimum length (optional)
 */
const validateString = (value: unknown, maxLength = Number.MAX_SAFE_INTEGER, minLength = 0): value is string =>
    typeof value === 'string' && value.length <= maxLength && value.length >= minLength;

export default validateString;
