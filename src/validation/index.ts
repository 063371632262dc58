import integer from './integer.js';
import string from './string.js';
import bigint from './bigint.js';
import boolean from './boolean.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    integer: (value: unknown, canBeZero?: boolean, canBeNegative?: boolean, max?: number) => value is number;
    string: (value: unknown, maxLength?: number, minLength?: number) => value is string;
    bigint: (value: unknown, allowZero?: boolean, allowNegative?: boolean, minValue?: bigint, maxValue?: bigint) => value is string | bigint;
    boolean: (value: unknown) => value is boolean;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    integer,
    string,
    bigint,
    boolean,
};

export default validation;
