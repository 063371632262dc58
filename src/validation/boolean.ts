const validateBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

export default validateBoolean;
