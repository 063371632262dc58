import { FarmError, PartialSettlementFailure, RemoteCallFailure } from '../../farm/errors.js';
import config from '../../config.js';
import validate from '../../validation/index.js';
import { toBigInt } from '../../utils/bigint.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Converts a view into plain JSON: bigints become decimal strings, Maps and Sets become objects and arrays. */
export function toJson(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value)) return value.map(toJson);
    if (value instanceof Set) return [...value].map(toJson);
    if (value instanceof Map) {
        const out: { [key: string]: JsonValue } = {};
        for (const [key, item] of value) out[String(key)] = toJson(item);
        return out;
    }
    if (value instanceof Error) return { name: value.name, message: value.message };
    if (typeof value === 'object') {
        const out: { [key: string]: JsonValue } = {};
        for (const [key, item] of Object.entries(value)) {
            if (item !== undefined) out[key] = toJson(item);
        }
        return out;
    }
    return String(value);
}

export function errorStatus(error: unknown): number {
    if (error instanceof RemoteCallFailure || error instanceof PartialSettlementFailure) return 502;
    if (error instanceof FarmError) {
        switch (error.code) {
            case 'UNAUTHORIZED':
                return 403;
            case 'NOT_REGISTERED':
                return 404;
            case 'INSUFFICIENT_STAKE':
            case 'INSUFFICIENT_ACCRUAL':
                return 409;
            default:
                return 400;
        }
    }
    return 500;
}

export function errorBody(error: unknown): JsonValue {
    if (error instanceof PartialSettlementFailure) {
        return { code: error.code, message: error.message, legs: toJson(error.outcomes) };
    }
    if (error instanceof FarmError) {
        return { code: error.code, message: error.message, details: toJson(error.details) };
    }
    return { code: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : String(error) };
}

export class RequestError extends FarmError {
    constructor(message: string) {
        super('BAD_REQUEST', message);
        this.name = 'RequestError';
    }
}

function field(body: unknown, name: string): unknown {
    if (typeof body !== 'object' || body === null) return undefined;
    return Object.entries(body).find(([key]) => key === name)?.[1];
}

export function readString(body: unknown, name: string, maxLength: number = config.tokenIdMaxLength): string {
    const value = field(body, name);
    if (!validate.string(value, maxLength, 1)) throw new RequestError(`${name} must be a non-empty string`);
    return value;
}

export function readOptionalString(body: unknown, name: string): string | undefined {
    return field(body, name) === undefined ? undefined : readString(body, name);
}

/** Amounts travel as integer strings in base units. */
export function readAmount(body: unknown, name: string): bigint {
    const value = field(body, name);
    if (!validate.bigint(value)) throw new RequestError(`${name} must be a positive integer string`);
    return toBigInt(value);
}

export function readOptionalAmount(body: unknown, name: string): bigint | undefined {
    return field(body, name) === undefined ? undefined : readAmount(body, name);
}

export function readInteger(body: unknown, name: string): number {
    const value = field(body, name);
    if (!validate.integer(value)) throw new RequestError(`${name} must be a positive integer`);
    return value;
}

export function readBoolean(body: unknown, name: string): boolean {
    const value = field(body, name);
    if (!validate.boolean(value)) throw new RequestError(`${name} must be a boolean`);
    return value;
}
