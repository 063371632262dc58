import type { LegOutcome, SettlementLeg } from './farm-interfaces.js';

export class FarmError extends Error {
    code: string;
    details?: unknown;

    constructor(code: string, message: string, details?: unknown) {
        super(message);
        this.code = code;
        this.details = details;
        this.name = 'FarmError';
    }
}

export class ValidationError extends FarmError {
    constructor(message: string, details?: unknown) {
        super('VALIDATION_ERROR', message, details);
        this.name = 'ValidationError';
    }
}

export class UnauthorizedError extends FarmError {
    constructor(message: string, details?: unknown) {
        super('UNAUTHORIZED', message, details);
        this.name = 'UnauthorizedError';
    }
}

export class NotRegisteredError extends FarmError {
    constructor(account: string) {
        super('NOT_REGISTERED', `Account ${account} is not registered`, { account });
        this.name = 'NotRegisteredError';
    }
}

export class InsufficientStakeError extends FarmError {
    constructor(message: string, details?: unknown) {
        super('INSUFFICIENT_STAKE', message, details);
        this.name = 'InsufficientStakeError';
    }
}

export class InsufficientAccrualError extends FarmError {
    constructor(message: string, details?: unknown) {
        super('INSUFFICIENT_ACCRUAL', message, details);
        this.name = 'InsufficientAccrualError';
    }
}

/** A single remote call failed or timed out. The ledger has been compensated. */
export class RemoteCallFailure extends FarmError {
    leg: SettlementLeg;

    constructor(leg: SettlementLeg, reason: string) {
        super('REMOTE_CALL_FAILED', `Remote ${leg.kind} call failed: ${reason}`, { reason });
        this.leg = leg;
        this.name = 'RemoteCallFailure';
    }
}

/** At least one leg of a multi-leg payout failed; every failed leg has been compensated. */
export class PartialSettlementFailure extends FarmError {
    outcomes: LegOutcome[];

    constructor(outcomes: LegOutcome[]) {
        const failed = outcomes.filter((o) => !o.ok);
        super(
            'PARTIAL_SETTLEMENT_FAILURE',
            `${failed.length} of ${outcomes.length} settlement legs failed: ${failed.map((o) => o.leg.kind).join(', ')}`,
            { failed: failed.map((o) => ({ kind: o.leg.kind, error: o.error })) }
        );
        this.outcomes = outcomes;
        this.name = 'PartialSettlementFailure';
    }
}
