import config, { SCALE } from '../config.js';
import { toBigInt } from '../utils/bigint.js';
import validate from '../validation/index.js';
import { ValidationError } from './errors.js';
import type { FarmConfig, FarmSchedule, FarmState, StakePolicy } from './farm-interfaces.js';
import { roundsBetween } from './round.js';

export interface FarmDefinition {
    config: FarmConfig;
    schedule: FarmSchedule;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireName(value: unknown, field: string): string {
    if (!validate.string(value, config.accountNameMaxLength, 1)) {
        throw new ValidationError(`${field} must be a non-empty string of at most ${config.accountNameMaxLength} characters`);
    }
    return value;
}

function requireAmount(value: unknown, field: string, allowZero = false): bigint {
    if (!validate.bigint(value, allowZero)) {
        throw new ValidationError(`${field} must be a ${allowZero ? 'non-negative' : 'positive'} integer string`);
    }
    return toBigInt(value);
}

function requireInteger(value: unknown, field: string, canBeZero = false, max?: number): number {
    if (!validate.integer(value, canBeZero, false, max)) {
        throw new ValidationError(`${field} must be a ${canBeZero ? 'non-negative' : 'positive'} integer${max ? ` up to ${max}` : ''}`);
    }
    return value;
}

function parseStake(raw: unknown): StakePolicy {
    if (!isRecord(raw)) throw new ValidationError('stake must be an object');
    if (raw.kind === 'fungible') {
        return {
            kind: 'fungible',
            stakeToken: requireName(raw.stakeToken, 'stake.stakeToken'),
            feeRate: raw.feeRate === undefined ? 0 : requireInteger(raw.feeRate, 'stake.feeRate', true, config.maxFeeRate),
        };
    }
    if (raw.kind === 'nft') {
        if (!isRecord(raw.stakeCollections) || Object.keys(raw.stakeCollections).length === 0) {
            throw new ValidationError('stake.stakeCollections must map at least one collection to a per-item weight');
        }
        const stakeCollections = new Map<string, bigint>();
        for (const [collection, rate] of Object.entries(raw.stakeCollections)) {
            stakeCollections.set(requireName(collection, 'collection'), requireAmount(rate, `stake.stakeCollections.${collection}`));
        }
        const boostCollections = new Map<string, number>();
        const rawBoost = raw.boostCollections ?? {};
        if (!isRecord(rawBoost)) throw new ValidationError('stake.boostCollections must be an object');
        for (const [collection, boost] of Object.entries(rawBoost)) {
            boostCollections.set(
                requireName(collection, 'collection'),
                requireInteger(boost, `stake.boostCollections.${collection}`, false, config.maxBoost)
            );
        }
        return { kind: 'nft', stakeCollections, boostCollections };
    }
    throw new ValidationError(`stake.kind must be "fungible" or "nft"`);
}

/**
 * Validates a farm definition read from JSON. Amounts are integer strings in
 * base units; the window is given as `roundsTotal` or as a `farmingEnd` time.
 */
export function parseFarmConfig(raw: unknown): FarmDefinition {
    if (!isRecord(raw)) throw new ValidationError('Farm config must be an object');

    const rewardTokens = raw.rewardTokens;
    if (!Array.isArray(rewardTokens) || rewardTokens.length === 0) {
        throw new ValidationError('rewardTokens must list at least one token');
    }
    const tokens = rewardTokens.map((token, i) => requireName(token, `rewardTokens[${i}]`));
    if (new Set(tokens).size !== tokens.length) throw new ValidationError('rewardTokens must not repeat');

    // A single reward token pays one token unit per farm unit unless told otherwise
    const rawRates = raw.rewardTokenRates ?? tokens.map(() => SCALE.toString());
    if (!Array.isArray(rawRates) || rawRates.length !== tokens.length) {
        throw new ValidationError('rewardTokenRates must have one rate per reward token');
    }
    const rates = rawRates.map((rate, i) => requireAmount(rate, `rewardTokenRates[${i}]`));

    const roundDuration =
        raw.roundDuration === undefined ? config.defaultRoundDuration : requireInteger(raw.roundDuration, 'roundDuration');
    const farmingStart = requireInteger(raw.farmingStart, 'farmingStart');
    let roundsTotal: number;
    if (raw.roundsTotal !== undefined) {
        roundsTotal = requireInteger(raw.roundsTotal, 'roundsTotal', false, config.maxRounds);
    } else {
        const end = requireInteger(raw.farmingEnd, 'farmingEnd');
        if (end <= farmingStart) throw new ValidationError('farmingEnd must be after farmingStart');
        roundsTotal = requireInteger(roundsBetween(farmingStart, end, roundDuration), 'roundsTotal', false, config.maxRounds);
    }

    const totalRewardSupply = requireAmount(raw.totalRewardSupply, 'totalRewardSupply');
    if (totalRewardSupply < BigInt(roundsTotal)) {
        throw new ValidationError('totalRewardSupply must emit at least one unit per round');
    }

    return {
        config: {
            farmId: requireName(raw.farmId, 'farmId'),
            ownerId: requireName(raw.ownerId, 'ownerId'),
            treasury: requireName(raw.treasury ?? raw.ownerId, 'treasury'),
            rewardTokens: tokens,
            rewardTokenRates: rates,
            totalRewardSupply,
            stake: parseStake(raw.stake),
        },
        schedule: { farmingStart, roundsTotal, roundDuration },
    };
}

export function createFarmState(definition: FarmDefinition): FarmState {
    const { config: farmConfig, schedule } = definition;
    return {
        config: farmConfig,
        schedule: { ...schedule },
        setupFinalized: false,
        isActive: true,
        totalWeight: 0n,
        rewardPerWeight: 0n,
        lastCheckpointRound: 0,
        deposits: farmConfig.rewardTokens.map(() => 0n),
        totalHarvested: farmConfig.rewardTokens.map(() => 0n),
        totalStaked: 0n,
        feeCollected: 0n,
        totalItems: new Map(),
        vaults: new Map(),
        pendingBoost: new Set(),
    };
}
