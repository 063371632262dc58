import { SCALE } from '../config.js';
import type { FarmState, Vault } from './farm-interfaces.js';
import { rewardPerRound, roundIndex } from './round.js';

/**
 * Reward-per-weight as of `round`, without touching the farm. Rounds that
 * elapse while nothing is staked add nothing.
 */
export function computeRewardPerWeight(farm: FarmState, round: number): bigint {
    if (round <= farm.lastCheckpointRound || farm.totalWeight === 0n) {
        return farm.rewardPerWeight;
    }
    const rounds = BigInt(round - farm.lastCheckpointRound);
    const emitted = rounds * rewardPerRound(farm.config.totalRewardSupply, farm.schedule);
    return farm.rewardPerWeight + (emitted * SCALE) / farm.totalWeight;
}

/**
 * Moves the farm checkpoint to `round`. When nobody is staked the checkpoint
 * still moves, so the emission of those rounds is forfeited.
 */
export function updateRewardPerWeight(farm: FarmState, round: number): void {
    if (round <= farm.lastCheckpointRound) return;
    farm.rewardPerWeight = computeRewardPerWeight(farm, round);
    farm.lastCheckpointRound = round;
}

function unitsSince(vault: Vault, rewardPerWeight: bigint): bigint {
    return (vault.weight * (rewardPerWeight - vault.checkpoint)) / SCALE;
}

export function accrueVault(vault: Vault, rewardPerWeight: bigint): void {
    if (vault.checkpoint === rewardPerWeight) return;
    vault.accruedUnits += unitsSince(vault, rewardPerWeight);
    vault.checkpoint = rewardPerWeight;
}

/** Brings the farm and the vault current. Must run before any change to the vault's weight. */
export function accrue(farm: FarmState, vault: Vault, now: number): void {
    updateRewardPerWeight(farm, roundIndex(farm.schedule, now));
    accrueVault(vault, farm.rewardPerWeight);
}

/** Units the vault would hold after `accrue` at `now`. Read-only. */
export function pendingUnits(farm: FarmState, vault: Vault, now: number): bigint {
    const rewardPerWeight = computeRewardPerWeight(farm, roundIndex(farm.schedule, now));
    return vault.accruedUnits + unitsSince(vault, rewardPerWeight);
}

export function farmedTokens(units: bigint, rate: bigint): bigint {
    return (units * rate) / SCALE;
}

/** Splits farm units into the amount owed of every reward token. */
export function rewardAmounts(farm: FarmState, units: bigint): bigint[] {
    return farm.config.rewardTokenRates.map((rate) => farmedTokens(units, rate));
}
