import parallel from 'run-parallel';

import logger from '../logger.js';
import { publishFarmEvent } from '../utils/event-logger.js';
import { accrue, rewardAmounts } from './accumulator.js';
import { InsufficientAccrualError, PartialSettlementFailure, RemoteCallFailure } from './errors.js';
import type {
    FarmState,
    LegOutcome,
    SettlementLeg,
    SettlementOperation,
    SettlementReport,
    Vault,
} from './farm-interfaces.js';
import type { TokenRegistry } from './registry.js';
import { createVault, isVaultEmpty, restoreAmount, restoreBoost, restoreItem } from './stake-ledger.js';

type StandardCallback<T> = (err: Error | null, result?: T) => void;
type AsyncTask<T> = (callback: StandardCallback<T>) => void;
type RewardLeg = Extract<SettlementLeg, { kind: 'reward' }>;

export interface SettlementOptions {
    // 0 disables the timeout
    timeoutMs: number;
    now: () => number;
    onSettled?: (report: SettlementReport) => void;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Runs every task concurrently and settles once all of them have finished,
 * with results in task order. Tasks are started synchronously. When any task
 * rejects, the first rejection is reported after the others have finished.
 */
export function join<T>(tasks: Array<() => Promise<T>>): Promise<T[]> {
    return new Promise((resolve, reject) => {
        const results: T[] = [];
        let firstError: Error | null = null;
        // every task calls back without an error, so run-parallel waits for all of them
        const executions: AsyncTask<void>[] = tasks.map((task, i) => (callback) => {
            task().then(
                (result) => {
                    results[i] = result;
                    callback(null);
                },
                (error: unknown) => {
                    if (!firstError) firstError = error instanceof Error ? error : new Error(String(error));
                    callback(null);
                }
            );
        });
        parallel(executions, () => {
            if (firstError) reject(firstError);
            else resolve(results);
        });
    });
}

/**
 * Moves value out of a farm: amounts are reserved on the ledger first, every
 * leg is dispatched as its own remote call, each leg commits or compensates
 * on its own completion, and the operation finalizes only once all legs are in.
 */
export class SettlementEngine {
    private farm: FarmState;
    private registry: TokenRegistry;
    private options: SettlementOptions;

    constructor(farm: FarmState, registry: TokenRegistry, options: SettlementOptions) {
        this.farm = farm;
        this.registry = registry;
        this.options = options;
    }

    /**
     * Reserves `amount` (all of it when omitted) of the vault's accrued units.
     * Returns null when nothing would be paid.
     */
    reserveReward(vault: Vault, amount?: bigint): RewardLeg | null {
        const units = amount ?? vault.accruedUnits;
        if (units > vault.accruedUnits) {
            throw new InsufficientAccrualError(`Account ${vault.account} has ${vault.accruedUnits} units accrued, requested ${units}`, {
                accrued: vault.accruedUnits.toString(),
                requested: units.toString(),
            });
        }
        if (units === 0n) return null;
        const amounts = rewardAmounts(this.farm, units);
        // too little to pay any token: the units stay accrued
        if (amounts.every((a) => a === 0n)) return null;
        vault.accruedUnits -= units;
        return { kind: 'reward', units, amounts };
    }

    reserveRecovered(vault: Vault, tokenIndex: number): Extract<SettlementLeg, { kind: 'recovered' }> | null {
        const amount = vault.recovered[tokenIndex] ?? 0n;
        if (amount === 0n) return null;
        vault.recovered[tokenIndex] = 0n;
        return { kind: 'recovered', tokenIndex, amount };
    }

    reserveFees(): Extract<SettlementLeg, { kind: 'fees' }> | null {
        const amount = this.farm.feeCollected;
        if (amount === 0n) return null;
        this.farm.feeCollected = 0n;
        return { kind: 'fees', amount };
    }

    /**
     * Dispatches every leg now and returns the join of their reconciliations.
     * Rejects with RemoteCallFailure (one leg) or PartialSettlementFailure
     * (several legs) once all legs are in and at least one failed.
     */
    dispatch(operation: SettlementOperation, account: string, legs: SettlementLeg[]): Promise<SettlementReport> {
        for (const leg of legs) {
            if (leg.kind === 'boost') this.farm.pendingBoost.add(account);
        }
        return join(legs.map((leg) => () => this.runLeg(operation, account, leg))).then((outcomes) =>
            this.finalize(operation, account, outcomes)
        );
    }

    private finalize(operation: SettlementOperation, account: string, outcomes: LegOutcome[]): SettlementReport {
        const report: SettlementReport = { operation, account, legs: outcomes };
        const failed = outcomes.filter((o) => !o.ok);

        if (failed.length === 0) {
            const vault = this.farm.vaults.get(account);
            if (operation === 'close' && vault && isVaultEmpty(vault)) {
                this.farm.vaults.delete(account);
                logger.debug(`[farm-settlement] Vault of ${account} removed`);
            }
            logger.debug(`[farm-settlement] ${operation} for ${account} settled (${outcomes.length} legs)`);
            publishFarmEvent(this.farm.config.farmId, operation, account, { legs: outcomes.length });
        } else {
            logger.warn(`[farm-settlement] ${operation} for ${account}: ${failed.length}/${outcomes.length} legs failed and were compensated`);
            publishFarmEvent(this.farm.config.farmId, 'settlement_failed', account, {
                operation,
                failed: failed.map((o) => o.leg.kind).join(','),
            });
        }
        this.options.onSettled?.(report);

        if (failed.length === 0) return report;
        if (outcomes.length === 1) {
            throw new RemoteCallFailure(outcomes[0].leg, outcomes[0].error ?? 'unknown error');
        }
        throw new PartialSettlementFailure(outcomes);
    }

    private async runLeg(operation: SettlementOperation, account: string, leg: SettlementLeg): Promise<LegOutcome> {
        if (leg.kind === 'reward') return this.runRewardLeg(operation, account, leg);

        const failure = await this.attempt(() => this.call(operation, account, leg));
        if (failure === null) {
            this.commit(account, leg);
            return { leg, ok: true };
        }
        logger.warn(`[farm-settlement] ${leg.kind} leg of ${operation} for ${account} failed: ${failure}`);
        this.compensate(account, leg);
        return { leg, ok: false, error: failure };
    }

    // One credit per reward token, joined into a single leg so that a full
    // failure restores the reserved units exactly.
    private async runRewardLeg(
        operation: SettlementOperation,
        account: string,
        leg: RewardLeg
    ): Promise<LegOutcome> {
        const { rewardTokens } = this.farm.config;
        const indexes = leg.amounts.flatMap((amount, i) => (amount > 0n ? [i] : []));
        const memo = `${this.farm.config.farmId}:${operation}`;
        const failures = await join(
            indexes.map((i) => () => this.attempt(() => this.registry.credit(rewardTokens[i], account, leg.amounts[i], memo)))
        );

        const failedTokens = indexes.filter((_, n) => failures[n] !== null);
        for (const [n, i] of indexes.entries()) {
            if (failures[n] === null) this.farm.totalHarvested[i] += leg.amounts[i];
        }
        if (failedTokens.length === 0) return { leg, ok: true };

        const error = failures.filter((f): f is string => f !== null).join('; ');
        logger.warn(`[farm-settlement] reward leg of ${operation} for ${account} failed for ${failedTokens.length}/${indexes.length} tokens: ${error}`);
        const vault = this.vaultFor(account);
        if (failedTokens.length === indexes.length) {
            vault.accruedUnits += leg.units;
        } else {
            for (const i of failedTokens) vault.recovered[i] += leg.amounts[i];
        }
        return { leg, ok: false, error, failedTokens };
    }

    private call(operation: SettlementOperation, account: string, leg: Exclude<SettlementLeg, { kind: 'reward' }>): Promise<void> {
        const { config } = this.farm;
        const memo = `${config.farmId}:${operation}`;
        switch (leg.kind) {
            case 'recovered':
                return this.registry.credit(config.rewardTokens[leg.tokenIndex], account, leg.amount, memo);
            case 'stake':
                return this.registry.debitTransfer(this.stakeToken(), account, leg.amount - leg.fee, memo);
            case 'fees':
                return this.registry.debitTransfer(this.stakeToken(), config.treasury, leg.amount, memo);
            case 'item':
            case 'boost':
                return this.registry.transferItem(leg.item.collection, account, leg.item.tokenId, memo);
        }
    }

    private stakeToken(): string {
        const { stake } = this.farm.config;
        if (stake.kind !== 'fungible') throw new Error(`Farm ${this.farm.config.farmId} has no stake token`);
        return stake.stakeToken;
    }

    /** Resolves to null on success, or the failure reason. Never rejects. */
    private attempt(call: () => Promise<void>): Promise<string | null> {
        const { timeoutMs } = this.options;
        return new Promise((resolve) => {
            let timer: NodeJS.Timeout | undefined;
            if (timeoutMs > 0) {
                timer = setTimeout(() => resolve(`timed out after ${timeoutMs}ms`), timeoutMs);
            }
            const finish = (failure: string | null): void => {
                if (timer) clearTimeout(timer);
                resolve(failure);
            };
            let pending: Promise<void>;
            try {
                pending = call();
            } catch (error) {
                finish(errorMessage(error));
                return;
            }
            pending.then(
                () => finish(null),
                (error: unknown) => finish(errorMessage(error))
            );
        });
    }

    private commit(account: string, leg: Exclude<SettlementLeg, { kind: 'reward' }>): void {
        if (leg.kind === 'recovered') this.farm.totalHarvested[leg.tokenIndex] += leg.amount;
        else if (leg.kind === 'stake') this.farm.feeCollected += leg.fee;
        else if (leg.kind === 'boost') this.farm.pendingBoost.delete(account);
    }

    private compensate(account: string, leg: Exclude<SettlementLeg, { kind: 'reward' }>): void {
        if (leg.kind === 'fees') {
            this.farm.feeCollected += leg.amount;
            return;
        }
        const vault = this.vaultFor(account);
        switch (leg.kind) {
            case 'recovered':
                vault.recovered[leg.tokenIndex] += leg.amount;
                break;
            case 'stake':
                accrue(this.farm, vault, this.options.now());
                restoreAmount(this.farm, vault, leg.amount);
                break;
            case 'item':
                accrue(this.farm, vault, this.options.now());
                restoreItem(this.farm, vault, leg.item);
                break;
            case 'boost':
                this.farm.pendingBoost.delete(account);
                accrue(this.farm, vault, this.options.now());
                restoreBoost(this.farm, vault, leg.item);
                break;
        }
    }

    // A close may have removed the vault while a leg was in flight.
    private vaultFor(account: string): Vault {
        const existing = this.farm.vaults.get(account);
        if (existing) return existing;
        logger.info(`[farm-settlement] Recreating vault of ${account} to hold compensated amounts`);
        const vault = createVault(this.farm, account);
        this.farm.vaults.set(account, vault);
        return vault;
    }
}
