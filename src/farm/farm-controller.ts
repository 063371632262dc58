import { BASIS_POINTS } from '../config.js';
import logger from '../logger.js';
import settings from '../settings.js';
import { publishFarmEvent } from '../utils/event-logger.js';
import { accrue, farmedTokens, pendingUnits, rewardAmounts } from './accumulator.js';
import { NotRegisteredError, UnauthorizedError, ValidationError } from './errors.js';
import type {
    FarmParams,
    FarmPhase,
    FarmState,
    NftRef,
    SettlementLeg,
    SettlementReceipt,
    SettlementReport,
    Vault,
    VaultStatus,
} from './farm-interfaces.js';
import type { TokenRegistry } from './registry.js';
import { farmingEnd, rewardPerRound, roundIndex, roundTimestamp, roundsBetween } from './round.js';
import { SettlementEngine } from './settlement.js';
import {
    createVault,
    isVaultEmpty,
    listItems,
    stakeAmount,
    stakeBoost,
    stakeItem,
    takeBoost,
    unstakeAll,
    unstakeAmount,
    unstakeItems,
} from './stake-ledger.js';

export interface FarmControllerOptions {
    /** Current unix time in seconds. */
    now?: () => number;
    timeoutMs?: number;
    onSettled?: (report: SettlementReport) => void;
}

export interface ClosedVault {
    units: bigint;
    rewards: bigint[];
    returned: bigint;
    items: NftRef[];
    boost: NftRef | null;
}

const systemNow = (): number => Math.floor(Date.now() / 1000);

/**
 * Public surface of one farm: lifecycle gating, the account operations and
 * the owner's administrative calls. Every operation brings the account
 * current before touching its weight or accrual.
 */
export class FarmController {
    readonly farm: FarmState;
    private settlement: SettlementEngine;
    private now: () => number;

    constructor(farm: FarmState, registry: TokenRegistry, options: FarmControllerOptions = {}) {
        this.farm = farm;
        this.now = options.now ?? systemNow;
        this.settlement = new SettlementEngine(farm, registry, {
            timeoutMs: options.timeoutMs ?? settings.remoteCallTimeoutMs,
            now: this.now,
            onSettled: options.onSettled,
        });
    }

    get farmId(): string {
        return this.farm.config.farmId;
    }

    phase(): FarmPhase {
        if (!this.farm.setupFinalized) return 'setup';
        return this.now() >= farmingEnd(this.farm.schedule) ? 'closed' : 'active';
    }

    register(account: string): boolean {
        if (this.phase() === 'closed') throw new ValidationError(`Farm ${this.farmId} is closed`);
        if (this.farm.vaults.has(account)) return false;
        this.farm.vaults.set(account, createVault(this.farm, account));
        logger.debug(`[farm-register] ${account} registered with ${this.farmId}`);
        publishFarmEvent(this.farmId, 'register', account);
        return true;
    }

    stake(account: string, amount: bigint): bigint {
        const vault = this.openForStake(account);
        accrue(this.farm, vault, this.now());
        stakeAmount(this.farm, vault, amount);
        logger.debug(`[farm-stake] ${account} staked ${amount} in ${this.farmId}, weight ${vault.weight}`);
        publishFarmEvent(this.farmId, 'stake', account, { amount: amount.toString() });
        return vault.weight;
    }

    stakeItem(account: string, collection: string, tokenId: string): bigint {
        const vault = this.openForStake(account);
        accrue(this.farm, vault, this.now());
        stakeItem(this.farm, vault, { collection, tokenId });
        logger.debug(`[farm-stake] ${account} staked ${collection}:${tokenId} in ${this.farmId}, weight ${vault.weight}`);
        publishFarmEvent(this.farmId, 'stake_item', account, { collection, tokenId });
        return vault.weight;
    }

    stakeBoost(account: string, collection: string, tokenId: string): bigint {
        const vault = this.openForStake(account);
        accrue(this.farm, vault, this.now());
        stakeBoost(this.farm, vault, { collection, tokenId });
        logger.debug(`[farm-stake] ${account} staked boost ${collection}:${tokenId} in ${this.farmId}, weight ${vault.weight}`);
        publishFarmEvent(this.farmId, 'stake_boost', account, { collection, tokenId });
        return vault.weight;
    }

    /** Returns `amount` of fungible stake, less the unstake fee. The result is the amount sent. */
    unstake(account: string, amount: bigint): SettlementReceipt<bigint> {
        const vault = this.openForWithdrawal(account);
        accrue(this.farm, vault, this.now());
        const removed = unstakeAmount(this.farm, vault, amount);
        const leg = this.stakeLeg(removed);
        logger.debug(`[farm-unstake] ${account} unstaking ${removed} from ${this.farmId} (fee ${leg.fee})`);
        return { result: removed - leg.fee, settled: this.settlement.dispatch('unstake', account, [leg]) };
    }

    /** Returns one item, or every item of the collection when `tokenId` is omitted. */
    unstakeItem(account: string, collection: string, tokenId?: string): SettlementReceipt<NftRef[]> {
        const vault = this.openForWithdrawal(account);
        accrue(this.farm, vault, this.now());
        const items = unstakeItems(this.farm, vault, collection, tokenId);
        const legs: SettlementLeg[] = items.map((item) => ({ kind: 'item', item }));
        logger.debug(`[farm-unstake] ${account} unstaking ${items.length} item(s) of ${collection} from ${this.farmId}`);
        return { result: items, settled: this.settlement.dispatch('unstake', account, legs) };
    }

    withdrawBoost(account: string): SettlementReceipt<NftRef> {
        const vault = this.openForWithdrawal(account);
        accrue(this.farm, vault, this.now());
        const item = takeBoost(this.farm, vault);
        logger.debug(`[farm-unstake] ${account} withdrawing boost ${item.collection}:${item.tokenId} from ${this.farmId}`);
        return { result: item, settled: this.settlement.dispatch('withdraw_boost', account, [{ kind: 'boost', item }]) };
    }

    /**
     * Pays out `amount` accrued units, or all of them, without unstaking.
     * The result holds the amount of each reward token sent.
     */
    harvest(account: string, amount?: bigint): SettlementReceipt<bigint[]> {
        const vault = this.openForWithdrawal(account);
        if (amount !== undefined && amount <= 0n) throw new ValidationError('Harvest amount must be positive');
        accrue(this.farm, vault, this.now());
        const leg = this.settlement.reserveReward(vault, amount);
        const rewards = leg ? leg.amounts : this.farm.config.rewardTokens.map(() => 0n);
        logger.debug(`[farm-harvest] ${account} harvesting ${leg ? leg.units : 0n} units from ${this.farmId}`);
        return { result: rewards, settled: this.settlement.dispatch('harvest', account, leg ? [leg] : []) };
    }

    /** Unstakes everything, pays every accrued and recovered amount and removes the account once all of it lands. */
    close(account: string): SettlementReceipt<ClosedVault> {
        const vault = this.openForWithdrawal(account);
        accrue(this.farm, vault, this.now());

        if (isVaultEmpty(vault)) {
            this.farm.vaults.delete(account);
            logger.debug(`[farm-close] Empty vault of ${account} removed from ${this.farmId}`);
            const result: ClosedVault = { units: 0n, rewards: vault.recovered.map(() => 0n), returned: 0n, items: [], boost: null };
            return { result, settled: this.settlement.dispatch('close', account, []) };
        }

        const legs: SettlementLeg[] = [];
        const rewardLeg = this.settlement.reserveReward(vault);
        if (rewardLeg) legs.push(rewardLeg);
        else if (vault.accruedUnits > 0n) {
            // units too few to pay any reward token are forfeited on close
            logger.debug(`[farm-close] ${account} forfeits ${vault.accruedUnits} unpayable units in ${this.farmId}`);
            vault.accruedUnits = 0n;
        }
        for (let i = 0; i < vault.recovered.length; i++) {
            const recovered = this.settlement.reserveRecovered(vault, i);
            if (recovered) legs.push(recovered);
        }

        const { amount, items, boost } = unstakeAll(this.farm, vault);
        let returned = 0n;
        if (amount > 0n) {
            const stakeLeg = this.stakeLeg(amount);
            returned = amount - stakeLeg.fee;
            legs.push(stakeLeg);
        }
        for (const item of items) legs.push({ kind: 'item', item });
        if (boost) legs.push({ kind: 'boost', item: boost });

        const result: ClosedVault = {
            units: rewardLeg ? rewardLeg.units : 0n,
            rewards: rewardLeg ? rewardLeg.amounts : vault.recovered.map(() => 0n),
            returned,
            items,
            boost,
        };
        logger.debug(`[farm-close] ${account} closing in ${this.farmId}: ${legs.length} legs`);
        return { result, settled: this.settlement.dispatch('close', account, legs) };
    }

    /** Pays out the amount of `token` left over from an earlier partially failed payout. */
    withdrawRecovered(account: string, token: string): SettlementReceipt<bigint> {
        const vault = this.openForWithdrawal(account);
        const leg = this.settlement.reserveRecovered(vault, this.tokenIndex(token));
        if (!leg) throw new ValidationError(`Account ${account} has no recovered ${token}`);
        return { result: leg.amount, settled: this.settlement.dispatch('withdraw_recovered', account, [leg]) };
    }

    status(account: string): VaultStatus {
        const vault = this.requireVault(account);
        const now = this.now();
        const accruedUnits = pendingUnits(this.farm, vault, now);
        return {
            account,
            weight: vault.weight,
            accruedUnits,
            farmedTokens: rewardAmounts(this.farm, accruedUnits),
            round: roundIndex(this.farm.schedule, now),
            roundTimestamp: roundTimestamp(this.farm.schedule, now),
            staked: vault.staked,
            stakedItems: listItems(vault),
            boostItem: vault.boostItem ? { ...vault.boostItem } : null,
            recovered: [...vault.recovered],
        };
    }

    params(): FarmParams {
        const { config, schedule } = this.farm;
        return {
            farmId: config.farmId,
            ownerId: config.ownerId,
            treasury: config.treasury,
            phase: this.phase(),
            isActive: this.farm.isActive,
            kind: config.stake.kind,
            farmingStart: schedule.farmingStart,
            farmingEnd: farmingEnd(schedule),
            roundDuration: schedule.roundDuration,
            roundsTotal: schedule.roundsTotal,
            rewardPerRound: rewardPerRound(config.totalRewardSupply, schedule),
            totalRewardSupply: config.totalRewardSupply,
            rewardTokens: [...config.rewardTokens],
            rewardTokenRates: [...config.rewardTokenRates],
            deposits: [...this.farm.deposits],
            totalHarvested: [...this.farm.totalHarvested],
            totalWeight: this.farm.totalWeight,
            totalStaked: this.farm.totalStaked,
            totalItems: Object.fromEntries(this.farm.totalItems),
            feeCollected: this.farm.feeCollected,
            accountsRegistered: this.farm.vaults.size,
        };
    }

    expectedDeposit(token: string): bigint {
        const i = this.tokenIndex(token);
        return farmedTokens(this.farm.config.totalRewardSupply, this.farm.config.rewardTokenRates[i]);
    }

    /** Records the reward-token deposit that funds the farm. It must match the expected amount exactly. */
    setupDeposit(token: string, amount: bigint): void {
        if (this.phase() !== 'setup') throw new ValidationError(`Farm ${this.farmId} is already set up`);
        const i = this.tokenIndex(token);
        if (this.farm.deposits[i] !== 0n) throw new ValidationError(`${token} was already deposited`);
        const expected = this.expectedDeposit(token);
        if (amount !== expected) {
            throw new ValidationError(`Deposit of ${token} must be exactly ${expected}, got ${amount}`, {
                expected: expected.toString(),
                received: amount.toString(),
            });
        }
        this.farm.deposits[i] = amount;
        logger.info(`[farm-setup] ${this.farmId} received ${amount} ${token}`);
        publishFarmEvent(this.farmId, 'setup_deposit', token, { amount: amount.toString() });
    }

    finalizeSetup(caller: string): void {
        this.requireOwner(caller);
        if (this.phase() !== 'setup') throw new ValidationError(`Farm ${this.farmId} is already set up`);
        const missing = this.farm.config.rewardTokens.filter((token, i) => this.farm.deposits[i] !== this.expectedDeposit(token));
        if (missing.length > 0) throw new ValidationError(`Missing deposits for ${missing.join(', ')}`);
        if (this.now() >= this.farm.schedule.farmingStart) {
            throw new ValidationError(`Farm ${this.farmId} must be set up before farming starts`);
        }
        this.farm.setupFinalized = true;
        logger.info(`[farm-setup] ${this.farmId} set up, farming from ${this.farm.schedule.farmingStart}`);
        publishFarmEvent(this.farmId, 'finalize_setup', caller);
    }

    setActive(caller: string, active: boolean): void {
        this.requireOwner(caller);
        this.farm.isActive = active;
        logger.info(`[farm-admin] ${this.farmId} ${active ? 'resumed' : 'paused'}`);
        publishFarmEvent(this.farmId, 'set_active', caller, { active });
    }

    /** Moves the farming window. Only possible before farming starts; the end is rounded up to a whole round. */
    setStartEnd(caller: string, start: number, end: number): void {
        this.requireOwner(caller);
        const now = this.now();
        const { schedule } = this.farm;
        if (now >= schedule.farmingStart) throw new ValidationError(`Farming in ${this.farmId} already started`);
        if (start <= now) throw new ValidationError('Farming start must be in the future');
        if (end <= start) throw new ValidationError('Farming end must be after its start');
        const roundsTotal = roundsBetween(start, end, schedule.roundDuration);
        if (this.farm.config.totalRewardSupply < BigInt(roundsTotal)) {
            throw new ValidationError('Window has more rounds than reward units to emit');
        }
        schedule.farmingStart = start;
        schedule.roundsTotal = roundsTotal;
        logger.info(`[farm-admin] ${this.farmId} window moved to ${start}..${farmingEnd(schedule)}`);
        publishFarmEvent(this.farmId, 'set_start_end', caller, { start, end: farmingEnd(schedule) });
    }

    /** Sends collected unstake fees to the treasury. */
    withdrawFees(caller: string): SettlementReceipt<bigint> {
        this.requireOwner(caller);
        if (this.farm.config.stake.kind !== 'fungible') throw new ValidationError(`Farm ${this.farmId} charges no fees`);
        const leg = this.settlement.reserveFees();
        if (!leg) throw new ValidationError(`Farm ${this.farmId} has no fees to withdraw`);
        const treasury = this.farm.config.treasury;
        return { result: leg.amount, settled: this.settlement.dispatch('withdraw_fees', treasury, [leg]) };
    }

    private stakeLeg(amount: bigint): Extract<SettlementLeg, { kind: 'stake' }> {
        const { stake } = this.farm.config;
        const fee = stake.kind === 'fungible' ? (amount * BigInt(stake.feeRate)) / BASIS_POINTS : 0n;
        return { kind: 'stake', amount, fee };
    }

    private tokenIndex(token: string): number {
        const i = this.farm.config.rewardTokens.indexOf(token);
        if (i < 0) throw new ValidationError(`${token} is not a reward token of farm ${this.farmId}`);
        return i;
    }

    private requireOwner(caller: string): void {
        if (caller !== this.farm.config.ownerId) {
            throw new UnauthorizedError(`Only ${this.farm.config.ownerId} can administer farm ${this.farmId}`);
        }
    }

    private requireVault(account: string): Vault {
        const vault = this.farm.vaults.get(account);
        if (!vault) throw new NotRegisteredError(account);
        return vault;
    }

    private openForWithdrawal(account: string): Vault {
        if (!this.farm.isActive) throw new ValidationError(`Farm ${this.farmId} is paused`);
        return this.requireVault(account);
    }

    private openForStake(account: string): Vault {
        const vault = this.openForWithdrawal(account);
        const phase = this.phase();
        if (phase !== 'active') throw new ValidationError(`Farm ${this.farmId} does not accept stake while ${phase}`);
        return vault;
    }
}
