import { BASIS_POINTS } from '../config.js';
import { InsufficientStakeError, ValidationError } from './errors.js';
import type { FarmState, NftRef, StakePolicy, Vault } from './farm-interfaces.js';

type NftPolicy = Extract<StakePolicy, { kind: 'nft' }>;
type FungiblePolicy = Extract<StakePolicy, { kind: 'fungible' }>;

export function createVault(farm: FarmState, account: string): Vault {
    return {
        account,
        weight: 0n,
        checkpoint: farm.rewardPerWeight,
        accruedUnits: 0n,
        staked: 0n,
        stakedItems: new Map(),
        boostItem: null,
        recovered: farm.config.rewardTokens.map(() => 0n),
    };
}

function requireNft(farm: FarmState): NftPolicy {
    if (farm.config.stake.kind !== 'nft') {
        throw new ValidationError(`Farm ${farm.config.farmId} does not accept items`);
    }
    return farm.config.stake;
}

function requireFungible(farm: FarmState): FungiblePolicy {
    if (farm.config.stake.kind !== 'fungible') {
        throw new ValidationError(`Farm ${farm.config.farmId} does not accept fungible stake`);
    }
    return farm.config.stake;
}

function nftWeight(policy: NftPolicy, vault: Vault): bigint {
    let weight = 0n;
    for (const [collection, ids] of vault.stakedItems) {
        weight += BigInt(ids.size) * (policy.stakeCollections.get(collection) ?? 0n);
    }
    if (vault.boostItem) {
        const boost = policy.boostCollections.get(vault.boostItem.collection) ?? 0;
        weight += (weight * BigInt(boost)) / BASIS_POINTS;
    }
    return weight;
}

export function computeWeight(farm: FarmState, vault: Vault): bigint {
    return farm.config.stake.kind === 'fungible' ? vault.staked : nftWeight(farm.config.stake, vault);
}

// Sole place where weight changes; keeps totalWeight equal to the sum over vaults.
function refreshWeight(farm: FarmState, vault: Vault): void {
    const weight = computeWeight(farm, vault);
    farm.totalWeight += weight - vault.weight;
    vault.weight = weight;
}

function countItems(farm: FarmState, collection: string, delta: number): void {
    const next = (farm.totalItems.get(collection) ?? 0) + delta;
    if (next === 0) farm.totalItems.delete(collection);
    else farm.totalItems.set(collection, next);
}

export function listItems(vault: Vault): NftRef[] {
    const items: NftRef[] = [];
    for (const [collection, ids] of vault.stakedItems) {
        for (const tokenId of ids) items.push({ collection, tokenId });
    }
    return items;
}

export function stakeAmount(farm: FarmState, vault: Vault, amount: bigint): void {
    requireFungible(farm);
    if (amount <= 0n) throw new ValidationError('Stake amount must be positive', { amount: amount.toString() });
    vault.staked += amount;
    farm.totalStaked += amount;
    refreshWeight(farm, vault);
}

export function stakeItem(farm: FarmState, vault: Vault, item: NftRef): void {
    const policy = requireNft(farm);
    if (!policy.stakeCollections.has(item.collection)) {
        throw new ValidationError(`Collection ${item.collection} is not accepted by farm ${farm.config.farmId}`);
    }
    const ids = vault.stakedItems.get(item.collection) ?? new Set<string>();
    if (ids.has(item.tokenId)) {
        throw new ValidationError(`Item ${item.collection}:${item.tokenId} is already staked`);
    }
    ids.add(item.tokenId);
    vault.stakedItems.set(item.collection, ids);
    countItems(farm, item.collection, 1);
    refreshWeight(farm, vault);
}

export function stakeBoost(farm: FarmState, vault: Vault, item: NftRef): void {
    const policy = requireNft(farm);
    if (!policy.boostCollections.has(item.collection)) {
        throw new ValidationError(`Collection ${item.collection} is not a boost collection of farm ${farm.config.farmId}`);
    }
    if (vault.boostItem) {
        throw new ValidationError(`Account ${vault.account} already staked a boost item`);
    }
    if (farm.pendingBoost.has(vault.account)) {
        throw new ValidationError(`Boost item of ${vault.account} is still being returned`);
    }
    vault.boostItem = { ...item };
    countItems(farm, item.collection, 1);
    refreshWeight(farm, vault);
}

/** Removes `amount` of fungible stake. Returns the amount leaving the ledger. */
export function unstakeAmount(farm: FarmState, vault: Vault, amount: bigint): bigint {
    requireFungible(farm);
    if (amount <= 0n) throw new ValidationError('Unstake amount must be positive', { amount: amount.toString() });
    if (amount > vault.staked) {
        throw new InsufficientStakeError(`Account ${vault.account} has ${vault.staked} staked, requested ${amount}`, {
            staked: vault.staked.toString(),
            requested: amount.toString(),
        });
    }
    vault.staked -= amount;
    farm.totalStaked -= amount;
    refreshWeight(farm, vault);
    return amount;
}

/** Removes the named item, or every item of the collection when no id is given. */
export function unstakeItems(farm: FarmState, vault: Vault, collection: string, tokenId?: string): NftRef[] {
    requireNft(farm);
    const ids = vault.stakedItems.get(collection);
    if (!ids || ids.size === 0 || (tokenId !== undefined && !ids.has(tokenId))) {
        throw new InsufficientStakeError(
            tokenId !== undefined
                ? `Item ${collection}:${tokenId} is not staked by ${vault.account}`
                : `Account ${vault.account} has no items of ${collection} staked`
        );
    }
    const removed = tokenId !== undefined ? [tokenId] : [...ids];
    for (const id of removed) ids.delete(id);
    if (ids.size === 0) vault.stakedItems.delete(collection);
    countItems(farm, collection, -removed.length);
    refreshWeight(farm, vault);
    return removed.map((id) => ({ collection, tokenId: id }));
}

export function takeBoost(farm: FarmState, vault: Vault): NftRef {
    requireNft(farm);
    const item = vault.boostItem;
    if (!item) throw new InsufficientStakeError(`Account ${vault.account} has no boost item staked`);
    vault.boostItem = null;
    countItems(farm, item.collection, -1);
    refreshWeight(farm, vault);
    return item;
}

export interface UnstakedAll {
    amount: bigint;
    items: NftRef[];
    boost: NftRef | null;
}

export function unstakeAll(farm: FarmState, vault: Vault): UnstakedAll {
    const amount = vault.staked;
    const items = listItems(vault);
    const boost = vault.boostItem;

    farm.totalStaked -= amount;
    for (const item of items) countItems(farm, item.collection, -1);
    if (boost) countItems(farm, boost.collection, -1);

    vault.staked = 0n;
    vault.stakedItems = new Map();
    vault.boostItem = null;
    refreshWeight(farm, vault);
    return { amount, items, boost };
}

export function restoreAmount(farm: FarmState, vault: Vault, amount: bigint): void {
    vault.staked += amount;
    farm.totalStaked += amount;
    refreshWeight(farm, vault);
}

export function restoreItem(farm: FarmState, vault: Vault, item: NftRef): void {
    const ids = vault.stakedItems.get(item.collection) ?? new Set<string>();
    ids.add(item.tokenId);
    vault.stakedItems.set(item.collection, ids);
    countItems(farm, item.collection, 1);
    refreshWeight(farm, vault);
}

export function restoreBoost(farm: FarmState, vault: Vault, item: NftRef): void {
    vault.boostItem = item;
    countItems(farm, item.collection, 1);
    refreshWeight(farm, vault);
}

export function isVaultEmpty(vault: Vault): boolean {
    return (
        vault.weight === 0n &&
        vault.accruedUnits === 0n &&
        vault.staked === 0n &&
        vault.stakedItems.size === 0 &&
        vault.boostItem === null &&
        vault.recovered.every((amount) => amount === 0n)
    );
}
