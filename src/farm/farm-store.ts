import type { AnyBulkWriteOperation, Collection, Db } from 'mongodb';

import logger from '../logger.js';
import { ProcessingQueue } from '../processingQueue.js';
import { toBigInt, toDbString } from '../utils/bigint.js';
import type { FarmState, NftRef, StakePolicy, Vault } from './farm-interfaces.js';

// Collection names may contain dots, so they are stored as values, never as keys.
type StakeDocument =
    | { kind: 'fungible'; stakeToken: string; feeRate: number }
    | {
          kind: 'nft';
          stakeCollections: Array<{ collection: string; rate: string }>;
          boostCollections: Array<{ collection: string; boost: number }>;
      };

export interface FarmDocument {
    _id: string;
    ownerId: string;
    treasury: string;
    rewardTokens: string[];
    rewardTokenRates: string[];
    totalRewardSupply: string;
    stake: StakeDocument;
    farmingStart: number;
    roundsTotal: number;
    roundDuration: number;
    setupFinalized: boolean;
    isActive: boolean;
    totalWeight: string;
    rewardPerWeight: string;
    lastCheckpointRound: number;
    deposits: string[];
    totalHarvested: string[];
    totalStaked: string;
    feeCollected: string;
    totalItems: Array<{ collection: string; count: number }>;
    updatedAt: string;
}

export interface VaultDocument {
    _id: string;
    farmId: string;
    account: string;
    weight: string;
    checkpoint: string;
    accruedUnits: string;
    staked: string;
    stakedItems: Array<{ collection: string; tokenIds: string[] }>;
    boostItem: NftRef | null;
    recovered: string[];
}

function toStakeDocument(stake: StakePolicy): StakeDocument {
    if (stake.kind === 'fungible') return { ...stake };
    return {
        kind: 'nft',
        stakeCollections: [...stake.stakeCollections].map(([collection, rate]) => ({ collection, rate: toDbString(rate) })),
        boostCollections: [...stake.boostCollections].map(([collection, boost]) => ({ collection, boost })),
    };
}

function fromStakeDocument(doc: StakeDocument): StakePolicy {
    if (doc.kind === 'fungible') return { ...doc };
    return {
        kind: 'nft',
        stakeCollections: new Map(doc.stakeCollections.map(({ collection, rate }) => [collection, toBigInt(rate)])),
        boostCollections: new Map(doc.boostCollections.map(({ collection, boost }) => [collection, boost])),
    };
}

export function vaultDocumentId(farmId: string, account: string): string {
    return `${farmId}_${account}`;
}

export function toFarmDocument(farm: FarmState, updatedAt: Date = new Date()): FarmDocument {
    const { config, schedule } = farm;
    return {
        _id: config.farmId,
        ownerId: config.ownerId,
        treasury: config.treasury,
        rewardTokens: [...config.rewardTokens],
        rewardTokenRates: config.rewardTokenRates.map((rate) => toDbString(rate)),
        totalRewardSupply: toDbString(config.totalRewardSupply),
        stake: toStakeDocument(config.stake),
        farmingStart: schedule.farmingStart,
        roundsTotal: schedule.roundsTotal,
        roundDuration: schedule.roundDuration,
        setupFinalized: farm.setupFinalized,
        isActive: farm.isActive,
        totalWeight: toDbString(farm.totalWeight),
        rewardPerWeight: toDbString(farm.rewardPerWeight),
        lastCheckpointRound: farm.lastCheckpointRound,
        deposits: farm.deposits.map((d) => toDbString(d)),
        totalHarvested: farm.totalHarvested.map((h) => toDbString(h)),
        totalStaked: toDbString(farm.totalStaked),
        feeCollected: toDbString(farm.feeCollected),
        totalItems: [...farm.totalItems].map(([collection, count]) => ({ collection, count })),
        updatedAt: updatedAt.toISOString(),
    };
}

export function toVaultDocument(farmId: string, vault: Vault): VaultDocument {
    return {
        _id: vaultDocumentId(farmId, vault.account),
        farmId,
        account: vault.account,
        weight: toDbString(vault.weight),
        checkpoint: toDbString(vault.checkpoint),
        accruedUnits: toDbString(vault.accruedUnits),
        staked: toDbString(vault.staked),
        stakedItems: [...vault.stakedItems].map(([collection, ids]) => ({ collection, tokenIds: [...ids] })),
        boostItem: vault.boostItem ? { ...vault.boostItem } : null,
        recovered: vault.recovered.map((r) => toDbString(r)),
    };
}

export function fromVaultDocument(doc: VaultDocument): Vault {
    return {
        account: doc.account,
        weight: toBigInt(doc.weight),
        checkpoint: toBigInt(doc.checkpoint),
        accruedUnits: toBigInt(doc.accruedUnits),
        staked: toBigInt(doc.staked),
        stakedItems: new Map(doc.stakedItems.map(({ collection, tokenIds }) => [collection, new Set(tokenIds)])),
        boostItem: doc.boostItem ? { collection: doc.boostItem.collection, tokenId: doc.boostItem.tokenId } : null,
        recovered: doc.recovered.map((r) => toBigInt(r)),
    };
}

export function fromDocuments(doc: FarmDocument, vaultDocs: VaultDocument[]): FarmState {
    return {
        config: {
            farmId: doc._id,
            ownerId: doc.ownerId,
            treasury: doc.treasury,
            rewardTokens: [...doc.rewardTokens],
            rewardTokenRates: doc.rewardTokenRates.map((rate) => toBigInt(rate)),
            totalRewardSupply: toBigInt(doc.totalRewardSupply),
            stake: fromStakeDocument(doc.stake),
        },
        schedule: {
            farmingStart: doc.farmingStart,
            roundsTotal: doc.roundsTotal,
            roundDuration: doc.roundDuration,
        },
        setupFinalized: doc.setupFinalized,
        isActive: doc.isActive,
        totalWeight: toBigInt(doc.totalWeight),
        rewardPerWeight: toBigInt(doc.rewardPerWeight),
        lastCheckpointRound: doc.lastCheckpointRound,
        deposits: doc.deposits.map((d) => toBigInt(d)),
        totalHarvested: doc.totalHarvested.map((h) => toBigInt(h)),
        totalStaked: toBigInt(doc.totalStaked),
        feeCollected: toBigInt(doc.feeCollected),
        totalItems: new Map(doc.totalItems.map(({ collection, count }) => [collection, count])),
        vaults: new Map(vaultDocs.map((v) => [v.account, fromVaultDocument(v)])),
        pendingBoost: new Set(),
    };
}

/**
 * Snapshots a farm into MongoDB: one document for the farm, one per vault.
 * Snapshots are taken synchronously and written one after another.
 */
export class MongoFarmStore {
    private farms: Collection<FarmDocument>;
    private vaults: Collection<VaultDocument>;
    private writerQueue = new ProcessingQueue();

    constructor(db: Db) {
        this.farms = db.collection<FarmDocument>('farms');
        this.vaults = db.collection<VaultDocument>('vaults');
    }

    async load(farmId: string): Promise<FarmState | null> {
        const doc = await this.farms.findOne({ _id: farmId });
        if (!doc) return null;
        const vaultDocs = await this.vaults.find({ farmId }).toArray();
        logger.info(`[farm-store] Loaded farm ${farmId} with ${vaultDocs.length} vaults`);
        return fromDocuments(doc, vaultDocs);
    }

    async save(farm: FarmState): Promise<void> {
        await this.write(toFarmDocument(farm), this.vaultDocuments(farm));
    }

    /** Queues a snapshot of the farm as it is now. */
    scheduleSave(farm: FarmState): void {
        const farmDoc = toFarmDocument(farm);
        const vaultDocs = this.vaultDocuments(farm);
        this.writerQueue.push((callback) => {
            this.write(farmDoc, vaultDocs).then(
                () => callback(null),
                (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
            );
        });
    }

    flush(): Promise<void> {
        return this.writerQueue.drain();
    }

    private vaultDocuments(farm: FarmState): VaultDocument[] {
        return [...farm.vaults.values()].map((vault) => toVaultDocument(farm.config.farmId, vault));
    }

    private async write(farmDoc: FarmDocument, vaultDocs: VaultDocument[]): Promise<void> {
        const farmId = farmDoc._id;
        await this.farms.replaceOne({ _id: farmId }, farmDoc, { upsert: true });
        const ops: AnyBulkWriteOperation<VaultDocument>[] = vaultDocs.map((doc) => ({
            replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true },
        }));
        if (ops.length > 0) await this.vaults.bulkWrite(ops, { ordered: false });
        const removed = await this.vaults.deleteMany({ farmId, _id: { $nin: vaultDocs.map((doc) => doc._id) } });
        logger.debug(`[farm-store] Saved ${farmId}: ${vaultDocs.length} vaults, ${removed.deletedCount} removed`);
    }
}
