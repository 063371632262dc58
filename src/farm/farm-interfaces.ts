export type FarmPhase = 'setup' | 'active' | 'closed';

export interface NftRef {
    collection: string;
    tokenId: string;
}

/**
 * How weight is derived from deposits. Fungible farms stake one token and
 * may charge a fee on returned stake; NFT farms weigh each accepted
 * collection by a per-item rate and accept one boost item per account.
 */
export type StakePolicy =
    | {
          kind: 'fungible';
          stakeToken: string;
          feeRate: number; // basis points, charged on returned stake
      }
    | {
          kind: 'nft';
          stakeCollections: Map<string, bigint>; // collection -> weight per item
          boostCollections: Map<string, number>; // collection -> boost in basis points
      };

export interface FarmConfig {
    farmId: string;
    ownerId: string;
    treasury: string;
    rewardTokens: string[];
    rewardTokenRates: bigint[]; // farm units -> token amount, scaled by SCALE
    totalRewardSupply: bigint; // farm units
    stake: StakePolicy;
}

export interface FarmSchedule {
    farmingStart: number; // unix seconds
    roundsTotal: number;
    roundDuration: number; // seconds
}

export interface Vault {
    account: string;
    weight: bigint;
    checkpoint: bigint;
    accruedUnits: bigint;
    staked: bigint;
    stakedItems: Map<string, Set<string>>;
    boostItem: NftRef | null;
    // token amounts left over from partially failed reward payouts, per reward token
    recovered: bigint[];
}

export interface FarmState {
    config: FarmConfig;
    schedule: FarmSchedule;
    setupFinalized: boolean;
    isActive: boolean;
    totalWeight: bigint;
    rewardPerWeight: bigint;
    lastCheckpointRound: number;
    deposits: bigint[];
    totalHarvested: bigint[];
    totalStaked: bigint;
    feeCollected: bigint;
    totalItems: Map<string, number>;
    vaults: Map<string, Vault>;
    // accounts whose boost item is on its way back; not persisted
    pendingBoost: Set<string>;
}

export interface VaultStatus {
    account: string;
    weight: bigint;
    accruedUnits: bigint;
    farmedTokens: bigint[];
    round: number;
    roundTimestamp: number;
    staked: bigint;
    stakedItems: NftRef[];
    boostItem: NftRef | null;
    recovered: bigint[];
}

export interface FarmParams {
    farmId: string;
    ownerId: string;
    treasury: string;
    phase: FarmPhase;
    isActive: boolean;
    kind: StakePolicy['kind'];
    farmingStart: number;
    farmingEnd: number;
    roundDuration: number;
    roundsTotal: number;
    rewardPerRound: bigint;
    totalRewardSupply: bigint;
    rewardTokens: string[];
    rewardTokenRates: bigint[];
    deposits: bigint[];
    totalHarvested: bigint[];
    totalWeight: bigint;
    totalStaked: bigint;
    totalItems: Record<string, number>;
    feeCollected: bigint;
    accountsRegistered: number;
}

export type SettlementLeg =
    | { kind: 'reward'; units: bigint; amounts: bigint[] }
    | { kind: 'recovered'; tokenIndex: number; amount: bigint }
    | { kind: 'stake'; amount: bigint; fee: bigint }
    | { kind: 'item'; item: NftRef }
    | { kind: 'boost'; item: NftRef }
    | { kind: 'fees'; amount: bigint };

export type SettlementOperation =
    | 'harvest'
    | 'unstake'
    | 'close'
    | 'withdraw_boost'
    | 'withdraw_recovered'
    | 'withdraw_fees';

export interface LegOutcome {
    leg: SettlementLeg;
    ok: boolean;
    error?: string;
    // reward legs only: indexes of the reward tokens whose credit failed
    failedTokens?: number[];
}

export interface SettlementReport {
    operation: SettlementOperation;
    account: string;
    legs: LegOutcome[];
}

/**
 * Result of an operation that moves value out of the farm. `result` is known
 * as soon as the call returns; `settled` resolves once every remote call has
 * reconciled and rejects when any of them failed.
 */
export interface SettlementReceipt<T> {
    result: T;
    settled: Promise<SettlementReport>;
}
