import { FarmController, type FarmControllerOptions } from '../src/farm/farm-controller.js';
import { createFarmState, type FarmDefinition, parseFarmConfig } from '../src/farm/farm-config.js';
import type { TokenRegistry } from '../src/farm/registry.js';

export const SCALE = 10n ** 24n;
export const START = 1_000_000;
export const ROUND = 60;
export const OWNER = 'farm-owner';
export const TREASURY = 'farm-treasury';

export class TestClock {
    t = START - 10 * ROUND;
    now = (): number => this.t;

    atRound(round: number, offset = 0): void {
        this.t = START + round * ROUND + offset;
    }
}

export function fungibleDefinition(overrides: Record<string, unknown> = {}): FarmDefinition {
    return parseFarmConfig({
        farmId: 'lp-farm',
        ownerId: OWNER,
        treasury: TREASURY,
        rewardTokens: ['reward-token'],
        totalRewardSupply: (1000n * SCALE).toString(),
        farmingStart: START,
        roundsTotal: 10,
        roundDuration: ROUND,
        stake: { kind: 'fungible', stakeToken: 'lp-token', feeRate: 0 },
        ...overrides,
    });
}

export function nftDefinition(overrides: Record<string, unknown> = {}): FarmDefinition {
    return parseFarmConfig({
        farmId: 'nft-farm',
        ownerId: OWNER,
        treasury: TREASURY,
        rewardTokens: ['reward-token', 'partner-token'],
        rewardTokenRates: [SCALE.toString(), (SCALE / 2n).toString()],
        totalRewardSupply: (1000n * SCALE).toString(),
        farmingStart: START,
        roundsTotal: 10,
        roundDuration: ROUND,
        stake: {
            kind: 'nft',
            stakeCollections: { 'nft.collection': SCALE.toString(), 'rare.collection': (3n * SCALE).toString() },
            boostCollections: { 'boost.collection': 2500 },
        },
        ...overrides,
    });
}

/** A farm past setup: every reward token deposited and setup finalized, clock before the start. */
export function activeFarm(
    definition: FarmDefinition,
    registry: TokenRegistry,
    clock: TestClock,
    options: FarmControllerOptions = {}
): FarmController {
    const controller = new FarmController(createFarmState(definition), registry, { timeoutMs: 0, now: clock.now, ...options });
    for (const token of definition.config.rewardTokens) {
        controller.setupDeposit(token, controller.expectedDeposit(token));
    }
    controller.finalizeSetup(OWNER);
    return controller;
}

export interface PendingCall {
    kind: 'credit' | 'debit_transfer' | 'transfer_item';
    token: string;
    receiver: string;
    amount: bigint;
    tokenId?: string;
    succeed: () => void;
    fail: (reason: string) => void;
}

/** Registry whose calls stay pending until the test settles them. */
export class DeferredRegistry implements TokenRegistry {
    calls: PendingCall[] = [];

    credit(token: string, receiver: string, amount: bigint): Promise<void> {
        return this.defer({ kind: 'credit', token, receiver, amount });
    }

    debitTransfer(token: string, receiver: string, amount: bigint): Promise<void> {
        return this.defer({ kind: 'debit_transfer', token, receiver, amount });
    }

    transferItem(collection: string, receiver: string, tokenId: string): Promise<void> {
        return this.defer({ kind: 'transfer_item', token: collection, receiver, amount: 1n, tokenId });
    }

    take(kind: PendingCall['kind'], token?: string): PendingCall {
        const index = this.calls.findIndex((c) => c.kind === kind && (token === undefined || c.token === token));
        if (index < 0) throw new Error(`no pending ${kind} call${token ? ` for ${token}` : ''}`);
        return this.calls.splice(index, 1)[0];
    }

    private defer(call: Omit<PendingCall, 'succeed' | 'fail'>): Promise<void> {
        return new Promise((resolve, reject) => {
            this.calls.push({ ...call, succeed: () => resolve(), fail: (reason) => reject(new Error(reason)) });
        });
    }
}

/** Lets pending promise callbacks and run-parallel's deferred completion run. */
export function tick(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
