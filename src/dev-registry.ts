import type { FarmController } from './farm/farm-controller.js';
import { ValidationError } from './farm/errors.js';
import { LocalTokenRegistry } from './farm/registry.js';
import type { DepositIntake } from './modules/http/farms.js';
import validate from './validation/index.js';
import { toBigInt } from './utils/bigint.js';

/*
 * Development wiring: the server runs against an in-process registry seeded
 * from the `registry` section of the farm config file, e.g.
 *
 *   "registry": {
 *     "balances": [{ "token": "lp-token", "account": "alice", "amount": "1000" }],
 *     "items": [{ "collection": "nft-collection", "tokenId": "1", "owner": "alice" }]
 *   }
 */

function entries(raw: unknown, key: string): Record<string, unknown>[] {
    if (typeof raw !== 'object' || raw === null) return [];
    const list = Object.entries(raw).find(([k]) => k === key)?.[1];
    if (list === undefined) return [];
    if (!Array.isArray(list)) throw new ValidationError(`registry.${key} must be an array`);
    return list.map((item, i) => {
        if (typeof item !== 'object' || item === null) throw new ValidationError(`registry.${key}[${i}] must be an object`);
        return Object.fromEntries(Object.entries(item));
    });
}

function text(entry: Record<string, unknown>, field: string): string {
    const value = entry[field];
    if (!validate.string(value, 128, 1)) throw new ValidationError(`registry entry is missing ${field}`);
    return value;
}

export function seedLocalRegistry(registry: LocalTokenRegistry, raw: unknown): void {
    for (const entry of entries(raw, 'balances')) {
        const amount = entry.amount;
        if (!validate.bigint(amount)) throw new ValidationError('registry balance amount must be a positive integer string');
        registry.mint(text(entry, 'token'), text(entry, 'account'), toBigInt(amount));
    }
    for (const entry of entries(raw, 'items')) {
        registry.mintItem(text(entry, 'collection'), text(entry, 'tokenId'), text(entry, 'owner'));
    }
}

/** Takes custody of stake and setup deposits in the local registry before the farm records them. */
export function localIntake(controller: FarmController, registry: LocalTokenRegistry): DepositIntake {
    return {
        stake: (account, amount) => {
            const { stake } = controller.farm.config;
            if (stake.kind !== 'fungible') return controller.stake(account, amount);
            return registry.transferCall(stake.stakeToken, account, amount, () => controller.stake(account, amount));
        },
        stakeItem: (account, collection, tokenId) =>
            registry.transferItemCall(collection, tokenId, account, () => controller.stakeItem(account, collection, tokenId)),
        stakeBoost: (account, collection, tokenId) =>
            registry.transferItemCall(collection, tokenId, account, () => controller.stakeBoost(account, collection, tokenId)),
        setupDeposit: (sender, token, amount) =>
            registry.transferCall(token, sender, amount, () => controller.setupDeposit(token, amount)),
    };
}
