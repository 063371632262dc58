/**
 * Remote token registries the farm pays out through. Each call resolves once
 * the registry has applied it and rejects when it refused or failed.
 */
export interface TokenRegistry {
    /** Credits (mints) `amount` of a reward token to `receiver`. */
    credit(token: string, receiver: string, amount: bigint, memo: string): Promise<void>;
    /** Transfers `amount` of `token` out of the farm's own balance to `receiver`. */
    debitTransfer(token: string, receiver: string, amount: bigint, memo: string): Promise<void>;
    /** Transfers an item held by the farm back to `receiver`. */
    transferItem(collection: string, receiver: string, tokenId: string, memo: string): Promise<void>;
}

export class RegistryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RegistryError';
    }
}

export interface TransferRecord {
    kind: 'credit' | 'debit_transfer' | 'transfer_item';
    token: string;
    receiver: string;
    amount: bigint;
    tokenId?: string;
    memo: string;
}

/**
 * In-process registry holding balances and item ownership. Receivers must be
 * registered with a token before they can be credited or paid, which is the
 * usual reason a payout fails.
 */
export interface LocalRegistryOptions {
    // treat every account as registered with every token
    autoRegister?: boolean;
}

export class LocalTokenRegistry implements TokenRegistry {
    readonly custodian: string;
    readonly history: TransferRecord[] = [];
    private autoRegister: boolean;
    private balances = new Map<string, Map<string, bigint>>();
    private registered = new Map<string, Set<string>>();
    private owners = new Map<string, Map<string, string>>();

    constructor(custodian: string, options: LocalRegistryOptions = {}) {
        this.custodian = custodian;
        this.autoRegister = options.autoRegister ?? false;
    }

    registerAccount(token: string, account: string): void {
        const accounts = this.registered.get(token) ?? new Set<string>();
        accounts.add(account);
        this.registered.set(token, accounts);
    }

    unregisterAccount(token: string, account: string): void {
        this.registered.get(token)?.delete(account);
    }

    isRegistered(token: string, account: string): boolean {
        if (this.autoRegister) return true;
        return this.registered.get(token)?.has(account) ?? false;
    }

    balanceOf(token: string, account: string): bigint {
        return this.balances.get(token)?.get(account) ?? 0n;
    }

    mint(token: string, account: string, amount: bigint): void {
        this.adjust(token, account, amount);
    }

    mintItem(collection: string, tokenId: string, owner: string): void {
        const items = this.owners.get(collection) ?? new Map<string, string>();
        items.set(tokenId, owner);
        this.owners.set(collection, items);
    }

    ownerOf(collection: string, tokenId: string): string | undefined {
        return this.owners.get(collection)?.get(tokenId);
    }

    /**
     * Moves `amount` from `sender` into the custodian's balance, then lets the
     * custodian react. If `onReceive` throws, the transfer is refunded.
     */
    transferCall<T>(token: string, sender: string, amount: bigint, onReceive: () => T): T {
        const available = this.balanceOf(token, sender);
        if (available < amount) throw new RegistryError(`${sender} holds ${available} ${token}, cannot transfer ${amount}`);
        this.adjust(token, sender, -amount);
        this.adjust(token, this.custodian, amount);
        try {
            return onReceive();
        } catch (error) {
            this.adjust(token, this.custodian, -amount);
            this.adjust(token, sender, amount);
            throw error;
        }
    }

    /** Item counterpart of `transferCall`. */
    transferItemCall<T>(collection: string, tokenId: string, sender: string, onReceive: () => T): T {
        if (this.ownerOf(collection, tokenId) !== sender) throw new RegistryError(`${collection}:${tokenId} is not held by ${sender}`);
        this.mintItem(collection, tokenId, this.custodian);
        try {
            return onReceive();
        } catch (error) {
            this.mintItem(collection, tokenId, sender);
            throw error;
        }
    }

    async credit(token: string, receiver: string, amount: bigint, memo: string): Promise<void> {
        this.requireRegistered(token, receiver);
        this.adjust(token, receiver, amount);
        this.history.push({ kind: 'credit', token, receiver, amount, memo });
    }

    async debitTransfer(token: string, receiver: string, amount: bigint, memo: string): Promise<void> {
        this.requireRegistered(token, receiver);
        const available = this.balanceOf(token, this.custodian);
        if (available < amount) {
            throw new RegistryError(`${this.custodian} holds ${available} ${token}, cannot transfer ${amount}`);
        }
        this.adjust(token, this.custodian, -amount);
        this.adjust(token, receiver, amount);
        this.history.push({ kind: 'debit_transfer', token, receiver, amount, memo });
    }

    async transferItem(collection: string, receiver: string, tokenId: string, memo: string): Promise<void> {
        const owner = this.ownerOf(collection, tokenId);
        if (owner !== this.custodian) {
            throw new RegistryError(`${collection}:${tokenId} is not held by ${this.custodian}`);
        }
        this.mintItem(collection, tokenId, receiver);
        this.history.push({ kind: 'transfer_item', token: collection, receiver, amount: 1n, tokenId, memo });
    }

    private requireRegistered(token: string, account: string): void {
        if (!this.isRegistered(token, account)) {
            throw new RegistryError(`${account} is not registered with ${token}`);
        }
    }

    private adjust(token: string, account: string, delta: bigint): void {
        const accounts = this.balances.get(token) ?? new Map<string, bigint>();
        accounts.set(account, (accounts.get(account) ?? 0n) + delta);
        this.balances.set(token, accounts);
    }
}
