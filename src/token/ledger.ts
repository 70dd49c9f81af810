import logger from '../logger.js';

/**
 * Fungible token capability consumed by the staking engine. `transfer` moves
 * funds out of the custody account the ledger handle is bound to.
 */
export interface TokenLedger {
    readonly symbol: string;
    balanceOf(account: string): Promise<bigint>;
    transferFrom(from: string, to: string, amount: bigint): Promise<boolean>;
    transfer(to: string, amount: bigint): Promise<boolean>;
}

/**
 * Native currency held by the custody account (only ever swept out).
 */
export interface NativeWallet {
    balance(): Promise<bigint>;
    send(to: string, amount: bigint): Promise<boolean>;
}

export type TokenResolver = (symbol: string) => TokenLedger | undefined;

export class InMemoryTokenLedger implements TokenLedger {
    private readonly balances = new Map<string, bigint>();

    constructor(
        public readonly symbol: string,
        private readonly custody: string
    ) {}

    mint(account: string, amount: bigint): void {
        this.balances.set(account, (this.balances.get(account) ?? 0n) + amount);
    }

    async balanceOf(account: string): Promise<bigint> {
        return this.balances.get(account) ?? 0n;
    }

    async transferFrom(from: string, to: string, amount: bigint): Promise<boolean> {
        return this.move(from, to, amount);
    }

    async transfer(to: string, amount: bigint): Promise<boolean> {
        return this.move(this.custody, to, amount);
    }

    protected move(from: string, to: string, amount: bigint): boolean {
        if (amount < 0n) return false;
        const fromBalance = this.balances.get(from) ?? 0n;
        if (fromBalance < amount) {
            logger.debug(`[token-ledger] ${this.symbol}: ${from} has ${fromBalance}, cannot move ${amount} to ${to}`);
            return false;
        }
        this.balances.set(from, fromBalance - amount);
        this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
        return true;
    }
}

export class InMemoryNativeWallet implements NativeWallet {
    private readonly received = new Map<string, bigint>();

    constructor(private funds: bigint = 0n) {}

    deposit(amount: bigint): void {
        this.funds += amount;
    }

    receivedBy(account: string): bigint {
        return this.received.get(account) ?? 0n;
    }

    async balance(): Promise<bigint> {
        return this.funds;
    }

    async send(to: string, amount: bigint): Promise<boolean> {
        if (amount > this.funds) return false;
        this.funds -= amount;
        this.received.set(to, (this.received.get(to) ?? 0n) + amount);
        return true;
    }
}
