import { BigIntMath } from '../utils/bigint.js';
import { ownValue, setOwn } from '../utils/record.js';
import { reject } from './errors.js';
import { DepositData, ExitMode, PoolData } from './staking-interfaces.js';

/**
 * Append-only deposit list plus a per-owner index in insertion order.
 * The index keeps ended deposits; callers filter on `ended`.
 */
export class DepositLedger {
    constructor(
        private readonly deposits: DepositData[],
        private readonly byOwner: Record<string, number[]>
    ) {}

    open(owner: string, pool: PoolData, amount: bigint, now: number, daySeconds: number): DepositData {
        const deposit: DepositData = {
            depositId: this.deposits.length,
            poolId: pool.id,
            owner,
            amount,
            compounded: 0n,
            startDate: now,
            endDate: now + pool.periodInDays * daySeconds,
            ended: false,
        };
        this.deposits.push(deposit);
        const ids = ownValue(this.byOwner, owner);
        if (ids) {
            ids.push(deposit.depositId);
        } else {
            setOwn(this.byOwner, owner, [deposit.depositId]);
        }
        return deposit;
    }

    exists(depositId: number): boolean {
        return Number.isSafeInteger(depositId) && depositId >= 0 && depositId < this.deposits.length;
    }

    get(depositId: number): DepositData {
        if (!this.exists(depositId)) {
            throw reject('InvalidDepositId', `[deposit-ledger] Deposit ${depositId} does not exist.`);
        }
        return this.deposits[depositId];
    }

    get size(): number {
        return this.deposits.length;
    }

    active(): DepositData[] {
        return this.deposits.filter(deposit => !deposit.ended);
    }

    ofOwner(owner: string): DepositData[] {
        return (ownValue(this.byOwner, owner) ?? []).map(id => this.deposits[id]);
    }

    idsOf(owner: string): number[] {
        return [...(ownValue(this.byOwner, owner) ?? [])];
    }

    totalStakedBy(owner: string): bigint {
        return BigIntMath.sum(this.ofOwner(owner).filter(deposit => !deposit.ended).map(deposit => deposit.amount));
    }

    activeInPool(poolId: number): number {
        return this.deposits.filter(deposit => deposit.poolId === poolId && !deposit.ended).length;
    }

    totalActivePrincipal(): bigint {
        return BigIntMath.sum(this.active().map(deposit => deposit.amount));
    }

    /** Folds a reward into principal before maturity. */
    credit(depositId: number, reward: bigint): DepositData {
        const deposit = this.get(depositId);
        const updated: DepositData = {
            ...deposit,
            amount: deposit.amount + reward,
            compounded: deposit.compounded + reward,
        };
        this.deposits[depositId] = updated;
        return updated;
    }

    /** Terminal transition: zeroes principal and marks the deposit ended. */
    close(depositId: number, now: number, mode: ExitMode): DepositData {
        const deposit = this.get(depositId);
        const closed: DepositData = {
            ...deposit,
            amount: 0n,
            ended: true,
            closedAt: now,
            exitMode: mode,
        };
        this.deposits[depositId] = closed;
        return closed;
    }
}
