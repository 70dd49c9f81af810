import cloneDeep from 'clone-deep';

import config, { PoolSeed } from '../config.js';
import { toBigInt } from '../utils/bigint.js';
import { ownValue, setOwn } from '../utils/record.js';
import { DepositLedger } from './deposit-ledger.js';
import { PoolRegistry } from './pool-registry.js';
import { StakingParams, StakingSnapshot } from './staking-interfaces.js';

export function defaultParams(overrides: Partial<StakingParams> = {}): StakingParams {
    return {
        aprFactor: config.aprFactor,
        userAprFactor: config.userAprFactor,
        emergencyFee: config.emergencyFee,
        compoundPeriod: config.compoundPeriod,
        stakingSupply: toBigInt(config.stakingSupply),
        paused: false,
        daySeconds: config.daySeconds,
        ...overrides,
    };
}

/**
 * Pool registry, deposit ledger and ledger parameters held as one unit, so a
 * transaction can snapshot and restore all of it together.
 */
export class StakingState {
    private data: StakingSnapshot;

    constructor(data: StakingSnapshot) {
        this.data = data;
    }

    static genesis(params: StakingParams = defaultParams(), pools: PoolSeed[] = config.pools): StakingState {
        const state = new StakingState({
            pools: [],
            deposits: [],
            depositsByOwner: {},
            params,
            bonusAccounts: {},
            lastCompound: {},
        });
        for (const seed of pools) {
            state.pools.create(seed.apr, seed.periodDays);
        }
        return state;
    }

    get pools(): PoolRegistry {
        return new PoolRegistry(this.data.pools);
    }

    get deposits(): DepositLedger {
        return new DepositLedger(this.data.deposits, this.data.depositsByOwner);
    }

    get params(): Readonly<StakingParams> {
        return this.data.params;
    }

    setParams(changes: Partial<StakingParams>): StakingParams {
        this.data.params = { ...this.data.params, ...changes };
        return this.data.params;
    }

    hasBonus(account: string): boolean {
        return ownValue(this.data.bonusAccounts, account) === true;
    }

    setBonus(account: string, enabled: boolean): void {
        if (enabled) {
            setOwn(this.data.bonusAccounts, account, true);
        } else if (Object.hasOwn(this.data.bonusAccounts, account)) {
            delete this.data.bonusAccounts[account];
        }
    }

    // Cooldown is tracked per owner, across all of the owner's deposits
    lastCompoundOf(account: string): number {
        return ownValue(this.data.lastCompound, account) ?? 0;
    }

    markCompounded(account: string, now: number): void {
        setOwn(this.data.lastCompound, account, now);
    }

    /**
     * Takes up to `amount` from the reward budget and returns what was granted.
     */
    drawReward(amount: bigint): bigint {
        const left = this.data.params.stakingSupply;
        const granted = amount < left ? amount : left;
        this.data.params = { ...this.data.params, stakingSupply: left - granted };
        return granted;
    }

    /** Reward budget a draw of `amount` would grant, without taking it. */
    previewReward(amount: bigint): bigint {
        const left = this.data.params.stakingSupply;
        return amount < left ? amount : left;
    }

    snapshot(): StakingSnapshot {
        return cloneDeep(this.data);
    }

    restore(snapshot: StakingSnapshot): void {
        this.data = cloneDeep(snapshot);
    }
}
