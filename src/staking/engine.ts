import { AccessControl } from '../access.js';
import { Clock, systemClock } from '../clock.js';
import config from '../config.js';
import logger from '../logger.js';
import ProcessingQueue from '../processingQueue.js';
import { StakingContext } from '../transactions/context.js';
import { Transaction, getHandler, transactionHandlers } from '../transactions/index.js';
import { TransactionResultMap, TransactionType, transactions } from '../transactions/types.js';
import { CompoundResult, EmergencyWithdrawResult, StakeResult, UnstakeResult } from '../transactions/staking/staking-interfaces.js';
import { NativeWallet, TokenLedger, TokenResolver } from '../token/ledger.js';
import { deterministicIdFrom } from '../utils/deterministic-id.js';
import { EventBuffer, EventLog } from '../utils/event-logger.js';
import { reject } from './errors.js';
import { pendingRewardFor } from './reward.js';
import { DepositData, PoolData, StakingParams } from './staking-interfaces.js';
import { StakingState } from './state.js';
import { StateStore } from './store.js';

export interface StakingEngineOptions {
    token: TokenLedger;
    access: AccessControl;
    state?: StakingState;
    tokens?: TokenResolver;
    native?: NativeWallet;
    clock?: Clock;
    custody?: string;
    store?: StateStore;
    eventLog?: EventLog;
}

/**
 * Serializes every transaction through one queue. Each runs validate, then
 * process against a snapshot that is restored if processing throws; events
 * and persistence happen only after a successful process.
 */
export class StakingEngine {
    readonly state: StakingState;
    readonly events: EventLog;
    readonly custody: string;
    readonly token: TokenLedger;
    private readonly tokens: TokenResolver;
    private readonly native?: NativeWallet;
    private readonly access: AccessControl;
    private readonly clock: Clock;
    private readonly store?: StateStore;
    private readonly queue = new ProcessingQueue();
    private sequence = 0;

    constructor(options: StakingEngineOptions) {
        this.state = options.state ?? StakingState.genesis();
        this.token = options.token;
        this.tokens = options.tokens ?? (() => undefined);
        this.native = options.native;
        this.access = options.access;
        this.clock = options.clock ?? systemClock;
        this.custody = options.custody ?? config.custodyAccount;
        this.store = options.store;
        this.events = options.eventLog ?? new EventLog();
    }

    /**
     * Builds an engine from the store's last snapshot, or from genesis when the store is empty.
     */
    static async load(options: StakingEngineOptions & { store: StateStore }): Promise<StakingEngine> {
        const snapshot = await options.store.load();
        if (snapshot) {
            logger.info(`[engine] Restored ${snapshot.pools.length} pool(s) and ${snapshot.deposits.length} deposit(s) from ${options.store.name}.`);
            return new StakingEngine({ ...options, state: new StakingState(snapshot) });
        }
        const engine = new StakingEngine(options);
        await options.store.save(engine.state.snapshot());
        logger.info(`[engine] Initialized ${engine.state.pools.size} pool(s) in ${options.store.name}.`);
        return engine;
    }

    submit<T extends TransactionType>(tx: Transaction<T>): Promise<TransactionResultMap[T]> {
        return this.queue.run(() => this.execute(tx));
    }

    stake(sender: string, poolId: number, amount: bigint | string): Promise<StakeResult> {
        return this.submit({ type: TransactionType.STAKING_STAKE, sender, data: { poolId, amount } });
    }

    unstake(sender: string, depositId: number): Promise<UnstakeResult> {
        return this.submit({ type: TransactionType.STAKING_UNSTAKE, sender, data: { depositId } });
    }

    compound(sender: string, depositId: number): Promise<CompoundResult> {
        return this.submit({ type: TransactionType.STAKING_COMPOUND, sender, data: { depositId } });
    }

    emergencyWithdraw(sender: string, depositId: number): Promise<EmergencyWithdrawResult> {
        return this.submit({ type: TransactionType.STAKING_EMERGENCY_WITHDRAW, sender, data: { depositId } });
    }

    getPool(poolId: number): PoolData {
        return { ...this.state.pools.get(poolId) };
    }

    getPools(): PoolData[] {
        return this.state.pools.list().map(pool => ({ ...pool }));
    }

    getAprs(): number[] {
        return this.state.pools.aprs();
    }

    getDeposit(depositId: number): DepositData {
        return { ...this.state.deposits.get(depositId) };
    }

    getDepositsOf(owner: string): DepositData[] {
        return this.state.deposits.ofOwner(owner).map(deposit => ({ ...deposit }));
    }

    getTotalStakedByUser(owner: string): bigint {
        return this.state.deposits.totalStakedBy(owner);
    }

    /** Reward the deposit would earn at `at`, cut to what is left of the staking supply. */
    pendingReward(depositId: number, at: number = this.clock.now()): bigint {
        const deposit = this.state.deposits.get(depositId);
        const pool = this.state.pools.get(deposit.poolId);
        return this.state.previewReward(pendingRewardFor(deposit, pool, this.state.params, this.state.hasBonus(deposit.owner), at));
    }

    getParams(): StakingParams {
        return { ...this.state.params };
    }

    getAmountLeftForStaking(): bigint {
        return this.state.params.stakingSupply;
    }

    isBonusUser(account: string): boolean {
        return this.state.hasBonus(account);
    }

    now(): number {
        return this.clock.now();
    }

    private async execute<T extends TransactionType>(tx: Transaction<T>): Promise<TransactionResultMap[T]> {
        if (!(tx.type in transactionHandlers)) {
            throw reject('InvalidTransaction', `[engine] Unknown transaction type ${String(tx.type)}.`);
        }
        const handler = getHandler(tx.type);
        const name = transactions[tx.type];
        const now = this.clock.now();
        const id = tx.id ?? deterministicIdFrom([tx.type, tx.sender, now, this.sequence++], 24);
        const buffer = new EventBuffer(id, now);
        const ctx: StakingContext = {
            state: this.state,
            token: this.token,
            tokens: this.tokens,
            native: this.native,
            access: this.access,
            custody: this.custody,
            now,
            transactionId: id,
            events: buffer,
        };

        logger.trace(`[engine] Validating ${name} ${id} from ${tx.sender}`);
        await handler.validate(tx.data, tx.sender, ctx);

        const snapshot = this.state.snapshot();
        let result: TransactionResultMap[T];
        try {
            result = await handler.process(tx.data, tx.sender, ctx);
        } catch (error) {
            this.state.restore(snapshot);
            logger.warn(`[engine] Rolled back ${name} ${id}: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }

        await this.persist(name, id);
        await this.events.commit(buffer.events);
        return result;
    }

    private async persist(name: string, id: string): Promise<void> {
        if (!this.store) return;
        try {
            await this.store.save(this.state.snapshot());
        } catch (error) {
            logger.error(`[engine] Failed to persist state after ${name} ${id} to ${this.store.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
