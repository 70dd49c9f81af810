import { AnyBulkWriteOperation, Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import { DepositData, ExitMode, PoolData, StakingParams, StakingSnapshot } from './staking/staking-interfaces.js';
import { StateStore } from './staking/store.js';
import { toBigInt, toDbString } from './utils/bigint.js';
import { EventDocument, EventPublisher } from './utils/event-logger.js';
import { ownValue, setOwn } from './utils/record.js';

export interface PoolDoc {
    _id: number;
    apr: number;
    aprDeficit: number;
    periodInDays: number;
    totalStakers: number;
    enabled: boolean;
}

export interface DepositDoc {
    _id: number;
    poolId: number;
    owner: string;
    amount: string; // Store as padded string
    compounded: string; // Store as padded string
    startDate: number;
    endDate: number;
    ended: boolean;
    closedAt?: number;
    exitMode?: ExitMode;
}

export interface ParamsDoc {
    aprFactor: number;
    userAprFactor: number;
    emergencyFee: number;
    compoundPeriod: number;
    stakingSupply: string; // Store as padded string
    paused: boolean;
    daySeconds: number;
}

export interface StateDoc {
    _id: number;
    params: ParamsDoc;
    bonusAccounts: string[];
    lastCompound: Record<string, number>;
    updatedAt: string;
}

export function poolToDoc(pool: PoolData): PoolDoc {
    return {
        _id: pool.id,
        apr: pool.apr,
        aprDeficit: pool.aprDeficit,
        periodInDays: pool.periodInDays,
        totalStakers: pool.totalStakers,
        enabled: pool.enabled,
    };
}

export function poolFromDoc(doc: PoolDoc): PoolData {
    return {
        id: doc._id,
        apr: doc.apr,
        aprDeficit: doc.aprDeficit ?? 0,
        periodInDays: doc.periodInDays,
        totalStakers: doc.totalStakers,
        enabled: doc.enabled,
    };
}

export function depositToDoc(deposit: DepositData): DepositDoc {
    const doc: DepositDoc = {
        _id: deposit.depositId,
        poolId: deposit.poolId,
        owner: deposit.owner,
        amount: toDbString(deposit.amount),
        compounded: toDbString(deposit.compounded),
        startDate: deposit.startDate,
        endDate: deposit.endDate,
        ended: deposit.ended,
    };
    if (deposit.closedAt !== undefined) doc.closedAt = deposit.closedAt;
    if (deposit.exitMode !== undefined) doc.exitMode = deposit.exitMode;
    return doc;
}

export function depositFromDoc(doc: DepositDoc): DepositData {
    const deposit: DepositData = {
        depositId: doc._id,
        poolId: doc.poolId,
        owner: doc.owner,
        amount: toBigInt(doc.amount),
        compounded: toBigInt(doc.compounded),
        startDate: doc.startDate,
        endDate: doc.endDate,
        ended: doc.ended,
    };
    if (doc.closedAt !== undefined) deposit.closedAt = doc.closedAt;
    if (doc.exitMode !== undefined) deposit.exitMode = doc.exitMode;
    return deposit;
}

export function paramsToDoc(params: StakingParams): ParamsDoc {
    return { ...params, stakingSupply: toDbString(params.stakingSupply) };
}

export function paramsFromDoc(doc: ParamsDoc): StakingParams {
    return { ...doc, stakingSupply: toBigInt(doc.stakingSupply) };
}

/**
 * Rebuilds a snapshot from stored documents. Per-owner deposit lists follow
 * deposit id order, which is the order deposits were opened in.
 */
export function snapshotFromDocs(pools: PoolDoc[], deposits: DepositDoc[], state: StateDoc): StakingSnapshot {
    const sortedDeposits = [...deposits].sort((a, b) => a._id - b._id).map(depositFromDoc);
    const depositsByOwner: Record<string, number[]> = {};
    for (const deposit of sortedDeposits) {
        const ids = ownValue(depositsByOwner, deposit.owner);
        if (ids) {
            ids.push(deposit.depositId);
        } else {
            setOwn(depositsByOwner, deposit.owner, [deposit.depositId]);
        }
    }
    const bonusAccounts: Record<string, boolean> = {};
    for (const account of state.bonusAccounts) setOwn(bonusAccounts, account, true);
    return {
        pools: [...pools].sort((a, b) => a._id - b._id).map(poolFromDoc),
        deposits: sortedDeposits,
        depositsByOwner,
        params: paramsFromDoc(state.params),
        bonusAccounts,
        lastCompound: { ...state.lastCompound },
    };
}

function changedDocs<T extends { _id: number }>(docs: T[], written: Map<number, string>): T[] {
    return docs.filter(doc => written.get(doc._id) !== JSON.stringify(doc));
}

function markWritten<T extends { _id: number }>(docs: T[], written: Map<number, string>): void {
    for (const doc of docs) written.set(doc._id, JSON.stringify(doc));
}

/**
 * Pools, deposits and ledger parameters in MongoDB. Only documents that
 * changed since the previous save are written.
 */
export class MongoStateStore implements StateStore {
    readonly name = 'mongodb';
    private readonly writtenPools = new Map<number, string>();
    private readonly writtenDeposits = new Map<number, string>();

    constructor(
        private readonly db: Db,
        private readonly client?: MongoClient
    ) {}

    static async connect(url: string, dbName: string): Promise<MongoStateStore> {
        const client = new MongoClient(url, {});
        await client.connect();
        const db = client.db(dbName);
        logger.info(`Connected to ${url}/${db.databaseName}`);
        const store = new MongoStateStore(db, client);
        await store.addIndexes();
        return store;
    }

    async addIndexes(): Promise<void> {
        await this.db.collection<DepositDoc>('deposits').createIndex({ owner: 1 });
        await this.db.collection<DepositDoc>('deposits').createIndex({ poolId: 1, ended: 1 });
        await this.db.collection<EventDocument>('events').createIndex({ timestamp: -1 });
        await this.db.collection<EventDocument>('events').createIndex({ actor: 1 });
        logger.debug('[mongo] Indexes ensured on deposits and events.');
    }

    async load(): Promise<StakingSnapshot | null> {
        const state = await this.db.collection<StateDoc>('state').findOne({ _id: 0 });
        if (!state) return null;
        const pools = await this.db.collection<PoolDoc>('pools').find({}).toArray();
        const deposits = await this.db.collection<DepositDoc>('deposits').find({}).toArray();
        for (const pool of pools) this.writtenPools.set(pool._id, JSON.stringify(pool));
        for (const deposit of deposits) this.writtenDeposits.set(deposit._id, JSON.stringify(deposit));
        return snapshotFromDocs(pools, deposits, state);
    }

    async save(snapshot: StakingSnapshot): Promise<void> {
        const pools = changedDocs(snapshot.pools.map(poolToDoc), this.writtenPools);
        const deposits = changedDocs(snapshot.deposits.map(depositToDoc), this.writtenDeposits);
        const poolOps: AnyBulkWriteOperation<PoolDoc>[] = pools.map(({ _id, ...replacement }) => ({
            replaceOne: { filter: { _id }, replacement, upsert: true },
        }));
        const depositOps: AnyBulkWriteOperation<DepositDoc>[] = deposits.map(({ _id, ...replacement }) => ({
            replaceOne: { filter: { _id }, replacement, upsert: true },
        }));
        if (poolOps.length > 0) await this.db.collection<PoolDoc>('pools').bulkWrite(poolOps);
        if (depositOps.length > 0) await this.db.collection<DepositDoc>('deposits').bulkWrite(depositOps);
        await this.db.collection<StateDoc>('state').updateOne(
            { _id: 0 },
            {
                $set: {
                    params: paramsToDoc(snapshot.params),
                    bonusAccounts: Object.keys(snapshot.bonusAccounts),
                    lastCompound: snapshot.lastCompound,
                    updatedAt: new Date().toISOString(),
                },
            },
            { upsert: true }
        );
        markWritten(pools, this.writtenPools);
        markWritten(deposits, this.writtenDeposits);
        logger.trace(`[mongo] Saved ${poolOps.length} pool(s) and ${depositOps.length} deposit(s).`);
    }

    async close(): Promise<void> {
        if (this.client) {
            await this.client.close();
            logger.info('[mongo] Connection closed.');
        }
    }

    eventPublisher(): EventPublisher {
        const events = this.db.collection<EventDocument>('events');
        return {
            name: 'mongodb',
            publish: async (docs: EventDocument[]) => {
                await events.insertMany(docs, { ordered: false });
            },
        };
    }
}
