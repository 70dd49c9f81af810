import { reject } from './errors.js';
import { PoolData } from './staking-interfaces.js';

/**
 * APR drift when a deposit joins: the pool's APR drops by `aprFactor`.
 * The part that would take APR below zero is kept as a deficit instead.
 */
export function applyJoin(pool: PoolData, aprFactor: number): PoolData {
    const lowered = pool.apr - aprFactor;
    return {
        ...pool,
        totalStakers: pool.totalStakers + 1,
        apr: Math.max(0, lowered),
        aprDeficit: pool.aprDeficit + Math.max(0, -lowered),
    };
}

/**
 * APR drift when a deposit leaves: the deficit is repaid first, the rest raises APR.
 */
export function applyExit(pool: PoolData, aprFactor: number): PoolData {
    const repaid = Math.min(pool.aprDeficit, aprFactor);
    return {
        ...pool,
        totalStakers: Math.max(0, pool.totalStakers - 1),
        apr: pool.apr + aprFactor - repaid,
        aprDeficit: pool.aprDeficit - repaid,
    };
}

export class PoolRegistry {
    constructor(private readonly pools: PoolData[]) {}

    create(apr: number, periodInDays: number): PoolData {
        const pool: PoolData = {
            id: this.pools.length,
            apr,
            aprDeficit: 0,
            periodInDays,
            totalStakers: 0,
            enabled: true,
        };
        this.pools.push(pool);
        return pool;
    }

    exists(poolId: number): boolean {
        return Number.isSafeInteger(poolId) && poolId >= 0 && poolId < this.pools.length;
    }

    get(poolId: number): PoolData {
        if (!this.exists(poolId)) {
            throw reject('InvalidPoolId', `[pool-registry] Pool ${poolId} does not exist.`);
        }
        return this.pools[poolId];
    }

    list(): PoolData[] {
        return this.pools;
    }

    aprs(): number[] {
        return this.pools.map(pool => pool.apr);
    }

    get size(): number {
        return this.pools.length;
    }

    /** Direct override; clears any drift deficit. */
    setApr(poolId: number, apr: number): PoolData {
        const pool = this.get(poolId);
        return this.replace({ ...pool, apr, aprDeficit: 0 });
    }

    setEnabled(poolId: number, enabled: boolean): PoolData {
        const pool = this.get(poolId);
        return this.replace({ ...pool, enabled });
    }

    join(poolId: number, aprFactor: number): PoolData {
        return this.replace(applyJoin(this.get(poolId), aprFactor));
    }

    exit(poolId: number, aprFactor: number): PoolData {
        return this.replace(applyExit(this.get(poolId), aprFactor));
    }

    private replace(pool: PoolData): PoolData {
        this.pools[pool.id] = pool;
        return pool;
    }
}
