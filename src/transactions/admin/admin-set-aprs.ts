import config from '../../config.js';
import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam } from './admin-helpers.js';
import { PoolsResult, SetAprsData } from './admin-interfaces.js';

export async function validateTx(data: SetAprsData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-aprs');
    const poolCount = ctx.state.pools.size;
    if (!validate.array(data.aprs, poolCount) || data.aprs.length !== poolCount) {
        throw reject('InvalidInput', `[admin-set-aprs] Expected exactly ${poolCount} APR values.`);
    }
    for (const apr of data.aprs) {
        checkIntegerParam(apr, config.maxApr, 'apr', 'admin-set-aprs');
    }
}

export async function processTx(data: SetAprsData, sender: string, ctx: StakingContext): Promise<PoolsResult> {
    const pools = data.aprs.map((apr, poolId) => {
        const previous = ctx.state.pools.get(poolId).apr;
        const pool = ctx.state.pools.setApr(poolId, apr);
        ctx.events.emit('admin', 'pool_apr_changed', sender, { poolId, previous, current: apr });
        return pool;
    });
    return { pools };
}
