import config from '../../config.js';
import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam } from './admin-helpers.js';
import { PoolsResult, SetAprData } from './admin-interfaces.js';

export async function validateTx(data: SetAprData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-apr');
    if (!validate.integer(data.poolId, true)) {
        throw reject('InvalidPoolId', `[admin-set-apr] Invalid poolId ${String(data.poolId)}.`);
    }
    ctx.state.pools.get(data.poolId);
    checkIntegerParam(data.apr, config.maxApr, 'apr', 'admin-set-apr');
}

export async function processTx(data: SetAprData, sender: string, ctx: StakingContext): Promise<PoolsResult> {
    const previous = ctx.state.pools.get(data.poolId).apr;
    const pool = ctx.state.pools.setApr(data.poolId, data.apr);
    ctx.events.emit('admin', 'pool_apr_changed', sender, { poolId: pool.id, previous, current: pool.apr });
    return { pools: [pool] };
}
