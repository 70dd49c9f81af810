import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { PoolsResult, SetPoolStatusData } from './admin-interfaces.js';

export async function validateTx(data: SetPoolStatusData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-pool-status');
    if (!validate.integer(data.poolId, true)) {
        throw reject('InvalidPoolId', `[admin-set-pool-status] Invalid poolId ${String(data.poolId)}.`);
    }
    ctx.state.pools.get(data.poolId);
    if (!validate.boolean(data.enabled)) {
        throw reject('InvalidInput', '[admin-set-pool-status] enabled must be a boolean.');
    }
}

// Existing deposits are untouched; disabling only gates new stakes and reward-bearing exits
export async function processTx(data: SetPoolStatusData, sender: string, ctx: StakingContext): Promise<PoolsResult> {
    const pool = ctx.state.pools.setEnabled(data.poolId, data.enabled);
    ctx.events.emit('admin', data.enabled ? 'pool_enabled' : 'pool_disabled', sender, { poolId: pool.id });
    return { pools: [pool] };
}
