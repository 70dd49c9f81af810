import config from '../../config.js';
import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { PoolsResult, SetPoolStatusBatchData } from './admin-interfaces.js';

export async function validateTx(data: SetPoolStatusBatchData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-pool-status-batch');
    if (!validate.array(data.poolIds, config.maxBatchSize)) {
        throw reject('InvalidInput', '[admin-set-pool-status-batch] poolIds must be a non-empty list.');
    }
    for (const poolId of data.poolIds) {
        if (!validate.integer(poolId, true)) {
            throw reject('InvalidPoolId', `[admin-set-pool-status-batch] Invalid poolId ${String(poolId)}.`);
        }
        ctx.state.pools.get(poolId);
    }
    if (!validate.boolean(data.enabled)) {
        throw reject('InvalidInput', '[admin-set-pool-status-batch] enabled must be a boolean.');
    }
}

export async function processTx(data: SetPoolStatusBatchData, sender: string, ctx: StakingContext): Promise<PoolsResult> {
    const pools = [...new Set(data.poolIds)].map(poolId => ctx.state.pools.setEnabled(poolId, data.enabled));
    for (const pool of pools) {
        ctx.events.emit('admin', data.enabled ? 'pool_enabled' : 'pool_disabled', sender, { poolId: pool.id });
    }
    return { pools };
}
