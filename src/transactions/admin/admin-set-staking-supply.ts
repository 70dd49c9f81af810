import { reject } from '../../staking/errors.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { SetStakingSupplyData, StakingSupplyResult } from './admin-interfaces.js';

export async function validateTx(data: SetStakingSupplyData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-staking-supply');
    if (!validate.bigint(data.amount, true)) {
        throw reject('InvalidInput', '[admin-set-staking-supply] amount must be a non-negative integer.');
    }
}

export async function processTx(data: SetStakingSupplyData, sender: string, ctx: StakingContext): Promise<StakingSupplyResult> {
    const previous = ctx.state.params.stakingSupply;
    const current = toBigInt(data.amount);
    ctx.state.setParams({ stakingSupply: current });
    ctx.events.emit('admin', 'staking_supply_changed', sender, { previous, current });
    return { previous, current };
}
