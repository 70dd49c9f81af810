import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { PausedResult, SetPausedData } from './admin-interfaces.js';

export async function validateTx(data: SetPausedData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-paused');
    if (!validate.boolean(data.paused)) {
        throw reject('InvalidInput', '[admin-set-paused] paused must be a boolean.');
    }
}

export async function processTx(data: SetPausedData, sender: string, ctx: StakingContext): Promise<PausedResult> {
    ctx.state.setParams({ paused: data.paused });
    ctx.events.emit('admin', data.paused ? 'paused' : 'unpaused', sender, {});
    return { paused: data.paused };
}
