import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { SetUserBonusData, UserBonusResult } from './admin-interfaces.js';

export async function validateTx(data: SetUserBonusData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-user-bonus');
    if (!validate.account(data.account)) {
        throw reject('InvalidInput', `[admin-set-user-bonus] Invalid account ${String(data.account)}.`);
    }
    if (!validate.boolean(data.enabled)) {
        throw reject('InvalidInput', '[admin-set-user-bonus] enabled must be a boolean.');
    }
}

export async function processTx(data: SetUserBonusData, sender: string, ctx: StakingContext): Promise<UserBonusResult> {
    ctx.state.setBonus(data.account, data.enabled);
    ctx.events.emit('admin', data.enabled ? 'user_bonus_set' : 'user_bonus_cleared', sender, {
        account: data.account,
        bonusApr: ctx.state.params.userAprFactor,
    });
    return { accounts: [data.account], enabled: data.enabled };
}
