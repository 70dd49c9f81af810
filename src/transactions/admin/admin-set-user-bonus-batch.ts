import config from '../../config.js';
import { reject } from '../../staking/errors.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { SetUserBonusBatchData, UserBonusResult } from './admin-interfaces.js';

export async function validateTx(data: SetUserBonusBatchData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-user-bonus-batch');
    if (!validate.array(data.accounts, config.maxBatchSize)) {
        throw reject('InvalidInput', `[admin-set-user-bonus-batch] accounts must be a list of 1 to ${config.maxBatchSize} accounts.`);
    }
    const invalid = data.accounts.find(account => !validate.account(account));
    if (invalid !== undefined) {
        throw reject('InvalidInput', `[admin-set-user-bonus-batch] Invalid account ${String(invalid)}.`);
    }
    if (!validate.boolean(data.enabled)) {
        throw reject('InvalidInput', '[admin-set-user-bonus-batch] enabled must be a boolean.');
    }
}

export async function processTx(data: SetUserBonusBatchData, sender: string, ctx: StakingContext): Promise<UserBonusResult> {
    const accounts = [...new Set(data.accounts)];
    for (const account of accounts) {
        ctx.state.setBonus(account, data.enabled);
    }
    ctx.events.emit('admin', data.enabled ? 'user_bonus_batch_set' : 'user_bonus_batch_cleared', sender, {
        accounts,
        count: accounts.length,
    });
    return { accounts, enabled: data.enabled };
}
