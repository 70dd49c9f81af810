import config from '../../config.js';
import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam, updateIntegerParam } from './admin-helpers.js';
import { ParamChangeResult, SetUserAprFactorData } from './admin-interfaces.js';

export async function validateTx(data: SetUserAprFactorData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-user-apr-factor');
    checkIntegerParam(data.userAprFactor, config.maxApr, 'userAprFactor', 'admin-set-user-apr-factor');
}

export async function processTx(data: SetUserAprFactorData, sender: string, ctx: StakingContext): Promise<ParamChangeResult> {
    return updateIntegerParam(ctx, sender, 'userAprFactor', data.userAprFactor, 'user_apr_factor_changed');
}
