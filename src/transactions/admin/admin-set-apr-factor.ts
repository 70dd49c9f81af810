import config from '../../config.js';
import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam, updateIntegerParam } from './admin-helpers.js';
import { ParamChangeResult, SetAprFactorData } from './admin-interfaces.js';

export async function validateTx(data: SetAprFactorData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-apr-factor');
    checkIntegerParam(data.aprFactor, config.maxApr, 'aprFactor', 'admin-set-apr-factor');
}

export async function processTx(data: SetAprFactorData, sender: string, ctx: StakingContext): Promise<ParamChangeResult> {
    return updateIntegerParam(ctx, sender, 'aprFactor', data.aprFactor, 'apr_factor_changed');
}
