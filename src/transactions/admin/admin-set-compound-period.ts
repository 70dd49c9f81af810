import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam, updateIntegerParam } from './admin-helpers.js';
import { ParamChangeResult, SetCompoundPeriodData } from './admin-interfaces.js';

export async function validateTx(data: SetCompoundPeriodData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-compound-period');
    checkIntegerParam(data.compoundPeriod, Number.MAX_SAFE_INTEGER, 'compoundPeriod', 'admin-set-compound-period');
}

export async function processTx(data: SetCompoundPeriodData, sender: string, ctx: StakingContext): Promise<ParamChangeResult> {
    return updateIntegerParam(ctx, sender, 'compoundPeriod', data.compoundPeriod, 'compound_period_changed');
}
