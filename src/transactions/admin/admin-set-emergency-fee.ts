import { StakingContext, requireOwner } from '../context.js';
import { checkIntegerParam, updateIntegerParam } from './admin-helpers.js';
import { ParamChangeResult, SetEmergencyFeeData } from './admin-interfaces.js';

export async function validateTx(data: SetEmergencyFeeData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-set-emergency-fee');
    checkIntegerParam(data.fee, 100, 'fee', 'admin-set-emergency-fee');
}

export async function processTx(data: SetEmergencyFeeData, sender: string, ctx: StakingContext): Promise<ParamChangeResult> {
    return updateIntegerParam(ctx, sender, 'emergencyFee', data.fee, 'emergency_fee_changed');
}
