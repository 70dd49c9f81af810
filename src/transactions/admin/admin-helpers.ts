import { reject } from '../../staking/errors.js';
import { StakingParams } from '../../staking/staking-interfaces.js';
import validate from '../../validation/index.js';
import { StakingContext } from '../context.js';
import { ParamChangeResult } from './admin-interfaces.js';

type IntegerParam = 'aprFactor' | 'userAprFactor' | 'emergencyFee' | 'compoundPeriod';

export function checkIntegerParam(value: unknown, max: number, name: string, tag: string): void {
    if (!validate.integer(value, true, max)) {
        throw reject('InvalidInput', `[${tag}] ${name} must be an integer between 0 and ${max}.`);
    }
}

/**
 * Replaces one integer ledger parameter and records the change as an admin event.
 */
export function updateIntegerParam(
    ctx: StakingContext,
    sender: string,
    param: IntegerParam,
    value: number,
    action: string
): ParamChangeResult {
    const previous = ctx.state.params[param];
    const changes: Partial<StakingParams> = {};
    changes[param] = value;
    ctx.state.setParams(changes);
    ctx.events.emit('admin', action, sender, { previous, current: value });
    return { previous, current: value };
}
