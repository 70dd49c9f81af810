import { reject } from '../../staking/errors.js';
import { DepositData } from '../../staking/staking-interfaces.js';
import validate from '../../validation/index.js';
import { StakingContext } from '../context.js';

/**
 * Resolves a deposit the sender owns and that is still open.
 */
export function loadOwnedDeposit(ctx: StakingContext, depositId: unknown, sender: string, tag: string): DepositData {
    if (!validate.integer(depositId, true)) {
        throw reject('InvalidDepositId', `[${tag}] Invalid depositId ${String(depositId)}.`);
    }
    const deposit = ctx.state.deposits.get(depositId);
    if (deposit.owner !== sender) {
        throw reject('InvalidOwner', `[${tag}] Deposit ${depositId} is not owned by ${sender}.`);
    }
    if (deposit.ended) {
        throw reject('EndedDeposit', `[${tag}] Deposit ${depositId} has already ended.`);
    }
    return deposit;
}
