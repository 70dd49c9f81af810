import logger from '../../logger.js';
import { reject } from '../../staking/errors.js';
import { StakingContext, requireNotPaused } from '../context.js';
import { loadOwnedDeposit } from './staking-helpers.js';
import { EmergencyWithdrawData, EmergencyWithdrawResult } from './staking-interfaces.js';

export function emergencyFee(principal: bigint, feePercent: number): bigint {
    return (principal * BigInt(feePercent)) / 100n;
}

// Allowed on disabled pools and at any time; no reward is paid.
export async function validateTx(data: EmergencyWithdrawData, sender: string, ctx: StakingContext): Promise<void> {
    requireNotPaused(ctx, 'staking-emergency-withdraw');
    loadOwnedDeposit(ctx, data.depositId, sender, 'staking-emergency-withdraw');
}

export async function processTx(data: EmergencyWithdrawData, sender: string, ctx: StakingContext): Promise<EmergencyWithdrawResult> {
    const { state } = ctx;
    const deposit = state.deposits.get(data.depositId);

    const principal = deposit.amount;
    const fee = emergencyFee(principal, state.params.emergencyFee);
    const payout = principal - fee;

    const paid = await ctx.token.transfer(sender, payout);
    if (!paid) {
        throw reject('InvalidErc20Transfer', `[staking-emergency-withdraw] Failed to pay ${payout} ${ctx.token.symbol} to ${sender}.`);
    }

    state.deposits.close(deposit.depositId, ctx.now, 'emergency');
    const pool = state.pools.exit(deposit.poolId, state.params.aprFactor);

    ctx.events.emit('staking', 'emergency_withdraw', sender, {
        depositId: deposit.depositId,
        poolId: pool.id,
        principal,
        fee,
        amount: payout,
        totalStakers: pool.totalStakers,
    });
    logger.debug(`[staking-emergency-withdraw] ${sender} left deposit ${deposit.depositId} early, fee ${fee} kept in custody.`);

    return { depositId: deposit.depositId, principal, fee, payout };
}
