import logger from '../../logger.js';
import { reject } from '../../staking/errors.js';
import { pendingRewardFor } from '../../staking/reward.js';
import { StakingContext, requireNotPaused } from '../context.js';
import { loadOwnedDeposit } from './staking-helpers.js';
import { UnstakeData, UnstakeResult } from './staking-interfaces.js';

export async function validateTx(data: UnstakeData, sender: string, ctx: StakingContext): Promise<void> {
    requireNotPaused(ctx, 'staking-unstake');

    const deposit = loadOwnedDeposit(ctx, data.depositId, sender, 'staking-unstake');

    const pool = ctx.state.pools.get(deposit.poolId);
    if (!pool.enabled) {
        throw reject('PoolDisabled', `[staking-unstake] Pool ${pool.id} is disabled.`);
    }

    if (ctx.now < deposit.endDate) {
        throw reject('CantUnstakeNow', `[staking-unstake] Deposit ${deposit.depositId} is locked until ${deposit.endDate}.`);
    }
}

export async function processTx(data: UnstakeData, sender: string, ctx: StakingContext): Promise<UnstakeResult> {
    const { state } = ctx;
    const deposit = state.deposits.get(data.depositId);
    const pool = state.pools.get(deposit.poolId);

    const pending = pendingRewardFor(deposit, pool, state.params, state.hasBonus(sender), ctx.now);
    const reward = state.previewReward(pending);
    const principal = deposit.amount;
    const payout = principal + reward;

    const paid = await ctx.token.transfer(sender, payout);
    if (!paid) {
        throw reject('InvalidErc20Transfer', `[staking-unstake] Failed to pay ${payout} ${ctx.token.symbol} to ${sender}.`);
    }

    state.drawReward(reward);
    state.deposits.close(deposit.depositId, ctx.now, 'normal');
    const updatedPool = state.pools.exit(pool.id, state.params.aprFactor);

    ctx.events.emit('staking', 'unstake', sender, {
        depositId: deposit.depositId,
        poolId: pool.id,
        principal,
        reward,
        amount: payout,
        totalStakers: updatedPool.totalStakers,
    });
    logger.debug(`[staking-unstake] ${sender} closed deposit ${deposit.depositId}: principal ${principal}, reward ${reward}.`);

    return { depositId: deposit.depositId, principal, reward, payout };
}
