import logger from '../../logger.js';
import { reject } from '../../staking/errors.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { StakingContext, requireNotPaused } from '../context.js';
import { StakeData, StakeResult } from './staking-interfaces.js';

export async function validateTx(data: StakeData, sender: string, ctx: StakingContext): Promise<void> {
    requireNotPaused(ctx, 'staking-stake');

    if (!validate.account(sender) || sender === ctx.custody) {
        throw reject('InvalidInput', `[staking-stake] Invalid staker ${sender}.`);
    }

    if (!validate.integer(data.poolId, true)) {
        throw reject('InvalidPoolId', `[staking-stake] Invalid poolId ${String(data.poolId)}.`);
    }
    const pool = ctx.state.pools.get(data.poolId);
    if (!pool.enabled) {
        throw reject('PoolDisabled', `[staking-stake] Pool ${pool.id} is disabled.`);
    }

    if (!validate.bigint(data.amount)) {
        throw reject('InvalidInput', '[staking-stake] amount must be a positive integer.');
    }

    const balance = await ctx.token.balanceOf(sender);
    if (balance < toBigInt(data.amount)) {
        throw reject('CantStakeThatMuch', `[staking-stake] ${sender} has ${balance} ${ctx.token.symbol}, cannot stake ${toBigInt(data.amount)}.`);
    }
}

export async function processTx(data: StakeData, sender: string, ctx: StakingContext): Promise<StakeResult> {
    const { state } = ctx;
    const amount = toBigInt(data.amount);
    // Everything that can reject runs before tokens move into custody
    const target = state.pools.get(data.poolId);

    const pulled = await ctx.token.transferFrom(sender, ctx.custody, amount);
    if (!pulled) {
        throw reject('InvalidErc20Transfer', `[staking-stake] Failed to move ${amount} ${ctx.token.symbol} from ${sender} into custody.`);
    }

    const deposit = state.deposits.open(sender, target, amount, ctx.now, state.params.daySeconds);
    const pool = state.pools.join(data.poolId, state.params.aprFactor);

    ctx.events.emit('staking', 'stake', sender, {
        depositId: deposit.depositId,
        poolId: pool.id,
        amount,
        endDate: deposit.endDate,
        poolApr: pool.apr,
        totalStakers: pool.totalStakers,
    });
    logger.debug(`[staking-stake] ${sender} staked ${amount} in pool ${pool.id} as deposit ${deposit.depositId}, pool APR now ${pool.apr}.`);

    return {
        depositId: deposit.depositId,
        poolId: pool.id,
        amount,
        startDate: deposit.startDate,
        endDate: deposit.endDate,
        poolApr: pool.apr,
    };
}
