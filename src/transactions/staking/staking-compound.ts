import logger from '../../logger.js';
import { reject } from '../../staking/errors.js';
import { pendingRewardFor } from '../../staking/reward.js';
import { StakingContext, requireNotPaused } from '../context.js';
import { loadOwnedDeposit } from './staking-helpers.js';
import { CompoundData, CompoundResult } from './staking-interfaces.js';

export async function validateTx(data: CompoundData, sender: string, ctx: StakingContext): Promise<void> {
    requireNotPaused(ctx, 'staking-compound');

    const deposit = loadOwnedDeposit(ctx, data.depositId, sender, 'staking-compound');

    const pool = ctx.state.pools.get(deposit.poolId);
    if (!pool.enabled) {
        throw reject('PoolDisabled', `[staking-compound] Pool ${pool.id} is disabled.`);
    }

    // From endDate on the reward is the maturity lump, paid out by unstake
    if (ctx.now >= deposit.endDate) {
        throw reject('CantCompound', `[staking-compound] Deposit ${deposit.depositId} matured at ${deposit.endDate}.`);
    }

    // One compound per owner per period, whichever deposit it targets
    const nextAllowed = ctx.state.lastCompoundOf(sender) + ctx.state.params.compoundPeriod;
    if (ctx.now < nextAllowed) {
        throw reject('CantCompound', `[staking-compound] ${sender} can compound again at ${nextAllowed}.`);
    }
}

export async function processTx(data: CompoundData, sender: string, ctx: StakingContext): Promise<CompoundResult> {
    const { state } = ctx;
    const deposit = state.deposits.get(data.depositId);
    const pool = state.pools.get(deposit.poolId);

    const pending = pendingRewardFor(deposit, pool, state.params, state.hasBonus(sender), ctx.now);
    const reward = state.drawReward(pending);
    const updated = state.deposits.credit(deposit.depositId, reward);
    state.markCompounded(sender, ctx.now);

    ctx.events.emit('staking', 'compound', sender, {
        depositId: updated.depositId,
        poolId: updated.poolId,
        reward,
        amount: updated.amount,
        compounded: updated.compounded,
    });
    logger.debug(`[staking-compound] ${sender} compounded ${reward} into deposit ${updated.depositId}.`);

    return { depositId: updated.depositId, reward, amount: updated.amount, compounded: updated.compounded };
}
