import logger from '../../logger.js';
import { reject } from '../../staking/errors.js';
import { BigIntMath } from '../../utils/bigint.js';
import { StakingContext, requireOwner } from '../context.js';
import { ReturnAllDepositsData, ReturnAllDepositsResult } from './admin-interfaces.js';

export async function validateTx(_data: ReturnAllDepositsData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-return-all-deposits');

    const total = ctx.state.deposits.totalActivePrincipal();
    const held = await ctx.token.balanceOf(ctx.custody);
    if (held < total) {
        throw reject('InvalidErc20Transfer', `[admin-return-all-deposits] Custody holds ${held} ${ctx.token.symbol}, ${total} is staked.`);
    }
}

/**
 * Pays every open deposit's principal back to its owner, ignoring locks and rewards.
 * Deposits already paid stay closed if a later payment fails, since those tokens have left custody.
 */
export async function processTx(_data: ReturnAllDepositsData, sender: string, ctx: StakingContext): Promise<ReturnAllDepositsResult> {
    const { state } = ctx;
    const open = state.deposits.active();
    const paid: Array<{ depositId: number; poolId: number; owner: string; amount: bigint }> = [];
    let failedDepositId: number | undefined;

    for (const deposit of open) {
        const ok = await ctx.token.transfer(deposit.owner, deposit.amount);
        if (!ok) {
            failedDepositId = deposit.depositId;
            logger.error(`[admin-return-all-deposits] Failed to return ${deposit.amount} ${ctx.token.symbol} to ${deposit.owner} for deposit ${deposit.depositId}.`);
            break;
        }
        paid.push({ depositId: deposit.depositId, poolId: deposit.poolId, owner: deposit.owner, amount: deposit.amount });
    }

    for (const entry of paid) {
        state.deposits.close(entry.depositId, ctx.now, 'returned');
        state.pools.exit(entry.poolId, state.params.aprFactor);
        ctx.events.emit('admin', 'tokens_returned', sender, {
            depositId: entry.depositId,
            poolId: entry.poolId,
            owner: entry.owner,
            amount: entry.amount,
        });
    }

    const total = BigIntMath.sum(paid.map(entry => entry.amount));
    logger.info(`[admin-return-all-deposits] Returned ${total} ${ctx.token.symbol} across ${paid.length} deposit(s).`);

    const result: ReturnAllDepositsResult = { returned: paid.map(entry => entry.depositId), total };
    if (failedDepositId !== undefined) {
        result.failedDepositId = failedDepositId;
    }
    return result;
}
