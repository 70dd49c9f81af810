import { reject } from '../../staking/errors.js';
import { TokenLedger } from '../../token/ledger.js';
import validate from '../../validation/index.js';
import { StakingContext, requireOwner } from '../context.js';
import { SweepResult, SweepTokenData } from './admin-interfaces.js';

function resolveLedger(ctx: StakingContext, symbol: string): TokenLedger | undefined {
    return symbol === ctx.token.symbol ? ctx.token : ctx.tokens(symbol);
}

/**
 * Sweepable balance: everything for foreign tokens, only what exceeds open
 * principal for the staking token.
 */
async function sweepable(ctx: StakingContext, ledger: TokenLedger): Promise<bigint> {
    const held = await ledger.balanceOf(ctx.custody);
    if (ledger !== ctx.token) return held;
    const surplus = held - ctx.state.deposits.totalActivePrincipal();
    return surplus > 0n ? surplus : 0n;
}

export async function validateTx(data: SweepTokenData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-sweep-token');
    if (!validate.tokenSymbol(data.symbol)) {
        throw reject('InvalidInput', `[admin-sweep-token] Invalid token symbol ${String(data.symbol)}.`);
    }
    const ledger = resolveLedger(ctx, data.symbol);
    if (!ledger) {
        throw reject('InvalidInput', `[admin-sweep-token] Unknown token ${data.symbol}.`);
    }
    if ((await sweepable(ctx, ledger)) === 0n) {
        throw reject('InvalidInput', `[admin-sweep-token] Nothing to sweep for ${data.symbol}.`);
    }
}

export async function processTx(data: SweepTokenData, sender: string, ctx: StakingContext): Promise<SweepResult> {
    const ledger = resolveLedger(ctx, data.symbol);
    if (!ledger) {
        throw reject('InvalidInput', `[admin-sweep-token] Unknown token ${data.symbol}.`);
    }
    const amount = await sweepable(ctx, ledger);
    const ok = await ledger.transfer(sender, amount);
    if (!ok) {
        throw reject('InvalidErc20Transfer', `[admin-sweep-token] Failed to sweep ${amount} ${data.symbol} to ${sender}.`);
    }
    ctx.events.emit('admin', 'token_swept', sender, { symbol: data.symbol, amount, to: sender });
    return { symbol: data.symbol, amount, to: sender };
}
