import { reject } from '../../staking/errors.js';
import { NativeWallet } from '../../token/ledger.js';
import { StakingContext, requireOwner } from '../context.js';
import { SweepNativeData, SweepResult } from './admin-interfaces.js';

const NATIVE_SYMBOL = 'NATIVE';

function requireWallet(ctx: StakingContext): NativeWallet {
    if (!ctx.native) {
        throw reject('InvalidInput', '[admin-sweep-native] No native wallet is attached.');
    }
    return ctx.native;
}

export async function validateTx(_data: SweepNativeData, sender: string, ctx: StakingContext): Promise<void> {
    requireOwner(ctx, sender, 'admin-sweep-native');
    const wallet = requireWallet(ctx);
    if ((await wallet.balance()) === 0n) {
        throw reject('InvalidInput', '[admin-sweep-native] Nothing to sweep.');
    }
}

export async function processTx(_data: SweepNativeData, sender: string, ctx: StakingContext): Promise<SweepResult> {
    const wallet = requireWallet(ctx);
    const amount = await wallet.balance();
    const ok = await wallet.send(sender, amount);
    if (!ok) {
        throw reject('FailedEthTransfer', `[admin-sweep-native] Failed to send ${amount} native currency to ${sender}.`);
    }
    ctx.events.emit('admin', 'native_swept', sender, { amount, to: sender });
    return { symbol: NATIVE_SYMBOL, amount, to: sender };
}
