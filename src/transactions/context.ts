import { AccessControl } from '../access.js';
import { reject } from '../staking/errors.js';
import { StakingState } from '../staking/state.js';
import { NativeWallet, TokenLedger, TokenResolver } from '../token/ledger.js';
import { EventBuffer } from '../utils/event-logger.js';

/**
 * Everything a handler may touch while a transaction runs.
 */
export interface StakingContext {
    state: StakingState;
    token: TokenLedger;
    tokens: TokenResolver;
    native?: NativeWallet;
    access: AccessControl;
    custody: string;
    now: number;
    transactionId: string;
    events: EventBuffer;
}

export function requireOwner(ctx: StakingContext, sender: string, tag: string): void {
    if (!ctx.access.isOwner(sender)) {
        throw reject('Unauthorized', `[${tag}] ${sender} is not the ledger owner.`);
    }
}

export function requireNotPaused(ctx: StakingContext, tag: string): void {
    if (ctx.state.params.paused) {
        throw reject('ContractIsPaused', `[${tag}] Staking is paused.`);
    }
}
