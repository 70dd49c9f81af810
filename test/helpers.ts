import assert from 'assert';

import { OwnerAccessControl } from '../src/access.js';
import { ManualClock } from '../src/clock.js';
import { PoolSeed } from '../src/config.js';
import { StakingEngine } from '../src/staking/engine.js';
import { StakingErrorCode, isStakingError } from '../src/staking/errors.js';
import { StakingParams } from '../src/staking/staking-interfaces.js';
import { defaultParams, StakingState } from '../src/staking/state.js';
import { InMemoryNativeWallet, InMemoryTokenLedger, TokenLedger } from '../src/token/ledger.js';
import logger from '../src/logger.js';

// Rejections log warnings; keep test output to failures unless asked.
logger.setLogLevel(process.env.TEST_LOG_LEVEL || 'fatal');

export const OWNER = 'ledger-admin';
export const CUSTODY = 'staking-vault';
export const START = 1_700_000_000;
export const DAY = 86400;
export const RESERVE = 1_000_000_000_000n;

export interface Harness {
    engine: StakingEngine;
    clock: ManualClock;
    token: InMemoryTokenLedger;
    native: InMemoryNativeWallet;
    foreign: Map<string, TokenLedger>;
}

export interface HarnessOptions {
    params?: Partial<StakingParams>;
    pools?: PoolSeed[];
    token?: InMemoryTokenLedger;
    native?: InMemoryNativeWallet;
}

/**
 * Engine over in-memory ledgers with a manual clock at START. Custody holds RESERVE for rewards.
 */
export function setup(options: HarnessOptions = {}): Harness {
    const clock = new ManualClock(START);
    const token = options.token ?? new InMemoryTokenLedger('STK', CUSTODY);
    token.mint(CUSTODY, RESERVE);
    const native = options.native ?? new InMemoryNativeWallet();
    const foreign = new Map<string, TokenLedger>();
    const state = StakingState.genesis(defaultParams(options.params), options.pools);
    const engine = new StakingEngine({
        state,
        token,
        tokens: symbol => foreign.get(symbol),
        native,
        access: new OwnerAccessControl(OWNER),
        clock,
        custody: CUSTODY,
    });
    return { engine, clock, token, native, foreign };
}

export async function rejectsWith(promise: Promise<unknown>, code: StakingErrorCode): Promise<void> {
    await assert.rejects(promise, (error: unknown) => {
        assert.ok(isStakingError(error), `expected a StakingError, got ${String(error)}`);
        assert.strictEqual(error.code, code);
        return true;
    });
}
