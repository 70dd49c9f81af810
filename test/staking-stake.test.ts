import assert from 'assert';
import { describe, it } from 'node:test';

import { TransactionType } from '../src/transactions/types.js';
import { InMemoryTokenLedger } from '../src/token/ledger.js';
import { CUSTODY, DAY, OWNER, RESERVE, START, rejectsWith, setup } from './helpers.js';

class RefusingLedger extends InMemoryTokenLedger {
    async transferFrom(): Promise<boolean> {
        return false;
    }
}

describe('staking_stake', () => {
    it('moves the stake into custody and opens a deposit', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);

        const result = await engine.stake('alice', 0, 25n);

        assert.deepStrictEqual(result, {
            depositId: 0,
            poolId: 0,
            amount: 25n,
            startDate: START,
            endDate: START + 30 * DAY,
            poolApr: 990,
        });
        assert.strictEqual(engine.getTotalStakedByUser('alice'), 25n);
        assert.strictEqual(await token.balanceOf('alice'), 25n);
        assert.strictEqual(await token.balanceOf(CUSTODY), RESERVE + 25n);
        assert.strictEqual(engine.getPool(0).totalStakers, 1);
    });

    it('leaves staked tokens out of the spendable balance', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);
        await engine.stake('alice', 0, 25n);

        assert.strictEqual(await token.transferFrom('alice', 'bob', 30n), false);
        await rejectsWith(engine.stake('alice', 0, 30n), 'CantStakeThatMuch');
    });

    it('accepts decimal string amounts', async () => {
        const { engine, token } = setup();
        token.mint('alice', 1000n);
        const result = await engine.stake('alice', 2, '400');
        assert.strictEqual(result.amount, 400n);
        assert.strictEqual(result.endDate, START + 365 * DAY);
        assert.strictEqual(result.poolApr, 2990);
    });

    it('records a stake event', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);
        await engine.stake('alice', 0, 25n);

        const [event] = engine.events.list(1);
        assert.strictEqual(event.type, 'staking_stake');
        assert.strictEqual(event.actor, 'alice');
        assert.deepStrictEqual(event.data, {
            depositId: 0,
            poolId: 0,
            amount: '25',
            endDate: START + 30 * DAY,
            poolApr: 990,
            totalStakers: 1,
        });
        assert.strictEqual(event.timestamp, new Date(START * 1000).toISOString());
    });

    it('rejects unknown and disabled pools', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);
        await rejectsWith(engine.stake('alice', 3, 10n), 'InvalidPoolId');
        await engine.submit({ type: TransactionType.ADMIN_SET_POOL_STATUS, sender: OWNER, data: { poolId: 1, enabled: false } });
        await rejectsWith(engine.stake('alice', 1, 10n), 'PoolDisabled');
    });

    it('rejects malformed amounts and the custody account', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);
        await rejectsWith(engine.stake('alice', 0, '0'), 'InvalidInput');
        await rejectsWith(engine.stake('alice', 0, '1e3'), 'InvalidInput');
        await rejectsWith(engine.stake(CUSTODY, 0, 10n), 'InvalidInput');
    });

    it('is blocked while paused', async () => {
        const { engine, token } = setup();
        token.mint('alice', 50n);
        await engine.submit({ type: TransactionType.ADMIN_SET_PAUSED, sender: OWNER, data: { paused: true } });
        await rejectsWith(engine.stake('alice', 0, 10n), 'ContractIsPaused');
    });

    it('indexes owners named like Object.prototype members', async () => {
        const { engine, token, clock } = setup();
        assert.deepStrictEqual(engine.getDepositsOf('constructor'), []);
        assert.strictEqual(engine.getTotalStakedByUser('constructor'), 0n);
        token.mint('constructor', 50n);

        const result = await engine.stake('constructor', 0, 25n);
        assert.strictEqual(result.depositId, 0);
        assert.deepStrictEqual(engine.getDepositsOf('constructor').map(deposit => deposit.depositId), [0]);
        assert.strictEqual(engine.getTotalStakedByUser('constructor'), 25n);
        assert.strictEqual(await token.balanceOf('constructor'), 25n);
        assert.strictEqual(engine.isBonusUser('constructor'), false);

        clock.advance(DAY);
        await engine.compound('constructor', 0);
        await rejectsWith(engine.compound('constructor', 0), 'CantCompound');
        await engine.submit({ type: TransactionType.ADMIN_SET_USER_BONUS, sender: OWNER, data: { account: 'constructor', enabled: true } });
        assert.strictEqual(engine.isBonusUser('constructor'), true);
    });

    it('changes nothing when the token transfer fails', async () => {
        const { engine, token } = setup({ token: new RefusingLedger('STK', CUSTODY) });
        token.mint('alice', 50n);
        const eventsBefore = engine.events.size;

        await rejectsWith(engine.stake('alice', 0, 25n), 'InvalidErc20Transfer');

        assert.strictEqual(engine.state.deposits.size, 0);
        assert.deepStrictEqual(engine.getPool(0), { id: 0, apr: 1000, aprDeficit: 0, periodInDays: 30, totalStakers: 0, enabled: true });
        assert.strictEqual(engine.events.size, eventsBefore);
    });
});
