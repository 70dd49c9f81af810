import assert from 'assert';
import { describe, it } from 'node:test';

import { TransactionType } from '../src/transactions/types.js';
import { DAY, OWNER, START, rejectsWith, setup } from './helpers.js';

const PRINCIPAL = 1_000_000_000n;

describe('staking_compound', () => {
    it('folds the accrued reward into principal', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.advance(DAY);

        const result = await engine.compound('alice', 0);

        assert.deepStrictEqual(result, { depositId: 0, reward: 270432n, amount: 1_000_270_432n, compounded: 270432n });
        assert.strictEqual(engine.getTotalStakedByUser('alice'), 1_000_270_432n);
        // Rewards stay virtual until unstake
        assert.strictEqual(await token.balanceOf('alice'), 0n);
    });

    it('subtracts earlier compounds from the next reward', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.advance(DAY);
        await engine.compound('alice', 0);
        clock.advance(DAY);

        const result = await engine.compound('alice', 0);
        assert.strictEqual(result.reward, 539887n);
        assert.strictEqual(result.compounded, 270432n + 539887n);
    });

    it('allows one compound per period', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.advance(DAY);
        await engine.compound('alice', 0);
        clock.advance(DAY - 1);
        await rejectsWith(engine.compound('alice', 0), 'CantCompound');
    });

    it('shares the cooldown across all deposits of an owner', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', 2n * PRINCIPAL);
        token.mint('bob', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        await engine.stake('alice', 1, PRINCIPAL);
        await engine.stake('bob', 1, PRINCIPAL);
        clock.advance(DAY);

        await engine.compound('alice', 0);
        await rejectsWith(engine.compound('alice', 1), 'CantCompound');
        const other = await engine.compound('bob', 2);
        assert.ok(other.reward > 0n);
    });

    it('is allowed until the second before maturity', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.set(START + 30 * DAY - 1);

        const result = await engine.compound('alice', 0);
        assert.strictEqual(result.reward, 8_112_956n);
    });

    it('is refused at the maturity instant, leaving the lump to unstake', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 2, PRINCIPAL);
        clock.set(START + 365 * DAY);

        await rejectsWith(engine.compound('alice', 0), 'CantCompound');
        const result = await engine.unstake('alice', 0);
        assert.deepStrictEqual(result, { depositId: 0, principal: PRINCIPAL, reward: 299_000_000n, payout: 1_299_000_000n });
    });

    it('is refused after maturity', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.set(START + 30 * DAY + 1);
        await rejectsWith(engine.compound('alice', 0), 'CantCompound');
    });

    it('follows the configured compound period', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        await engine.submit({ type: TransactionType.ADMIN_SET_COMPOUND_PERIOD, sender: OWNER, data: { compoundPeriod: 3600 } });
        clock.advance(3600);
        await engine.compound('alice', 0);
        clock.advance(3600);
        const second = await engine.compound('alice', 0);
        assert.ok(second.reward > 0n);
    });

    it('rejects ended deposits and other owners', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        clock.advance(DAY);
        await rejectsWith(engine.compound('bob', 0), 'InvalidOwner');
        await engine.emergencyWithdraw('alice', 0);
        await rejectsWith(engine.compound('alice', 0), 'EndedDeposit');
    });

    it('draws from the staking supply', async () => {
        const { engine, token, clock } = setup();
        token.mint('alice', PRINCIPAL);
        await engine.stake('alice', 0, PRINCIPAL);
        await engine.submit({ type: TransactionType.ADMIN_SET_STAKING_SUPPLY, sender: OWNER, data: { amount: 100n } });
        clock.advance(DAY);

        const result = await engine.compound('alice', 0);
        assert.strictEqual(result.reward, 100n);
        assert.strictEqual(engine.getAmountLeftForStaking(), 0n);
    });
});
