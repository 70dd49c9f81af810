import assert from 'assert';
import { describe, it } from 'node:test';

import { pendingReward, pendingRewardFor, RewardInput, rewardRates, yearlyReward } from '../src/staking/reward.js';
import { defaultParams } from '../src/staking/state.js';

const START = 1_000_000;
const DAY = 86400;

function input(overrides: Partial<RewardInput> = {}): RewardInput {
    return {
        poolApr: 1000,
        hasBonus: false,
        bonusApr: 500,
        periodInDays: 30,
        principal: 1_000_000_000n,
        compounded: 0n,
        startDate: START,
        endDate: START + 30 * DAY,
        now: START + DAY,
        ...overrides,
    };
}

describe('reward rates', () => {
    it('truncates through days, hours, minutes and seconds', () => {
        const yearly = yearlyReward(1_000_000_000n, 1000);
        assert.strictEqual(yearly, 10_000_000_000n);
        assert.deepStrictEqual(rewardRates(yearly), { perDay: 27397260n, perSecond: 317n });
    });
});

describe('pendingReward', () => {
    it('accrues per second before maturity', () => {
        assert.strictEqual(pendingReward(input()), 273888n);
    });

    it('is zero at the start of the lock', () => {
        assert.strictEqual(pendingReward(input({ now: START })), 0n);
    });

    it('subtracts what was already compounded', () => {
        assert.strictEqual(pendingReward(input({ compounded: 1000n })), 273878n);
    });

    it('clamps to zero when compounding over-credited', () => {
        assert.strictEqual(pendingReward(input({ compounded: 30_000_000n })), 0n);
    });

    it('adds the bonus APR for bonus accounts', () => {
        assert.strictEqual(pendingReward(input({ hasBonus: true })), 410400n);
    });

    it('pays the nominal lump from maturity on', () => {
        assert.strictEqual(pendingReward(input({ now: START + 30 * DAY })), 8219178n);
        assert.strictEqual(pendingReward(input({ now: START + 400 * DAY })), 8219178n);
        assert.strictEqual(pendingReward(input({ periodInDays: 180, endDate: START + 180 * DAY, now: START + 180 * DAY })), 49315068n);
        assert.strictEqual(pendingReward(input({ periodInDays: 365, endDate: START + 365 * DAY, now: START + 365 * DAY })), 100000000n);
    });

    it('pays nothing at maturity for other lock lengths', () => {
        assert.strictEqual(pendingReward(input({ periodInDays: 90, endDate: START + 90 * DAY, now: START + 90 * DAY })), 0n);
    });

    it('pays nothing at zero APR', () => {
        assert.strictEqual(pendingReward(input({ poolApr: 0 })), 0n);
    });

    it('never decreases as time passes before maturity', () => {
        let previous = 0n;
        for (let now = START; now < START + 30 * DAY; now += 7919) {
            const current = pendingReward(input({ now }));
            assert.ok(current >= previous, `reward dropped at ${now}`);
            previous = current;
        }
    });
});

describe('pendingRewardFor', () => {
    it('is zero for ended deposits', () => {
        const deposit = {
            depositId: 0,
            poolId: 0,
            owner: 'alice',
            amount: 0n,
            compounded: 0n,
            startDate: START,
            endDate: START + 30 * DAY,
            ended: true,
        };
        const pool = { id: 0, apr: 1000, aprDeficit: 0, periodInDays: 30, totalStakers: 0, enabled: true };
        assert.strictEqual(pendingRewardFor(deposit, pool, defaultParams(), false, START + 31 * DAY), 0n);
    });
});
