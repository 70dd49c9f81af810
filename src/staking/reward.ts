import { DepositData, PoolData, StakingParams } from './staking-interfaces.js';

export interface RewardInput {
    poolApr: number;
    hasBonus: boolean;
    bonusApr: number;
    periodInDays: number;
    principal: bigint;
    compounded: bigint;
    startDate: number;
    endDate: number;
    now: number;
}

/**
 * Yearly reward at the x100 scale: principal * apr / 100 where apr is itself scaled by 100.
 */
export function yearlyReward(principal: bigint, effectiveApr: number): bigint {
    return (principal * BigInt(effectiveApr)) / 100n;
}

/**
 * Per-day and per-second rates. Each division truncates; the per-second rate
 * is derived through hours and minutes, not straight from the yearly figure.
 */
export function rewardRates(yearly: bigint): { perDay: bigint; perSecond: bigint } {
    const perDay = yearly / 365n;
    const perHour = perDay / 24n;
    const perMinute = perHour / 60n;
    const perSecond = perMinute / 60n;
    return { perDay, perSecond };
}

/**
 * Reward owed on a deposit at `now`.
 *
 * Before `endDate` the reward accrues per second and already compounded rewards
 * are subtracted; a negative result is clamped to zero. From `endDate` on the
 * reward is a fixed lump for the pool's nominal period (30, 180 or 365 days);
 * any other period pays nothing at maturity. Both branches drop the x100 scale
 * with a final division.
 */
export function pendingReward(input: RewardInput): bigint {
    const effectiveApr = input.poolApr + (input.hasBonus ? input.bonusApr : 0);
    if (effectiveApr <= 0 || input.principal <= 0n) return 0n;

    const yearly = yearlyReward(input.principal, effectiveApr);
    const { perDay, perSecond } = rewardRates(yearly);

    let scaled: bigint;
    if (input.now < input.endDate) {
        const elapsed = BigInt(Math.max(0, input.now - input.startDate));
        scaled = elapsed * perSecond - input.compounded;
        if (scaled < 0n) scaled = 0n;
    } else {
        switch (input.periodInDays) {
            case 30:
                scaled = perDay * 30n;
                break;
            case 180:
                scaled = perDay * 180n;
                break;
            case 365:
                scaled = yearly;
                break;
            default:
                scaled = 0n;
        }
    }
    return scaled / 100n;
}

export function pendingRewardFor(deposit: DepositData, pool: PoolData, params: StakingParams, hasBonus: boolean, now: number): bigint {
    if (deposit.ended) return 0n;
    return pendingReward({
        poolApr: pool.apr,
        hasBonus,
        bonusApr: params.userAprFactor,
        periodInDays: pool.periodInDays,
        principal: deposit.amount,
        compounded: deposit.compounded,
        startDate: deposit.startDate,
        endDate: deposit.endDate,
        now,
    });
}
