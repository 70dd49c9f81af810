// Pool, deposit and ledger parameter records. Amounts are bigint, times are unix seconds.

export interface PoolData {
    id: number;
    apr: number; // scaled by 100: 1000 = 10.00%
    aprDeficit: number; // join decrements that could not be applied without going below zero
    periodInDays: number;
    totalStakers: number;
    enabled: boolean;
}

export type ExitMode = 'normal' | 'emergency' | 'returned';

export interface DepositData {
    depositId: number;
    poolId: number;
    owner: string;
    amount: bigint;
    compounded: bigint;
    startDate: number;
    endDate: number;
    ended: boolean;
    closedAt?: number;
    exitMode?: ExitMode;
}

export interface StakingParams {
    aprFactor: number;
    userAprFactor: number;
    emergencyFee: number;
    compoundPeriod: number;
    stakingSupply: bigint; // reward budget left to credit
    paused: boolean;
    daySeconds: number;
}

export interface StakingSnapshot {
    pools: PoolData[];
    deposits: DepositData[];
    depositsByOwner: Record<string, number[]>;
    params: StakingParams;
    bonusAccounts: Record<string, boolean>;
    lastCompound: Record<string, number>;
}
