// Staking transaction payloads and results; amounts arrive as string | bigint

export interface StakeData {
    poolId: number;
    amount: string | bigint;
}

export interface DepositActionData {
    depositId: number;
}

export type UnstakeData = DepositActionData;
export type CompoundData = DepositActionData;
export type EmergencyWithdrawData = DepositActionData;

export interface StakeResult {
    depositId: number;
    poolId: number;
    amount: bigint;
    startDate: number;
    endDate: number;
    poolApr: number;
}

export interface UnstakeResult {
    depositId: number;
    principal: bigint;
    reward: bigint;
    payout: bigint;
}

export interface CompoundResult {
    depositId: number;
    reward: bigint;
    amount: bigint;
    compounded: bigint;
}

export interface EmergencyWithdrawResult {
    depositId: number;
    principal: bigint;
    fee: bigint;
    payout: bigint;
}
