import { PoolData } from '../../staking/staking-interfaces.js';

export interface SetAprFactorData {
    aprFactor: number;
}

export interface SetUserAprFactorData {
    userAprFactor: number;
}

export interface SetEmergencyFeeData {
    fee: number; // percent, 0..100
}

export interface SetCompoundPeriodData {
    compoundPeriod: number; // seconds
}

export interface SetUserBonusData {
    account: string;
    enabled: boolean;
}

export interface SetUserBonusBatchData {
    accounts: string[];
    enabled: boolean;
}

export interface SetPoolStatusData {
    poolId: number;
    enabled: boolean;
}

export interface SetPoolStatusBatchData {
    poolIds: number[];
    enabled: boolean;
}

export interface SetAprData {
    poolId: number;
    apr: number;
}

export interface SetAprsData {
    aprs: number[]; // one per pool, in pool id order
}

export interface SetStakingSupplyData {
    amount: string | bigint;
}

export interface SetPausedData {
    paused: boolean;
}

export type ReturnAllDepositsData = Record<string, never>;

export interface SweepTokenData {
    symbol: string;
}

export type SweepNativeData = Record<string, never>;

export interface ParamChangeResult {
    previous: number;
    current: number;
}

export interface UserBonusResult {
    accounts: string[];
    enabled: boolean;
}

export interface PoolsResult {
    pools: PoolData[];
}

export interface StakingSupplyResult {
    previous: bigint;
    current: bigint;
}

export interface PausedResult {
    paused: boolean;
}

export interface ReturnAllDepositsResult {
    returned: number[];
    total: bigint;
    failedDepositId?: number;
}

export interface SweepResult {
    symbol: string;
    amount: bigint;
    to: string;
}
