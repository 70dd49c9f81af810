import * as admin from './admin/admin-interfaces.js';
import * as staking from './staking/staking-interfaces.js';

export enum TransactionType {
  // Staking Transactions
  STAKING_STAKE = 1,
  STAKING_UNSTAKE = 2,
  STAKING_COMPOUND = 3,
  STAKING_EMERGENCY_WITHDRAW = 4,

  // Admin Parameter Transactions
  ADMIN_SET_APR_FACTOR = 10,
  ADMIN_SET_USER_APR_FACTOR = 11,
  ADMIN_SET_EMERGENCY_FEE = 12,
  ADMIN_SET_COMPOUND_PERIOD = 13,
  ADMIN_SET_STAKING_SUPPLY = 14,
  ADMIN_SET_PAUSED = 15,

  // Admin User Bonus Transactions
  ADMIN_SET_USER_BONUS = 20,
  ADMIN_SET_USER_BONUS_BATCH = 21,

  // Admin Pool Transactions
  ADMIN_SET_POOL_STATUS = 30,
  ADMIN_SET_POOL_STATUS_BATCH = 31,
  ADMIN_SET_APR = 32,
  ADMIN_SET_APRS = 33,

  // Admin Escape Hatches
  ADMIN_RETURN_ALL_DEPOSITS = 40,
  ADMIN_SWEEP_TOKEN = 41,
  ADMIN_SWEEP_NATIVE = 42
}

export const transactions: { [K in TransactionType]: string } = {
  [TransactionType.STAKING_STAKE]: 'staking_stake',
  [TransactionType.STAKING_UNSTAKE]: 'staking_unstake',
  [TransactionType.STAKING_COMPOUND]: 'staking_compound',
  [TransactionType.STAKING_EMERGENCY_WITHDRAW]: 'staking_emergency_withdraw',

  [TransactionType.ADMIN_SET_APR_FACTOR]: 'admin_set_apr_factor',
  [TransactionType.ADMIN_SET_USER_APR_FACTOR]: 'admin_set_user_apr_factor',
  [TransactionType.ADMIN_SET_EMERGENCY_FEE]: 'admin_set_emergency_fee',
  [TransactionType.ADMIN_SET_COMPOUND_PERIOD]: 'admin_set_compound_period',
  [TransactionType.ADMIN_SET_STAKING_SUPPLY]: 'admin_set_staking_supply',
  [TransactionType.ADMIN_SET_PAUSED]: 'admin_set_paused',

  [TransactionType.ADMIN_SET_USER_BONUS]: 'admin_set_user_bonus',
  [TransactionType.ADMIN_SET_USER_BONUS_BATCH]: 'admin_set_user_bonus_batch',

  [TransactionType.ADMIN_SET_POOL_STATUS]: 'admin_set_pool_status',
  [TransactionType.ADMIN_SET_POOL_STATUS_BATCH]: 'admin_set_pool_status_batch',
  [TransactionType.ADMIN_SET_APR]: 'admin_set_apr',
  [TransactionType.ADMIN_SET_APRS]: 'admin_set_aprs',

  [TransactionType.ADMIN_RETURN_ALL_DEPOSITS]: 'admin_return_all_deposits',
  [TransactionType.ADMIN_SWEEP_TOKEN]: 'admin_sweep_token',
  [TransactionType.ADMIN_SWEEP_NATIVE]: 'admin_sweep_native',
};

export interface TransactionDataMap {
  [TransactionType.STAKING_STAKE]: staking.StakeData;
  [TransactionType.STAKING_UNSTAKE]: staking.UnstakeData;
  [TransactionType.STAKING_COMPOUND]: staking.CompoundData;
  [TransactionType.STAKING_EMERGENCY_WITHDRAW]: staking.EmergencyWithdrawData;
  [TransactionType.ADMIN_SET_APR_FACTOR]: admin.SetAprFactorData;
  [TransactionType.ADMIN_SET_USER_APR_FACTOR]: admin.SetUserAprFactorData;
  [TransactionType.ADMIN_SET_EMERGENCY_FEE]: admin.SetEmergencyFeeData;
  [TransactionType.ADMIN_SET_COMPOUND_PERIOD]: admin.SetCompoundPeriodData;
  [TransactionType.ADMIN_SET_STAKING_SUPPLY]: admin.SetStakingSupplyData;
  [TransactionType.ADMIN_SET_PAUSED]: admin.SetPausedData;
  [TransactionType.ADMIN_SET_USER_BONUS]: admin.SetUserBonusData;
  [TransactionType.ADMIN_SET_USER_BONUS_BATCH]: admin.SetUserBonusBatchData;
  [TransactionType.ADMIN_SET_POOL_STATUS]: admin.SetPoolStatusData;
  [TransactionType.ADMIN_SET_POOL_STATUS_BATCH]: admin.SetPoolStatusBatchData;
  [TransactionType.ADMIN_SET_APR]: admin.SetAprData;
  [TransactionType.ADMIN_SET_APRS]: admin.SetAprsData;
  [TransactionType.ADMIN_RETURN_ALL_DEPOSITS]: admin.ReturnAllDepositsData;
  [TransactionType.ADMIN_SWEEP_TOKEN]: admin.SweepTokenData;
  [TransactionType.ADMIN_SWEEP_NATIVE]: admin.SweepNativeData;
}

export interface TransactionResultMap {
  [TransactionType.STAKING_STAKE]: staking.StakeResult;
  [TransactionType.STAKING_UNSTAKE]: staking.UnstakeResult;
  [TransactionType.STAKING_COMPOUND]: staking.CompoundResult;
  [TransactionType.STAKING_EMERGENCY_WITHDRAW]: staking.EmergencyWithdrawResult;
  [TransactionType.ADMIN_SET_APR_FACTOR]: admin.ParamChangeResult;
  [TransactionType.ADMIN_SET_USER_APR_FACTOR]: admin.ParamChangeResult;
  [TransactionType.ADMIN_SET_EMERGENCY_FEE]: admin.ParamChangeResult;
  [TransactionType.ADMIN_SET_COMPOUND_PERIOD]: admin.ParamChangeResult;
  [TransactionType.ADMIN_SET_STAKING_SUPPLY]: admin.StakingSupplyResult;
  [TransactionType.ADMIN_SET_PAUSED]: admin.PausedResult;
  [TransactionType.ADMIN_SET_USER_BONUS]: admin.UserBonusResult;
  [TransactionType.ADMIN_SET_USER_BONUS_BATCH]: admin.UserBonusResult;
  [TransactionType.ADMIN_SET_POOL_STATUS]: admin.PoolsResult;
  [TransactionType.ADMIN_SET_POOL_STATUS_BATCH]: admin.PoolsResult;
  [TransactionType.ADMIN_SET_APR]: admin.PoolsResult;
  [TransactionType.ADMIN_SET_APRS]: admin.PoolsResult;
  [TransactionType.ADMIN_RETURN_ALL_DEPOSITS]: admin.ReturnAllDepositsResult;
  [TransactionType.ADMIN_SWEEP_TOKEN]: admin.SweepResult;
  [TransactionType.ADMIN_SWEEP_NATIVE]: admin.SweepResult;
}

export const transactionTypes: TransactionType[] = Object.values(TransactionType).filter(
  (value): value is TransactionType => typeof value === 'number'
);

/**
 * Accepts the numeric type or the snake name (staking_stake, any case).
 */
export function parseTransactionType(value: unknown): TransactionType | undefined {
  for (const type of transactionTypes) {
    if (value === type) return type;
    if (typeof value === 'string' && transactions[type] === value.toLowerCase()) return type;
  }
  return undefined;
}
