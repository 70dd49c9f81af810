import { StakingContext } from './context.js';
import { TransactionDataMap, TransactionResultMap, TransactionType } from './types.js';

import * as stakingStake from './staking/staking-stake.js';
import * as stakingUnstake from './staking/staking-unstake.js';
import * as stakingCompound from './staking/staking-compound.js';
import * as stakingEmergencyWithdraw from './staking/staking-emergency-withdraw.js';
import * as adminSetAprFactor from './admin/admin-set-apr-factor.js';
import * as adminSetUserAprFactor from './admin/admin-set-user-apr-factor.js';
import * as adminSetEmergencyFee from './admin/admin-set-emergency-fee.js';
import * as adminSetCompoundPeriod from './admin/admin-set-compound-period.js';
import * as adminSetStakingSupply from './admin/admin-set-staking-supply.js';
import * as adminSetPaused from './admin/admin-set-paused.js';
import * as adminSetUserBonus from './admin/admin-set-user-bonus.js';
import * as adminSetUserBonusBatch from './admin/admin-set-user-bonus-batch.js';
import * as adminSetPoolStatus from './admin/admin-set-pool-status.js';
import * as adminSetPoolStatusBatch from './admin/admin-set-pool-status-batch.js';
import * as adminSetApr from './admin/admin-set-apr.js';
import * as adminSetAprs from './admin/admin-set-aprs.js';
import * as adminReturnAllDeposits from './admin/admin-return-all-deposits.js';
import * as adminSweepToken from './admin/admin-sweep-token.js';
import * as adminSweepNative from './admin/admin-sweep-native.js';

// Define the base transaction interface
export interface Transaction<T extends TransactionType = TransactionType> {
    type: T;
    sender: string;
    data: TransactionDataMap[T];
    id?: string; // Unique transaction ID, derived when missing
}

// Define transaction handler interface
export interface TransactionHandler<T extends TransactionType> {
    validate: (data: TransactionDataMap[T], sender: string, ctx: StakingContext) => Promise<void>;
    process: (data: TransactionDataMap[T], sender: string, ctx: StakingContext) => Promise<TransactionResultMap[T]>;
}

export type TransactionHandlers = { [K in TransactionType]: TransactionHandler<K> };

export const transactionHandlers: TransactionHandlers = {
    [TransactionType.STAKING_STAKE]: { validate: stakingStake.validateTx, process: stakingStake.processTx },
    [TransactionType.STAKING_UNSTAKE]: { validate: stakingUnstake.validateTx, process: stakingUnstake.processTx },
    [TransactionType.STAKING_COMPOUND]: { validate: stakingCompound.validateTx, process: stakingCompound.processTx },
    [TransactionType.STAKING_EMERGENCY_WITHDRAW]: { validate: stakingEmergencyWithdraw.validateTx, process: stakingEmergencyWithdraw.processTx },
    [TransactionType.ADMIN_SET_APR_FACTOR]: { validate: adminSetAprFactor.validateTx, process: adminSetAprFactor.processTx },
    [TransactionType.ADMIN_SET_USER_APR_FACTOR]: { validate: adminSetUserAprFactor.validateTx, process: adminSetUserAprFactor.processTx },
    [TransactionType.ADMIN_SET_EMERGENCY_FEE]: { validate: adminSetEmergencyFee.validateTx, process: adminSetEmergencyFee.processTx },
    [TransactionType.ADMIN_SET_COMPOUND_PERIOD]: { validate: adminSetCompoundPeriod.validateTx, process: adminSetCompoundPeriod.processTx },
    [TransactionType.ADMIN_SET_STAKING_SUPPLY]: { validate: adminSetStakingSupply.validateTx, process: adminSetStakingSupply.processTx },
    [TransactionType.ADMIN_SET_PAUSED]: { validate: adminSetPaused.validateTx, process: adminSetPaused.processTx },
    [TransactionType.ADMIN_SET_USER_BONUS]: { validate: adminSetUserBonus.validateTx, process: adminSetUserBonus.processTx },
    [TransactionType.ADMIN_SET_USER_BONUS_BATCH]: { validate: adminSetUserBonusBatch.validateTx, process: adminSetUserBonusBatch.processTx },
    [TransactionType.ADMIN_SET_POOL_STATUS]: { validate: adminSetPoolStatus.validateTx, process: adminSetPoolStatus.processTx },
    [TransactionType.ADMIN_SET_POOL_STATUS_BATCH]: { validate: adminSetPoolStatusBatch.validateTx, process: adminSetPoolStatusBatch.processTx },
    [TransactionType.ADMIN_SET_APR]: { validate: adminSetApr.validateTx, process: adminSetApr.processTx },
    [TransactionType.ADMIN_SET_APRS]: { validate: adminSetAprs.validateTx, process: adminSetAprs.processTx },
    [TransactionType.ADMIN_RETURN_ALL_DEPOSITS]: { validate: adminReturnAllDeposits.validateTx, process: adminReturnAllDeposits.processTx },
    [TransactionType.ADMIN_SWEEP_TOKEN]: { validate: adminSweepToken.validateTx, process: adminSweepToken.processTx },
    [TransactionType.ADMIN_SWEEP_NATIVE]: { validate: adminSweepNative.validateTx, process: adminSweepNative.processTx },
};

export function getHandler<T extends TransactionType>(type: T): TransactionHandler<T> {
    return transactionHandlers[type];
}

export { TransactionType };
