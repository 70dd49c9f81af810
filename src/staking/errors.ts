import logger from '../logger.js';

export type StakingErrorCode =
    | 'PoolDisabled'
    | 'InvalidPoolId'
    | 'InvalidDepositId'
    | 'InvalidOwner'
    | 'EndedDeposit'
    | 'CantUnstakeNow'
    | 'CantCompound'
    | 'CantStakeThatMuch'
    | 'InvalidErc20Transfer'
    | 'ContractIsPaused'
    | 'FailedEthTransfer'
    | 'InvalidInput'
    | 'Unauthorized'
    | 'InvalidTransaction';

export class StakingError extends Error {
    public code: StakingErrorCode;

    constructor(code: StakingErrorCode, message: string) {
        super(message);
        this.name = 'StakingError';
        this.code = code;
    }
}

export function isStakingError(value: unknown): value is StakingError {
    return value instanceof StakingError;
}

/**
 * Logs a rejected operation and returns the error for the caller to throw.
 */
export function reject(code: StakingErrorCode, message: string): StakingError {
    logger.warn(`${message} (${code})`);
    return new StakingError(code, message);
}
