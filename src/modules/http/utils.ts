import { Request, Response } from 'express';

import logger from '../../logger.js';
import { StakingErrorCode, isStakingError } from '../../staking/errors.js';

/**
 * @apiDefine PaginationParams
 * @apiParam {Number} [limit=10] Number of items to return per page (max: 100)
 * @apiParam {Number} [offset=0] Number of items to skip (for pagination)
 *
 * @apiSuccess {Object[]} data Array of items
 * @apiSuccess {Number} total Total number of items available
 * @apiSuccess {Number} limit Number of items per page
 * @apiSuccess {Number} skip Number of items skipped
 * @apiSuccess {Number} page Current page number
 */

const MAX_LIMIT = 100;

function queryInt(value: unknown): number {
    return typeof value === 'string' ? parseInt(value) : NaN;
}

/**
 * Get pagination parameters from request query
 */
export const getPagination = (req: Request) => {
    const requested = queryInt(req.query.limit);
    const limit = requested > 0 ? Math.min(requested, MAX_LIMIT) : 10;
    const offset = Math.max(queryInt(req.query.offset) || 0, 0);
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

/**
 * Parses a path id; anything that is not a plain non-negative integer becomes -1,
 * which no pool or deposit has.
 */
export function parseId(value: string): number {
    return /^\d+$/.test(value) ? Number(value) : -1;
}

const statusByCode: Record<StakingErrorCode, number> = {
    InvalidInput: 400,
    InvalidTransaction: 400,
    CantStakeThatMuch: 400,
    Unauthorized: 403,
    InvalidOwner: 403,
    InvalidPoolId: 404,
    InvalidDepositId: 404,
    PoolDisabled: 409,
    EndedDeposit: 409,
    CantUnstakeNow: 409,
    CantCompound: 409,
    ContractIsPaused: 423,
    InvalidErc20Transfer: 502,
    FailedEthTransfer: 502,
};

export function statusFor(code: StakingErrorCode): number {
    return statusByCode[code];
}

export function sendError(res: Response, error: unknown, context: string): void {
    if (isStakingError(error)) {
        res.status(statusFor(error.code)).json({ success: false, error: error.message, code: error.code });
        return;
    }
    logger.error(`Error ${context}: ${error instanceof Error ? error.message : String(error)}`);
    res.status(500).json({ success: false, error: 'Internal server error' });
}
