import express, { Request, Response, Router } from 'express';

import { StakingEngine } from '../../staking/engine.js';
import { parseId, sendError } from './utils.js';

export function createDepositsRouter(engine: StakingEngine): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /deposits/:id Get deposit
     * @apiName GetDeposit
     * @apiGroup Deposits
     * @apiDescription Deposit record plus the reward it would earn right now
     *
     * @apiSuccess {Object} deposit Deposit record, amounts as decimal strings
     * @apiSuccess {String} pendingReward Reward accrued at the current time
     *
     * @apiError (404) InvalidDepositId Unknown deposit id
     */
    router.get('/:id', (req: Request, res: Response) => {
        try {
            const depositId = parseId(req.params.id);
            const deposit = engine.getDeposit(depositId);
            res.json({ success: true, deposit, pendingReward: engine.pendingReward(depositId) });
        } catch (error) {
            sendError(res, error, `fetching deposit ${req.params.id}`);
        }
    });

    return router;
}
