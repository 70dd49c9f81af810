import express, { Request, Response, Router } from 'express';

import { StakingEngine } from '../../staking/engine.js';
import { sendError } from './utils.js';

export function createAccountsRouter(engine: StakingEngine): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /accounts/:name Get account
     * @apiName GetAccount
     * @apiGroup Accounts
     *
     * @apiSuccess {String} balance Staking token balance outside the ledger
     * @apiSuccess {Object[]} deposits Every deposit the account opened, ended ones included
     * @apiSuccess {String} totalStaked Principal across open deposits
     * @apiSuccess {Boolean} bonus Whether the account earns the bonus APR
     */
    router.get('/:name', async (req: Request, res: Response) => {
        try {
            const name = req.params.name;
            const balance = await engine.token.balanceOf(name);
            res.json({
                success: true,
                account: {
                    name,
                    balance,
                    deposits: engine.getDepositsOf(name),
                    totalStaked: engine.getTotalStakedByUser(name),
                    bonus: engine.isBonusUser(name),
                },
            });
        } catch (error) {
            sendError(res, error, `fetching account ${req.params.name}`);
        }
    });

    return router;
}
