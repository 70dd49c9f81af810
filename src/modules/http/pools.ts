import express, { Request, Response, Router } from 'express';

import { StakingEngine } from '../../staking/engine.js';
import { parseId, sendError } from './utils.js';

export function createPoolsRouter(engine: StakingEngine): Router {
    const router: Router = express.Router();

    /**
     * @api {get} /pools List pools
     * @apiName GetPools
     * @apiGroup Pools
     *
     * @apiSuccess {Object[]} data Pools in id order
     * @apiSuccess {Number} data.id Pool id
     * @apiSuccess {Number} data.apr Current APR scaled by 100
     * @apiSuccess {Number} data.periodInDays Lock length
     * @apiSuccess {Number} data.totalStakers Open deposits in the pool
     * @apiSuccess {Boolean} data.enabled Whether new stakes are accepted
     */
    router.get('/', (req: Request, res: Response) => {
        const pools = engine.getPools();
        res.json({ success: true, data: pools, total: pools.length });
    });

    router.get('/aprs', (req: Request, res: Response) => {
        res.json({ success: true, aprs: engine.getAprs() });
    });

    /**
     * @api {get} /pools/:id Get pool
     * @apiName GetPool
     * @apiGroup Pools
     *
     * @apiError (404) InvalidPoolId Unknown pool id
     */
    router.get('/:id', (req: Request, res: Response) => {
        try {
            res.json({ success: true, pool: engine.getPool(parseId(req.params.id)) });
        } catch (error) {
            sendError(res, error, `fetching pool ${req.params.id}`);
        }
    });

    return router;
}
