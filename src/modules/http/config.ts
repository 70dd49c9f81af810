import express, { Request, Response, Router } from 'express';

import config from '../../config.js';
import { StakingEngine } from '../../staking/engine.js';
import { transactionTypes, transactions } from '../../transactions/types.js';

export function createConfigRouter(engine: StakingEngine): Router {
    const router: Router = express.Router();

    router.get('/', (req: Request, res: Response) => {
        res.json({
            networkName: config.networkName,
            tokenSymbol: engine.token.symbol,
            tokenPrecision: config.tokenPrecision,
            custodyAccount: engine.custody,
            params: engine.getParams(),
            amountLeftForStaking: engine.getAmountLeftForStaking(),
            transactionTypes: transactionTypes.map(type => ({ type, name: transactions[type] })),
            timestamp: new Date(engine.now() * 1000).toISOString(),
        });
    });

    return router;
}
